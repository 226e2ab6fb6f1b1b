export {
  ConfigError,
  TOKEN_ENV_VARS,
  parseConfigString,
  parseConfigFile,
  defaultConfig,
  resolveToken,
  parseRepo,
  resolveScope,
} from './parser.js';

export type {
  Config,
  GitHubConfig,
  ProjectConfig,
  ScopeConfig,
  LogConfig,
  NormalizedConfig,
} from '../types/config.js';

export {
  ConfigSchema,
  GitHubConfigSchema,
  ProjectConfigSchema,
  ScopeConfigSchema,
  LogConfigSchema,
} from '../types/config.js';
