export { GitHubClient, GitHubClientError, createGitHubClient } from './client.js';
export type { GitHubClientOptions } from './client.js';

export { parseItemContent, parseItemNode, parseProjectFields } from './items.js';

export type {
  BoardItem,
  ItemContent,
  ContentKind,
  FieldValue,
  ProjectFieldInfo,
  ProjectFields,
  ProjectRef,
  RepositoryRef,
} from './types.js';

export { DUE_DATE_FIELD_NAMES, STATUS_FIELD_NAME } from './types.js';
