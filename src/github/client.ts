import { GraphQLClient, ClientError } from 'graphql-request';
import type { BoardClient } from '../sync/types.js';
import { parseItemNode, parseProjectFields } from './items.js';
import type {
  BoardItem,
  FieldValue,
  ProjectFields,
  ProjectRef,
  RepositoryRef,
  GetUserProjectIdResponse,
  GetOrgProjectIdResponse,
  GetProjectFieldsResponse,
  GetProjectItemsResponse,
  GetProjectItemResponse,
  GetRepositoryResponse,
  GetRepositoryLabelsResponse,
  GetUserResponse,
  AddProjectDraftIssueResponse,
  AddProjectItemResponse,
  CreateIssueResponse,
  UpdateProjectItemFieldResponse,
  ArchiveProjectItemResponse,
  UnarchiveProjectItemResponse,
} from './types.js';
import {
  GET_USER_PROJECT_ID,
  GET_ORG_PROJECT_ID,
  GET_PROJECT_FIELDS,
  GET_PROJECT_ITEMS,
  GET_PROJECT_ITEM,
  GET_REPOSITORY,
  GET_REPOSITORY_LABELS,
  GET_USER,
  ADD_PROJECT_DRAFT_ISSUE,
  ADD_PROJECT_ITEM,
  CREATE_ISSUE,
  UPDATE_PROJECT_ITEM_FIELD,
  UPDATE_DRAFT_ISSUE,
  UPDATE_ISSUE,
  SET_ISSUE_ASSIGNEES,
  SET_ISSUE_LABELS,
  REOPEN_ISSUE,
  ARCHIVE_PROJECT_ITEM,
  UNARCHIVE_PROJECT_ITEM,
} from './queries.js';

const GITHUB_GRAPHQL_ENDPOINT = 'https://api.github.com/graphql';
const PAGE_SIZE = 100;
const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;

export interface GitHubClientOptions {
  token: string;
  project: ProjectRef;
  endpoint?: string;
  /** Base backoff delay between retries */
  retryDelayMs?: number;
}

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

/**
 * GitHub GraphQL client bound to one Projects v2 board
 *
 * Project, field and repository lookups are cached on the instance, so two
 * clients never share state.
 */
export class GitHubClient implements BoardClient {
  private client: GraphQLClient;
  private readonly project: ProjectRef;
  private readonly retryDelayMs: number;
  private projectId: string | undefined;
  private fields: ProjectFields | undefined;
  private repositoryIds: Map<string, string> = new Map();

  constructor(options: GitHubClientOptions) {
    this.project = options.project;
    this.retryDelayMs = options.retryDelayMs ?? BASE_DELAY_MS;
    this.client = new GraphQLClient(options.endpoint ?? GITHUB_GRAPHQL_ENDPOINT, {
      headers: {
        authorization: `Bearer ${options.token}`,
      },
    });
  }

  /**
   * Resolve and cache the project's node ID
   */
  async getProjectId(): Promise<string> {
    if (this.projectId) {
      return this.projectId;
    }

    const variables = { login: this.project.owner, number: this.project.number };
    let id: string | undefined;

    if (this.project.ownerType === 'org') {
      const response = await this.executeWithRetry<GetOrgProjectIdResponse>(GET_ORG_PROJECT_ID, variables);
      id = response.organization?.projectV2?.id;
    } else {
      const response = await this.executeWithRetry<GetUserProjectIdResponse>(GET_USER_PROJECT_ID, variables);
      id = response.user?.projectV2?.id;
    }

    if (!id) {
      throw new GitHubClientError(
        `Project #${this.project.number} not found for ${this.project.owner}. ` +
        `Ensure the project exists and your token has access.`
      );
    }

    this.projectId = id;
    return id;
  }

  /**
   * Get all fields of the project, keyed by name
   */
  async getFields(): Promise<ProjectFields> {
    if (this.fields) {
      return this.fields;
    }

    const projectId = await this.getProjectId();
    const response = await this.executeWithRetry<GetProjectFieldsResponse>(GET_PROJECT_FIELDS, { projectId });

    if (!response.node) {
      throw new GitHubClientError(`Project ${projectId} returned no fields`);
    }

    this.fields = parseProjectFields(response.node.fields.nodes);
    return this.fields;
  }

  /**
   * Get all items from the project
   */
  async listItems(): Promise<BoardItem[]> {
    const projectId = await this.getProjectId();
    const allItems: BoardItem[] = [];
    let cursor: string | undefined = undefined;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      const response: GetProjectItemsResponse = await this.executeWithRetry<GetProjectItemsResponse>(
        GET_PROJECT_ITEMS,
        { projectId, first: PAGE_SIZE, after: cursor }
      );

      if (!response.node?.items) {
        throw new GitHubClientError(`Project ${projectId} returned no items connection`);
      }

      for (const node of response.node.items.nodes) {
        if (node && !node.isArchived) {
          allItems.push(parseItemNode(node));
        }
      }

      const { hasNextPage, endCursor } = response.node.items.pageInfo;
      if (!hasNextPage) {
        break;
      }
      if (!endCursor) {
        throw new GitHubClientError(`Project ${projectId} reported another page of items without a cursor`);
      }
      cursor = endCursor;
    }

    return allItems;
  }

  async getItem(itemId: string): Promise<BoardItem | null> {
    const response = await this.executeWithRetry<GetProjectItemResponse>(GET_PROJECT_ITEM, { itemId });
    return response.node?.id ? parseItemNode(response.node) : null;
  }

  async createDraftItem(title: string, body: string): Promise<string> {
    const projectId = await this.getProjectId();
    const response = await this.executeWithRetry<AddProjectDraftIssueResponse>(
      ADD_PROJECT_DRAFT_ISSUE,
      { projectId, title, body }
    );
    return response.addProjectV2DraftIssue.projectItem.id;
  }

  async createIssue(repository: RepositoryRef, title: string, body: string): Promise<string> {
    const repositoryId = await this.getRepositoryId(repository);
    const response = await this.executeWithRetry<CreateIssueResponse>(
      CREATE_ISSUE,
      { repositoryId, title, body }
    );
    return response.createIssue.issue.id;
  }

  /**
   * Add an issue or PR to the project
   */
  async addItemToProject(contentId: string): Promise<string> {
    const projectId = await this.getProjectId();
    const response = await this.executeWithRetry<AddProjectItemResponse>(
      ADD_PROJECT_ITEM,
      { projectId, contentId }
    );
    return response.addProjectV2ItemById.item.id;
  }

  async updateItemField(itemId: string, fieldId: string, value: FieldValue): Promise<void> {
    const projectId = await this.getProjectId();
    await this.executeWithRetry<UpdateProjectItemFieldResponse>(
      UPDATE_PROJECT_ITEM_FIELD,
      { projectId, itemId, fieldId, value: toFieldValueInput(value) }
    );
  }

  async updateDraftIssue(draftIssueId: string, title: string, body: string): Promise<void> {
    await this.executeWithRetry(UPDATE_DRAFT_ISSUE, { draftIssueId, title, body });
  }

  async updateIssue(issueId: string, title: string, body: string): Promise<void> {
    await this.executeWithRetry(UPDATE_ISSUE, { issueId, title, body });
  }

  async setIssueAssignees(issueId: string, userIds: string[]): Promise<void> {
    await this.executeWithRetry(SET_ISSUE_ASSIGNEES, { issueId, assigneeIds: userIds });
  }

  async setIssueLabels(issueId: string, labelIds: string[]): Promise<void> {
    await this.executeWithRetry(SET_ISSUE_LABELS, { issueId, labelIds });
  }

  async reopenIssue(issueId: string): Promise<void> {
    await this.executeWithRetry(REOPEN_ISSUE, { issueId });
  }

  async archiveItem(itemId: string): Promise<void> {
    const projectId = await this.getProjectId();
    await this.executeWithRetry<ArchiveProjectItemResponse>(ARCHIVE_PROJECT_ITEM, { projectId, itemId });
  }

  async unarchiveItem(itemId: string): Promise<void> {
    const projectId = await this.getProjectId();
    await this.executeWithRetry<UnarchiveProjectItemResponse>(UNARCHIVE_PROJECT_ITEM, { projectId, itemId });
  }

  /**
   * Resolve a login to a user node ID; null when no such user exists
   */
  async resolveUserId(login: string): Promise<string | null> {
    try {
      const response = await this.executeWithRetry<GetUserResponse>(GET_USER, { login });
      return response.user?.id ?? null;
    } catch (error) {
      if (error instanceof GitHubClientError && isNotFoundMessage(error.message)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Resolve label names to IDs within a repository. Unknown names are dropped.
   */
  async resolveLabelIds(repository: RepositoryRef, names: string[]): Promise<string[]> {
    const response = await this.executeWithRetry<GetRepositoryLabelsResponse>(
      GET_REPOSITORY_LABELS,
      { owner: repository.owner, name: repository.name }
    );

    const byName = new Map<string, string>();
    for (const label of response.repository?.labels.nodes ?? []) {
      if (label) {
        byName.set(label.name, label.id);
      }
    }

    return names.flatMap((name) => {
      const id = byName.get(name);
      return id ? [id] : [];
    });
  }

  /**
   * Resolve and cache a repository's node ID
   */
  async getRepositoryId(repository: RepositoryRef): Promise<string> {
    const key = `${repository.owner}/${repository.name}`;
    const cached = this.repositoryIds.get(key);
    if (cached) {
      return cached;
    }

    const response = await this.executeWithRetry<GetRepositoryResponse>(
      GET_REPOSITORY,
      { owner: repository.owner, name: repository.name }
    );

    if (!response.repository) {
      throw new GitHubClientError(`Repository ${key} not found`);
    }

    this.repositoryIds.set(key, response.repository.id);
    return response.repository.id;
  }

  /**
   * Clear the project, field and repository caches
   */
  clearCache(): void {
    this.projectId = undefined;
    this.fields = undefined;
    this.repositoryIds.clear();
  }

  /**
   * Execute a GraphQL query with retry logic
   */
  private async executeWithRetry<T = unknown>(
    query: string,
    variables: Record<string, unknown>
  ): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      try {
        return await this.client.request<T>(query, variables);
      } catch (error) {
        lastError = error;

        if (!this.isRetryableError(error)) {
          throw this.wrapError(error);
        }

        // Exponential backoff
        if (attempt < MAX_RETRIES - 1) {
          await this.sleep(this.retryDelayMs * Math.pow(2, attempt));
        }
      }
    }

    throw this.wrapError(lastError);
  }

  /**
   * Check if an error is retryable
   */
  private isRetryableError(error: unknown): boolean {
    if (error instanceof ClientError) {
      const status = error.response?.status;
      return status === 502 || status === 503 || status === 429;
    }
    return false;
  }

  /**
   * Wrap errors in GitHubClientError
   */
  private wrapError(error: unknown): GitHubClientError {
    if (error instanceof GitHubClientError) {
      return error;
    }

    if (error instanceof ClientError) {
      const status = error.response?.status;
      const message = error.response?.errors?.[0]?.message ?? error.message;

      if (status === 401) {
        return new GitHubClientError('Authentication failed. Check your GitHub token.', 401);
      }
      if (status === 403) {
        return new GitHubClientError(
          'Access denied. Ensure your token has the required scopes.',
          403
        );
      }
      if (status === 429) {
        return new GitHubClientError('Rate limited. Please wait and try again.', 429, true);
      }

      return new GitHubClientError(message, status);
    }

    if (error instanceof Error) {
      return new GitHubClientError(error.message);
    }

    return new GitHubClientError('Unknown error occurred');
  }

  /**
   * Sleep for the specified duration
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function toFieldValueInput(value: FieldValue): Record<string, string> {
  switch (value.kind) {
    case 'text':
      return { text: value.text };
    case 'singleSelect':
      return { singleSelectOptionId: value.optionId };
    case 'date':
      return { date: value.date };
  }
}

function isNotFoundMessage(message: string): boolean {
  return /could not resolve to a user/i.test(message);
}

/**
 * Create a GitHub client for a project board with the provided token
 */
export function createGitHubClient(token: string, project: ProjectRef): GitHubClient {
  if (!token) {
    throw new GitHubClientError('GitHub token is required');
  }
  return new GitHubClient({ token, project });
}
