/**
 * GitHub API response types for Projects v2, plus the normalized board
 * item model the sync engine works on
 */

// GraphQL node interface
export interface GitHubNode {
  id: string;
}

// Project field option (for single-select fields like Status)
export interface ProjectFieldOption {
  id: string;
  name: string;
}

export type ProjectFieldDataType =
  | 'TEXT'
  | 'SINGLE_SELECT'
  | 'NUMBER'
  | 'DATE'
  | 'ITERATION'
  | 'TITLE'
  | 'ASSIGNEES'
  | 'LABELS'
  | (string & {});

// Project field node as returned by the fields query
export interface ProjectFieldNode {
  id?: string;
  name?: string;
  dataType?: ProjectFieldDataType;
  options?: ProjectFieldOption[];
}

// Project item field values
export interface ProjectItemFieldValueNode {
  field?: { name?: string };
  text?: string;
  name?: string;
  optionId?: string;
  date?: string;
}

export interface RepositoryNode {
  name: string;
  owner: { login: string };
}

// Content union as returned by GET_PROJECT_ITEMS / GET_PROJECT_ITEM
export interface DraftIssueNode {
  __typename: 'DraftIssue';
  id?: string;
  title?: string;
  body?: string | null;
}

export interface IssueNode {
  __typename: 'Issue';
  id?: string;
  title?: string;
  body?: string | null;
  state?: 'OPEN' | 'CLOSED';
  repository?: RepositoryNode | null;
  assignees?: { nodes: Array<{ login: string } | null> };
  labels?: { nodes: Array<{ name: string } | null> };
}

export interface PullRequestNode {
  __typename: 'PullRequest';
  id?: string;
  title?: string;
  body?: string | null;
}

export type ItemContentNode = DraftIssueNode | IssueNode | PullRequestNode;

export interface ProjectItemNode extends GitHubNode {
  isArchived?: boolean;
  fieldValues?: { nodes: Array<ProjectItemFieldValueNode | null> };
  content?: ItemContentNode | null;
}

// Page info for pagination
export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

// API response types
export interface GetUserProjectIdResponse {
  user: { projectV2: GitHubNode | null } | null;
}

export interface GetOrgProjectIdResponse {
  organization: { projectV2: GitHubNode | null } | null;
}

export interface GetProjectFieldsResponse {
  node: {
    fields: { nodes: Array<ProjectFieldNode | null> };
  } | null;
}

export interface GetProjectItemsResponse {
  node: {
    items: {
      pageInfo: PageInfo;
      nodes: Array<ProjectItemNode | null>;
    };
  } | null;
}

export interface GetProjectItemResponse {
  node: ProjectItemNode | null;
}

export interface GetRepositoryResponse {
  repository: GitHubNode | null;
}

export interface GetRepositoryLabelsResponse {
  repository: {
    labels: { nodes: Array<{ id: string; name: string } | null> };
  } | null;
}

export interface GetUserResponse {
  user: GitHubNode | null;
}

export interface AddProjectDraftIssueResponse {
  addProjectV2DraftIssue: { projectItem: GitHubNode };
}

export interface AddProjectItemResponse {
  addProjectV2ItemById: { item: GitHubNode };
}

export interface CreateIssueResponse {
  createIssue: { issue: GitHubNode };
}

export interface UpdateProjectItemFieldResponse {
  updateProjectV2ItemFieldValue: { projectV2Item: GitHubNode };
}

export interface ArchiveProjectItemResponse {
  archiveProjectV2Item: { item: GitHubNode };
}

export interface UnarchiveProjectItemResponse {
  unarchiveProjectV2Item: { item: GitHubNode };
}

// Normalized project field, keyed by name in ProjectFields
export interface ProjectFieldInfo {
  id: string;
  name: string;
  dataType: ProjectFieldDataType;
  /** option name -> option ID, empty for non single-select fields */
  options: Map<string, string>;
}

export type ProjectFields = Map<string, ProjectFieldInfo>;

/**
 * Repository that owns an issue
 */
export interface RepositoryRef {
  owner: string;
  name: string;
}

/**
 * What a board item wraps. Draft content has no assignee or label support;
 * `none` covers redacted or missing content.
 */
export type ItemContent =
  | { kind: 'draft'; id: string }
  | { kind: 'issue'; id: string; repository: RepositoryRef | null; state: 'OPEN' | 'CLOSED' }
  | { kind: 'pullRequest'; id: string }
  | { kind: 'none' };

export type ContentKind = ItemContent['kind'];

/**
 * Observed state of one project board item
 */
export interface BoardItem {
  /** Project item node ID (PVTI_...) */
  id: string;
  content: ItemContent;
  title: string;
  status: string;
  assignee: string | null;
  labels: string[];
  /** YYYY-MM-DD */
  dueDate: string | null;
  description: string;
}

/**
 * Value written through updateProjectV2ItemFieldValue
 */
export type FieldValue =
  | { kind: 'text'; text: string }
  | { kind: 'singleSelect'; optionId: string }
  | { kind: 'date'; date: string };

/**
 * Coordinates of the project board a client talks to
 */
export interface ProjectRef {
  owner: string;
  number: number;
  ownerType: 'org' | 'user';
}

/**
 * Field names accepted for the due date, in order of preference
 */
export const DUE_DATE_FIELD_NAMES = ['End date', 'Due'] as const;

export const STATUS_FIELD_NAME = 'Status';
