import { gql } from 'graphql-request';

/**
 * GraphQL documents for GitHub Projects v2 board sync
 */

// Resolve a user-owned project's node ID
export const GET_USER_PROJECT_ID = gql`
  query GetUserProjectId($login: String!, $number: Int!) {
    user(login: $login) {
      projectV2(number: $number) {
        id
      }
    }
  }
`;

// Resolve an organization-owned project's node ID
export const GET_ORG_PROJECT_ID = gql`
  query GetOrgProjectId($login: String!, $number: Int!) {
    organization(login: $login) {
      projectV2(number: $number) {
        id
      }
    }
  }
`;

// Get project fields by project node ID
export const GET_PROJECT_FIELDS = gql`
  query GetProjectFields($projectId: ID!) {
    node(id: $projectId) {
      ... on ProjectV2 {
        fields(first: 50) {
          nodes {
            ... on ProjectV2Field {
              id
              name
              dataType
            }
            ... on ProjectV2SingleSelectField {
              id
              name
              dataType
              options {
                id
                name
              }
            }
            ... on ProjectV2IterationField {
              id
              name
              dataType
            }
          }
        }
      }
    }
  }
`;

const PROJECT_ITEM_FIELDS = `
  id
  isArchived
  fieldValues(first: 20) {
    nodes {
      ... on ProjectV2ItemFieldTextValue {
        text
        field {
          ... on ProjectV2FieldCommon {
            name
          }
        }
      }
      ... on ProjectV2ItemFieldSingleSelectValue {
        name
        optionId
        field {
          ... on ProjectV2FieldCommon {
            name
          }
        }
      }
      ... on ProjectV2ItemFieldDateValue {
        date
        field {
          ... on ProjectV2FieldCommon {
            name
          }
        }
      }
    }
  }
  content {
    __typename
    ... on DraftIssue {
      id
      title
      body
    }
    ... on Issue {
      id
      title
      body
      state
      repository {
        name
        owner {
          login
        }
      }
      assignees(first: 10) {
        nodes {
          login
        }
      }
      labels(first: 50) {
        nodes {
          name
        }
      }
    }
    ... on PullRequest {
      id
      title
      body
    }
  }
`;

// Get project items with pagination
export const GET_PROJECT_ITEMS = gql`
  query GetProjectItems($projectId: ID!, $first: Int = 100, $after: String) {
    node(id: $projectId) {
      ... on ProjectV2 {
        items(first: $first, after: $after) {
          pageInfo {
            hasNextPage
            endCursor
          }
          nodes {
            ${PROJECT_ITEM_FIELDS}
          }
        }
      }
    }
  }
`;

// Get a single project item (archived items included)
export const GET_PROJECT_ITEM = gql`
  query GetProjectItem($itemId: ID!) {
    node(id: $itemId) {
      ... on ProjectV2Item {
        ${PROJECT_ITEM_FIELDS}
      }
    }
  }
`;

export const GET_REPOSITORY = gql`
  query GetRepository($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      id
    }
  }
`;

export const GET_REPOSITORY_LABELS = gql`
  query GetRepositoryLabels($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      labels(first: 100) {
        nodes {
          id
          name
        }
      }
    }
  }
`;

export const GET_USER = gql`
  query GetUser($login: String!) {
    user(login: $login) {
      id
    }
  }
`;

// Add a draft issue directly to a project
export const ADD_PROJECT_DRAFT_ISSUE = gql`
  mutation AddProjectDraftIssue($projectId: ID!, $title: String!, $body: String) {
    addProjectV2DraftIssue(input: { projectId: $projectId, title: $title, body: $body }) {
      projectItem {
        id
      }
    }
  }
`;

// Add an item (issue/PR) to a project
export const ADD_PROJECT_ITEM = gql`
  mutation AddProjectItem($projectId: ID!, $contentId: ID!) {
    addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
      item {
        id
      }
    }
  }
`;

export const CREATE_ISSUE = gql`
  mutation CreateIssue($repositoryId: ID!, $title: String!, $body: String) {
    createIssue(input: { repositoryId: $repositoryId, title: $title, body: $body }) {
      issue {
        id
      }
    }
  }
`;

// Update a project item field. Exactly one of the value variables is set.
export const UPDATE_PROJECT_ITEM_FIELD = gql`
  mutation UpdateProjectItemField(
    $projectId: ID!
    $itemId: ID!
    $fieldId: ID!
    $value: ProjectV2FieldValue!
  ) {
    updateProjectV2ItemFieldValue(
      input: { projectId: $projectId, itemId: $itemId, fieldId: $fieldId, value: $value }
    ) {
      projectV2Item {
        id
      }
    }
  }
`;

export const UPDATE_DRAFT_ISSUE = gql`
  mutation UpdateDraftIssue($draftIssueId: ID!, $title: String!, $body: String) {
    updateProjectV2DraftIssue(input: { draftIssueId: $draftIssueId, title: $title, body: $body }) {
      draftIssue {
        id
      }
    }
  }
`;

export const UPDATE_ISSUE = gql`
  mutation UpdateIssue($issueId: ID!, $title: String!, $body: String) {
    updateIssue(input: { id: $issueId, title: $title, body: $body }) {
      issue {
        id
      }
    }
  }
`;

export const SET_ISSUE_ASSIGNEES = gql`
  mutation SetIssueAssignees($issueId: ID!, $assigneeIds: [ID!]) {
    updateIssue(input: { id: $issueId, assigneeIds: $assigneeIds }) {
      issue {
        id
      }
    }
  }
`;

export const SET_ISSUE_LABELS = gql`
  mutation SetIssueLabels($issueId: ID!, $labelIds: [ID!]) {
    updateIssue(input: { id: $issueId, labelIds: $labelIds }) {
      issue {
        id
      }
    }
  }
`;

export const REOPEN_ISSUE = gql`
  mutation ReopenIssue($issueId: ID!) {
    reopenIssue(input: { issueId: $issueId }) {
      issue {
        id
      }
    }
  }
`;

export const ARCHIVE_PROJECT_ITEM = gql`
  mutation ArchiveProjectItem($projectId: ID!, $itemId: ID!) {
    archiveProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
      item {
        id
      }
    }
  }
`;

export const UNARCHIVE_PROJECT_ITEM = gql`
  mutation UnarchiveProjectItem($projectId: ID!, $itemId: ID!) {
    unarchiveProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
      item {
        id
      }
    }
  }
`;
