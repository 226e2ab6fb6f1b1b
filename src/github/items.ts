import {
  DUE_DATE_FIELD_NAMES,
  STATUS_FIELD_NAME,
  type BoardItem,
  type ItemContent,
  type ItemContentNode,
  type ProjectFieldInfo,
  type ProjectFieldNode,
  type ProjectFields,
  type ProjectItemFieldValueNode,
  type ProjectItemNode,
} from './types.js';

/**
 * Map the content union of an item node to an ItemContent.
 * Content without a node ID is treated as missing.
 */
export function parseItemContent(node: ItemContentNode | null | undefined): ItemContent {
  if (!node || !node.id) {
    return { kind: 'none' };
  }

  switch (node.__typename) {
    case 'DraftIssue':
      return { kind: 'draft', id: node.id };
    case 'Issue':
      return {
        kind: 'issue',
        id: node.id,
        repository: node.repository
          ? { owner: node.repository.owner.login, name: node.repository.name }
          : null,
        state: node.state ?? 'OPEN',
      };
    case 'PullRequest':
      return { kind: 'pullRequest', id: node.id };
    default:
      return { kind: 'none' };
  }
}

function fieldValuesByName(node: ProjectItemNode): Map<string, ProjectItemFieldValueNode> {
  const values = new Map<string, ProjectItemFieldValueNode>();
  for (const value of node.fieldValues?.nodes ?? []) {
    const name = value?.field?.name;
    if (value && name) {
      values.set(name, value);
    }
  }
  return values;
}

/**
 * Convert a raw project item node into a BoardItem
 *
 * Assignees and labels are only read from Issue content; the first assignee
 * is the one compared against the task.
 */
export function parseItemNode(node: ProjectItemNode): BoardItem {
  const content = parseItemContent(node.content);
  const values = fieldValuesByName(node);

  let dueDate: string | null = null;
  for (const fieldName of DUE_DATE_FIELD_NAMES) {
    const date = values.get(fieldName)?.date;
    if (date) {
      dueDate = date.slice(0, 10);
      break;
    }
  }

  let assignee: string | null = null;
  let labels: string[] = [];
  if (node.content?.__typename === 'Issue' && content.kind === 'issue') {
    assignee = node.content.assignees?.nodes.find((user) => user !== null)?.login ?? null;
    labels = (node.content.labels?.nodes ?? [])
      .map((label) => label?.name)
      .filter((name): name is string => typeof name === 'string' && name.length > 0);
  }

  return {
    id: node.id,
    content,
    title: node.content?.title ?? '',
    status: values.get(STATUS_FIELD_NAME)?.name ?? '',
    assignee,
    labels,
    dueDate,
    description: node.content?.body ?? '',
  };
}

/**
 * Build the name-keyed field map from a fields query response
 */
export function parseProjectFields(nodes: Array<ProjectFieldNode | null>): ProjectFields {
  const fields: ProjectFields = new Map();

  for (const node of nodes) {
    if (!node?.id || !node.name) {
      continue;
    }

    const field: ProjectFieldInfo = {
      id: node.id,
      name: node.name,
      dataType: node.dataType ?? '',
      options: new Map((node.options ?? []).map((option) => [option.name, option.id])),
    };
    fields.set(node.name, field);
  }

  return fields;
}
