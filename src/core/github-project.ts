import { RequestError } from 'octokit';
import { PROJECT_FIELDS_PAGE_SIZE, STATUS_FIELD_NAME } from '../constants.js';
import type {
  IssueInput,
  IssueRef,
  ProjectField,
  ProjectInfo,
  SingleSelectOption,
  StatusFieldInfo,
} from '../types/github.js';
import { ProjectNotFoundError, StatusFieldMissingError, errorMessage } from '../utils/errors.js';
import { getOctokit } from '../utils/github-api.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

type OwnerType = 'user' | 'organization';

interface ProjectFieldNode {
  id?: string;
  name?: string;
  options?: SingleSelectOption[];
}

interface ProjectNode {
  id: string;
  title: string;
  number: number;
  fields: { nodes: Array<ProjectFieldNode | null> };
}

type ProjectQueryResult = {
  [K in OwnerType]?: { projectV2: ProjectNode | null } | null;
};

function projectQuery(ownerType: OwnerType): string {
  return `
    query($login: String!, $number: Int!) {
      ${ownerType}(login: $login) {
        projectV2(number: $number) {
          id
          title
          number
          fields(first: ${PROJECT_FIELDS_PAGE_SIZE}) {
            nodes {
              ... on ProjectV2FieldCommon {
                id
                name
              }
              ... on ProjectV2SingleSelectField {
                options { id name }
              }
            }
          }
        }
      }
    }
  `;
}

function toProjectInfo(node: ProjectNode, owner: string): ProjectInfo {
  const fields: ProjectField[] = [];
  for (const field of node.fields.nodes) {
    if (!field?.id || !field.name) continue;
    fields.push({ id: field.id, name: field.name, options: field.options });
  }
  return { id: node.id, title: node.title, number: node.number, owner, fields };
}

/**
 * Find a Project V2 by owner login and number, trying the login as a user
 * first and then as an organization.
 */
export async function findProject(owner: string, projectNumber: number): Promise<ProjectInfo> {
  let lastError: unknown;

  for (const ownerType of ['user', 'organization'] as const) {
    try {
      const data = await withRetry(
        () => getOctokit().graphql<ProjectQueryResult>(projectQuery(ownerType), { login: owner, number: projectNumber }),
        `Find ${ownerType} project`,
      );
      const node = data[ownerType]?.projectV2;
      if (node) {
        return toProjectInfo(node, owner);
      }
    } catch (err) {
      lastError = err;
      logger.debug(`No ${ownerType} project ${owner}#${projectNumber}: ${errorMessage(err)}`);
    }
  }

  // Authentication and permission failures are not "not found"
  if (lastError instanceof RequestError) {
    throw lastError;
  }
  throw new ProjectNotFoundError(owner, projectNumber);
}

/**
 * Locate the single-select Status field and index its options by
 * trimmed, lower-cased name.
 */
export function getStatusField(project: ProjectInfo): StatusFieldInfo {
  const field = project.fields.find(
    (f) => f.name.trim().toLowerCase() === STATUS_FIELD_NAME && f.options !== undefined,
  );
  if (!field?.options) {
    throw new StatusFieldMissingError(project.title);
  }

  const options: Record<string, string> = {};
  for (const option of field.options) {
    options[option.name.trim().toLowerCase()] = option.id;
  }
  return {
    fieldId: field.id,
    options,
    optionNames: field.options.map((o) => o.name),
  };
}

/**
 * List the names of every label in a repository
 */
export async function listLabels(owner: string, repo: string): Promise<string[]> {
  return withRetry(async () => {
    const octokit = getOctokit();
    const labels = await octokit.paginate(octokit.rest.issues.listLabelsForRepo, {
      owner,
      repo,
      per_page: 100,
    });
    return labels.map((label) => label.name);
  }, 'List labels');
}

function isAlreadyExists(err: unknown): boolean {
  if (!(err instanceof RequestError) || err.status !== 422) return false;
  const data = err.response?.data;
  if (typeof data !== 'object' || data === null || !('errors' in data) || !Array.isArray(data.errors)) {
    return false;
  }
  return data.errors.some(
    (e: unknown) => typeof e === 'object' && e !== null && 'code' in e && e.code === 'already_exists',
  );
}

/**
 * Create a label in a repository. Returns false when it already existed.
 */
export async function createLabel(owner: string, repo: string, name: string, color: string): Promise<boolean> {
  try {
    await withRetry(async () => {
      await getOctokit().rest.issues.createLabel({ owner, repo, name, color });
    }, `Create label "${name}"`);
    return true;
  } catch (err) {
    if (isAlreadyExists(err)) {
      logger.debug(`Label "${name}" already exists`);
      return false;
    }
    throw err;
  }
}

/**
 * Create an issue. The labels key is only sent when there are labels.
 */
export async function createIssue(owner: string, repo: string, input: IssueInput): Promise<IssueRef> {
  return withRetry(async () => {
    const { data } = await getOctokit().rest.issues.create({
      owner,
      repo,
      title: input.title,
      body: input.body,
      ...(input.labels.length > 0 ? { labels: input.labels } : {}),
    });
    return { number: data.number, nodeId: data.node_id, url: data.html_url };
  }, 'Create issue');
}

/**
 * Update an existing issue's title and body. Labels are replaced only when
 * the row names some.
 */
export async function updateIssue(owner: string, repo: string, issueNumber: number, input: IssueInput): Promise<IssueRef> {
  return withRetry(async () => {
    const { data } = await getOctokit().rest.issues.update({
      owner,
      repo,
      issue_number: issueNumber,
      title: input.title,
      body: input.body,
      ...(input.labels.length > 0 ? { labels: input.labels } : {}),
    });
    return { number: data.number, nodeId: data.node_id, url: data.html_url };
  }, 'Update issue');
}

/**
 * Find an open issue (not a pull request) whose title matches exactly
 */
export async function findOpenIssueByTitle(owner: string, repo: string, title: string): Promise<IssueRef | null> {
  return withRetry(async () => {
    const octokit = getOctokit();
    const pages = octokit.paginate.iterator(octokit.rest.issues.listForRepo, {
      owner,
      repo,
      state: 'open',
      per_page: 100,
    });
    for await (const { data } of pages) {
      const match = data.find((issue) => !issue.pull_request && issue.title === title);
      if (match) {
        return { number: match.number, nodeId: match.node_id, url: match.html_url };
      }
    }
    return null;
  }, 'Find issue by title');
}

/**
 * Add an issue to a Project V2 and return the project item ID.
 * GitHub returns the existing item when the issue is already on the board.
 */
export async function addProjectItem(projectId: string, contentId: string): Promise<string> {
  return withRetry(async () => {
    const data = await getOctokit().graphql<{ addProjectV2ItemById: { item: { id: string } } }>(`
      mutation($projectId: ID!, $contentId: ID!) {
        addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
          item { id }
        }
      }
    `, { projectId, contentId });
    return data.addProjectV2ItemById.item.id;
  }, 'Add item to project');
}

/**
 * Set a single select field value on a project item (e.g., Status)
 */
export async function setSingleSelectValue(projectId: string, itemId: string, fieldId: string, optionId: string): Promise<void> {
  await withRetry(async () => {
    await getOctokit().graphql(`
      mutation($projectId: ID!, $itemId: ID!, $fieldId: ID!, $optionId: String!) {
        updateProjectV2ItemFieldValue(input: {
          projectId: $projectId
          itemId: $itemId
          fieldId: $fieldId
          value: { singleSelectOptionId: $optionId }
        }) {
          projectV2Item { id }
        }
      }
    `, { projectId, itemId, fieldId, optionId });
  }, 'Set single select field');
}
