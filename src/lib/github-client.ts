/**
 * GitHub API client wrapper using Octokit (GraphQL for issues and projects)
 */

import { Octokit } from '@octokit/rest';
import { IssueInput, IssueRef, IssueTracker, RepositoryInfo } from './types';
import { Logger } from './logger';

const PROJECTS_PAGE_SIZE = 50;
const LABELS_PAGE_SIZE = 100;
const ISSUE_TYPES_PAGE_SIZE = 50;
const PARENT_SEARCH_SIZE = 10;

const ALREADY_IN_PROJECT = 'content already exists in the project';
const DUPLICATE_SUB_ISSUE = 'duplicate sub-issues';

interface NamedNode {
  id: string;
  name: string;
}

interface ProjectsPage {
  organization: {
    projectsV2: {
      pageInfo: { hasNextPage: boolean; endCursor: string | null };
      nodes: Array<{ id: string; title: string }>;
    };
  } | null;
}

interface IssueMutationPayload {
  issue: { id: string; number: number; title: string } | null;
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GitHubClient implements IssueTracker {
  private octokit: Octokit;
  private logger: Logger;
  private repositoryIds = new Map<string, string>();

  constructor(token: string, logger: Logger) {
    this.logger = logger;
    this.octokit = new Octokit({
      auth: token,
      log: {
        debug: (message: string) => logger.debug(message),
        info: (message: string) => logger.debug(message),
        warn: (message: string) => logger.warn(message),
        error: (message: string) => logger.error(message),
      },
    });
  }

  /**
   * Resolve a repository's GraphQL node ID (cached per owner/repo)
   */
  async resolveRepositoryId(owner: string, repo: string): Promise<string> {
    const key = `${owner}/${repo}`.toLowerCase();
    const cached = this.repositoryIds.get(key);
    if (cached) return cached;

    const data = await this.octokit.graphql<{ repository: { id: string } | null }>(
      `query($owner: String!, $name: String!) {
        repository(owner: $owner, name: $name) { id }
      }`,
      { owner, name: repo }
    );

    const id = data.repository?.id;
    if (!id) {
      throw new Error(`repository id empty for ${owner}/${repo}`);
    }
    this.repositoryIds.set(key, id);
    return id;
  }

  /**
   * Resolve an issue number to its GraphQL node ID
   */
  async resolveIssueNodeId(owner: string, repo: string, issueNumber: number): Promise<string> {
    if (!Number.isInteger(issueNumber) || issueNumber <= 0) {
      throw new Error(`invalid issue number: ${issueNumber}`);
    }

    const data = await this.octokit.graphql<{ repository: { issue: { id: string } | null } | null }>(
      `query($owner: String!, $name: String!, $number: Int!) {
        repository(owner: $owner, name: $name) {
          issue(number: $number) { id number }
        }
      }`,
      { owner, name: repo, number: issueNumber }
    );

    const id = data.repository?.issue?.id;
    if (!id) {
      throw new Error(`issue #${issueNumber} not found in ${owner}/${repo}`);
    }
    return id;
  }

  /**
   * Find an issue in the repository by exact (case-insensitive) title.
   * Search is fuzzy, so results are filtered to the same title and repository.
   */
  async resolveParentIssueId(owner: string, repo: string, parentTitle: string): Promise<string> {
    const title = parentTitle.trim();
    if (!title) {
      throw new Error('parent title is empty');
    }

    const data = await this.octokit.graphql<{
      search: {
        nodes: Array<{
          id?: string;
          title?: string;
          repository?: { name: string; owner: { login: string } };
        }>;
      };
    }>(
      `query($query: String!, $first: Int!) {
        search(query: $query, type: ISSUE, first: $first) {
          nodes {
            ... on Issue {
              id
              title
              number
              repository { owner { login } name }
            }
          }
        }
      }`,
      { query: `"${title}" repo:${owner}/${repo} in:title`, first: PARENT_SEARCH_SIZE }
    );

    for (const node of data.search.nodes) {
      if (
        node.id &&
        node.title !== undefined &&
        node.repository &&
        sameText(node.title, title) &&
        sameText(node.repository.owner.login, owner) &&
        sameText(node.repository.name, repo)
      ) {
        return node.id;
      }
    }

    throw new Error(`parent issue with title "${title}" not found in ${owner}/${repo}`);
  }

  /**
   * Convert label names to node IDs, keeping the requested order.
   * Names with no matching repository label are dropped with a warning.
   */
  async resolveLabelIds(owner: string, repo: string, names: string[]): Promise<string[]> {
    if (names.length === 0) return [];

    const data = await this.octokit.graphql<{ repository: { labels: { nodes: NamedNode[] } } | null }>(
      `query($owner: String!, $name: String!, $first: Int!) {
        repository(owner: $owner, name: $name) {
          labels(first: $first) { nodes { id name } }
        }
      }`,
      { owner, name: repo, first: LABELS_PAGE_SIZE }
    );

    const available = data.repository?.labels.nodes ?? [];
    const ids: string[] = [];

    for (const name of names) {
      const label = available.find((node) => sameText(node.name, name));
      if (label) {
        ids.push(label.id);
      } else {
        this.logger.warn('Label not found in repository', { label: name, repo: `${owner}/${repo}` });
      }
    }

    return ids;
  }

  /**
   * Resolve an issue type name (e.g. "Bug", "Epic") to its node ID
   */
  async resolveIssueTypeId(owner: string, repo: string, typeName: string): Promise<string> {
    if (!typeName.trim()) {
      throw new Error('issue type name is empty');
    }

    const data = await this.octokit.graphql<{ repository: { issueTypes: { nodes: NamedNode[] } | null } | null }>(
      `query($owner: String!, $name: String!, $first: Int!) {
        repository(owner: $owner, name: $name) {
          issueTypes(first: $first) { nodes { id name } }
        }
      }`,
      { owner, name: repo, first: ISSUE_TYPES_PAGE_SIZE }
    );

    const match = (data.repository?.issueTypes?.nodes ?? []).find((node) => sameText(node.name, typeName));
    if (!match) {
      throw new Error(`issue type "${typeName}" not found/enabled in ${owner}/${repo}`);
    }
    return match.id;
  }

  /**
   * Resolve an organization project (Projects v2) by title, walking every page
   */
  async resolveProjectId(org: string, projectName: string): Promise<string> {
    let after: string | null = null;

    for (;;) {
      const data: ProjectsPage = await this.octokit.graphql<ProjectsPage>(
        `query($login: String!, $first: Int!, $after: String) {
          organization(login: $login) {
            projectsV2(first: $first, after: $after, orderBy: { field: UPDATED_AT, direction: DESC }) {
              pageInfo { hasNextPage endCursor }
              nodes { id title }
            }
          }
        }`,
        { login: org, first: PROJECTS_PAGE_SIZE, after }
      );

      const projects = data.organization?.projectsV2;
      if (!projects) break;

      const match = projects.nodes.find((node) => sameText(node.title, projectName));
      if (match) return match.id;

      if (!projects.pageInfo.hasNextPage || !projects.pageInfo.endCursor) break;
      after = projects.pageInfo.endCursor;
    }

    throw new Error(`project with name "${projectName}" not found`);
  }

  /**
   * Create an issue. A `type` selects the typed creation path; a `parent`
   * that cannot be resolved is reported and the issue is created without it.
   */
  async createIssue(owner: string, repo: string, input: IssueInput): Promise<IssueRef> {
    const repositoryId = await this.resolveRepositoryId(owner, repo);

    const mutationInput: Record<string, unknown> = {
      repositoryId,
      title: input.title,
      body: input.body,
    };

    const typeName = input.type?.trim();
    if (typeName) {
      try {
        mutationInput.issueTypeId = await this.resolveIssueTypeId(owner, repo, typeName);
      } catch (error) {
        throw new Error(`resolve issue type id for "${typeName}": ${errorMessage(error)}`);
      }
    }

    const parent = input.parent?.trim();
    if (parent) {
      try {
        mutationInput.parentIssueId = await this.resolveParentIssueId(owner, repo, parent);
        this.logger.info('Setting parent relationship', { child: input.title, parent });
      } catch (error) {
        this.logger.warn('Could not resolve parent issue', { parent, error });
      }
    }

    if (input.labels.length > 0) {
      mutationInput.labelIds = await this.resolveLabelIds(owner, repo, input.labels);
    }

    const data = await this.octokit.graphql<{ createIssue: IssueMutationPayload }>(
      `mutation($input: CreateIssueInput!) {
        createIssue(input: $input) {
          issue { id number title }
        }
      }`,
      { input: mutationInput }
    );

    const issue = data.createIssue.issue;
    if (!issue?.id) {
      throw new Error('createIssue GraphQL returned empty issue id');
    }
    return { number: issue.number, nodeId: issue.id };
  }

  /**
   * Update title, body, labels and (when given) type of an existing issue.
   * The parent link is set through addSubIssue; a failure there only warns.
   */
  async updateIssue(owner: string, repo: string, issueNumber: number, input: IssueInput): Promise<IssueRef> {
    const issueNodeId = await this.resolveIssueNodeId(owner, repo, issueNumber);

    const mutationInput: Record<string, unknown> = {
      id: issueNodeId,
      title: input.title,
      body: input.body,
    };

    const typeName = input.type?.trim();
    if (typeName) {
      try {
        mutationInput.issueTypeId = await this.resolveIssueTypeId(owner, repo, typeName);
      } catch (error) {
        throw new Error(`resolve issue type id for "${typeName}": ${errorMessage(error)}`);
      }
    }

    const parent = input.parent?.trim();
    if (parent) {
      try {
        await this.updateParentRelationship(owner, repo, issueNodeId, parent);
        this.logger.info('Updated parent relationship', { child: input.title, parent });
      } catch (error) {
        this.logger.warn('Failed to update parent relationship', { issue: input.title, error });
      }
    }

    if (input.labels.length > 0) {
      mutationInput.labelIds = await this.resolveLabelIds(owner, repo, input.labels);
    }

    const data = await this.octokit.graphql<{ updateIssue: IssueMutationPayload }>(
      `mutation($input: UpdateIssueInput!) {
        updateIssue(input: $input) {
          issue { id number title }
        }
      }`,
      { input: mutationInput }
    );

    const issue = data.updateIssue.issue;
    if (!issue?.id) {
      throw new Error('updateIssue GraphQL returned empty issue id');
    }
    return { number: issue.number, nodeId: issue.id };
  }

  /**
   * Make `childNodeId` a sub-issue of the issue titled `parentTitle`,
   * replacing any existing parent
   */
  async updateParentRelationship(owner: string, repo: string, childNodeId: string, parentTitle: string): Promise<void> {
    const parentNodeId = await this.resolveParentIssueId(owner, repo, parentTitle);

    try {
      await this.octokit.graphql(
        `mutation($input: AddSubIssueInput!) {
          addSubIssue(input: $input) {
            issue { id title }
          }
        }`,
        { input: { issueId: parentNodeId, subIssueId: childNodeId, replaceParent: true } }
      );
    } catch (error) {
      if (errorMessage(error).includes(DUPLICATE_SUB_ISSUE)) {
        this.logger.debug('Parent relationship already exists', { parent: parentTitle });
        return;
      }
      throw new Error(`addSubIssue GraphQL failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Add an issue to a Projects v2 board. Already-linked counts as success.
   */
  async addIssueToProject(issueNodeId: string, projectNodeId: string): Promise<void> {
    let data: { addProjectV2ItemById: { item: { id: string } | null } };
    try {
      data = await this.octokit.graphql<{ addProjectV2ItemById: { item: { id: string } | null } }>(
        `mutation($issueId: ID!, $projectId: ID!) {
          addProjectV2ItemById(input: { projectId: $projectId, contentId: $issueId }) {
            item { id }
          }
        }`,
        { issueId: issueNodeId, projectId: projectNodeId }
      );
    } catch (error) {
      if (errorMessage(error).includes(ALREADY_IN_PROJECT)) {
        return;
      }
      throw new Error(`failed to add issue to project via GraphQL: ${errorMessage(error)}`);
    }

    if (!data.addProjectV2ItemById.item?.id) {
      throw new Error('GraphQL succeeded but returned empty item id');
    }
  }

  /**
   * Repository summary for the `info` command
   */
  async getRepositoryInfo(owner: string, repo: string): Promise<RepositoryInfo> {
    const { data } = await this.octokit.repos.get({ owner, repo });

    return {
      name: data.name,
      fullName: data.full_name,
      description: data.description,
      visibility: data.visibility ?? (data.private ? 'private' : 'public'),
      defaultBranch: data.default_branch,
      url: data.html_url,
      openIssues: data.open_issues_count,
      createdAt: data.created_at,
      updatedAt: data.updated_at,
    };
  }

  /**
   * Verify GitHub token can read the repository
   */
  async verifyAccess(owner: string, repo: string): Promise<boolean> {
    try {
      await this.octokit.repos.get({ owner, repo });
      return true;
    } catch (error) {
      this.logger.debug('Repository access check failed', { repo: `${owner}/${repo}`, error });
      return false;
    }
  }
}
