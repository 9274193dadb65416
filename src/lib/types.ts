/**
 * Shared types for the markdown issue manager
 */

/**
 * One markdown-backed ticket. `id` is the remote issue number as written in
 * front matter; an empty string means the issue has not been created yet.
 */
export interface Issue {
  path: string;
  fileName: string;
  title: string;
  body: string;
  labels: string[];
  type: string;
  id: string;
  project: string;
  parent: string; // title of another issue, matched case-insensitively
}

/** Raw key/value record extracted from a front-matter block */
export type FrontMatterRecord = Record<string, string>;

export type SortPhase = 'regular' | 'epic';

export interface SortedIssue {
  issue: Issue;
  phase: SortPhase;
}

/** Fields sent to the tracker on create and update */
export interface IssueInput {
  title: string;
  body: string;
  labels: string[];
  type?: string;
  parent?: string;
}

export interface IssueRef {
  number: number;
  nodeId: string;
}

/**
 * Remote issue tracker consumed by the synchronizer. Every method rejects on
 * failure; the synchronizer settles each call before inspecting it.
 */
export interface IssueTracker {
  createIssue(owner: string, repo: string, input: IssueInput): Promise<IssueRef>;
  updateIssue(owner: string, repo: string, issueNumber: number, input: IssueInput): Promise<IssueRef>;
  resolveIssueNodeId(owner: string, repo: string, issueNumber: number): Promise<string>;
  resolveProjectId(org: string, projectName: string): Promise<string>;
  addIssueToProject(issueNodeId: string, projectNodeId: string): Promise<void>;
}

export type SyncStage =
  | 'create'
  | 'update'
  | 'write-back'
  | 'parse-id'
  | 'resolve-issue'
  | 'resolve-project'
  | 'link-project';

export interface SyncError {
  title: string;
  stage: SyncStage;
  error: string;
}

export interface SyncReport {
  created: Array<{ title: string; fileName: string; number: number }>;
  updated: Array<{ title: string; number: number }>;
  linked: Array<{ title: string; project: string }>;
  errors: SyncError[];
  issueNumbers: Map<string, number>;
}

export interface RepositoryInfo {
  name: string;
  fullName: string;
  description: string | null;
  visibility: string;
  defaultBranch: string;
  url: string;
  openIssues: number;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface OwnerRepo {
  owner: string;
  repo: string;
}
