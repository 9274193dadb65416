/**
 * Drives sorted issues through create-or-update against the tracker,
 * writes new ids back to the markdown files and links issues to projects.
 *
 * Issues are processed strictly one at a time: a child's parent link is
 * resolved remotely by title, so the parent must already exist.
 */

import path from 'path';
import { sortIssuesByDependency } from './dependency-sorter';
import { writeIssueId } from './front-matter';
import { Issue, IssueInput, IssueRef, IssueTracker, SyncReport, SyncStage } from './types';
import { Logger } from './logger';

export type IssueFileWriter = (filePath: string, id: number) => void;

type Settled<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Run `work` and capture its outcome as a value instead of an exception
 */
export async function settle<T>(work: () => T): Promise<Settled<Awaited<T>>> {
  try {
    return { ok: true, value: await work() };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parse a front-matter id into an issue number; null when it is not an integer
 */
export function parseIssueNumber(id: string): number | null {
  const trimmed = id.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

export function toIssueInput(issue: Issue): IssueInput {
  const input: IssueInput = {
    title: issue.title,
    body: issue.body,
    labels: issue.labels,
  };
  if (issue.type.trim()) input.type = issue.type.trim();
  if (issue.parent.trim()) input.parent = issue.parent.trim();
  return input;
}

export function emptyReport(): SyncReport {
  return { created: [], updated: [], linked: [], errors: [], issueNumbers: new Map() };
}

export class IssueSynchronizer {
  private tracker: IssueTracker;
  private owner: string;
  private repo: string;
  private logger: Logger;
  private writeId: IssueFileWriter;

  constructor(
    tracker: IssueTracker,
    owner: string,
    repo: string,
    logger: Logger,
    writeId: IssueFileWriter = writeIssueId
  ) {
    this.tracker = tracker;
    this.owner = owner;
    this.repo = repo;
    this.logger = logger;
    this.writeId = writeId;
  }

  /**
   * Create or update every issue in dependency order. Never throws: each
   * failure is logged and recorded in the report, and the loop moves on.
   */
  async sync(issues: Issue[]): Promise<SyncReport> {
    const report = emptyReport();
    const sorted = sortIssuesByDependency(issues, this.logger);

    for (const { issue, phase } of sorted) {
      const log = this.logger.child({ issue: issue.title });
      log.debug('Processing issue', { phase, file: issue.fileName });

      const ref = issue.id.trim() === ''
        ? await this.createIssue(issue, report, log)
        : await this.updateIssue(issue, report, log);

      if (!ref) continue;

      report.issueNumbers.set(issue.title, ref.number);

      if (issue.project.trim()) {
        await this.linkToProject(issue, ref, report, log);
      }
    }

    this.logger.info(`Processed ${report.issueNumbers.size} issues successfully.`);
    return report;
  }

  private async createIssue(issue: Issue, report: SyncReport, log: Logger): Promise<IssueRef | null> {
    const created = await settle(() => this.tracker.createIssue(this.owner, this.repo, toIssueInput(issue)));
    if (!created.ok) {
      this.fail(report, log, issue, 'create', created.error, 'Failed to create issue');
      return null;
    }

    const ref = created.value;
    report.created.push({ title: issue.title, fileName: issue.fileName, number: ref.number });
    log.info('Created issue', { number: ref.number });

    const filePath = path.join(issue.path, issue.fileName);
    const written = await settle(() => this.writeId(filePath, ref.number));
    if (!written.ok) {
      // the remote issue exists; only the local id is stale
      this.fail(report, log, issue, 'write-back', written.error, 'Failed to update markdown file');
      return null;
    }

    issue.id = String(ref.number);
    return ref;
  }

  private async updateIssue(issue: Issue, report: SyncReport, log: Logger): Promise<IssueRef | null> {
    log.info('Issue already exists, updating', { id: issue.id });

    const issueNumber = parseIssueNumber(issue.id);
    if (issueNumber === null) {
      this.fail(report, log, issue, 'parse-id', `invalid issue id "${issue.id}"`, 'Failed to parse issue id');
      return null;
    }

    const updated = await settle(() =>
      this.tracker.updateIssue(this.owner, this.repo, issueNumber, toIssueInput(issue))
    );
    if (!updated.ok) {
      this.fail(report, log, issue, 'update', updated.error, 'Failed to update issue');
      return null;
    }

    report.updated.push({ title: issue.title, number: updated.value.number });
    log.info('Updated issue', { number: updated.value.number });
    return updated.value;
  }

  private async linkToProject(issue: Issue, ref: IssueRef, report: SyncReport, log: Logger): Promise<void> {
    const project = issue.project.trim();

    const issueNodeId = await settle(() => this.tracker.resolveIssueNodeId(this.owner, this.repo, ref.number));
    if (!issueNodeId.ok) {
      this.fail(report, log, issue, 'resolve-issue', issueNodeId.error, 'Error resolving issue node ID');
      return;
    }

    log.debug('Resolving project name to node ID', { project });
    const projectNodeId = await settle(() => this.tracker.resolveProjectId(this.owner, project));
    if (!projectNodeId.ok) {
      this.fail(report, log, issue, 'resolve-project', projectNodeId.error, 'Error resolving project ID');
      return;
    }

    const contentId = issueNodeId.value;
    const projectId = projectNodeId.value;
    const linked = await settle(() => this.tracker.addIssueToProject(contentId, projectId));
    if (!linked.ok) {
      this.fail(report, log, issue, 'link-project', linked.error, `Failed to add issue to project "${project}"`);
      return;
    }

    report.linked.push({ title: issue.title, project });
    log.debug('Linked issue to project', { project });
  }

  private fail(report: SyncReport, log: Logger, issue: Issue, stage: SyncStage, error: string, message: string): void {
    report.errors.push({ title: issue.title, stage, error });
    log.error(message, { stage, error });
  }
}
