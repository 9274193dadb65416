/**
 * Builds the issue collection from a folder of markdown files
 */

import fs from 'fs';
import path from 'path';
import { parseFrontMatter } from './front-matter';
import { Issue, FrontMatterRecord } from './types';
import { Logger } from './logger';

/**
 * Raised when the source folder itself cannot be listed. Fatal for the batch.
 */
export class IssueSourceError extends Error {
  constructor(readonly folder: string, cause: unknown) {
    super(`Cannot read issue folder "${folder}": ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'IssueSourceError';
  }
}

export function parseLabels(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label !== '');
}

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

export function issueFromRecord(dir: string, fileName: string, record: FrontMatterRecord): Issue {
  return {
    path: dir,
    fileName,
    title: record.title ?? '',
    body: record.body ?? '',
    labels: parseLabels(record.labels),
    type: record.type ?? '',
    id: record.id ?? '',
    project: record.project ?? '',
    parent: record.parent ?? '',
  };
}

/**
 * Read every file in `dir` into an Issue. Files whose front matter cannot be
 * parsed, or that have no title, are logged and skipped.
 */
export function readIssueFiles(dir: string, logger: Logger): Issue[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new IssueSourceError(dir, error);
  }

  const issues: Issue[] = [];
  const seenTitles = new Map<string, string>();

  const files = entries
    .filter((entry) => !entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const fileName of files) {
    let record: FrontMatterRecord;
    try {
      record = parseFrontMatter(path.join(dir, fileName));
    } catch (error) {
      logger.error('Error parsing front matter', { file: fileName, error });
      continue;
    }

    const issue = issueFromRecord(dir, fileName, record);
    if (!issue.title.trim()) {
      logger.error('Issue file has no title, skipping', { file: fileName });
      continue;
    }

    const key = normalizeTitle(issue.title);
    const firstFile = seenTitles.get(key);
    if (firstFile) {
      logger.warn('Duplicate issue title, parent references bind to the first placed', {
        title: issue.title,
        file: fileName,
        first: firstFile,
      });
    } else {
      seenTitles.set(key, fileName);
    }

    issues.push(issue);
  }

  logger.debug('Read issue files', { folder: dir, count: issues.length });
  return issues;
}

/**
 * Assign every issue to `project`; an empty value leaves issues untouched
 */
export function applyProjectOverride(issues: Issue[], project: string | undefined): Issue[] {
  if (!project) return issues;
  return issues.map((issue) => ({ ...issue, project }));
}

/**
 * Give issues that declare no parent a default parent title
 */
export function applyParentDefault(issues: Issue[], parent: string | undefined): Issue[] {
  if (!parent) return issues;
  return issues.map((issue) =>
    issue.parent.trim() || normalizeTitle(issue.title) === normalizeTitle(parent)
      ? issue
      : { ...issue, parent }
  );
}
