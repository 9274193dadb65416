/**
 * Markdown Issue Manager - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { GitHubClient } from './lib/github-client';
export { IssueSynchronizer, settle, parseIssueNumber, toIssueInput } from './lib/issue-synchronizer';
export type { IssueFileWriter } from './lib/issue-synchronizer';
export { sortIssuesByDependency, sortedTitles, formatPlanEntry, isEpic } from './lib/dependency-sorter';
export {
  readIssueFiles,
  applyProjectOverride,
  applyParentDefault,
  parseLabels,
  normalizeTitle,
  IssueSourceError,
} from './lib/issue-collection';
export {
  parseFrontMatter,
  parseKeyValueLines,
  formatKeyValueLines,
  listMarkdownFiles,
  upsertIdLine,
  writeIssueId,
} from './lib/front-matter';
export { formatSyncReport } from './lib/sync-summary';
export { parseGitRemoteUrl, inferOwnerRepoFromGit } from './lib/git-remote';
export { getGitHubToken, readTokenFromHostsFile } from './lib/auth';
export { loadConfig, resolveConfig, resolveOwnerRepo, MissingOwnerError, DEFAULT_ISSUES_FOLDER } from './lib/config';
export type { AppConfig } from './lib/config';
export { Logger, createLogger, silentLogger } from './lib/logger';
export type { LogLevel, LogAttrs, LoggerOptions } from './lib/logger';
export { generateExamples, renderExample, EXAMPLE_TYPES, UnknownExampleTypeError } from './lib/examples';
export type { ExampleType, ExampleIssue, GenerateExamplesOptions } from './lib/examples';

export * from './lib/types';
