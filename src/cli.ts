#!/usr/bin/env node

/**
 * Markdown Issue Manager CLI
 *
 * Creates and updates GitHub issues from a folder of markdown files
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import os from 'os';
import path from 'path';
import { GitHubClient } from './lib/github-client';
import { IssueSynchronizer } from './lib/issue-synchronizer';
import { readIssueFiles, applyProjectOverride, applyParentDefault } from './lib/issue-collection';
import { sortIssuesByDependency, formatPlanEntry } from './lib/dependency-sorter';
import { listMarkdownFiles, parseFrontMatter } from './lib/front-matter';
import { generateExamples, EXAMPLE_TYPES } from './lib/examples';
import { getGitHubToken } from './lib/auth';
import { loadConfig, resolveOwnerRepo, MissingOwnerError } from './lib/config';
import { inferOwnerRepoFromGit } from './lib/git-remote';
import { Logger, createLogger, isLogLevel } from './lib/logger';
import { formatSyncReport } from './lib/sync-summary';
import { Issue, OwnerRepo } from './lib/types';

// Use current working directory as project root (where command is run)
const PROJECT_ROOT = process.cwd();

const appConfig = loadConfig(PROJECT_ROOT);

let logger: Logger = createLogger({ level: appConfig.logLevel, json: appConfig.logJson });

type GlobalOptions = {
  logLevel?: string;
  logJson?: boolean;
};

interface CreateOptions {
  folder?: string;
  owner?: string;
  repo?: string;
  project?: string;
  parent?: string;
  dryRun?: boolean;
}

interface ListOptions {
  folder?: string;
}

interface InfoOptions {
  owner?: string;
  repo?: string;
}

interface ExamplesOptions {
  output: string;
  type?: string;
  title?: string;
  project?: string;
  labels?: string;
  parent?: string;
  description?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Get GitHub token or exit
 */
function requireToken(): string {
  const token = getGitHubToken(process.env, os.homedir());
  if (!token) {
    console.error(chalk.red('Error: No GitHub authentication found'));
    console.error(chalk.gray('Either run:'));
    console.error(chalk.gray('  gh auth login'));
    console.error(chalk.gray('Or set GITHUB_TOKEN in the environment or .env.local'));
    process.exit(1);
  }
  return token;
}

/**
 * Resolve owner/repo from flags, config and the git remote, or exit
 */
function requireOwnerRepo(flags: Partial<OwnerRepo>): OwnerRepo {
  try {
    return resolveOwnerRepo(flags, appConfig, PROJECT_ROOT, () => inferOwnerRepoFromGit(PROJECT_ROOT, logger));
  } catch (error) {
    if (!(error instanceof MissingOwnerError)) throw error;
    console.error(chalk.red('Error: Could not determine GitHub repository owner'));
    console.error(chalk.gray('No git remote found and GITHUB_OWNER not set.'));
    console.error(chalk.gray('Either:'));
    console.error(chalk.gray('  1. Pass --owner <owner>'));
    console.error(chalk.gray('  2. Set GITHUB_OWNER in .env.local, or GITHUB_REPO=owner/repo-name'));
    console.error(chalk.gray('  3. Add a GitHub remote: git remote add origin https://github.com/owner/repo'));
    process.exit(1);
  }
}

/**
 * Verify GitHub access
 */
async function verifyAccess(github: GitHubClient, owner: string, repo: string): Promise<void> {
  const spinner = ora('Verifying GitHub access...').start();

  const hasAccess = await github.verifyAccess(owner, repo);
  if (!hasAccess) {
    spinner.fail('GitHub access verification failed');
    console.error(chalk.red('\nError: Unable to access repository'));
    console.error(chalk.gray(`Repo: ${owner}/${repo}`));
    console.error(chalk.gray('Check your gh auth or GITHUB_TOKEN permissions'));
    process.exit(1);
  }

  spinner.succeed('GitHub access verified');
}

// Create CLI
const program = new Command();

program
  .name('md-issues')
  .description('Create and update GitHub issues from markdown files')
  .version('1.0.0')
  .option('--log-level <level>', 'Log level (debug|info|warn|error)')
  .option('--log-json', 'Write logs as JSON lines');

program.hook('preAction', () => {
  const options = program.opts<GlobalOptions>();
  let level = appConfig.logLevel;

  if (options.logLevel !== undefined) {
    const requested = options.logLevel.trim().toLowerCase();
    if (!isLogLevel(requested)) {
      console.error(chalk.red(`Error: Invalid log level "${options.logLevel}"`));
      console.error(chalk.gray('Use one of: debug, info, warn, error'));
      process.exit(1);
    }
    level = requested;
  }

  logger = createLogger({
    level,
    json: options.logJson ?? appConfig.logJson,
  });
});

// Create command
program
  .command('create')
  .description('Create or update GitHub issues from markdown files')
  .option('-f, --folder <path>', 'Folder containing issue markdown files')
  .option('-o, --owner <owner>', 'Repository owner')
  .option('-r, --repo <repo>', 'Repository name')
  .option('-p, --project <name>', 'Add every issue to this project')
  .option('-m, --parent <title>', 'Default parent title for issues without one')
  .option('-d, --dry-run', 'Print the processing order without calling GitHub')
  .action(async (options: CreateOptions) => {
    const folder = path.resolve(PROJECT_ROOT, options.folder || appConfig.folder);

    let issues: Issue[];
    try {
      issues = readIssueFiles(folder, logger);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      console.error(chalk.gray('Use --folder or ISSUES_FOLDER to point at your issue files'));
      process.exit(1);
    }

    issues = applyProjectOverride(issues, options.project);
    issues = applyParentDefault(issues, options.parent);

    if (options.dryRun) {
      const sorted = sortIssuesByDependency(issues, logger);
      console.log(chalk.bold.cyan(`Processing order (${sorted.length} issue(s)):`));
      for (const entry of sorted) {
        console.log(formatPlanEntry(entry));
      }
      return;
    }

    const token = requireToken();
    const { owner, repo } = requireOwnerRepo({ owner: options.owner, repo: options.repo });
    logger.info('Syncing issues', { repo: `${owner}/${repo}`, folder, count: issues.length });

    const github = new GitHubClient(token, logger);
    await verifyAccess(github, owner, repo);

    const synchronizer = new IssueSynchronizer(github, owner, repo, logger);

    const spinner = ora(`Processing ${issues.length} issue(s)...`).start();
    const report = await synchronizer.sync(issues);

    if (report.errors.length > 0) {
      spinner.warn(`Processed with ${report.errors.length} error(s)`);
    } else {
      spinner.succeed('All issues processed');
    }

    for (const line of formatSyncReport(report)) {
      console.log(line);
    }

    if (report.errors.length > 0) {
      process.exit(1);
    }
  });

// List command
program
  .command('list')
  .description('List issue markdown files and their front matter')
  .option('-f, --folder <path>', 'Folder containing issue markdown files')
  .action((options: ListOptions) => {
    const folder = path.resolve(PROJECT_ROOT, options.folder || appConfig.folder);

    let files: string[];
    try {
      files = listMarkdownFiles(folder);
    } catch (error) {
      console.error(chalk.red(`Error reading folder ${folder}: ${errorMessage(error)}`));
      return;
    }

    if (files.length === 0) {
      console.log(chalk.gray(`No markdown files found in ${folder}`));
      return;
    }

    for (const file of files) {
      console.log(chalk.bold(`\n${path.relative(PROJECT_ROOT, file) || file}`));
      try {
        const record = parseFrontMatter(file);
        for (const key of Object.keys(record).sort()) {
          if (key === 'body') continue;
          console.log(`  ${key}: ${record[key]}`);
        }
      } catch (error) {
        console.error(chalk.red(`  Error parsing front matter: ${errorMessage(error)}`));
      }
    }
    console.log();
  });

// Info command
program
  .command('info')
  .description('Show repository information')
  .option('-o, --owner <owner>', 'Repository owner')
  .option('-r, --repo <repo>', 'Repository name')
  .action(async (options: InfoOptions) => {
    const token = requireToken();
    const { owner, repo } = requireOwnerRepo({ owner: options.owner, repo: options.repo });
    const github = new GitHubClient(token, logger);
    await verifyAccess(github, owner, repo);

    const spinner = ora(`Fetching ${owner}/${repo}...`).start();

    try {
      const info = await github.getRepositoryInfo(owner, repo);
      spinner.stop();
      console.log(JSON.stringify(info, null, 2));
    } catch (error) {
      spinner.fail('Failed to fetch repository information');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      console.error(chalk.gray('Check your gh auth or GITHUB_TOKEN permissions'));
      process.exit(1);
    }
  });

// Examples command
program
  .command('examples')
  .description('Write example issue files')
  .option('-o, --output <path>', 'Output folder', 'examples')
  .option('-t, --type <type>', `Only write one example (${EXAMPLE_TYPES.join('|')})`)
  .option('--title <title>', 'Title for the single example')
  .option('-p, --project <name>', 'Project for the single example')
  .option('-l, --labels <labels>', 'Comma-separated labels for the single example')
  .option('--parent <title>', 'Parent title for the single example')
  .option('-d, --description <text>', 'Description for the single example')
  .action((options: ExamplesOptions) => {
    const { output, ...generateOptions } = options;
    const outputDir = path.resolve(PROJECT_ROOT, output);

    try {
      const written = generateExamples(outputDir, generateOptions);
      console.log(chalk.green(`✓ Wrote ${written.length} example file(s) to ${outputDir}`));
      for (const file of written) {
        console.log(chalk.gray(`  ${path.basename(file)}`));
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
