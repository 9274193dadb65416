/**
 * Runtime configuration from the environment and .env files
 */

import path from 'path';
import { config as loadDotenv } from 'dotenv';
import { LogLevel, isLogLevel } from './logger';
import { OwnerRepo } from './types';

export const DEFAULT_ISSUES_FOLDER = 'issues';

export interface AppConfig {
  owner: string;
  repo: string;
  folder: string;
  logLevel: LogLevel;
  logJson: boolean;
}

/**
 * Load `.env.local` then `.env` from `cwd` into process.env.
 * Variables already set are never overwritten.
 */
export function loadEnvFiles(cwd: string): void {
  loadDotenv({ path: path.join(cwd, '.env.local') });
  loadDotenv({ path: path.join(cwd, '.env') });
}

export function resolveConfig(env: NodeJS.ProcessEnv): AppConfig {
  let owner = env.GITHUB_OWNER?.trim() ?? '';
  let repo = env.GITHUB_REPO?.trim() ?? '';

  // GITHUB_REPO may carry the full "owner/repo" name
  if (repo.includes('/')) {
    const [repoOwner, repoName] = repo.split('/', 2);
    owner = owner || repoOwner;
    repo = repoName;
  }

  const level = env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  const json = env.LOG_JSON?.trim().toLowerCase() ?? '';

  return {
    owner,
    repo,
    folder: env.ISSUES_FOLDER?.trim() || DEFAULT_ISSUES_FOLDER,
    logLevel: isLogLevel(level) ? level : 'info',
    logJson: json === 'true' || json === '1',
  };
}

export function loadConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  loadEnvFiles(cwd);
  return resolveConfig(env);
}

export class MissingOwnerError extends Error {
  constructor() {
    super('Could not determine the repository owner');
    this.name = 'MissingOwnerError';
  }
}

/**
 * Pick owner and repo: flag, then config, then git inference. The repo
 * finally falls back to the name of the working directory.
 * `infer` is only called when flags and config leave a gap.
 */
export function resolveOwnerRepo(
  flags: Partial<OwnerRepo>,
  appConfig: Pick<AppConfig, 'owner' | 'repo'>,
  cwd: string,
  infer: () => OwnerRepo | null
): OwnerRepo {
  let owner = flags.owner?.trim() || appConfig.owner;
  let repo = flags.repo?.trim() || appConfig.repo;

  if (!owner || !repo) {
    const inferred = infer();
    if (inferred) {
      owner = owner || inferred.owner;
      repo = repo || inferred.repo;
    }
  }

  repo = repo || path.basename(cwd);
  if (!owner) {
    throw new MissingOwnerError();
  }

  return { owner, repo };
}
