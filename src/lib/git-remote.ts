/**
 * Best-effort owner/repo inference from the local git remote
 */

import { execSync } from 'child_process';
import { OwnerRepo } from './types';
import { Logger } from './logger';

const SSH_PREFIX = 'git@github.com:';
const HTTPS_PREFIX = 'https://github.com/';

/**
 * Parse owner and repo from a GitHub remote URL:
 *   git@github.com:owner/repo.git
 *   https://github.com/owner/repo.git
 */
export function parseGitRemoteUrl(url: string): OwnerRepo {
  const trimmed = url.trim();

  let rest: string;
  let kind: string;
  if (trimmed.startsWith(SSH_PREFIX)) {
    rest = trimmed.slice(SSH_PREFIX.length);
    kind = 'SSH';
  } else if (trimmed.startsWith(HTTPS_PREFIX)) {
    rest = trimmed.slice(HTTPS_PREFIX.length);
    kind = 'HTTPS';
  } else {
    throw new Error(`unsupported URL format: ${trimmed}`);
  }

  const parts = rest.replace(/\.git$/, '').split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`invalid ${kind} URL format: ${trimmed}`);
  }

  return { owner: parts[0], repo: parts[1] };
}

/**
 * Read `remote.origin.url` from git config in `cwd`. Never throws;
 * returns null when there is no repository, no origin, or an unknown URL.
 */
export function inferOwnerRepoFromGit(cwd: string, logger: Logger): OwnerRepo | null {
  let remoteUrl: string;
  try {
    remoteUrl = execSync('git config --get remote.origin.url', {
      cwd,
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
  } catch {
    logger.info('No git remote origin found, cannot infer owner/repo', { cwd });
    return null;
  }

  if (!remoteUrl) {
    logger.info('No git remote origin found, cannot infer owner/repo', { cwd });
    return null;
  }

  try {
    return parseGitRemoteUrl(remoteUrl);
  } catch (error) {
    logger.warn('Failed to parse remote URL', { url: remoteUrl, error });
    return null;
  }
}
