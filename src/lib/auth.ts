/**
 * GitHub token discovery: environment first, gh CLI hosts file second
 */

import fs from 'fs';
import path from 'path';

export function hostsFilePath(homeDir: string): string {
  return path.join(homeDir, '.config', 'gh', 'hosts.yml');
}

/**
 * Read the first `oauth_token:` entry from the gh CLI hosts file
 */
export function readTokenFromHostsFile(homeDir: string): string | null {
  let content: string;
  try {
    content = fs.readFileSync(hostsFilePath(homeDir), 'utf-8');
  } catch {
    return null;
  }

  for (const line of content.split('\n')) {
    const match = line.match(/^\s*oauth_token:\s*(.*)$/);
    if (match) {
      const token = match[1].trim().replace(/^["']|["']$/g, '').trim();
      if (token) return token;
    }
  }

  return null;
}

export function getGitHubToken(env: NodeJS.ProcessEnv, homeDir: string): string | null {
  const fromEnv = env.GITHUB_TOKEN?.trim();
  if (fromEnv) return fromEnv;

  return readTokenFromHostsFile(homeDir);
}
