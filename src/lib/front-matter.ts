/**
 * Front-matter extraction and `id:` write-back for issue markdown files
 */

import fs from 'fs';
import path from 'path';
import matter from 'gray-matter';
import { FrontMatterRecord } from './types';

const DELIMITER = '---';

/**
 * Parse a front-matter block as flat `key: value` lines. Each line splits on
 * its first colon, so values may contain `:` and `#`. Surrounding double
 * quotes are stripped from values; lines without a colon are ignored.
 */
export function parseKeyValueLines(input: string): FrontMatterRecord {
  const record: FrontMatterRecord = {};
  for (const line of input.split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (line.trim() === '' || colon === -1) continue;

    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim().replace(/^"+|"+$/g, '');
    record[key] = value;
  }
  return record;
}

export function formatKeyValueLines(data: object): string {
  return Object.entries(data)
    .map(([key, value]) => `${key}: ${String(value)}`)
    .join('\n');
}

/** gray-matter engine for the `key: value` front-matter format */
export const keyValueEngine = {
  parse: parseKeyValueLines,
  stringify: formatKeyValueLines,
};

/**
 * Parse a markdown file into a flat key/value record.
 * The markdown content below the block is stored under `body`.
 * Throws if the file cannot be read.
 */
export function parseFrontMatter(filePath: string): FrontMatterRecord {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed = matter(content, { engines: { yaml: keyValueEngine } });
  const data: Record<string, unknown> = parsed.data;

  const record: FrontMatterRecord = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string') {
      record[key] = value;
    }
  }

  const body = parsed.content.trim();
  if (body || !record.body) {
    record.body = body;
  }

  return record;
}

/**
 * List markdown files (non-recursive) in a folder, sorted by name
 */
export function listMarkdownFiles(folder: string): string[] {
  return fs
    .readdirSync(folder, { withFileTypes: true })
    .filter((entry) => !entry.isDirectory() && entry.name.endsWith('.md'))
    .map((entry) => path.join(folder, entry.name))
    .sort();
}

/**
 * Add or replace the `id:` line of a front-matter block.
 * Without a complete block the line is appended at the end.
 * CRLF files stay CRLF.
 */
export function upsertIdLine(content: string, id: string | number): string {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const lines = content.split(/\r?\n/);
  const idLine = `id: ${id}`;

  const open = lines.findIndex((line) => line.trim() === DELIMITER);
  const close = open === -1 ? -1 : lines.findIndex((line, i) => i > open && line.trim() === DELIMITER);
  const hasBlock = close !== -1;

  const from = hasBlock ? open + 1 : 0;
  const to = hasBlock ? close : lines.length;
  for (let i = from; i < to; i++) {
    if (lines[i].startsWith('id:')) {
      lines[i] = idLine;
      return lines.join(eol);
    }
  }

  if (hasBlock) {
    lines.splice(close, 0, idLine);
  } else {
    lines.push(idLine);
  }

  return lines.join(eol);
}

/**
 * Persist a remote issue number into the file's front matter
 */
export function writeIssueId(filePath: string, id: string | number): void {
  const content = fs.readFileSync(filePath, 'utf-8');
  fs.writeFileSync(filePath, upsertIdLine(content, id), 'utf-8');
}
