/**
 * Orders issues so every parent is processed before its children.
 *
 * Two phases run back to back on one output sequence: regular issues first,
 * then epics. Within a phase, parentless issues are placed first and the rest
 * are resolved in waves; an issue joins the output as soon as an issue already
 * placed (earlier in the same wave included) carries its parent's title.
 * A wave that places nothing flushes the leftovers as orphans.
 */

import { Issue, SortedIssue, SortPhase } from './types';
import { normalizeTitle } from './issue-collection';
import { Logger, silentLogger } from './logger';

export function isEpic(issue: Issue): boolean {
  return issue.type.trim().toLowerCase() === 'epic';
}

class PlacedTitles {
  // normalized title -> index of the first placed issue with that title
  private readonly index = new Map<string, number>();

  add(title: string, position: number): void {
    const key = normalizeTitle(title);
    if (!this.index.has(key)) {
      this.index.set(key, position);
    }
  }

  indexOf(title: string): number | undefined {
    return this.index.get(normalizeTitle(title));
  }
}

function placePhase(
  phase: SortPhase,
  issues: Issue[],
  output: SortedIssue[],
  placed: PlacedTitles,
  logger: Logger
): void {
  const place = (issue: Issue) => {
    placed.add(issue.title, output.length);
    output.push({ issue, phase });
  };

  let remaining: Issue[] = [];
  for (const issue of issues) {
    if (issue.parent.trim() === '') {
      place(issue);
    } else {
      remaining.push(issue);
    }
  }

  while (remaining.length > 0) {
    const stillRemaining: Issue[] = [];

    for (const issue of remaining) {
      if (placed.indexOf(issue.parent) !== undefined) {
        place(issue);
      } else {
        stillRemaining.push(issue);
      }
    }

    if (stillRemaining.length === remaining.length) {
      logger.warn(`Found ${phase} issues with missing parents, adding them anyway`, {
        count: stillRemaining.length,
      });
      for (const issue of stillRemaining) {
        logger.warn('Issue references missing parent', { issue: issue.title, parent: issue.parent, phase });
        place(issue);
      }
      return;
    }

    remaining = stillRemaining;
  }
}

/**
 * Sort issues parent-first, epics last. Never drops or duplicates an issue.
 */
export function sortIssuesByDependency(issues: Issue[], logger: Logger = silentLogger): SortedIssue[] {
  const regular = issues.filter((issue) => !isEpic(issue));
  const epics = issues.filter(isEpic);

  const output: SortedIssue[] = [];
  const placed = new PlacedTitles();

  placePhase('regular', regular, output, placed, logger);
  placePhase('epic', epics, output, placed, logger);

  return output;
}

export function sortedTitles(sorted: SortedIssue[]): string[] {
  return sorted.map(({ issue }) => issue.title);
}

/**
 * One dry-run line: `CREATE|UPDATE #id  [phase] title ← parent`.
 * Issues without an id show `#new`.
 */
export function formatPlanEntry({ issue, phase }: SortedIssue): string {
  const id = issue.id.trim();
  const action = id ? 'UPDATE' : 'CREATE';
  const parent = issue.parent.trim();
  const line = `${action} #${id || 'new'}  [${phase}] ${issue.title}`;
  return parent ? `${line} ← ${parent}` : line;
}
