/**
 * Console summary of a sync run
 */

import chalk from 'chalk';
import { SyncReport } from './types';

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';

export function formatSyncReport(report: SyncReport): string[] {
  const lines: string[] = [chalk.bold(`\n${RULE}`), chalk.bold.cyan('Sync Results'), chalk.bold(`${RULE}\n`)];

  if (report.created.length > 0) {
    lines.push(chalk.green(`✓ Created: ${report.created.length} issue(s)`));
    for (const item of report.created) {
      lines.push(chalk.gray(`  ${item.fileName} → #${item.number}`));
    }
  }

  if (report.updated.length > 0) {
    lines.push(chalk.blue(`✓ Updated: ${report.updated.length} issue(s)`));
    lines.push(chalk.gray(`  #${report.updated.map((item) => item.number).join(', #')}`));
  }

  if (report.linked.length > 0) {
    lines.push(chalk.cyan(`✓ Added to projects: ${report.linked.length} issue(s)`));
    for (const item of report.linked) {
      lines.push(chalk.gray(`  ${item.title} → ${item.project}`));
    }
  }

  // one issue can fail at more than one stage
  if (report.errors.length > 0) {
    lines.push(chalk.red(`✗ Errors: ${report.errors.length} error(s)`));
    for (const err of report.errors) {
      lines.push(chalk.red(`  ${err.title} (${err.stage}): ${err.error}`));
    }
  }

  if (report.created.length + report.updated.length + report.errors.length === 0) {
    lines.push(chalk.gray('No issues to process'));
  }

  lines.push('');
  return lines;
}
