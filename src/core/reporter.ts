/**
 * Report Generator
 *
 * Produces human-readable dump comparison reports:
 * Console (colored), JSON, Markdown.
 */

import chalk from 'chalk';
import { DumpCheckReport, DumpChange, ReportFormat } from './types';

// ─── Format Report ──────────────────────────────────────────────────────────

/**
 * Format a check report in the specified format.
 */
export function formatReport(report: DumpCheckReport, format: ReportFormat): string {
  switch (format) {
    case 'console':
      return formatConsole(report);
    case 'json':
      return formatJson(report);
    case 'markdown':
      return formatMarkdown(report);
    default:
      return formatConsole(report);
  }
}

function changeLine(change: DumpChange): string {
  return `${change.type === 'added' ? '+' : '-'}${change.line}`;
}

// ─── Console Format ─────────────────────────────────────────────────────────

function formatConsole(report: DumpCheckReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold(`🔍 ABI Dump Check: ${report.name}`));
  lines.push(chalk.gray(bar));

  if (!report.hasChanges) {
    lines.push(chalk.green('  ✅ ABI dump matches the reference'));
  } else {
    for (const change of report.changes) {
      const colorFn = change.type === 'added' ? chalk.green : chalk.red;
      lines.push(colorFn(changeLine(change)));
    }
  }

  lines.push(chalk.gray(bar));

  const { added, removed } = report.summary;
  lines.push(`Summary: ${chalk.green(`${added} added`)} | ${chalk.red(`${removed} removed`)}`);
  if (report.hasChanges) {
    lines.push(chalk.yellow('Run the dump command to update the reference if these changes are intended.'));
  }
  lines.push('');

  return lines.join('\n');
}

// ─── JSON Format ────────────────────────────────────────────────────────────

function formatJson(report: DumpCheckReport): string {
  return JSON.stringify(report, null, 2);
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function formatMarkdown(report: DumpCheckReport): string {
  const lines: string[] = [];

  lines.push(`# 🔍 ABI Dump Check: ${report.name}`);
  lines.push('');
  lines.push(`**Timestamp:** ${report.timestamp}`);
  lines.push('');

  if (!report.hasChanges) {
    lines.push('✅ **ABI dump matches the reference**');
    return lines.join('\n');
  }

  lines.push('```diff');
  for (const change of report.changes) {
    lines.push(changeLine(change));
  }
  lines.push('```');
  lines.push('');
  lines.push('---');
  lines.push('');
  lines.push(`**Summary:** ${report.summary.added} added | ${report.summary.removed} removed`);

  return lines.join('\n');
}
