/**
 * Report Generator
 *
 * Orders violations deterministically and renders a change report as
 * JSON (the wire format), colored console text or Markdown.
 */

import chalk from 'chalk';
import { ChangeReport, ReportFormat, Severity, Violation } from './types';

// ─── Severity Icons ─────────────────────────────────────────────────────────

const SEVERITY_ICON: Record<Severity, string> = {
  HIGH: '🔴',
  MEDIUM: '🟡',
  LOW: '🟢',
};

const SEVERITY_COLOR: Record<Severity, (s: string) => string> = {
  HIGH: chalk.red,
  MEDIUM: chalk.yellow,
  LOW: chalk.green,
};

// ─── Ordering ───────────────────────────────────────────────────────────────

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort by (rule, path, method), then message. Returns a new array; code-unit
 * comparison keeps the order independent of locale.
 */
export function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort(
    (a, b) =>
      compareText(a.rule, b.rule) ||
      compareText(a.path, b.path) ||
      compareText(a.method, b.method) ||
      compareText(a.message, b.message)
  );
}

export function summarize(violations: readonly Violation[]): ChangeReport['summary'] {
  return {
    HIGH: violations.filter((v) => v.severity === 'HIGH').length,
    MEDIUM: violations.filter((v) => v.severity === 'MEDIUM').length,
    LOW: violations.filter((v) => v.severity === 'LOW').length,
    total: violations.length,
  };
}

// ─── Format Report ──────────────────────────────────────────────────────────

/**
 * Format a change report in the specified format.
 */
export function formatReport(report: ChangeReport, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return formatJson(report.violations);
    case 'console':
      return formatConsole(report);
    case 'markdown':
      return formatMarkdown(report);
    default:
      return formatJson(report.violations);
  }
}

// ─── JSON Format ────────────────────────────────────────────────────────────

/**
 * The violation-list wire format. Field order is fixed.
 */
export function formatJson(violations: readonly Violation[]): string {
  const list = violations.map((v) => ({
    rule: v.rule,
    path: v.path,
    method: v.method,
    message: v.message,
    severity: v.severity,
    object: v.object,
  }));
  return JSON.stringify(list, null, 2);
}

// ─── Console Format ─────────────────────────────────────────────────────────

function location(v: Violation): string {
  return v.path ? `${v.method} ${v.path}` : '(document)';
}

function formatConsole(report: ChangeReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold('🔍 API Change Report'));
  lines.push(`   Baseline:  ${report.baseline.file} (${report.baseline.version})`);
  lines.push(`   Candidate: ${report.candidate.file} (${report.candidate.version})`);
  lines.push(chalk.gray(bar));

  if (report.violations.length === 0) {
    lines.push(chalk.green('  ✅ No compatibility violations'));
  } else {
    for (const v of report.violations) {
      const label = SEVERITY_COLOR[v.severity](v.severity.padEnd(6));
      lines.push(`${SEVERITY_ICON[v.severity]} ${label} ${v.rule} ${location(v)}: ${v.message}`);
    }
  }

  lines.push(chalk.gray(bar));

  const { HIGH, MEDIUM, LOW } = report.summary;
  lines.push(
    `Summary: ${chalk.red(`${HIGH} high`)} | ${chalk.yellow(`${MEDIUM} medium`)} | ${chalk.green(`${LOW} low`)}`
  );
  lines.push(`Version bump: required ${report.requiredBump}, declared ${report.actualBump}`);
  lines.push('');

  return lines.join('\n');
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function formatMarkdown(report: ChangeReport): string {
  const lines: string[] = [];

  lines.push('# 🔍 API Change Report');
  lines.push('');
  lines.push(`**Baseline:** \`${report.baseline.file}\` (${report.baseline.version})`);
  lines.push(`**Candidate:** \`${report.candidate.file}\` (${report.candidate.version})`);
  lines.push(`**Version bump:** required ${report.requiredBump}, declared ${report.actualBump}`);
  lines.push('');

  if (report.violations.length === 0) {
    lines.push('✅ **No compatibility violations**');
    return lines.join('\n');
  }

  const headings: Array<[Severity, string]> = [
    ['HIGH', '## 🔴 High'],
    ['MEDIUM', '## 🟡 Medium'],
    ['LOW', '## 🟢 Low'],
  ];

  for (const [severity, heading] of headings) {
    const group = report.violations.filter((v) => v.severity === severity);
    if (group.length === 0) continue;

    lines.push(heading);
    lines.push('');
    for (const v of group) {
      lines.push(`- **${v.rule}** \`${location(v)}\`: ${v.message}`);
    }
    lines.push('');
  }

  lines.push('---');
  lines.push('');
  lines.push(
    `**Summary:** ${report.summary.HIGH} high | ${report.summary.MEDIUM} medium | ${report.summary.LOW} low`
  );

  return lines.join('\n');
}
