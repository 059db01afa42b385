/**
 * @fileoverview Report formatters
 *
 * Each formatter is a pure function of the report; output ends with a single
 * newline so it can be written to a file or stdout unchanged.
 */

import type { SourceLocation } from '../descriptors/types.js';
import type { ActionItem, ComplianceReport } from './types.js';

export const REPORT_FORMATS = ['text', 'markdown', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

function formatLocation(location: SourceLocation | undefined): string {
  return location ? `${location.file}:${location.line}` : '';
}

function formatRate(rate: number | null): string {
  return rate === null ? 'n/a' : `${rate.toFixed(1)}%`;
}

function heuristicMark(item: ActionItem): string {
  return item.heuristic ? ' (heuristic)' : '';
}

// ============================================================================
// TEXT
// ============================================================================

export function formatText(report: ComplianceReport): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push('=== DDD Compliance Report ===', '');
  lines.push(`Types analyzed: ${summary.types} (${summary.classified} classified, ${summary.unclassified} unclassified)`);
  lines.push(`Verdicts: ${summary.verdicts} (${summary.passed} passed, ${summary.failed} failed, ${summary.notApplicable} not applicable)`);
  lines.push(`Compliance: ${formatRate(summary.complianceRate)}`);
  lines.push('');

  if (report.groups.length > 0) {
    lines.push('By category:');
    for (const group of report.groups) {
      lines.push(`  ${group.category}: ${group.passed} passed, ${group.failed} failed, ${group.notApplicable} not applicable`);
    }
    lines.push('');
  }

  if (report.actionItems.length === 0) {
    lines.push('No violations found.');
  } else {
    lines.push('--- Action Items ---', '');
    for (const item of report.actionItems) {
      const where = formatLocation(item.location);
      lines.push(`${item.priority}. [${item.severity.toUpperCase()}] ${item.ruleId} ${item.typeName}${heuristicMark(item)}${where ? ` (${where})` : ''}`);
      lines.push(`   ${item.message}`);
      for (const evidence of item.evidence) {
        lines.push(`   - ${evidence}`);
      }
      lines.push(`   Fix: ${item.fixSuggestion}`);
    }
  }

  if (report.coverageGaps.length > 0) {
    lines.push('', '--- Coverage Gaps ---', '');
    for (const gap of report.coverageGaps) {
      const where = formatLocation(gap.location);
      lines.push(`  ${gap.typeName}${where ? ` (${where})` : ''}: could not be classified`);
    }
  }

  return `${lines.join('\n')}\n`;
}

// ============================================================================
// MARKDOWN
// ============================================================================

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

export function formatMarkdown(report: ComplianceReport): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push('# DDD Compliance Report', '');
  lines.push('## Summary', '');
  lines.push('| Metric | Value |', '| --- | --- |');
  lines.push(`| Types analyzed | ${summary.types} |`);
  lines.push(`| Classified | ${summary.classified} |`);
  lines.push(`| Unclassified | ${summary.unclassified} |`);
  lines.push(`| Passed | ${summary.passed} |`);
  lines.push(`| Failed | ${summary.failed} |`);
  lines.push(`| Not applicable | ${summary.notApplicable} |`);
  lines.push(`| Compliance | ${formatRate(summary.complianceRate)} |`);

  for (const group of report.groups) {
    lines.push('', `## ${group.category}`, '');
    lines.push('| Type | Rule | Outcome | Details |', '| --- | --- | --- | --- |');
    for (const entry of group.entries) {
      const details = entry.outcome === 'fail' ? entry.evidence.join('; ') : entry.note ?? '';
      lines.push(`| ${escapeCell(entry.typeName)} | ${entry.ruleId} ${escapeCell(entry.ruleTitle)} | ${entry.outcome} | ${escapeCell(details)} |`);
    }
  }

  lines.push('', '## Action Items', '');
  if (report.actionItems.length === 0) {
    lines.push('No violations found.');
  }
  for (const item of report.actionItems) {
    lines.push(`- [ ] **${item.severity}** \`${item.ruleId}\` ${item.typeName}${heuristicMark(item)}: ${item.message}`);
    for (const evidence of item.evidence) {
      lines.push(`  - ${evidence}`);
    }
    lines.push(`  - Fix: ${item.fixSuggestion} (${item.reference})`);
  }

  if (report.coverageGaps.length > 0) {
    lines.push('', '## Coverage Gaps', '');
    for (const gap of report.coverageGaps) {
      const where = formatLocation(gap.location);
      lines.push(`- ${gap.typeName}${where ? ` (${where})` : ''}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

// ============================================================================
// JSON
// ============================================================================

export function formatJson(report: ComplianceReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export function formatReport(report: ComplianceReport, format: ReportFormat): string {
  switch (format) {
    case 'text':
      return formatText(report);
    case 'markdown':
      return formatMarkdown(report);
    case 'json':
      return formatJson(report);
  }
}
