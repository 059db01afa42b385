/**
 * @fileoverview Report Generator and formatters
 */

export { ReportGenerator } from './generator.js';
export {
  REPORT_FORMATS,
  isReportFormat,
  formatText,
  formatMarkdown,
  formatJson,
  formatReport,
  type ReportFormat,
} from './formatters.js';
export type {
  ReportEntry,
  OutcomeCounts,
  CategoryGroup,
  ActionItem,
  CoverageGap,
  RuleCoverage,
  ReportSummary,
  ComplianceReport,
} from './types.js';
