export { ReportError, ReportErrorCode } from './errors/report-error.js';
export {
  DEFAULT_REPORT_PATH,
  DEFAULT_REPORT_PATTERN,
  locateReport,
  matchesReportName,
  type LocateOptions,
  type ReportPattern,
} from './locate/locator.js';
export { loadReport, parseReport } from './load/loader.js';
export { collectFailingSteps, summarizeReport, sumTotals } from './runtime/aggregate.js';
export { formatJson, formatText } from './cli/present.js';
export { reportSchema } from './schema/schema.js';
export type {
  FailingStep,
  Feature,
  FeatureSummary,
  ReportSummary,
  Scenario,
  Step,
  Totals,
} from './runtime/types.js';
