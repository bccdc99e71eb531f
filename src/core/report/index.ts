export { buildReport, serializeReport, renderReport, compareFindings } from './builder.js';
export type { Report, ReportOptions, ReportSummary, SerializedReport } from './types.js';
