export {
  ReportGenerator,
  completionRate,
  monthContaining,
  renderReport,
  reportFileName,
  weekContaining,
} from "./report-generator.js";
export type {
  GeneratedReport,
  ReportData,
  ReportGeneratorOptions,
  ReportKind,
  ReportPeriod,
  ReviewSpecs,
} from "./report-generator.js";
