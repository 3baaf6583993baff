export { buildJsonReport, renderJsonReport } from "./json-reporter.js";
export { HOST_PLACEHOLDER, redactFacts, redactReport } from "./redact.js";
export { renderTextReport } from "./text-reporter.js";
export type { TextRenderOptions } from "./text-reporter.js";
export { countFindings, exitCodeForFindings, ExitCode } from "./report-utils.js";
export type {
  DiagnosticReport,
  ReportInput,
  RunMetadata,
  SummaryCounts,
  ToolInfo,
} from "./types.js";
