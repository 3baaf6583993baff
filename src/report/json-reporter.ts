import type { DiagnosticReport, ReportInput } from "./types.js";
import { countFindings } from "./report-utils.js";

export function buildJsonReport(input: ReportInput): DiagnosticReport {
  return {
    tool: { name: "gpudoctor", version: input.toolVersion },
    context: input.context,
    facts: input.facts,
    summary: countFindings(input.findings),
    findings: input.findings,
    run_metadata: input.runMetadata,
  };
}

export function renderJsonReport(report: DiagnosticReport): string {
  return JSON.stringify(report, null, 2);
}
