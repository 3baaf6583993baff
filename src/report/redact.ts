import type { FactSnapshot } from "../facts/types.js";
import type { Finding } from "../rules/types.js";
import type { DiagnosticReport } from "./types.js";

export const HOST_PLACEHOLDER = "<host>";

/**
 * Replaces the machine hostname in a report with {@link HOST_PLACEHOLDER},
 * in the system facts and anywhere it shows up in finding evidence.
 */
export function redactReport(report: DiagnosticReport): DiagnosticReport {
  const hostname = report.facts.system.hostname;
  return {
    ...report,
    facts: redactFacts(report.facts),
    findings: report.findings.map((finding) =>
      redactFinding(finding, hostname),
    ),
  };
}

export function redactFacts(facts: FactSnapshot): FactSnapshot {
  return Object.freeze({
    ...facts,
    system: Object.freeze({ ...facts.system, hostname: HOST_PLACEHOLDER }),
  });
}

function redactFinding(finding: Finding, hostname: string): Finding {
  const evidence = replaceHostname(finding.evidence, hostname);
  if (evidence === finding.evidence) {
    return finding;
  }
  return Object.freeze({ ...finding, evidence });
}

function replaceHostname(text: string, hostname: string): string {
  // "unknown" is the collector's fallback, not a real name.
  if (hostname === "" || hostname === "unknown") {
    return text;
  }
  const escaped = hostname.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return text.replace(new RegExp(escaped, "gi"), HOST_PLACEHOLDER);
}
