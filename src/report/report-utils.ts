import type { Finding } from "../rules/types.js";
import { Severity } from "../rules/types.js";
import type { SummaryCounts } from "./types.js";

export const enum ExitCode {
  Ok = 0,
  Warnings = 1,
  Critical = 2,
  Usage = 3,
}

export function countFindings(findings: readonly Finding[]): SummaryCounts {
  const counts: SummaryCounts = {
    crit: 0,
    warn: 0,
    info: 0,
    other: 0,
    total: findings.length,
  };

  for (const finding of findings) {
    switch (finding.severity) {
      case Severity.Crit:
        counts.crit += 1;
        break;
      case Severity.Warn:
        counts.warn += 1;
        break;
      case Severity.Info:
        counts.info += 1;
        break;
      default:
        counts.other += 1;
        break;
    }
  }

  return counts;
}

export function exitCodeForFindings(findings: readonly Finding[]): ExitCode {
  if (findings.some((finding) => finding.severity === Severity.Crit)) {
    return ExitCode.Critical;
  }
  if (findings.some((finding) => finding.severity === Severity.Warn)) {
    return ExitCode.Warnings;
  }
  return ExitCode.Ok;
}
