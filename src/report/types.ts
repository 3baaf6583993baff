import type { FactSnapshot } from "../facts/types.js";
import type { ExecutionContext, Finding } from "../rules/types.js";

export interface ToolInfo {
  readonly name: "gpudoctor";
  readonly version: string;
}

export interface SummaryCounts {
  crit: number;
  warn: number;
  info: number;
  other: number;
  total: number;
}

export interface RunMetadata {
  readonly duration_ms?: number;
  readonly rules_loaded?: number;
  readonly catalog_version?: string;
  readonly redaction_enabled?: boolean;
}

export interface DiagnosticReport {
  readonly tool: ToolInfo;
  readonly context: ExecutionContext;
  readonly facts: FactSnapshot;
  readonly summary: SummaryCounts;
  readonly findings: readonly Finding[];
  readonly run_metadata?: RunMetadata;
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly context: ExecutionContext;
  readonly facts: FactSnapshot;
  readonly findings: readonly Finding[];
  readonly runMetadata?: RunMetadata;
}
