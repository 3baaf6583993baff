export const enum Severity {
  Crit = "CRIT",
  Warn = "WARN",
  Info = "INFO",
}

export interface Rule {
  readonly id: string;
  readonly title: string;
  readonly category: string;
  /** `CRIT`, `WARN` or `INFO`; any other value is kept and sorts last. */
  readonly severity: string;
  readonly base_confidence: number;
  readonly modes: readonly string[];
  /** Absent means the rule applies on every platform. */
  readonly platform?: string;
  readonly description: string;
}

export interface Finding {
  readonly rule_id: string;
  readonly severity: string;
  readonly title: string;
  readonly evidence: string;
  readonly why_it_matters: string;
  readonly next_steps: readonly string[];
  readonly confidence: number;
  readonly category: string;
}

export interface CatalogMeta {
  readonly catalog_version: string;
  readonly description?: string;
}

export interface RuleCatalog {
  readonly rules: readonly Rule[];
  readonly meta: CatalogMeta;
}

/**
 * Values read from the environment once per run and handed to the
 * evaluator, which never reads process state itself.
 */
export interface ExecutionContext {
  readonly mode: string;
  readonly platform: string;
}
