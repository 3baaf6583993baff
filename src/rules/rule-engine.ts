import type { FactSnapshot } from "../facts/types.js";
import { isRuleApplicable } from "./applicability.js";
import { getRuleCheck, hasRuleCheck } from "./checks.js";
import { createFinding } from "./finding-factory.js";
import { Severity } from "./types.js";
import type { ExecutionContext, Finding, Rule } from "./types.js";

const SEVERITY_RANK: ReadonlyMap<string, number> = new Map<string, number>([
  [Severity.Crit, 0],
  [Severity.Warn, 1],
  [Severity.Info, 2],
]);
const UNRANKED_SEVERITY = 3;

/**
 * Evaluates every applicable rule against the fact snapshot.
 *
 * Rules that do not match the context's mode or platform, and rules whose id
 * has no built-in check, are skipped without error. The result is ordered
 * CRIT, WARN, INFO, then anything else; equal severities keep catalog order.
 */
export function evaluateRules(
  facts: FactSnapshot,
  rules: readonly Rule[],
  context: ExecutionContext,
): Finding[] {
  const findings: Finding[] = [];

  for (const rule of rules) {
    if (!isRuleApplicable(rule, context)) {
      continue;
    }
    const finding = evaluateRule(rule, facts);
    if (finding) {
      findings.push(finding);
    }
  }

  return sortFindings(findings);
}

export function evaluateRule(rule: Rule, facts: FactSnapshot): Finding | null {
  const check = getRuleCheck(rule.id);
  if (!check) {
    return null;
  }
  const evidence = check(facts);
  return evidence === null ? null : createFinding(rule, evidence);
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  // Array.prototype.sort is stable, so ties keep their input order.
  return [...findings].sort(
    (a, b) => severityRank(a.severity) - severityRank(b.severity),
  );
}

export function severityRank(severity: string): number {
  return SEVERITY_RANK.get(severity) ?? UNRANKED_SEVERITY;
}

/** Catalog ids with no built-in check; such rules never produce findings. */
export function findUnhandledRuleIds(rules: readonly Rule[]): string[] {
  return rules.filter((rule) => !hasRuleCheck(rule.id)).map((rule) => rule.id);
}
