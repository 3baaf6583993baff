import type { Finding, Rule } from "./types.js";

export function createFinding(rule: Rule, evidence: string): Finding {
  return Object.freeze({
    rule_id: rule.id,
    severity: rule.severity,
    title: rule.title,
    evidence,
    why_it_matters: rule.description,
    next_steps: Object.freeze([]),
    confidence: rule.base_confidence,
    category: rule.category,
  });
}
