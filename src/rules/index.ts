export {
  loadRuleCatalog,
  loadRuleCatalogWithOverrides,
  parseCatalogMeta,
  parseRule,
  parseRuleFile,
} from "./rule-loader.js";
export type { LoadRuleCatalogOptions } from "./rule-loader.js";
export {
  evaluateRule,
  evaluateRules,
  findUnhandledRuleIds,
  severityRank,
  sortFindings,
} from "./rule-engine.js";
export { isRuleApplicable } from "./applicability.js";
export { getRuleCheck, hasRuleCheck } from "./checks.js";
export type { RuleCheck } from "./checks.js";
export { createFinding } from "./finding-factory.js";
export { RuleCatalogLoadError } from "./errors.js";
export type {
  CatalogMeta,
  ExecutionContext,
  Finding,
  Rule,
  RuleCatalog,
} from "./types.js";
export { Severity } from "./types.js";
