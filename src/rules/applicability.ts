import type { ExecutionContext, Rule } from "./types.js";

export function isRuleApplicable(
  rule: Rule,
  context: ExecutionContext,
): boolean {
  return matchesMode(rule, context.mode) && matchesPlatform(rule, context.platform);
}

function matchesMode(rule: Rule, mode: string): boolean {
  return rule.modes.includes(mode);
}

function matchesPlatform(rule: Rule, platform: string): boolean {
  if (rule.platform === undefined) {
    return true;
  }
  return rule.platform === platform;
}
