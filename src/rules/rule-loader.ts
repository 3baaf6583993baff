import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { RuleCatalogLoadError } from "./errors.js";
import type { CatalogMeta, Rule, RuleCatalog } from "./types.js";

const META_FILE = "_meta.yaml";
const REQUIRED_STRING_FIELDS = [
  "id",
  "title",
  "category",
  "description",
] as const;

export interface LoadRuleCatalogOptions {
  readonly baseDir: string;
  readonly overrideDir?: string;
}

export async function loadRuleCatalogWithOverrides(
  options: LoadRuleCatalogOptions,
): Promise<RuleCatalog> {
  const base = await loadRuleCatalog(options.baseDir);
  if (!options.overrideDir) {
    return base;
  }

  const override = await loadRuleCatalog(options.overrideDir);
  return freezeCatalog(
    mergeRules(base.rules, override.rules),
    { ...base.meta, ...override.meta },
  );
}

/**
 * Loads `_meta.yaml` and every other `*.yaml` file in `rulesDir`, in file
 * name order. Any invalid file or rule rejects the whole catalog.
 */
export async function loadRuleCatalog(rulesDir: string): Promise<RuleCatalog> {
  const meta = parseCatalogMeta(
    await readYaml(path.join(rulesDir, META_FILE)),
    path.join(rulesDir, META_FILE),
  );

  let entries: string[];
  try {
    entries = await fs.readdir(rulesDir);
  } catch (error) {
    throw new RuleCatalogLoadError("Unable to read rules directory", rulesDir, {
      cause: error,
    });
  }

  const ruleFiles = entries
    .filter((name) => name.endsWith(".yaml") && name !== META_FILE)
    .sort();

  const rules: Rule[] = [];
  for (const name of ruleFiles) {
    const filePath = path.join(rulesDir, name);
    rules.push(...parseRuleFile(await readYaml(filePath), filePath));
  }

  assertUniqueIds(rules, rulesDir);
  return freezeCatalog(rules, meta);
}

export function parseRuleFile(doc: unknown, source: string): Rule[] {
  if (!isRecord(doc)) {
    throw new RuleCatalogLoadError("Invalid rule file format", source);
  }
  const rules = doc.rules;
  if (rules === undefined) {
    return [];
  }
  if (!Array.isArray(rules)) {
    throw new RuleCatalogLoadError("Rule file 'rules' must be a list", source);
  }
  return rules.map((entry, index) => parseRule(entry, `${source}#${index}`));
}

export function parseRule(input: unknown, source: string): Rule {
  if (!isRecord(input)) {
    throw new RuleCatalogLoadError("Rule must be a mapping", source);
  }

  for (const field of REQUIRED_STRING_FIELDS) {
    const value = input[field];
    if (typeof value !== "string" || value.length === 0) {
      throw new RuleCatalogLoadError(
        `Rule field '${field}' must be a non-empty string`,
        source,
      );
    }
  }

  // Severity may be any string, empty included; unknown values sort last.
  const severity = input.severity;
  if (typeof severity !== "string") {
    throw new RuleCatalogLoadError(
      "Rule field 'severity' must be a string",
      source,
    );
  }

  const confidence = input.base_confidence ?? 0;
  if (
    typeof confidence !== "number" ||
    !Number.isInteger(confidence) ||
    confidence < 0 ||
    confidence > 100
  ) {
    throw new RuleCatalogLoadError(
      "Rule field 'base_confidence' must be an integer between 0 and 100",
      source,
    );
  }

  const modes = input.modes;
  if (
    !Array.isArray(modes) ||
    !modes.every((mode): mode is string => typeof mode === "string")
  ) {
    throw new RuleCatalogLoadError(
      "Rule field 'modes' must be a list of strings",
      source,
    );
  }

  const platform = input.platform;
  if (platform !== undefined && platform !== null && typeof platform !== "string") {
    throw new RuleCatalogLoadError(
      "Rule field 'platform' must be a string when present",
      source,
    );
  }

  return {
    id: String(input.id),
    title: String(input.title),
    category: String(input.category),
    severity,
    base_confidence: confidence,
    modes: [...modes],
    ...(typeof platform === "string" ? { platform } : {}),
    description: String(input.description),
  };
}

export function parseCatalogMeta(doc: unknown, source: string): CatalogMeta {
  if (!isRecord(doc)) {
    throw new RuleCatalogLoadError("Invalid rules meta format", source);
  }
  const version = doc.catalog_version;
  if (typeof version !== "string" || version.length === 0) {
    throw new RuleCatalogLoadError("Missing catalog_version", source);
  }
  const description = doc.description;
  if (description !== undefined && typeof description !== "string") {
    throw new RuleCatalogLoadError("Meta 'description' must be a string", source);
  }
  return description === undefined
    ? { catalog_version: version }
    : { catalog_version: version, description };
}

function mergeRules(
  baseRules: readonly Rule[],
  overrideRules: readonly Rule[],
): Rule[] {
  const merged = new Map<string, Rule>();
  for (const rule of baseRules) {
    merged.set(rule.id, rule);
  }
  // Map.set keeps the original position for existing keys.
  for (const rule of overrideRules) {
    merged.set(rule.id, rule);
  }
  return Array.from(merged.values());
}

function assertUniqueIds(rules: readonly Rule[], source: string): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) {
      throw new RuleCatalogLoadError(`Duplicate rule id '${rule.id}'`, source);
    }
    seen.add(rule.id);
  }
}

async function readYaml(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new RuleCatalogLoadError("Unable to read rule catalog file", filePath, {
      cause: error,
    });
  }
  try {
    return yaml.load(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleCatalogLoadError(`Invalid YAML: ${reason}`, filePath, {
      cause: error,
    });
  }
}

function freezeCatalog(rules: readonly Rule[], meta: CatalogMeta): RuleCatalog {
  return Object.freeze({
    rules: Object.freeze(
      rules.map((rule) =>
        Object.freeze({ ...rule, modes: Object.freeze([...rule.modes]) }),
      ),
    ),
    meta: Object.freeze({ ...meta }),
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
