import fs from "node:fs/promises";
import { collectFacts } from "../facts/fact-collector.js";
import { resolvePlatform } from "../facts/platform.js";
import type { FactSnapshot } from "../facts/types.js";
import { loadRuleCatalogWithOverrides } from "../rules/rule-loader.js";
import {
  evaluateRules,
  findUnhandledRuleIds,
} from "../rules/rule-engine.js";
import type { ExecutionContext } from "../rules/types.js";
import { buildJsonReport, renderJsonReport } from "../report/json-reporter.js";
import { redactReport } from "../report/redact.js";
import { exitCodeForFindings, type ExitCode } from "../report/report-utils.js";
import { renderTextReport } from "../report/text-reporter.js";
import type { DiagnosticReport } from "../report/types.js";
import { silentLogger, type Logger } from "./output.js";
import { resolveRulesDirectory } from "./runtime-paths.js";

export const MODES = ["gaming", "ai", "creator", "streaming", "full"] as const;
export type ModeName = (typeof MODES)[number];

export type OutputFormat = "text" | "json";

export interface RunOptions {
  readonly mode: ModeName;
  readonly format: OutputFormat;
  readonly out?: string;
  readonly rulesDir?: string;
  readonly maxFindings?: number;
  /** Replace the hostname with a placeholder. Defaults to true. */
  readonly redact?: boolean;
}

export interface RunDependencies {
  readonly logger?: Logger;
  readonly platform?: string;
  readonly baseRulesDir?: string;
  readonly collect?: () => Promise<FactSnapshot>;
  readonly now?: () => number;
}

export interface RunResult {
  readonly report: DiagnosticReport;
  readonly output: string;
  readonly exitCode: ExitCode;
}

export async function runDiagnostics(
  options: RunOptions,
  toolVersion: string,
  deps: RunDependencies = {},
): Promise<RunResult> {
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? Date.now;
  const startedAt = now();

  const context: ExecutionContext = Object.freeze({
    mode: options.mode,
    platform: deps.platform ?? resolvePlatform(),
  });

  const catalog = await loadRuleCatalogWithOverrides({
    baseDir: deps.baseRulesDir ?? (await resolveRulesDirectory()),
    overrideDir: options.rulesDir,
  });
  logger.debug(
    `Loaded ${catalog.rules.length} rules (catalog ${catalog.meta.catalog_version})`,
  );
  for (const ruleId of findUnhandledRuleIds(catalog.rules)) {
    logger.warn(`Rule '${ruleId}' has no built-in check and will be skipped`);
  }

  logger.info("[1/3] Collecting system and GPU information...");
  const facts = await (deps.collect ?? collectFacts)();
  logger.debug(`Detected ${facts.gpus.length} GPU(s)`);

  logger.info("[2/3] Analyzing results...");
  const findings = evaluateRules(facts, catalog.rules, context);

  logger.info("[3/3] Generating report...");
  const redact = options.redact ?? true;
  const built = buildJsonReport({
    toolVersion,
    context,
    facts,
    findings,
    runMetadata: {
      duration_ms: now() - startedAt,
      rules_loaded: catalog.rules.length,
      catalog_version: catalog.meta.catalog_version,
      redaction_enabled: redact,
    },
  });
  const report = redact ? redactReport(built) : built;

  const output =
    options.format === "json"
      ? renderJsonReport(report)
      : renderTextReport(report, { maxFindings: options.maxFindings });

  if (options.out) {
    await fs.writeFile(options.out, output + "\n", "utf8");
  }

  return { report, output, exitCode: exitCodeForFindings(findings) };
}

export function parseMode(value: string): ModeName {
  const mode = MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new Error(`Invalid mode: ${value}. Use: ${MODES.join(", ")}`);
  }
  return mode;
}

export function parseFormat(value: string): OutputFormat {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

const GLOBAL_FLAGS: readonly string[] = ["--verbose", "--quiet"];

/** True when no command was given, only global flags or nothing at all. */
export function shouldPrintUsage(argv: readonly string[]): boolean {
  return argv.slice(2).every((arg) => GLOBAL_FLAGS.includes(arg));
}
