import { describe, expect, it } from "vitest";
import { buildJsonReport, renderJsonReport } from "../../src/report/json-reporter.js";
import { HOST_PLACEHOLDER, redactReport } from "../../src/report/redact.js";
import {
  countFindings,
  ExitCode,
  exitCodeForFindings,
} from "../../src/report/report-utils.js";
import { renderTextReport } from "../../src/report/text-reporter.js";
import { createFinding } from "../../src/rules/finding-factory.js";
import type { Finding } from "../../src/rules/types.js";
import { makeFacts, makeGpu, makeRule } from "../helpers/fixtures.js";

const crit: Finding = createFinding(
  makeRule("thermal-throttling", {
    title: "GPU thermal throttling",
    severity: "CRIT",
    base_confidence: 90,
    description: "Clocks drop when hot.",
  }),
  "GPU temperature is 90°C — exceeds safe limit.",
);
const warn: Finding = createFinding(
  makeRule("low-vram", { title: "Low GPU memory", severity: "WARN" }),
  "GPU Small has 2048 MB VRAM (< 4 GB).",
);
const info: Finding = createFinding(
  makeRule("hybrid-gpu", { title: "Hybrid GPU", severity: "INFO" }),
  "Both NVIDIA and integrated graphics detected.",
);

const context = { mode: "gaming", platform: "linux" };

describe("report utils", () => {
  it("counts findings per severity", () => {
    const other = createFinding(makeRule("x", { severity: "NOTICE" }), "x");
    expect(countFindings([crit, warn, warn, info, other])).toEqual({
      crit: 1,
      warn: 2,
      info: 1,
      other: 1,
      total: 5,
    });
  });

  it("maps findings to exit codes", () => {
    expect(exitCodeForFindings([])).toBe(ExitCode.Ok);
    expect(exitCodeForFindings([info])).toBe(ExitCode.Ok);
    expect(exitCodeForFindings([info, warn])).toBe(ExitCode.Warnings);
    expect(exitCodeForFindings([warn, crit])).toBe(ExitCode.Critical);
  });
});

describe("json reporter", () => {
  it("builds a report with summary and metadata", () => {
    const report = buildJsonReport({
      toolVersion: "0.1.0",
      context,
      facts: makeFacts(),
      findings: [crit, warn],
      runMetadata: { rules_loaded: 7, catalog_version: "1.0.0" },
    });
    expect(report.tool).toEqual({ name: "gpudoctor", version: "0.1.0" });
    expect(report.summary.total).toBe(2);
    const parsed = JSON.parse(renderJsonReport(report)) as {
      findings: Array<{ rule_id: string }>;
      run_metadata: { rules_loaded: number };
    };
    expect(parsed.findings.map((finding) => finding.rule_id)).toEqual([
      "thermal-throttling",
      "low-vram",
    ]);
    expect(parsed.run_metadata.rules_loaded).toBe(7);
  });
});

describe("redaction", () => {
  it("replaces the hostname in facts and evidence", () => {
    const mention = createFinding(
      makeRule("x", { severity: "INFO" }),
      "Checked TEST-HOST and test-host.",
    );
    const report = redactReport(
      buildJsonReport({
        toolVersion: "0.1.0",
        context,
        facts: makeFacts(),
        findings: [warn, mention],
      }),
    );

    expect(report.facts.system.hostname).toBe(HOST_PLACEHOLDER);
    expect(report.findings[0]).toBe(warn);
    expect(report.findings[1]?.evidence).toBe("Checked <host> and <host>.");
    expect(renderJsonReport(report)).not.toContain("test-host");
  });

  it("leaves the collector's unknown hostname fallback in evidence", () => {
    const facts = makeFacts();
    const unknownHost = {
      ...facts,
      system: { ...facts.system, hostname: "unknown" },
    };
    const finding = createFinding(makeRule("x"), "Driver version unknown.");
    const report = redactReport(
      buildJsonReport({
        toolVersion: "0.1.0",
        context,
        facts: unknownHost,
        findings: [finding],
      }),
    );
    expect(report.facts.system.hostname).toBe("<host>");
    expect(report.findings[0]?.evidence).toBe("Driver version unknown.");
  });
});

describe("text reporter", () => {
  it("renders findings with totals", () => {
    const report = buildJsonReport({
      toolVersion: "0.1.0",
      context,
      facts: makeFacts(
        [makeGpu({ name: "Hot GPU", vram_total_mb: 0, temperature_c: 90 })],
        "535.104.05",
      ),
      findings: [crit, info],
      runMetadata: { duration_ms: 1234 },
    });
    const lines = renderTextReport(report).split("\n");

    expect(lines).toContain("| Runtime:  1.2s                           |");
    expect(lines).toContain("  [GPU 0] Hot GPU");
    expect(lines).toContain("    Temp:    90°C");
    expect(lines.some((line) => line.startsWith("    VRAM:"))).toBe(false);
    expect(lines).toContain("  NVIDIA Driver: 535.104.05");
    expect(lines).toContain("  CUDA (driver): N/A");
    expect(lines).toContain("  Total: 1 CRITICAL, 0 WARNING, 1 INFO");
    expect(lines).toContain(
      "  [CRIT] #1: GPU thermal throttling (confidence: 90%)",
    );
    expect(lines).toContain(
      "    Evidence:     GPU temperature is 90°C — exceeds safe limit.",
    );
    expect(lines).toContain("    Why:          Clocks drop when hot.");
    expect(lines).toContain("  [INFO] #2: Hybrid GPU (confidence: 80%)");
    expect(lines).toContain("  OS:           linux 6.1.0");
    expect(lines).toContain("== GPU INVENTORY ==");
  });

  it("ends with the privacy section", () => {
    const report = buildJsonReport({
      toolVersion: "0.1.0",
      context,
      facts: makeFacts(),
      findings: [],
      runMetadata: { redaction_enabled: true },
    });
    const lines = renderTextReport(report).split("\n");
    const heading = lines.indexOf("== PRIVACY & DATA ==");

    expect(heading).toBeGreaterThan(lines.indexOf("== FINDINGS =="));
    expect(lines.slice(heading)).toEqual([
      "== PRIVACY & DATA ==",
      "  This report was generated locally. No data was sent anywhere.",
      "  gpudoctor does not modify your system, drivers, or settings.",
      "  Hostname redaction: on",
      "-".repeat(72),
    ]);
  });

  it("says so when there are no findings", () => {
    const report = buildJsonReport({
      toolVersion: "0.1.0",
      context,
      facts: makeFacts(),
      findings: [],
    });
    const lines = renderTextReport(report).split("\n");
    expect(lines).toContain("  No issues detected.");
    expect(lines).toContain("  No GPUs detected.");
    expect(lines).toContain("  NVIDIA Driver: N/A");
  });

  it("limits the number of findings shown", () => {
    const report = buildJsonReport({
      toolVersion: "0.1.0",
      context,
      facts: makeFacts(),
      findings: [crit, warn, info],
    });
    const lines = renderTextReport(report, { maxFindings: 1 }).split("\n");
    expect(lines).toContain(
      "  Showing 1 of 3 findings. Use --max-findings to adjust.",
    );
    expect(lines.some((line) => line.startsWith("  [WARN]"))).toBe(false);
  });
});
