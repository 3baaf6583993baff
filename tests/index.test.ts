import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  buildJsonReport,
  evaluateRules,
  exitCodeForFindings,
  loadRuleCatalog,
  type FactSnapshot,
} from "../src/index.js";

const facts: FactSnapshot = {
  system: {
    os_name: "windows",
    os_version: "10.0.22631",
    architecture: "x64",
    cpu_model: "Test CPU",
    hostname: "test-host",
    ram_total_mb: 32768,
  },
  gpus: [
    {
      index: 0,
      name: "NVIDIA GeForce GTX 1050",
      vendor: "NVIDIA",
      driver_version: "551.86",
      vram_total_mb: 2048,
      temperature_c: 77,
      is_nvidia: true,
    },
    {
      index: 1,
      name: "Intel UHD Graphics 630",
      vendor: "Intel",
      driver_version: "",
      vram_total_mb: 0,
      temperature_c: 0,
      is_nvidia: false,
    },
  ],
  driver: { version: "551.86", cuda_version: "12.4" },
};

describe("public api", () => {
  it("evaluates the bundled catalog end to end", async () => {
    const catalog = await loadRuleCatalog(path.join(process.cwd(), "rules"));
    const context = { mode: "creator", platform: "windows" };
    const findings = evaluateRules(facts, catalog.rules, context);

    expect(
      findings.map((finding) => [finding.severity, finding.rule_id]),
    ).toEqual([
      ["WARN", "low-vram"],
      ["WARN", "gpu-running-hot"],
      ["INFO", "hybrid-gpu"],
    ]);
    expect(exitCodeForFindings(findings)).toBe(1);

    const report = buildJsonReport({
      toolVersion: "0.1.0",
      context,
      facts,
      findings,
    });
    expect(report.summary).toEqual({
      crit: 0,
      warn: 2,
      info: 1,
      other: 0,
      total: 3,
    });
  });
});
