import type { GpuInfo } from "../facts/types.js";
import type { Finding } from "../rules/types.js";
import type { DiagnosticReport } from "./types.js";

export interface TextRenderOptions {
  readonly maxFindings?: number;
}

const RULE = "-".repeat(72);
const NOT_AVAILABLE = "N/A";

export function renderTextReport(
  report: DiagnosticReport,
  options: TextRenderOptions = {},
): string {
  const lines: string[] = [];

  lines.push(renderHeaderBlock(report));

  lines.push("");
  lines.push("== SYSTEM INFO ==");
  lines.push("");
  lines.push(...renderSystemSection(report));
  lines.push("");
  lines.push("== GPU INVENTORY ==");
  lines.push("");
  lines.push(...renderGpuSection(report));

  lines.push("");
  lines.push("== FINDINGS ==");
  lines.push("");
  lines.push(...renderFindingsSection(report, options.maxFindings));

  lines.push("");
  lines.push(RULE);
  lines.push("== PRIVACY & DATA ==");
  lines.push("  This report was generated locally. No data was sent anywhere.");
  lines.push("  gpudoctor does not modify your system, drivers, or settings.");
  const redacted = report.run_metadata?.redaction_enabled;
  if (redacted !== undefined) {
    lines.push(`  Hostname redaction: ${redacted ? "on" : "off (--no-redact)"}`);
  }
  lines.push(RULE);

  return lines.join("\n");
}

function renderHeaderBlock(report: DiagnosticReport): string {
  const content = [
    `gpudoctor v${report.tool.version} - GPU Diagnostic Report`,
    `Mode:     ${report.context.mode}`,
    `Platform: ${report.context.platform}`,
  ];
  const duration = report.run_metadata?.duration_ms;
  if (duration !== undefined) {
    content.push(`Runtime:  ${(duration / 1000).toFixed(1)}s`);
  }
  return renderAsciiBox(content);
}

function renderSystemSection(report: DiagnosticReport): string[] {
  const { system } = report.facts;
  return [
    `  OS:           ${system.os_name} ${system.os_version}`,
    `  Architecture: ${system.architecture}`,
    `  CPU:          ${system.cpu_model}`,
    `  RAM:          ${system.ram_total_mb > 0 ? `${system.ram_total_mb} MB` : NOT_AVAILABLE}`,
  ];
}

function renderGpuSection(report: DiagnosticReport): string[] {
  const { gpus, driver } = report.facts;
  const lines: string[] = [];
  if (gpus.length === 0) {
    lines.push("  No GPUs detected.");
    lines.push("");
  }
  for (const gpu of gpus) {
    lines.push(...renderGpu(gpu));
    lines.push("");
  }
  lines.push(`  NVIDIA Driver: ${driver.version || NOT_AVAILABLE}`);
  lines.push(`  CUDA (driver): ${driver.cuda_version || NOT_AVAILABLE}`);
  return lines;
}

function renderGpu(gpu: GpuInfo): string[] {
  const lines = [
    `  [GPU ${gpu.index}] ${gpu.name}`,
    `    Driver:  ${gpu.driver_version || NOT_AVAILABLE}`,
  ];
  if (gpu.vram_total_mb > 0) {
    lines.push(`    VRAM:    ${gpu.vram_total_mb} MB`);
  }
  if (gpu.temperature_c > 0) {
    lines.push(`    Temp:    ${gpu.temperature_c}°C`);
  }
  return lines;
}

function renderFindingsSection(
  report: DiagnosticReport,
  maxFindings?: number,
): string[] {
  if (report.findings.length === 0) {
    return ["  No issues detected."];
  }

  const { summary } = report;
  const lines = [
    `  Total: ${summary.crit} CRITICAL, ${summary.warn} WARNING, ${summary.info} INFO`,
    "",
  ];

  const shown = applyFindingLimit(report.findings, maxFindings);
  shown.forEach((finding, index) => {
    lines.push(...renderFinding(finding, index + 1));
    lines.push("");
  });

  if (report.findings.length > shown.length) {
    lines.push(
      `  Showing ${shown.length} of ${report.findings.length} findings. Use --max-findings to adjust.`,
    );
  }
  return lines;
}

function renderFinding(finding: Finding, position: number): string[] {
  const lines = [
    `  [${finding.severity}] #${position}: ${finding.title} (confidence: ${finding.confidence}%)`,
    `    Evidence:     ${finding.evidence}`,
    `    Why:          ${finding.why_it_matters}`,
  ];
  for (const step of finding.next_steps) {
    lines.push(`    Next step:    ${step}`);
  }
  return lines;
}

function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const top = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => {
    const padding = " ".repeat(width - line.length);
    return `| ${line}${padding} |`;
  });
  return [top, ...body, top].join("\n");
}

function applyFindingLimit<T>(items: readonly T[], limit?: number): T[] {
  if (!limit || limit <= 0) {
    return [...items];
  }
  return items.slice(0, limit);
}
