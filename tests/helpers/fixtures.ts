import type { FactSnapshot, GpuInfo } from "../../src/facts/types.js";
import type { Rule } from "../../src/rules/types.js";

export const ALL_MODES = ["gaming", "ai", "creator", "streaming", "full"];

export function makeGpu(overrides: Partial<GpuInfo> = {}): GpuInfo {
  return {
    index: 0,
    name: "Test GPU",
    vendor: "NVIDIA",
    driver_version: "535.104.05",
    vram_total_mb: 8192,
    temperature_c: 45,
    is_nvidia: true,
    ...overrides,
  };
}

export function makeFacts(
  gpus: readonly GpuInfo[] = [],
  driverVersion = "",
): FactSnapshot {
  return {
    system: {
      os_name: "linux",
      os_version: "6.1.0",
      architecture: "x64",
      cpu_model: "Test CPU",
      hostname: "test-host",
      ram_total_mb: 16384,
    },
    gpus,
    driver: { version: driverVersion, cuda_version: "" },
  };
}

export function makeRule(id: string, overrides: Partial<Rule> = {}): Rule {
  return {
    id,
    title: `Title for ${id}`,
    category: "gpu",
    severity: "WARN",
    base_confidence: 80,
    modes: ALL_MODES,
    description: `Description for ${id}`,
    ...overrides,
  };
}

export const BUILT_IN_RULE_IDS = [
  "no-nvidia-gpu",
  "hybrid-gpu",
  "driver-not-detected",
  "nvidia-smi-missing",
  "low-vram",
  "gpu-running-hot",
  "thermal-throttling",
];
