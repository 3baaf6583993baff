import type { FactSnapshot, GpuInfo } from "../facts/types.js";

/** Returns the evidence text when the check fires, otherwise `null`. */
export type RuleCheck = (facts: FactSnapshot) => string | null;

const LOW_VRAM_THRESHOLD_MB = 4096;
const HOT_TEMPERATURE_C = 75;
const THROTTLE_TEMPERATURE_C = 85;

const RULE_CHECKS: ReadonlyMap<string, RuleCheck> = new Map<string, RuleCheck>([
  ["no-nvidia-gpu", checkNoNvidiaGpu],
  ["hybrid-gpu", checkHybridGpu],
  ["driver-not-detected", checkDriverNotDetected],
  ["nvidia-smi-missing", checkNvidiaSmiMissing],
  ["low-vram", checkLowVram],
  ["gpu-running-hot", checkGpuRunningHot],
  ["thermal-throttling", checkThermalThrottling],
]);

export function getRuleCheck(ruleId: string): RuleCheck | undefined {
  return RULE_CHECKS.get(ruleId);
}

export function hasRuleCheck(ruleId: string): boolean {
  return RULE_CHECKS.has(ruleId);
}

function checkNoNvidiaGpu({ gpus }: FactSnapshot): string | null {
  // An empty set already implies no NVIDIA GPU; both conditions are kept.
  const hasNvidia = gpus.some((gpu) => gpu.is_nvidia);
  if (!hasNvidia && gpus.length === 0) {
    return "No NVIDIA GPU detected in system.";
  }
  return null;
}

function checkHybridGpu({ gpus }: FactSnapshot): string | null {
  const nvidiaCount = countNvidia(gpus);
  if (nvidiaCount > 0 && gpus.length > nvidiaCount) {
    return "Both NVIDIA and integrated graphics detected.";
  }
  return null;
}

function checkDriverNotDetected({ driver }: FactSnapshot): string | null {
  if (driver.version === "") {
    return "nvidia-smi did not return a driver version.";
  }
  return null;
}

function checkNvidiaSmiMissing({ gpus, driver }: FactSnapshot): string | null {
  if (gpus.length === 0 && driver.version === "") {
    return "nvidia-smi was not found or returned no data.";
  }
  return null;
}

function checkLowVram({ gpus }: FactSnapshot): string | null {
  const gpu = gpus.find(
    (entry) =>
      entry.is_nvidia &&
      entry.vram_total_mb > 0 &&
      entry.vram_total_mb < LOW_VRAM_THRESHOLD_MB,
  );
  if (!gpu) {
    return null;
  }
  return `GPU ${gpu.name} has ${gpu.vram_total_mb} MB VRAM (< 4 GB).`;
}

function checkGpuRunningHot({ gpus }: FactSnapshot): string | null {
  const gpu = gpus.find(
    (entry) =>
      entry.temperature_c >= HOT_TEMPERATURE_C &&
      entry.temperature_c < THROTTLE_TEMPERATURE_C,
  );
  if (!gpu) {
    return null;
  }
  return `GPU temperature is ${gpu.temperature_c}°C.`;
}

function checkThermalThrottling({ gpus }: FactSnapshot): string | null {
  const gpu = gpus.find(
    (entry) => entry.temperature_c >= THROTTLE_TEMPERATURE_C,
  );
  if (!gpu) {
    return null;
  }
  return `GPU temperature is ${gpu.temperature_c}°C — exceeds safe limit.`;
}

function countNvidia(gpus: readonly GpuInfo[]): number {
  return gpus.filter((gpu) => gpu.is_nvidia).length;
}
