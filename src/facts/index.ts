export { collectFacts } from "./fact-collector.js";
export { collectGpuInfo, parseCudaVersion, parseGpuCsv } from "./gpu-collector.js";
export { collectSystemInfo } from "./system-collector.js";
export { resolvePlatform } from "./platform.js";
export { runCommand } from "./exec.js";
export type { CommandRunner, RunCommandOptions } from "./exec.js";
export type {
  DriverInfo,
  FactSnapshot,
  GpuInfo,
  Result,
  SystemInfo,
} from "./types.js";
