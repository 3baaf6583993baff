import { runCommand, type CommandRunner } from "./exec.js";
import { collectGpuInfo } from "./gpu-collector.js";
import { collectSystemInfo } from "./system-collector.js";
import type { FactSnapshot } from "./types.js";

export async function collectFacts(
  runner: CommandRunner = runCommand,
): Promise<FactSnapshot> {
  const system = await collectSystemInfo(runner);
  const { gpus, driver } = await collectGpuInfo(runner);
  return Object.freeze({
    system: Object.freeze(system),
    gpus: Object.freeze(gpus.map((gpu) => Object.freeze(gpu))),
    driver: Object.freeze(driver),
  });
}
