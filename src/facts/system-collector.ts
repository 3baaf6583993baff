import os from "node:os";
import { runCommand, type CommandRunner } from "./exec.js";
import { resolvePlatform } from "./platform.js";
import type { SystemInfo } from "./types.js";

const UNKNOWN = "unknown";
const BYTES_PER_MB = 1024 * 1024;

export async function collectSystemInfo(
  runner: CommandRunner = runCommand,
): Promise<SystemInfo> {
  const platform = resolvePlatform();
  return {
    os_name: platform,
    os_version: await resolveOsVersion(platform, runner),
    architecture: os.arch(),
    cpu_model: resolveCpuModel(),
    hostname: os.hostname() || UNKNOWN,
    ram_total_mb: Math.floor(os.totalmem() / BYTES_PER_MB),
  };
}

async function resolveOsVersion(
  platform: string,
  runner: CommandRunner,
): Promise<string> {
  if (platform === "windows") {
    return os.release() || UNKNOWN;
  }
  const result = await runner("uname", ["-r"]);
  if (result.ok && result.value) {
    return result.value;
  }
  return os.release() || UNKNOWN;
}

function resolveCpuModel(): string {
  const [first] = os.cpus();
  const model = first?.model.trim();
  return model ? model : UNKNOWN;
}
