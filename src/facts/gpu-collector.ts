import { runCommand, type CommandRunner } from "./exec.js";
import type { DriverInfo, GpuInfo } from "./types.js";

const NVIDIA_SMI = "nvidia-smi";
const GPU_QUERY_ARGS = [
  "--query-gpu=index,name,driver_version,memory.total,temperature.gpu",
  "--format=csv,noheader,nounits",
] as const;
const CUDA_VERSION_MARKER = "CUDA Version:";

export interface GpuCollection {
  readonly gpus: GpuInfo[];
  readonly driver: DriverInfo;
}

export async function collectGpuInfo(
  runner: CommandRunner = runCommand,
): Promise<GpuCollection> {
  const query = await runner(NVIDIA_SMI, GPU_QUERY_ARGS);
  const gpus = query.ok ? parseGpuCsv(query.value) : [];

  const banner = await runner(NVIDIA_SMI, []);
  const cudaVersion = banner.ok ? parseCudaVersion(banner.value) : "";

  return {
    gpus,
    driver: {
      version: gpus[0]?.driver_version ?? "",
      cuda_version: cudaVersion,
    },
  };
}

/**
 * Parses `nvidia-smi --format=csv,noheader,nounits` rows. Rows with fewer
 * than five fields are dropped; unparsable numbers become 0 (unknown).
 */
export function parseGpuCsv(output: string): GpuInfo[] {
  const gpus: GpuInfo[] = [];
  for (const line of output.split(/\r?\n/)) {
    const fields = line.split(", ").map((field) => field.trim());
    if (fields.length < 5) {
      continue;
    }
    const [index, name, driverVersion, vram, temperature] = fields;
    gpus.push({
      index: parseIntOrZero(index),
      name: name ?? "",
      vendor: "NVIDIA",
      driver_version: driverVersion ?? "",
      vram_total_mb: parseIntOrZero(vram),
      temperature_c: parseIntOrZero(temperature),
      is_nvidia: true,
    });
  }
  return gpus;
}

export function parseCudaVersion(output: string): string {
  let version = "";
  for (const line of output.split(/\r?\n/)) {
    const position = line.indexOf(CUDA_VERSION_MARKER);
    if (position < 0) {
      continue;
    }
    const rest = line.slice(position + CUDA_VERSION_MARKER.length).trimStart();
    const digits = /^[0-9.]+/.exec(rest)?.[0];
    if (digits) {
      version = digits;
    }
  }
  return version;
}

function parseIntOrZero(value: string | undefined): number {
  if (!value || !/^-?\d+$/.test(value)) {
    return 0;
  }
  return Number.parseInt(value, 10);
}
