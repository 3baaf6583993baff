export interface SystemInfo {
  readonly os_name: string;
  readonly os_version: string;
  readonly architecture: string;
  readonly cpu_model: string;
  readonly hostname: string;
  readonly ram_total_mb: number;
}

export interface GpuInfo {
  readonly index: number;
  readonly name: string;
  readonly vendor: string;
  readonly driver_version: string;
  /** 0 when unknown. */
  readonly vram_total_mb: number;
  /** 0 when the GPU reports no temperature. */
  readonly temperature_c: number;
  readonly is_nvidia: boolean;
}

export interface DriverInfo {
  /** Empty string when no driver was detected. */
  readonly version: string;
  readonly cuda_version: string;
}

export interface FactSnapshot {
  readonly system: SystemInfo;
  readonly gpus: readonly GpuInfo[];
  readonly driver: DriverInfo;
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };
