const PLATFORM_ALIASES: Readonly<Record<string, string>> = {
  win32: "windows",
  darwin: "macos",
};

/**
 * Canonical OS family name used by rule `platform` fields
 * (`linux`, `windows`, `macos`, ...).
 */
export function resolvePlatform(
  nodePlatform: string = process.platform,
): string {
  return PLATFORM_ALIASES[nodePlatform] ?? nodePlatform;
}
