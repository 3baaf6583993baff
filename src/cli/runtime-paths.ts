import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

// Sources run from src/cli, the build from dist/src/cli.
const PACKAGE_ROOT_CANDIDATES = [
  ["..", ".."],
  ["..", "..", ".."],
] as const;

export async function resolveRulesDirectory(): Promise<string> {
  for (const root of packageRoots()) {
    const bundledRulesDir = path.join(root, "rules");
    if (await existsDirectory(bundledRulesDir)) {
      return bundledRulesDir;
    }
  }

  const cwdRulesDir = path.resolve(process.cwd(), "rules");
  if (await existsDirectory(cwdRulesDir)) {
    return cwdRulesDir;
  }

  throw new Error(
    "Unable to find built-in rules directory. Reinstall gpudoctor or run it from its package root.",
  );
}

export async function loadToolVersion(): Promise<string> {
  for (const root of packageRoots()) {
    try {
      const raw = await fs.readFile(path.join(root, "package.json"), "utf8");
      const json = JSON.parse(raw) as { version?: string };
      return json.version ?? "0.0.0";
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        continue;
      }
      throw error;
    }
  }
  return "0.0.0";
}

function packageRoots(): string[] {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  return PACKAGE_ROOT_CANDIDATES.map((segments) =>
    path.resolve(moduleDir, ...segments),
  );
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
