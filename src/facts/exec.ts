import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Result } from "./types.js";

const execFileAsync = promisify(execFile);

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

export interface RunCommandOptions {
  readonly timeoutMs?: number;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions,
) => Promise<Result<string>>;

export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const { stdout } = await execFileAsync(command, [...args], {
      timeout: options?.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
      windowsHide: true,
    });
    return { ok: true, value: stdout.trim() };
  } catch (error) {
    return {
      ok: false,
      error:
        error instanceof Error ? error : new Error(`${command} failed to run`),
    };
  }
};
