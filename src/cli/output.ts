export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly write?: (line: string) => void;
}

/**
 * Progress and diagnostics go to stderr so stdout carries only the report.
 * `quiet` drops info lines; debug lines need `verbose`. Warnings always print.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const write =
    options.write ?? ((line: string) => void process.stderr.write(line + "\n"));
  return {
    debug(message) {
      if (options.verbose) {
        write(`debug: ${message}`);
      }
    },
    info(message) {
      if (!options.quiet) {
        write(message);
      }
    },
    warn(message) {
      write(`warning: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
};

export async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

export async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}
