#!/usr/bin/env node
import { Command } from "commander";
import { ExitCode } from "../report/report-utils.js";
import { createLogger, writeError, writeStdout } from "./output.js";
import {
  parseFormat,
  parseMode,
  runDiagnostics,
  shouldPrintUsage,
} from "./run-command.js";
import { loadToolVersion } from "./runtime-paths.js";

interface RunFlags {
  readonly mode: string;
  readonly format: string;
  readonly out?: string;
  readonly rules?: string;
  readonly maxFindings?: string;
  readonly redact: boolean;
}

const program = new Command();
const toolVersion = await loadToolVersion();

program
  .name("gpudoctor")
  .description("Local GPU and driver diagnostics")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Suppress progress output")
  .exitOverride((error) => {
    // Subcommands copy this when created, so it must come first.
    process.exit(error.exitCode === 0 ? 0 : ExitCode.Usage);
  });

program
  .command("run")
  .description("Run diagnostics and print a report")
  .option(
    "--mode <mode>",
    "Diagnostic mode (gaming|ai|creator|streaming|full)",
    "full",
  )
  .option("--format <format>", "Output format (text|json)", "text")
  .option("--out <file>", "Write report to file")
  .option("--rules <path>", "Rules directory overriding built-in rules")
  .option("--max-findings <number>", "Limit findings in text output")
  .option("--no-redact", "Keep the hostname in the report")
  .action(async (options: RunFlags) => {
    const globals = program.opts<{ verbose?: boolean; quiet?: boolean }>();
    const logger = createLogger({
      verbose: Boolean(globals.verbose),
      quiet: Boolean(globals.quiet),
    });
    try {
      const result = await runDiagnostics(
        {
          mode: parseMode(options.mode),
          format: parseFormat(options.format),
          out: options.out,
          rulesDir: options.rules,
          maxFindings: options.maxFindings
            ? Number(options.maxFindings)
            : undefined,
          redact: options.redact,
        },
        toolVersion,
        { logger },
      );

      if (!options.out) {
        await writeStdout(result.output + "\n");
      }
      process.exitCode = result.exitCode;
    } catch (error) {
      await writeError(error);
      process.exitCode = ExitCode.Usage;
    }
  });

if (shouldPrintUsage(process.argv)) {
  program.outputHelp();
  process.exitCode = ExitCode.Ok;
} else {
  await program.parseAsync(process.argv);
}
