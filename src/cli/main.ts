#!/usr/bin/env node

import { Command } from "commander";
import { runOnce, EXIT_USAGE, type RunOptions, type RunResult } from "../core/runner";
import { watchSubmissions } from "../core/watcher";
import { defaultLogger, type Logger } from "../util/logger";
import { CONFIG_FILE_BASENAME } from "../schema";

interface CliOptions {
  spec?: string;
  config?: string;
  info?: boolean;
  strict?: boolean;
  ignore?: string[];
  git?: string;
  watch?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

/**
 * Reports go to stdout so they can be piped; everything else is logging.
 */
function printResult(result: RunResult, logger: Logger) {
  logger.info(result.heading);

  for (const submission of result.submissions) {
    if (result.submissions.length > 1) {
      process.stdout.write(`== ${submission.label} ==\n`);
    }
    if (submission.text) {
      process.stdout.write(submission.text + "\n");
    }

    if (submission.passed) {
      logger.info(`${submission.label}: submission matches the expected structure.`);
    } else {
      logger.error(`${submission.label}: submission does not match the expected structure.`);
    }
  }
}

async function handleRunCommand(submissions: string[], opts: CliOptions) {
  const logger = createCliLogger(opts);
  const cwd = process.cwd();

  const runOptions: RunOptions = {
    configPath: opts.config,
    specPath: opts.spec,
    submissions,
    // commander sets `info` to true unless --no-info is passed
    showInformation: opts.info === false ? false : undefined,
    strict: opts.strict,
    ignore: opts.ignore,
    gitBinary: opts.git,
  };

  logger.debug(
    `Starting subcheck (cwd=${cwd}, spec=${opts.spec ?? "config"}, watch=${opts.watch ? "yes" : "no"})`,
  );

  if (opts.watch) {
    // Watch mode – keeps the process alive until interrupted
    await watchSubmissions(cwd, {
      ...runOptions,
      onResult: (result) => printResult(result, logger),
    });
    return;
  }

  const result = await runOnce(cwd, runOptions);
  printResult(result, logger);
  process.exitCode = result.exitCode;
}

async function main() {
  const program = new Command();

  program
    .name("subcheck")
    .description("Check a submission directory against an expected layout specification")
    .argument("[submissions...]", "Submission directories to check")
    .option("-s, --spec <path>", "Path to the specification JSON file")
    .option(
      "-c, --config <path>",
      `Path to config file (default: ./${CONFIG_FILE_BASENAME}.*)`,
    )
    .option("--no-info", "Hide INFORMATION findings (unexpected files and directories)")
    .option("--strict", "Fail when warnings are reported, not only fatal problems")
    .option("--ignore <patterns...>", "Entry-name glob patterns to skip while matching")
    .option("--git <binary>", "git executable used for repository checks")
    .option("-w, --watch", "Re-run whenever the submission or specification changes")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging")
    .action(async (submissions: string[], opts: CliOptions) => {
      await handleRunCommand(submissions, opts);
    });

  await program.parseAsync(process.argv);
}

// Bad specification, bad config and bad usage all end up here
main().catch((err: unknown) => {
  defaultLogger.error(err);
  process.exit(EXIT_USAGE);
});
