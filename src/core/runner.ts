// src/core/runner.ts

import path from 'path';

import type { GitRootChecker, RenderedReport } from '../schema';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';
import { toPosixPath } from '../util/fs-utils';
import { ConfigError, loadCheckerConfig } from './config-loader';
import { describeSpecification, loadSpecification } from './spec-loader';
import { GitCliRootChecker } from './git-root-checker';
import { isCompliant } from './report-assembler';
import { renderReport, summarizeReport } from './render-report';
import { validateMany } from './validate';

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_USAGE = 2;

export interface RunOptions {
   /**
    * Optional overrides; each wins over the matching config field.
    */
   configPath?: string;
   specPath?: string;
   submissions?: string[];
   showInformation?: boolean;
   strict?: boolean;
   ignore?: string[];
   gitBinary?: string;

   /**
    * Optional git checker override (tests inject a fake).
    */
   gitChecker?: GitRootChecker;

   /**
    * Optional logger override.
    */
   logger?: Logger;
}

export interface SubmissionOutcome {
   /** Submission root as given, relative to cwd when possible. */
   label: string;
   report: RenderedReport;
   /** Rendered sections ("" when there is nothing to show). */
   text: string;
   passed: boolean;
}

export interface RunResult {
   exitCode: number;
   /** Heading describing the specification that was applied. */
   heading: string;
   submissions: SubmissionOutcome[];
   /** Absolute paths a watcher should observe for re-runs. */
   watchPaths: string[];
   /** Debounce delay from config.watch, if set. */
   debounceMs?: number;
}

/**
 * Validate every requested submission once against the specification.
 *
 * Throws SpecificationError / ConfigError for a bad setup; submission
 * problems are reported in the result, never thrown.
 */
export async function runOnce(cwd: string, options: RunOptions = {}): Promise<RunResult> {
   const logger = options.logger ?? defaultLogger.child('[runner]');
   const absCwd = path.resolve(cwd);

   const { config, configPath, configDir } = await loadCheckerConfig(absCwd, {
      configPath: options.configPath,
   });

   const specPath = options.specPath
      ? path.resolve(absCwd, options.specPath)
      : config.spec
        ? path.resolve(configDir, config.spec)
        : undefined;
   if (!specPath) {
      throw new ConfigError(
         'No specification given. Pass --spec <file> or set "spec" in checker.config.',
      );
   }

   const submissionPaths =
      options.submissions && options.submissions.length > 0
         ? options.submissions.map((p) => path.resolve(absCwd, p))
         : (config.submissions ?? []).map((p) => path.resolve(configDir, p));
   if (submissionPaths.length === 0) {
      throw new ConfigError('No submission given. Pass one or more submission directories.');
   }

   const spec = loadSpecification(specPath);
   const heading = describeSpecification(spec);
   logger.debug(`Checking ${submissionPaths.length} submission(s) against ${heading}`);

   const showInformation = options.showInformation ?? config.showInformation ?? true;
   const strict = options.strict ?? config.strict ?? false;
   const gitChecker =
      options.gitChecker ??
      new GitCliRootChecker({
         binary: options.gitBinary ?? config.git?.binary,
         logger: logger.child('[git]'),
      });

   const results = validateMany(spec.root, submissionPaths, {
      gitChecker,
      ignore: [...(config.ignore ?? []), ...(options.ignore ?? [])],
      logger: logger.child('[match]'),
   });

   const submissions = results.map(({ root, report }): SubmissionOutcome => {
      const passed = strict
         ? isCompliant(report)
         : report.fatal.length === 0;
      const relative = toPosixPath(path.relative(absCwd, root));
      const label =
         relative === '' ? '.' : relative.startsWith('..') ? root : relative;

      logger.debug(`${label}: ${summarizeReport(report)}`);

      return {
         label,
         report,
         text: renderReport(report, { showInformation }),
         passed,
      };
   });

   return {
      exitCode: submissions.every((s) => s.passed) ? EXIT_OK : EXIT_FINDINGS,
      heading,
      submissions,
      watchPaths: [
         specPath,
         ...submissionPaths,
         ...(configPath ? [configPath] : []),
      ],
      debounceMs: config.watch?.debounceMs,
   };
}
