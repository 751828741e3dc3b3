// src/core/validate.ts

import path from 'path';

import type { RenderedReport, SpecNode } from '../schema';
import { DirectoryMatcher, type DirectoryMatcherOptions } from './directory-matcher';
import { GitCliRootChecker } from './git-root-checker';
import { assembleReport } from './report-assembler';

export type ValidateOptions = Partial<DirectoryMatcherOptions>;

export interface SubmissionResult {
   /** Absolute path of the submission root. */
   root: string;
   report: RenderedReport;
}

function createMatcher(options: ValidateOptions): DirectoryMatcher {
   return new DirectoryMatcher({
      ...options,
      gitChecker: options.gitChecker ?? new GitCliRootChecker({ logger: options.logger?.child('[git]') }),
   });
}

/**
 * Check one submission directory against a specification tree.
 */
export function validate(
   specRoot: SpecNode,
   filesystemRoot: string,
   options: ValidateOptions = {},
): RenderedReport {
   return assembleReport(createMatcher(options).match(specRoot, filesystemRoot));
}

/**
 * Batch mode: every submission gets its own independent run against the
 * same (shared, read-only) specification tree.
 */
export function validateMany(
   specRoot: SpecNode,
   filesystemRoots: readonly string[],
   options: ValidateOptions = {},
): SubmissionResult[] {
   const matcher = createMatcher(options);
   return filesystemRoots.map((root) => ({
      root: path.resolve(root),
      report: assembleReport(matcher.match(specRoot, root)),
   }));
}
