// src/core/directory-matcher.ts

import path from 'path';
import pluralize from 'pluralize';

import type {
   FatalCode,
   Finding,
   GitRootChecker,
   GitRootStatus,
   InformationCode,
   Report,
   SpecNode,
   WarningCode,
} from '../schema';
import { joinRelative } from '../util/fs-utils';
import { defaultLogger, type Logger } from '../util/logger';
import {
   describeNameMatcher,
   matchesAny,
   matchesPattern,
} from './pattern-matcher';
import {
   nodeFileSystem,
   type Entry,
   type SubmissionFileSystem,
} from './submission-fs';

const GIT_DIR = '.git';

export interface DirectoryMatcherOptions {
   gitChecker: GitRootChecker;

   /**
    * Filesystem accessor; defaults to the real filesystem.
    */
   fileSystem?: SubmissionFileSystem;

   /**
    * Entry-name globs skipped before any accounting.
    */
   ignore?: readonly string[];

   /**
    * Optional logger; defaults to defaultLogger.child('[match]').
    */
   logger?: Logger;
}

/**
 * Mutable collector for one level; frozen into a Report when done.
 */
class ReportBuilder {
   readonly fatal: Finding<FatalCode>[] = [];
   readonly warnings: Finding<WarningCode>[] = [];
   readonly information: Finding<InformationCode>[] = [];
   readonly children: Report[] = [];

   constructor(readonly path: string) {}

   addFatal(code: FatalCode, message: string, subject?: string) {
      this.fatal.push(finding(code, this.path, message, subject));
   }

   addWarning(code: WarningCode, message: string, subject?: string) {
      this.warnings.push(finding(code, this.path, message, subject));
   }

   addInformation(code: InformationCode, message: string, subject?: string) {
      this.information.push(finding(code, this.path, message, subject));
   }

   build(): Report {
      return Object.freeze({
         path: this.path,
         fatal: Object.freeze([...this.fatal]),
         warnings: Object.freeze([...this.warnings]),
         information: Object.freeze([...this.information]),
         children: Object.freeze([...this.children]),
      });
   }
}

function finding<C extends Finding['code']>(
   code: C,
   where: string,
   message: string,
   subject?: string,
): Finding<C> {
   return subject === undefined
      ? Object.freeze({ code, path: where, message })
      : Object.freeze({ code, path: where, subject, message });
}

function gitFailureMessage(
   status: Exclude<GitRootStatus, { ok: true }>,
): [FatalCode, string] {
   switch (status.reason) {
      case 'not-a-repository':
         return ['not-a-git-repository', 'not a git repository'];
      case 'not-clean': {
         const parts: string[] = [];
         if (status.untracked.length > 0) {
            parts.push(pluralize('untracked file', status.untracked.length, true));
         }
         if (status.changed.length > 0) {
            parts.push(pluralize('uncommitted change', status.changed.length, true));
         }
         return ['git-not-clean', `git working tree is not clean (${parts.join(', ')})`];
      }
      case 'unavailable':
         return ['git-unavailable', `could not inspect git repository: ${status.detail}`];
   }
}

/**
 * Walks a real directory alongside a SpecNode tree and records every
 * mismatch as data. Only a missing or unusable level stops descent; the
 * rest of the tree is always checked.
 *
 * Instances hold no per-run state, so one matcher can serve many
 * submissions.
 */
export class DirectoryMatcher {
   private readonly gitChecker: GitRootChecker;
   private readonly fileSystem: SubmissionFileSystem;
   private readonly ignore: readonly string[];
   private readonly logger: Logger;

   constructor(options: DirectoryMatcherOptions) {
      this.gitChecker = options.gitChecker;
      this.fileSystem = options.fileSystem ?? nodeFileSystem;
      this.ignore = options.ignore ?? [];
      this.logger = options.logger ?? defaultLogger.child('[match]');
   }

   /**
    * Match `spec` against the directory at `realPath`, which is taken to
    * be the submission root (reported as ".").
    */
   match(spec: SpecNode, realPath: string): Report {
      return this.matchLevel(spec, path.resolve(realPath), '.', true);
   }

   private matchLevel(
      spec: SpecNode,
      absPath: string,
      relPath: string,
      isRoot: boolean,
   ): Report {
      const report = new ReportBuilder(relPath);

      const kind = this.fileSystem.kindOf(absPath);
      if (kind === 'missing') {
         report.addFatal('missing-directory', 'directory not found');
         return report.build();
      }
      if (kind !== 'directory') {
         report.addFatal('not-a-directory', 'not a directory');
         return report.build();
      }

      // Below the root, the parent already matched the name.
      if (isRoot && spec.name.kind === 'pattern') {
         const actual = path.basename(absPath);
         if (!matchesPattern(spec.name.pattern, actual)) {
            report.addFatal(
               'name-mismatch',
               `directory name "${actual}" does not match pattern "${spec.name.pattern}"`,
            );
            return report.build();
         }
      }

      if (spec.isGitRoot) {
         const status = this.gitChecker.check(absPath);
         if (!status.ok) {
            const [code, message] = gitFailureMessage(status);
            report.addFatal(code, message);
            return report.build();
         }
      }

      const listing = this.fileSystem.list(absPath);
      if (!listing.ok) {
         report.addFatal(
            'unreadable-directory',
            `directory could not be read (${listing.reason})`,
         );
         return report.build();
      }

      const files: string[] = [];
      const dirs: string[] = [];
      const others: string[] = [];
      for (const entry of listing.entries) {
         if (matchesAny(this.ignore, entry.name)) continue;
         if (entry.name === GIT_DIR) {
            this.checkGitEntry(spec, entry, report);
            continue;
         }
         if (entry.kind === 'file') files.push(entry.name);
         else if (entry.kind === 'directory') dirs.push(entry.name);
         else others.push(entry.name);
      }

      this.checkFiles(spec, files, report);
      this.checkSubdirectories(spec, dirs, absPath, report);

      for (const name of others) {
         report.addInformation(
            'unexpected-entry',
            'unexpected entry (neither a file nor a directory)',
            name,
         );
      }

      return report.build();
   }

   /**
    * `.git` belongs to the repository at a git-root level and is never
    * accounted for there. Anywhere else it is a repository nobody asked for.
    */
   private checkGitEntry(spec: SpecNode, entry: Entry, report: ReportBuilder) {
      if (spec.isGitRoot) return;
      report.addFatal(
         'unexpected-git-repository',
         'git repository found where none was expected',
         entry.name,
      );
   }

   private checkFiles(spec: SpecNode, files: string[], report: ReportBuilder) {
      const present = new Set(files);

      for (const name of spec.compulsory) {
         if (present.has(name)) continue;

         const lower = name.toLowerCase();
         const nearMatch = files.find((file) => file.toLowerCase() === lower);
         report.addWarning(
            'missing-compulsory-file',
            nearMatch === undefined
               ? 'missing compulsory file'
               : `missing compulsory file (found "${nearMatch}", check the casing)`,
            name,
         );
      }

      for (const file of files) {
         if (spec.compulsory.includes(file) || spec.optional.includes(file)) continue;
         if (matchesAny(spec.dataPatterns, file)) continue;
         report.addInformation('unexpected-file', 'unexpected file', file);
      }
   }

   private checkSubdirectories(
      spec: SpecNode,
      dirs: string[],
      absPath: string,
      report: ReportBuilder,
   ) {
      const claimed = new Map<SpecNode, string[]>();
      const unexpected: string[] = [];
      const children = [...spec.children.values()];
      const wildcard = children.find((child) => child.name.kind === 'pattern');
      const wildcardPattern =
         wildcard && wildcard.name.kind === 'pattern' ? wildcard.name.pattern : undefined;

      for (const dir of dirs) {
         // literal names win over the variable-name child
         const owner =
            children.find(
               (child) => child.name.kind === 'literal' && child.name.name === dir,
            ) ??
            (wildcardPattern !== undefined && matchesPattern(wildcardPattern, dir)
               ? wildcard
               : undefined);

         if (owner) {
            claimed.set(owner, [...(claimed.get(owner) ?? []), dir]);
         } else {
            unexpected.push(dir);
         }
      }

      for (const child of children) {
         const matched = claimed.get(child) ?? [];
         const label = describeNameMatcher(child.name);

         if (matched.length === 0) {
            if (child.optionalDirectory) {
               this.logger.debug(`${report.path}: optional directory ${label} absent`);
               continue;
            }
            if (child.name.kind === 'literal') {
               report.addWarning('missing-subdirectory', 'missing required directory', child.name.name);
            } else {
               report.addWarning(
                  'missing-subdirectory',
                  `missing required directory matching "${child.name.pattern}"`,
               );
            }
            continue;
         }

         if (matched.length > 1) {
            report.addFatal(
               'ambiguous-directory-match',
               `several directories match ${label}: ${matched.join(', ')}`,
            );
            continue;
         }

         const [dir] = matched;
         this.logger.debug(`${report.path}: matched ${label} to ${dir}`);
         report.children.push(
            this.matchLevel(child, path.join(absPath, dir), joinRelative(report.path, dir), false),
         );
      }

      for (const dir of unexpected) {
         report.addInformation('unexpected-directory', 'unexpected directory', dir);
      }
   }
}
