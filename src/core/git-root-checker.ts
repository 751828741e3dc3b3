// src/core/git-root-checker.ts

import fs from 'fs';
import path from 'path';
import { spawnSync } from 'child_process';
import pluralize from 'pluralize';

import type { GitRootChecker, GitRootStatus } from '../schema';
import { defaultLogger, type Logger } from '../util/logger';

export interface GitCliRootCheckerOptions {
   /**
    * git executable. Default: "git"
    */
   binary?: string;
   logger?: Logger;
}

export interface PorcelainStatus {
   untracked: string[];
   changed: string[];
}

/**
 * Split `git status --porcelain` (v1) output into untracked and changed
 * paths. Renames report their destination path.
 */
export function parsePorcelainStatus(output: string): PorcelainStatus {
   const untracked: string[] = [];
   const changed: string[] = [];

   for (const line of output.split(/\r?\n/)) {
      if (line.length < 4) continue;
      const code = line.slice(0, 2);
      let file = line.slice(3);
      const arrow = file.indexOf(' -> ');
      if (arrow !== -1) file = file.slice(arrow + 4);

      if (code === '??') {
         untracked.push(file);
      } else if (code !== '!!') {
         changed.push(file);
      }
   }

   return { untracked, changed };
}

function realpathSafe(p: string): string {
   try {
      return fs.realpathSync(p);
   } catch {
      return path.resolve(p);
   }
}

/**
 * GitRootChecker backed by the git command line.
 *
 * A directory passes when it is the top level of a working tree and
 * `git status` reports nothing (untracked files included).
 */
export class GitCliRootChecker implements GitRootChecker {
   private readonly binary: string;
   private readonly logger: Logger;

   constructor(options: GitCliRootCheckerOptions = {}) {
      this.binary = options.binary ?? 'git';
      this.logger = options.logger ?? defaultLogger.child('[git]');
   }

   check(directory: string): GitRootStatus {
      const topLevel = this.git(directory, ['rev-parse', '--show-toplevel']);
      if (topLevel.kind === 'unavailable') {
         return { ok: false, reason: 'unavailable', detail: topLevel.detail };
      }
      if (topLevel.kind === 'failed') {
         this.logger.debug(`${directory}: not inside a work tree`);
         return { ok: false, reason: 'not-a-repository' };
      }

      // A directory nested inside someone else's repository is not a root.
      if (realpathSafe(topLevel.stdout.trim()) !== realpathSafe(directory)) {
         this.logger.debug(
            `${directory}: work tree top level is ${topLevel.stdout.trim()}`,
         );
         return { ok: false, reason: 'not-a-repository' };
      }

      const status = this.git(directory, [
         'status',
         '--porcelain',
         '--untracked-files=all',
      ]);
      if (status.kind === 'unavailable') {
         return { ok: false, reason: 'unavailable', detail: status.detail };
      }
      if (status.kind === 'failed') {
         return { ok: false, reason: 'unavailable', detail: status.stderr.trim() };
      }

      const { untracked, changed } = parsePorcelainStatus(status.stdout);
      if (untracked.length > 0 || changed.length > 0) {
         this.logger.debug(
            `${directory}: ${pluralize('untracked path', untracked.length, true)}, ` +
               `${pluralize('changed path', changed.length, true)}`,
         );
         return { ok: false, reason: 'not-clean', untracked, changed };
      }

      return { ok: true, reason: 'ok' };
   }

   private git(
      cwd: string,
      args: string[],
   ):
      | { kind: 'ok'; stdout: string }
      | { kind: 'failed'; stderr: string }
      | { kind: 'unavailable'; detail: string } {
      const result = spawnSync(
         this.binary,
         ['-c', 'core.quotepath=false', ...args],
         { cwd, encoding: 'utf8' },
      );

      if (result.error) {
         return { kind: 'unavailable', detail: result.error.message };
      }
      if (result.status !== 0) {
         return { kind: 'failed', stderr: result.stderr };
      }
      return { kind: 'ok', stdout: result.stdout };
   }
}
