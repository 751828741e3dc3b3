// src/core/submission-fs.ts

import fs from 'fs';
import path from 'path';

import { compareNames, statSafeSync } from '../util/fs-utils';

/**
 * `other` covers sockets, FIFOs and symbolic links whose target is gone.
 */
export type EntryKind = 'file' | 'directory' | 'other';

/**
 * A direct child of a directory being matched.
 */
export interface Entry {
   name: string;
   kind: EntryKind;
}

export type PathKind = EntryKind | 'missing';

export type DirectoryListing =
   | { ok: true; entries: Entry[] }
   | { ok: false; reason: string };

/**
 * Read-only view of the submission tree. The matcher only ever asks
 * what a path is and what a directory contains.
 */
export interface SubmissionFileSystem {
   kindOf(targetPath: string): PathKind;
   /**
    * Direct children, sorted by name, or the reason the directory could
    * not be read.
    */
   list(dirPath: string): DirectoryListing;
}

function errorReason(err: unknown): string {
   if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
      return err.code;
   }
   return err instanceof Error ? err.message : String(err);
}

function kindOfStats(stats: fs.Stats | null): PathKind {
   if (!stats) return 'missing';
   if (stats.isDirectory()) return 'directory';
   if (stats.isFile()) return 'file';
   return 'other';
}

export const nodeFileSystem: SubmissionFileSystem = {
   kindOf(targetPath) {
      return kindOfStats(statSafeSync(targetPath));
   },

   list(dirPath) {
      let dirents: fs.Dirent[];
      try {
         dirents = fs.readdirSync(dirPath, { withFileTypes: true });
      } catch (err) {
         return { ok: false, reason: errorReason(err) };
      }

      const entries: Entry[] = [];
      for (const dirent of dirents) {
         let kind: PathKind;
         if (dirent.isDirectory()) {
            kind = 'directory';
         } else if (dirent.isFile()) {
            kind = 'file';
         } else if (dirent.isSymbolicLink()) {
            // classify links by what they point at
            kind = kindOfStats(statSafeSync(path.join(dirPath, dirent.name)));
         } else {
            kind = 'other';
         }

         entries.push({ name: dirent.name, kind: kind === 'missing' ? 'other' : kind });
      }

      return { ok: true, entries: entries.sort((a, b) => compareNames(a.name, b.name)) };
   },
};
