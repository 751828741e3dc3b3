// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return path.resolve(dirPath);
}

/**
 * Read a file as UTF-8, returning null if it doesn't exist
 * or cannot be read (no exceptions thrown).
 */
export function readFileSafeSync(filePath: string): string | null {
   try {
      return fs.readFileSync(filePath, 'utf8');
   } catch {
      return null;
   }
}

/**
 * Get file stats (following symlinks) if the target exists, otherwise null.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * Join a child name onto a submission-relative POSIX path.
 * The submission root is ".", so `joinRelative('.', 'src')` is "src".
 */
export function joinRelative(relDir: string, name: string): string {
   return path.posix.join(toPosixPath(relDir), name);
}

/**
 * Code-unit ordering for entry names. Unlike localeCompare this does not
 * depend on the host locale, so reports are identical across machines.
 */
export function compareNames(a: string, b: string): number {
   if (a < b) return -1;
   if (a > b) return 1;
   return 0;
}
