// src/schema/git.ts

/**
 * Outcome of inspecting a directory that should anchor a git repository.
 */
export type GitRootStatus =
    | { ok: true; reason: 'ok' }
    | { ok: false; reason: 'not-a-repository' }
    | {
          ok: false;
          reason: 'not-clean';
          /** Paths git does not track. */
          untracked: string[];
          /** Tracked paths with staged or unstaged modifications. */
          changed: string[];
      }
    | { ok: false; reason: 'unavailable'; detail: string };

/**
 * Capability the directory matcher calls for every git-root level.
 * Injected so tests can substitute a fake.
 */
export interface GitRootChecker {
    check(directory: string): GitRootStatus;
}
