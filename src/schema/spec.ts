// src/schema/spec.ts

/**
 * Keys inside a structure level that describe the level itself.
 * Every other key names a child directory.
 */
export const COMPULSORY_FILES_KEY = 'compulsory';
export const OPTIONAL_FILES_KEY = 'optional';
export const DATA_PATTERNS_KEY = 'data-file-types';
export const GIT_ROOT_KEY = 'git-root';
export const VARIABLE_NAME_KEY = 'variable-name';
export const OPTIONAL_DIRECTORY_KEY = 'optional-directory';

export const METADATA_KEYS: ReadonlySet<string> = new Set([
    COMPULSORY_FILES_KEY,
    OPTIONAL_FILES_KEY,
    DATA_PATTERNS_KEY,
    GIT_ROOT_KEY,
    VARIABLE_NAME_KEY,
    OPTIONAL_DIRECTORY_KEY,
]);

/**
 * How a directory level is recognised on disk:
 * by its exact name, or by a shell-style pattern.
 */
export type NameMatcher =
    | { kind: 'literal'; name: string }
    | { kind: 'pattern'; pattern: string };

/**
 * One directory level of the expected submission layout.
 *
 * Nodes are built once by the spec loader and frozen; the same tree can
 * be shared by any number of validation runs.
 */
export interface SpecNode {
    /**
     * Key the level was declared under in the specification document.
     * For fixed-name levels this is also the directory name.
     */
    readonly key: string;

    readonly name: NameMatcher;

    /** Files that must be present (sorted). */
    readonly compulsory: readonly string[];

    /** Files that may be present (sorted). */
    readonly optional: readonly string[];

    /** Patterns for student-named data files (sorted). */
    readonly dataPatterns: readonly string[];

    /** The level must be the top of a clean git working tree. */
    readonly isGitRoot: boolean;

    /**
     * Absence of this level is not reported.
     * Defaults to false: every declared directory is required.
     */
    readonly optionalDirectory: boolean;

    /** Child levels in declaration order, keyed by declaration key. */
    readonly children: ReadonlyMap<string, SpecNode>;
}

/**
 * A loaded specification document: descriptive metadata plus the
 * structure tree rooted at the submission directory.
 */
export interface Specification {
    title?: string;
    number?: string;
    year?: number;
    root: SpecNode;
}
