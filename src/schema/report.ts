// src/schema/report.ts

export type Severity = 'fatal' | 'warning' | 'information';

export type FatalCode =
    | 'missing-directory'
    | 'not-a-directory'
    | 'unreadable-directory'
    | 'name-mismatch'
    | 'not-a-git-repository'
    | 'git-not-clean'
    | 'git-unavailable'
    | 'unexpected-git-repository'
    | 'ambiguous-directory-match';

export type WarningCode = 'missing-compulsory-file' | 'missing-subdirectory';

export type InformationCode = 'unexpected-file' | 'unexpected-directory' | 'unexpected-entry';

export type FindingCode = FatalCode | WarningCode | InformationCode;

/**
 * A single problem found while matching one directory level.
 */
export interface Finding<C extends FindingCode = FindingCode> {
    code: C;
    /**
     * Directory the finding belongs to, POSIX-style and relative to the
     * submission root ("." for the root itself).
     */
    path: string;
    /** Entry inside `path` the finding is about, if any. */
    subject?: string;
    message: string;
}

/**
 * Result of matching one SpecNode against one real directory.
 * Child reports are nested in spec declaration order.
 */
export interface Report {
    readonly path: string;
    readonly fatal: readonly Finding<FatalCode>[];
    readonly warnings: readonly Finding<WarningCode>[];
    readonly information: readonly Finding<InformationCode>[];
    readonly children: readonly Report[];
}

/**
 * Flattened submission-level report, in depth-first traversal order.
 */
export interface RenderedReport {
    readonly fatal: readonly Finding<FatalCode>[];
    readonly warnings: readonly Finding<WarningCode>[];
    readonly information: readonly Finding<InformationCode>[];
}
