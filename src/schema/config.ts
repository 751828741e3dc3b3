// src/schema/config.ts

/**
 * Root configuration object for subcheck.
 *
 * This is what you export from `checker.config.ts` (or `.mjs`, `.js`, ...)
 * in the directory you run the checker from. Every field can also be
 * given on the command line, which takes precedence.
 */
export interface CheckerConfig {
    /**
     * Path to the specification JSON document, relative to the
     * directory that holds the config file.
     */
    spec?: string;

    /**
     * Submission directories to check when none are given on the CLI.
     * Relative paths are resolved against the config directory.
     */
    submissions?: string[];

    /**
     * Whether INFORMATION findings (unexpected files and directories)
     * are rendered. Matching always computes them.
     *
     * Default: true
     */
    showInformation?: boolean;

    /**
     * When true, warnings fail the run as well as fatal findings.
     *
     * Default: false
     */
    strict?: boolean;

    /**
     * Glob patterns for entry names that are skipped entirely while
     * matching (e.g. ".DS_Store", "__MACOSX").
     *
     * Default: [] (nothing is skipped)
     */
    ignore?: string[];

    git?: {
        /**
         * Executable used for repository checks.
         * Default: "git"
         */
        binary?: string;
    };

    watch?: {
        /**
         * Debounce delay in milliseconds between a detected change
         * and the next validation run.
         *
         * Default: 150
         */
        debounceMs?: number;
    };
}

export const CONFIG_FILE_BASENAME = 'checker.config';
