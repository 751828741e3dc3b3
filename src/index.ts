// src/index.ts

export * from './schema';

export {
   describeNameMatcher,
   isWildcard,
   matchesAny,
   matchesName,
   matchesPattern,
} from './core/pattern-matcher';
export {
   SpecificationError,
   describeSpecification,
   loadSpecification,
   parseSpecification,
   parseStructure,
} from './core/spec-loader';
export {
   nodeFileSystem,
   type Entry,
   type DirectoryListing,
   type EntryKind,
   type PathKind,
   type SubmissionFileSystem,
} from './core/submission-fs';
export {
   GitCliRootChecker,
   parsePorcelainStatus,
   type GitCliRootCheckerOptions,
   type PorcelainStatus,
} from './core/git-root-checker';
export { DirectoryMatcher, type DirectoryMatcherOptions } from './core/directory-matcher';
export { assembleReport, isCompliant } from './core/report-assembler';
export {
   formatEntry,
   renderReport,
   summarizeReport,
   type RenderOptions,
} from './core/render-report';
export {
   validate,
   validateMany,
   type SubmissionResult,
   type ValidateOptions,
} from './core/validate';
export {
   ConfigError,
   loadCheckerConfig,
   type LoadCheckerConfigOptions,
   type LoadCheckerConfigResult,
} from './core/config-loader';
export {
   EXIT_FINDINGS,
   EXIT_OK,
   EXIT_USAGE,
   runOnce,
   type RunOptions,
   type RunResult,
   type SubmissionOutcome,
} from './core/runner';
export {
   watchSubmissions,
   type SubmissionWatcher,
   type WatchOptions,
} from './core/watcher';
export {
   Logger,
   defaultLogger,
   parseLogLevel,
   type LogLevel,
   type LoggerOptions,
   type LogSink,
} from './util/logger';
