// src/core/watcher.ts

import { watch } from 'chokidar';

import { runOnce, type RunOptions, type RunResult } from './runner';
import { defaultLogger, type Logger } from '../util/logger';

export interface WatchOptions extends RunOptions {
   /**
    * Debounce delay in milliseconds between detected changes
    * and a re-run. Overrides config.watch.debounceMs.
    *
    * Default: 150 ms
    */
   debounceMs?: number;

   /**
    * Called after every completed run (the initial one included).
    */
   onResult: (result: RunResult) => void;

   /**
    * Optional logger; falls back to defaultLogger.child('[watch]').
    */
   logger?: Logger;
}

export interface SubmissionWatcher {
   close(): Promise<void>;
}

/**
 * Validate once, then watch the specification, the config and every
 * submission tree, re-validating after each burst of changes.
 *
 * A bad setup on the first run rejects; failures on later runs are
 * logged and the watcher keeps going.
 */
export async function watchSubmissions(
   cwd: string,
   options: WatchOptions,
): Promise<SubmissionWatcher> {
   const logger = options.logger ?? defaultLogger.child('[watch]');
   const runOptions: RunOptions = { ...options, logger: logger.child('[runner]') };

   const first = await runOnce(cwd, runOptions);
   options.onResult(first);

   const debounceMs = options.debounceMs ?? first.debounceMs ?? 150;

   let timer: NodeJS.Timeout | undefined;
   let running = false;
   let pending = false;

   async function run() {
      if (running) {
         pending = true;
         return;
      }
      running = true;
      try {
         logger.debug('Change detected → re-validating...');
         options.onResult(await runOnce(cwd, runOptions));
      } catch (err) {
         logger.error('Validation run failed:', err);
      } finally {
         running = false;
         if (pending) {
            pending = false;
            timer = setTimeout(() => void run(), debounceMs);
         }
      }
   }

   function scheduleRun() {
      if (timer) clearTimeout(timer);
      timer = setTimeout(() => void run(), debounceMs);
   }

   logger.info(`Watching ${first.watchPaths.length} path(s) for changes (Ctrl+C to stop)`);

   const watcher = watch(first.watchPaths, {
      ignoreInitial: true,
      persistent: true,
   });

   watcher
      .on('all', (event, filePath) => {
         logger.debug(`Event ${event} on ${filePath}`);
         scheduleRun();
      })
      .on('error', (error) => {
         logger.error('Watcher error:', error);
      });

   return {
      async close() {
         if (timer) clearTimeout(timer);
         await watcher.close();
      },
   };
}
