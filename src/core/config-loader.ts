// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { pathToFileURL } from 'url';
import { transform } from 'esbuild';
import { z } from 'zod';

import { CONFIG_FILE_BASENAME, type CheckerConfig } from '../schema';
import { defaultLogger } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

const CONFIG_EXTENSIONS = ['.ts', '.mts', '.mjs', '.js', '.cjs'];

/**
 * Thrown when a config file exists but cannot be loaded or does not have
 * the expected shape.
 */
export class ConfigError extends Error {
   constructor(message: string) {
      super(message);
      this.name = 'ConfigError';
   }
}

const configSchema = z
   .object({
      spec: z.string().min(1).optional(),
      submissions: z.array(z.string().min(1)).optional(),
      showInformation: z.boolean().optional(),
      strict: z.boolean().optional(),
      ignore: z.array(z.string().min(1)).optional(),
      git: z.object({ binary: z.string().min(1).optional() }).strict().optional(),
      watch: z
         .object({ debounceMs: z.number().int().nonnegative().optional() })
         .strict()
         .optional(),
   })
   .strict() satisfies z.ZodType<CheckerConfig>;

export interface LoadCheckerConfigOptions {
   /**
    * Explicit config file path (absolute or relative to cwd).
    * If not provided, we look for checker.config.* in cwd.
    */
   configPath?: string;
}

export interface LoadCheckerConfigResult {
   config: CheckerConfig;

   /**
    * Absolute path of the loaded config file, or null when none was found
    * and defaults are in use.
    */
   configPath: string | null;

   /**
    * Directory relative paths in the config are resolved against:
    * the config file's directory, or cwd when there is no config.
    */
   configDir: string;
}

/**
 * Locate and load the checker config.
 *
 * Resolution rules:
 * - If options.configPath is given, that file must exist.
 * - Else the first checker.config.{ts,mts,mjs,js,cjs} in cwd is used.
 * - Else an empty config is returned (every field has a default).
 */
export async function loadCheckerConfig(
   cwd: string,
   options: LoadCheckerConfigOptions = {},
): Promise<LoadCheckerConfigResult> {
   const absCwd = path.resolve(cwd);

   let configPath: string | null;
   if (options.configPath) {
      configPath = path.resolve(absCwd, options.configPath);
      if (!fs.existsSync(configPath)) {
         throw new ConfigError(`Config file not found: ${configPath}`);
      }
   } else {
      configPath = findConfigPath(absCwd);
   }

   if (!configPath) {
      logger.debug(`No ${CONFIG_FILE_BASENAME}.* in ${absCwd}; using defaults.`);
      return { config: {}, configPath: null, configDir: absCwd };
   }

   const loaded = await importConfig(configPath);
   const parsed = configSchema.safeParse(loaded);
   if (!parsed.success) {
      const details = parsed.error.issues
         .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
         .join('\n');
      throw new ConfigError(`Invalid config in ${configPath}:\n${details}`);
   }

   logger.debug(`Loaded config from ${configPath}`);

   return {
      config: parsed.data,
      configPath,
      configDir: path.dirname(configPath),
   };
}

function findConfigPath(dir: string): string | null {
   for (const ext of CONFIG_EXTENSIONS) {
      const full = path.join(dir, `${CONFIG_FILE_BASENAME}${ext}`);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return null;
}

function defaultExport(mod: unknown): unknown {
   if (typeof mod === 'object' && mod !== null && 'default' in mod) {
      return mod.default;
   }
   return mod;
}

/**
 * Import a config module from the given path.
 * - For .ts/.mts we transpile with esbuild to ESM and load from a temp file.
 * - For .js/.mjs/.cjs we import directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();

   try {
      if (ext === '.ts' || ext === '.mts') {
         return await importTsConfig(configPath);
      }

      const mod: unknown = await import(pathToFileURL(configPath).href);
      return defaultExport(mod);
   } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Could not load config ${configPath}: ${reason}`);
   }
}

/**
 * Transpile a TS config file to ESM with esbuild and import the compiled file.
 * We cache based on (path + mtime) so changes invalidate the temp.
 */
async function importTsConfig(configPath: string): Promise<unknown> {
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = ensureDirSync(path.join(os.tmpdir(), 'subcheck-config'));
   const tmpFile = path.join(tmpDir, `${hash}.mjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader: 'ts',
         format: 'esm',
         sourcemap: 'inline',
         target: 'node20',
      });

      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   const mod: unknown = await import(pathToFileURL(tmpFile).href);
   return defaultExport(mod);
}
