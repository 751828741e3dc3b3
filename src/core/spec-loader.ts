// src/core/spec-loader.ts

import path from 'path';
import { z } from 'zod';

import {
   COMPULSORY_FILES_KEY,
   DATA_PATTERNS_KEY,
   GIT_ROOT_KEY,
   METADATA_KEYS,
   OPTIONAL_DIRECTORY_KEY,
   OPTIONAL_FILES_KEY,
   VARIABLE_NAME_KEY,
   type NameMatcher,
   type SpecNode,
   type Specification,
} from '../schema';
import { compareNames, readFileSafeSync } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';
import { isWildcard, matchesPattern } from './pattern-matcher';

const logger = defaultLogger.child('[spec]');

/**
 * Thrown when a specification document cannot be turned into a SpecNode
 * tree. Raised before any filesystem walk starts.
 */
export class SpecificationError extends Error {
   readonly issues: readonly string[];

   constructor(source: string, issues: readonly string[]) {
      super(
         `Bad specification (${source}):\n` +
            issues.map((issue) => `  - ${issue}`).join('\n'),
      );
      this.name = 'SpecificationError';
      this.issues = issues;
   }
}

const entryName = z
   .string()
   .min(1, 'must not be empty')
   .refine((name) => !name.includes('/') && !name.includes('\\'), {
      message: 'must be a single name, not a path',
   })
   .refine((name) => name !== '.' && name !== '..', {
      message: 'must not be "." or ".."',
   });

const literalFileName = entryName.refine((name) => !isWildcard(name), {
   message: 'must be a literal file name (use data-file-types for patterns)',
});

const levelMetadataSchema = z
   .object({
      [COMPULSORY_FILES_KEY]: z.array(literalFileName).optional(),
      [OPTIONAL_FILES_KEY]: z.array(literalFileName).optional(),
      [DATA_PATTERNS_KEY]: z.array(entryName).optional(),
      [GIT_ROOT_KEY]: z.boolean().optional(),
      // `false` is accepted as "fixed name" for older documents.
      [VARIABLE_NAME_KEY]: z.union([entryName, z.literal(false)]).optional(),
      [OPTIONAL_DIRECTORY_KEY]: z.boolean().optional(),
   })
   .strict();

type LevelMetadata = z.infer<typeof levelMetadataSchema>;

const documentSchema = z.object({
   title: z.string().optional(),
   number: z.union([z.string(), z.number().int().nonnegative()]).optional(),
   year: z.union([z.number().int(), z.string().regex(/^\d{4}$/)]).optional(),
   structure: z.record(z.unknown()).optional(),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssuePath(base: string, issuePath: (string | number)[]): string {
   return issuePath.reduce<string>(
      (acc, part) => (typeof part === 'number' ? `${acc}[${part}]` : `${acc}.${part}`),
      base,
   );
}

function sortedUnique(values: readonly string[] | undefined): readonly string[] {
   return Object.freeze([...new Set(values ?? [])].sort(compareNames));
}

/**
 * Decode one structure level. Keys are split into metadata (validated)
 * and child directories (objects); anything else is an error rather than
 * being taken for a directory.
 */
function decodeLevel(
   key: string,
   value: Record<string, unknown>,
   where: string,
   issues: string[],
): SpecNode {
   const metadata: Record<string, unknown> = {};
   const childEntries: [string, Record<string, unknown>][] = [];

   for (const [childKey, childValue] of Object.entries(value)) {
      if (METADATA_KEYS.has(childKey)) {
         metadata[childKey] = childValue;
      } else if (isPlainObject(childValue)) {
         childEntries.push([childKey, childValue]);
      } else {
         issues.push(
            `${where}: unrecognised metadata key "${childKey}" ` +
               `(directories must map to an object)`,
         );
      }
   }

   const parsed = levelMetadataSchema.safeParse(metadata);
   if (!parsed.success) {
      for (const issue of parsed.error.issues) {
         issues.push(`${formatIssuePath(where, issue.path)}: ${issue.message}`);
      }
   }
   const meta: LevelMetadata = parsed.success ? parsed.data : {};

   const compulsory = sortedUnique(meta[COMPULSORY_FILES_KEY]);
   const optional = sortedUnique(meta[OPTIONAL_FILES_KEY]);
   for (const name of compulsory) {
      if (optional.includes(name)) {
         issues.push(`${where}: "${name}" is listed as both compulsory and optional`);
      }
   }

   const pattern = meta[VARIABLE_NAME_KEY];
   const name: NameMatcher =
      typeof pattern === 'string'
         ? { kind: 'pattern', pattern }
         : { kind: 'literal', name: key };

   const children = new Map<string, SpecNode>();
   for (const [childKey, childValue] of childEntries) {
      const childWhere = `${where}.${childKey}`;
      if (!entryName.safeParse(childKey).success) {
         issues.push(`${childWhere}: directory key must be a single name other than "." and ".."`);
         continue;
      }
      children.set(childKey, decodeLevel(childKey, childValue, childWhere, issues));
   }
   checkSiblingAmbiguity(children, where, issues);

   return Object.freeze({
      key,
      name,
      compulsory,
      optional,
      dataPatterns: sortedUnique(meta[DATA_PATTERNS_KEY]),
      isGitRoot: meta[GIT_ROOT_KEY] ?? false,
      optionalDirectory: meta[OPTIONAL_DIRECTORY_KEY] ?? false,
      children,
   });
}

/**
 * A real directory must never be claimable by two sibling levels:
 * at most one variable-name child, and no literal sibling it would match.
 */
function checkSiblingAmbiguity(
   children: ReadonlyMap<string, SpecNode>,
   where: string,
   issues: string[],
): void {
   const patterned = [...children.values()].filter((c) => c.name.kind === 'pattern');

   if (patterned.length > 1) {
      issues.push(
         `${where}: at most one variable-name directory is allowed per level ` +
            `(found ${patterned.map((c) => `"${c.key}"`).join(', ')})`,
      );
      return;
   }

   const [wildcard] = patterned;
   if (!wildcard || wildcard.name.kind !== 'pattern') return;
   const { pattern } = wildcard.name;

   for (const sibling of children.values()) {
      if (sibling.name.kind !== 'literal') continue;
      if (matchesPattern(pattern, sibling.name.name)) {
         issues.push(
            `${where}: directory "${sibling.name.name}" also matches the ` +
               `variable-name pattern "${pattern}" of "${wildcard.key}"`,
         );
      }
   }
}

/**
 * Decode a structure object (the value of a document's "structure" key)
 * into a frozen SpecNode tree rooted at the submission directory.
 */
export function parseStructure(value: unknown, source = 'structure'): SpecNode {
   if (!isPlainObject(value)) {
      throw new SpecificationError(source, ['structure must be an object']);
   }
   const issues: string[] = [];
   const root = decodeLevel('.', value, 'structure', issues);
   if (issues.length > 0) {
      throw new SpecificationError(source, issues);
   }
   return root;
}

/**
 * Decode a full specification document (already parsed JSON).
 */
export function parseSpecification(document: unknown, source = 'document'): Specification {
   const parsed = documentSchema.safeParse(document);
   if (!parsed.success) {
      throw new SpecificationError(
         source,
         parsed.error.issues.map(
            (issue) => `${formatIssuePath('document', issue.path)}: ${issue.message}`,
         ),
      );
   }

   const { title, number, year, structure } = parsed.data;
   const root = parseStructure(structure ?? {}, source);

   return {
      title,
      number: number === undefined ? undefined : String(number).padStart(2, '0'),
      year: year === undefined ? undefined : Number(year),
      root,
   };
}

/**
 * Read and decode a specification JSON file.
 */
export function loadSpecification(filePath: string): Specification {
   const absPath = path.resolve(filePath);
   const raw = readFileSafeSync(absPath);
   if (raw === null) {
      throw new SpecificationError(absPath, ['file could not be read']);
   }

   let document: unknown;
   try {
      document = JSON.parse(raw);
   } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SpecificationError(absPath, [`invalid JSON: ${reason}`]);
   }

   const spec = parseSpecification(document, absPath);
   logger.debug(`Loaded specification from ${absPath}`);
   return spec;
}

/**
 * Human-readable heading, e.g. "Assignment 01, 2024-2025: Rail fares".
 */
export function describeSpecification(spec: Specification): string {
   const id = spec.number ?? '01';
   const title = spec.title?.trim() ? spec.title : '<No title given>';
   const year = spec.year === undefined ? undefined : `${spec.year}-${spec.year + 1}`;
   return year
      ? `Assignment ${id}, ${year}: ${title}`
      : `Assignment ${id}: ${title}`;
}
