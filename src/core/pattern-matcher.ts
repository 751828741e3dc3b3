// src/core/pattern-matcher.ts

import { minimatch, type MinimatchOptions } from 'minimatch';

import type { NameMatcher } from '../schema';

/**
 * Shell-glob semantics for single entry names: only `*`, `?` and `[...]`
 * are special. Braces and extglobs stay literal, wildcards match a leading
 * dot, and case always matters (submissions are marked on Linux).
 */
const NAME_GLOB_OPTIONS: MinimatchOptions = {
   dot: true,
   nobrace: true,
   noext: true,
   nocomment: true,
   nonegate: true,
   nocase: false,
   platform: 'linux',
};

const WILDCARD_CHARS = /[*?[]/;

export function isWildcard(pattern: string): boolean {
   return WILDCARD_CHARS.test(pattern);
}

/**
 * Whole-name match of `name` against a literal or a wildcard pattern.
 */
export function matchesPattern(pattern: string, name: string): boolean {
   if (!isWildcard(pattern)) return pattern === name;
   return minimatch(name, pattern, NAME_GLOB_OPTIONS);
}

export function matchesAny(patterns: readonly string[], name: string): boolean {
   return patterns.some((pattern) => matchesPattern(pattern, name));
}

export function matchesName(matcher: NameMatcher, name: string): boolean {
   return matcher.kind === 'literal'
      ? matcher.name === name
      : matchesPattern(matcher.pattern, name);
}

export function describeNameMatcher(matcher: NameMatcher): string {
   return matcher.kind === 'literal' ? matcher.name : `"${matcher.pattern}"`;
}
