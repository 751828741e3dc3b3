// test/pattern-matcher.spec.ts

import {describe, it, expect} from 'vitest';
import {
    isWildcard,
    matchesAny,
    matchesName,
    matchesPattern,
} from '../src/core/pattern-matcher';

describe('matchesPattern', () => {
    it('compares literal names exactly', () => {
        expect(matchesPattern('main.py', 'main.py')).toBe(true);
        expect(matchesPattern('main.py', 'main')).toBe(false);
        expect(matchesPattern('main', 'main.py')).toBe(false);
    });

    it('is case-sensitive', () => {
        expect(matchesPattern('README.md', 'readme.md')).toBe(false);
        expect(matchesPattern('*.csv', 'data.CSV')).toBe(false);
    });

    it('supports *, ? and character classes over the whole name', () => {
        expect(matchesPattern('data_*.csv', 'data_1.csv')).toBe(true);
        expect(matchesPattern('*.csv', 'x.csv.bak')).toBe(false);
        expect(matchesPattern('?.txt', 'a.txt')).toBe(true);
        expect(matchesPattern('?.txt', 'ab.txt')).toBe(false);
        expect(matchesPattern('[0-9]*', '12345678')).toBe(true);
        expect(matchesPattern('[0-9]*', 'abc')).toBe(false);
        expect(matchesPattern('[!a]*', 'b1')).toBe(true);
        expect(matchesPattern('[!a]*', 'a1')).toBe(false);
    });

    it('lets wildcards match a leading dot', () => {
        expect(matchesPattern('*.py', '.hidden.py')).toBe(true);
    });

    it('treats braces as literal characters', () => {
        expect(isWildcard('{a,b}.txt')).toBe(false);
        expect(matchesPattern('{a,b}.txt', 'a.txt')).toBe(false);
        expect(matchesPattern('{a,b}.txt', '{a,b}.txt')).toBe(true);
    });
});

describe('matchesAny / matchesName', () => {
    it('matches when any pattern matches', () => {
        expect(matchesAny(['*.csv', '*.json'], 'data.json')).toBe(true);
        expect(matchesAny(['*.csv', '*.json'], 'data.txt')).toBe(false);
        expect(matchesAny([], 'anything')).toBe(false);
    });

    it('dispatches on the matcher kind', () => {
        expect(matchesName({kind: 'literal', name: 'src'}, 'src')).toBe(true);
        expect(matchesName({kind: 'literal', name: '*'}, 'src')).toBe(false);
        expect(matchesName({kind: 'pattern', pattern: '*'}, 'src')).toBe(true);
    });
});
