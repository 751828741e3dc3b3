// test/spec-loader.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, describe, it, expect} from 'vitest';
import {
    SpecificationError,
    describeSpecification,
    loadSpecification,
    parseSpecification,
    parseStructure,
} from '../src/core/spec-loader';
import {cleanupTempDirs, makeTempDir} from './helpers/tree';

function issuesOf(fn: () => unknown): readonly string[] {
    try {
        fn();
    } catch (err) {
        if (err instanceof SpecificationError) return err.issues;
        throw err;
    }
    throw new Error('expected a SpecificationError');
}

afterEach(cleanupTempDirs);

describe('parseSpecification', () => {
    it('decodes metadata, children and document fields', () => {
        const spec = parseSpecification({
            title: 'Rail fares',
            number: 1,
            year: 2024,
            structure: {
                compulsory: ['b.py', 'a.py'],
                optional: ['README.md'],
                'data-file-types': ['*.csv'],
                src: {'git-root': true, compulsory: ['main.py']},
                candidate: {'variable-name': '[0-9]*', 'optional-directory': true},
            },
        });

        expect(describeSpecification(spec)).toBe('Assignment 01, 2024-2025: Rail fares');

        const {root} = spec;
        expect(root.name).toEqual({kind: 'literal', name: '.'});
        expect(root.compulsory).toEqual(['a.py', 'b.py']);
        expect(root.optional).toEqual(['README.md']);
        expect(root.dataPatterns).toEqual(['*.csv']);
        expect(root.isGitRoot).toBe(false);
        expect([...root.children.keys()]).toEqual(['src', 'candidate']);

        const src = root.children.get('src');
        expect(src?.isGitRoot).toBe(true);
        expect(src?.compulsory).toEqual(['main.py']);
        expect(src?.optionalDirectory).toBe(false);

        const candidate = root.children.get('candidate');
        expect(candidate?.name).toEqual({kind: 'pattern', pattern: '[0-9]*'});
        expect(candidate?.optionalDirectory).toBe(true);
    });

    it('treats a missing structure as an empty root level', () => {
        const spec = parseSpecification({title: 'Empty'});
        expect(spec.root.children.size).toBe(0);
        expect(spec.root.compulsory).toEqual([]);
        expect(describeSpecification({root: spec.root})).toBe('Assignment 01: <No title given>');
    });

    it('rejects a structure that is not an object', () => {
        expect(() => parseSpecification({structure: []})).toThrow(SpecificationError);
    });

    it('freezes the decoded tree', () => {
        const root = parseStructure({compulsory: ['a.py'], src: {}});
        expect(Object.isFrozen(root)).toBe(true);
        expect(Object.isFrozen(root.compulsory)).toBe(true);
    });

    it('accepts variable-name: false as a fixed name', () => {
        const root = parseStructure({src: {'variable-name': false}});
        expect(root.children.get('src')?.name).toEqual({kind: 'literal', name: 'src'});
    });
});

describe('parseStructure rejections', () => {
    it('rejects unrecognised metadata keys instead of taking them for directories', () => {
        expect(issuesOf(() => parseStructure({compulsory: ['a.py'], git_root: true}))).toEqual([
            'structure: unrecognised metadata key "git_root" (directories must map to an object)',
        ]);
    });

    it('rejects more than one variable-name child at a level', () => {
        const issues = issuesOf(() =>
            parseStructure({
                a: {'variable-name': '*'},
                b: {'variable-name': 'x*'},
            }),
        );
        expect(issues).toEqual([
            'structure: at most one variable-name directory is allowed per level (found "a", "b")',
        ]);
    });

    it('rejects a literal sibling that the variable-name pattern would also match', () => {
        const issues = issuesOf(() =>
            parseStructure({
                data: {},
                student: {'variable-name': '*'},
            }),
        );
        expect(issues).toEqual([
            'structure: directory "data" also matches the variable-name pattern "*" of "student"',
        ]);
    });

    it('rejects wildcard characters in compulsory names', () => {
        expect(issuesOf(() => parseStructure({compulsory: ['*.py']}))).toEqual([
            'structure.compulsory[0]: must be a literal file name (use data-file-types for patterns)',
        ]);
    });

    it('rejects a name that is both compulsory and optional', () => {
        expect(
            issuesOf(() => parseStructure({compulsory: ['a.py'], optional: ['a.py']})),
        ).toEqual(['structure: "a.py" is listed as both compulsory and optional']);
    });

    it('rejects "." and ".." as directory keys', () => {
        expect(issuesOf(() => parseStructure({src: {'..': {}, lib: {}}}))).toEqual([
            'structure.src...: directory key must be a single name other than "." and ".."',
        ]);
    });

    it('reports nested type errors with their document path', () => {
        expect(issuesOf(() => parseStructure({src: {'git-root': 'yes'}}))).toEqual([
            'structure.src.git-root: Expected boolean, received string',
        ]);
    });
});

describe('loadSpecification', () => {
    it('loads a JSON file from disk', () => {
        const dir = makeTempDir({
            'spec.json': JSON.stringify({number: '3', structure: {compulsory: ['main.py']}}),
        });
        const spec = loadSpecification(path.join(dir, 'spec.json'));
        expect(spec.number).toBe('03');
        expect(spec.root.compulsory).toEqual(['main.py']);
    });

    it('reports invalid JSON as a bad specification', () => {
        const dir = makeTempDir({'spec.json': '{"structure": '});
        const issues = issuesOf(() => loadSpecification(path.join(dir, 'spec.json')));
        expect(issues).toHaveLength(1);
        expect(issues[0].startsWith('invalid JSON: ')).toBe(true);
    });

    it('reports an unreadable file as a bad specification', () => {
        const dir = makeTempDir();
        const missing = path.join(dir, 'nope.json');
        expect(fs.existsSync(missing)).toBe(false);
        expect(issuesOf(() => loadSpecification(missing))).toEqual(['file could not be read']);
    });
});
