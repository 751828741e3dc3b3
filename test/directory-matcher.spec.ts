// test/directory-matcher.spec.ts

import path from 'path';
import {afterEach, describe, it, expect} from 'vitest';
import {DirectoryMatcher} from '../src/core/directory-matcher';
import {parseStructure} from '../src/core/spec-loader';
import type {Entry, PathKind, SubmissionFileSystem} from '../src/core/submission-fs';
import {FakeGitChecker, cleanupTempDirs, makeTempDir} from './helpers/tree';

afterEach(cleanupTempDirs);

describe('DirectoryMatcher', () => {
    it('nests child reports in spec declaration order', () => {
        const spec = parseStructure({
            zeta: {compulsory: ['z.py']},
            alpha: {compulsory: ['a.py']},
        });
        const root = makeTempDir({alpha: {'a.py': ''}, zeta: {}});

        const report = new DirectoryMatcher({gitChecker: new FakeGitChecker()}).match(spec, root);

        expect(report.path).toBe('.');
        expect(report.children.map((child) => child.path)).toEqual(['zeta', 'alpha']);
        expect(report.children[0].warnings).toEqual([
            {
                code: 'missing-compulsory-file',
                path: 'zeta',
                subject: 'z.py',
                message: 'missing compulsory file',
            },
        ]);
        expect(report.children[1].warnings).toEqual([]);
    });

    it('descends into the directory matched by a variable name', () => {
        const spec = parseStructure({
            candidate: {'variable-name': '[0-9]*', compulsory: ['main.py']},
        });
        const root = makeTempDir({'12345678': {'main.py': '', 'notes.txt': ''}});

        const report = new DirectoryMatcher({gitChecker: new FakeGitChecker()}).match(spec, root);

        expect(report.children).toHaveLength(1);
        expect(report.children[0].path).toBe('12345678');
        expect(report.children[0].information).toEqual([
            {
                code: 'unexpected-file',
                path: '12345678',
                subject: 'notes.txt',
                message: 'unexpected file',
            },
        ]);
    });

    it('only calls the git checker for git-root levels', () => {
        const spec = parseStructure({
            repo: {'git-root': true},
            plain: {},
        });
        const root = makeTempDir({repo: {'.git': {HEAD: ''}}, plain: {}});
        const git = new FakeGitChecker();

        const report = new DirectoryMatcher({gitChecker: git}).match(spec, root);

        expect(git.checked).toEqual(['repo']);
        expect(report.children.map((child) => child.fatal)).toEqual([[], []]);
        expect(report.children[0].information).toEqual([]);
    });

    it('checks the root name against a root variable-name pattern', () => {
        const spec = parseStructure({'variable-name': '[0-9]*'});
        const root = makeTempDir();

        const report = new DirectoryMatcher({gitChecker: new FakeGitChecker()}).match(spec, root);

        expect(report.fatal).toEqual([
            {
                code: 'name-mismatch',
                path: '.',
                message: `directory name "${path.basename(root)}" does not match pattern "[0-9]*"`,
            },
        ]);
    });

    it('skips entries matching an ignore pattern', () => {
        const spec = parseStructure({compulsory: ['main.py']});
        const root = makeTempDir({'.DS_Store': '', 'main.py': '', __MACOSX: {}});

        const report = new DirectoryMatcher({
            gitChecker: new FakeGitChecker(),
            ignore: ['.DS_Store', '__MACOSX'],
        }).match(spec, root);

        expect(report.information).toEqual([]);
        expect(report.warnings).toEqual([]);
    });

    it('works against any filesystem accessor', () => {
        const tree: Record<string, Entry[]> = {
            '/sub': [
                {name: 'main.py', kind: 'file'},
                {name: 'src', kind: 'directory'},
            ],
            '/sub/src': [],
        };
        const fileSystem: SubmissionFileSystem = {
            kindOf: (p): PathKind => (p in tree ? 'directory' : 'missing'),
            list: (p) => ({ok: true, entries: tree[p] ?? []}),
        };
        const spec = parseStructure({compulsory: ['main.py'], src: {compulsory: ['lib.py']}});

        const report = new DirectoryMatcher({
            gitChecker: new FakeGitChecker(),
            fileSystem,
        }).match(spec, '/sub');

        expect(report.warnings).toEqual([]);
        expect(report.children[0].warnings).toEqual([
            {
                code: 'missing-compulsory-file',
                path: 'src',
                subject: 'lib.py',
                message: 'missing compulsory file',
            },
        ]);
    });

    it('stops at a directory that cannot be listed', () => {
        const fileSystem: SubmissionFileSystem = {
            kindOf: (p): PathKind => (p === '/sub' || p === '/sub/src' ? 'directory' : 'missing'),
            list: (p) =>
                p === '/sub/src'
                    ? {ok: false, reason: 'EACCES'}
                    : {ok: true, entries: [{name: 'src', kind: 'directory'}]},
        };
        const spec = parseStructure({src: {compulsory: ['lib.py'], tests: {}}});

        const report = new DirectoryMatcher({
            gitChecker: new FakeGitChecker(),
            fileSystem,
        }).match(spec, '/sub');

        expect(report.fatal).toEqual([]);
        expect(report.children).toHaveLength(1);
        expect(report.children[0]).toEqual({
            path: 'src',
            fatal: [
                {
                    code: 'unreadable-directory',
                    path: 'src',
                    message: 'directory could not be read (EACCES)',
                },
            ],
            warnings: [],
            information: [],
            children: [],
        });
    });

    it('reports entries that are neither files nor directories', () => {
        const fileSystem: SubmissionFileSystem = {
            kindOf: (p): PathKind => (p === '/sub' ? 'directory' : 'missing'),
            list: () => ({
                ok: true,
                entries: [
                    {name: 'main.py', kind: 'file'},
                    {name: 'server.sock', kind: 'other'},
                ],
            }),
        };
        const spec = parseStructure({compulsory: ['main.py']});

        const report = new DirectoryMatcher({
            gitChecker: new FakeGitChecker(),
            fileSystem,
        }).match(spec, '/sub');

        expect(report.warnings).toEqual([]);
        expect(report.information).toEqual([
            {
                code: 'unexpected-entry',
                path: '.',
                subject: 'server.sock',
                message: 'unexpected entry (neither a file nor a directory)',
            },
        ]);
    });
});
