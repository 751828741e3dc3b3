// test/report.spec.ts

import {describe, it, expect} from 'vitest';
import {assembleReport, isCompliant} from '../src/core/report-assembler';
import {formatEntry, renderReport, summarizeReport} from '../src/core/render-report';
import type {Report} from '../src/schema';

function level(pathName: string, overrides: Partial<Report> = {}): Report {
    return {path: pathName, fatal: [], warnings: [], information: [], children: [], ...overrides};
}

const nested: Report = level('.', {
    information: [{code: 'unexpected-file', path: '.', subject: 'extra.txt', message: 'unexpected file'}],
    children: [
        level('src', {
            warnings: [
                {code: 'missing-compulsory-file', path: 'src', subject: 'main.py', message: 'missing compulsory file'},
            ],
            children: [
                level('src/tests', {
                    information: [
                        {code: 'unexpected-directory', path: 'src/tests', subject: 'tmp', message: 'unexpected directory'},
                    ],
                }),
            ],
        }),
        level('12345678', {
            fatal: [{code: 'not-a-git-repository', path: '12345678', message: 'not a git repository'}],
        }),
    ],
});

describe('assembleReport', () => {
    it('flattens the tree depth-first into three lists', () => {
        const rendered = assembleReport(nested);

        expect(rendered.fatal.map(formatEntry)).toEqual(['12345678: not a git repository']);
        expect(rendered.warnings.map(formatEntry)).toEqual(['src/main.py: missing compulsory file']);
        expect(rendered.information.map(formatEntry)).toEqual([
            'extra.txt: unexpected file',
            'src/tests/tmp: unexpected directory',
        ]);
    });

    it('judges compliance on fatal findings and warnings only', () => {
        expect(isCompliant(assembleReport(nested))).toBe(false);
        expect(isCompliant(assembleReport(level('.', {information: nested.information})))).toBe(true);
    });
});

describe('renderReport', () => {
    it('renders headed sections in severity order', () => {
        expect(renderReport(assembleReport(nested))).toBe(
            [
                'FATAL',
                '- 12345678: not a git repository',
                'WARNING',
                '- src/main.py: missing compulsory file',
                'INFORMATION',
                '- extra.txt: unexpected file',
                '- src/tests/tmp: unexpected directory',
            ].join('\n'),
        );
    });

    it('omits empty sections and hidden information', () => {
        const rendered = assembleReport(nested);
        expect(renderReport(rendered, {showInformation: false})).toBe(
            [
                'FATAL',
                '- 12345678: not a git repository',
                'WARNING',
                '- src/main.py: missing compulsory file',
            ].join('\n'),
        );
        expect(renderReport(assembleReport(level('.')))).toBe('');
    });

    it('summarises counts with plural forms', () => {
        expect(summarizeReport(assembleReport(nested))).toBe(
            '1 fatal problem, 1 warning, 2 notices',
        );
        expect(summarizeReport(assembleReport(level('.')))).toBe(
            '0 fatal problems, 0 warnings, 0 notices',
        );
    });
});
