import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DiffAggregator } from '../../src/packet/DiffAggregator.js';
import { DiffSummary } from '../../src/packet/types.js';

function failing(label: string, fileName: string) {
    return { status: 'fail', pair: { label, url: `http://site.test/${label}`, fileName } };
}

describe('DiffAggregator', () => {
    let reportDir: string;
    let aggregator: DiffAggregator;

    const writeReport = (name: string, tests: unknown[]) => {
        fs.writeFileSync(path.join(reportDir, name), JSON.stringify({ tests }));
    };

    beforeEach(() => {
        reportDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vr-packet-reports-'));
        aggregator = new DiffAggregator();
        vi.spyOn(console, 'warn').mockImplementation(() => { });
        vi.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        fs.rmSync(reportDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    describe('aggregate', () => {
        it('should group two failures on the same page', () => {
            writeReport('report.json', [failing('home', 'f1.png'), failing('home', 'f2.png')]);

            expect(aggregator.aggregate(reportDir)).toEqual({
                pages: [{ page: 'home', count: 2, samples: ['f1.png', 'f2.png'] }],
                totalFailed: 2
            });
        });

        it('should keep only the first five samples but count every failure', () => {
            const tests = Array.from({ length: 7 }, (_, i) => failing('pricing', `pricing-${i}.png`));
            writeReport('report.json', tests);

            const summary = aggregator.aggregate(reportDir);

            expect(summary.totalFailed).toBe(7);
            expect(summary.pages).toEqual([{
                page: 'pricing',
                count: 7,
                samples: ['pricing-0.png', 'pricing-1.png', 'pricing-2.png', 'pricing-3.png', 'pricing-4.png']
            }]);
        });

        it('should order pages by first occurrence across files sorted by name', () => {
            writeReport('b.json', [failing('pricing', 'p.png'), failing('home', 'h2.png')]);
            writeReport('a.json', [failing('home', 'h1.png')]);

            expect(aggregator.aggregate(reportDir)).toEqual({
                pages: [
                    { page: 'home', count: 2, samples: ['h1.png', 'h2.png'] },
                    { page: 'pricing', count: 1, samples: ['p.png'] }
                ],
                totalFailed: 3
            });
        });

        it('should produce one page per file when each file fails a different label', () => {
            writeReport('01.json', [failing('home', 'home.png')]);
            writeReport('02.json', [failing('pricing', 'pricing.png')]);

            const summary = aggregator.aggregate(reportDir);

            expect(summary.pages.map(p => p.page)).toEqual(['home', 'pricing']);
            expect(summary.totalFailed).toBe(2);
        });

        it('should count a failure without a pair under "unknown" with no sample', () => {
            writeReport('report.json', [{ status: 'fail' }]);

            expect(aggregator.aggregate(reportDir)).toEqual({
                pages: [{ page: 'unknown', count: 1, samples: [] }],
                totalFailed: 1
            });
        });

        it('should return an empty summary for an empty directory', () => {
            expect(aggregator.aggregate(reportDir)).toEqual({ pages: [], totalFailed: 0 });
        });

        it('should return an empty summary when the directory does not exist', () => {
            expect(aggregator.aggregate(path.join(reportDir, 'missing'))).toEqual({ pages: [], totalFailed: 0 });
        });

        it('should return an empty summary when nothing failed', () => {
            writeReport('report.json', [
                { status: 'pass', pair: { label: 'home', fileName: 'home.png' } },
                { status: 'pass', pair: { label: 'pricing', fileName: 'pricing.png' } }
            ]);

            expect(aggregator.aggregate(reportDir)).toEqual({ pages: [], totalFailed: 0 });
        });

        it('should skip a corrupt report and continue with the next one', () => {
            fs.writeFileSync(path.join(reportDir, 'a.json'), '{ "tests": [');
            writeReport('b.json', [failing('features', 'features.png')]);

            const summary = aggregator.aggregate(reportDir);

            expect(summary).toEqual({
                pages: [{ page: 'features', count: 1, samples: ['features.png'] }],
                totalFailed: 1
            });
            expect(console.warn).toHaveBeenCalledTimes(1);
            expect(String(vi.mocked(console.warn).mock.calls[0][0])).toMatch(
                /^\[DiffAggregator\.collect\] Warning: Failed to read report .*a\.json: /
            );
        });

        it('should ignore files that are not JSON reports', () => {
            fs.writeFileSync(path.join(reportDir, 'notes.txt'), 'not a report');
            writeReport('report.json', [failing('home', 'home.png')]);

            expect(aggregator.aggregate(reportDir).totalFailed).toBe(1);
            expect(console.warn).not.toHaveBeenCalled();
        });

        it('should skip hidden JSON files next to the reports', () => {
            writeReport('.report.json', [failing('ghost', 'ghost.png')]);
            writeReport('._report.json', [failing('ghost', 'ghost-2.png')]);
            writeReport('report.json', [failing('home', 'home.png')]);

            expect(aggregator.aggregate(reportDir)).toEqual({
                pages: [{ page: 'home', count: 1, samples: ['home.png'] }],
                totalFailed: 1
            });
        });

        it('should only match the exact "fail" status', () => {
            writeReport('report.json', [
                { status: 'FAIL', pair: { label: 'home', fileName: 'a.png' } },
                { status: 'failed', pair: { label: 'home', fileName: 'b.png' } },
                failing('home', 'c.png')
            ]);

            expect(aggregator.aggregate(reportDir)).toEqual({
                pages: [{ page: 'home', count: 1, samples: ['c.png'] }],
                totalFailed: 1
            });
        });

        it('should treat reports without a tests array as empty', () => {
            fs.writeFileSync(path.join(reportDir, 'a.json'), JSON.stringify({ testSuite: 'BackstopJS' }));
            fs.writeFileSync(path.join(reportDir, 'b.json'), JSON.stringify({ tests: 'none' }));
            fs.writeFileSync(path.join(reportDir, 'c.json'), JSON.stringify([failing('home', 'h.png')]));

            expect(aggregator.aggregate(reportDir)).toEqual({ pages: [], totalFailed: 0 });
        });

        it('should count failures with an empty file name without adding a sample', () => {
            writeReport('report.json', [failing('home', ''), failing('home', 'h.png')]);

            expect(aggregator.aggregate(reportDir).pages).toEqual([
                { page: 'home', count: 2, samples: ['h.png'] }
            ]);
        });

        it('should honour a custom sample limit', () => {
            writeReport('report.json', [failing('home', 'a.png'), failing('home', 'b.png'), failing('home', 'c.png')]);

            const summary = new DiffAggregator(2).aggregate(reportDir);

            expect(summary.pages).toEqual([{ page: 'home', count: 3, samples: ['a.png', 'b.png'] }]);
        });

        it('should keep totalFailed equal to the sum of page counts', () => {
            writeReport('a.json', [failing('home', 'a.png'), { status: 'fail' }, failing('pricing', 'b.png')]);
            writeReport('b.json', [failing('home', 'c.png'), { status: 'pass' }, failing('about', 'd.png')]);

            const summary = aggregator.aggregate(reportDir);
            const sum = summary.pages.reduce((total, page) => total + page.count, 0);

            expect(summary.totalFailed).toBe(5);
            expect(sum).toBe(summary.totalFailed);
            expect(summary.pages.map(p => p.page)).toEqual(['home', 'unknown', 'pricing', 'about']);
        });
    });

    describe('collect', () => {
        it('should pass mismatch and selectors through untouched', () => {
            writeReport('report.json', [{
                status: 'fail',
                pair: {
                    label: 'home',
                    url: 'http://site.test/',
                    fileName: 'home.png',
                    diff: { misMatchPercentage: '12.50', isSameDimensions: true },
                    selectors: ['document', '.hero']
                }
            }]);

            expect(aggregator.collect(reportDir)).toEqual([{
                label: 'home',
                url: 'http://site.test/',
                fileName: 'home.png',
                mismatch: '12.50',
                selectors: ['document', '.hero']
            }]);
        });

        it('should default label and url when the pair lacks them', () => {
            writeReport('report.json', [{ status: 'fail', pair: { label: '', fileName: 'x.png' } }]);

            const [item] = aggregator.collect(reportDir);

            expect(item.label).toBe('unknown');
            expect(item.url).toBe('');
            expect(item.fileName).toBe('x.png');
            expect(item.mismatch).toBeUndefined();
            expect(item.selectors).toBeUndefined();
        });
    });

    describe('run', () => {
        it('should write the summary as indented JSON with pages before totalFailed', () => {
            writeReport('report.json', [failing('home', 'h.png')]);
            const summaryFile = path.join(reportDir, 'out', 'diff-summary.json');

            aggregator.run(reportDir, summaryFile);

            expect(fs.readFileSync(summaryFile, 'utf-8')).toBe([
                '{',
                '  "pages": [',
                '    {',
                '      "page": "home",',
                '      "count": 1,',
                '      "samples": [',
                '        "h.png"',
                '      ]',
                '    }',
                '  ],',
                '  "totalFailed": 1',
                '}',
                ''
            ].join('\n'));
        });

        it('should overwrite the summary from a previous run', () => {
            const summaryFile = path.join(reportDir, 'summary', 'diff-summary.json');
            fs.mkdirSync(path.dirname(summaryFile));
            fs.writeFileSync(summaryFile, '{"stale": true, "padding": "xxxxxxxxxxxxxxxxxxxxxxxxxxxxxxxxxxxxxx"}');

            const summary = aggregator.run(reportDir, summaryFile);

            const written: DiffSummary = JSON.parse(fs.readFileSync(summaryFile, 'utf-8'));
            expect(summary).toEqual({ pages: [], totalFailed: 0 });
            expect(written).toEqual({ pages: [], totalFailed: 0 });
        });
    });
});
