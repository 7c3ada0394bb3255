/**
 * DiffAggregator
 *
 * Reads Backstop JSON reports, keeps the failing comparisons and groups
 * them per page label. Report files are processed in file-name order and
 * pages keep the order in which they were first seen.
 */

import * as path from 'path';
import {
    ErrorHandler,
    ErrorSeverity,
    FileSystemHelper,
    JsonValidator,
    Validators
} from '../shared/utils/index.js';
import { LIMITS } from '../config/constants.js';
import { BackstopPair, BackstopTest, DiffSummary, FailedItem, PageSummary } from './types.js';

/**
 * `*.json`, skipping hidden files such as editor backups and `._` resource forks
 */
export const isReportFile = (filename: string): boolean =>
    !filename.startsWith('.') && filename.endsWith('.json');

export class DiffAggregator {
    constructor(private readonly sampleLimit: number = LIMITS.SAMPLES_PER_PAGE) { }

    /**
     * Collect every failing test from the reports in `reportDir`.
     * Unreadable reports are skipped with a warning.
     */
    collect(reportDir: string): FailedItem[] {
        const failed: FailedItem[] = [];

        for (const file of FileSystemHelper.listFiles(reportDir, isReportFile)) {
            const filePath = path.join(reportDir, file);
            const result = JsonValidator.readFile(filePath);

            if (!result.success) {
                ErrorHandler.handle(
                    new Error(`Failed to read report ${filePath}: ${result.error}`),
                    { component: 'DiffAggregator', operation: 'collect' },
                    ErrorSeverity.WARNING
                );
                continue;
            }

            for (const test of readTests(result.data)) {
                if (test.status === 'fail') {
                    failed.push(toFailedItem(test.pair ?? {}));
                }
            }
        }

        return failed;
    }

    /**
     * Group failed items by label
     */
    summarize(items: FailedItem[]): DiffSummary {
        const byPage = new Map<string, PageSummary>();

        for (const item of items) {
            let summary = byPage.get(item.label);
            if (!summary) {
                summary = { page: item.label, count: 0, samples: [] };
                byPage.set(item.label, summary);
            }

            summary.count += 1;
            if (summary.samples.length < this.sampleLimit && item.fileName) {
                summary.samples.push(item.fileName);
            }
        }

        return {
            pages: [...byPage.values()],
            totalFailed: items.length
        };
    }

    aggregate(reportDir: string): DiffSummary {
        return this.summarize(this.collect(reportDir));
    }

    /**
     * Persist a summary, replacing whatever the last run wrote
     */
    write(summary: DiffSummary, summaryFile: string): void {
        FileSystemHelper.writeJSON(summaryFile, summary);
    }

    run(reportDir: string, summaryFile: string): DiffSummary {
        const summary = this.aggregate(reportDir);
        this.write(summary, summaryFile);
        console.log(`[DiffAggregator] ${summary.totalFailed} failed comparison(s) across ${summary.pages.length} page(s)`);
        return summary;
    }
}

/**
 * Narrow the `tests` array of a parsed report. Anything that is not an
 * object is ignored.
 */
function readTests(report: unknown): BackstopTest[] {
    if (!Validators.object(report) || !Validators.array(report.tests)) return [];

    return report.tests.filter(Validators.object).map(test => ({
        status: Validators.string(test.status) ? test.status : undefined,
        pair: Validators.object(test.pair) ? readPair(test.pair) : undefined
    }));
}

function readPair(pair: Record<string, unknown>): BackstopPair {
    return {
        label: Validators.string(pair.label) ? pair.label : undefined,
        url: Validators.string(pair.url) ? pair.url : undefined,
        fileName: Validators.string(pair.fileName) ? pair.fileName : undefined,
        diff: Validators.object(pair.diff) ? { misMatchPercentage: pair.diff.misMatchPercentage } : undefined,
        selectors: pair.selectors
    };
}

function toFailedItem(pair: BackstopPair): FailedItem {
    return {
        label: pair.label || 'unknown',
        url: pair.url || '',
        fileName: pair.fileName,
        mismatch: pair.diff?.misMatchPercentage,
        selectors: pair.selectors
    };
}
