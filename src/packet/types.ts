/**
 * One page comparison as written by Backstop into its JSON report.
 * Every field is optional; reports are narrowed from `unknown`.
 */
export interface BackstopPair {
    label?: string;
    url?: string;
    fileName?: string;
    diff?: {
        misMatchPercentage?: unknown;
    };
    selectors?: unknown;
}

export interface BackstopTest {
    status?: string;
    pair?: BackstopPair;
}

export interface FailedItem {
    /** Scenario label, `unknown` when the report has none */
    label: string;
    url: string;
    /** Diff image file name */
    fileName?: string;
    /** Passed through from `pair.diff.misMatchPercentage`, never interpreted */
    mismatch?: unknown;
    /** Passed through from `pair.selectors`, never interpreted */
    selectors?: unknown;
}

export interface PageSummary {
    page: string;
    count: number;
    samples: string[];
}

export interface DiffSummary {
    pages: PageSummary[];
    totalFailed: number;
}

export type FullReportEntry =
    | { file: string; content: unknown }
    | { file: string; error: string };

export interface FullReport {
    files: FullReportEntry[];
}

/**
 * Fields read from a task-description Markdown file.
 * A field the file does not state is left undefined.
 */
export interface TaskDescription {
    raw: string;
    title?: string;
    labels?: string[];
    expectedPages?: string[];
    body?: string;
}

/**
 * Runs the visual-diff tool. Resolves with the exit code, or null when
 * the process could not be started.
 */
export interface VisualDiffRunner {
    test(siteUrl: string, backstopConfig: string): Promise<number | null>;
    openReport(backstopConfig: string): Promise<number | null>;
}
