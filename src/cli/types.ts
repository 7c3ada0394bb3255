/**
 * CLI Command Types
 *
 * Option objects as commander hands them to each action.
 */

/**
 * Options for the pack command
 */
export interface PackOptions {
    task: string;
    siteUrl?: string;
    backstopConfig?: string;
    reportDir?: string;
    outDir?: string;
    includeFullJson: boolean;
    openReport: boolean;
    skipBackstop: boolean;
}

/**
 * Options for the summarize command
 */
export interface SummarizeOptions {
    reportDir?: string;
    outDir?: string;
}
