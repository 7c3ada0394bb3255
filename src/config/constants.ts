/**
 * Default paths and limits.
 * Every value here can be overridden through the environment or CLI flags.
 */

export const DEFAULTS = {
    SITE_URL: 'http://localhost:8080',

    /** Config file passed to `backstop test --config=` */
    BACKSTOP_CONFIG: 'backstop.config.cjs',

    /** Working directory for Backstop runs */
    BACKSTOP_DIR: 'backstop',

    BACKSTOP_BIN: 'backstop',

    REPORT_DIR: 'backstop/backstop_data/json_report',
    HTML_REPORT_DIR: 'backstop/backstop_data/html_report',
    OUT_DIR: 'out',
} as const;

export const OUTPUT_FILES = {
    SUMMARY: 'diff-summary.json',
    PACKET: 'ai-packet.md',
} as const;

export const LIMITS = {
    /** Maximum diff-image file names kept per page summary */
    SAMPLES_PER_PAGE: 5,
} as const;

/**
 * Backstop exits 0 when every scenario passes and 1 when differences
 * were found. Anything else is worth a warning.
 */
export const BACKSTOP_EXPECTED_EXIT_CODES: readonly number[] = [0, 1];
