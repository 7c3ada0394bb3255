/**
 * Centralized Error Handler
 *
 * Severity-based error handling shared by the aggregator, runner and CLI.
 * Messages are prefixed with `[component.operation]`.
 */

export enum ErrorSeverity {
    /** No logging - for non-critical optional operations */
    SILENT = 'silent',
    /** Warning only - for recoverable failures */
    WARNING = 'warning',
    /** Error logging - for significant failures with recovery */
    ERROR = 'error',
    /** Critical - re-throws after logging */
    CRITICAL = 'critical'
}

export interface ErrorContext {
    /** Component or class name */
    component: string;
    /** Operation being performed */
    operation?: string;
    /** Additional context data */
    data?: Record<string, unknown>;
}

export interface ErrorInfo {
    message: string;
    stack?: string;
    context: ErrorContext;
    timestamp: string;
}

/**
 * Process exit codes used by the CLI
 */
export const ExitCode = {
    FAILURE: 1,
    MISSING_INPUT: 2
} as const;

export type ExitCodeValue = typeof ExitCode[keyof typeof ExitCode];

/**
 * A required input (task file, template) does not exist.
 * The CLI terminates with `exitCode` when it sees one.
 */
export class MissingInputError extends Error {
    readonly exitCode: ExitCodeValue = ExitCode.MISSING_INPUT;

    constructor(readonly kind: string, readonly inputPath: string) {
        super(`${kind} not found: ${inputPath}`);
        this.name = 'MissingInputError';
    }
}

export class ErrorHandler {
    private static formatContext(ctx: ErrorContext): string {
        const parts = [ctx.component];
        if (ctx.operation) parts.push(ctx.operation);
        return `[${parts.join('.')}]`;
    }

    /**
     * Normalize anything thrown into an Error
     */
    static toError(error: unknown): Error {
        return error instanceof Error ? error : new Error(String(error));
    }

    /**
     * Handle an error with specified severity
     */
    static handle(
        error: unknown,
        context: ErrorContext,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): ErrorInfo {
        const err = this.toError(error);
        const prefix = this.formatContext(context);

        const errorInfo: ErrorInfo = {
            message: err.message,
            stack: err.stack,
            context,
            timestamp: new Date().toISOString()
        };

        switch (severity) {
            case ErrorSeverity.SILENT:
                break;

            case ErrorSeverity.WARNING:
                console.warn(`${prefix} Warning: ${err.message}`);
                break;

            case ErrorSeverity.ERROR:
                console.error(`${prefix} Error: ${err.message}`);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                break;

            case ErrorSeverity.CRITICAL:
                console.error(`${prefix} CRITICAL: ${err.message}`);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                throw err;
        }

        return errorInfo;
    }

    /**
     * Safely execute a sync function with error handling
     */
    static safeExecuteSync<T>(
        fn: () => T,
        context: ErrorContext,
        defaultValue: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): T {
        try {
            return fn();
        } catch (error) {
            this.handle(error, context, severity);
            return defaultValue;
        }
    }
}

export default ErrorHandler;
