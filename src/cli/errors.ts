import { ErrorHandler, ErrorSeverity, ExitCode, MissingInputError, type ExitCodeValue } from '../shared/utils/index.js';

/**
 * Report a failed command once and pick the process exit code for it
 */
export function reportCliError(error: unknown, operation: string): ExitCodeValue {
    if (error instanceof MissingInputError) {
        console.error(`❌ ${error.message}`);
        return error.exitCode;
    }
    ErrorHandler.handle(error, { component: 'CLI', operation }, ErrorSeverity.ERROR);
    return ExitCode.FAILURE;
}
