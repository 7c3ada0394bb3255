/**
 * Shared Utilities
 *
 * Error handling, file system operations and JSON parsing.
 */

export {
    ErrorHandler,
    ErrorSeverity,
    ExitCode,
    MissingInputError,
    type ErrorContext,
    type ErrorInfo,
    type ExitCodeValue
} from './ErrorHandler.js';

export {
    FileSystemHelper
} from './FileSystemHelper.js';

export {
    JsonValidator,
    Validators,
    type ValidationResult
} from './JsonValidator.js';
