/**
 * JSON Validator
 *
 * Safe JSON parsing plus type guards for narrowing report data that
 * arrives as `unknown`.
 */

import * as fs from 'fs';

export type ValidationResult<T> =
    | { success: true; data: T }
    | { success: false; error: string };

/**
 * Built-in validators for common types
 */
export const Validators = {
    string: (value: unknown): value is string => typeof value === 'string',
    array: (value: unknown): value is unknown[] => Array.isArray(value),
    object: (value: unknown): value is Record<string, unknown> =>
        typeof value === 'object' && value !== null && !Array.isArray(value),
};

export class JsonValidator {
    /**
     * Parse a JSON string into an unknown value for the caller to narrow
     */
    static parse(jsonString: string): ValidationResult<unknown> {
        try {
            const data: unknown = JSON.parse(jsonString);
            return { success: true, data };
        } catch (error) {
            return { success: false, error: error instanceof Error ? error.message : String(error) };
        }
    }

    /**
     * Read and parse a JSON file. I/O and syntax errors are both
     * reported through the result, never thrown.
     */
    static readFile(filePath: string): ValidationResult<unknown> {
        let content: string;
        try {
            content = fs.readFileSync(filePath, 'utf-8');
        } catch (error) {
            return { success: false, error: error instanceof Error ? error.message : String(error) };
        }
        return this.parse(content);
    }
}

export default JsonValidator;
