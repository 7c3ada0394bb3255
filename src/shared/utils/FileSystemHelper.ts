/**
 * File System Helper
 *
 * Directory listing and output writing for report and packet files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorHandler, ErrorSeverity } from './ErrorHandler.js';

export class FileSystemHelper {
    /**
     * Ensure a directory exists, creating it if necessary
     */
    static ensureDir(dirPath: string): void {
        if (fs.existsSync(dirPath)) return;
        fs.mkdirSync(dirPath, { recursive: true });
    }

    static ensureDirForFile(filePath: string): void {
        this.ensureDir(path.dirname(filePath));
    }

    /**
     * Write text, replacing any existing file.
     * Failures propagate to the caller, which reports them.
     */
    static writeText(filePath: string, content: string): void {
        this.ensureDirForFile(filePath);
        fs.writeFileSync(filePath, content, 'utf-8');
    }

    /**
     * Write JSON indented with two spaces, replacing any existing file
     */
    static writeJSON(filePath: string, data: unknown): void {
        this.writeText(filePath, JSON.stringify(data, null, 2) + '\n');
    }

    /**
     * List file names in a directory, sorted by name.
     * A missing or unreadable directory yields an empty list.
     */
    static listFiles(
        dirPath: string,
        filter?: (filename: string) => boolean
    ): string[] {
        if (!fs.existsSync(dirPath)) return [];

        const files = ErrorHandler.safeExecuteSync(
            () => fs.readdirSync(dirPath, { withFileTypes: true })
                .filter(entry => entry.isFile())
                .map(entry => entry.name),
            { component: 'FileSystemHelper', operation: 'listFiles', data: { dirPath } },
            [],
            ErrorSeverity.WARNING
        );

        return (filter ? files.filter(filter) : files).sort(compareNames);
    }

    static isFile(filePath: string): boolean {
        const stats = ErrorHandler.safeExecuteSync(
            () => fs.statSync(filePath, { throwIfNoEntry: false }),
            { component: 'FileSystemHelper', operation: 'isFile', data: { filePath } },
            undefined,
            ErrorSeverity.SILENT
        );
        return stats?.isFile() ?? false;
    }
}

/**
 * Code-point order, independent of locale
 */
function compareNames(a: string, b: string): number {
    const left = [...a];
    const right = [...b];
    const length = Math.min(left.length, right.length);

    for (let i = 0; i < length; i++) {
        const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
        if (diff !== 0) return diff;
    }
    return left.length - right.length;
}

export default FileSystemHelper;
