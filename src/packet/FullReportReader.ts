import * as path from 'path';
import { FileSystemHelper, JsonValidator } from '../shared/utils/index.js';
import { isReportFile } from './DiffAggregator.js';
import { FullReport } from './types.js';

/**
 * Merges every Backstop report into one object for embedding in the packet.
 * A report that cannot be read appears with its error message instead of content.
 */
export class FullReportReader {
    read(reportDir: string): FullReport {
        const files = FileSystemHelper.listFiles(reportDir, isReportFile).map(file => {
            const result = JsonValidator.readFile(path.join(reportDir, file));
            return result.success
                ? { file, content: result.data }
                : { file, error: result.error };
        });

        return { files };
    }
}
