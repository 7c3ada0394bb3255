/**
 * TaskParser
 *
 * Reads a task-description Markdown file of the form:
 *
 *   # Title: Move pricing table below the fold
 *   Labels: frontend, pricing
 *   Expected pages: /pricing, /features
 *   Body:
 *   Free-form description...
 *
 * Header fields are only recognized above the `Body:` line; everything from
 * there on is body text.
 */

import * as fs from 'fs';
import { MissingInputError } from '../shared/utils/index.js';
import { TaskDescription } from './types.js';

const FIELD_LINE = /^#{0,6}\s*(title|labels|expected pages|body)\s*:(.*)$/i;

type FieldName = 'title' | 'labels' | 'expected pages' | 'body';

function splitList(value: string, separator: RegExp): string[] | undefined {
    const entries = value.split(separator).map(s => s.trim()).filter(s => s.length > 0);
    return entries.length > 0 ? entries : undefined;
}

function isFieldName(name: string): name is FieldName {
    return name === 'title' || name === 'labels' || name === 'expected pages' || name === 'body';
}

export class TaskParser {
    parse(text: string): TaskDescription {
        const task: TaskDescription = { raw: text };
        const lines = text.split(/\r?\n/);

        for (let i = 0; i < lines.length; i++) {
            const match = FIELD_LINE.exec(lines[i].trim());
            if (!match) continue;

            const name = match[1].toLowerCase();
            if (!isFieldName(name)) continue;
            const value = match[2].trim();

            switch (name) {
                case 'title':
                    if (task.title === undefined && value) task.title = value;
                    break;
                case 'labels':
                    if (task.labels === undefined) task.labels = splitList(value, /,/);
                    break;
                case 'expected pages':
                    if (task.expectedPages === undefined) task.expectedPages = splitList(value, /[,\s]+/);
                    break;
                case 'body': {
                    const body = [match[2], ...lines.slice(i + 1)].join('\n').trim();
                    if (body) task.body = body;
                    return task;
                }
            }
        }

        return task;
    }

    parseFile(taskPath: string): TaskDescription {
        if (!fs.existsSync(taskPath)) {
            throw new MissingInputError('Task file', taskPath);
        }
        return this.parse(fs.readFileSync(taskPath, 'utf-8'));
    }
}
