/**
 * PacketBuilder
 *
 * Renders the reviewer packet from `templates/packet.md.hbs`.
 */

import * as fs from 'fs';
import Handlebars from 'handlebars';
import { MissingInputError } from '../shared/utils/index.js';
import { DiffSummary, FullReport, TaskDescription } from './types.js';

export const PACKET_TEMPLATE_PATH = new URL('../../templates/packet.md.hbs', import.meta.url);

export const FULL_JSON_NOT_INCLUDED = '_(not included—re-run with --include-full-json to embed)_';

export interface PacketInput {
    systemPrompt: string;
    task: TaskDescription;
    summary: DiffSummary;
    htmlReportDir: string;
    /** Embedded when present */
    fullReport?: FullReport;
}

interface PacketView {
    promptBlock: string;
    taskBlock: string;
    fieldsBlock: string;
    diffBlock: string;
    reportTips: string;
    fullJsonBlock: string;
}

const fence = (lang: string, body: string): string => '```' + lang + '\n' + body + '\n```';

const json = (value: unknown): string => JSON.stringify(value, null, 2);

/**
 * The parsed task fields that are present, in a fixed order
 */
export function taskFields(task: TaskDescription): Record<string, string | string[]> {
    const fields: Record<string, string | string[]> = {};
    if (task.title !== undefined) fields.title = task.title;
    if (task.labels !== undefined) fields.labels = task.labels;
    if (task.expectedPages !== undefined) fields.expectedPages = task.expectedPages;
    return fields;
}

export class PacketBuilder {
    private readonly render: Handlebars.TemplateDelegate<PacketView>;

    constructor(template?: string) {
        this.render = Handlebars.compile<PacketView>(template ?? PacketBuilder.loadTemplate(), { noEscape: true });
    }

    static loadTemplate(location: URL | string = PACKET_TEMPLATE_PATH): string {
        if (!fs.existsSync(location)) {
            throw new MissingInputError('Packet template', String(location));
        }
        return fs.readFileSync(location, 'utf-8');
    }

    build(input: PacketInput): string {
        return this.render({
            promptBlock: fence('text', input.systemPrompt.trim()),
            taskBlock: fence('md', input.task.raw.trim()),
            fieldsBlock: fence('json', json(taskFields(input.task))),
            diffBlock: fence('json', json(input.summary)),
            reportTips: [
                '- Open Backstop HTML report: `npx backstop openReport`',
                `- Or browse: \`${input.htmlReportDir}/index.html\` (local file path)`
            ].join('\n'),
            fullJsonBlock: input.fullReport ? fence('json', json(input.fullReport)) : FULL_JSON_NOT_INCLUDED
        });
    }
}
