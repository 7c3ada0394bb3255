/**
 * PacketPipeline
 *
 * One packet run: parse the task, run Backstop, aggregate its reports and
 * write the summary and the Markdown packet. Steps run strictly in order.
 */

import { PacketConfig } from '../config/index.js';
import { FileSystemHelper, MissingInputError } from '../shared/utils/index.js';
import { BackstopRunner } from './BackstopRunner.js';
import { DiffAggregator } from './DiffAggregator.js';
import { FullReportReader } from './FullReportReader.js';
import { PacketBuilder } from './PacketBuilder.js';
import { TaskParser } from './TaskParser.js';
import { DiffSummary, TaskDescription, VisualDiffRunner } from './types.js';

export interface PipelineOptions {
    taskPath: string;
    includeFullJson?: boolean;
    openReport?: boolean;
    /** Aggregate whatever reports already exist instead of running Backstop */
    skipBackstop?: boolean;
}

export interface PipelineResult {
    packetFile: string;
    summaryFile: string;
    summary: DiffSummary;
    task: TaskDescription;
}

export interface PipelineDependencies {
    runner?: VisualDiffRunner;
    builder?: PacketBuilder;
}

export class PacketPipeline {
    private readonly runner: VisualDiffRunner;
    private readonly builder: PacketBuilder;
    private readonly aggregator: DiffAggregator;
    private readonly taskParser = new TaskParser();
    private readonly reportReader = new FullReportReader();

    constructor(private readonly config: PacketConfig, deps: PipelineDependencies = {}) {
        this.runner = deps.runner ?? new BackstopRunner({ bin: config.backstopBin, cwd: config.backstopDir });
        this.builder = deps.builder ?? new PacketBuilder();
        this.aggregator = new DiffAggregator(config.sampleLimit);
    }

    async run(options: PipelineOptions): Promise<PipelineResult> {
        const { config } = this;

        // 1) Parse task
        if (!FileSystemHelper.isFile(options.taskPath)) {
            throw new MissingInputError('Task file', options.taskPath);
        }
        const task = this.taskParser.parseFile(options.taskPath);
        console.log(`[Pipeline] Task: ${task.title ?? '(no title)'}`);

        // 2) Run Backstop
        if (options.skipBackstop) {
            console.log('[Pipeline] Skipping Backstop run, using existing reports');
        } else {
            await this.runner.test(config.siteUrl, config.backstopConfig);
        }

        // 3) Collect diffs
        const summary = this.aggregator.run(config.reportDir, config.summaryFile);

        // 4) Optional: full JSON
        const fullReport = options.includeFullJson ? this.reportReader.read(config.reportDir) : undefined;

        // 5) Build packet
        const packet = this.builder.build({
            systemPrompt: config.systemPrompt,
            task,
            summary,
            htmlReportDir: config.htmlReportDir,
            fullReport
        });
        FileSystemHelper.writeText(config.packetFile, packet);
        console.log(`[Pipeline] Wrote: ${config.packetFile}`);

        if (options.openReport) {
            await this.runner.openReport(config.backstopConfig);
        }

        return {
            packetFile: config.packetFile,
            summaryFile: config.summaryFile,
            summary,
            task
        };
    }
}
