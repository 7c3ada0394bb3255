#!/usr/bin/env node
import { program } from 'commander';
import * as dotenv from 'dotenv';
import { loadConfig, DEFAULTS } from '../config/index.js';
import { DiffAggregator } from '../packet/DiffAggregator.js';
import { PacketPipeline } from '../packet/PacketPipeline.js';
import { reportCliError } from './errors.js';
import { PackOptions, SummarizeOptions } from './types.js';

dotenv.config();

program
    .name('vr-packet')
    .description('Run BackstopJS and prepare a Markdown review packet (no API calls)')
    .version('1.0.0');

program
    .command('pack', { isDefault: true })
    .description('Run Backstop, summarize diffs and write the review packet')
    .requiredOption('--task <path>', 'Path to task markdown (e.g., task-descriptions/task-1.md)')
    .option('--site-url <url>', `Base site URL (default: $SITE_URL or ${DEFAULTS.SITE_URL})`)
    .option('--backstop-config <path>', `Backstop config file (default: ${DEFAULTS.BACKSTOP_CONFIG})`)
    .option('--report-dir <dir>', `Backstop JSON report directory (default: ${DEFAULTS.REPORT_DIR})`)
    .option('--out-dir <dir>', `Output directory (default: ${DEFAULTS.OUT_DIR})`)
    .option('--include-full-json', 'Embed all Backstop JSON files into the packet', false)
    .option('--open-report', 'Open Backstop HTML report after run', false)
    .option('--skip-backstop', 'Use existing reports instead of running Backstop', false)
    .action(async (options: PackOptions) => {
        try {
            const config = loadConfig({
                siteUrl: options.siteUrl,
                backstopConfig: options.backstopConfig,
                reportDir: options.reportDir,
                outDir: options.outDir
            });

            const pipeline = new PacketPipeline(config);
            const result = await pipeline.run({
                taskPath: options.task,
                includeFullJson: options.includeFullJson,
                openReport: options.openReport,
                skipBackstop: options.skipBackstop
            });

            console.log('');
            console.log(`📊 Failed comparisons: ${result.summary.totalFailed}`);
            console.log(`📝 Summary: ${result.summaryFile}`);
            console.log(`✅ Packet: ${result.packetFile}`);
        } catch (error) {
            process.exit(reportCliError(error, 'pack'));
        }
    });

program
    .command('summarize')
    .description('Aggregate existing Backstop reports into diff-summary.json')
    .option('--report-dir <dir>', `Backstop JSON report directory (default: ${DEFAULTS.REPORT_DIR})`)
    .option('--out-dir <dir>', `Output directory (default: ${DEFAULTS.OUT_DIR})`)
    .action((options: SummarizeOptions) => {
        try {
            const config = loadConfig({
                reportDir: options.reportDir,
                outDir: options.outDir,
                systemPrompt: ''
            });

            const summary = new DiffAggregator(config.sampleLimit).run(config.reportDir, config.summaryFile);

            if (summary.pages.length === 0) {
                console.log('✅ No failed comparisons');
            } else {
                console.log(`\n📋 Pages with differences (${summary.pages.length}):\n`);
                summary.pages.forEach((page, index) => {
                    console.log(`${index + 1}. ${page.page}: ${page.count} failed`);
                    page.samples.forEach(sample => console.log(`   ${sample}`));
                });
            }
            console.log(`\n📝 Summary: ${config.summaryFile}`);
        } catch (error) {
            process.exit(reportCliError(error, 'summarize'));
        }
    });

await program.parseAsync();
