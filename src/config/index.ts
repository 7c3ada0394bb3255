import * as fs from 'fs';
import * as path from 'path';
import { DEFAULTS, LIMITS, OUTPUT_FILES } from './constants.js';
import { MissingInputError } from '../shared/utils/index.js';

/**
 * Everything a packet run needs, resolved once and passed to each component.
 */
export interface PacketConfig {
    siteUrl: string;
    backstopConfig: string;
    backstopDir: string;
    backstopBin: string;
    reportDir: string;
    htmlReportDir: string;
    outDir: string;
    summaryFile: string;
    packetFile: string;
    sampleLimit: number;
    systemPrompt: string;
}

export type ConfigOverrides = Partial<Omit<PacketConfig, 'summaryFile' | 'packetFile'>>;

type Env = Record<string, string | undefined>;

export const SYSTEM_PROMPT_PATH = new URL('../../templates/system-prompt.txt', import.meta.url);

export function loadSystemPrompt(location: URL | string = SYSTEM_PROMPT_PATH): string {
    if (!fs.existsSync(location)) {
        throw new MissingInputError('System prompt', String(location));
    }
    return fs.readFileSync(location, 'utf-8');
}

/**
 * Resolve configuration: CLI overrides, then environment, then defaults.
 * Empty environment values count as unset.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): PacketConfig {
    const fromEnv = (key: string): string | undefined => env[key] || undefined;
    const outDir = overrides.outDir ?? fromEnv('VR_OUT_DIR') ?? DEFAULTS.OUT_DIR;

    return {
        siteUrl: overrides.siteUrl ?? fromEnv('SITE_URL') ?? DEFAULTS.SITE_URL,
        backstopConfig: overrides.backstopConfig ?? fromEnv('BACKSTOP_CONFIG') ?? DEFAULTS.BACKSTOP_CONFIG,
        backstopDir: overrides.backstopDir ?? fromEnv('BACKSTOP_DIR') ?? DEFAULTS.BACKSTOP_DIR,
        backstopBin: overrides.backstopBin ?? fromEnv('BACKSTOP_BIN') ?? DEFAULTS.BACKSTOP_BIN,
        reportDir: overrides.reportDir ?? fromEnv('VR_REPORT_DIR') ?? DEFAULTS.REPORT_DIR,
        htmlReportDir: overrides.htmlReportDir ?? fromEnv('VR_HTML_REPORT_DIR') ?? DEFAULTS.HTML_REPORT_DIR,
        outDir,
        summaryFile: path.join(outDir, OUTPUT_FILES.SUMMARY),
        packetFile: path.join(outDir, OUTPUT_FILES.PACKET),
        sampleLimit: overrides.sampleLimit ?? LIMITS.SAMPLES_PER_PAGE,
        systemPrompt: overrides.systemPrompt ?? loadSystemPrompt()
    };
}

export { DEFAULTS, LIMITS, OUTPUT_FILES };
