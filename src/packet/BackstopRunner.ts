/**
 * BackstopRunner
 *
 * Shells out to the BackstopJS CLI. Backstop signals "differences found"
 * through its exit code, so a non-zero status is reported but never thrown.
 */

import { spawn } from 'child_process';
import { BACKSTOP_EXPECTED_EXIT_CODES } from '../config/constants.js';
import { ErrorHandler, ErrorSeverity } from '../shared/utils/index.js';
import { VisualDiffRunner } from './types.js';

export interface BackstopRunnerOptions {
    /** Backstop executable */
    bin: string;
    /** Directory the config file lives in */
    cwd: string;
    env?: NodeJS.ProcessEnv;
}

export class BackstopRunner implements VisualDiffRunner {
    private readonly env: NodeJS.ProcessEnv;

    constructor(private readonly options: BackstopRunnerOptions) {
        this.env = options.env ?? process.env;
    }

    async test(siteUrl: string, backstopConfig: string): Promise<number | null> {
        const code = await this.exec(
            ['test', `--config=${backstopConfig}`],
            { ...this.env, SITE_URL: siteUrl }
        );

        if (code !== null && !BACKSTOP_EXPECTED_EXIT_CODES.includes(code)) {
            console.warn(`[Backstop] Backstop returned unexpected exit code: ${code}`);
        }
        return code;
    }

    /**
     * Best-effort: open the HTML report in a browser
     */
    async openReport(backstopConfig: string): Promise<number | null> {
        return this.exec(['openReport', `--config=${backstopConfig}`], this.env);
    }

    private exec(args: string[], env: NodeJS.ProcessEnv): Promise<number | null> {
        console.log(`+ ${[this.options.bin, ...args].join(' ')}`);

        return new Promise(resolve => {
            let settled = false;
            const finish = (code: number | null) => {
                if (settled) return;
                settled = true;
                resolve(code);
            };

            const child = spawn(this.options.bin, args, {
                cwd: this.options.cwd,
                env,
                stdio: 'inherit',
                shell: false,
                windowsHide: true
            });

            child.on('error', (err) => {
                ErrorHandler.handle(
                    err,
                    { component: 'Backstop', operation: args[0], data: { bin: this.options.bin, cwd: this.options.cwd } },
                    ErrorSeverity.WARNING
                );
                finish(null);
            });

            child.on('close', (code) => finish(code));
        });
    }
}
