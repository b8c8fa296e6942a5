/**
 * Sandbox - one isolated package build per convergence round.
 *
 * A build failure is an outcome value, never an exception. Only a builder
 * that cannot be started at all raises (SANDBOX_UNAVAILABLE).
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { SANDBOX } from './config';
import { createLogger } from './logger';
import { ErrorFactory } from './structured_error';

const log = createLogger('sandbox');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface SandboxRequest {
    /** Package directory: holds the recipe, the sources and results/. */
    target: string;
    recipePath: string;
    packageName: string;
    version: string;
    release: number;
    round: number;
    mockConfig: string;
    mockOpts: readonly string[];
    /** Let mock clean the chroot after the build. */
    cleanup: boolean;
}

export interface SandboxOutcome {
    success: boolean;
    /** Installed files the recipe's %files list did not cover. */
    new_files: string[];
}

export interface SandboxBuilder {
    build(request: SandboxRequest): Promise<SandboxOutcome>;
}

export interface CommandResult {
    /** Exit status; null when the process was killed. */
    code: number | null;
    output: string;
    timedOut: boolean;
}

export type CommandRunner = (command: string, args: readonly string[], options: { cwd: string; timeoutMs: number }) => Promise<CommandResult>;

/* -------------------------------------------------------------------------- */
/* Build log analysis                                                         */
/* -------------------------------------------------------------------------- */

const UNPACKAGED_MARKER = 'Installed (but unpackaged) file(s) found:';

/** Paths listed under rpmbuild's unpackaged-files report. */
export function parseUnpackagedFiles(buildLog: string): string[] {
    const found: string[] = [];
    let inList = false;
    for (const raw of buildLog.split('\n')) {
        const line = raw.trim();
        if (line.includes(UNPACKAGED_MARKER)) {
            inList = true;
            continue;
        }
        if (!inList) continue;
        if (line.startsWith('/')) {
            found.push(line);
        } else {
            inList = false;
        }
    }
    return [...new Set(found)];
}

/* -------------------------------------------------------------------------- */
/* Process runner                                                             */
/* -------------------------------------------------------------------------- */

export const runCommand: CommandRunner = (command, args, { cwd, timeoutMs }) =>
    new Promise<CommandResult>((resolve, reject) => {
        const child = spawn(command, [...args], { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
        const chunks: Buffer[] = [];
        let settled = false;
        let timedOut = false;

        const timer = setTimeout(() => {
            timedOut = true;
            log.error(`${command} killed after ${timeoutMs}ms`);
            child.kill('SIGKILL');
        }, timeoutMs);

        child.stdout.on('data', (d: Buffer) => chunks.push(d));
        child.stderr.on('data', (d: Buffer) => chunks.push(d));

        child.on('error', (err) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            reject(ErrorFactory.sandboxUnavailable(command, err.message));
        });

        child.on('close', (code) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            resolve({ code, output: Buffer.concat(chunks).toString('utf-8'), timedOut });
        });
    });

/* -------------------------------------------------------------------------- */
/* Mock                                                                       */
/* -------------------------------------------------------------------------- */

export interface MockSandboxOptions {
    mockBin?: string;
    timeoutMs?: number;
    runner?: CommandRunner;
}

/** Builds the source RPM, then the binary RPMs, with mock; results land in `<target>/results`. */
export class MockSandbox implements SandboxBuilder {
    private readonly mockBin: string;
    private readonly timeoutMs: number;
    private readonly runner: CommandRunner;

    constructor(options: MockSandboxOptions = {}) {
        this.mockBin = options.mockBin ?? SANDBOX.MOCK_BIN;
        this.timeoutMs = options.timeoutMs ?? SANDBOX.TIMEOUT_MS;
        this.runner = options.runner ?? runCommand;
    }

    srpmArgs(req: SandboxRequest): string[] {
        return [
            '-r', req.mockConfig,
            '--buildsrpm',
            '--sources=./',
            `--spec=${path.basename(req.recipePath)}`,
            `--uniqueext=${req.packageName}`,
            `--result=${SANDBOX.RESULTS_DIR}/`,
            req.cleanup ? '--cleanup-after' : '--no-cleanup-after',
            ...req.mockOpts,
        ];
    }

    rpmArgs(req: SandboxRequest): string[] {
        return [
            '-r', req.mockConfig,
            `--result=${SANDBOX.RESULTS_DIR}/`,
            `${SANDBOX.RESULTS_DIR}/${req.packageName}-${req.version}-${req.release}.src.rpm`,
            '--enable-plugin=ccache',
            `--uniqueext=${req.packageName}`,
            req.cleanup ? '--cleanup-after' : '--no-cleanup-after',
            ...req.mockOpts,
        ];
    }

    async build(req: SandboxRequest): Promise<SandboxOutcome> {
        const results = path.join(req.target, SANDBOX.RESULTS_DIR);
        fs.mkdirSync(results, { recursive: true });

        const srpm = await this.run(req, this.srpmArgs(req), path.join(results, 'mock_srpm.log'));
        if (srpm.code !== 0) {
            log.warn('Source RPM build failed', { round: req.round, code: srpm.code, timed_out: srpm.timedOut });
            return { success: false, new_files: [] };
        }

        const rpm = await this.run(req, this.rpmArgs(req), path.join(results, 'mock_build.log'));
        const buildLog = path.join(results, 'build.log');
        const newFiles = fs.existsSync(buildLog) ? parseUnpackagedFiles(fs.readFileSync(buildLog, 'utf-8')) : [];
        if (rpm.code !== 0) {
            log.warn('Package build failed', { round: req.round, code: rpm.code, timed_out: rpm.timedOut, new_files: newFiles.length });
        }
        return { success: rpm.code === 0, new_files: newFiles };
    }

    private async run(req: SandboxRequest, args: string[], logFile: string): Promise<CommandResult> {
        log.info(`${this.mockBin} ${args.join(' ')}`);
        const result = await this.runner(this.mockBin, args, { cwd: req.target, timeoutMs: this.timeoutMs });
        fs.writeFileSync(logFile, result.output);
        return result;
    }
}
