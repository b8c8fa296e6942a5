#!/usr/bin/env node
/**
 * CLI Entry Point for recipe-forge
 */

import * as fs from 'fs';
import * as path from 'path';
import { LEDGER_FILE, MAX_ROUNDS } from './config';
import { ConvergenceDriver } from './convergence_driver';
import { PackagedFileList } from './file_classifier';
import { createLogger } from './logger';
import { loadPackageConfig } from './package_config';
import { writeRecipe } from './recipe_io/recipe_writer';
import { RoundLedger } from './round_ledger';
import { RoundPolicy } from './round_policy';
import { MockSandbox, SandboxBuilder } from './sandbox';
import { SourceLayout } from './source_layout';
import { ErrorFactory, RecipeError, isPrecondition } from './structured_error';
import { synthesize } from './synthesizer';

const log = createLogger('cli');

export const EXIT = {
    OK: 0,
    BUILD_FAILED: 1,
    BUDGET_EXHAUSTED: 2,
    INVALID_INPUT: 3,
    INFRASTRUCTURE: 4,
} as const;

export interface CliDependencies {
    /** Builder used by `build`; defaults to mock. */
    sandbox?: SandboxBuilder;
    maxRounds?: number;
}

function flagValue(args: string[], short: string, long: string): string | undefined {
    for (const flag of [short, long]) {
        const idx = args.indexOf(flag);
        if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
    }
    return undefined;
}

function hasFlag(args: string[], short: string, long: string): boolean {
    return args.includes(short) || args.includes(long);
}

export function exitCodeFor(err: RecipeError): number {
    if (isPrecondition(err.code)) return EXIT.INVALID_INPUT;
    if (err.code === 'ROUND_BUDGET_EXHAUSTED') return EXIT.BUDGET_EXHAUSTED;
    return EXIT.INFRASTRUCTURE;
}

class RecipeForgeCLI {
    constructor(private readonly deps: CliDependencies = {}) { }

    /** Run one command; `args` is the full argv. Resolves to the process exit code. */
    async run(args: string[]): Promise<number> {
        const command = args[2] || 'help';
        const rest = args.slice(3);

        try {
            switch (command) {
                case 'generate':
                    return this.runGenerate(rest);
                case 'build':
                    return await this.runBuild(rest);
                case 'status':
                    return this.runStatus(rest);
                case 'help':
                    this.showHelp();
                    return EXIT.OK;
                default:
                    console.error(`Unknown command: ${command}`);
                    this.showHelp();
                    return EXIT.INVALID_INPUT;
            }
        } catch (err) {
            if (err instanceof RecipeError) {
                console.error(`${err.code}: ${err.message}`);
                for (const option of err.detail.recovery_options) {
                    console.error(`   ${option.description}`);
                }
                return exitCodeFor(err);
            }
            throw err;
        }
    }

    private target(args: string[]): string {
        return path.resolve(flagValue(args, '-t', '--target') ?? '.');
    }

    private runGenerate(args: string[]): number {
        const target = this.target(args);
        const { kind, config, seed } = loadPackageConfig(target);
        const classifier = PackagedFileList.load(target);
        const body = synthesize(kind, config, new SourceLayout(seed));
        const warnings: string[] = [];
        const file = writeRecipe(target, { config, seed, body, files: classifier.filesSection() }, warnings);
        for (const w of warnings) log.warn(w);
        console.log(`Wrote ${file}`);
        return EXIT.OK;
    }

    private async runBuild(args: string[]): Promise<number> {
        const target = this.target(args);
        const { kind, config, seed } = loadPackageConfig(target);
        const classifier = PackagedFileList.load(target);
        const mockOpts = (flagValue(args, '-o', '--mock-opts') ?? '').split(/\s+/).filter(o => o.length > 0);
        const maxRounds = this.deps.maxRounds ?? MAX_ROUNDS;

        const ledger = new RoundLedger(path.join(target, LEDGER_FILE));
        try {
            const driver = new ConvergenceDriver({
                target,
                kind,
                config,
                seed,
                sandbox: this.deps.sandbox ?? new MockSandbox(),
                classifier,
                ledger,
                policy: new RoundPolicy({ maxRounds }),
                mockConfig: flagValue(args, '-m', '--mock-config'),
                mockOpts,
                cleanup: hasFlag(args, '-C', '--cleanup'),
            });
            const result = await driver.run();

            const warnings: string[] = [];
            classifier.save(target, warnings);
            for (const w of warnings) log.warn(w);

            if (result.status === 'SUCCESS') {
                console.log(`Build succeeded after ${result.rounds} round(s): ${result.recipePath}`);
                return EXIT.OK;
            }
            if (result.status === 'FAILED') {
                console.error('Build failed, aborting');
                return EXIT.BUILD_FAILED;
            }
            throw ErrorFactory.roundBudgetExhausted(result.rounds, maxRounds);
        } finally {
            ledger.close();
        }
    }

    private runStatus(args: string[]): number {
        const target = this.target(args);
        const dbPath = path.join(target, LEDGER_FILE);
        if (!fs.existsSync(dbPath)) {
            console.log('No runs recorded.');
            return EXIT.OK;
        }

        const ledger = new RoundLedger(dbPath);
        try {
            const run = ledger.latestRun();
            if (!run) {
                console.log('No runs recorded.');
                return EXIT.OK;
            }
            console.log(`Run ${run.runId}`);
            console.log(`   Package: ${run.packageName} (${run.kind})`);
            console.log(`   State: ${run.state}`);
            console.log(`   Rounds: ${run.rounds}`);
            for (const r of ledger.listRounds(run.runId)) {
                const phase = r.pgo_phase ? ` pgo=${r.pgo_phase}` : '';
                console.log(`   round ${r.round}: ${r.success ? 'ok' : 'failed'} restart=${r.must_restart} new_files=${r.new_files.length}${phase}`);
            }
            return EXIT.OK;
        } finally {
            ledger.close();
        }
    }

    private showHelp(): void {
        console.log(`
recipe-forge - RPM recipe synthesis and convergence builds

USAGE:
  recipe-forge <command> [options]

COMMANDS:
  generate            Write <name>.spec from options.json without building
  build               Build with mock until the recipe converges
  status              Show the last run and its rounds
  help                Show this help

OPTIONS:
  -t, --target <dir>        Package directory holding options.json (default: .)
  -m, --mock-config <cfg>   mock chroot configuration (default: clear)
  -o, --mock-opts "<opts>"  Extra mock arguments
  -C, --cleanup             Let mock clean the chroot after each build

EXIT CODES:
  0 success, 1 build failed, 2 round budget exhausted,
  3 invalid package configuration, 4 infrastructure failure
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new RecipeForgeCLI();
    cli.run(process.argv).then(
        (code) => process.exit(code),
        (err: unknown) => {
            console.error('Fatal error:', err);
            process.exit(EXIT.INFRASTRUCTURE);
        },
    );
}

export { RecipeForgeCLI };
