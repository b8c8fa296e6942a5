/**
 * Convergence Driver
 *
 * Runs the synthesize -> sandbox build -> reclassify loop for one package
 * until a round asks for no restart or the round budget runs out.
 *
 *   BUILDING -> BUILDING        a round turned up files or flipped the PGO phase
 *   BUILDING -> DONE_SUCCESS    a stable round whose build succeeded
 *   BUILDING -> DONE_FAILURE    a stable failed round, an exhausted budget or a thrown error
 *
 * Round state (round, must_restart, success) lives here only; synthesis
 * never sees it. The one configuration change the driver makes itself is the
 * external PGO hand-off from GEN to USE.
 */

import * as crypto from 'crypto';
import * as path from 'path';
import { BuildConfiguration, withOption } from './build_config';
import { LOCK, SANDBOX } from './config';
import { FileClassifier } from './file_classifier';
import { BuildSystemKind } from './kinds';
import { archiveRoundLogs } from './log_archive';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { externalPhase, resolvePgoMode } from './pgo';
import { acquireBuildLock, releaseBuildLock } from './recipe_io/lock';
import { RecipeHeader, writeRecipe } from './recipe_io/recipe_writer';
import { RoundLedger, RoundPhase, RoundRecord } from './round_ledger';
import { RoundAction, RoundPolicy } from './round_policy';
import { SandboxBuilder } from './sandbox';
import { SourceLayout, SourceSeed } from './source_layout';
import { synthesize } from './synthesizer';

const log = createLogger('driver');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type RunStatus = 'SUCCESS' | 'FAILED' | 'BUDGET_EXHAUSTED';

export interface DriverOptions {
    target: string;
    kind: BuildSystemKind;
    config: BuildConfiguration;
    seed: SourceSeed;
    sandbox: SandboxBuilder;
    classifier: FileClassifier;
    ledger: RoundLedger;
    policy?: RoundPolicy;
    header?: Partial<RecipeHeader>;
    mockConfig?: string;
    mockOpts?: readonly string[];
    cleanup?: boolean;
    lockTimeoutMs?: number;
}

export interface DriverResult {
    runId: string;
    status: RunStatus;
    success: boolean;
    rounds: number;
    must_restart: number;
    /** Configuration after the last round, including any PGO phase hand-off. */
    config: BuildConfiguration;
    recipePath: string;
    outcomes: RoundRecord[];
    warnings: string[];
}

/** Phase a recipe synthesized from `config` runs under external PGO, null otherwise. */
export function roundPhase(kind: BuildSystemKind, config: BuildConfiguration): RoundPhase | null {
    return resolvePgoMode(config, kind) === 'EXTERNAL' ? externalPhase(config) : null;
}

function statusFor(action: RoundAction, success: boolean): RunStatus {
    if (action === 'BUDGET_EXHAUSTED') return 'BUDGET_EXHAUSTED';
    return success ? 'SUCCESS' : 'FAILED';
}

/* -------------------------------------------------------------------------- */
/* Convergence Driver                                                         */
/* -------------------------------------------------------------------------- */

export class ConvergenceDriver {
    private readonly policy: RoundPolicy;

    constructor(private readonly opts: DriverOptions) {
        this.policy = opts.policy ?? new RoundPolicy();
    }

    private writeRecipeFor(config: BuildConfiguration, warnings: string[]): string {
        const { kind, seed, target, classifier, header } = this.opts;
        const body = synthesize(kind, config, new SourceLayout(seed));
        return writeRecipe(target, { config, seed, body, files: classifier.filesSection(), header }, warnings);
    }

    async run(): Promise<DriverResult> {
        const { target, kind, seed, sandbox, classifier, ledger } = this.opts;
        const warnings: string[] = [];
        const runId = crypto.randomUUID();
        const name = this.opts.config.name;

        const lock = await acquireBuildLock({
            lockPath: path.join(target, LOCK.FILE),
            timeoutMs: this.opts.lockTimeoutMs ?? LOCK.TIMEOUT_MS,
            staleTtlMs: LOCK.STALE_TTL_MS,
            identity: { package: name, command: 'build' },
            warnings,
        });

        setCorrelation({ runId, packageName: name });
        ledger.createRun(runId, name, kind);

        let config = this.opts.config;
        let round = 0;
        let mustRestart = 0;
        let success = false;
        let action: RoundAction = 'RETRY';
        const outcomes: RoundRecord[] = [];

        try {
            while (action === 'RETRY') {
                round++;
                setCorrelation({ round, phase: 'synthesize' });

                const phase = roundPhase(kind, config);
                const recipePath = this.writeRecipeFor(config, warnings);

                setCorrelation({ phase: 'sandbox' });
                log.info(`Round ${round}: building ${path.basename(recipePath)}`, phase ? { pgo_phase: phase } : undefined);
                const outcome = await sandbox.build({
                    target,
                    recipePath,
                    packageName: name,
                    version: config.version,
                    release: this.opts.header?.release ?? 1,
                    round,
                    mockConfig: this.opts.mockConfig ?? SANDBOX.DEFAULT_CHROOT,
                    mockOpts: this.opts.mockOpts ?? [],
                    cleanup: this.opts.cleanup ?? false,
                });

                success = outcome.success;
                mustRestart = 0;
                if (classifier.reclassify(outcome.new_files)) {
                    mustRestart++;
                    log.info(`Round ${round}: ${outcome.new_files.length} new file(s) reclassified`);
                }
                if (success && phase === 'GEN') {
                    config = withOption(config, 'altflags_pgo_ext_phase', true);
                    mustRestart++;
                    log.info(`Round ${round}: profile generated, next round uses it`);
                }

                const record: RoundRecord = { round, success, must_restart: mustRestart, pgo_phase: phase, new_files: outcome.new_files };
                outcomes.push(record);
                ledger.recordRound(runId, record);
                archiveRoundLogs(target, round);

                const decision = this.policy.decide({ round, must_restart: mustRestart, success });
                log.debug(decision.reasoning);
                action = decision.action;
            }

            setCorrelation({ phase: 'finish' });
            const recipePath = this.writeRecipeFor(config, warnings);
            const status = statusFor(action, success);
            ledger.transition(runId, status === 'SUCCESS' ? 'DONE_SUCCESS' : 'DONE_FAILURE');

            if (status === 'BUDGET_EXHAUSTED') {
                log.error(`Gave up after round ${round}`, { limit: this.policy.maxRounds });
            } else {
                log.info(`Finished after ${round} round(s)`, { success });
            }
            for (const w of warnings) log.warn(w);

            return { runId, status, success: status === 'SUCCESS', rounds: round, must_restart: mustRestart, config, recipePath, outcomes, warnings };
        } catch (e) {
            const run = ledger.getRun(runId);
            if (run?.state === 'BUILDING') ledger.transition(runId, 'DONE_FAILURE');
            throw e;
        } finally {
            releaseBuildLock(lock);
            clearCorrelation();
        }
    }
}
