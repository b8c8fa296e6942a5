import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createBuildConfiguration, BuildConfigurationInput } from '../src/build_config';
import { ConvergenceDriver, DriverOptions, roundPhase } from '../src/convergence_driver';
import { PackagedFileList } from '../src/file_classifier';
import { BuildSystemKind } from '../src/kinds';
import { RoundLedger } from '../src/round_ledger';
import { RoundPolicy } from '../src/round_policy';
import { SandboxBuilder, SandboxOutcome, SandboxRequest } from '../src/sandbox';
import { ErrorFactory } from '../src/structured_error';
import { demoInput, demoSeed } from './helpers';

/** In-process sandbox: answers each round from `script` and keeps the recipe it was given. */
class ScriptedSandbox implements SandboxBuilder {
    readonly requests: SandboxRequest[] = [];
    readonly recipes: string[] = [];

    constructor(private readonly script: (round: number) => SandboxOutcome) { }

    async build(req: SandboxRequest): Promise<SandboxOutcome> {
        this.requests.push(req);
        this.recipes.push(fs.readFileSync(req.recipePath, 'utf8'));
        const results = path.join(req.target, 'results');
        fs.mkdirSync(results, { recursive: true });
        fs.writeFileSync(path.join(results, 'build.log'), `round ${req.round}\n`);
        return this.script(req.round);
    }
}

interface Harness {
    target: string;
    ledger: RoundLedger;
    classifier: PackagedFileList;
    options(sandbox: SandboxBuilder, input?: Partial<BuildConfigurationInput>, kind?: BuildSystemKind): DriverOptions;
}

function withHarness(fn: (h: Harness) => Promise<void>): () => Promise<void> {
    return async () => {
        const target = fs.mkdtempSync(path.join(os.tmpdir(), 'convergence-'));
        const ledger = new RoundLedger(':memory:');
        const classifier = new PackagedFileList();
        const options = (sandbox: SandboxBuilder, input: Partial<BuildConfigurationInput> = {}, kind: BuildSystemKind = 'configure'): DriverOptions => ({
            target,
            kind,
            config: createBuildConfiguration(demoInput(input)),
            seed: demoSeed(),
            sandbox,
            classifier,
            ledger,
            policy: new RoundPolicy({ maxRounds: 20 }),
            lockTimeoutMs: 0,
        });
        try {
            await fn({ target, ledger, classifier, options });
        } finally {
            ledger.close();
            fs.rmSync(target, { recursive: true, force: true });
        }
    };
}

test('a build that keeps turning up files stops after the round budget', withHarness(async h => {
    const sandbox = new ScriptedSandbox(round => ({ success: false, new_files: [`/usr/bin/tool${round}`] }));
    const result = await new ConvergenceDriver(h.options(sandbox)).run();

    assert.equal(result.status, 'BUDGET_EXHAUSTED');
    assert.equal(result.success, false);
    assert.equal(result.rounds, 21);
    assert.equal(sandbox.requests.length, 21);
    assert.equal(h.ledger.getRun(result.runId)?.state, 'DONE_FAILURE');
    assert.equal(h.ledger.listRounds(result.runId).length, 21);
}));

test('new files restart the loop and land in the final %files', withHarness(async h => {
    const sandbox = new ScriptedSandbox(round => round === 1
        ? { success: false, new_files: ['/usr/bin/demo', '/usr/lib64/libdemo.so.1'] }
        : { success: true, new_files: [] });
    const result = await new ConvergenceDriver(h.options(sandbox)).run();

    assert.equal(result.status, 'SUCCESS');
    assert.equal(result.rounds, 2);
    assert.deepEqual(result.outcomes.map(o => o.must_restart), [1, 0]);
    assert.equal(h.ledger.getRun(result.runId)?.state, 'DONE_SUCCESS');

    assert.equal(sandbox.recipes[0].includes('/usr/bin/demo'), false);
    const recipe = fs.readFileSync(result.recipePath, 'utf8');
    assert.ok(recipe.endsWith('%files\n%defattr(-,root,root,-)\n/usr/bin/demo\n/usr/lib64/libdemo.so.1\n'));
    assert.equal(result.recipePath, path.join(h.target, 'demo.spec'));
}));

test('a stable failing round ends the run as failed', withHarness(async h => {
    const sandbox = new ScriptedSandbox(() => ({ success: false, new_files: [] }));
    const result = await new ConvergenceDriver(h.options(sandbox)).run();
    assert.equal(result.status, 'FAILED');
    assert.equal(result.rounds, 1);
    assert.equal(h.ledger.getRun(result.runId)?.state, 'DONE_FAILURE');
}));

test('a successful external GEN round hands over to USE', withHarness(async h => {
    const sandbox = new ScriptedSandbox(() => ({ success: true, new_files: [] }));
    const result = await new ConvergenceDriver(h.options(sandbox, { options: { altflags_pgo_ext: true } })).run();

    assert.equal(result.status, 'SUCCESS');
    assert.equal(result.rounds, 2);
    assert.deepEqual(result.outcomes.map(o => o.pgo_phase), ['GEN', 'USE']);
    assert.equal(result.config.options.altflags_pgo_ext_phase, true);
    assert.ok(sandbox.recipes[0].includes('echo PGO Phase 1'));
    assert.equal(sandbox.recipes[1].includes('echo PGO Phase 1'), false);
    assert.ok(sandbox.recipes[1].includes('echo PGO Phase 2'));
}));

test('a failed GEN round stays in GEN', withHarness(async h => {
    const sandbox = new ScriptedSandbox(round => ({ success: false, new_files: round === 1 ? ['/usr/bin/demo'] : [] }));
    const result = await new ConvergenceDriver(h.options(sandbox, { options: { altflags_pgo_ext: true } })).run();
    assert.deepEqual(result.outcomes.map(o => o.pgo_phase), ['GEN', 'GEN']);
    assert.equal(result.config.options.altflags_pgo_ext_phase, false);
}));

test('round requests carry the package identity and each round log is archived', withHarness(async h => {
    const sandbox = new ScriptedSandbox(round => ({ success: true, new_files: round === 1 ? ['/usr/bin/demo'] : [] }));
    await new ConvergenceDriver({ ...h.options(sandbox), header: { release: 4 }, mockOpts: ['--quiet'] }).run();

    assert.deepEqual(sandbox.requests.map(r => [r.round, r.packageName, r.version, r.release, r.mockConfig]), [
        [1, 'demo', '1.0', 4, 'clear'],
        [2, 'demo', '1.0', 4, 'clear'],
    ]);
    assert.deepEqual(sandbox.requests[0].mockOpts, ['--quiet']);
    assert.deepEqual(fs.readdirSync(path.join(h.target, 'results')).sort(), ['round1-build.log', 'round2-build.log']);
}));

test('a sandbox that cannot start fails the run and releases the lock', withHarness(async h => {
    const sandbox: SandboxBuilder = {
        build: async () => {
            throw ErrorFactory.sandboxUnavailable('mock', 'spawn mock ENOENT');
        },
    };
    await assert.rejects(new ConvergenceDriver(h.options(sandbox)).run(), /Sandbox command mock could not be started/);

    const run = h.ledger.latestRun('demo');
    assert.equal(run?.state, 'DONE_FAILURE');
    assert.equal(fs.existsSync(path.join(h.target, '.recipe-forge.lock')), false);
}));

test('roundPhase is null outside external PGO', () => {
    assert.equal(roundPhase('configure', createBuildConfiguration({ name: 'demo' })), null);
    assert.equal(roundPhase('configure', createBuildConfiguration({ name: 'demo', options: { altflags_pgo_ext: true } })), 'GEN');
    assert.equal(roundPhase('scons', createBuildConfiguration({ name: 'demo', options: { altflags_pgo_ext: true } })), null);
});
