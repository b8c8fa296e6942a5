import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { RoundLedger } from '../src/round_ledger';
import { RecipeError } from '../src/structured_error';

function isLedgerError(message: RegExp) {
    return (err: unknown) => err instanceof RecipeError && err.code === 'LEDGER_ERROR' && message.test(err.message);
}

test('a run moves from BUILDING to a terminal state exactly once', () => {
    const ledger = new RoundLedger(':memory:');
    try {
        ledger.createRun('run-1', 'demo', 'cmake');
        assert.equal(ledger.getRun('run-1')?.state, 'BUILDING');

        ledger.transition('run-1', 'DONE_SUCCESS');
        assert.equal(ledger.getRun('run-1')?.state, 'DONE_SUCCESS');
        assert.throws(() => ledger.transition('run-1', 'DONE_FAILURE'), isLedgerError(/Invalid run transition DONE_SUCCESS -> DONE_FAILURE/));
        assert.throws(() => ledger.transition('missing', 'DONE_FAILURE'), isLedgerError(/Run not found: missing/));
        assert.equal(ledger.getRun('missing'), null);
    } finally {
        ledger.close();
    }
});

test('rounds are stored in order and update the run counter', () => {
    const ledger = new RoundLedger(':memory:');
    try {
        ledger.createRun('run-1', 'demo', 'configure');
        ledger.recordRound('run-1', { round: 1, success: false, must_restart: 1, pgo_phase: 'GEN', new_files: ['/usr/lib64/b.so', '/usr/bin/a'] });
        ledger.recordRound('run-1', { round: 2, success: true, must_restart: 0, pgo_phase: null, new_files: [] });

        assert.deepEqual(ledger.listRounds('run-1'), [
            { round: 1, success: false, must_restart: 1, pgo_phase: 'GEN', new_files: ['/usr/lib64/b.so', '/usr/bin/a'] },
            { round: 2, success: true, must_restart: 0, pgo_phase: null, new_files: [] },
        ]);
        assert.equal(ledger.getRun('run-1')?.rounds, 2);
    } finally {
        ledger.close();
    }
});

test('cached run records follow every write and are returned as copies', () => {
    const ledger = new RoundLedger(':memory:');
    try {
        ledger.createRun('run-1', 'demo', 'cmake');
        const first = ledger.getRun('run-1');
        assert.equal(first?.rounds, 0);
        if (first) first.state = 'DONE_FAILURE';
        assert.equal(ledger.getRun('run-1')?.state, 'BUILDING');

        ledger.recordRound('run-1', { round: 1, success: true, must_restart: 0, pgo_phase: null, new_files: [] });
        assert.equal(ledger.getRun('run-1')?.rounds, 1);

        ledger.transition('run-1', 'DONE_SUCCESS');
        assert.equal(ledger.getRun('run-1')?.state, 'DONE_SUCCESS');
    } finally {
        ledger.close();
    }
});

test('a finished run takes no more rounds', () => {
    const ledger = new RoundLedger(':memory:');
    try {
        ledger.createRun('run-1', 'demo', 'configure');
        ledger.transition('run-1', 'DONE_FAILURE');
        assert.throws(
            () => ledger.recordRound('run-1', { round: 1, success: false, must_restart: 0, pgo_phase: null, new_files: [] }),
            isLedgerError(/is DONE_FAILURE; cannot record round 1/),
        );
        assert.deepEqual(ledger.listRounds('run-1'), []);
    } finally {
        ledger.close();
    }
});

test('latestRun picks the newest run, optionally per package', () => {
    const ledger = new RoundLedger(':memory:');
    try {
        assert.equal(ledger.latestRun(), null);
        ledger.createRun('run-1', 'demo', 'cmake');
        ledger.createRun('run-2', 'other', 'meson');
        ledger.createRun('run-3', 'demo', 'cmake');
        assert.equal(ledger.latestRun()?.runId, 'run-3');
        assert.equal(ledger.latestRun('other')?.runId, 'run-2');
        assert.equal(ledger.latestRun('nobody'), null);
    } finally {
        ledger.close();
    }
});

test('the ledger survives reopening from disk', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'round-ledger-'));
    const dbPath = path.join(tmp, 'ledger.db');
    try {
        const first = new RoundLedger(dbPath);
        first.createRun('run-1', 'demo', 'cargo');
        first.recordRound('run-1', { round: 1, success: true, must_restart: 0, pgo_phase: 'USE', new_files: [] });
        first.close();

        const second = new RoundLedger(dbPath);
        try {
            assert.equal(second.latestRun('demo')?.kind, 'cargo');
            assert.equal(second.listRounds('run-1')[0].pgo_phase, 'USE');
        } finally {
            second.close();
        }
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});
