import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { CommandResult, CommandRunner, MockSandbox, SandboxRequest, parseUnpackagedFiles } from '../src/sandbox';

const BUILD_LOG = [
    'Processing files: demo-1.0-1.x86_64',
    'RPM build errors:',
    '    Installed (but unpackaged) file(s) found:',
    '   /usr/bin/demo',
    '   /usr/lib64/libdemo.so.1',
    '   /usr/bin/demo',
    'Child return code was: 1',
    '   /usr/share/not-in-list',
].join('\n');

test('parseUnpackagedFiles reads the list after the marker and stops at the first other line', () => {
    assert.deepEqual(parseUnpackagedFiles(BUILD_LOG), ['/usr/bin/demo', '/usr/lib64/libdemo.so.1']);
    assert.deepEqual(parseUnpackagedFiles('all good\n'), []);
});

interface Call {
    command: string;
    args: readonly string[];
    cwd: string;
}

function request(target: string, overrides: Partial<SandboxRequest> = {}): SandboxRequest {
    return {
        target,
        recipePath: path.join(target, 'demo.spec'),
        packageName: 'demo',
        version: '1.0',
        release: 3,
        round: 1,
        mockConfig: 'clear',
        mockOpts: ['--quiet'],
        cleanup: false,
        ...overrides,
    };
}

/** Runner that answers from a queue and records every call. */
function scripted(results: CommandResult[], calls: Call[], onRun?: (call: Call) => void): CommandRunner {
    return async (command, args, { cwd }) => {
        const call = { command, args, cwd };
        calls.push(call);
        onRun?.(call);
        const next = results.shift();
        if (!next) throw new Error('unexpected command');
        return next;
    };
}

function withTmp(fn: (dir: string) => Promise<void>): () => Promise<void> {
    return async () => {
        const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'sandbox-'));
        try {
            await fn(tmp);
        } finally {
            fs.rmSync(tmp, { recursive: true, force: true });
        }
    };
}

test('mock builds the source RPM, then the packages, and reports unpackaged files', withTmp(async dir => {
    const calls: Call[] = [];
    const runner = scripted(
        [
            { code: 0, output: 'srpm ok\n', timedOut: false },
            { code: 1, output: 'rpm failed\n', timedOut: false },
        ],
        calls,
        call => {
            if (call.args.includes('--buildsrpm')) return;
            fs.writeFileSync(path.join(dir, 'results', 'build.log'), BUILD_LOG);
        },
    );
    const sandbox = new MockSandbox({ mockBin: '/usr/bin/mock', timeoutMs: 1000, runner });

    const outcome = await sandbox.build(request(dir));
    assert.deepEqual(outcome, { success: false, new_files: ['/usr/bin/demo', '/usr/lib64/libdemo.so.1'] });

    assert.equal(calls.length, 2);
    assert.equal(calls[0].command, '/usr/bin/mock');
    assert.equal(calls[0].cwd, dir);
    assert.deepEqual(calls[0].args, [
        '-r', 'clear', '--buildsrpm', '--sources=./', '--spec=demo.spec', '--uniqueext=demo',
        '--result=results/', '--no-cleanup-after', '--quiet',
    ]);
    assert.deepEqual(calls[1].args, [
        '-r', 'clear', '--result=results/', 'results/demo-1.0-3.src.rpm', '--enable-plugin=ccache',
        '--uniqueext=demo', '--no-cleanup-after', '--quiet',
    ]);
    assert.equal(fs.readFileSync(path.join(dir, 'results', 'mock_srpm.log'), 'utf8'), 'srpm ok\n');
    assert.equal(fs.readFileSync(path.join(dir, 'results', 'mock_build.log'), 'utf8'), 'rpm failed\n');
}));

test('a failed source RPM stops the round without building packages', withTmp(async dir => {
    const calls: Call[] = [];
    const sandbox = new MockSandbox({ runner: scripted([{ code: 2, output: '', timedOut: false }], calls) });
    const outcome = await sandbox.build(request(dir, { cleanup: true }));
    assert.deepEqual(outcome, { success: false, new_files: [] });
    assert.equal(calls.length, 1);
    assert.ok(calls[0].args.includes('--cleanup-after'));
}));

test('a clean build succeeds with nothing new', withTmp(async dir => {
    const sandbox = new MockSandbox({
        runner: scripted([{ code: 0, output: '', timedOut: false }, { code: 0, output: '', timedOut: false }], []),
    });
    assert.deepEqual(await sandbox.build(request(dir)), { success: true, new_files: [] });
}));
