import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';

import { MergePassResult } from '../src/merge_driver';
import { InProcessSupervisor, PassRunner, runForever, runOnce } from '../src/supervisor';
import { configureLogging } from '../src/logger';

configureLogging({ level: 'error' });

function fakeResult(passId: string, processed = 0): MergePassResult {
    return {
        passId,
        startedAt: '2024-01-01T00:00:00.000Z',
        finishedAt: '2024-01-01T00:00:00.010Z',
        durationMs: 10,
        candidates: processed,
        alreadyRecorded: 0,
        processed,
        succeeded: processed,
        failed: 0,
        recovery: { action: 'none' },
        files: [],
    };
}

async function waitFor(condition: () => boolean): Promise<void> {
    for (let i = 0; i < 200 && !condition(); i++) {
        await delay(5);
    }
    assert.ok(condition(), 'condition not reached');
}

test('runOnce runs exactly one pass', async () => {
    let calls = 0;
    const runner: PassRunner = {
        runPass: async () => fakeResult(`pass-${++calls}`, 3),
    };
    const result = await runOnce(runner);
    assert.equal(calls, 1);
    assert.equal(result.passId, 'pass-1');
    assert.equal(result.processed, 3);
});

test('runForever keeps going after a failed pass and stops between passes', async () => {
    const controller = new AbortController();
    const seen: string[] = [];
    let calls = 0;
    const runner: PassRunner = {
        runPass: async () => {
            calls++;
            if (calls === 1) throw new Error('input folder vanished');
            if (calls === 3) controller.abort();
            return fakeResult(`pass-${calls}`);
        },
    };

    await runForever(runner, 0.01, controller.signal, (r) => seen.push(r.passId));
    assert.equal(calls, 3);
    assert.deepEqual(seen, ['pass-2', 'pass-3']);
});

test('runForever wakes from its sleep when stopped', async () => {
    const controller = new AbortController();
    let calls = 0;
    const runner: PassRunner = {
        runPass: async () => fakeResult(`pass-${++calls}`),
    };

    const started = Date.now();
    await runForever(runner, 3600, controller.signal, () => {
        setTimeout(() => controller.abort(), 10);
    });
    assert.equal(calls, 1);
    assert.ok(Date.now() - started < 5000);
});

test('supervisor start, status and stop', async () => {
    let calls = 0;
    const supervisor = new InProcessSupervisor({
        runPass: async () => fakeResult(`pass-${++calls}`, 1),
    });

    assert.equal(supervisor.status().running, false);
    const started = supervisor.start(3600);
    assert.equal(started.running, true);
    assert.equal(started.intervalSeconds, 3600);
    assert.equal(supervisor.start(60).intervalSeconds, 3600);

    await waitFor(() => supervisor.status().passCount === 1);
    assert.deepEqual(await supervisor.runOnce(), { started: false, reason: 'busy' });

    const stopped = await supervisor.stop();
    assert.equal(stopped.running, false);
    assert.equal(stopped.startedAt, null);
    assert.equal(stopped.passCount, 1);
    assert.equal(stopped.lastResult?.passId, 'pass-1');

    const once = await supervisor.runOnce();
    assert.equal(once.started, true);
    assert.equal(supervisor.status().passCount, 2);
});

test('run-once is refused while another pass is active and records failures', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
        release = resolve;
    });
    let calls = 0;
    const supervisor = new InProcessSupervisor({
        runPass: async () => {
            calls++;
            if (calls === 1) {
                await gate;
                return fakeResult('slow');
            }
            throw new Error('ledger unreadable');
        },
    });

    const first = supervisor.runOnce();
    assert.deepEqual(await supervisor.runOnce(), { started: false, reason: 'busy' });
    release();
    assert.equal((await first).started, true);

    await assert.rejects(supervisor.runOnce(), /ledger unreadable/);
    const status = supervisor.status();
    assert.equal(status.lastError?.code, 'UNKNOWN');
    assert.equal(status.lastError?.message, 'ledger unreadable');
    assert.equal(status.lastResult?.passId, 'slow');
    assert.equal(status.passCount, 2);
});
