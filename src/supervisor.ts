/**
 * Run modes and in-process supervision of the merge loop.
 *
 * The core runs in exactly two modes: one pass and return, or passes forever
 * with a delay between them. A stop request takes effect between passes;
 * a pass is never cancelled midway.
 */

import { setTimeout as delay } from 'timers/promises';

import { MergePassResult } from './merge_driver';
import { StructuredError, describeError } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('supervisor');

/** Anything that can run one merge pass; MergeDriver in production. */
export interface PassRunner {
    runPass(): Promise<MergePassResult>;
}

export interface SupervisorStatus {
    running: boolean;
    startedAt: string | null;
    intervalSeconds: number | null;
    passCount: number;
    lastResult: MergePassResult | null;
    lastError: StructuredError | null;
}

export type RunOnceResult =
    | { started: true; result: MergePassResult }
    | { started: false; reason: 'busy' };

/** Start/stop/status capability a dashboard or service wrapper drives. */
export interface Supervisor {
    start(intervalSeconds: number): SupervisorStatus;
    stop(): Promise<SupervisorStatus>;
    status(): SupervisorStatus;
    /** Refuses while a loop or another pass is active. */
    runOnce(): Promise<RunOnceResult>;
}

/* -------------------------------------------------------------------------- */
/* Run modes                                                                  */
/* -------------------------------------------------------------------------- */

export function runOnce(runner: PassRunner): Promise<MergePassResult> {
    return runner.runPass();
}

/**
 * Run passes until `signal` aborts. A failed pass is logged and the next one
 * still runs after the interval.
 */
export async function runForever(
    runner: PassRunner,
    intervalSeconds: number,
    signal: AbortSignal,
    onPass?: (result: MergePassResult) => void
): Promise<void> {
    while (!signal.aborted) {
        try {
            const result = await runner.runPass();
            onPass?.(result);
        } catch (e) {
            log.error('pass failed, continuing loop', describeError(e));
        }
        if (signal.aborted) break;

        log.info('sleeping', { seconds: intervalSeconds });
        try {
            await delay(intervalSeconds * 1000, undefined, { signal });
        } catch (e) {
            if (!signal.aborted) throw e;
        }
    }
    log.info('loop stopped');
}

/* -------------------------------------------------------------------------- */
/* In-process supervisor                                                      */
/* -------------------------------------------------------------------------- */

export class InProcessSupervisor implements Supervisor {
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;
    private passActive = false;
    private startedAt: string | null = null;
    private intervalSeconds: number | null = null;
    private passCount = 0;
    private lastResult: MergePassResult | null = null;
    private lastError: StructuredError | null = null;

    private readonly tracked: PassRunner;

    constructor(runner: PassRunner) {
        this.tracked = {
            runPass: async () => {
                this.passActive = true;
                try {
                    const result = await runner.runPass();
                    this.lastResult = result;
                    this.lastError = null;
                    return result;
                } catch (e) {
                    this.lastError = describeError(e);
                    throw e;
                } finally {
                    this.passActive = false;
                    this.passCount++;
                }
            },
        };
    }

    start(intervalSeconds: number): SupervisorStatus {
        if (this.controller) return this.status();

        const controller = new AbortController();
        this.controller = controller;
        this.startedAt = new Date().toISOString();
        this.intervalSeconds = intervalSeconds;
        log.info('loop started', { interval_seconds: intervalSeconds });

        this.loop = runForever(this.tracked, intervalSeconds, controller.signal).catch((e: unknown) => {
            this.lastError = describeError(e);
            log.error('loop crashed', this.lastError);
        });
        return this.status();
    }

    async stop(): Promise<SupervisorStatus> {
        if (this.controller) {
            this.controller.abort();
            await this.loop;
        }
        this.controller = null;
        this.loop = null;
        this.startedAt = null;
        this.intervalSeconds = null;
        return this.status();
    }

    status(): SupervisorStatus {
        return {
            running: this.controller !== null,
            startedAt: this.startedAt,
            intervalSeconds: this.intervalSeconds,
            passCount: this.passCount,
            lastResult: this.lastResult,
            lastError: this.lastError,
        };
    }

    async runOnce(): Promise<RunOnceResult> {
        if (this.controller || this.passActive) {
            log.warn('run-once refused, a pass is already active');
            return { started: false, reason: 'busy' };
        }
        return { started: true, result: await this.tracked.runPass() };
    }
}
