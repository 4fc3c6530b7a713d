/* Merge Driver - one incremental merge pass
 *
 * Per pass:
 *   idle -> listing -> { extracting -> appending -> persisting -> recording }* -> idle
 *
 * - Pass lock on <artifact>.lock: one pass per (input, artifact, ledger) at a time
 * - Journal reconciliation before the ledger is read (see merge_journal.ts)
 * - Candidates visited in lexicographic filename order; ledgered names are never retried
 * - A file is ledgered `success` only after its artifact write has landed
 * - Per-file failures are ledgered `error` and the in-memory artifact is reloaded
 *   from disk; StorageError / LedgerIOError / LockHeldError abort the pass
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

import { ArtifactHandle, ArtifactStore, DocxArtifactStore } from './artifact_store';
import { MergeConfig, artifactPath } from './config';
import { ContentBlock } from './content_blocks';
import { DocumentAdapter, InputFile, createDocumentAdapter } from './document_adapter';
import { LockHandle, acquireLock, releaseLock } from './durable';
import { CsvLedger, Ledger, LedgerOutcome } from './ledger';
import { MergeJournal, ReconcileOutcome } from './merge_journal';
import { describeError, isPassFatal } from './structured_error';
import { clearCorrelation, createLogger, setCorrelation } from './logger';

const log = createLogger('driver');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type DriverState = 'idle' | 'listing' | 'extracting' | 'appending' | 'persisting' | 'recording';

export interface FileOutcome {
    filename: string;
    outcome: LedgerOutcome;
    blocks: number;
    error?: { code: string; message: string };
}

export interface MergePassResult {
    passId: string;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    /** Files with the document extension in the input folder */
    candidates: number;
    /** Candidates skipped because the ledger already has them */
    alreadyRecorded: number;
    processed: number;
    succeeded: number;
    failed: number;
    recovery: ReconcileOutcome;
    files: FileOutcome[];
}

export interface MergeDriverDeps {
    config: MergeConfig;
    ledger?: Ledger;
    store?: ArtifactStore;
    adapter?: DocumentAdapter;
    /** Defaults to `<ledgerPath>.pending.json` when config.writeAheadJournal is on */
    journal?: MergeJournal;
}

const WORD_OWNER_FILE_PREFIX = '~$';

/* -------------------------------------------------------------------------- */
/* Driver                                                                     */
/* -------------------------------------------------------------------------- */

export class MergeDriver {
    readonly config: MergeConfig;
    private readonly ledger: Ledger;
    private readonly store: ArtifactStore;
    private readonly adapter: DocumentAdapter;
    private readonly journal: MergeJournal | null;
    private readonly artifactPath: string;
    private _state: DriverState = 'idle';

    constructor(deps: MergeDriverDeps) {
        this.config = deps.config;
        this.ledger = deps.ledger ?? new CsvLedger(deps.config.ledgerPath);
        this.store = deps.store ?? new DocxArtifactStore();
        this.adapter = deps.adapter ?? createDocumentAdapter(deps.config.strategy);
        this.journal = deps.config.writeAheadJournal
            ? deps.journal ?? MergeJournal.forLedger(deps.config.ledgerPath)
            : null;
        this.artifactPath = artifactPath(deps.config);
    }

    get state(): DriverState {
        return this._state;
    }

    /** Input file names with the document extension, sorted by code point. */
    listCandidates(): string[] {
        const ext = this.config.documentExtension.toLowerCase();
        return fs
            .readdirSync(this.config.inputFolder, { withFileTypes: true })
            .filter((d) => d.isFile())
            .map((d) => d.name)
            .filter((name) => name.toLowerCase().endsWith(ext) && !name.startsWith(WORD_OWNER_FILE_PREFIX))
            .sort();
    }

    async runPass(): Promise<MergePassResult> {
        const passId = crypto.randomUUID();
        const started = Date.now();
        const startedAt = new Date(started).toISOString();
        setCorrelation({ passId });

        log.info('merge pass started', {
            input_folder: this.config.inputFolder,
            artifact: this.artifactPath,
            ledger: this.config.ledgerPath,
            strategy: this.adapter.strategy,
            journal: this.journal !== null,
        });

        const warnings: string[] = [];
        let lock: LockHandle;
        try {
            lock = await acquireLock({
                lockPath: `${this.artifactPath}.lock`,
                timeoutMs: this.config.lockTimeoutMs,
                warnings,
                identity: { pass_id: passId, action: 'merge-pass' },
            });
        } catch (e) {
            log.error('merge pass aborted', describeError(e));
            clearCorrelation();
            throw e;
        }
        for (const w of warnings) log.warn('pass lock', { warning: w });

        try {
            fs.mkdirSync(this.config.inputFolder, { recursive: true });
            fs.mkdirSync(this.config.outputFolder, { recursive: true });

            const recovery: ReconcileOutcome = this.journal
                ? this.journal.reconcile(this.ledger, this.artifactPath)
                : { action: 'none' };

            const { outcomes } = this.ledger.load();

            this._state = 'listing';
            const candidates = this.listCandidates();
            const pending = candidates.filter((name) => !outcomes.has(name));

            const files: FileOutcome[] = [];
            if (pending.length > 0) {
                let handle = await this.store.openOrCreate(this.artifactPath);
                for (const filename of pending) {
                    setCorrelation({ filename });
                    const result = await this.mergeFile(handle, filename);
                    files.push(result.outcome);
                    if (result.reload) {
                        handle = await this.store.openOrCreate(this.artifactPath);
                    }
                }
                setCorrelation({ filename: '' });
            }

            const finished = Date.now();
            const summary: MergePassResult = {
                passId,
                startedAt,
                finishedAt: new Date(finished).toISOString(),
                durationMs: finished - started,
                candidates: candidates.length,
                alreadyRecorded: candidates.length - pending.length,
                processed: files.length,
                succeeded: files.filter((f) => f.outcome === 'success').length,
                failed: files.filter((f) => f.outcome === 'error').length,
                recovery,
                files,
            };

            log.info('merge pass finished', {
                candidates: summary.candidates,
                processed: summary.processed,
                succeeded: summary.succeeded,
                failed: summary.failed,
                duration_ms: summary.durationMs,
            });
            return summary;
        } catch (e) {
            log.error('merge pass aborted', describeError(e));
            throw e;
        } finally {
            this._state = 'idle';
            if (!releaseLock(lock)) {
                log.warn('pass lock was taken over before release', { lock: lock.lockPath });
            }
            clearCorrelation();
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Per file                                                               */
    /* ---------------------------------------------------------------------- */

    private async mergeFile(
        handle: ArtifactHandle,
        filename: string
    ): Promise<{ outcome: FileOutcome; reload: boolean }> {
        const input: InputFile = { filename, path: path.join(this.config.inputFolder, filename) };

        this._state = 'extracting';
        let blocks: ContentBlock[];
        try {
            blocks = await this.adapter.extract(input);
        } catch (e) {
            if (isPassFatal(e)) throw e;
            return { outcome: this.fail(filename, e), reload: false };
        }

        if (blocks.length === 0) {
            // nothing to append, and no separator for nothing
            this.succeed(filename, 0);
            return { outcome: { filename, outcome: 'success', blocks: 0 }, reload: false };
        }

        let staged = false;
        try {
            this._state = 'appending';
            if (this.store.hasContent(handle)) {
                this.store.appendSeparator(handle);
            }
            this.store.appendContent(handle, blocks);

            this._state = 'persisting';
            if (this.journal) {
                const rendered = await this.store.render(handle);
                this.journal.stage(filename, rendered.sha256);
                staged = true;
                this.store.write(handle, rendered);
            } else {
                await this.store.persist(handle);
            }
        } catch (e) {
            if (isPassFatal(e)) throw e;
            if (staged && this.journal) {
                // the write may have landed before the failure surfaced
                const settled = this.journal.reconcile(this.ledger, this.artifactPath);
                if (settled.action === 'promoted') {
                    log.info('processed', { filename, status: 'success', blocks: blocks.length });
                    return { outcome: { filename, outcome: 'success', blocks: blocks.length }, reload: true };
                }
            }
            return { outcome: this.fail(filename, e), reload: true };
        }

        this.succeed(filename, blocks.length);
        this.journal?.clear();
        return { outcome: { filename, outcome: 'success', blocks: blocks.length }, reload: false };
    }

    private succeed(filename: string, blocks: number): void {
        this._state = 'recording';
        this.ledger.record(filename, 'success');
        log.info('processed', { filename, status: 'success', blocks });
    }

    private fail(filename: string, err: unknown): FileOutcome {
        this._state = 'recording';
        this.ledger.record(filename, 'error');
        const info = describeError(err);
        log.error('processed', { filename, status: 'error', code: info.code, error: info.message });
        return { filename, outcome: 'error', blocks: 0, error: { code: info.code, message: info.message } };
    }
}
