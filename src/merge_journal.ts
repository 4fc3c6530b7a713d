/**
 * Merge Journal - write-ahead staging for the persist/record crash window
 *
 * Before the artifact is written, the driver stages `{ filename, sha256 }`
 * of the exact bytes about to land on disk. If the process dies after the
 * artifact write but before the ledger append, the next pass finds the
 * staged entry, sees the artifact already carries those bytes, and promotes
 * the entry to a `success` ledger row instead of merging the file again.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';

import { atomicWriteJsonSync } from './durable';
import { Ledger } from './ledger';
import { LedgerIOError, errnoCode } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('journal');

export interface StagedEntry {
    filename: string;
    artifactSha256: string;
    stagedAt: string;
}

export type ReconcileOutcome =
    | { action: 'none' }
    | { action: 'cleared'; filename: string }
    | { action: 'promoted'; filename: string }
    | { action: 'discarded'; filename: string };

export function sha256Hex(data: Buffer): string {
    return crypto.createHash('sha256').update(data).digest('hex');
}

function parseStaged(raw: string): StagedEntry | null {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return null;
    if (!('filename' in parsed) || typeof parsed.filename !== 'string') return null;
    if (!('artifactSha256' in parsed) || typeof parsed.artifactSha256 !== 'string') return null;
    const stagedAt = 'stagedAt' in parsed && typeof parsed.stagedAt === 'string' ? parsed.stagedAt : '';
    return { filename: parsed.filename, artifactSha256: parsed.artifactSha256, stagedAt };
}

export class MergeJournal {
    constructor(public readonly filePath: string) {}

    static forLedger(ledgerPath: string): MergeJournal {
        return new MergeJournal(`${ledgerPath}.pending.json`);
    }

    /** Staged entry, or null when nothing is pending. An unparsable file counts as nothing pending. */
    read(): StagedEntry | null {
        let raw: string;
        try {
            raw = fs.readFileSync(this.filePath, 'utf8');
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') return null;
            throw new LedgerIOError(`Cannot read merge journal ${this.filePath}`, { path: this.filePath }, e);
        }
        try {
            const entry = parseStaged(raw);
            if (entry === null) log.warn('ignoring malformed journal', { path: this.filePath });
            return entry;
        } catch (e) {
            log.warn('ignoring unparsable journal', { path: this.filePath, error: String(e) });
            return null;
        }
    }

    stage(filename: string, artifactSha256: string): void {
        const entry: StagedEntry = { filename, artifactSha256, stagedAt: new Date().toISOString() };
        const warnings: string[] = [];
        atomicWriteJsonSync({ filePath: this.filePath, data: entry, fsyncMode: 'REQUIRED', warnings });
    }

    clear(): void {
        try {
            fs.unlinkSync(this.filePath);
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') return;
            throw new LedgerIOError(`Cannot clear merge journal ${this.filePath}`, { path: this.filePath }, e);
        }
    }

    /**
     * Settle a staged entry left by an interrupted pass against the ledger
     * and the artifact currently on disk.
     */
    reconcile(ledger: Ledger, artifactPath: string): ReconcileOutcome {
        const staged = this.read();
        if (staged === null) {
            if (fs.existsSync(this.filePath)) this.clear();
            return { action: 'none' };
        }

        if (ledger.load().outcomes.has(staged.filename)) {
            this.clear();
            return { action: 'cleared', filename: staged.filename };
        }

        let onDisk: string | null = null;
        try {
            onDisk = sha256Hex(fs.readFileSync(artifactPath));
        } catch (e) {
            if (errnoCode(e) !== 'ENOENT') {
                throw new LedgerIOError(`Cannot hash artifact ${artifactPath} for journal recovery`, { path: artifactPath }, e);
            }
        }

        if (onDisk === staged.artifactSha256) {
            ledger.record(staged.filename, 'success');
            this.clear();
            log.warn('recovered staged entry', { filename: staged.filename, stagedAt: staged.stagedAt });
            return { action: 'promoted', filename: staged.filename };
        }

        this.clear();
        log.warn('discarded staged entry', { filename: staged.filename, stagedAt: staged.stagedAt });
        return { action: 'discarded', filename: staged.filename };
    }
}
