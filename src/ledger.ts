/**
 * Ledger - durable, append-only record of per-file merge outcomes
 *
 * Persisted as two-column CSV (`filename,outcome`) so it stays readable by
 * people and by the dashboard. Each `record` is fsync'd before returning.
 * Loading is last-entry-wins per filename; rows that do not parse are
 * skipped and counted rather than failing the load.
 */

import * as fs from 'fs';

import { appendLineDurableSync } from './durable';
import { LedgerIOError, errnoCode } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('ledger');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type LedgerOutcome = 'success' | 'error';

export interface LedgerEntry {
    filename: string;
    outcome: LedgerOutcome;
}

export interface LedgerSnapshot {
    /** filename -> outcome, last entry wins */
    outcomes: Map<string, LedgerOutcome>;
    /** rows in file order */
    entries: LedgerEntry[];
    skippedRows: number;
}

export interface Ledger {
    load(): LedgerSnapshot;
    record(filename: string, outcome: LedgerOutcome): void;
}

/* -------------------------------------------------------------------------- */
/* CSV                                                                        */
/* -------------------------------------------------------------------------- */

export function encodeCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export function encodeCsvRow(fields: string[]): string {
    return fields.map(encodeCsvField).join(',') + '\n';
}

/** Index just past the line break at or after `from`, or the end of the text. */
function nextLine(text: string, from: number): number {
    const nl = text.indexOf('\n', from);
    return nl === -1 ? text.length : nl + 1;
}

/**
 * Read one quoted field starting at the opening quote. The field ends at a
 * quote followed by a separator, a line break or the end of the text;
 * `""` is a literal quote. Any other quote means the field is malformed.
 */
function readQuoted(text: string, open: number): { value: string; end: number } | null {
    let value = '';
    let j = open + 1;
    while (j < text.length) {
        const ch = text[j];
        if (ch !== '"') {
            value += ch;
            j++;
            continue;
        }
        const after = text[j + 1];
        if (after === '"') {
            value += '"';
            j += 2;
        } else if (after === undefined || after === ',' || after === '\r' || after === '\n') {
            return { value, end: j + 1 };
        } else {
            return null;
        }
    }
    return null;
}

/**
 * Split CSV text into rows of fields. A quote opens a quoted field only at
 * the start of a field; elsewhere it is literal. Quoted fields may hold
 * separators, doubled quotes and line breaks. A quoted field that never
 * closes cleanly yields `null` for its row, and parsing resumes on the
 * line after the opening quote.
 */
export function parseCsv(text: string): Array<string[] | null> {
    const rows: Array<string[] | null> = [];
    let fields: string[] = [];
    let field = '';
    let atFieldStart = true;
    let i = 0;

    const endRow = (): void => {
        fields.push(field);
        rows.push(fields);
        fields = [];
        field = '';
        atFieldStart = true;
    };

    while (i < text.length) {
        const ch = text[i];

        if (ch === '"' && atFieldStart) {
            const quoted = readQuoted(text, i);
            if (quoted === null) {
                rows.push(null);
                fields = [];
                field = '';
                i = nextLine(text, i);
                continue;
            }
            field = quoted.value;
            atFieldStart = false;
            i = quoted.end;
            continue;
        }

        if (ch === ',') {
            fields.push(field);
            field = '';
            atFieldStart = true;
        } else if (ch === '\r' || ch === '\n') {
            if (ch === '\r' && text[i + 1] === '\n') i++;
            // blank line
            if (fields.length > 0 || !atFieldStart) endRow();
        } else {
            field += ch;
            atFieldStart = false;
        }
        i++;
    }

    if (fields.length > 0 || !atFieldStart) endRow();
    return rows;
}

function parseOutcome(raw: string): LedgerOutcome | null {
    const v = raw.trim().toLowerCase();
    return v === 'success' || v === 'error' ? v : null;
}

/* -------------------------------------------------------------------------- */
/* CSV Ledger                                                                 */
/* -------------------------------------------------------------------------- */

export class CsvLedger implements Ledger {
    constructor(public readonly filePath: string) {}

    load(): LedgerSnapshot {
        let text: string;
        try {
            text = fs.readFileSync(this.filePath, 'utf8');
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') {
                return { outcomes: new Map(), entries: [], skippedRows: 0 };
            }
            throw new LedgerIOError(`Cannot read ledger ${this.filePath}`, { path: this.filePath }, e);
        }

        const outcomes = new Map<string, LedgerOutcome>();
        const entries: LedgerEntry[] = [];
        let skippedRows = 0;

        for (const row of parseCsv(text)) {
            if (row === null || row.length !== 2 || row[0] === '') {
                skippedRows++;
                continue;
            }
            const outcome = parseOutcome(row[1]);
            if (outcome === null) {
                skippedRows++;
                continue;
            }
            outcomes.set(row[0], outcome);
            entries.push({ filename: row[0], outcome });
        }

        if (skippedRows > 0) {
            log.warn('skipped malformed ledger rows', { path: this.filePath, skipped: skippedRows });
        }
        return { outcomes, entries, skippedRows };
    }

    record(filename: string, outcome: LedgerOutcome): void {
        try {
            appendLineDurableSync(this.filePath, encodeCsvRow([filename, outcome]));
        } catch (e) {
            throw new LedgerIOError(
                `Cannot append to ledger ${this.filePath}`,
                { path: this.filePath, filename, outcome },
                e
            );
        }
    }
}
