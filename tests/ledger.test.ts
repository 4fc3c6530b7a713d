import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { CsvLedger, encodeCsvRow, parseCsv } from '../src/ledger';
import { LedgerIOError } from '../src/structured_error';
import { configureLogging } from '../src/logger';
import { makeTempDir } from './helpers/docx_fixtures';

configureLogging({ level: 'error' });

test('missing ledger loads as empty', () => {
    const tmp = makeTempDir('ledger-');
    try {
        const snapshot = new CsvLedger(path.join(tmp, 'processed.csv')).load();
        assert.equal(snapshot.outcomes.size, 0);
        assert.deepEqual(snapshot.entries, []);
        assert.equal(snapshot.skippedRows, 0);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('record appends one csv row per call and load reads them back', () => {
    const tmp = makeTempDir('ledger-');
    try {
        const file = path.join(tmp, 'processed.csv');
        const ledger = new CsvLedger(file);
        ledger.record('a.docx', 'success');
        ledger.record('b.docx', 'error');

        assert.equal(fs.readFileSync(file, 'utf8'), 'a.docx,success\nb.docx,error\n');

        const snapshot = ledger.load();
        assert.deepEqual(snapshot.entries, [
            { filename: 'a.docx', outcome: 'success' },
            { filename: 'b.docx', outcome: 'error' },
        ]);
        assert.equal(snapshot.outcomes.get('b.docx'), 'error');
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('filenames with separators and quotes survive the csv encoding', () => {
    assert.equal(encodeCsvRow(['x,y.docx', 'success']), '"x,y.docx",success\n');
    assert.equal(encodeCsvRow(['say "hi".docx', 'error']), '"say ""hi"".docx",error\n');

    const tmp = makeTempDir('ledger-');
    try {
        const ledger = new CsvLedger(path.join(tmp, 'processed.csv'));
        ledger.record('x,y.docx', 'success');
        ledger.record('say "hi".docx', 'error');
        ledger.record('two\nlines.docx', 'success');

        const snapshot = ledger.load();
        assert.deepEqual(
            snapshot.entries.map((e) => e.filename),
            ['x,y.docx', 'say "hi".docx', 'two\nlines.docx']
        );
        assert.equal(snapshot.skippedRows, 0);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('malformed rows are skipped and counted', () => {
    const tmp = makeTempDir('ledger-');
    try {
        const file = path.join(tmp, 'processed.csv');
        fs.writeFileSync(file, 'a.docx,success\ngarbage\nb.docx,maybe\n,success\nc.docx,ERROR\n"open');

        const snapshot = new CsvLedger(file).load();
        assert.equal(snapshot.skippedRows, 4);
        assert.deepEqual(snapshot.entries, [
            { filename: 'a.docx', outcome: 'success' },
            { filename: 'c.docx', outcome: 'error' },
        ]);
        assert.equal(snapshot.outcomes.has('b.docx'), false);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('last entry wins for a repeated filename', () => {
    const tmp = makeTempDir('ledger-');
    try {
        const file = path.join(tmp, 'processed.csv');
        fs.writeFileSync(file, 'a.docx,error\r\na.docx,success\r\n');

        const snapshot = new CsvLedger(file).load();
        assert.equal(snapshot.entries.length, 2);
        assert.equal(snapshot.outcomes.size, 1);
        assert.equal(snapshot.outcomes.get('a.docx'), 'success');
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('parseCsv drops blank lines and flags an unterminated quote', () => {
    assert.deepEqual(parseCsv('a,b\n\n"c\nd",e\n'), [['a', 'b'], ['c\nd', 'e']]);
    assert.deepEqual(parseCsv('"never closed,x'), [null]);
});

test('a quote inside an unquoted field is literal', () => {
    const tmp = makeTempDir('ledger-');
    try {
        const file = path.join(tmp, 'processed.csv');
        fs.writeFileSync(file, 'a.docx,success\nwe"ird.docx,success\nb.docx,success\nc.docx,error\n');

        const snapshot = new CsvLedger(file).load();
        assert.equal(snapshot.skippedRows, 0);
        assert.deepEqual(
            snapshot.entries.map((e) => e.filename),
            ['a.docx', 'we"ird.docx', 'b.docx', 'c.docx']
        );
        assert.equal(snapshot.outcomes.get('c.docx'), 'error');
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('an unclosed quote only costs its own line', () => {
    assert.deepEqual(parseCsv('"x,y.docx\nwe"ird.docx,success\n'), [null, ['we"ird.docx', 'success']]);
    assert.deepEqual(parseCsv('"x,y.docx\n"p,q.docx",success\n'), [null, ['p,q.docx', 'success']]);
    assert.deepEqual(parseCsv('a.docx,"b\nc.docx,error\n'), [null, ['c.docx', 'error']]);
});

test('a row appended after a torn last line starts on its own line', () => {
    const tmp = makeTempDir('ledger-');
    try {
        const file = path.join(tmp, 'processed.csv');
        const ledger = new CsvLedger(file);

        fs.writeFileSync(file, '"x,y.docx');
        ledger.record('a.docx', 'success');
        assert.equal(fs.readFileSync(file, 'utf8'), '"x,y.docx\na.docx,success\n');

        let snapshot = ledger.load();
        assert.equal(snapshot.skippedRows, 1);
        assert.deepEqual(snapshot.entries, [{ filename: 'a.docx', outcome: 'success' }]);

        fs.writeFileSync(file, 'a.docx,succ');
        ledger.record('b.docx', 'success');
        assert.equal(fs.readFileSync(file, 'utf8'), 'a.docx,succ\nb.docx,success\n');

        snapshot = ledger.load();
        assert.equal(snapshot.skippedRows, 1);
        assert.deepEqual(snapshot.entries, [{ filename: 'b.docx', outcome: 'success' }]);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('unreadable or unwritable ledger raises LedgerIOError', () => {
    const tmp = makeTempDir('ledger-');
    try {
        // a directory where the csv file should be
        const ledger = new CsvLedger(tmp);
        assert.throws(() => ledger.load(), LedgerIOError);
        assert.throws(() => ledger.record('a.docx', 'success'), LedgerIOError);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});
