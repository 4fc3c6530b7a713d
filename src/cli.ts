#!/usr/bin/env node
/**
 * CLI Entry Point for docx-folder-merge
 */

import * as fs from 'fs';

import { DocxArtifactStore } from './artifact_store';
import { ConfigOverrides, MergeConfig, artifactPath, parseInterval, resolveConfig } from './config';
import { isAdapterStrategy } from './document_adapter';
import { CsvLedger } from './ledger';
import { MergeDriver } from './merge_driver';
import { MergeJournal } from './merge_journal';
import { ConfigError, describeError } from './structured_error';
import { runForever, runOnce } from './supervisor';
import { configureLogging, createLogger } from './logger';

const log = createLogger('cli');

export interface RunArgs {
    once: boolean;
    settingsFile?: string;
    overrides: ConfigOverrides;
}

/** Parse flags shared by `run` and `status`. Throws ConfigError on bad input. */
export function parseRunArgs(args: string[]): RunArgs {
    const overrides: { -readonly [K in keyof MergeConfig]?: MergeConfig[K] } = {};
    let once = false;
    let settingsFile: string | undefined;

    const value = (flag: string, i: number): string => {
        const v = args[i + 1];
        if (v === undefined || v.startsWith('--')) {
            throw new ConfigError(`${flag} requires a value`, { flag });
        }
        return v;
    };

    for (let i = 0; i < args.length; i++) {
        const flag = args[i];
        switch (flag) {
            case '--once':
                once = true;
                break;
            case '--no-journal':
                overrides.writeAheadJournal = false;
                break;
            case '--input-folder':
                overrides.inputFolder = value(flag, i++);
                break;
            case '--output-folder':
                overrides.outputFolder = value(flag, i++);
                break;
            case '--output-file':
                overrides.outputFile = value(flag, i++);
                break;
            case '--processed-file':
                overrides.ledgerPath = value(flag, i++);
                break;
            case '--config':
                settingsFile = value(flag, i++);
                break;
            case '--interval': {
                const raw = value(flag, i++);
                const seconds = parseInterval(raw);
                if (seconds === undefined) {
                    throw new ConfigError('--interval must be a positive whole number of seconds', { value: raw });
                }
                overrides.intervalSeconds = seconds;
                break;
            }
            case '--strategy': {
                const raw = value(flag, i++);
                if (!isAdapterStrategy(raw)) {
                    throw new ConfigError(`Unknown strategy ${raw}`, { value: raw });
                }
                overrides.strategy = raw;
                break;
            }
            default:
                throw new ConfigError(`Unknown option ${flag}`, { flag });
        }
    }

    return { once, settingsFile, overrides };
}

class DocxMergeCLI {
    async run(argv: string[]): Promise<number> {
        const command = argv[2] || 'help';

        switch (command) {
            case 'run':
                return this.runMerge(argv.slice(3));
            case 'status':
                return this.runStatus(argv.slice(3));
            case 'help':
            case '--help':
                this.showHelp();
                return 0;
            default:
                console.error(`Unknown command: ${command}`);
                this.showHelp();
                return 1;
        }
    }

    private loadConfig(args: string[]): { config: MergeConfig; once: boolean } | null {
        try {
            const parsed = parseRunArgs(args);
            const config = resolveConfig({ settingsFile: parsed.settingsFile, overrides: parsed.overrides });
            return { config, once: parsed.once };
        } catch (e) {
            if (!(e instanceof ConfigError)) throw e;
            console.error(`Error: ${e.message}`);
            const errors = e.context.errors;
            if (Array.isArray(errors)) {
                for (const err of errors) console.error(`   ${JSON.stringify(err)}`);
            }
            return null;
        }
    }

    private async runMerge(args: string[]): Promise<number> {
        const loaded = this.loadConfig(args);
        if (!loaded) return 1;
        const { config, once } = loaded;

        configureLogging({ file: config.logFile });
        const driver = new MergeDriver({ config });

        if (once) {
            try {
                const result = await runOnce(driver);
                console.log(`Processed ${result.processed} file(s): ${result.succeeded} succeeded, ${result.failed} failed`);
                return 0;
            } catch (e) {
                console.error(`Merge pass failed: ${describeError(e).message}`);
                return 1;
            }
        }

        const controller = new AbortController();
        const onSignal = (signal: NodeJS.Signals): void => {
            if (controller.signal.aborted) {
                log.warn('second stop signal, exiting now', { signal });
                process.exit(130);
            }
            log.info('stop requested, finishing current pass', { signal });
            controller.abort();
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);

        try {
            await runForever(driver, config.intervalSeconds, controller.signal, (result) => {
                console.log(`Processed ${result.processed} file(s); next pass in ${config.intervalSeconds}s`);
            });
        } finally {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
        }
        return 0;
    }

    private async runStatus(args: string[]): Promise<number> {
        const loaded = this.loadConfig(args);
        if (!loaded) return 1;
        const { config } = loaded;

        const snapshot = new CsvLedger(config.ledgerPath).load();
        const succeeded = snapshot.entries.filter((e) => e.outcome === 'success').length;
        const failed = snapshot.entries.filter((e) => e.outcome === 'error').length;

        console.log('\nLedger:');
        console.log(`   Path: ${config.ledgerPath}`);
        console.log(`   Files: ${snapshot.outcomes.size} (${succeeded} success rows, ${failed} error rows)`);
        if (snapshot.skippedRows > 0) console.log(`   Malformed rows skipped: ${snapshot.skippedRows}`);

        if (config.writeAheadJournal) {
            const staged = MergeJournal.forLedger(config.ledgerPath).read();
            console.log(`   Pending journal entry: ${staged ? `${staged.filename} (staged ${staged.stagedAt})` : 'none'}`);
        }

        const target = artifactPath(config);
        console.log('\nArtifact:');
        console.log(`   Path: ${target}`);
        if (fs.existsSync(target)) {
            const store = new DocxArtifactStore();
            const outline = store.outline(await store.openOrCreate(target));
            const separators = outline.filter((o) => o.kind === 'separator').length;
            console.log(`   Blocks: ${outline.length} (${separators} separators)`);
        } else {
            console.log('   Not created yet');
        }
        return 0;
    }

    private showHelp(): void {
        console.log(`
docxmerge - merge a folder of .docx files into one running document

USAGE:
  docxmerge <command> [options]

COMMANDS:
  run                 Merge unprocessed inputs (loops until stopped unless --once)
  status              Show ledger totals, pending journal entry and artifact size
  help                Show this help

OPTIONS:
  --once                     Run a single merge pass and exit
  --interval <seconds>       Seconds between passes (default 300)
  --input-folder <dir>       Folder containing .docx files (default input_docs)
  --output-folder <dir>      Folder for the merged file and log (default merged_output)
  --output-file <name>       Merged file name (default merged.docx)
  --processed-file <path>    Ledger CSV (default processed.csv)
  --strategy <name>          structural-copy | node-splicing (default node-splicing)
  --no-journal               Do not stage writes; a crash between write and ledger append may duplicate a file
  --config <file>            JSON settings file

EXAMPLES:
  docxmerge run --once
  docxmerge run --interval 60 --strategy structural-copy
  docxmerge status --processed-file processed.csv
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new DocxMergeCLI();
    cli.run(process.argv).then(
        (code) => { process.exitCode = code; },
        (err: unknown) => {
            console.error('Fatal error:', err);
            process.exitCode = 1;
        }
    );
}

export { DocxMergeCLI };
