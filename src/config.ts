/**
 * Merge Configuration
 *
 * One immutable struct handed to the merge driver at construction.
 * Resolution order (later wins): defaults, JSON settings file,
 * environment (DOCXMERGE_*), explicit overrides (CLI flags).
 */

import * as fs from 'fs';
import * as path from 'path';

import { AdapterStrategy, ADAPTER_STRATEGIES, isAdapterStrategy } from './document_adapter';
import { JsonSchema, SchemaValidator } from './schema_validator';
import { ConfigError, errnoCode } from './structured_error';

export interface MergeConfig {
    /** Folder scanned for input documents */
    readonly inputFolder: string;
    /** Folder holding the cumulative artifact */
    readonly outputFolder: string;
    /** Artifact file name inside outputFolder */
    readonly outputFile: string;
    /** Processed ledger (CSV) */
    readonly ledgerPath: string;
    readonly logFile: string;
    /** Delay between passes in loop mode */
    readonly intervalSeconds: number;
    readonly strategy: AdapterStrategy;
    /** Stage each artifact write in a journal so a crash before the ledger append cannot duplicate content */
    readonly writeAheadJournal: boolean;
    /** How long a pass waits for another pass's lock before giving up */
    readonly lockTimeoutMs: number;
    readonly documentExtension: string;
}

export type ConfigOverrides = Partial<MergeConfig>;

export const DEFAULT_INTERVAL_SECONDS = 300;
export const LOG_FILE_NAME = 'docmerger.log';

export const DEFAULTS = {
    inputFolder: 'input_docs',
    outputFolder: 'merged_output',
    outputFile: 'merged.docx',
    ledgerPath: 'processed.csv',
    intervalSeconds: DEFAULT_INTERVAL_SECONDS,
    strategy: 'node-splicing',
    writeAheadJournal: true,
    lockTimeoutMs: 0,
    documentExtension: '.docx',
} as const satisfies Omit<MergeConfig, 'logFile'>;

export function artifactPath(config: MergeConfig): string {
    return path.join(config.outputFolder, config.outputFile);
}

/* -------------------------------------------------------------------------- */
/* Settings file                                                              */
/* -------------------------------------------------------------------------- */

const SETTINGS_SCHEMA_ID = 'merge-settings';

const SETTINGS_SCHEMA: JsonSchema = {
    type: 'object',
    additionalProperties: false,
    properties: {
        inputFolder: { type: 'string' },
        outputFolder: { type: 'string' },
        outputFile: { type: 'string', pattern: '^[^/\\\\]+$' },
        ledgerPath: { type: 'string' },
        logFile: { type: 'string' },
        intervalSeconds: { type: 'integer', minimum: 1 },
        strategy: { type: 'string', enum: ADAPTER_STRATEGIES },
        writeAheadJournal: { type: 'boolean' },
        lockTimeoutMs: { type: 'integer', minimum: 0 },
        documentExtension: { type: 'string', pattern: '^\\.[A-Za-z0-9]+$' },
    },
};

const validator = new SchemaValidator();
validator.registerSchema(SETTINGS_SCHEMA_ID, SETTINGS_SCHEMA);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickOverrides(raw: Record<string, unknown>): ConfigOverrides {
    const out: { -readonly [K in keyof MergeConfig]?: MergeConfig[K] } = {};
    for (const key of ['inputFolder', 'outputFolder', 'outputFile', 'ledgerPath', 'logFile', 'documentExtension'] as const) {
        const v = raw[key];
        if (typeof v === 'string') out[key] = v;
    }
    if (typeof raw.intervalSeconds === 'number') out.intervalSeconds = raw.intervalSeconds;
    if (typeof raw.lockTimeoutMs === 'number') out.lockTimeoutMs = raw.lockTimeoutMs;
    if (typeof raw.writeAheadJournal === 'boolean') out.writeAheadJournal = raw.writeAheadJournal;
    if (typeof raw.strategy === 'string' && isAdapterStrategy(raw.strategy)) out.strategy = raw.strategy;
    return out;
}

/** Read a JSON settings file. A missing file yields no overrides. */
export function loadSettingsFile(filePath: string): ConfigOverrides {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf-8');
    } catch (e) {
        if (errnoCode(e) === 'ENOENT') return {};
        throw new ConfigError(`Cannot read settings file ${filePath}`, { path: filePath, errno: errnoCode(e) });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e) {
        throw new ConfigError(`Settings file ${filePath} is not valid JSON`, { path: filePath, error: String(e) });
    }

    const result = validator.validate(parsed, SETTINGS_SCHEMA_ID);
    if (!result.valid || !isRecord(parsed)) {
        throw new ConfigError(`Settings file ${filePath} is invalid`, { path: filePath, errors: result.errors });
    }
    return pickOverrides(parsed);
}

/* -------------------------------------------------------------------------- */
/* Environment                                                                */
/* -------------------------------------------------------------------------- */

/** Positive integer seconds, or undefined when absent or unusable. */
export function parseInterval(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const n = Number(raw);
    return Number.isInteger(n) && n > 0 ? n : undefined;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const out: { -readonly [K in keyof MergeConfig]?: MergeConfig[K] } = {};
    if (env.DOCXMERGE_INPUT_FOLDER) out.inputFolder = env.DOCXMERGE_INPUT_FOLDER;
    if (env.DOCXMERGE_OUTPUT_FOLDER) out.outputFolder = env.DOCXMERGE_OUTPUT_FOLDER;
    if (env.DOCXMERGE_OUTPUT_FILE) out.outputFile = env.DOCXMERGE_OUTPUT_FILE;
    if (env.DOCXMERGE_PROCESSED_FILE) out.ledgerPath = env.DOCXMERGE_PROCESSED_FILE;
    if (env.DOCXMERGE_LOG_FILE) out.logFile = env.DOCXMERGE_LOG_FILE;

    const interval = parseInterval(env.DOCXMERGE_INTERVAL);
    if (interval !== undefined) out.intervalSeconds = interval;

    if (env.DOCXMERGE_STRATEGY) {
        if (!isAdapterStrategy(env.DOCXMERGE_STRATEGY)) {
            throw new ConfigError(`Unknown strategy ${env.DOCXMERGE_STRATEGY}`, {
                allowed: ADAPTER_STRATEGIES,
            });
        }
        out.strategy = env.DOCXMERGE_STRATEGY;
    }
    if (env.DOCXMERGE_JOURNAL === '0' || env.DOCXMERGE_JOURNAL === 'false') out.writeAheadJournal = false;
    return out;
}

/* -------------------------------------------------------------------------- */
/* Resolution                                                                 */
/* -------------------------------------------------------------------------- */

export function resolveConfig(opts: {
    settingsFile?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: ConfigOverrides;
} = {}): MergeConfig {
    const env = opts.env ?? process.env;
    const settingsFile = opts.settingsFile ?? env.DOCXMERGE_CONFIG;

    const merged: ConfigOverrides = {
        ...DEFAULTS,
        ...(settingsFile ? loadSettingsFile(settingsFile) : {}),
        ...configFromEnv(env),
        ...opts.overrides,
    };

    const outputFolder = merged.outputFolder ?? DEFAULTS.outputFolder;
    const config: MergeConfig = {
        inputFolder: merged.inputFolder ?? DEFAULTS.inputFolder,
        outputFolder,
        outputFile: merged.outputFile ?? DEFAULTS.outputFile,
        ledgerPath: merged.ledgerPath ?? DEFAULTS.ledgerPath,
        logFile: merged.logFile ?? path.join(outputFolder, LOG_FILE_NAME),
        intervalSeconds: merged.intervalSeconds ?? DEFAULTS.intervalSeconds,
        strategy: merged.strategy ?? DEFAULTS.strategy,
        writeAheadJournal: merged.writeAheadJournal ?? DEFAULTS.writeAheadJournal,
        lockTimeoutMs: merged.lockTimeoutMs ?? DEFAULTS.lockTimeoutMs,
        documentExtension: merged.documentExtension ?? DEFAULTS.documentExtension,
    };

    if (!Number.isInteger(config.intervalSeconds) || config.intervalSeconds <= 0) {
        throw new ConfigError('intervalSeconds must be a positive integer', { intervalSeconds: config.intervalSeconds });
    }
    return Object.freeze(config);
}
