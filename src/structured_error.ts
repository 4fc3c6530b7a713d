/**
 * Structured Errors for the merge core
 *
 * Every failure the core raises carries a machine-readable code, a severity
 * and a context record, so the driver can decide between isolating a single
 * file and aborting the whole pass, and the log line stays greppable.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Per-file errors (isolated, recorded as `error` in the ledger)
    | 'DOCUMENT_READ_ERROR'

    // Pass-level errors (abort the pass)
    | 'STORAGE_ERROR'
    | 'LEDGER_IO_ERROR'
    | 'LOCK_HELD'

    // Startup
    | 'INVALID_CONFIG';

export type Severity = 'FATAL' | 'ERROR';

export type StructuredError = {
    code: ErrorCode | 'UNKNOWN';
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    timestamp: string;
};

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

const FATAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
    'STORAGE_ERROR',
    'LEDGER_IO_ERROR',
    'LOCK_HELD',
    'INVALID_CONFIG',
]);

export class MergeError extends Error {
    readonly severity: Severity;

    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: Record<string, unknown> = {},
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'MergeError';
        this.severity = FATAL_CODES.has(code) ? 'FATAL' : 'ERROR';
    }
}

/** Input file is not a readable document of the expected format. */
export class DocumentReadError extends MergeError {
    constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
        super(message, 'DOCUMENT_READ_ERROR', context, cause);
        this.name = 'DocumentReadError';
    }
}

/** Artifact present but unreadable or corrupt, or the artifact directory is unusable. */
export class StorageError extends MergeError {
    constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
        super(message, 'STORAGE_ERROR', context, cause);
        this.name = 'StorageError';
    }
}

/** Ledger (or its write-ahead journal) cannot be read or written. */
export class LedgerIOError extends MergeError {
    constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
        super(message, 'LEDGER_IO_ERROR', context, cause);
        this.name = 'LedgerIOError';
    }
}

export class LockHeldError extends MergeError {
    constructor(lockPath: string, cause?: unknown) {
        super(`Another merge pass holds ${lockPath}`, 'LOCK_HELD', { lockPath }, cause);
        this.name = 'LockHeldError';
    }
}

export class ConfigError extends MergeError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'INVALID_CONFIG', context);
        this.name = 'ConfigError';
    }
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Errors that abort a pass instead of being recorded against one file. */
export function isPassFatal(err: unknown): boolean {
    return err instanceof MergeError && err.severity === 'FATAL';
}

export function describeError(err: unknown): StructuredError {
    if (err instanceof MergeError) {
        return {
            code: err.code,
            message: err.message,
            severity: err.severity,
            context: err.context,
            timestamp: new Date().toISOString(),
        };
    }
    return {
        code: 'UNKNOWN',
        message: errorMessage(err),
        severity: 'ERROR',
        context: {},
        timestamp: new Date().toISOString(),
    };
}

/** errno-style code of a Node system error, if any. */
export function errnoCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err) {
        return typeof err.code === 'string' ? err.code : undefined;
    }
    return undefined;
}
