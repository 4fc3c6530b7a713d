/**
 * Main entry point - exports all public APIs
 */

export { CsvLedger, encodeCsvField, encodeCsvRow, parseCsv } from './ledger';
export type { Ledger, LedgerEntry, LedgerOutcome, LedgerSnapshot } from './ledger';
export { MergeJournal, sha256Hex } from './merge_journal';
export type { ReconcileOutcome, StagedEntry } from './merge_journal';
export { DocxArtifactStore } from './artifact_store';
export type { ArtifactHandle, ArtifactStore, OutlineEntry, OutlineKind, RenderedArtifact } from './artifact_store';
export {
    ADAPTER_STRATEGIES,
    NodeSplicingAdapter,
    StructuralCopyAdapter,
    createDocumentAdapter,
    isAdapterStrategy,
} from './document_adapter';
export type { AdapterStrategy, DocumentAdapter, InputFile } from './document_adapter';
export type {
    BreakBlock,
    ContentBlock,
    NodeBlock,
    NodeRelationship,
    ParagraphBlock,
    TableBlock,
    TextRun,
} from './content_blocks';
export { MergeDriver } from './merge_driver';
export type { DriverState, FileOutcome, MergeDriverDeps, MergePassResult } from './merge_driver';
export { InProcessSupervisor, runForever, runOnce } from './supervisor';
export type { PassRunner, RunOnceResult, Supervisor, SupervisorStatus } from './supervisor';
export { DEFAULTS, artifactPath, configFromEnv, loadSettingsFile, resolveConfig } from './config';
export type { ConfigOverrides, MergeConfig } from './config';
export {
    ConfigError,
    DocumentReadError,
    LedgerIOError,
    LockHeldError,
    MergeError,
    StorageError,
    describeError,
    isPassFatal,
} from './structured_error';
export type { ErrorCode, StructuredError } from './structured_error';
export { configureLogging, createLogger } from './logger';
export type { LogLevel, Logger, LoggingOptions } from './logger';
