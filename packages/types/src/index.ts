/**
 * Shared type contracts for ledger-watch.
 *
 * Type-only package: nothing here exists at runtime, so consumers import with
 * `import type` and the backend build carries no dependency on it.
 */
export type { ILogger } from './logging/ILogger.js';
export type { IModule, IModuleMetadata } from './module/index.js';
export type { ILedgerBlock, ILedgerTransaction, ILedgerConfig, ILedgerClient } from './ledger/index.js';
export type {
    SubscriptionKind,
    ISubscriptionHandle,
    BlockReceiver,
    TransactionReceiver,
    PollPhase,
    PollErrorObserver,
    ISubscriptionStats,
    IBlockSubscriptionService
} from './subscription/index.js';
