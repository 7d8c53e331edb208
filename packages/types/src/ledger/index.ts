/**
 * Ledger collaborator type definitions.
 *
 * Blocks, transactions and the read-only client contract consumed by the
 * subscription service.
 */
export type { ILedgerBlock } from './ILedgerBlock.js';
export type { ILedgerTransaction } from './ILedgerTransaction.js';
export type { ILedgerConfig } from './ILedgerConfig.js';
export type { ILedgerClient } from './ILedgerClient.js';
