import type { ILedgerTransaction } from './ILedgerTransaction.js';

/**
 * Normalized block model for the observed ledger.
 *
 * A block is identified by its content hash: two blocks with the same `hash` are
 * the same block, regardless of object identity. The subscription service relies on
 * this to decide whether the ledger head has moved since the previous poll.
 *
 * @template TTransaction - Transaction shape carried by the block
 */
export interface ILedgerBlock<TTransaction = ILedgerTransaction> {
    /** Block height, starting at 0 for genesis */
    index: number;
    /** Content hash, hex encoded */
    hash: string;
    /** Hash of the previous block, or null for genesis */
    parentHash: string | null;
    /** Time the block was produced */
    timestamp: Date;
    /** Transactions in ledger order */
    transactions: readonly TTransaction[];
}
