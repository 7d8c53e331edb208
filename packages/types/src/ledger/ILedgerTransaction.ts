/**
 * Transaction carried inside a ledger block.
 *
 * Transactions have no identity outside of the block that contains them; the
 * `blockIndex` back-reference exists so transaction receivers, which get flat
 * batches without the surrounding block, can still tell where an entry came from.
 */
export interface ILedgerTransaction {
    /** Transaction identifier as reported by the ledger */
    id: string;
    /** Height of the block that contains this transaction */
    blockIndex: number;
    /** Whether the ledger accepted the transaction into its state */
    accepted: boolean;
    /** Raw instruction payloads, passed through untouched */
    instructions: Record<string, unknown>[];
}
