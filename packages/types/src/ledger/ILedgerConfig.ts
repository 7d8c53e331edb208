/**
 * Ledger-wide configuration exposed by the ledger client.
 */
export interface ILedgerConfig {
    /**
     * Target time between two blocks, in milliseconds.
     *
     * The subscription service polls at this period; there is no point asking for
     * the head more often than the ledger produces one.
     */
    blockIntervalMs: number;

    /** Maximum block size in bytes, when the ledger reports one */
    maxBlockSize?: number;
}
