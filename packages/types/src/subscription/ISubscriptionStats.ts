/**
 * Snapshot of subscription service state for monitoring.
 */
export interface ISubscriptionStats {
    running: boolean;
    blockSubscribers: number;
    transactionSubscribers: number;
    /** Poll period in effect, or null while stopped */
    pollIntervalMs: number | null;
    cursorIndex: number | null;
    cursorHash: string | null;

    totalPolls: number;
    failedPolls: number;
    consecutiveFailures: number;
    blocksDispatched: number;
    transactionsDispatched: number;
    receiverErrors: number;

    lastPolledAt: string | null;
    lastPollErrorAt: string | null;
}
