import type { ILedgerBlock } from '../ledger/ILedgerBlock.js';
import type { ILedgerTransaction } from '../ledger/ILedgerTransaction.js';
import type { ISubscriptionHandle } from './ISubscriptionHandle.js';
import type { BlockReceiver, TransactionReceiver } from './IReceivers.js';
import type { ISubscriptionStats } from './ISubscriptionStats.js';

/**
 * Push-style subscription API over a pull-only ledger.
 *
 * The service polls the ledger head only while at least one receiver of either
 * kind is registered. Every subscribe and unsubscribe call resolves after the
 * resulting timer start or stop has completed, so once a call has settled the
 * polling state matches the registries.
 *
 * Delivery is best effort: blocks produced between two polls are skipped, a failed
 * poll is not replayed and nothing survives a restart.
 *
 * @template TTransaction - Transaction shape carried by each block
 * @template TBlock - Block shape produced by the underlying ledger client
 */
export interface IBlockSubscriptionService<
    TTransaction = ILedgerTransaction,
    TBlock extends ILedgerBlock<TTransaction> = ILedgerBlock<TTransaction>
> {
    /**
     * Register a block receiver.
     *
     * Registering a receiver that is already registered returns its existing handle
     * and has no further effect. Resolves once polling is running.
     *
     * @param receiver - Callback invoked with each batch of new blocks
     */
    subscribeBlocks(receiver: BlockReceiver<TBlock>): Promise<ISubscriptionHandle>;

    /**
     * Remove a block receiver by handle or by the receiver itself.
     *
     * When this removes the last subscriber of either kind, resolves only after
     * polling has stopped and any in-flight poll has finished.
     *
     * @returns True when a registration was removed
     */
    unsubscribeBlocks(subscription: ISubscriptionHandle | BlockReceiver<TBlock>): Promise<boolean>;

    /**
     * Register a transaction receiver. Same semantics as {@link subscribeBlocks}.
     */
    subscribeTransactions(receiver: TransactionReceiver<TTransaction>): Promise<ISubscriptionHandle>;

    /**
     * Remove a transaction receiver. Same semantics as {@link unsubscribeBlocks}.
     */
    unsubscribeTransactions(
        subscription: ISubscriptionHandle | TransactionReceiver<TTransaction>
    ): Promise<boolean>;

    /** Whether the poll timer is currently running */
    isRunning(): boolean;

    getStats(): ISubscriptionStats;

    /**
     * Drop every subscription and stop polling.
     */
    shutdown(): Promise<void>;
}
