import type {
    BlockReceiver,
    IBlockSubscriptionService,
    ILedgerBlock,
    ILedgerClient,
    ILedgerTransaction,
    ILogger,
    ISubscriptionHandle,
    ISubscriptionStats,
    PollErrorObserver,
    PollPhase,
    TransactionReceiver
} from '@ledgerwatch/types';
import { isSameBlock } from '../ledger/index.js';
import { SubscriberRegistry } from './subscriber-registry.js';

/**
 * Construction options for {@link BlockSubscriptionService}.
 */
export interface BlockSubscriptionServiceOptions {
    /** Logger scoped to the subscription component */
    logger: ILogger;
    /** Poll interval used when the ledger configuration cannot be read */
    fallbackPollIntervalMs?: number;
    /** Receives ledger query failures; failures are skipped silently without it */
    onPollError?: PollErrorObserver;
}

/**
 * Turns the pull-only ledger into a push feed of blocks and transactions.
 *
 * The service keeps two receiver registries and a poll timer. The timer runs only
 * while at least one receiver of either kind is registered: the first subscription
 * primes the cursor with the current head block and starts polling at the ledger's
 * block interval, and removing the last subscription stops the timer and waits for
 * an in-flight poll to finish.
 *
 * Each poll asks the ledger for its head block. When the head differs from the
 * cursor (compared by hash) the cursor advances and both receiver sets are invoked:
 * block receivers with the new block, transaction receivers with its transactions
 * (possibly an empty batch). Blocks produced between two polls are never fetched,
 * so a slow poll interval skips blocks instead of replaying them.
 *
 * Timer transitions are serialized through a promise chain so overlapping
 * subscribe and unsubscribe calls cannot start two timers or stop a timer another
 * call just started. Each transition re-reads the live subscriber count when it
 * runs, which makes the final state depend only on the registries.
 *
 * Receivers run synchronously inside the poll callback. A receiver that throws or
 * returns a rejected promise is logged and counted; the remaining receivers still
 * run and polling continues. Returned promises are not awaited, so a receiver may
 * unsubscribe itself without waiting on the poll it is running in.
 *
 * @template TTransaction - Transaction shape carried by each block
 * @template TBlock - Block shape produced by the ledger client
 */
export class BlockSubscriptionService<
    TTransaction = ILedgerTransaction,
    TBlock extends ILedgerBlock<TTransaction> = ILedgerBlock<TTransaction>
> implements IBlockSubscriptionService<TTransaction, TBlock> {
    public static readonly DEFAULT_FALLBACK_POLL_INTERVAL_MS = 5000;

    private readonly logger: ILogger;
    private readonly fallbackPollIntervalMs: number;
    private readonly onPollError?: PollErrorObserver;

    private readonly blockReceivers = new SubscriberRegistry<BlockReceiver<TBlock>>('blocks');
    private readonly transactionReceivers = new SubscriberRegistry<TransactionReceiver<TTransaction>>('transactions');

    /** Last observed head block; null until a poll succeeds */
    private latestBlock: TBlock | null = null;
    private running = false;
    private timer: NodeJS.Timeout | null = null;
    private inFlightTick: Promise<void> | null = null;
    private pollIntervalMs: number | null = null;
    private lifecycle: Promise<void> = Promise.resolve();

    private totalPolls = 0;
    private failedPolls = 0;
    private consecutiveFailures = 0;
    private blocksDispatched = 0;
    private transactionsDispatched = 0;
    private receiverErrors = 0;
    private lastPolledAt: Date | null = null;
    private lastPollErrorAt: Date | null = null;

    /**
     * @param ledger - Ledger client polled for head blocks and configuration
     * @param options - Logger, fallback interval and poll error observer
     */
    constructor(
        private readonly ledger: ILedgerClient<TBlock>,
        options: BlockSubscriptionServiceOptions
    ) {
        this.logger = options.logger;
        this.fallbackPollIntervalMs = options.fallbackPollIntervalMs
            ?? BlockSubscriptionService.DEFAULT_FALLBACK_POLL_INTERVAL_MS;
        this.onPollError = options.onPollError;

        if (!Number.isFinite(this.fallbackPollIntervalMs) || this.fallbackPollIntervalMs <= 0) {
            throw new RangeError(`fallbackPollIntervalMs must be a positive number, got ${this.fallbackPollIntervalMs}`);
        }
    }

    public async subscribeBlocks(receiver: BlockReceiver<TBlock>): Promise<ISubscriptionHandle> {
        const { handle, added } = this.blockReceivers.add(receiver);
        if (added) {
            this.logSubscriptionChange('Receiver subscribed', handle);
        }

        await this.reconcileTimer();
        return handle;
    }

    public async unsubscribeBlocks(subscription: ISubscriptionHandle | BlockReceiver<TBlock>): Promise<boolean> {
        const removed = this.blockReceivers.remove(subscription);
        if (removed) {
            this.logSubscriptionChange('Receiver unsubscribed', removed);
        }

        await this.reconcileTimer();
        return removed !== null;
    }

    public async subscribeTransactions(receiver: TransactionReceiver<TTransaction>): Promise<ISubscriptionHandle> {
        const { handle, added } = this.transactionReceivers.add(receiver);
        if (added) {
            this.logSubscriptionChange('Receiver subscribed', handle);
        }

        await this.reconcileTimer();
        return handle;
    }

    public async unsubscribeTransactions(
        subscription: ISubscriptionHandle | TransactionReceiver<TTransaction>
    ): Promise<boolean> {
        const removed = this.transactionReceivers.remove(subscription);
        if (removed) {
            this.logSubscriptionChange('Receiver unsubscribed', removed);
        }

        await this.reconcileTimer();
        return removed !== null;
    }

    public isRunning(): boolean {
        return this.running;
    }

    public getStats(): ISubscriptionStats {
        return {
            running: this.running,
            blockSubscribers: this.blockReceivers.size,
            transactionSubscribers: this.transactionReceivers.size,
            pollIntervalMs: this.pollIntervalMs,
            cursorIndex: this.latestBlock?.index ?? null,
            cursorHash: this.latestBlock?.hash ?? null,
            totalPolls: this.totalPolls,
            failedPolls: this.failedPolls,
            consecutiveFailures: this.consecutiveFailures,
            blocksDispatched: this.blocksDispatched,
            transactionsDispatched: this.transactionsDispatched,
            receiverErrors: this.receiverErrors,
            lastPolledAt: this.lastPolledAt?.toISOString() ?? null,
            lastPollErrorAt: this.lastPollErrorAt?.toISOString() ?? null
        };
    }

    public async shutdown(): Promise<void> {
        this.blockReceivers.clear();
        this.transactionReceivers.clear();
        await this.reconcileTimer();
    }

    /**
     * Queue a timer transition behind any transition already in progress.
     *
     * The decision to start or stop is made when the queued step runs, from the
     * subscriber count at that moment, not from the count when it was queued.
     */
    private reconcileTimer(): Promise<void> {
        const next = this.lifecycle.then(async () => {
            if (this.subscriberCount() > 0) {
                await this.startTimer();
            } else {
                await this.stopTimer();
            }
        });

        // A failed transition rejects the caller's promise through `next`; the chain itself keeps going
        this.lifecycle = next.then(() => {}, () => {});
        return next;
    }

    private subscriberCount(): number {
        return this.blockReceivers.size + this.transactionReceivers.size;
    }

    /**
     * Prime the cursor, resolve the poll interval and schedule the first tick.
     */
    private async startTimer(): Promise<void> {
        if (this.running) {
            return;
        }
        this.running = true;

        try {
            this.latestBlock = await this.ledger.getLatestBlock();
            this.recordPollSuccess();
        } catch (error) {
            this.recordPollFailure(error, 'prime');
        }

        const pollIntervalMs = await this.resolvePollInterval();
        this.pollIntervalMs = pollIntervalMs;
        this.scheduleTick(0);

        this.logger.info(
            {
                pollIntervalMs,
                cursorIndex: this.latestBlock?.index ?? null,
                subscribers: this.subscriberCount()
            },
            'Ledger polling started'
        );
    }

    /**
     * Cancel the pending tick and wait for one that is already running.
     */
    private async stopTimer(): Promise<void> {
        if (!this.running) {
            return;
        }
        this.running = false;

        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }

        if (this.inFlightTick) {
            await this.inFlightTick;
        }

        this.pollIntervalMs = null;
        this.logger.info({ cursorIndex: this.latestBlock?.index ?? null }, 'Ledger polling stopped');
    }

    private async resolvePollInterval(): Promise<number> {
        try {
            const config = await this.ledger.getConfig();
            if (Number.isFinite(config.blockIntervalMs) && config.blockIntervalMs > 0) {
                return config.blockIntervalMs;
            }

            this.logger.warn(
                { blockIntervalMs: config.blockIntervalMs, fallbackPollIntervalMs: this.fallbackPollIntervalMs },
                'Ledger reported an unusable block interval, using fallback'
            );
        } catch (error) {
            this.logger.warn(
                { error, fallbackPollIntervalMs: this.fallbackPollIntervalMs },
                'Failed to read ledger configuration, using fallback poll interval'
            );
        }

        return this.fallbackPollIntervalMs;
    }

    /**
     * Schedule one tick. The next tick is scheduled only after this one completes,
     * so ticks never overlap and the interval is measured from completion.
     */
    private scheduleTick(delayMs: number): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlightTick = this.runScheduledTick();
        }, delayMs);
    }

    private async runScheduledTick(): Promise<void> {
        try {
            await this.tick();
        } catch (error) {
            this.logger.error({ error }, 'Unexpected failure while polling ledger - polling continues');
        } finally {
            this.inFlightTick = null;
            if (this.running && this.pollIntervalMs !== null) {
                this.scheduleTick(this.pollIntervalMs);
            }
        }
    }

    /**
     * Poll the ledger head once and dispatch it when it moved.
     */
    private async tick(): Promise<void> {
        let block: TBlock;
        try {
            block = await this.ledger.getLatestBlock();
        } catch (error) {
            this.recordPollFailure(error, 'tick');
            return;
        }
        this.recordPollSuccess();

        if (isSameBlock(this.latestBlock, block)) {
            return;
        }

        this.latestBlock = block;
        this.dispatch([block]);
    }

    /**
     * Invoke every registered receiver with the new blocks and their transactions.
     *
     * Iterates a snapshot of each registry; a receiver removed by an earlier
     * receiver in the same round is not invoked.
     */
    private dispatch(blocks: readonly TBlock[]): void {
        const transactions: TTransaction[] = [];
        for (const block of blocks) {
            transactions.push(...block.transactions);
        }

        for (const [handle, receiver] of this.blockReceivers.snapshot()) {
            if (this.blockReceivers.isActive(handle)) {
                this.deliver(handle, () => receiver(blocks));
            }
        }

        for (const [handle, receiver] of this.transactionReceivers.snapshot()) {
            if (this.transactionReceivers.isActive(handle)) {
                this.deliver(handle, () => receiver(transactions));
            }
        }

        this.blocksDispatched += blocks.length;
        this.transactionsDispatched += transactions.length;

        this.logger.debug(
            {
                blockIndex: blocks[blocks.length - 1]?.index,
                blocks: blocks.length,
                transactions: transactions.length
            },
            'Dispatched new ledger head'
        );
    }

    private deliver(handle: ISubscriptionHandle, invoke: () => void | Promise<void>): void {
        try {
            const result = invoke();
            if (result instanceof Promise) {
                void result.catch((error: unknown) => this.recordReceiverFailure(handle, error));
            }
        } catch (error) {
            this.recordReceiverFailure(handle, error);
        }
    }

    private recordReceiverFailure(handle: ISubscriptionHandle, error: unknown): void {
        this.receiverErrors++;
        this.logger.error(
            { error, subscription: handle.id, kind: handle.kind },
            'Subscription receiver failed - continuing dispatch'
        );
    }

    private recordPollSuccess(): void {
        this.totalPolls++;
        this.consecutiveFailures = 0;
        this.lastPolledAt = new Date();
    }

    private recordPollFailure(error: unknown, phase: PollPhase): void {
        const now = new Date();
        this.totalPolls++;
        this.failedPolls++;
        this.consecutiveFailures++;
        this.lastPolledAt = now;
        this.lastPollErrorAt = now;

        if (!this.onPollError) {
            return;
        }

        try {
            this.onPollError(error, phase);
        } catch (observerError) {
            this.logger.error({ error: observerError, phase }, 'Poll error observer threw');
        }
    }

    private logSubscriptionChange(message: string, handle: ISubscriptionHandle): void {
        this.logger.debug(
            {
                subscription: handle.id,
                kind: handle.kind,
                blockSubscribers: this.blockReceivers.size,
                transactionSubscribers: this.transactionReceivers.size
            },
            message
        );
    }
}
