/**
 * Subscription module implementation.
 *
 * Owns the block subscription service for the lifetime of the process and wires it
 * to the injected ledger client and logger.
 *
 * **Lifecycle:**
 *
 * - `init()` creates the service with a module-scoped child logger. Poll failures
 *   are reported through the service's error observer and logged at warn level; the
 *   service itself never logs them.
 * - `run()` registers the built-in block log receiver when it is enabled. With it
 *   disabled and no other receivers the ledger is not polled at all.
 * - `stop()` drops every subscription and waits for polling to stop.
 *
 * @example
 * ```typescript
 * const subscriptionModule = new SubscriptionModule();
 *
 * await subscriptionModule.init({ logger, ledgerClient });
 * await subscriptionModule.run();
 *
 * await subscriptionModule.getService().subscribeTransactions(transactions => {
 *     // ...
 * });
 * ```
 */

import type {
    IBlockSubscriptionService,
    ILedgerBlock,
    ILedgerClient,
    ILogger,
    IModule,
    IModuleMetadata,
    PollPhase
} from '@ledgerwatch/types';
import { ledgerConfig } from '../../config/ledger.js';
import { BlockSubscriptionService } from './block-subscription.service.js';

/**
 * Subscription module dependencies for initialization.
 */
export interface ISubscriptionModuleDependencies {
    /** Root logger; the module scopes a child from it */
    logger: ILogger;

    /** Ledger polled for head blocks and configuration */
    ledgerClient: ILedgerClient;

    /** Overrides `ENABLE_BLOCK_LOG` */
    blockLogEnabled?: boolean;

    /** Overrides `LEDGER_FALLBACK_BLOCK_INTERVAL_MS` */
    fallbackPollIntervalMs?: number;
}

export class SubscriptionModule implements IModule<ISubscriptionModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'subscription',
        name: 'Subscription',
        version: '1.0.0',
        description: 'Push-style block and transaction subscriptions over a polled ledger'
    };

    private logger: ILogger | null = null;
    private service: BlockSubscriptionService | null = null;
    private blockLogEnabled = false;

    async init(dependencies: ISubscriptionModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: this.metadata.id });
        this.logger = logger;
        this.blockLogEnabled = dependencies.blockLogEnabled ?? ledgerConfig.blockLog.enabled;

        this.service = new BlockSubscriptionService(dependencies.ledgerClient, {
            logger,
            fallbackPollIntervalMs: dependencies.fallbackPollIntervalMs ?? ledgerConfig.fallbackBlockIntervalMs,
            onPollError: (error: unknown, phase: PollPhase) => {
                logger.warn({ error, phase }, 'Ledger poll failed - will retry on next tick');
            }
        });

        logger.info({ blockLogEnabled: this.blockLogEnabled }, 'Subscription module initialized');
    }

    async run(): Promise<void> {
        const service = this.getService();
        const logger = this.logger;

        if (!this.blockLogEnabled || !logger) {
            return;
        }

        await service.subscribeBlocks((blocks: readonly ILedgerBlock[]) => {
            for (const block of blocks) {
                logger.info(
                    { index: block.index, hash: block.hash, txCount: block.transactions.length },
                    'New ledger block'
                );
            }
        });
    }

    async stop(): Promise<void> {
        if (!this.service) {
            return;
        }

        await this.service.shutdown();
        this.logger?.info('Subscription module stopped');
    }

    /**
     * Subscription service created during init().
     *
     * @throws {Error} If called before init()
     */
    getService(): IBlockSubscriptionService {
        if (!this.service) {
            throw new Error('SubscriptionModule not initialized - call init() first');
        }
        return this.service;
    }
}
