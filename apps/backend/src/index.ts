/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Builds the infrastructure (logger, HTTP transport, ledger client), then runs the
 * subscription module through init() and run(). The process stays alive while the
 * poll timer runs and shuts down cleanly on SIGINT or SIGTERM.
 *
 * @module index
 */

import { ledgerConfig } from './config/ledger.js';
import { createLogger, PinoLogger } from './lib/logger.js';
import { createHttpClient } from './lib/http-client.js';
import { LedgerRpcClient } from './modules/ledger/index.js';
import { SubscriptionModule } from './modules/subscription/index.js';

const logger = new PinoLogger(createLogger());

/**
 * Main application entry point.
 *
 * @throws Logs error and exits with code 1 if bootstrap fails
 */
async function bootstrap(): Promise<void> {
    const subscriptionModule = new SubscriptionModule();

    try {
        const http = createHttpClient({
            timeoutMs: ledgerConfig.requestTimeoutMs,
            apiKey: ledgerConfig.apiKey
        });

        const ledgerClient = new LedgerRpcClient({
            baseUrl: ledgerConfig.rpcUrl,
            http,
            logger: logger.child({ module: 'ledger-client' }),
            retry: ledgerConfig.retry
        });

        await subscriptionModule.init({ logger, ledgerClient });
        await subscriptionModule.run();

        logger.info({ rpcUrl: ledgerConfig.rpcUrl }, 'Ledger watch started');
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }

    let shuttingDown = false;
    const shutdown = (signal: NodeJS.Signals): void => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        logger.info({ signal }, 'Received shutdown signal, stopping');

        subscriptionModule.stop().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error({ error }, 'Failed to stop cleanly');
                process.exit(1);
            }
        );
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

void bootstrap();
