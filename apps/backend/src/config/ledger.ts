import { env } from './env.js';

const toNumber = (value: string | undefined, fallback: number): number => {
    if (!value) {
        return fallback;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
};

export const ledgerConfig = {
    rpcUrl: env.LEDGER_RPC_URL,
    apiKey: env.LEDGER_API_KEY,
    requestTimeoutMs: env.LEDGER_REQUEST_TIMEOUT_MS,
    // Used only when the ledger configuration cannot be read at timer start
    fallbackBlockIntervalMs: toNumber(process.env.LEDGER_FALLBACK_BLOCK_INTERVAL_MS, 5000),
    retry: {
        retries: toNumber(process.env.LEDGER_RETRIES, 3),
        delayMs: toNumber(process.env.LEDGER_RETRY_DELAY_MS, 500),
        factor: toNumber(process.env.LEDGER_RETRY_FACTOR, 2)
    },
    blockLog: {
        enabled: env.ENABLE_BLOCK_LOG
    }
};

export type LedgerConfig = typeof ledgerConfig;
