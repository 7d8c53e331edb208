import axios, { type AxiosInstance } from 'axios';
import type { ILedgerBlock, ILedgerClient, ILedgerConfig, ILogger } from '@ledgerwatch/types';
import { LedgerUnavailableError, ValidationError } from '../../lib/errors.js';
import { retry, type RetryOptions } from '../../lib/retry.js';
import { normalizeBlock, normalizeConfig } from './ledger-normalizer.js';

/**
 * Construction options for the HTTP ledger client.
 */
export interface LedgerRpcClientOptions {
    /** Base URL of the ledger HTTP API, without trailing `/v1` */
    baseUrl: string;
    /** HTTP transport; only `get` is used */
    http: Pick<AxiosInstance, 'get'>;
    logger: ILogger;
    /** Backoff applied to latest-block queries */
    retry?: Pick<RetryOptions, 'retries' | 'delayMs' | 'factor'>;
}

/**
 * Ledger client speaking the JSON HTTP API.
 *
 * - `GET /v1/blocks/latest` returns the head block
 * - `GET /v1/config` returns the ledger configuration
 *
 * Transport failures surface as `LedgerUnavailableError`, malformed payloads as
 * `ValidationError`. The configuration rarely changes, so it is fetched once and
 * cached; a failed fetch is not cached and the next call asks again.
 */
export class LedgerRpcClient implements ILedgerClient<ILedgerBlock> {
    private readonly baseUrl: string;
    private readonly http: Pick<AxiosInstance, 'get'>;
    private readonly logger: ILogger;
    private readonly retryOptions: Pick<RetryOptions, 'retries' | 'delayMs' | 'factor'>;

    private configPromise: Promise<ILedgerConfig> | null = null;

    public constructor(options: LedgerRpcClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.http = options.http;
        this.logger = options.logger;
        this.retryOptions = options.retry ?? {};
    }

    /**
     * Fetch the current head block, retrying transport failures with backoff.
     *
     * Validation failures are not retried: the ledger answered, just not with a block.
     */
    public async getLatestBlock(): Promise<ILedgerBlock> {
        return retry(async () => normalizeBlock(await this.get('/v1/blocks/latest')), {
            ...this.retryOptions,
            shouldRetry: error => !(error instanceof ValidationError),
            onRetry: (attempt, error, nextDelayMs) =>
                this.logger.warn({ attempt, nextDelayMs, error }, 'Retrying ledger latest block query')
        });
    }

    public async getConfig(): Promise<ILedgerConfig> {
        if (!this.configPromise) {
            this.configPromise = this.get('/v1/config')
                .then(normalizeConfig)
                .catch((error: unknown) => {
                    this.configPromise = null;
                    throw error;
                });
        }

        return this.configPromise;
    }

    private async get(path: string): Promise<unknown> {
        const url = `${this.baseUrl}${path}`;
        try {
            const response = await this.http.get<unknown>(url);
            return response.data;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new LedgerUnavailableError(error.message, error.response?.status, { url });
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new LedgerUnavailableError(message, undefined, { url });
        }
    }
}
