/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { AxiosError, type AxiosAdapter, type AxiosHeaders } from 'axios';
import { createHttpClient } from '../http-client.js';

/**
 * Adapter answering every request with the given status, the way axios' own
 * adapters reject non-2xx responses.
 */
function respondWith(status: number, statusText: string): AxiosAdapter {
    return async (config) => {
        const response = { data: {}, status, statusText, headers: {}, config };
        if (status >= 400) {
            throw new AxiosError(
                `Request failed with status code ${status}`,
                AxiosError.ERR_BAD_RESPONSE,
                config,
                null,
                response
            );
        }
        return response;
    };
}

describe('createHttpClient', () => {
    it('should apply the timeout and user agent', () => {
        const client = createHttpClient({ timeoutMs: 2500 });

        expect(client.defaults.timeout).toBe(2500);
        expect(client.defaults.headers['User-Agent']).toBe('ledger-watch/1.0');
    });

    it('should send the API key header only when a key is configured', () => {
        const withKey = createHttpClient({ timeoutMs: 1000, apiKey: 'test-secret' });
        const withoutKey = createHttpClient({ timeoutMs: 1000 });

        expect(withKey.defaults.headers['X-Ledger-Api-Key']).toBe('test-secret');
        expect(withoutKey.defaults.headers['X-Ledger-Api-Key']).toBeUndefined();
    });

    it('should put the API key on outgoing requests', async () => {
        const client = createHttpClient({ timeoutMs: 1000, apiKey: 'test-secret' });
        let sent: AxiosHeaders | null = null;
        const adapter: AxiosAdapter = async (config) => {
            sent = config.headers;
            return { data: { ok: true }, status: 200, statusText: 'OK', headers: {}, config };
        };

        const response = await client.get('http://ledger.test/v1/config', { adapter });

        expect(response.data).toEqual({ ok: true });
        expect(sent).not.toBeNull();
        expect(sent).toHaveProperty(['X-Ledger-Api-Key'], 'test-secret');
    });

    it('should rewrite HTTP error messages to status and status text', async () => {
        const client = createHttpClient({ timeoutMs: 1000 });

        const error = await client
            .get('http://ledger.test/v1/blocks/latest', { adapter: respondWith(503, 'Service Unavailable') })
            .catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(AxiosError);
        expect(error).toHaveProperty('message', 'HTTP 503: Service Unavailable');
        expect(error).toHaveProperty('response.status', 503);
    });

    it('should leave errors without a response untouched', async () => {
        const client = createHttpClient({ timeoutMs: 1000 });
        const adapter: AxiosAdapter = async (config) => {
            throw new AxiosError('timeout of 1000ms exceeded', AxiosError.ECONNABORTED, config);
        };

        const error = await client.get('http://ledger.test/v1/config', { adapter }).catch((caught: unknown) => caught);

        expect(error).toHaveProperty('message', 'timeout of 1000ms exceeded');
    });
});
