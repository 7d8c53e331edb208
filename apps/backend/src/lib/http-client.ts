import axios, { type AxiosInstance } from 'axios';

export interface HttpClientOptions {
  timeoutMs: number;
  apiKey?: string;
}

/**
 * Create the axios instance used to talk to the ledger.
 *
 * HTTP failures get their message rewritten to `HTTP <status>: <statusText>` so log
 * lines stay short; the original response is still attached to the error.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const headers: Record<string, string> = {
    'User-Agent': 'ledger-watch/1.0'
  };
  if (options.apiKey) {
    headers['X-Ledger-Api-Key'] = options.apiKey;
  }

  const client = axios.create({
    timeout: options.timeoutMs,
    headers
  });

  client.interceptors.response.use(
    response => response,
    (error: unknown) => {
      if (axios.isAxiosError(error) && error.response) {
        error.message = `HTTP ${error.response.status}: ${error.response.statusText}`;
      }
      return Promise.reject(error);
    }
  );

  return client;
}
