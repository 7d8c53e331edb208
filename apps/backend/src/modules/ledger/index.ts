export { LedgerRpcClient, type LedgerRpcClientOptions } from './ledger-rpc.client.js';
export { normalizeBlock, normalizeConfig, isSameBlock } from './ledger-normalizer.js';
