import type { ILedgerBlock } from './ILedgerBlock.js';
import type { ILedgerConfig } from './ILedgerConfig.js';

/**
 * Narrow read contract the subscription service needs from a ledger.
 *
 * The ledger only answers "what is your head block right now"; there is no
 * streaming interface, which is why the subscription service polls. Any transport
 * (HTTP, websocket RPC, in-process fake) can stand behind this interface.
 *
 * @template TBlock - Block shape returned by the ledger
 */
export interface ILedgerClient<TBlock extends ILedgerBlock<unknown> = ILedgerBlock> {
    /**
     * Fetch the current head block.
     *
     * Rejects when the ledger is unreachable or answers with an error. Callers
     * treat every rejection as transient.
     */
    getLatestBlock(): Promise<TBlock>;

    /**
     * Fetch the ledger configuration, including the block interval.
     */
    getConfig(): Promise<ILedgerConfig>;
}
