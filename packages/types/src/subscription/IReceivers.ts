/**
 * Callback receiving newly observed blocks.
 *
 * Blocks arrive as an ordered batch so several blocks found in one poll could be
 * delivered together; today a batch always holds exactly one block. A returned
 * promise is not awaited, only watched for rejection.
 */
export type BlockReceiver<TBlock> = (blocks: readonly TBlock[]) => void | Promise<void>;

/**
 * Callback receiving the transactions of newly observed blocks.
 *
 * One batch is delivered per poll that found a new block, combining the
 * transactions of every new block in ledger order. The batch is empty when the new
 * block carried no transactions.
 */
export type TransactionReceiver<TTransaction> = (transactions: readonly TTransaction[]) => void | Promise<void>;

/**
 * Phase in which a ledger query failed.
 *
 * - `prime`: the seeding poll performed when the timer starts
 * - `tick`: a regular scheduled poll
 */
export type PollPhase = 'prime' | 'tick';

/**
 * Optional observer for ledger query failures.
 *
 * Failures are skipped silently unless one is supplied.
 */
export type PollErrorObserver = (error: unknown, phase: PollPhase) => void;
