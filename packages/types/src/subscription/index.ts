/**
 * Block and transaction subscription type definitions.
 */
export type { SubscriptionKind, ISubscriptionHandle } from './ISubscriptionHandle.js';
export type { BlockReceiver, TransactionReceiver, PollPhase, PollErrorObserver } from './IReceivers.js';
export type { ISubscriptionStats } from './ISubscriptionStats.js';
export type { IBlockSubscriptionService } from './IBlockSubscriptionService.js';
