/**
 * Which registry a subscription belongs to.
 */
export type SubscriptionKind = 'blocks' | 'transactions';

/**
 * Opaque token returned by a subscribe call.
 *
 * Callers keep the handle and pass it back to unsubscribe. Subscribing the same
 * receiver twice returns the same handle, so there is never more than one handle
 * per receiver and kind.
 */
export interface ISubscriptionHandle {
    /** Unique subscription identifier */
    readonly id: string;
    /** Registry the handle was issued by */
    readonly kind: SubscriptionKind;
}
