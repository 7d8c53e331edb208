import { randomUUID } from 'node:crypto';
import type { ISubscriptionHandle, SubscriptionKind } from '@ledgerwatch/types';

/**
 * Result of registering a receiver.
 */
export interface RegistrationResult {
    handle: ISubscriptionHandle;
    /** False when the receiver was already registered */
    added: boolean;
}

/**
 * Set of receivers of one kind, addressable by receiver identity or by handle.
 *
 * Each receiver is stored once; registering it again hands back the handle issued
 * the first time. Handles from another registry are ignored on removal.
 */
export class SubscriberRegistry<TReceiver extends (...args: never[]) => unknown> {
    private readonly handlesByReceiver = new Map<TReceiver, ISubscriptionHandle>();
    private readonly receiversById = new Map<string, TReceiver>();

    public constructor(private readonly kind: SubscriptionKind) {}

    public get size(): number {
        return this.receiversById.size;
    }

    public add(receiver: TReceiver): RegistrationResult {
        const existing = this.handlesByReceiver.get(receiver);
        if (existing) {
            return { handle: existing, added: false };
        }

        const handle: ISubscriptionHandle = Object.freeze({ id: randomUUID(), kind: this.kind });
        this.handlesByReceiver.set(receiver, handle);
        this.receiversById.set(handle.id, receiver);
        return { handle, added: true };
    }

    /**
     * Remove a registration by handle or by receiver.
     *
     * @returns The removed handle, or null when nothing matched
     */
    public remove(subscription: ISubscriptionHandle | TReceiver): ISubscriptionHandle | null {
        const handle = typeof subscription === 'function'
            ? this.handlesByReceiver.get(subscription)
            : subscription;

        if (!handle || handle.kind !== this.kind) {
            return null;
        }

        const receiver = this.receiversById.get(handle.id);
        if (!receiver) {
            return null;
        }

        this.receiversById.delete(handle.id);
        this.handlesByReceiver.delete(receiver);
        return handle;
    }

    /**
     * Registered receivers paired with their handles, copied so callers can iterate
     * while receivers subscribe or unsubscribe.
     */
    public snapshot(): Array<[ISubscriptionHandle, TReceiver]> {
        return Array.from(this.handlesByReceiver, ([receiver, handle]): [ISubscriptionHandle, TReceiver] => [handle, receiver]);
    }

    /**
     * Whether a receiver is still registered under the given handle.
     */
    public isActive(handle: ISubscriptionHandle): boolean {
        return this.receiversById.has(handle.id);
    }

    public clear(): void {
        this.handlesByReceiver.clear();
        this.receiversById.clear();
    }
}
