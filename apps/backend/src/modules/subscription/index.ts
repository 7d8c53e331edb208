/**
 * Subscription module public API.
 */
export { SubscriptionModule } from './SubscriptionModule.js';
export type { ISubscriptionModuleDependencies } from './SubscriptionModule.js';
export { BlockSubscriptionService } from './block-subscription.service.js';
export type { BlockSubscriptionServiceOptions } from './block-subscription.service.js';
export { SubscriberRegistry } from './subscriber-registry.js';
