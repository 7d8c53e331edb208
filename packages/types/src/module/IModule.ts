import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend components.
 *
 * Modules are permanent components that initialize during bootstrap and stay active
 * for the lifetime of the process.
 *
 * ## Two-Phase Lifecycle
 *
 * ### Phase 1: init(dependencies)
 * - **Purpose**: Prepare the module without starting it
 * - **Actions**: Create service instances, validate config, store dependencies
 * - **Error behavior**: Failures abort bootstrap
 *
 * ### Phase 2: run()
 * - **Purpose**: Activate the module
 * - **Actions**: Register receivers, start background work
 * - **Error behavior**: Failures abort bootstrap
 *
 * ## Bootstrap Pattern
 *
 * ```typescript
 * const subscriptionModule = new SubscriptionModule();
 *
 * await subscriptionModule.init({ logger, ledgerClient });
 * await subscriptionModule.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Module metadata used for logging and introspection.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Initialize the module with injected dependencies.
     *
     * Stores dependencies and creates services, but must not start polling or any
     * other background work; that belongs to run().
     *
     * @param dependencies - Typed dependencies object specific to this module
     * @throws {Error} If initialization fails (aborts bootstrap)
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module after every module has initialized.
     *
     * @throws {Error} If runtime setup fails (aborts bootstrap)
     */
    run(): Promise<void>;
}
