/**
 * Two-phase module contract implemented by long-lived backend components.
 */
export type { IModule } from './IModule.js';
export type { IModuleMetadata } from './IModuleMetadata.js';
