/**
 * Identifying information about a backend module, used for logging and error
 * attribution.
 */
export interface IModuleMetadata {
    /**
     * Unique identifier for the module, lowercase kebab-case matching the module
     * directory name.
     *
     * @example 'subscription'
     */
    id: string;

    /** Human-readable module name */
    name: string;

    /** Semantic version string */
    version: string;

    description?: string;
}
