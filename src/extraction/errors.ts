/**
 * Raised for invalid extractor configuration: an unknown match strategy, an
 * empty marker list, a marker the engine cannot compile or an unknown
 * section name.
 *
 * Always thrown synchronously by the call that received the bad value.
 */
export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly issues: readonly string[] = [],
    ) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
