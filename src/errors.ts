export type ConfigurationField = "capacity" | "strategy";

/**
 * Raised when a list is built (or re-pointed) with settings it cannot run with.
 */
export class InvalidConfigurationError extends Error {
    readonly field: ConfigurationField;

    constructor(field: ConfigurationField, message: string) {
        super(message);
        this.name = "InvalidConfigurationError";
        this.field = field;
    }
}
