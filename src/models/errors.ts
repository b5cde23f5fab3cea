/** Raised at startup when the environment is missing or has a malformed setting. */
export class ConfigurationError extends Error {
    constructor(message: string, readonly variables: string[] = []) {
        super(message);
        this.name = "ConfigurationError";
    }
}
