/**
 * Error helpers shared by the oracle clients, persistence layer and loop.
 */

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Raised by PersistenceStore implementations when a read or write fails.
 * The engine catches it per pair and drops the remaining writes.
 */
export class PersistenceError extends Error {
    readonly operation: string;

    constructor(operation: string, message: string) {
        super(`${operation}: ${message}`);
        this.name = 'PersistenceError';
        this.operation = operation;
    }
}

/**
 * Raised by oracle clients for non-2xx responses or unusable payloads.
 */
export class OracleError extends Error {
    readonly oracle: string;

    constructor(oracle: string, message: string) {
        super(`${oracle}: ${message}`);
        this.name = 'OracleError';
        this.oracle = oracle;
    }
}

/**
 * Raised by notifiers when the chat API refuses a message.
 */
export class DeliveryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DeliveryError';
    }
}
