/**
 * Error types for catalog operations
 *
 * Invariants:
 * - Every error has a stable `name` and `code` for programmatic handling
 * - Every error accepts a `cause` for wrapping the underlying failure
 * - "already exists" and "not found" during replay are outcomes, never errors
 */

import { WALEntryId } from "./CatalogTypes";

/**
 * Base class for all catalog errors
 */
export abstract class CatalogError extends Error
{
    abstract readonly code: string;

    constructor(message: string, options?: ErrorOptions)
    {
        super(message, options);
        this.name = this.constructor.name;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

//Configuration: fatal to the call, never retried internally

export abstract class ConfigurationError extends CatalogError {}

export class AlreadyConfiguredError extends ConfigurationError
{
    readonly code = "ALREADY_CONFIGURED";

    constructor(options?: ErrorOptions)
    {
        super("Schema is already configured and locked", options);
    }
}

export class NotConfiguredError extends ConfigurationError
{
    readonly code = "NOT_CONFIGURED";

    constructor(options?: ErrorOptions)
    {
        super("Schema is not configured", options);
    }
}

export class InvalidSchemaError extends ConfigurationError
{
    readonly code = "INVALID_SCHEMA";

    constructor(public readonly reason: string, options?: ErrorOptions)
    {
        super(`Invalid schema: ${reason}`, options);
    }
}

export class MissingConfigurationError extends ConfigurationError
{
    readonly code = "MISSING_CONFIGURATION";

    constructor(public readonly variables: string[], options?: ErrorOptions)
    {
        super(`Missing or invalid configuration: ${variables.join(", ")}`, options);
    }
}

//Validation: the caller has to fix the input

export abstract class ValidationError extends CatalogError {}

export class MissingFieldsError extends ValidationError
{
    readonly code = "MISSING_FIELDS";

    constructor(public readonly fields: string[], options?: ErrorOptions)
    {
        super(`Record is missing required fields: ${fields.join(", ")}`, options);
    }
}

export class MissingIndexValueError extends ValidationError
{
    readonly code = "MISSING_INDEX_VALUE";

    constructor(public readonly field: string, options?: ErrorOptions)
    {
        super(`Record has no value for key field "${field}"`, options);
    }
}

export class InvalidRecordError extends ValidationError
{
    readonly code = "INVALID_RECORD";

    constructor(public readonly fields: string[], options?: ErrorOptions)
    {
        super(`Record has values that cannot be stored: ${fields.join(", ")}`, options);
    }
}

export class EmptyFilterError extends ValidationError
{
    readonly code = "EMPTY_FILTER";

    constructor(options?: ErrorOptions)
    {
        super("Filter must name at least one index key", options);
    }
}

export class UnknownFieldError extends ValidationError
{
    readonly code = "UNKNOWN_FIELD";

    constructor(public readonly field: string, options?: ErrorOptions)
    {
        super(`"${field}" is not a known index key`, options);
    }
}

//Store: the backing store refused or could not be reached

export class StoreUnavailableError extends CatalogError
{
    readonly code: string = "STORE_UNAVAILABLE";

    constructor(public readonly operation: string, public readonly tableName: string, options?: ErrorOptions)
    {
        super(`Backing store ${operation} failed on table "${tableName}"`, options);
    }
}

/**
 * Thrown when a WAL append is not durable. Nothing was committed, retry the whole mutation.
 */
export class DurabilityFailure extends StoreUnavailableError
{
    readonly code = "DURABILITY_FAILURE";

    constructor(tableName: string, options?: ErrorOptions)
    {
        super("wal append", tableName, options);
        this.message = `WAL append to table "${tableName}" was not durable`;
    }
}

/**
 * Thrown when recovery stops at an entry. The checkpoint still points at the last applied entry.
 */
export class ReplayFailure extends StoreUnavailableError
{
    readonly code = "REPLAY_FAILURE";

    constructor(public readonly entryId: WALEntryId, tableName: string, options?: ErrorOptions)
    {
        super("replay", tableName, options);
        this.message = `Replay of WAL entry ${entryId} failed on table "${tableName}"`;
    }
}

export class CorruptEntryError extends CatalogError
{
    readonly code = "CORRUPT_ENTRY";

    constructor(public readonly key: string, options?: ErrorOptions)
    {
        super(`Stored entry ${key} is malformed`, options);
    }
}
