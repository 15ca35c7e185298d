/**
 * Write-Ahead Log for catalog mutations
 *
 * Entries live in the `wal` partition of their own table, keyed by a sortable id,
 * and are never changed or removed here. A single checkpoint row in the `metadata`
 * partition records the last entry whose effects reached the index.
 */

import { DateTime } from "luxon";
import { uuidv7 } from "uuidv7";
import { CatalogTableStore } from "../store/CatalogTableStore";
import { CatalogRecord, CreateOutcome, TableEntity, WALEntry, WALEntryId, WALOperation } from "../CatalogTypes";
import { CorruptEntryError, DurabilityFailure, InvalidRecordError } from "../CatalogErrors";
import { CatalogRecordSchema, CheckpointFieldsSchema, WALEntryFieldsSchema } from "../CatalogValidation";
import { CatalogLogger, logger as sharedLogger } from "../logging/CatalogLogger";

export const WAL_PARTITION = "wal";
export const CHECKPOINT_PARTITION = "metadata";
export const CHECKPOINT_ROW = "checkpoint";

const ENTRY_TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSS";
const MAX_APPEND_ATTEMPTS = 3;

//last timestamp handed out by this process, in epoch millis
let last_issued_millis = 0;

/**
 * Lexicographically sortable WAL entry id
 * UTC timestamp first, then a uuidv7 so ids never collide.
 * The timestamp strictly increases within the process, even when the wall clock steps back,
 * so a new entry never sorts below one appended before it.
 */
export function makeEntryId(): WALEntryId
{
    last_issued_millis = Math.max(DateTime.utc().toMillis(), last_issued_millis + 1);
    const timestamp = DateTime.fromMillis(last_issued_millis, { zone: "utc" }).toFormat(ENTRY_TIMESTAMP_FORMAT);
    return `${timestamp}_${uuidv7()}`;
}

export class WriteAheadLog
{
    #store: CatalogTableStore;
    #logger: CatalogLogger;

    constructor(store: CatalogTableStore, logger: CatalogLogger = sharedLogger)
    {
        this.#store = store;
        this.#logger = logger;
    }

    get tableName(): string
    {
        return this.#store.tableName;
    }

    /**
     * Durably record a mutation intent
     * A payload that could not be read back is refused before anything is written
     * @returns the new entry's id
     */
    async append(operation: WALOperation, payload: CatalogRecord): Promise<WALEntryId>
    {
        const parsed = CatalogRecordSchema.safeParse(payload);
        if (!parsed.success) {
            const fields = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
            throw new InvalidRecordError(fields, { cause: parsed.error });
        }

        for (let attempt = 1; attempt <= MAX_APPEND_ATTEMPTS; attempt++) {
            const entryId = makeEntryId();

            const outcome = await this.#create(entryId, operation, payload);

            if (outcome === "created") {
                this.#logger.debug("wal.append", { table: this.tableName, entryId, details: { operation } });
                return entryId;
            }

            //ids are unique by construction, a clash means somebody else wrote this row
            this.#logger.warn("wal.append.conflict", { table: this.tableName, entryId, details: { attempt } });
        }

        throw new DurabilityFailure(this.tableName);
    }

    async #create(entryId: WALEntryId, operation: WALOperation, payload: CatalogRecord): Promise<CreateOutcome>
    {
        try {
            return await this.#store.create(WAL_PARTITION, entryId, { operation, payload });
        } catch (error) {
            this.#logger.error("wal.append.failed", { table: this.tableName, entryId, details: { operation } });
            throw new DurabilityFailure(this.tableName, { cause: error });
        }
    }

    /**
     * Entries with an id strictly greater than `entryId`, ascending
     * Stateless: every call scans the log as it is right now
     */
    async entriesAfter(entryId?: WALEntryId): Promise<WALEntry[]>
    {
        const entities = await this.#store.query(
            WAL_PARTITION,
            entryId === undefined ? { type: "range" } : { type: "after", rowKey: entryId }
        );
        return entities.map(toWALEntry);
    }

    async getCheckpoint(): Promise<WALEntryId | undefined>
    {
        const entity = await this.#store.get(CHECKPOINT_PARTITION, CHECKPOINT_ROW);
        if (entity === undefined) return undefined;

        const parsed = CheckpointFieldsSchema.safeParse(entity.fields);
        if (!parsed.success) throw new CorruptEntryError(CHECKPOINT_ROW, { cause: parsed.error });
        return parsed.data.entryId;
    }

    //last writer wins, no comparison with what is stored
    async advanceCheckpoint(entryId: WALEntryId): Promise<void>
    {
        await this.#store.upsert(CHECKPOINT_PARTITION, CHECKPOINT_ROW, {
            entryId,
            updatedAt: DateTime.utc().toISO() ?? new Date().toISOString(),
        });
    }
}

function toWALEntry(entity: TableEntity): WALEntry
{
    const parsed = WALEntryFieldsSchema.safeParse(entity.fields);
    if (!parsed.success) throw new CorruptEntryError(entity.rowKey, { cause: parsed.error });

    return {
        id: entity.rowKey,
        operation: parsed.data.operation,
        payload: parsed.data.payload,
    };
}
