/**
 * Replays WAL entries the index has not seen yet
 *
 * Invariants:
 * - Entries are applied in strictly increasing id order
 * - The checkpoint is advanced after every applied entry, never past a failed one
 * - Applying an entry twice leaves the index as applying it once
 * - A pass never moves the checkpoint below the one it started from
 */

import PromisePool from "@supercharge/promise-pool";
import { CatalogTableStore } from "../store/CatalogTableStore";
import { WriteAheadLog } from "../wal/WriteAheadLog";
import { CatalogSchema } from "../schema/CatalogSchema";
import { contentKey, partitionKey } from "../keys/KeyCodec";
import { ReplayFailure } from "../CatalogErrors";
import { CatalogLogger, logger as sharedLogger } from "../logging/CatalogLogger";
import {
    ApplyOutcome,
    EntryApplication,
    FieldApplication,
    LockedSchema,
    RecoveryReport,
    RecoveryState,
    WALEntry,
    WALEntryId,
} from "../CatalogTypes";

export interface RecoveryEngineOptions {
    logger?: CatalogLogger;
    //called on every state machine transition, in order
    onTransition?: (state: RecoveryState) => void;
    //index partitions written at once for a single entry
    maxConcurrentWrites?: number;
}

export interface RecoverOptions {
    //replay from this id instead of the stored checkpoint
    startAfter?: WALEntryId;
}

export class RecoveryEngine
{
    //change this depending on your DB API rate limits
    MAX_CONCURRENT_WRITES = 4;

    #wal: WriteAheadLog;
    #indexStore: CatalogTableStore;
    #schema: CatalogSchema;
    #logger: CatalogLogger;
    #onTransition?: (state: RecoveryState) => void;
    //settles when the last queued pass does
    #tail: Promise<unknown> = Promise.resolve();
    #state: RecoveryState = { phase: "idle" };

    constructor(wal: WriteAheadLog, indexStore: CatalogTableStore, schema: CatalogSchema, options: RecoveryEngineOptions = {})
    {
        this.#wal = wal;
        this.#indexStore = indexStore;
        this.#schema = schema;
        this.#logger = options.logger ?? sharedLogger;
        this.#onTransition = options.onTransition;
        if (options.maxConcurrentWrites !== undefined) this.MAX_CONCURRENT_WRITES = options.maxConcurrentWrites;
    }

    get state(): RecoveryState
    {
        return this.#state;
    }

    /**
     * Apply every entry after the checkpoint (or `startAfter`), checkpointing each one
     * Concurrent calls on one engine run one after another
     */
    async recover(options: RecoverOptions = {}): Promise<RecoveryReport>
    {
        const pass = this.#tail.then(() => this.#replay(options));
        //the caller still sees the rejection, the queue only waits for it
        this.#tail = pass.catch(() => undefined);
        return pass;
    }

    //entries written to the WAL that the index has not caught up with
    async pending(): Promise<WALEntry[]>
    {
        const checkpoint = await this.#wal.getCheckpoint();
        return this.#wal.entriesAfter(checkpoint);
    }

    async #replay(options: RecoverOptions): Promise<RecoveryReport>
    {
        const schema = this.#schema.requireLocked();
        const checkpoint = await this.#wal.getCheckpoint();
        const startAfter = options.startAfter ?? checkpoint;

        const report: RecoveryReport = {
            startedAfter: startAfter,
            checkpoint,
            entries: [],
            outcomes: { applied: 0, already_applied: 0, not_present: 0 },
        };

        this.#transition({ phase: "scanning", startAfter });
        try {
            const entries = await this.#wal.entriesAfter(startAfter);
            this.#logger.info("recovery.start", {
                table: this.#indexStore.tableName,
                details: { startAfter: startAfter ?? null, entries: entries.length },
            });

            for (const entry of entries) {
                this.#transition({ phase: "applying", entryId: entry.id });
                const application = await this.applyEntry(entry, schema);
                report.entries.push(application);
                for (const field of application.fields) report.outcomes[field.outcome]++;

                this.#transition({ phase: "checkpointing", entryId: entry.id });
                //an explicit startAfter may revisit entries the checkpoint is already past
                if (report.checkpoint === undefined || entry.id > report.checkpoint) {
                    await this.#checkpoint(entry.id);
                    report.checkpoint = entry.id;
                }
            }
        } finally {
            this.#transition({ phase: "idle" });
        }

        this.#logger.info("recovery.end", {
            table: this.#indexStore.tableName,
            details: { entries: report.entries.length, checkpoint: report.checkpoint ?? null, ...report.outcomes },
        });

        return report;
    }

    /**
     * Fan one WAL entry out to the partition of every index key
     * Never advances the checkpoint, that is up to the caller
     */
    async applyEntry(entry: WALEntry, schema: LockedSchema): Promise<EntryApplication>
    {
        const { indexKeys, primaryField } = schema;

        const { row_key, targets } = this.#locate(entry, indexKeys, primaryField);

        const { results, errors } = await PromisePool
            .withConcurrency(this.MAX_CONCURRENT_WRITES)
            .for(targets)
            .useCorrespondingResults()
            .process(async (target) => {
                const outcome = await this.#applyToPartition(entry, target.partitionKey, row_key);
                return { field: target.field, partitionKey: target.partitionKey, outcome } satisfies FieldApplication;
            });

        if (errors.length > 0) throw this.#failure(entry, errors[0].raw);

        const fields = results.filter((result): result is FieldApplication => typeof result === "object");

        this.#logger.debug("recovery.entry", {
            table: this.#indexStore.tableName,
            entryId: entry.id,
            details: { operation: entry.operation, contentKey: row_key, outcomes: fields.map(f => f.outcome) },
        });

        return { entryId: entry.id, operation: entry.operation, contentKey: row_key, fields };
    }

    //content key and target partitions, a payload missing a key field cannot be replayed
    #locate(entry: WALEntry, indexKeys: readonly string[], primaryField: string): { row_key: string, targets: { field: string, partitionKey: string }[] }
    {
        try {
            return {
                row_key: contentKey(entry.payload, primaryField, indexKeys),
                targets: indexKeys.map(field => ({ field, partitionKey: partitionKey(field, entry.payload[field]) })),
            };
        } catch (error) {
            throw this.#failure(entry, error);
        }
    }

    async #applyToPartition(entry: WALEntry, partition_key: string, row_key: string): Promise<ApplyOutcome>
    {
        if (entry.operation === "insert") {
            //an existing row is left as it is, presence is all an insert guarantees
            const outcome = await this.#indexStore.create(partition_key, row_key, entry.payload);
            return outcome === "created" ? "applied" : "already_applied";
        }

        const outcome = await this.#indexStore.delete(partition_key, row_key);
        return outcome === "deleted" ? "applied" : "not_present";
    }

    async #checkpoint(entryId: WALEntryId): Promise<void>
    {
        try {
            await this.#wal.advanceCheckpoint(entryId);
        } catch (error) {
            throw this.#failure({ id: entryId }, error, this.#wal.tableName);
        }
    }

    #failure(entry: Pick<WALEntry, "id">, cause: unknown, tableName: string = this.#indexStore.tableName): ReplayFailure
    {
        this.#logger.error("recovery.failed", {
            table: tableName,
            entryId: entry.id,
            message: cause instanceof Error ? cause.message : String(cause),
        });
        return new ReplayFailure(entry.id, tableName, { cause });
    }

    #transition(state: RecoveryState): void
    {
        this.#state = state;
        this.#onTransition?.(state);
    }
}
