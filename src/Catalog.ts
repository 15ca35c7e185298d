import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { CatalogTableStore } from "./store/CatalogTableStore";
import { HashTableStore } from "./store/TableAdapters/HashTableStore";
import { DynamoDBTableStore } from "./store/TableAdapters/DynamoDB/DynamoDBTableStore";
import { CatalogSchema } from "./schema/CatalogSchema";
import { WriteAheadLog } from "./wal/WriteAheadLog";
import { RecoverOptions, RecoveryEngine } from "./recovery/RecoveryEngine";
import { QueryEngine } from "./query/QueryEngine";
import { CatalogConfig, loadCatalogConfig } from "./config/CatalogConfig";
import { CatalogLogger, logger as sharedLogger } from "./logging/CatalogLogger";
import { MissingFieldsError } from "./CatalogErrors";
import {
    CatalogFilter,
    CatalogRecord,
    LockedSchema,
    RecoveryReport,
    RecoveryState,
    ReplayPolicy,
    RowRange,
    WALEntry,
} from "./CatalogTypes";

export interface CatalogOptions {
    indexStore: CatalogTableStore;
    walStore: CatalogTableStore;
    //configure immediately when both are given
    indexKeys?: string | readonly string[];
    primaryField?: string;
    replayPolicy?: ReplayPolicy;
    logger?: CatalogLogger;
    onRecoveryTransition?: (state: RecoveryState) => void;
    maxConcurrentWrites?: number;
}

export type HashMemoryCatalogOptions = Partial<Pick<CatalogOptions, "indexStore" | "walStore">> & Omit<CatalogOptions, "indexStore" | "walStore">;

export type DynamoDBCatalogConfig = Pick<CatalogConfig, "tableName" | "walTableName"> & Omit<CatalogOptions, "indexStore" | "walStore">;

/**
 * Secondary-index catalog over a partitioned key-value store
 *
 * Every mutation is appended to the WAL first. The index partitions are derived
 * from the WAL by the recovery engine, either right away (eager) or whenever
 * recover() is called (manual).
 */
export class Catalog
{
    readonly indexStore: CatalogTableStore;
    readonly walStore: CatalogTableStore;
    readonly replayPolicy: ReplayPolicy;

    #schema = new CatalogSchema();
    #logger: CatalogLogger;
    #wal: WriteAheadLog;
    #recovery: RecoveryEngine;
    #queries: QueryEngine;

    constructor(options: CatalogOptions)
    {
        this.indexStore = options.indexStore;
        this.walStore = options.walStore;
        this.replayPolicy = options.replayPolicy ?? "eager";
        this.#logger = options.logger ?? sharedLogger;

        this.#wal = new WriteAheadLog(this.walStore, this.#logger);
        this.#recovery = new RecoveryEngine(this.#wal, this.indexStore, this.#schema, {
            logger: this.#logger,
            onTransition: options.onRecoveryTransition,
            maxConcurrentWrites: options.maxConcurrentWrites,
        });
        this.#queries = new QueryEngine(this.indexStore, this.#schema, this.#logger);

        if (options.indexKeys !== undefined && options.primaryField !== undefined) {
            this.configure(options.indexKeys, options.primaryField);
        }
    }

    static fromHashMemory(options: HashMemoryCatalogOptions = {}): Catalog
    {
        return new Catalog({
            ...options,
            indexStore: options.indexStore ?? new HashTableStore("index"),
            walStore: options.walStore ?? new HashTableStore("wal"),
        });
    }

    static fromDynamoDB(client: DynamoDBDocumentClient, config: DynamoDBCatalogConfig): Catalog
    {
        const { tableName, walTableName, ...options } = config;
        return new Catalog({
            ...options,
            indexStore: new DynamoDBTableStore(client, tableName),
            walStore: new DynamoDBTableStore(client, walTableName),
        });
    }

    //reads CATALOG_* variables, the schema is configured from them
    static fromEnvironment(env: NodeJS.ProcessEnv = process.env, options: Pick<CatalogOptions, "logger" | "onRecoveryTransition" | "maxConcurrentWrites"> = {}): Catalog
    {
        const config = loadCatalogConfig(env);
        const client = new DynamoDBClient({ region: config.region, endpoint: config.endpoint });
        const document_client = DynamoDBDocumentClient.from(client, {
            marshallOptions: { removeUndefinedValues: true },
        });

        return Catalog.fromDynamoDB(document_client, { ...config, ...options });
    }

    get recoveryState(): RecoveryState
    {
        return this.#recovery.state;
    }

    //one-way, a second call fails with AlreadyConfiguredError
    configure(indexKeys: string | readonly string[], primaryField: string): LockedSchema
    {
        const schema = this.#schema.set(indexKeys, primaryField);
        this.#logger.info("catalog.configured", {
            table: this.indexStore.tableName,
            details: { indexKeys: schema.indexKeys, primaryField: schema.primaryField },
        });
        return schema;
    }

    get schema(): LockedSchema | undefined
    {
        return this.#schema.isLocked() ? this.#schema.requireLocked() : undefined;
    }

    /**
     * Catalog a record under every index key
     * @returns the record as given
     */
    async insert(record: CatalogRecord): Promise<CatalogRecord>
    {
        const missing = this.#schema.requiredFields().filter(field => !hasValue(record, field));
        if (missing.length > 0) throw new MissingFieldsError(missing);

        await this.#wal.append("insert", record);
        await this.#afterMutation();
        return record;
    }

    /**
     * Remove every record matching the filter (and row range) from all of its partitions
     * @returns the payloads that matched
     */
    async delete(filter: CatalogFilter, range: RowRange = {}): Promise<CatalogRecord[]>
    {
        const matches = await this.#queries.query(filter, range);

        //one entry per record, so a crash part way leaves the rest still logged
        for (const record of matches) {
            await this.#wal.append("delete", record);
        }

        //runs even without matches, so entries left behind by a failed replay still catch up
        await this.#afterMutation();
        return matches;
    }

    async query(filter: CatalogFilter, range: RowRange = {}): Promise<CatalogRecord[]>
    {
        return this.#queries.query(filter, range);
    }

    async recover(options: RecoverOptions = {}): Promise<RecoveryReport>
    {
        return this.#recovery.recover(options);
    }

    async pending(): Promise<WALEntry[]>
    {
        return this.#recovery.pending();
    }

    async #afterMutation(): Promise<void>
    {
        if (this.replayPolicy === "eager") await this.#recovery.recover();
    }
}

function hasValue(record: CatalogRecord, field: string): boolean
{
    if (!Object.hasOwn(record, field)) return false;
    const value: unknown = record[field];
    return value !== undefined && value !== null;
}
