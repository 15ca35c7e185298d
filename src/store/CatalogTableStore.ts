import { CreateOutcome, DeleteOutcome, EntityFields, RowKeyCondition, TableEntity } from "../CatalogTypes";
import { StoreUnavailableError } from "../CatalogErrors";

export type TableOperation = "create" | "upsert" | "delete" | "get" | "query";

export abstract class CatalogTableStore
{
    /**
     * The name of the table in the backing store.
     **/
    public tableName: string;

    constructor(tableName: string)
    {
        this.tableName = tableName;
    }

    //Your adapter must implement these methods to interact with your data store
    //"exists" and "not_found" are outcomes, anything thrown is a store failure
    abstract create_internal(partitionKey: string, rowKey: string, fields: EntityFields) : Promise<CreateOutcome>;
    abstract upsert_internal(partitionKey: string, rowKey: string, fields: EntityFields) : Promise<void>;
    abstract delete_internal(partitionKey: string, rowKey: string) : Promise<DeleteOutcome>;
    abstract get_internal(partitionKey: string, rowKey: string) : Promise<TableEntity | undefined>;
    //must return entities in ascending row key order
    abstract query_internal(partitionKey: string, condition: RowKeyCondition) : Promise<TableEntity[]>;

    async create(partitionKey: string, rowKey: string, fields: EntityFields): Promise<CreateOutcome>
    {
        return this.guard("create", () => this.create_internal(partitionKey, rowKey, fields));
    }

    async upsert(partitionKey: string, rowKey: string, fields: EntityFields): Promise<void>
    {
        return this.guard("upsert", () => this.upsert_internal(partitionKey, rowKey, fields));
    }

    async delete(partitionKey: string, rowKey: string): Promise<DeleteOutcome>
    {
        return this.guard("delete", () => this.delete_internal(partitionKey, rowKey));
    }

    async get(partitionKey: string, rowKey: string): Promise<TableEntity | undefined>
    {
        return this.guard("get", () => this.get_internal(partitionKey, rowKey));
    }

    async query(partitionKey: string, condition: RowKeyCondition = { type: "range" }): Promise<TableEntity[]>
    {
        return this.guard("query", () => this.query_internal(partitionKey, condition));
    }

    private async guard<T>(operation: TableOperation, fn: () => Promise<T>): Promise<T>
    {
        try {
            return await fn();
        } catch (error) {
            if (error instanceof StoreUnavailableError) throw error;
            throw new StoreUnavailableError(operation, this.tableName, { cause: error });
        }
    }
}
