import BTree from "sorted-btree";
import { DateTime } from "luxon";
import { CatalogTableStore } from "../CatalogTableStore";
import { CreateOutcome, DeleteOutcome, EntityFields, RowKeyCondition, TableEntity } from "../../CatalogTypes";

/*
In-memory partitioned table, one B-tree per partition keyed by row key.
Scan a range of rows: tree.entries(lowKey) walks upward from lowKey (or the next higher key)
*/

export class HashTableStore extends CatalogTableStore
{
    partitions: { [partitionKey: string]: BTree<string, TableEntity> } = {};
    #etag_counter = 0;

    constructor(tableName: string = "memory")
    {
        super(tableName);
    }

    create_internal(partitionKey: string, rowKey: string, fields: EntityFields): Promise<CreateOutcome> {
        const added = this.partition(partitionKey).setIfNotPresent(rowKey, this.toEntity(partitionKey, rowKey, fields));
        return Promise.resolve(added ? "created" : "exists");
    }

    upsert_internal(partitionKey: string, rowKey: string, fields: EntityFields): Promise<void> {
        this.partition(partitionKey).set(rowKey, this.toEntity(partitionKey, rowKey, fields), true);
        return Promise.resolve();
    }

    delete_internal(partitionKey: string, rowKey: string): Promise<DeleteOutcome> {
        const tree = this.partitions[partitionKey];
        if (!tree || !tree.delete(rowKey)) return Promise.resolve("not_found");

        //drop emptied partitions so the store looks like it was never written
        if (tree.size === 0) delete this.partitions[partitionKey];
        return Promise.resolve("deleted");
    }

    get_internal(partitionKey: string, rowKey: string): Promise<TableEntity | undefined> {
        const entity = this.partitions[partitionKey]?.get(rowKey);
        return Promise.resolve(entity ? copyEntity(entity) : undefined);
    }

    query_internal(partitionKey: string, condition: RowKeyCondition): Promise<TableEntity[]> {
        const tree = this.partitions[partitionKey];
        if (!tree) return Promise.resolve([]);

        const results: TableEntity[] = [];
        const lowest = condition.type === "after" ? condition.rowKey : condition.from;

        for (const [rowKey, entity] of tree.entries(lowest)) {
            if (condition.type === "after" && rowKey === condition.rowKey) continue;
            if (condition.type === "range" && condition.to !== undefined && rowKey > condition.to) break;
            results.push(copyEntity(entity));
        }

        return Promise.resolve(results);
    }

    //number of entities across every partition, handy for assertions
    get size(): number {
        return Object.values(this.partitions).reduce((acc, tree) => acc + tree.size, 0);
    }

    private partition(partitionKey: string): BTree<string, TableEntity> {
        //if the pk doesn't exist, create it
        if (!this.partitions[partitionKey]) {
            this.partitions[partitionKey] = new BTree<string, TableEntity>();
        }
        return this.partitions[partitionKey];
    }

    private toEntity(partitionKey: string, rowKey: string, fields: EntityFields): TableEntity {
        this.#etag_counter++;
        return {
            partitionKey,
            rowKey,
            fields: structuredClone(fields),
            metadata: {
                createdAt: DateTime.utc().toISO() ?? undefined,
                etag: `W/"${this.#etag_counter}"`,
            },
        };
    }
}

function copyEntity(entity: TableEntity): TableEntity
{
    return {
        partitionKey: entity.partitionKey,
        rowKey: entity.rowKey,
        fields: structuredClone(entity.fields),
        metadata: { ...entity.metadata },
    };
}
