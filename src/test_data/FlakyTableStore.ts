import { HashTableStore } from "../store/TableAdapters/HashTableStore";
import { TableOperation } from "../store/CatalogTableStore";
import { CatalogRecord, CreateOutcome, DeleteOutcome, EntityFields, RowKeyCondition, TableEntity } from "../CatalogTypes";

type Fault = {
    operation: TableOperation,
    //only calls on this partition fail, any partition when unset
    partitionKey?: string,
    remaining: number
};

/*
In-memory table that fails on demand, standing in for an unreachable backend.
Faults are injected below the base class so they surface the way a real adapter error would.
*/
export class FlakyTableStore extends HashTableStore
{
    #faults: Fault[] = [];
    calls: { operation: TableOperation, partitionKey: string, rowKey?: string }[] = [];

    failNext(operation: TableOperation, partitionKey?: string, times: number = 1): this {
        this.#faults.push({ operation, partitionKey, remaining: times });
        return this;
    }

    create_internal(partitionKey: string, rowKey: string, fields: EntityFields): Promise<CreateOutcome> {
        this.trip("create", partitionKey, rowKey);
        return super.create_internal(partitionKey, rowKey, fields);
    }

    upsert_internal(partitionKey: string, rowKey: string, fields: EntityFields): Promise<void> {
        this.trip("upsert", partitionKey, rowKey);
        return super.upsert_internal(partitionKey, rowKey, fields);
    }

    delete_internal(partitionKey: string, rowKey: string): Promise<DeleteOutcome> {
        this.trip("delete", partitionKey, rowKey);
        return super.delete_internal(partitionKey, rowKey);
    }

    get_internal(partitionKey: string, rowKey: string): Promise<TableEntity | undefined> {
        this.trip("get", partitionKey, rowKey);
        return super.get_internal(partitionKey, rowKey);
    }

    query_internal(partitionKey: string, condition: RowKeyCondition): Promise<TableEntity[]> {
        this.trip("query", partitionKey);
        return super.query_internal(partitionKey, condition);
    }

    private trip(operation: TableOperation, partitionKey: string, rowKey?: string): void {
        this.calls.push({ operation, partitionKey, rowKey });

        const fault = this.#faults.find(f => f.operation === operation && (f.partitionKey === undefined || f.partitionKey === partitionKey));
        if (!fault) return;

        fault.remaining--;
        if (fault.remaining <= 0) this.#faults.splice(this.#faults.indexOf(fault), 1);
        throw new Error(`injected ${operation} failure on ${partitionKey}`);
    }
}

export const PEOPLE: CatalogRecord[] = [
    { id: "1", name: "Ada", email: "ada@example.com", city: "London" },
    { id: "2", name: "Grace", email: "grace@example.com", city: "Arlington" },
    { id: "3", name: "Alan", email: "alan@example.com", city: "London" },
    { id: "4", name: "Ada", email: "ada.b@example.com", city: "Paris" },
];
