import { z } from "zod";
import { ConditionalCheckFailedException } from "@aws-sdk/client-dynamodb";
import { EntityFields, TableEntity } from "../../../../CatalogTypes";
import { EntityFieldsSchema } from "../../../../CatalogValidation";

//NOTE: This is the type that is actually stored in the table
//short attribute names keep the storage metadata small and out of the payload's way
export type DynamoDBEntityItem = {
    pk: string, //partition key
    rk: string, //sort key
    f: EntityFields, //payload
    ts: string, //ISO8601 write time
    v: string, //concurrency token, a fresh uuidv7 per write
}

const DynamoDBEntityItemSchema = z.object({
    pk: z.string(),
    rk: z.string(),
    f: EntityFieldsSchema,
    ts: z.string().optional(),
    v: z.string().optional(),
});

export namespace DynamoDBItems {

    export function toItem(partitionKey: string, rowKey: string, fields: EntityFields, timestamp: string, version: string): DynamoDBEntityItem {
        return { pk: partitionKey, rk: rowKey, f: fields, ts: timestamp, v: version };
    }

    //throws a ZodError when the item was not written by this library
    export function toEntity(item: Record<string, unknown>): TableEntity {
        const parsed = DynamoDBEntityItemSchema.parse(item);
        return {
            partitionKey: parsed.pk,
            rowKey: parsed.rk,
            fields: parsed.f,
            metadata: { createdAt: parsed.ts, etag: parsed.v },
        };
    }

    export function isConditionalCheckFailure(error: unknown): boolean {
        if (error instanceof ConditionalCheckFailedException) return true;
        return error instanceof Error && error.name === "ConditionalCheckFailedException";
    }
}
