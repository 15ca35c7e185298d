import { DeleteCommandInput, GetCommandInput, PutCommandInput, QueryCommandInput } from "@aws-sdk/lib-dynamodb";
import { RowKeyCondition } from "../../../../CatalogTypes";
import { DynamoDBEntityItem } from "./Items";

//the catalog table key schema: pk (HASH, S), rk (RANGE, S)
export const PARTITION_KEY_ATTRIBUTE = "pk";
export const ROW_KEY_ATTRIBUTE = "rk";

export namespace DynamoDBRequests {

    export function create(tableName: string, item: DynamoDBEntityItem): PutCommandInput {
        return {
            TableName: tableName,
            Item: item,
            //only write when nothing occupies (pk, rk) yet
            ConditionExpression: "attribute_not_exists(#pk)",
            ExpressionAttributeNames: { "#pk": PARTITION_KEY_ATTRIBUTE },
        };
    }

    export function upsert(tableName: string, item: DynamoDBEntityItem): PutCommandInput {
        return {
            TableName: tableName,
            Item: item,
        };
    }

    export function remove(tableName: string, partitionKey: string, rowKey: string): DeleteCommandInput {
        return {
            TableName: tableName,
            Key: { [PARTITION_KEY_ATTRIBUTE]: partitionKey, [ROW_KEY_ATTRIBUTE]: rowKey },
            ConditionExpression: "attribute_exists(#pk)",
            ExpressionAttributeNames: { "#pk": PARTITION_KEY_ATTRIBUTE },
        };
    }

    export function get(tableName: string, partitionKey: string, rowKey: string): GetCommandInput {
        return {
            TableName: tableName,
            Key: { [PARTITION_KEY_ATTRIBUTE]: partitionKey, [ROW_KEY_ATTRIBUTE]: rowKey },
            ConsistentRead: true,
        };
    }

    //DynamoDB takes a single sort key condition, so "after" and "range" map to one expression each
    export function query(tableName: string, partitionKey: string, condition: RowKeyCondition): QueryCommandInput {
        const names: Record<string, string> = { "#pk": PARTITION_KEY_ATTRIBUTE };
        const values: Record<string, string> = { ":pk": partitionKey };
        let expression = "#pk = :pk";

        if (condition.type === "after") {
            names["#rk"] = ROW_KEY_ATTRIBUTE;
            values[":after"] = condition.rowKey;
            expression += " AND #rk > :after";
        } else if (condition.from !== undefined && condition.to !== undefined) {
            names["#rk"] = ROW_KEY_ATTRIBUTE;
            values[":from"] = condition.from;
            values[":to"] = condition.to;
            expression += " AND #rk BETWEEN :from AND :to";
        } else if (condition.from !== undefined) {
            names["#rk"] = ROW_KEY_ATTRIBUTE;
            values[":from"] = condition.from;
            expression += " AND #rk >= :from";
        } else if (condition.to !== undefined) {
            names["#rk"] = ROW_KEY_ATTRIBUTE;
            values[":to"] = condition.to;
            expression += " AND #rk <= :to";
        }

        return {
            TableName: tableName,
            KeyConditionExpression: expression,
            ExpressionAttributeNames: names,
            ExpressionAttributeValues: values,
            ScanIndexForward: true,
            ConsistentRead: true,
        };
    }
}
