import {
    DeleteCommand,
    DeleteCommandOutput,
    GetCommand,
    GetCommandOutput,
    PutCommand,
    PutCommandOutput,
    QueryCommand,
    QueryCommandInput,
    QueryCommandOutput,
} from "@aws-sdk/lib-dynamodb";
import { DateTime } from "luxon";
import { uuidv7 } from "uuidv7";
import { CatalogTableStore } from "../../CatalogTableStore";
import { CreateOutcome, DeleteOutcome, EntityFields, RowKeyCondition, TableEntity } from "../../../CatalogTypes";
import { DynamoDBRequests } from "./Helpers/Requests";
import { DynamoDBItems } from "./Helpers/Items";

//the commands this adapter sends, a DynamoDBDocumentClient satisfies it
export interface DocumentCommandSender
{
    send(command: PutCommand): Promise<PutCommandOutput>;
    send(command: DeleteCommand): Promise<DeleteCommandOutput>;
    send(command: GetCommand): Promise<GetCommandOutput>;
    send(command: QueryCommand): Promise<QueryCommandOutput>;
}

export class DynamoDBTableStore extends CatalogTableStore
{
    client: DocumentCommandSender;

    constructor(client: DocumentCommandSender, tableName: string)
    {
        super(tableName);
        this.client = client;
    }

    async create_internal(partitionKey: string, rowKey: string, fields: EntityFields): Promise<CreateOutcome> {
        const item = DynamoDBItems.toItem(partitionKey, rowKey, fields, timestamp(), uuidv7());

        try {
            await this.client.send(new PutCommand(DynamoDBRequests.create(this.tableName, item)));
            return "created";
        } catch (error) {
            if (DynamoDBItems.isConditionalCheckFailure(error)) return "exists";
            throw error;
        }
    }

    async upsert_internal(partitionKey: string, rowKey: string, fields: EntityFields): Promise<void> {
        const item = DynamoDBItems.toItem(partitionKey, rowKey, fields, timestamp(), uuidv7());
        await this.client.send(new PutCommand(DynamoDBRequests.upsert(this.tableName, item)));
    }

    async delete_internal(partitionKey: string, rowKey: string): Promise<DeleteOutcome> {
        try {
            await this.client.send(new DeleteCommand(DynamoDBRequests.remove(this.tableName, partitionKey, rowKey)));
            return "deleted";
        } catch (error) {
            if (DynamoDBItems.isConditionalCheckFailure(error)) return "not_found";
            throw error;
        }
    }

    async get_internal(partitionKey: string, rowKey: string): Promise<TableEntity | undefined> {
        const data = await this.client.send(new GetCommand(DynamoDBRequests.get(this.tableName, partitionKey, rowKey)));
        if (data.Item === undefined) return undefined;
        return DynamoDBItems.toEntity(data.Item);
    }

    async query_internal(partitionKey: string, condition: RowKeyCondition): Promise<TableEntity[]> {
        //BETWEEN rejects inverted bounds, an inverted range is simply empty
        if (condition.type === "range" && condition.from !== undefined && condition.to !== undefined && condition.from > condition.to) {
            return [];
        }

        const params = DynamoDBRequests.query(this.tableName, partitionKey, condition);
        const entities: TableEntity[] = [];
        let exclusive_start_key: QueryCommandInput["ExclusiveStartKey"] = undefined;

        //follow LastEvaluatedKey until the partition is exhausted
        do {
            const data: QueryCommandOutput = await this.client.send(new QueryCommand({ ...params, ExclusiveStartKey: exclusive_start_key }));
            for (const item of data.Items ?? []) {
                entities.push(DynamoDBItems.toEntity(item));
            }
            exclusive_start_key = data.LastEvaluatedKey;
        } while (exclusive_start_key !== undefined);

        return entities;
    }
}

function timestamp(): string
{
    return DateTime.utc().toISO() ?? new Date().toISOString();
}
