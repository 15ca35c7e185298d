import { ConditionalCheckFailedException } from "@aws-sdk/client-dynamodb";
import {
    DeleteCommand,
    DeleteCommandInput,
    DeleteCommandOutput,
    GetCommand,
    GetCommandInput,
    GetCommandOutput,
    PutCommand,
    PutCommandInput,
    PutCommandOutput,
    QueryCommand,
    QueryCommandInput,
    QueryCommandOutput,
} from "@aws-sdk/lib-dynamodb";
import { DocumentCommandSender } from "../store/TableAdapters/DynamoDB/DynamoDBTableStore";

type Item = NonNullable<PutCommandInput["Item"]>;
type SentCommand = "put" | "delete" | "get" | "query";

/*
In-process stand-in for a DynamoDB document client.
Understands exactly the requests DynamoDBRequests builds: (pk, rk) keys, the two
conditional expressions and the sort key conditions. Query results come back in pages.
*/
export class FakeDocumentClient implements DocumentCommandSender
{
    tables: { [tableName: string]: Map<string, Item> } = {};
    sent: SentCommand[] = [];
    #failures = 0;

    constructor(public pageSize: number = 100) {}

    //the next `times` commands fail the way a throttled or unreachable table would
    failNext(times: number = 1): this {
        this.#failures += times;
        return this;
    }

    send(command: PutCommand): Promise<PutCommandOutput>;
    send(command: DeleteCommand): Promise<DeleteCommandOutput>;
    send(command: GetCommand): Promise<GetCommandOutput>;
    send(command: QueryCommand): Promise<QueryCommandOutput>;
    async send(command: PutCommand | DeleteCommand | GetCommand | QueryCommand): Promise<PutCommandOutput | DeleteCommandOutput | GetCommandOutput | QueryCommandOutput> {
        if (command instanceof PutCommand) return this.dispatch("put", () => this.put(command.input));
        if (command instanceof DeleteCommand) return this.dispatch("delete", () => this.remove(command.input));
        if (command instanceof GetCommand) return this.dispatch("get", () => this.get(command.input));
        return this.dispatch("query", () => this.query(command.input));
    }

    private dispatch<T>(name: SentCommand, fn: () => T): T {
        this.sent.push(name);
        if (this.#failures > 0) {
            this.#failures--;
            throw new Error(`injected ${name} failure`);
        }
        return fn();
    }

    private put(input: PutCommandInput): PutCommandOutput {
        const table = this.table(input.TableName);
        const item = input.Item ?? {};
        const key = itemKey(item.pk, item.rk);

        if (input.ConditionExpression === "attribute_not_exists(#pk)" && table.has(key)) throw conditionalFailure();

        table.set(key, structuredClone(item));
        return { $metadata: {} };
    }

    private remove(input: DeleteCommandInput): DeleteCommandOutput {
        const table = this.table(input.TableName);
        const key = itemKey(input.Key?.pk, input.Key?.rk);

        if (input.ConditionExpression === "attribute_exists(#pk)" && !table.has(key)) throw conditionalFailure();

        table.delete(key);
        return { $metadata: {} };
    }

    private get(input: GetCommandInput): GetCommandOutput {
        const item = this.table(input.TableName).get(itemKey(input.Key?.pk, input.Key?.rk));
        return { Item: item ? structuredClone(item) : undefined, $metadata: {} };
    }

    private query(input: QueryCommandInput): QueryCommandOutput {
        const values = input.ExpressionAttributeValues ?? {};
        const start = input.ExclusiveStartKey;

        const rows = [...this.table(input.TableName).values()]
            .filter(item => item.pk === values[":pk"])
            .filter(item => values[":after"] === undefined || String(item.rk) > String(values[":after"]))
            .filter(item => values[":from"] === undefined || String(item.rk) >= String(values[":from"]))
            .filter(item => values[":to"] === undefined || String(item.rk) <= String(values[":to"]))
            .filter(item => start === undefined || String(item.rk) > String(start.rk))
            .sort((a, b) => compareRowKeys(String(a.rk), String(b.rk)));

        const page = rows.slice(0, this.pageSize);
        const last = page[page.length - 1];

        return {
            Items: page.map(item => structuredClone(item)),
            LastEvaluatedKey: rows.length > page.length && last ? { pk: last.pk, rk: last.rk } : undefined,
            $metadata: {},
        };
    }

    private table(tableName: string | undefined): Map<string, Item> {
        const name = tableName ?? "";
        if (!this.tables[name]) this.tables[name] = new Map();
        return this.tables[name];
    }
}

function itemKey(partitionKey: unknown, rowKey: unknown): string
{
    return `${String(partitionKey)}\u0000${String(rowKey)}`;
}

//DynamoDB orders sort keys by code unit, like the string comparison operators
function compareRowKeys(a: string, b: string): number
{
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

function conditionalFailure(): ConditionalCheckFailedException
{
    return new ConditionalCheckFailedException({ message: "The conditional request failed", $metadata: {} });
}
