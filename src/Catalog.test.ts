import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { Settings } from "luxon";
import { Catalog } from "./Catalog";
import { CatalogLogger } from "./logging/CatalogLogger";
import { HashTableStore } from "./store/TableAdapters/HashTableStore";
import { DynamoDBTableStore } from "./store/TableAdapters/DynamoDB/DynamoDBTableStore";
import { FlakyTableStore, PEOPLE } from "./test_data/FlakyTableStore";
import { partitionKey } from "./keys/KeyCodec";
import {
    AlreadyConfiguredError,
    DurabilityFailure,
    InvalidRecordError,
    MissingFieldsError,
    NotConfiguredError,
    ReplayFailure,
} from "./CatalogErrors";
import { RecoveryState } from "./CatalogTypes";

const silent = new CatalogLogger({ enabled: false });

const U1 = { userId: "u1", email: "a@x.com", team: "eng" };

function users() {
    return Catalog.fromHashMemory({ indexKeys: ["email", "team"], primaryField: "userId", logger: silent });
}

function people(options: { indexStore?: HashTableStore, walStore?: HashTableStore, replayPolicy?: "eager" | "manual" } = {}) {
    return Catalog.fromHashMemory({ ...options, indexKeys: "name,city,email", primaryField: "id", logger: silent });
}

describe('Catalog', () => {
    afterEach(() => {
        Settings.now = () => Date.now();
    });

    test('user_scenario', async () => {
        const catalog = users();

        expect(await catalog.insert(U1)).toEqual(U1);
        expect(await catalog.query({ email: "a@x.com" })).toEqual([U1]);
        expect(await catalog.query({ email: "a@x.com", team: "eng" })).toEqual([U1]);

        expect(await catalog.delete({ team: "eng" })).toEqual([U1]);
        expect(await catalog.query({ email: "a@x.com" })).toEqual([]);
        expect(await catalog.query({ team: "eng" })).toEqual([]);
    });

    test('insert_is_visible_under_every_key', async () => {
        const catalog = people();
        for (const person of PEOPLE) await catalog.insert(person);

        for (const field of ["name", "city", "email"]) {
            expect(await catalog.query({ [field]: PEOPLE[2][field] })).toContainEqual(PEOPLE[2]);
        }
        expect(await catalog.query({ name: "Ada" })).toEqual([PEOPLE[0], PEOPLE[3]]);
        expect(await catalog.pending()).toEqual([]);
    });

    test('insert_twice_has_no_duplicates', async () => {
        const catalog = users();
        await catalog.insert(U1);
        await catalog.insert({ ...U1 });

        expect(await catalog.query({ team: "eng" })).toEqual([U1]);
    });

    test('delete_without_matches_is_a_no_op', async () => {
        const walStore = new HashTableStore("wal");
        const catalog = people({ walStore });
        await catalog.insert(PEOPLE[0]);
        const wal_rows = walStore.size;

        expect(await catalog.delete({ name: "Nobody" })).toEqual([]);
        expect(await catalog.delete({ name: "Ada", city: "Paris" })).toEqual([]);
        expect(walStore.size).toBe(wal_rows);
    });

    test('delete_removes_every_copy', async () => {
        const indexStore = new HashTableStore("index");
        const catalog = people({ indexStore });
        for (const person of PEOPLE) await catalog.insert(person);

        expect(await catalog.delete({ name: "Ada" })).toEqual([PEOPLE[0], PEOPLE[3]]);

        expect(await catalog.query({ name: "Ada" })).toEqual([]);
        expect(await catalog.query({ city: "London" })).toEqual([PEOPLE[2]]);
        expect(await catalog.query({ city: "Paris" })).toEqual([]);
        expect(await catalog.query({ email: "ada@example.com" })).toEqual([]);
        //two people left, three copies each
        expect(indexStore.size).toBe(6);
    });

    test('delete_within_row_range', async () => {
        const catalog = people();
        for (const person of PEOPLE) await catalog.insert(person);

        expect(await catalog.delete({ city: "London" }, { rowFrom: "2" })).toEqual([PEOPLE[2]]);
        expect(await catalog.query({ city: "London" })).toEqual([PEOPLE[0]]);
    });

    test('replay_from_empty_is_deterministic', async () => {
        const walStore = new HashTableStore("wal");
        const writer = people({ walStore, replayPolicy: "manual" });
        for (const person of PEOPLE) await writer.insert(person);
        await writer.recover();
        await writer.delete({ city: "Paris" });
        await writer.delete({ city: "Arlington" });
        expect(await writer.pending()).toHaveLength(2);

        const first = people({ walStore, replayPolicy: "manual" });
        const second = people({ walStore, replayPolicy: "manual" });
        await first.recover({ startAfter: "" });
        await second.recover({ startAfter: "" });

        for (const person of PEOPLE) {
            for (const field of ["name", "city", "email"]) {
                const filter = { [field]: person[field] };
                expect(await first.query(filter)).toEqual(await second.query(filter));
            }
        }
        expect(await first.query({ city: "London" })).toEqual([PEOPLE[0], PEOPLE[2]]);
        expect(first.indexStore).not.toBe(second.indexStore);
    });

    test('manual_replay_policy', async () => {
        const catalog = Catalog.fromHashMemory({ indexKeys: "email,team", primaryField: "userId", replayPolicy: "manual", logger: silent });
        await catalog.insert(U1);

        expect(await catalog.query({ team: "eng" })).toEqual([]);
        expect((await catalog.pending()).map(entry => entry.payload)).toEqual([U1]);

        const report = await catalog.recover();
        expect(report.outcomes.applied).toBe(2);
        expect(await catalog.query({ team: "eng" })).toEqual([U1]);
        expect(await catalog.pending()).toEqual([]);
    });

    test('missing_fields', async () => {
        const catalog = users();

        const error = await catalog.insert({ email: "b@x.com" }).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(MissingFieldsError);
        expect(error).toMatchObject({ fields: ["team", "userId"] });
        expect(await catalog.pending()).toEqual([]);
    });

    test('configure_once', async () => {
        const catalog = Catalog.fromHashMemory({ logger: silent });
        expect(catalog.schema).toBeUndefined();

        await expect(catalog.insert(U1)).rejects.toBeInstanceOf(NotConfiguredError);
        await expect(catalog.query({ team: "eng" })).rejects.toBeInstanceOf(NotConfiguredError);

        catalog.configure("email,team", "userId");
        expect(catalog.schema).toEqual({ indexKeys: ["email", "team"], primaryField: "userId" });
        expect(() => catalog.configure("email", "userId")).toThrow(AlreadyConfiguredError);
    });

    test('wal_failure_leaves_nothing_behind', async () => {
        const indexStore = new HashTableStore("index");
        const walStore = new FlakyTableStore("wal").failNext("create");
        const catalog = Catalog.fromHashMemory({ indexStore, walStore, indexKeys: "email,team", primaryField: "userId", logger: silent });

        await expect(catalog.insert(U1)).rejects.toBeInstanceOf(DurabilityFailure);
        expect(indexStore.size).toBe(0);
        expect(await catalog.pending()).toEqual([]);
    });

    test('replay_failure_is_caught_up_later', async () => {
        const indexStore = new FlakyTableStore("index").failNext("create", partitionKey("team", "eng"));
        const catalog = Catalog.fromHashMemory({ indexStore, indexKeys: "email,team", primaryField: "userId", logger: silent });

        await expect(catalog.insert(U1)).rejects.toBeInstanceOf(ReplayFailure);
        //durable, but not yet visible under every key
        expect(await catalog.pending()).toHaveLength(1);
        expect(await catalog.query({ team: "eng" })).toEqual([]);

        await catalog.recover();
        expect(await catalog.query({ team: "eng" })).toEqual([U1]);
        expect(await catalog.query({ email: "A@X.COM" })).toEqual([U1]);
    });

    test('recovery_transitions_are_reported', async () => {
        const states: RecoveryState[] = [];
        const catalog = Catalog.fromHashMemory({
            indexKeys: "email,team",
            primaryField: "userId",
            logger: silent,
            onRecoveryTransition: state => states.push(state),
        });

        await catalog.insert(U1);

        expect(states.map(state => state.phase)).toEqual(["scanning", "applying", "checkpointing", "idle"]);
        expect(catalog.recoveryState).toEqual({ phase: "idle" });
    });

    test('from_dynamodb', () => {
        const client = DynamoDBDocumentClient.from(new DynamoDBClient({ region: "us-east-1" }));
        const catalog = Catalog.fromDynamoDB(client, {
            tableName: "people",
            walTableName: "people_log",
            indexKeys: ["name"],
            primaryField: "id",
            logger: silent,
        });

        expect(catalog.indexStore).toBeInstanceOf(DynamoDBTableStore);
        expect(catalog.indexStore.tableName).toBe("people");
        expect(catalog.walStore.tableName).toBe("people_log");
        expect(catalog.replayPolicy).toBe("eager");
        client.destroy();
    });

    test('from_environment', () => {
        const catalog = Catalog.fromEnvironment({
            CATALOG_DYNAMODB_REGION: "us-east-1",
            CATALOG_DYNAMODB_ENDPOINT: "http://localhost:8000",
            CATALOG_TABLE_NAME: "people",
            CATALOG_INDEX_KEYS: "name,city",
            CATALOG_PRIMARY_FIELD: "id",
            CATALOG_REPLAY_POLICY: "manual",
        }, { logger: silent });

        expect(catalog.walStore.tableName).toBe("people_WAL");
        expect(catalog.replayPolicy).toBe("manual");
        expect(catalog.schema).toEqual({ indexKeys: ["name", "city"], primaryField: "id" });
    });

    test('insert_after_clock_step_is_visible', async () => {
        const catalog = users();
        const u2 = { userId: "u2", email: "b@x.com", team: "eng" };
        const now = Date.now();

        Settings.now = () => now + 5000;
        await catalog.insert(U1);
        Settings.now = () => now + 4000;
        await catalog.insert(u2);

        expect(await catalog.query({ email: "b@x.com" })).toEqual([u2]);
        expect(await catalog.query({ team: "eng" })).toEqual([U1, u2]);
        expect(await catalog.pending()).toEqual([]);
    });

    test('unstorable_record_is_rejected_before_the_wal', async () => {
        const walStore = new HashTableStore("wal");
        const catalog = Catalog.fromHashMemory({ walStore, indexKeys: "email,team", primaryField: "userId", logger: silent });

        await expect(catalog.insert({ ...U1, score: NaN })).rejects.toBeInstanceOf(InvalidRecordError);
        expect(walStore.size).toBe(0);

        //later mutations are unaffected
        const u2 = { userId: "u2", email: "b@x.com", team: "eng" };
        await catalog.insert(u2);
        expect(await catalog.query({ team: "eng" })).toEqual([u2]);
    });

    test('delete_without_matches_still_catches_up', async () => {
        const indexStore = new FlakyTableStore("index").failNext("create", partitionKey("team", "eng"));
        const catalog = Catalog.fromHashMemory({ indexStore, indexKeys: "email,team", primaryField: "userId", logger: silent });
        await expect(catalog.insert(U1)).rejects.toBeInstanceOf(ReplayFailure);

        expect(await catalog.delete({ email: "nobody@x.com" })).toEqual([]);

        expect(await catalog.pending()).toEqual([]);
        expect(await catalog.query({ team: "eng" })).toEqual([U1]);
    });
});
