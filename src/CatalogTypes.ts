//values a catalog record may hold, every one of them must stringify for key derivation
export type ScalarValue = string | number | boolean;

//the interface type for records you want to catalog
export type CatalogRecord = Record<string, ScalarValue>;

//field -> value equality predicates, ANDed together
export type CatalogFilter = Record<string, ScalarValue>;

//bounds on the primary-value portion of the content key, both inclusive
export interface RowRange
{
    rowFrom?: string,
    rowTo?: string
}

//what the backing store keeps for an entity, nested maps are allowed for WAL payloads
export type FieldValue = ScalarValue | { [key: string]: FieldValue };
export type EntityFields = { [key: string]: FieldValue };

//NOTE: stripped before anything is handed back to a caller
export interface EntityMetadata
{
    createdAt?: string, //ISO8601, set when the entity was written
    etag?: string //concurrency token
}

export interface TableEntity
{
    partitionKey: string,
    rowKey: string,
    fields: EntityFields,
    metadata: EntityMetadata
}

//sort key condition for a single partition scan
//"range" bounds are inclusive, "after" is exclusive
export type RowKeyCondition =
    | { type: "range", from?: string, to?: string }
    | { type: "after", rowKey: string };

export type CreateOutcome = "created" | "exists";
export type DeleteOutcome = "deleted" | "not_found";

export type WALOperation = "insert" | "delete";

//`${yyyy-MM-ddTHH:mm:ss.SSS}_${uuidv7}` sorts by wall clock first
export type WALEntryId = string;

export interface WALEntry
{
    id: WALEntryId,
    operation: WALOperation,
    payload: CatalogRecord
}

export interface LockedSchema
{
    readonly indexKeys: readonly string[],
    readonly primaryField: string
}

//result of applying one WAL entry to one index partition
export type ApplyOutcome = "applied" | "already_applied" | "not_present";

export interface FieldApplication
{
    field: string,
    partitionKey: string,
    outcome: ApplyOutcome
}

export interface EntryApplication
{
    entryId: WALEntryId,
    operation: WALOperation,
    contentKey: string,
    fields: FieldApplication[]
}

export type RecoveryState =
    | { phase: "idle" }
    | { phase: "scanning", startAfter?: WALEntryId }
    | { phase: "applying", entryId: WALEntryId }
    | { phase: "checkpointing", entryId: WALEntryId };

export interface RecoveryReport
{
    startedAfter?: WALEntryId, //undefined means the beginning of the log
    checkpoint?: WALEntryId, //checkpoint once the pass finished
    entries: EntryApplication[],
    outcomes: Record<ApplyOutcome, number>
}

//eager: every mutation catches the index up before returning
//manual: mutations only append to the WAL, somebody has to call recover()
export type ReplayPolicy = "eager" | "manual";
