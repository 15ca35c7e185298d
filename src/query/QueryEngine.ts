import { CatalogTableStore } from "../store/CatalogTableStore";
import { CatalogSchema } from "../schema/CatalogSchema";
import { contentKeyBounds, partitionKey } from "../keys/KeyCodec";
import { CorruptEntryError, EmptyFilterError, UnknownFieldError } from "../CatalogErrors";
import { CatalogRecordSchema } from "../CatalogValidation";
import { CatalogLogger, logger as sharedLogger } from "../logging/CatalogLogger";
import { CatalogFilter, CatalogRecord, RowRange, ScalarValue, TableEntity } from "../CatalogTypes";

//one hit of a predicate scan, keyed by the row's content key
type ScanHit = { contentKey: string, payload: CatalogRecord };

/**
 * Resolves AND-ed equality predicates against single-attribute partitions
 *
 * Each predicate is one partition scan. Results are intersected on content key,
 * the canonical identity every copy of a record shares, so the cost is
 * O(predicates x partition size). Fine for a handful of predicates, not beyond.
 */
export class QueryEngine
{
    #store: CatalogTableStore;
    #schema: CatalogSchema;
    #logger: CatalogLogger;

    constructor(store: CatalogTableStore, schema: CatalogSchema, logger: CatalogLogger = sharedLogger)
    {
        this.#store = store;
        this.#schema = schema;
        this.#logger = logger;
    }

    async query(filter: CatalogFilter, range: RowRange = {}): Promise<CatalogRecord[]>
    {
        const predicates = this.validate(filter);
        const [first, ...rest] = predicates;

        let hits = await this.scan(first[0], first[1], range);

        for (const [field, value] of rest) {
            //nothing left to intersect with, skip the remaining scans
            if (hits.length === 0) break;

            const keys = new Set((await this.scan(field, value, range)).map(hit => hit.contentKey));
            hits = hits.filter(hit => keys.has(hit.contentKey));
        }

        return hits.map(hit => hit.payload);
    }

    //every field is checked before the first scan
    validate(filter: CatalogFilter): [string, ScalarValue][]
    {
        const { indexKeys } = this.#schema.requireLocked();
        const predicates = Object.entries(filter);
        if (predicates.length === 0) throw new EmptyFilterError();

        for (const [field] of predicates) {
            if (!indexKeys.includes(field)) throw new UnknownFieldError(field);
        }

        return predicates;
    }

    //single partition scan, storage metadata stripped
    async scan(field: string, value: ScalarValue, range: RowRange = {}): Promise<ScanHit[]>
    {
        const partition_key = partitionKey(field, value);
        const entities = await this.#store.query(partition_key, { type: "range", ...contentKeyBounds(range) });

        this.#logger.debug("query.scan", {
            table: this.#store.tableName,
            details: { partitionKey: partition_key, hits: entities.length },
        });

        return entities.map(toScanHit);
    }
}

function toScanHit(entity: TableEntity): ScanHit
{
    const parsed = CatalogRecordSchema.safeParse(entity.fields);
    if (!parsed.success) throw new CorruptEntryError(`${entity.partitionKey}/${entity.rowKey}`, { cause: parsed.error });
    return { contentKey: entity.rowKey, payload: parsed.data };
}
