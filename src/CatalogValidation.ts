import { z } from "zod";
import { CatalogRecord, FieldValue, WALOperation } from "./CatalogTypes";

//NaN and Infinity do not survive a write and read back
export const ScalarValueSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
    z.union([ScalarValueSchema, z.record(FieldValueSchema)])
);

export const EntityFieldsSchema = z.record(FieldValueSchema);

export const CatalogRecordSchema: z.ZodType<CatalogRecord> = z.record(ScalarValueSchema);

export const WALOperationSchema: z.ZodType<WALOperation> = z.enum(["insert", "delete"]);

//what a WAL entry carries besides its row key
export const WALEntryFieldsSchema = z.object({
    operation: WALOperationSchema,
    payload: CatalogRecordSchema,
});

export const CheckpointFieldsSchema = z.object({
    entryId: z.string().min(1),
    updatedAt: z.string().optional(),
});
