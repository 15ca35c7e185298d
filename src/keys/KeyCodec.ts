import { sha256 } from "js-sha256";
import { CatalogRecord, ScalarValue } from "../CatalogTypes";
import { MissingIndexValueError } from "../CatalogErrors";

export const CONTENT_KEY_SEPARATOR = ":";
//sorts after every hex digit, so `${rowTo}:~` is >= any content key for rowTo
export const CONTENT_KEY_UPPER_SENTINEL = "~";
//U+001F unit separator, not expected inside field values
export const FINGERPRINT_VALUE_SEPARATOR = "\u001f";
export const FINGERPRINT_LENGTH = 8;

export function normalizeKeyPart(value: ScalarValue): string
{
    return String(value).normalize("NFC").toLowerCase();
}

//partition key for one indexed (field, value) pair: `${field.length}_${field}${value}`
//the length is taken AFTER normalization so the field boundary is always recoverable,
//which keeps distinct normalized pairs from sharing a key
export function partitionKey(field: string, value: ScalarValue): string
{
    const normalized_field = normalizeKeyPart(field);
    const normalized_value = normalizeKeyPart(value);
    return `${normalized_field.length}_${normalized_field}${normalized_value}`;
}

//short disambiguator over every index-key value, not a security primitive
export function fingerprint(record: CatalogRecord, indexKeys: readonly string[]): string
{
    const values = [...indexKeys]
        .sort()
        .map(key => normalizeKeyPart(requireValue(record, key)));

    return sha256(values.join(FINGERPRINT_VALUE_SEPARATOR)).slice(0, FINGERPRINT_LENGTH);
}

//row key inside every index partition of a record: `${primaryValue}:${fingerprint}`
export function contentKey(record: CatalogRecord, primaryField: string, indexKeys: readonly string[]): string
{
    const primary_value = String(requireValue(record, primaryField));
    return `${primary_value}${CONTENT_KEY_SEPARATOR}${fingerprint(record, indexKeys)}`;
}

//caller row bounds -> inclusive content key bounds, empty strings mean unbounded
export function contentKeyBounds(range: { rowFrom?: string, rowTo?: string } = {}): { from?: string, to?: string }
{
    return {
        from: range.rowFrom ? `${range.rowFrom}${CONTENT_KEY_SEPARATOR}` : undefined,
        to: range.rowTo ? `${range.rowTo}${CONTENT_KEY_SEPARATOR}${CONTENT_KEY_UPPER_SENTINEL}` : undefined,
    };
}

function requireValue(record: CatalogRecord, field: string): ScalarValue
{
    if (!Object.hasOwn(record, field)) throw new MissingIndexValueError(field);
    const value = record[field];
    if (value === undefined || value === null) throw new MissingIndexValueError(field);
    return value;
}
