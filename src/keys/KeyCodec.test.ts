import { contentKey, contentKeyBounds, fingerprint, normalizeKeyPart, partitionKey } from "./KeyCodec";
import { MissingIndexValueError } from "../CatalogErrors";

describe('KeyCodec', () => {
    test('partition_key_format', () => {
        expect(partitionKey("email", "A@X.com")).toBe("5_emaila@x.com");
        expect(partitionKey("age", 42)).toBe("3_age42");
        expect(partitionKey("active", true)).toBe("6_activetrue");
    });

    test('partition_key_is_case_insensitive', () => {
        expect(partitionKey("Name", "ADA")).toBe(partitionKey("name", "ada"));
    });

    test('partition_key_keeps_field_boundary', () => {
        //same concatenation, different split between field and value
        expect(partitionKey("ab", "c")).toBe("2_abc");
        expect(partitionKey("a", "bc")).toBe("1_abc");
    });

    test('normalize_key_part', () => {
        //decomposed e + combining acute becomes the composed form
        expect(normalizeKeyPart("Cafe\u0301")).toBe("caf\u00e9");
        expect(normalizeKeyPart(3.5)).toBe("3.5");
    });

    test('fingerprint_is_stable', () => {
        const record = { id: "1", name: "Ada", city: "London" };
        const first = fingerprint(record, ["name", "city"]);

        expect(first).toMatch(/^[0-9a-f]{8}$/);
        expect(fingerprint(record, ["city", "name"])).toBe(first);
        expect(fingerprint({ id: "9", name: "ADA", city: "london" }, ["name", "city"])).toBe(first);
        expect(fingerprint({ id: "1", name: "Ada", city: "Paris" }, ["name", "city"])).not.toBe(first);
    });

    test('content_key_format', () => {
        const record = { id: "Row-7", name: "Ada", city: "London" };
        const key = contentKey(record, "id", ["name", "city"]);

        expect(key).toBe(`Row-7:${fingerprint(record, ["name", "city"])}`);
    });

    test('content_key_requires_values', () => {
        expect(() => contentKey({ name: "Ada" }, "id", ["name"])).toThrow(MissingIndexValueError);
        expect(() => contentKey({ id: "1" }, "id", ["name"])).toThrow(MissingIndexValueError);
        //inherited properties do not count
        expect(() => contentKey({ id: "1" }, "id", ["toString"])).toThrow(MissingIndexValueError);
    });

    test('content_key_bounds', () => {
        expect(contentKeyBounds({ rowFrom: "a", rowTo: "b" })).toEqual({ from: "a:", to: "b:~" });
        expect(contentKeyBounds({ rowFrom: "", rowTo: "" })).toEqual({ from: undefined, to: undefined });
        expect(contentKeyBounds()).toEqual({ from: undefined, to: undefined });
    });

    test('content_key_bounds_cover_every_fingerprint', () => {
        const { from, to } = contentKeyBounds({ rowFrom: "b", rowTo: "b" });
        const key = contentKey({ id: "b", name: "x" }, "id", ["name"]);

        expect(from !== undefined && key >= from).toBe(true);
        expect(to !== undefined && key <= to).toBe(true);
        expect(to !== undefined && "c:00000000" > to).toBe(true);
    });
});
