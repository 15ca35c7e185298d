import { LockedSchema } from "../CatalogTypes";
import { AlreadyConfiguredError, InvalidSchemaError, NotConfiguredError } from "../CatalogErrors";

//index keys may come in as a list or as the comma separated form used in config
export function parseIndexKeys(indexKeys: string | readonly string[]): string[]
{
    const keys = typeof indexKeys === "string" ? indexKeys.split(",") : [...indexKeys];
    return keys.map(key => key.trim()).filter(key => key.length > 0);
}

/**
 * Which fields are indexed and which one is the record's identity.
 * Locking is one-way: the first successful set() wins for the lifetime of the object.
 */
export class CatalogSchema
{
    #locked?: LockedSchema;

    set(indexKeys: string | readonly string[], primaryField: string): LockedSchema
    {
        if (this.#locked) throw new AlreadyConfiguredError();

        const keys = parseIndexKeys(indexKeys);
        const primary = primaryField.trim();

        if (keys.length === 0) throw new InvalidSchemaError("at least one index key is required");
        if (primary.length === 0) throw new InvalidSchemaError("a primary field is required");

        const duplicates = keys.filter((key, i) => keys.indexOf(key) !== i);
        if (duplicates.length > 0) throw new InvalidSchemaError(`duplicate index keys: ${duplicates.join(", ")}`);

        this.#locked = Object.freeze({
            indexKeys: Object.freeze(keys),
            primaryField: primary,
        });

        return this.#locked;
    }

    requireLocked(): LockedSchema
    {
        if (!this.#locked) throw new NotConfiguredError();
        return this.#locked;
    }

    isLocked(): boolean
    {
        return this.#locked !== undefined;
    }

    //every field an insert must carry, index keys first
    requiredFields(): string[]
    {
        const { indexKeys, primaryField } = this.requireLocked();
        return indexKeys.includes(primaryField) ? [...indexKeys] : [...indexKeys, primaryField];
    }
}
