import { z } from "zod";
import { MissingConfigurationError } from "../CatalogErrors";
import { parseIndexKeys } from "../schema/CatalogSchema";
import { ReplayPolicy } from "../CatalogTypes";

export interface CatalogConfig
{
    region: string,
    endpoint?: string,
    tableName: string,
    walTableName: string,
    indexKeys: string[],
    primaryField: string,
    replayPolicy: ReplayPolicy
}

//blank values count as missing
const Required = z.string().trim().min(1);
const Optional = z.string().trim().optional().transform(value => value ? value : undefined);

const EnvironmentSchema = z.object({
    CATALOG_DYNAMODB_REGION: Required,
    CATALOG_DYNAMODB_ENDPOINT: Optional,
    CATALOG_TABLE_NAME: Required,
    CATALOG_WAL_TABLE_NAME: Optional,
    CATALOG_INDEX_KEYS: Required.refine(value => parseIndexKeys(value).length > 0),
    CATALOG_PRIMARY_FIELD: Required,
    CATALOG_REPLAY_POLICY: Optional.pipe(z.enum(["eager", "manual"]).default("eager")),
});

/**
 * Read catalog settings from an environment-style map
 * @throws MissingConfigurationError naming every variable that is absent or invalid
 */
export function loadCatalogConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig
{
    const parsed = EnvironmentSchema.safeParse(env);
    if (!parsed.success) {
        const variables = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
        throw new MissingConfigurationError(variables, { cause: parsed.error });
    }

    const vars = parsed.data;
    return {
        region: vars.CATALOG_DYNAMODB_REGION,
        endpoint: vars.CATALOG_DYNAMODB_ENDPOINT,
        tableName: vars.CATALOG_TABLE_NAME,
        walTableName: vars.CATALOG_WAL_TABLE_NAME ?? `${vars.CATALOG_TABLE_NAME}_WAL`,
        indexKeys: parseIndexKeys(vars.CATALOG_INDEX_KEYS),
        primaryField: vars.CATALOG_PRIMARY_FIELD,
        replayPolicy: vars.CATALOG_REPLAY_POLICY,
    };
}
