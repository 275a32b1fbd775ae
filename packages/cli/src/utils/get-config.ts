// =============================================================================
// Config loader — uses c12 (UnJS) to find pgwarden.config.{ts,js,mjs,json}
// =============================================================================
// The config file carries what the environment cannot express: the table
// allow-list and resource limits. Connection and pool settings come from
// the environment (see loadConfigFromEnv).

import {
	isPlainObject,
	LIMIT_KEYS,
	type LimitsOptions,
	type SchemaDefinition,
	type TableDefinition,
	WardenError,
} from "@pgwarden/core";
import { loadConfig } from "c12";

export interface ProjectConfig {
	schema?: SchemaDefinition;
	limits?: LimitsOptions;
}

export interface ResolvedProjectConfig {
	config: ProjectConfig;
	/** Absolute path of the file that was loaded, if any. */
	configFile: string | null;
}

export async function getConfig({
	cwd,
	configPath,
}: {
	cwd: string;
	configPath?: string;
}): Promise<ResolvedProjectConfig> {
	const { config, configFile } = await loadConfig({
		name: "pgwarden",
		cwd,
		configFile: configPath,
		rcFile: false,
		packageJson: false,
		globalRc: false,
		dotenv: false,
	});

	const raw: unknown = config;
	const parsed = parseProjectConfig(raw);
	const found = isPlainObject(raw) && Object.keys(raw).length > 0;
	return { config: parsed, configFile: found && configFile ? configFile : null };
}

/** Validate the shape of a loaded config object. */
export function parseProjectConfig(raw: unknown): ProjectConfig {
	if (raw === undefined || raw === null) return {};
	if (!isPlainObject(raw)) {
		throw WardenError.invalidConfig("pgwarden config must export an object");
	}

	const result: ProjectConfig = {};
	if (raw.schema !== undefined) result.schema = parseSchema(raw.schema);
	if (raw.limits !== undefined) result.limits = parseLimits(raw.limits);
	return result;
}

function parseSchema(raw: unknown): SchemaDefinition {
	if (!isPlainObject(raw)) {
		throw WardenError.invalidConfig("pgwarden config: 'schema' must map table names to definitions");
	}

	const schema: Record<string, TableDefinition> = {};
	for (const [table, def] of Object.entries(raw)) {
		if (!isPlainObject(def)) {
			throw WardenError.invalidConfig(`pgwarden config: 'schema.${table}' must be an object`);
		}
		const entry: TableDefinition = {};
		if (def.orderBy !== undefined) entry.orderBy = parseStringList(def.orderBy, `schema.${table}.orderBy`);
		if (def.columns !== undefined) entry.columns = parseStringList(def.columns, `schema.${table}.columns`);
		schema[table] = entry;
	}
	return schema;
}

function parseStringList(raw: unknown, path: string): string[] {
	if (!Array.isArray(raw) || !raw.every((item): item is string => typeof item === "string")) {
		throw WardenError.invalidConfig(`pgwarden config: '${path}' must be a list of column names`);
	}
	return raw;
}

function parseLimits(raw: unknown): LimitsOptions {
	if (!isPlainObject(raw)) {
		throw WardenError.invalidConfig("pgwarden config: 'limits' must be an object");
	}
	const limits: LimitsOptions = {};
	for (const key of LIMIT_KEYS) {
		const value = raw[key];
		if (value === undefined) continue;
		if (typeof value !== "number") {
			throw WardenError.invalidConfig(`pgwarden config: 'limits.${key}' must be a number`);
		}
		limits[key] = value;
	}
	return limits;
}
