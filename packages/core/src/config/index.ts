// =============================================================================
// CONFIGURATION — defaults, validation and environment loading
// =============================================================================

import { resolveLimits } from "../db/limits.js";
import { TableAllowList } from "../db/schema.js";
import { WardenError } from "../error/index.js";
import { isLogLevel } from "../logger/levels.js";
import type {
	ConnectionOptions,
	LogFormat,
	LogLevel,
	PoolOptions,
	ResolvedPoolOptions,
	WardenConfig,
} from "../types/config.js";

export const DEFAULT_POOL_OPTIONS: Readonly<ResolvedPoolOptions> = Object.freeze({
	min: 10,
	max: 50,
	maxUses: 50_000,
	idleTimeoutMillis: 300_000,
	connectionTimeoutMillis: 10_000,
	statementTimeoutMs: 10_000,
	idleInTransactionTimeoutMs: 60_000,
	applicationName: "pgwarden",
	timezone: "UTC",
});

export function resolvePoolOptions(pool: PoolOptions = {}): ResolvedPoolOptions {
	return {
		min: pool.min ?? DEFAULT_POOL_OPTIONS.min,
		max: pool.max ?? DEFAULT_POOL_OPTIONS.max,
		maxUses: pool.maxUses ?? DEFAULT_POOL_OPTIONS.maxUses,
		idleTimeoutMillis: pool.idleTimeoutMillis ?? DEFAULT_POOL_OPTIONS.idleTimeoutMillis,
		connectionTimeoutMillis:
			pool.connectionTimeoutMillis ?? DEFAULT_POOL_OPTIONS.connectionTimeoutMillis,
		statementTimeoutMs: pool.statementTimeoutMs ?? DEFAULT_POOL_OPTIONS.statementTimeoutMs,
		idleInTransactionTimeoutMs:
			pool.idleInTransactionTimeoutMs ?? DEFAULT_POOL_OPTIONS.idleInTransactionTimeoutMs,
		applicationName: pool.applicationName ?? DEFAULT_POOL_OPTIONS.applicationName,
		timezone: pool.timezone ?? DEFAULT_POOL_OPTIONS.timezone,
	};
}

/**
 * Validate pgwarden configuration at runtime.
 * Throws WardenError (INVALID_CONFIG) naming the offending setting.
 */
export function validateConfig(config: WardenConfig): void {
	validateConnection(config.connection);

	const pool = resolvePoolOptions(config.pool);
	assertInteger("pool.min", pool.min, 0);
	assertInteger("pool.max", pool.max, 1);
	if (pool.min > pool.max) {
		throw WardenError.invalidConfig(
			`pgwarden config: 'pool.min' (${pool.min}) must not exceed 'pool.max' (${pool.max})`,
		);
	}
	assertInteger("pool.maxUses", pool.maxUses, 1);
	assertInteger("pool.idleTimeoutMillis", pool.idleTimeoutMillis, 0);
	assertInteger("pool.connectionTimeoutMillis", pool.connectionTimeoutMillis, 0);
	assertInteger("pool.statementTimeoutMs", pool.statementTimeoutMs, 0);
	assertInteger("pool.idleInTransactionTimeoutMs", pool.idleInTransactionTimeoutMs, 0);
	if (pool.applicationName.trim().length === 0) {
		throw WardenError.invalidConfig("pgwarden config: 'pool.applicationName' must be non-empty");
	}
	if (pool.timezone.trim().length === 0) {
		throw WardenError.invalidConfig("pgwarden config: 'pool.timezone' must be non-empty");
	}

	const level = config.logging?.level;
	if (level !== undefined && !isLogLevel(level)) {
		throw WardenError.invalidConfig(`pgwarden config: unknown log level "${level}"`);
	}
	const format = config.logging?.format;
	if (format !== undefined && !isLogFormat(format)) {
		throw WardenError.invalidConfig(`pgwarden config: unknown log format "${format}"`);
	}

	if (config.schema !== undefined) {
		new TableAllowList(config.schema);
	}
	resolveLimits(config.limits);
}

function validateConnection(connection: ConnectionOptions): void {
	if (connection.connectionString !== undefined) {
		if (connection.connectionString.trim().length === 0) {
			throw WardenError.invalidConfig(
				"pgwarden config: 'connection.connectionString' must be non-empty",
			);
		}
		return;
	}
	if (!connection.host) {
		throw WardenError.invalidConfig(
			"pgwarden config: set 'connection.connectionString' or 'connection.host'",
		);
	}
	if (!connection.database) {
		throw WardenError.invalidConfig("pgwarden config: 'connection.database' is required");
	}
	if (connection.port !== undefined) {
		assertInteger("connection.port", connection.port, 1);
		if (connection.port > 65_535) {
			throw WardenError.invalidConfig(
				`pgwarden config: 'connection.port' must be at most 65535, got ${connection.port}`,
			);
		}
	}
}

function assertInteger(name: string, value: number, min: number): void {
	if (!Number.isSafeInteger(value) || value < min) {
		throw WardenError.invalidConfig(
			`pgwarden config: '${name}' must be an integer >= ${min}, got ${value}`,
		);
	}
}

function isLogFormat(value: string): value is LogFormat {
	return value === "pretty" || value === "json";
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Build a config from environment variables. Unset variables fall back to
 * the defaults; malformed ones throw INVALID_CONFIG.
 *
 * @example
 * ```ts
 * import "dotenv/config";
 * const config = loadConfigFromEnv(process.env);
 * ```
 */
export function loadConfigFromEnv(env: Env = process.env): WardenConfig {
	const connection: ConnectionOptions = {};
	const url = readString(env, "DATABASE_URL");
	if (url) {
		connection.connectionString = url;
	} else {
		connection.host = readString(env, "DB_HOST");
		connection.port = readInt(env, "DB_PORT");
		connection.database = readString(env, "DB_NAME");
		connection.user = readString(env, "DB_USER");
		connection.password = readString(env, "DB_PASSWORD");
	}

	const pool: PoolOptions = {
		min: readInt(env, "DB_POOL_MIN"),
		max: readInt(env, "DB_POOL_MAX"),
		maxUses: readInt(env, "DB_MAX_USES"),
		idleTimeoutMillis: readInt(env, "DB_IDLE_TIMEOUT_MS"),
		connectionTimeoutMillis: readInt(env, "DB_CONNECT_TIMEOUT_MS"),
		statementTimeoutMs: readInt(env, "DB_STATEMENT_TIMEOUT_MS"),
		idleInTransactionTimeoutMs: readInt(env, "DB_IDLE_IN_TX_TIMEOUT_MS"),
		applicationName: readString(env, "DB_APPLICATION_NAME"),
		timezone: readString(env, "DB_TIMEZONE"),
	};

	const level = readString(env, "LOG_LEVEL")?.toLowerCase();
	if (level !== undefined && !isLogLevel(level)) {
		throw WardenError.invalidConfig(`LOG_LEVEL must be one of debug, info, warn, error; got "${level}"`);
	}
	const format = readString(env, "LOG_FORMAT")?.toLowerCase();
	if (format !== undefined && !isLogFormat(format)) {
		throw WardenError.invalidConfig(`LOG_FORMAT must be "pretty" or "json"; got "${format}"`);
	}
	const logging: { level?: LogLevel; format?: LogFormat } = { level, format };

	return { connection, pool, logging };
}

function readString(env: Env, key: string): string | undefined {
	const value = env[key]?.trim();
	return value ? value : undefined;
}

function readInt(env: Env, key: string): number | undefined {
	const raw = readString(env, key);
	if (raw === undefined) return undefined;
	if (!/^\d+$/.test(raw)) {
		throw WardenError.invalidConfig(`${key} must be a non-negative integer, got "${raw}"`);
	}
	return Number(raw);
}
