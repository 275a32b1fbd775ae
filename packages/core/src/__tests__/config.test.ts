import { describe, expect, it } from "vitest";
import {
	DEFAULT_POOL_OPTIONS,
	loadConfigFromEnv,
	resolvePoolOptions,
	validateConfig,
} from "../config/index.js";
import { DEFAULT_LIMITS, resolveLimits } from "../db/limits.js";
import { WardenError } from "../error/index.js";
import type { WardenConfig } from "../types/config.js";

const url = { connectionString: "postgres://app@localhost/app" };

function configError(config: WardenConfig): string {
	try {
		validateConfig(config);
	} catch (error) {
		if (error instanceof WardenError && error.code === "INVALID_CONFIG") return error.message;
		throw error;
	}
	return "no error";
}

describe("resolvePoolOptions", () => {
	it("fills defaults", () => {
		expect(resolvePoolOptions()).toEqual(DEFAULT_POOL_OPTIONS);
	});

	it("keeps overrides", () => {
		const pool = resolvePoolOptions({ max: 5, timezone: "Europe/Berlin" });
		expect(pool.max).toBe(5);
		expect(pool.timezone).toBe("Europe/Berlin");
		expect(pool.min).toBe(10);
	});
});

describe("validateConfig", () => {
	it("accepts a connection string alone", () => {
		expect(configError({ connection: url })).toBe("no error");
	});

	it("accepts discrete connection fields", () => {
		expect(configError({ connection: { host: "db", database: "app", port: 6432 } })).toBe(
			"no error",
		);
	});

	it("requires a connection target", () => {
		expect(configError({ connection: {} })).toBe(
			"pgwarden config: set 'connection.connectionString' or 'connection.host'",
		);
	});

	it("requires a database with host", () => {
		expect(configError({ connection: { host: "db" } })).toBe(
			"pgwarden config: 'connection.database' is required",
		);
	});

	it("rejects out-of-range ports", () => {
		expect(configError({ connection: { host: "db", database: "app", port: 70_000 } })).toBe(
			"pgwarden config: 'connection.port' must be at most 65535, got 70000",
		);
	});

	it("rejects min above max", () => {
		expect(configError({ connection: url, pool: { min: 20, max: 10 } })).toBe(
			"pgwarden config: 'pool.min' (20) must not exceed 'pool.max' (10)",
		);
	});

	it("rejects negative timeouts", () => {
		expect(configError({ connection: url, pool: { statementTimeoutMs: -1 } })).toBe(
			"pgwarden config: 'pool.statementTimeoutMs' must be an integer >= 0, got -1",
		);
	});

	it("rejects a blank timezone", () => {
		expect(configError({ connection: url, pool: { timezone: " " } })).toBe(
			"pgwarden config: 'pool.timezone' must be non-empty",
		);
	});

	it("validates the schema", () => {
		expect(configError({ connection: url, schema: { "bad-table": {} } })).toBe(
			'schema: invalid table name "bad-table"',
		);
	});

	it("validates the limits", () => {
		expect(configError({ connection: url, limits: { maxInValues: 0 } })).toBe(
			"limits.maxInValues must be a positive integer, got 0",
		);
	});
});

describe("resolveLimits", () => {
	it("merges overrides onto defaults", () => {
		expect(resolveLimits({ maxLimit: 100 })).toEqual({ ...DEFAULT_LIMITS, maxLimit: 100 });
	});
});

describe("loadConfigFromEnv", () => {
	it("prefers DATABASE_URL over discrete variables", () => {
		const config = loadConfigFromEnv({
			DATABASE_URL: "postgres://app@db/app",
			DB_HOST: "ignored",
		});
		expect(config.connection).toEqual({ connectionString: "postgres://app@db/app" });
	});

	it("reads discrete connection variables", () => {
		const config = loadConfigFromEnv({
			DB_HOST: "db",
			DB_PORT: "6432",
			DB_NAME: "app",
			DB_USER: "app",
			DB_PASSWORD: "test-secret",
		});
		expect(config.connection).toEqual({
			host: "db",
			port: 6432,
			database: "app",
			user: "app",
			password: "test-secret",
		});
	});

	it("reads pool and logging variables", () => {
		const config = loadConfigFromEnv({
			DB_POOL_MIN: "2",
			DB_POOL_MAX: "8",
			DB_STATEMENT_TIMEOUT_MS: "2500",
			DB_TIMEZONE: "Asia/Tokyo",
			LOG_LEVEL: "DEBUG",
			LOG_FORMAT: "json",
		});
		expect(config.pool?.min).toBe(2);
		expect(config.pool?.max).toBe(8);
		expect(config.pool?.statementTimeoutMs).toBe(2500);
		expect(config.pool?.timezone).toBe("Asia/Tokyo");
		expect(config.logging).toEqual({ level: "debug", format: "json" });
	});

	it("treats blank variables as unset", () => {
		expect(loadConfigFromEnv({ DB_POOL_MAX: "  " }).pool?.max).toBeUndefined();
	});

	it("rejects malformed numbers", () => {
		expect(() => loadConfigFromEnv({ DB_POOL_MAX: "ten" })).toThrow(
			'DB_POOL_MAX must be a non-negative integer, got "ten"',
		);
	});

	it("rejects unknown log levels", () => {
		expect(() => loadConfigFromEnv({ LOG_LEVEL: "verbose" })).toThrow(
			'LOG_LEVEL must be one of debug, info, warn, error; got "verbose"',
		);
	});
});
