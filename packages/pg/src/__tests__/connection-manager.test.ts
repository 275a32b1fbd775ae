import { WardenError } from "@pgwarden/core";
import { createCapturingLogger, createFakePool } from "@pgwarden/test-utils";
import { describe, expect, it } from "vitest";
import { ConnectionManager } from "../connection-manager.js";

const SET_TIMEZONE = "SELECT set_config('timezone', $1, false)";

function setup(pool: { max?: number; timezone?: string } = {}) {
	const fake = createFakePool();
	const logger = createCapturingLogger();
	const manager = new ConnectionManager({
		connection: { connectionString: "postgres://test" },
		pool,
		logger,
		poolFactory: fake.factory,
	});
	return { fake, logger, manager };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new Error("expected a rejection");
}

describe("ConnectionManager", () => {
	describe("lifecycle", () => {
		it("starts uninitialized and refuses work", async () => {
			const { manager } = setup();
			expect(manager.status).toBe("uninitialized");

			const error = await rejection(manager.query("SELECT 1"));
			expect(error).toBeInstanceOf(WardenError);
			expect(error).toMatchObject({
				code: "NOT_INITIALIZED",
				message: "Database pool not initialized. Call createPool() first.",
			});
			expect(() => manager.stats()).toThrow(WardenError);
		});

		it("builds the pool from the resolved options", () => {
			const { fake, logger, manager } = setup({ max: 20 });
			manager.createPool();

			expect(manager.status).toBe("ready");
			expect(fake.config).toMatchObject({
				connectionString: "postgres://test",
				min: 10,
				max: 20,
				maxUses: 50_000,
				statement_timeout: 10_000,
				idle_in_transaction_session_timeout: 60_000,
				application_name: "pgwarden",
			});
			expect(logger.find("info")).toEqual([
				{
					level: "info",
					message: "[db] Database pool created",
					data: { min: 10, max: 20, statementTimeoutMs: 10_000 },
				},
			]);
		});

		it("refuses a second createPool", () => {
			const { manager } = setup();
			manager.createPool();
			expect(() => manager.createPool()).toThrow("Database pool already created");
		});

		it("rejects invalid configuration up front", () => {
			const fake = createFakePool();
			expect(
				() => new ConnectionManager({ connection: {}, poolFactory: fake.factory }),
			).toThrow("pgwarden config: set 'connection.connectionString' or 'connection.host'");
			expect(fake.config).toBeUndefined();
		});

		it("closes once and stays closed", async () => {
			const { fake, logger, manager } = setup();
			manager.createPool();

			await manager.close();
			await manager.close();

			expect(fake.ended).toBe(true);
			expect(manager.status).toBe("closed");
			expect(logger.find("info").map((entry) => entry.message)).toEqual([
				"[db] Database pool created",
				"[db] Database pool closed",
			]);

			const error = await rejection(manager.query("SELECT 1"));
			expect(error).toMatchObject({ code: "NOT_INITIALIZED", message: "Database pool is closed" });
			expect(() => manager.createPool()).toThrow(
				"Database pool was closed; create a new ConnectionManager",
			);
		});

		it("close before createPool is a no-op", async () => {
			const { fake, manager } = setup();
			await manager.close();
			expect(fake.ended).toBe(false);
			expect(manager.status).toBe("closed");
		});
	});

	describe("session setup", () => {
		it("sets the timezone with a bound parameter on each new connection", async () => {
			const { fake, manager } = setup({ timezone: "Europe/Berlin" });
			manager.createPool();

			await manager.acquire((client) => client.query("SELECT now()"));
			await manager.acquire((client) => client.query("SELECT now()"));

			expect(fake.queries).toEqual([
				{ text: SET_TIMEZONE, values: ["Europe/Berlin"], clientId: 1 },
				{ text: "SELECT now()", values: [], clientId: 1 },
				{ text: "SELECT now()", values: [], clientId: 1 },
			]);
		});

		it("logs a failed timezone setup and destroys the client on release", async () => {
			const { fake, logger, manager } = setup();
			manager.createPool();
			fake.failOn(SET_TIMEZONE, new Error("invalid timezone"));

			await manager.acquire((client) => client.query("SELECT now()"));

			expect(logger.find("error")).toEqual([
				{
					level: "error",
					message: "[db] Failed to initialize connection",
					data: { error: "invalid timezone" },
				},
			]);
			expect(fake.destroyed).toBe(1);
			expect(fake.idleCount).toBe(0);
		});

		it("does not reuse a client whose timezone setup failed in a transaction", async () => {
			const { fake, manager } = setup();
			manager.createPool();
			fake.failOn(SET_TIMEZONE, new Error("invalid timezone"));

			await manager.transaction((client) => client.query("SELECT 1"));
			await manager.transaction((client) => client.query("SELECT 2"));

			expect(fake.destroyed).toBe(1);
			expect(fake.queries.map((query) => [query.text, query.clientId])).toEqual([
				[SET_TIMEZONE, 1],
				["BEGIN", 1],
				["SELECT 1", 1],
				["COMMIT", 1],
				[SET_TIMEZONE, 2],
				["BEGIN", 2],
				["SELECT 2", 2],
				["COMMIT", 2],
			]);
		});

		it("logs idle client errors", () => {
			const { fake, logger, manager } = setup();
			manager.createPool();
			fake.emitError(Object.assign(new Error("terminating connection"), { code: "ECONNRESET" }));

			expect(logger.find("error")).toEqual([
				{
					level: "error",
					message: "[db] Idle client error",
					data: { error: "terminating connection", kind: "connection_failure" },
				},
			]);
		});
	});

	describe("acquire", () => {
		it("releases the client after use", async () => {
			const { fake, manager } = setup();
			manager.createPool();

			const rows = await manager.acquire(async (client) => {
				const result = await client.query("SELECT 1 AS ok");
				return result.rows;
			});

			expect(rows).toEqual([{ ok: 1 }]);
			expect(fake.connects).toBe(1);
			expect(fake.releases).toBe(1);
			expect(manager.stats()).toEqual({
				totalCount: 1,
				idleCount: 1,
				activeCount: 0,
				waitingCount: 0,
			});
		});

		it("releases the client when the callback throws", async () => {
			const { fake, manager } = setup();
			manager.createPool();
			const boom = new Error("boom");

			const error = await rejection(
				manager.acquire(async () => {
					throw boom;
				}),
			);

			expect(error).toBe(boom);
			expect(fake.releases).toBe(1);
			expect(fake.destroyed).toBe(0);
		});
	});

	describe("transaction", () => {
		it("wraps the callback in BEGIN and COMMIT", async () => {
			const { fake, manager } = setup();
			manager.createPool();
			fake.respond((query) =>
				query.text.startsWith("INSERT") ? { rows: [{ id: 7 }] } : undefined,
			);

			const result = await manager.transaction((client) =>
				client.query("INSERT INTO users (email) VALUES ($1) RETURNING id", ["a@example.test"]),
			);

			expect(result.rows).toEqual([{ id: 7 }]);
			expect(fake.texts()).toEqual([
				SET_TIMEZONE,
				"BEGIN",
				"INSERT INTO users (email) VALUES ($1) RETURNING id",
				"COMMIT",
			]);
			expect(fake.releases).toBe(1);
		});

		it("rolls back and rethrows on failure", async () => {
			const { fake, manager } = setup();
			manager.createPool();
			const failure = new Error("duplicate key");
			fake.failOn("INSERT", failure);

			const error = await rejection(
				manager.transaction((client) => client.query("INSERT INTO users (email) VALUES ($1)", ["x"])),
			);

			expect(error).toBe(failure);
			expect(fake.texts().slice(1)).toEqual([
				"BEGIN",
				"INSERT INTO users (email) VALUES ($1)",
				"ROLLBACK",
			]);
			expect(fake.destroyed).toBe(0);
			expect(fake.idleCount).toBe(1);
		});

		it("discards the client when ROLLBACK fails", async () => {
			const { fake, logger, manager } = setup();
			manager.createPool();
			const failure = new Error("statement timeout");
			fake.failOn("UPDATE", failure);
			fake.failOn("ROLLBACK", new Error("connection lost"));

			const error = await rejection(
				manager.transaction((client) => client.query("UPDATE orders SET status = $1", ["x"])),
			);

			expect(error).toBe(failure);
			expect(fake.destroyed).toBe(1);
			expect(fake.idleCount).toBe(0);
			expect(logger.find("error")).toEqual([
				{
					level: "error",
					message: "[db] Rollback failed; discarding connection",
					data: { error: "connection lost" },
				},
			]);
		});

		it("discards the client when BEGIN fails", async () => {
			const { fake, manager } = setup();
			manager.createPool();
			const failure = new Error("connection reset");
			fake.failOn("BEGIN", failure);

			const error = await rejection(manager.transaction(async () => "never"));

			expect(error).toBe(failure);
			expect(fake.destroyed).toBe(1);
			expect(fake.texts()).toEqual([SET_TIMEZONE, "BEGIN"]);
		});
	});

	describe("query", () => {
		it("encodes structured parameters", async () => {
			const { fake, manager } = setup();
			manager.createPool();

			await manager.query("UPDATE products SET meta = $1, tags = $2 WHERE id = $3", [
				{ b: 1, a: 2 },
				["x", "y"],
				3,
			]);

			expect(fake.queries).toEqual([
				{
					text: "UPDATE products SET meta = $1, tags = $2 WHERE id = $3",
					values: ['{"a":2,"b":1}', ["x", "y"], 3],
					clientId: null,
				},
			]);
		});
	});

	describe("healthCheck", () => {
		it("reports true when SELECT 1 answers", async () => {
			const { manager } = setup();
			manager.createPool();
			expect(await manager.healthCheck()).toBe(true);
		});

		it("reports false and logs when the query fails", async () => {
			const { fake, logger, manager } = setup();
			manager.createPool();
			fake.failOn("SELECT 1", new Error("connect ECONNREFUSED"));

			expect(await manager.healthCheck()).toBe(false);
			expect(logger.find("error")).toEqual([
				{
					level: "error",
					message: "[db] Health check failed",
					data: { error: "connect ECONNREFUSED" },
				},
			]);
		});

		it("throws before createPool", async () => {
			const { manager } = setup();
			await expect(manager.healthCheck()).rejects.toMatchObject({ code: "NOT_INITIALIZED" });
		});
	});
});
