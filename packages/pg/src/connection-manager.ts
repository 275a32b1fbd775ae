// =============================================================================
// CONNECTION MANAGER — pool lifecycle, scoped clients, transactions
// =============================================================================
// One manager owns one pool for the life of the process:
//
//   uninitialized ──createPool()──▶ ready ──close()──▶ closed
//
// Every operation outside `ready` fails with NOT_INITIALIZED.

import {
	type ConnectionOptions,
	classifyDriverError,
	type PoolOptions,
	type ResolvedPoolOptions,
	resolvePoolOptions,
	scopeLogger,
	silentLogger,
	validateConfig,
	WardenError,
	type WardenLogger,
} from "@pgwarden/core";
import {
	getPoolStats,
	type PoolClientLike,
	type PoolStats,
	type QueryableLike,
	type QueryResultLike,
} from "@pgwarden/core/db";
import { encodeParameters } from "./codec.js";
import { buildPoolConfig, createPgPool, type ManagedPool, type PoolFactory } from "./pool.js";

export type ConnectionState = "uninitialized" | "ready" | "closed";

export interface ConnectionManagerOptions {
	connection: ConnectionOptions;
	pool?: PoolOptions;
	logger?: WardenLogger;
	/** Swap the driver, e.g. for an in-process fake in tests. Default: node-postgres. */
	poolFactory?: PoolFactory;
}

function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

export class ConnectionManager {
	private state: ConnectionState = "uninitialized";
	private pool: ManagedPool | null = null;
	private readonly connection: ConnectionOptions;
	private readonly poolOptions: ResolvedPoolOptions;
	private readonly poolFactory: PoolFactory;
	private readonly logger: WardenLogger;
	/** Clients whose session setup failed; destroyed on their next release. */
	private readonly unsetSessions = new WeakSet<PoolClientLike>();

	constructor(options: ConnectionManagerOptions) {
		validateConfig({ connection: options.connection, pool: options.pool });
		this.connection = options.connection;
		this.poolOptions = resolvePoolOptions(options.pool);
		this.poolFactory = options.poolFactory ?? createPgPool;
		this.logger = scopeLogger(options.logger ?? silentLogger, "db");
	}

	get status(): ConnectionState {
		return this.state;
	}

	/** Build the pool. Call once at startup. */
	createPool(): void {
		if (this.state === "ready") {
			throw WardenError.validation("Database pool already created");
		}
		if (this.state === "closed") {
			throw WardenError.validation("Database pool was closed; create a new ConnectionManager");
		}

		const pool = this.poolFactory(buildPoolConfig(this.connection, this.poolOptions));
		const { timezone } = this.poolOptions;

		pool.onConnect((client) => {
			void client
				.query("SELECT set_config('timezone', $1, false)", [timezone])
				.catch((error: unknown) => {
					this.unsetSessions.add(client);
					this.logger.error("Failed to initialize connection", {
						error: toError(error).message,
					});
				});
		});

		pool.onError((error) => {
			this.logger.error("Idle client error", {
				error: error.message,
				...classifyDriverError(error),
			});
		});

		this.pool = pool;
		this.state = "ready";
		this.logger.info("Database pool created", {
			min: this.poolOptions.min,
			max: this.poolOptions.max,
			statementTimeoutMs: this.poolOptions.statementTimeoutMs,
		});
	}

	/** Borrow a client for `fn`; it goes back to the pool however `fn` ends. */
	async acquire<T>(fn: (client: QueryableLike) => Promise<T>): Promise<T> {
		const client = await this.requirePool().connect();
		try {
			return await fn(session(client));
		} finally {
			this.release(client);
		}
	}

	/**
	 * Run `fn` between BEGIN and COMMIT. Any failure rolls back and rethrows.
	 * A client whose ROLLBACK also fails is destroyed rather than reused.
	 */
	async transaction<T>(fn: (client: QueryableLike) => Promise<T>): Promise<T> {
		const client = await this.requirePool().connect();
		try {
			await client.query("BEGIN");
		} catch (error) {
			this.release(client, toError(error));
			throw error;
		}

		let broken: Error | undefined;
		try {
			const result = await fn(session(client));
			await client.query("COMMIT");
			return result;
		} catch (error) {
			broken = await this.rollback(client);
			throw error;
		} finally {
			this.release(client, broken);
		}
	}

	private release(client: PoolClientLike, error?: Error): void {
		if (!error && this.unsetSessions.has(client)) {
			client.release(new Error("Session initialization failed"));
			return;
		}
		client.release(error);
	}

	private async rollback(client: PoolClientLike): Promise<Error | undefined> {
		try {
			await client.query("ROLLBACK");
			return undefined;
		} catch (rollbackError) {
			const error = toError(rollbackError);
			this.logger.error("Rollback failed; discarding connection", { error: error.message });
			return error;
		}
	}

	/** Single statement straight on the pool. */
	async query(text: string, values: readonly unknown[] = []): Promise<QueryResultLike> {
		return this.requirePool().query(text, encodeParameters(values));
	}

	async healthCheck(): Promise<boolean> {
		const pool = this.requirePool();
		try {
			const result = await pool.query("SELECT 1 AS ok");
			return result.rows[0]?.ok === 1;
		} catch (error) {
			this.logger.error("Health check failed", { error: toError(error).message });
			return false;
		}
	}

	stats(): PoolStats {
		return getPoolStats(this.requirePool());
	}

	/** Drain the pool. Safe to call more than once; never throws. */
	async close(): Promise<void> {
		const pool = this.pool;
		this.pool = null;
		this.state = "closed";
		if (!pool) return;

		try {
			await pool.end();
			this.logger.info("Database pool closed");
		} catch (error) {
			this.logger.error("Error closing database pool", { error: toError(error).message });
		}
	}

	private requirePool(): ManagedPool {
		if (this.state !== "ready" || !this.pool) {
			throw this.state === "closed"
				? WardenError.notInitialized("Database pool is closed")
				: WardenError.notInitialized();
		}
		return this.pool;
	}
}

/** The view of a client handed to callers: queries only, parameters encoded. */
function session(client: PoolClientLike): QueryableLike {
	return {
		query: (text, values) => client.query(text, values && encodeParameters(values)),
	};
}
