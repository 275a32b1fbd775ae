// =============================================================================
// PG POOL — node-postgres behind the PoolLike interface
// =============================================================================

import type { PoolClientLike, PoolLike, QueryResultLike } from "@pgwarden/core/db";
import type { ConnectionOptions, ResolvedPoolOptions } from "@pgwarden/core";
import pg from "pg";

/** A pool the manager can also attach session setup and error listeners to. */
export interface ManagedPool extends PoolLike {
	onConnect(listener: (client: PoolClientLike) => void): void;
	onError(listener: (error: Error) => void): void;
}

export type PoolFactory = (config: pg.PoolConfig) => ManagedPool;

/**
 * Translate pgwarden settings into `pg.Pool` options. Server-side timeouts
 * travel in the startup packet, so every connection gets them.
 */
export function buildPoolConfig(
	connection: ConnectionOptions,
	pool: ResolvedPoolOptions,
): pg.PoolConfig {
	return {
		...(connection.connectionString
			? { connectionString: connection.connectionString }
			: {
					host: connection.host,
					port: connection.port,
					database: connection.database,
					user: connection.user,
					password: connection.password,
				}),
		min: pool.min,
		max: pool.max,
		maxUses: pool.maxUses,
		idleTimeoutMillis: pool.idleTimeoutMillis,
		connectionTimeoutMillis: pool.connectionTimeoutMillis,
		statement_timeout: pool.statementTimeoutMs,
		idle_in_transaction_session_timeout: pool.idleInTransactionTimeoutMs,
		application_name: pool.applicationName,
	};
}

function toResult(result: pg.QueryResult): QueryResultLike {
	return { rows: result.rows, rowCount: result.rowCount };
}

function wrapClient(client: pg.PoolClient): PoolClientLike {
	return {
		query: async (text, values) => toResult(await client.query(text, values)),
		release: (error) => client.release(error),
	};
}

export const createPgPool: PoolFactory = (config) => {
	const pool = new pg.Pool(config);
	// One wrapper per driver client, so the connect listener and connect()
	// hand the manager the same object.
	const wrappers = new WeakMap<pg.PoolClient, PoolClientLike>();
	const wrap = (client: pg.PoolClient): PoolClientLike => {
		const existing = wrappers.get(client);
		if (existing) return existing;
		const wrapped = wrapClient(client);
		wrappers.set(client, wrapped);
		return wrapped;
	};

	return {
		query: async (text, values) => toResult(await pool.query(text, values)),
		connect: async () => wrap(await pool.connect()),
		end: () => pool.end(),
		onConnect: (listener) => {
			pool.on("connect", (client) => listener(wrap(client)));
		},
		onError: (listener) => {
			pool.on("error", (error) => listener(error));
		},
		get totalCount() {
			return pool.totalCount;
		},
		get idleCount() {
			return pool.idleCount;
		},
		get waitingCount() {
			return pool.waitingCount;
		},
	};
};
