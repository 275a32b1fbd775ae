// =============================================================================
// POOL TYPES — the slice of a pg-compatible pool the data layer relies on
// =============================================================================

// =============================================================================
// TYPES
// =============================================================================

export type Row = Record<string, unknown>;

export interface QueryResultLike {
	rows: Row[];
	rowCount: number | null;
}

export interface QueryableLike {
	query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

/**
 * A checked-out connection. `release(error)` destroys it instead of
 * returning it to the pool.
 */
export interface PoolClientLike extends QueryableLike {
	release(error?: Error): void;
}

/**
 * Matches the `pg.Pool` API surface we need without importing `pg` types,
 * so tests can hand in an in-process fake.
 */
export interface PoolLike extends QueryableLike {
	connect(): Promise<PoolClientLike>;
	end(): Promise<void>;
	readonly totalCount: number;
	readonly idleCount: number;
	readonly waitingCount: number;
}

export interface PoolStats {
	/** Total number of clients in the pool */
	totalCount: number;
	/** Number of idle clients */
	idleCount: number;
	/** Number of clients checked out (in use) */
	activeCount: number;
	/** Number of callers waiting for a client */
	waitingCount: number;
}

// =============================================================================
// HELPER
// =============================================================================

export function getPoolStats(pool: Pick<PoolLike, "totalCount" | "idleCount" | "waitingCount">): PoolStats {
	return {
		totalCount: pool.totalCount,
		idleCount: pool.idleCount,
		activeCount: pool.totalCount - pool.idleCount,
		waitingCount: pool.waitingCount,
	};
}
