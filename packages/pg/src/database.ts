// =============================================================================
// DATABASE — CRUD façade over the query builder and connection manager
// =============================================================================
// Writes run inside a transaction; reads and counts go straight to the pool.
//
// Failure contract of the primary methods:
//   SECURITY_VIOLATION, VALIDATION_ERROR, NOT_INITIALIZED → thrown
//   TRANSIENT_FAILURE → logged, reported as `null` (bulkCreate throws)
//
// `database.results` exposes the same operations as Result values instead.

import {
	isWardenError,
	type LimitsOptions,
	type Result,
	type SchemaDefinition,
	scopeLogger,
	settle,
	silentLogger,
	toWardenError,
	WardenError,
	type WardenErrorCode,
	type WardenLogger,
} from "@pgwarden/core";
import {
	type BulkInsertOptions,
	type BulkInsertStatement,
	buildBulkInsert,
	buildCount,
	buildDelete,
	buildInsert,
	buildSelect,
	buildUpdate,
	createQueryContext,
	type QueryableLike,
	type QueryContext,
	type QueryResultLike,
	type ReturningOptions,
	type Row,
	type SelectOptions,
	type WhereInput,
} from "@pgwarden/core/db";
import type { ConnectionManager } from "./connection-manager.js";

// =============================================================================
// TYPES
// =============================================================================

export type Operation = "create" | "read" | "update" | "delete" | "count" | "bulkCreate";

/** Emitted once per façade call. Parameter values are never included. */
export interface QueryEvent {
	operation: Operation;
	table: string;
	durationMs: number;
	/** Bound parameters across every statement the call sent. */
	paramCount: number;
	rowCount: number | null;
	ok: boolean;
	errorCode?: WardenErrorCode;
}

export type ResultType = "all" | "row" | "value";

export interface ReadOptions extends SelectOptions {
	/**
	 * - `"all"` (default): every row
	 * - `"row"`: the first row, or `null`
	 * - `"value"`: the first column of the first row, or `null`
	 */
	resultType?: ResultType;
}

export interface BulkCreateOptions extends BulkInsertOptions {
	/** Wrap every chunk in one transaction. Default: each chunk commits on its own. */
	atomic?: boolean;
}

export interface DatabaseOptions {
	connection: ConnectionManager;
	schema?: SchemaDefinition;
	limits?: LimitsOptions;
	logger?: WardenLogger;
	onQuery?: (event: QueryEvent) => void;
}

interface CallStats {
	paramCount: number;
	rowCount: number | null;
}

// =============================================================================
// EXECUTOR — every operation, throwing on any failure
// =============================================================================

class Executor {
	readonly ctx: QueryContext;
	private readonly logger: WardenLogger;

	constructor(
		private readonly connection: ConnectionManager,
		private readonly options: Omit<DatabaseOptions, "connection">,
	) {
		this.logger = scopeLogger(options.logger ?? silentLogger, "db");
		this.ctx = createQueryContext({
			schema: options.schema,
			limits: options.limits,
			logger: this.logger,
		});
	}

	create(table: string, data: Row, options: ReturningOptions = {}): Promise<unknown> {
		return this.track("create", table, async (stats) => {
			const statement = buildInsert(this.ctx, table, data, options);
			stats.paramCount = statement.values.length;
			const result = await this.connection.transaction((client) =>
				client.query(statement.text, statement.values),
			);
			stats.rowCount = result.rowCount;
			return options.returning === null ? null : firstValue(result);
		});
	}

	read(table: string, options: ReadOptions = {}): Promise<unknown> {
		return this.track("read", table, async (stats) => {
			const statement = buildSelect(this.ctx, table, options);
			stats.paramCount = statement.values.length;
			const result = await this.connection.query(statement.text, statement.values);
			stats.rowCount = result.rowCount;

			switch (options.resultType ?? "all") {
				case "row":
					return result.rows[0] ?? null;
				case "value":
					return firstValue(result);
				default:
					return result.rows;
			}
		});
	}

	update(table: string, data: Row, where: WhereInput, options: ReturningOptions = {}): Promise<unknown> {
		return this.track("update", table, async (stats) => {
			const statement = buildUpdate(this.ctx, table, data, where, options);
			stats.paramCount = statement.values.length;
			const result = await this.connection.transaction((client) =>
				client.query(statement.text, statement.values),
			);
			stats.rowCount = result.rowCount;
			return options.returning === null ? null : firstValue(result);
		});
	}

	delete(table: string, where: WhereInput, options: ReturningOptions = {}): Promise<unknown> {
		return this.track("delete", table, async (stats) => {
			const statement = buildDelete(this.ctx, table, where, options);
			stats.paramCount = statement.values.length;
			const result = await this.connection.transaction((client) =>
				client.query(statement.text, statement.values),
			);
			stats.rowCount = result.rowCount;
			return options.returning === null ? null : firstValue(result);
		});
	}

	count(table: string, where?: WhereInput): Promise<number> {
		return this.track("count", table, async (stats) => {
			const statement = buildCount(this.ctx, table, where);
			stats.paramCount = statement.values.length;
			const result = await this.connection.query(statement.text, statement.values);
			stats.rowCount = result.rowCount;
			// pg hands bigint columns back as strings
			const count = Number(result.rows[0]?.count ?? 0);
			if (!Number.isSafeInteger(count)) {
				throw WardenError.validation(`Row count for ${table} exceeds the safe integer range`, { table });
			}
			return count;
		});
	}

	bulkCreate(
		table: string,
		rows: readonly Row[],
		options: BulkCreateOptions = {},
	): Promise<number | unknown[]> {
		return this.track("bulkCreate", table, async (stats) => {
			const statements = buildBulkInsert(this.ctx, table, rows, options);
			const returning = options.returning ?? null;
			const returned: unknown[] = [];
			let inserted = 0;

			const runChunk = async (client: QueryableLike, statement: BulkInsertStatement) => {
				const result = await client.query(statement.text, statement.values);
				stats.paramCount += statement.values.length;
				inserted += statement.rowCount;
				if (returning !== null) {
					for (const row of result.rows) returned.push(row[returning]);
				}
				this.logger.debug("Bulk insert chunk", { table, rows: statement.rowCount });
			};

			if (options.atomic) {
				await this.connection.transaction(async (client) => {
					for (const statement of statements) await runChunk(client, statement);
				});
			} else {
				for (const statement of statements) {
					await this.connection.transaction((client) => runChunk(client, statement));
				}
			}

			stats.rowCount = inserted;
			return returning === null ? inserted : returned;
		});
	}

	healthCheck(): Promise<boolean> {
		return this.connection.healthCheck();
	}

	/** Time the call, log one line, emit the QueryEvent, normalize the error. */
	private async track<T>(
		operation: Operation,
		table: string,
		fn: (stats: CallStats) => Promise<T>,
	): Promise<T> {
		const started = Date.now();
		const stats: CallStats = { paramCount: 0, rowCount: null };

		try {
			const value = await fn(stats);
			const event: QueryEvent = {
				operation,
				table,
				durationMs: Date.now() - started,
				paramCount: stats.paramCount,
				rowCount: stats.rowCount,
				ok: true,
			};
			this.logSuccess(event);
			this.options.onQuery?.(event);
			return value;
		} catch (error) {
			const failure = toWardenError(error);
			const event: QueryEvent = {
				operation,
				table,
				durationMs: Date.now() - started,
				paramCount: stats.paramCount,
				rowCount: stats.rowCount,
				ok: false,
				errorCode: failure.code,
			};
			this.logFailure(event, failure.message, failure.details);
			this.options.onQuery?.(event);
			throw failure;
		}
	}

	private logSuccess(event: QueryEvent): void {
		const data = {
			operation: event.operation,
			table: event.table,
			durationMs: event.durationMs,
			paramCount: event.paramCount,
			rowCount: event.rowCount,
		};
		switch (event.operation) {
			case "read":
			case "count":
				this.logger.debug("Query completed", data);
				return;
			case "delete":
				this.logger.warn("Deleted records", data);
				return;
			default:
				this.logger.info("Write completed", data);
		}
	}

	private logFailure(
		event: QueryEvent,
		message: string,
		details: Record<string, unknown> | undefined,
	): void {
		const data = {
			operation: event.operation,
			table: event.table,
			durationMs: event.durationMs,
			code: event.errorCode,
			error: message,
			...details,
		};
		if (event.errorCode === "VALIDATION_ERROR") {
			this.logger.warn("Rejected invalid request", data);
		} else if (event.errorCode === "SECURITY_VIOLATION") {
			this.logger.error("Security violation", data);
		} else {
			this.logger.error("Database operation failed", data);
		}
	}
}

function firstValue(result: QueryResultLike): unknown {
	const row = result.rows[0];
	if (!row) return null;
	const [value] = Object.values(row);
	return value ?? null;
}

async function nullOnTransient<T>(call: Promise<T>): Promise<T | null> {
	try {
		return await call;
	} catch (error) {
		if (isWardenError(error, "TRANSIENT_FAILURE")) return null;
		throw error;
	}
}

// =============================================================================
// PUBLIC API
// =============================================================================

export class DatabaseResults {
	constructor(private readonly exec: Executor) {}

	create(table: string, data: Row, options?: ReturningOptions): Promise<Result<unknown>> {
		return settle(() => this.exec.create(table, data, options));
	}

	read(table: string, options?: ReadOptions & { resultType?: "all" }): Promise<Result<Row[]>>;
	read(table: string, options: ReadOptions & { resultType: "row" }): Promise<Result<Row | null>>;
	read(table: string, options: ReadOptions & { resultType: "value" }): Promise<Result<unknown>>;
	read(table: string, options?: ReadOptions): Promise<Result<unknown>> {
		return settle(() => this.exec.read(table, options));
	}

	update(
		table: string,
		data: Row,
		where: WhereInput,
		options?: ReturningOptions,
	): Promise<Result<unknown>> {
		return settle(() => this.exec.update(table, data, where, options));
	}

	delete(table: string, where: WhereInput, options?: ReturningOptions): Promise<Result<unknown>> {
		return settle(() => this.exec.delete(table, where, options));
	}

	count(table: string, where?: WhereInput): Promise<Result<number>> {
		return settle(() => this.exec.count(table, where));
	}

	bulkCreate(
		table: string,
		rows: readonly Row[],
		options?: BulkCreateOptions & { returning?: null },
	): Promise<Result<number>>;
	bulkCreate(
		table: string,
		rows: readonly Row[],
		options: BulkCreateOptions & { returning: string },
	): Promise<Result<unknown[]>>;
	bulkCreate(
		table: string,
		rows: readonly Row[],
		options?: BulkCreateOptions,
	): Promise<Result<number | unknown[]>> {
		return settle(() => this.exec.bulkCreate(table, rows, options));
	}
}

export class Database {
	/** The same operations, returning `Result` values instead of throwing or `null`. */
	readonly results: DatabaseResults;
	private readonly exec: Executor;

	constructor(options: DatabaseOptions) {
		const { connection, ...rest } = options;
		this.exec = new Executor(connection, rest);
		this.results = new DatabaseResults(this.exec);
	}

	/** Insert one row. Returns the RETURNING column, or `null`. */
	create(table: string, data: Row, options?: ReturningOptions): Promise<unknown> {
		return nullOnTransient(this.exec.create(table, data, options));
	}

	read(table: string, options?: ReadOptions & { resultType?: "all" }): Promise<Row[] | null>;
	read(table: string, options: ReadOptions & { resultType: "row" }): Promise<Row | null>;
	read(table: string, options: ReadOptions & { resultType: "value" }): Promise<unknown>;
	read(table: string, options?: ReadOptions): Promise<unknown> {
		return nullOnTransient(this.exec.read(table, options));
	}

	/** Requires a non-empty filter. */
	update(table: string, data: Row, where: WhereInput, options?: ReturningOptions): Promise<unknown> {
		return nullOnTransient(this.exec.update(table, data, where, options));
	}

	/** Requires a non-empty filter. */
	delete(table: string, where: WhereInput, options?: ReturningOptions): Promise<unknown> {
		return nullOnTransient(this.exec.delete(table, where, options));
	}

	count(table: string, where?: WhereInput): Promise<number | null> {
		return nullOnTransient(this.exec.count(table, where));
	}

	/**
	 * Insert many rows in chunks. Without `atomic`, chunks that committed
	 * before a failure stay committed. Driver failures are thrown.
	 */
	bulkCreate(
		table: string,
		rows: readonly Row[],
		options?: BulkCreateOptions & { returning?: null },
	): Promise<number>;
	bulkCreate(
		table: string,
		rows: readonly Row[],
		options: BulkCreateOptions & { returning: string },
	): Promise<unknown[]>;
	bulkCreate(
		table: string,
		rows: readonly Row[],
		options?: BulkCreateOptions,
	): Promise<number | unknown[]> {
		return this.exec.bulkCreate(table, rows, options);
	}

	healthCheck(): Promise<boolean> {
		return this.exec.healthCheck();
	}
}

export function createDatabase(options: DatabaseOptions): Database {
	return new Database(options);
}
