// =============================================================================
// QUERY BUILDER — parameterized SELECT / INSERT / UPDATE / DELETE / COUNT
// =============================================================================
// Pure functions: each one validates every identifier it interpolates and
// returns `{ text, values }` ready for `pg`'s `client.query(text, values)`.
// Nothing here talks to the database.

import { WardenError } from "../error/index.js";
import type { WardenLogger } from "../types/config.js";
import { type ConditionNode, type ConditionSet, toConditionNodes } from "./conditions.js";
import {
	assertColumnsAllowed,
	type OrderByInput,
	validateIdentifier,
	validateLimit,
	validateOffset,
	validateOrderBy,
	validateTable,
} from "./identifiers.js";
import { type Limits, type LimitsOptions, MAX_BIND_PARAMETERS, resolveLimits } from "./limits.js";
import type { Row } from "./pool.js";
import { type SchemaDefinition, TableAllowList } from "./schema.js";
import { ParameterBuilder, renderWhere } from "./where-builder.js";

export interface SqlStatement {
	text: string;
	values: unknown[];
}

/** A raw filter payload or nodes built with the `where` helpers. */
export type WhereInput = ConditionSet | readonly ConditionNode[];

/** What every builder validates against. */
export interface QueryContext {
	schema: TableAllowList;
	limits: Limits;
	/** Receives a warning when a caller names a table outside the allow-list. */
	logger?: WardenLogger;
}

export function createQueryContext(
	options: { schema?: SchemaDefinition; limits?: LimitsOptions; logger?: WardenLogger } = {},
): QueryContext {
	return {
		schema: new TableAllowList(options.schema),
		limits: resolveLimits(options.limits),
		logger: options.logger,
	};
}

export interface SelectOptions {
	where?: WhereInput;
	fields?: readonly string[];
	orderBy?: OrderByInput;
	limit?: number;
	offset?: number;
	useOr?: boolean;
}

export interface ReturningOptions {
	/** Column to return. Default: `"id"`; `null` omits RETURNING. */
	returning?: string | null;
}

export interface BulkInsertOptions {
	/** Rows per statement. Default: 1000, lowered to fit the bind-parameter ceiling. */
	chunkSize?: number;
	returning?: string | null;
}

export interface BulkInsertStatement extends SqlStatement {
	rowCount: number;
}

export const DEFAULT_CHUNK_SIZE = 1000;

// =============================================================================
// SELECT / COUNT
// =============================================================================

export function buildSelect(
	ctx: QueryContext,
	tableName: string,
	options: SelectOptions = {},
): SqlStatement {
	const table = validateTable(ctx.schema, tableName, ctx.logger);

	const fields = options.fields ?? [];
	if (fields.length > ctx.limits.maxFields) {
		throw WardenError.validation(`Too many fields (max ${ctx.limits.maxFields})`);
	}
	const columns = fields.map((field) => validateIdentifier(field));
	assertColumnsAllowed(ctx.schema, table, columns);

	const builder = new ParameterBuilder();
	let text = `SELECT ${columns.length > 0 ? columns.join(", ") : "*"} FROM ${table}`;
	text += whereSuffix(ctx, table, options.where, builder, options.useOr);

	if (options.orderBy !== undefined) {
		text += ` ORDER BY ${validateOrderBy(ctx.schema, table, options.orderBy)}`;
	}
	if (options.limit !== undefined) {
		text += ` LIMIT ${builder.add(validateLimit(options.limit, ctx.limits))}`;
	}
	if (options.offset !== undefined) {
		text += ` OFFSET ${builder.add(validateOffset(options.offset, ctx.limits))}`;
	}

	return { text, values: builder.params };
}

export function buildCount(ctx: QueryContext, tableName: string, where?: WhereInput): SqlStatement {
	const table = validateTable(ctx.schema, tableName, ctx.logger);
	const builder = new ParameterBuilder();
	const text = `SELECT COUNT(*)::bigint AS count FROM ${table}${whereSuffix(ctx, table, where, builder)}`;
	return { text, values: builder.params };
}

/** ` WHERE …`, or nothing when the filter is empty. */
function whereSuffix(
	ctx: QueryContext,
	table: string,
	where: WhereInput | undefined,
	builder: ParameterBuilder,
	useOr?: boolean,
): string {
	const nodes = toConditionNodes(where, ctx.limits);
	if (nodes.length === 0) return "";
	const rendered = renderWhere(nodes, builder, { useOr, limits: ctx.limits });
	assertColumnsAllowed(ctx.schema, table, rendered.columns);
	return ` WHERE ${rendered.clause}`;
}

// =============================================================================
// INSERT / UPDATE / DELETE
// =============================================================================

export function buildInsert(
	ctx: QueryContext,
	tableName: string,
	data: Row,
	options: ReturningOptions = {},
): SqlStatement {
	const table = validateTable(ctx.schema, tableName, ctx.logger);
	const entries = Object.entries(data);
	if (entries.length === 0) {
		throw WardenError.validation("Insert data cannot be empty", { table });
	}

	const columns = entries.map(([column]) => validateIdentifier(column));
	assertColumnsAllowed(ctx.schema, table, columns);

	const builder = new ParameterBuilder();
	const placeholders = entries.map(([, value]) => builder.add(value));

	const text =
		`INSERT INTO ${table} (${columns.join(", ")}) VALUES (${placeholders.join(", ")})` +
		returningSuffix(ctx, table, options.returning);

	return { text, values: builder.params };
}

export function buildUpdate(
	ctx: QueryContext,
	tableName: string,
	data: Row,
	where: WhereInput,
	options: ReturningOptions = {},
): SqlStatement {
	const table = validateTable(ctx.schema, tableName, ctx.logger);
	const entries = Object.entries(data);
	if (entries.length === 0) {
		throw WardenError.validation("Update data cannot be empty", { table });
	}

	const columns = entries.map(([column]) => validateIdentifier(column));
	assertColumnsAllowed(ctx.schema, table, columns);

	const builder = new ParameterBuilder();
	const assignments = entries.map(([column, value]) => `${column} = ${builder.add(value)}`);
	const clause = requiredWhere(ctx, table, where, builder, "update");

	const text =
		`UPDATE ${table} SET ${assignments.join(", ")} WHERE ${clause}` +
		returningSuffix(ctx, table, options.returning);

	return { text, values: builder.params };
}

export function buildDelete(
	ctx: QueryContext,
	tableName: string,
	where: WhereInput,
	options: ReturningOptions = {},
): SqlStatement {
	const table = validateTable(ctx.schema, tableName, ctx.logger);
	const builder = new ParameterBuilder();
	const clause = requiredWhere(ctx, table, where, builder, "delete");

	const text =
		`DELETE FROM ${table} WHERE ${clause}` + returningSuffix(ctx, table, options.returning);

	return { text, values: builder.params };
}

/**
 * UPDATE and DELETE refuse to run without a filter. A filter that
 * references no column at all (e.g. `{ $or: [{}] }`) counts as empty.
 */
function requiredWhere(
	ctx: QueryContext,
	table: string,
	where: WhereInput,
	builder: ParameterBuilder,
	operation: "update" | "delete",
): string {
	const nodes = toConditionNodes(where, ctx.limits);
	const rendered = nodes.length > 0 ? renderWhere(nodes, builder, { limits: ctx.limits }) : null;
	if (!rendered || rendered.columns.length === 0) {
		throw WardenError.validation(
			`${operation === "update" ? "Update" : "Delete"} conditions cannot be empty`,
			{ table },
		);
	}
	assertColumnsAllowed(ctx.schema, table, rendered.columns);
	return rendered.clause;
}

function returningSuffix(
	ctx: QueryContext,
	table: string,
	returning: string | null | undefined,
): string {
	if (returning === null) return "";
	const column = validateIdentifier(returning ?? "id");
	assertColumnsAllowed(ctx.schema, table, [column]);
	return ` RETURNING ${column}`;
}

// =============================================================================
// BULK INSERT
// =============================================================================

/**
 * Split `rows` into multi-row INSERTs. Columns come from the first row and
 * every other row must carry exactly the same keys. Each statement numbers
 * its placeholders from `$1`.
 */
export function buildBulkInsert(
	ctx: QueryContext,
	tableName: string,
	rows: readonly Row[],
	options: BulkInsertOptions = {},
): BulkInsertStatement[] {
	const table = validateTable(ctx.schema, tableName, ctx.logger);
	const [first] = rows;
	if (!first) return [];

	const columns = Object.keys(first).map((column) => validateIdentifier(column));
	if (columns.length === 0) {
		throw WardenError.validation("Bulk insert rows cannot be empty objects", { table });
	}
	assertColumnsAllowed(ctx.schema, table, columns);

	rows.forEach((row, index) => {
		const keys = Object.keys(row);
		const mismatch =
			keys.length !== columns.length || columns.some((column) => !Object.hasOwn(row, column));
		if (mismatch) {
			throw WardenError.validation(`Row ${index} does not have the columns of the first row`, {
				table,
				row: index,
				expected: columns,
			});
		}
	});

	const chunkSize = effectiveChunkSize(options.chunkSize ?? DEFAULT_CHUNK_SIZE, columns.length);
	const suffix = returningSuffix(ctx, table, options.returning ?? null);
	const statements: BulkInsertStatement[] = [];

	for (let start = 0; start < rows.length; start += chunkSize) {
		const chunk = rows.slice(start, start + chunkSize);
		const builder = new ParameterBuilder();
		const tuples = chunk.map(
			(row) => `(${columns.map((column) => builder.add(row[column])).join(",")})`,
		);
		statements.push({
			text: `INSERT INTO ${table} (${columns.join(",")}) VALUES ${tuples.join(",")}${suffix}`,
			values: builder.params,
			rowCount: chunk.length,
		});
	}

	return statements;
}

export function effectiveChunkSize(requested: number, columnCount: number): number {
	if (!Number.isSafeInteger(requested) || requested < 1) {
		throw WardenError.validation(`chunkSize must be a positive integer, got ${requested}`);
	}
	return Math.min(requested, Math.floor(MAX_BIND_PARAMETERS / columnCount));
}
