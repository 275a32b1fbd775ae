// =============================================================================
// IDENTIFIER VALIDATION — tables, columns, ORDER BY, pagination
// =============================================================================
// Identifiers are interpolated into SQL text unquoted, so anything that
// reaches a statement must first pass through one of these functions.

import { WardenError } from "../error/index.js";
import type { WardenLogger } from "../types/config.js";
import type { Limits } from "./limits.js";
import type { TableAllowList } from "./schema.js";

/** Letter or underscore, then up to 63 letters, digits or underscores. */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,63}$/;

export type SortDirection = "ASC" | "DESC";

export type OrderByInput = string | { column: string; direction?: string };

export function validateIdentifier(name: unknown): string {
	if (typeof name !== "string" || name.length === 0) {
		throw WardenError.securityViolation("Identifier must be a non-empty string");
	}
	if (!IDENTIFIER_PATTERN.test(name)) {
		throw WardenError.securityViolation(`Invalid identifier: ${JSON.stringify(name)}`);
	}
	return name;
}

export function validateTable(
	schema: TableAllowList,
	table: unknown,
	logger?: WardenLogger,
): string {
	const name = validateIdentifier(table);
	if (!schema.hasTable(name)) {
		logger?.warn("Rejected table outside the allow-list", { table: name });
		throw WardenError.securityViolation(`Table not allowed: ${name}`, { table: name });
	}
	return name;
}

/**
 * Returns the clause body, e.g. `"created_at DESC"`. Direction defaults to ASC.
 */
export function validateOrderBy(
	schema: TableAllowList,
	table: string,
	orderBy: OrderByInput,
): string {
	const { column, direction } = splitOrderBy(orderBy);

	validateIdentifier(column);
	if (!schema.orderByColumns(table).has(column)) {
		throw WardenError.securityViolation(`Column "${column}" cannot be used in ORDER BY for ${table}`, {
			table,
			column,
		});
	}

	return `${column} ${direction}`;
}

function splitOrderBy(orderBy: OrderByInput): { column: string; direction: SortDirection } {
	if (typeof orderBy === "string") {
		const trimmed = orderBy.trim();
		if (trimmed.length === 0) {
			throw WardenError.validation("ORDER BY must not be empty");
		}
		const parts = trimmed.split(/\s+/);
		if (parts.length > 2) {
			throw WardenError.securityViolation(`Invalid ORDER BY format: ${JSON.stringify(orderBy)}`);
		}
		const [column = "", direction] = parts;
		return { column, direction: parseDirection(direction) };
	}

	const column = orderBy.column.trim();
	if (column.length === 0) {
		throw WardenError.validation("ORDER BY must not be empty");
	}
	return { column, direction: parseDirection(orderBy.direction) };
}

function parseDirection(direction: string | undefined): SortDirection {
	if (direction === undefined) return "ASC";
	const upper = direction.trim().toUpperCase();
	if (upper === "ASC" || upper === "DESC") return upper;
	throw WardenError.securityViolation(`Invalid sort direction: ${JSON.stringify(direction)}`);
}

export function validateLimit(limit: unknown, limits: Pick<Limits, "maxLimit">): number {
	return validateBound("LIMIT", limit, limits.maxLimit);
}

export function validateOffset(offset: unknown, limits: Pick<Limits, "maxOffset">): number {
	return validateBound("OFFSET", offset, limits.maxOffset);
}

function validateBound(label: string, value: unknown, max: number): number {
	if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
		throw WardenError.validation(`${label} must be a non-negative integer`);
	}
	if (value > max) {
		throw WardenError.validation(`${label} must not exceed ${max}`);
	}
	return value;
}

/** Enforce a table's `columns` allow-set, when it declares one. */
export function assertColumnsAllowed(
	schema: TableAllowList,
	table: string,
	columns: Iterable<string>,
): void {
	const allowed = schema.columns(table);
	if (!allowed) return;
	for (const column of columns) {
		if (!allowed.has(column)) {
			throw WardenError.securityViolation(`Column not allowed on ${table}: ${column}`, {
				table,
				column,
			});
		}
	}
}
