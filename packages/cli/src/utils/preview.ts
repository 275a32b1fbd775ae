// =============================================================================
// STATEMENT PREVIEW — build SQL from CLI flags without executing it
// =============================================================================

import {
	buildCount,
	buildDelete,
	buildInsert,
	buildSelect,
	buildUpdate,
	type ConditionSet,
	isPlainObject,
	type QueryContext,
	type Row,
	type SqlStatement,
	WardenError,
} from "@pgwarden/core";

export const PREVIEW_OPERATIONS = ["select", "insert", "update", "delete", "count"] as const;

export type PreviewOperation = (typeof PREVIEW_OPERATIONS)[number];

/** Raw option values as commander hands them over. */
export interface PreviewFlags {
	where?: string;
	data?: string;
	fields?: string;
	orderBy?: string;
	limit?: string;
	offset?: string;
	or?: boolean;
	returning?: string;
}

function isPreviewOperation(value: string): value is PreviewOperation {
	return PREVIEW_OPERATIONS.some((op) => op === value);
}

export function buildPreview(
	ctx: QueryContext,
	operation: string,
	table: string,
	flags: PreviewFlags,
): SqlStatement {
	const op = operation.toLowerCase();
	if (!isPreviewOperation(op)) {
		throw WardenError.validation(
			`Unknown operation "${operation}". Use one of: ${PREVIEW_OPERATIONS.join(", ")}`,
		);
	}

	const where = parseObject("--where", flags.where);
	const returning = flags.returning === undefined ? undefined : { returning: flags.returning };

	switch (op) {
		case "select":
			return buildSelect(ctx, table, {
				where,
				fields: parseFields(flags.fields),
				orderBy: flags.orderBy,
				limit: parseCount("--limit", flags.limit),
				offset: parseCount("--offset", flags.offset),
				useOr: flags.or ?? false,
			});
		case "count":
			return buildCount(ctx, table, where);
		case "insert":
			return buildInsert(ctx, table, requireObject("--data", flags.data), returning);
		case "update":
			return buildUpdate(ctx, table, requireObject("--data", flags.data), where ?? {}, returning);
		case "delete":
			return buildDelete(ctx, table, where ?? {}, returning);
	}
}

/** `$1 = "paid"` style lines for each bound value. */
export function describeParams(values: readonly unknown[]): string[] {
	return values.map((value, i) => `$${i + 1} = ${JSON.stringify(value) ?? String(value)}`);
}

function parseObject(flag: string, raw: string | undefined): (ConditionSet & Row) | undefined {
	if (raw === undefined) return undefined;
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw WardenError.validation(`${flag} is not valid JSON: ${reason}`);
	}
	if (!isPlainObject(parsed)) {
		throw WardenError.validation(`${flag} must be a JSON object`);
	}
	return parsed;
}

function requireObject(flag: string, raw: string | undefined): Row {
	const parsed = parseObject(flag, raw);
	if (!parsed) throw WardenError.validation(`${flag} is required for this operation`);
	return parsed;
}

function parseFields(raw: string | undefined): string[] | undefined {
	if (raw === undefined) return undefined;
	return raw
		.split(",")
		.map((field) => field.trim())
		.filter((field) => field.length > 0);
}

function parseCount(flag: string, raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	if (!/^\d+$/.test(raw.trim())) {
		throw WardenError.validation(`${flag} must be a non-negative integer`);
	}
	return Number(raw.trim());
}
