// =============================================================================
// CONDITIONS — filter payloads normalized into typed nodes
// =============================================================================
// Callers hand over loosely shaped records such as
//   { status: "paid", total: [">", 100], id: [1, 2, 3], $or: [{...}, {...}] }
// and parseConditionSet turns them into a ConditionNode list the clause
// builder can render without re-inspecting value shapes.

import { WardenError } from "../error/index.js";
import { DEFAULT_LIMITS, type Limits } from "./limits.js";
import { validateIdentifier } from "./identifiers.js";
import {
	type CompareOperator,
	isOperatorToken,
	type ListOperator,
	type Operator,
	type RangeOperator,
	validateOperator,
} from "./operators.js";

export type Condition =
	| { kind: "equals"; column: string; value: unknown }
	| { kind: "compare"; column: string; op: CompareOperator; value: unknown }
	| { kind: "in"; column: string; op: ListOperator; values: readonly unknown[] }
	| { kind: "between"; column: string; op: RangeOperator; low: unknown; high: unknown }
	| { kind: "isNull"; column: string }
	| { kind: "isNotNull"; column: string };

export interface OrGroup {
	kind: "or";
	/** Each branch is AND-joined; branches are OR-joined. */
	branches: readonly (readonly ConditionNode[])[];
}

export type ConditionNode = Condition | OrGroup;

/** Wire shape of a filter: column → value, plus `$or` for nested groups. */
export interface ConditionSet {
	readonly [column: string]: unknown;
}

export const OR_KEY = "$or";

export type ConditionLimits = Pick<Limits, "maxInValues" | "maxOrBranches" | "maxOrDepth">;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Shapes, in priority order:
 *
 * - `null` → IS NULL
 * - `[op, value]` where `op` names an operator → that operator
 * - any other array → IN
 * - `{ op, value }` → that operator
 * - anything else → equality
 */
export function normalizeCondition(
	key: string,
	value: unknown,
	limits: Pick<Limits, "maxInValues"> = DEFAULT_LIMITS,
): Condition {
	const column = validateIdentifier(key.trim());

	if (value === undefined) {
		throw WardenError.validation(`Condition on "${column}" has no value`, { column });
	}

	if (value === null) {
		return { kind: "isNull", column };
	}

	if (Array.isArray(value)) {
		const [first, second] = value;
		if (value.length === 2 && isOperatorToken(first)) {
			return fromOperator(column, validateOperator(first), second, limits);
		}
		if (value.length === 0) {
			throw WardenError.validation(`IN list for "${column}" cannot be empty`, { column });
		}
		assertInSize(column, value.length, limits);
		return { kind: "in", column, op: "IN", values: [...value] };
	}

	if (isPlainObject(value)) {
		if (!Object.hasOwn(value, "op")) {
			throw WardenError.validation(`Condition object for "${column}" must have an "op" key`, {
				column,
			});
		}
		return fromOperator(column, validateOperator(value.op), value.value, limits);
	}

	return { kind: "equals", column, value };
}

function fromOperator(
	column: string,
	op: Operator,
	value: unknown,
	limits: Pick<Limits, "maxInValues">,
): Condition {
	switch (op) {
		case "=":
			return { kind: "equals", column, value };
		case "IS NULL":
			return { kind: "isNull", column };
		case "IS NOT NULL":
			return { kind: "isNotNull", column };
		case "IN":
		case "NOT IN":
			if (!Array.isArray(value)) {
				throw WardenError.validation(`${op} on "${column}" requires a list`, { column });
			}
			assertInSize(column, value.length, limits);
			return { kind: "in", column, op, values: [...value] };
		case "BETWEEN":
		case "NOT BETWEEN": {
			if (!Array.isArray(value) || value.length !== 2) {
				throw WardenError.validation(`${op} on "${column}" requires exactly two values`, {
					column,
				});
			}
			const [low, high] = value;
			return { kind: "between", column, op, low, high };
		}
		default:
			return { kind: "compare", column, op, value };
	}
}

export function assertInSize(
	column: string,
	size: number,
	limits: Pick<Limits, "maxInValues">,
): void {
	if (size > limits.maxInValues) {
		throw WardenError.securityViolation(
			`Too many values in IN list for "${column}" (max ${limits.maxInValues})`,
			{ column, size },
		);
	}
}

export function assertOrSize(branches: number, limits: Pick<Limits, "maxOrBranches">): void {
	if (branches > limits.maxOrBranches) {
		throw WardenError.securityViolation(
			`Too many OR branches (max ${limits.maxOrBranches})`,
			{ branches },
		);
	}
}

export function parseConditionSet(
	set: ConditionSet,
	limits: ConditionLimits = DEFAULT_LIMITS,
): ConditionNode[] {
	return parseAtDepth(set, limits, 0);
}

function parseAtDepth(set: ConditionSet, limits: ConditionLimits, depth: number): ConditionNode[] {
	const nodes: ConditionNode[] = [];

	for (const [key, value] of Object.entries(set)) {
		if (key !== OR_KEY) {
			nodes.push(normalizeCondition(key, value, limits));
			continue;
		}

		if (!Array.isArray(value)) {
			throw WardenError.validation(`"${OR_KEY}" must be a list of condition objects`);
		}
		assertOrSize(value.length, limits);
		if (depth + 1 > limits.maxOrDepth) {
			throw WardenError.securityViolation(`"${OR_KEY}" nested too deeply (max ${limits.maxOrDepth})`);
		}

		const branches: ConditionNode[][] = [];
		for (const branch of value) {
			if (!isPlainObject(branch)) {
				throw WardenError.validation(`Each "${OR_KEY}" branch must be a condition object`);
			}
			branches.push(parseAtDepth(branch, limits, depth + 1));
		}
		if (branches.length > 0) {
			nodes.push({ kind: "or", branches });
		}
	}

	return nodes;
}

/** Accept either a raw payload or nodes built with {@link where}. */
export function toConditionNodes(
	input: ConditionSet | readonly ConditionNode[] | undefined,
	limits: ConditionLimits = DEFAULT_LIMITS,
): readonly ConditionNode[] {
	if (input === undefined) return [];
	if (isNodeList(input)) return input;
	return parseConditionSet(input, limits);
}

function isNodeList(
	input: ConditionSet | readonly ConditionNode[],
): input is readonly ConditionNode[] {
	return Array.isArray(input);
}

// =============================================================================
// CONSTRUCTOR HELPERS
// =============================================================================

export const where = {
	eq: (column: string, value: unknown): Condition => ({ kind: "equals", column, value }),
	ne: (column: string, value: unknown): Condition => ({ kind: "compare", column, op: "!=", value }),
	gt: (column: string, value: unknown): Condition => ({ kind: "compare", column, op: ">", value }),
	gte: (column: string, value: unknown): Condition => ({ kind: "compare", column, op: ">=", value }),
	lt: (column: string, value: unknown): Condition => ({ kind: "compare", column, op: "<", value }),
	lte: (column: string, value: unknown): Condition => ({ kind: "compare", column, op: "<=", value }),
	like: (column: string, pattern: string): Condition => ({
		kind: "compare",
		column,
		op: "LIKE",
		value: pattern,
	}),
	ilike: (column: string, pattern: string): Condition => ({
		kind: "compare",
		column,
		op: "ILIKE",
		value: pattern,
	}),
	in: (column: string, values: readonly unknown[]): Condition => ({
		kind: "in",
		column,
		op: "IN",
		values,
	}),
	notIn: (column: string, values: readonly unknown[]): Condition => ({
		kind: "in",
		column,
		op: "NOT IN",
		values,
	}),
	between: (column: string, low: unknown, high: unknown): Condition => ({
		kind: "between",
		column,
		op: "BETWEEN",
		low,
		high,
	}),
	notBetween: (column: string, low: unknown, high: unknown): Condition => ({
		kind: "between",
		column,
		op: "NOT BETWEEN",
		low,
		high,
	}),
	isNull: (column: string): Condition => ({ kind: "isNull", column }),
	isNotNull: (column: string): Condition => ({ kind: "isNotNull", column }),
	or: (...branches: (readonly ConditionNode[])[]): OrGroup => ({ kind: "or", branches }),
};
