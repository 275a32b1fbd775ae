import { WardenError } from "../error/index.js";

export const OPERATORS = [
	"=",
	"!=",
	">",
	"<",
	">=",
	"<=",
	"LIKE",
	"ILIKE",
	"IN",
	"NOT IN",
	"IS NULL",
	"IS NOT NULL",
	"BETWEEN",
	"NOT BETWEEN",
] as const;

export type Operator = (typeof OPERATORS)[number];

export type CompareOperator = "!=" | ">" | "<" | ">=" | "<=" | "LIKE" | "ILIKE";
export type ListOperator = "IN" | "NOT IN";
export type RangeOperator = "BETWEEN" | "NOT BETWEEN";

const OPERATOR_SET: ReadonlySet<string> = new Set(OPERATORS);
const COMPARE_OPERATORS: ReadonlySet<Operator> = new Set<CompareOperator>(["!=", ">", "<", ">=", "<=", "LIKE", "ILIKE"]);
const LIST_OPERATORS: ReadonlySet<Operator> = new Set<ListOperator>(["IN", "NOT IN"]);
const RANGE_OPERATORS: ReadonlySet<Operator> = new Set<RangeOperator>(["BETWEEN", "NOT BETWEEN"]);

function canonical(value: string): string {
	return value.trim().toUpperCase();
}

function isOperator(value: string): value is Operator {
	return OPERATOR_SET.has(value);
}

/** Non-throwing check: is `value` a string naming a known operator? */
export function isOperatorToken(value: unknown): value is string {
	return typeof value === "string" && isOperator(canonical(value));
}

export function validateOperator(op: unknown): Operator {
	if (typeof op !== "string") {
		throw WardenError.securityViolation("Operator must be a string");
	}
	const upper = canonical(op);
	if (!isOperator(upper)) {
		throw WardenError.securityViolation(`Operator not allowed: ${JSON.stringify(op)}`);
	}
	return upper;
}

export function isCompareOperator(op: Operator): op is CompareOperator {
	return COMPARE_OPERATORS.has(op);
}

export function isListOperator(op: Operator): op is ListOperator {
	return LIST_OPERATORS.has(op);
}

export function isRangeOperator(op: Operator): op is RangeOperator {
	return RANGE_OPERATORS.has(op);
}
