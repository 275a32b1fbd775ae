// =============================================================================
// WHERE CLAUSE BUILDER
// =============================================================================

import { WardenError } from "../error/index.js";
import { assertInSize, assertOrSize, type Condition, type ConditionNode, isPlainObject } from "./conditions.js";
import { validateIdentifier } from "./identifiers.js";
import { DEFAULT_LIMITS, type Limits } from "./limits.js";
import {
	isCompareOperator,
	isListOperator,
	isRangeOperator,
	type Operator,
	validateOperator,
} from "./operators.js";

/**
 * Owns the `$n` counter and the values bound to it. Every placeholder in a
 * statement is handed out here, so the text and the value list always agree.
 */
export class ParameterBuilder {
	private readonly values: unknown[] = [];

	constructor(private readonly startIndex = 1) {}

	/** Bind one value and return its placeholder. */
	add(value: unknown): string {
		this.values.push(value);
		return `$${this.startIndex + this.values.length - 1}`;
	}

	/** The placeholder the next `add` will return. */
	get nextIndex(): number {
		return this.startIndex + this.values.length;
	}

	get params(): unknown[] {
		return [...this.values];
	}
}

export interface WhereClause {
	clause: string;
	params: unknown[];
	nextIndex: number;
	/** Every column referenced, for per-table column checks. */
	columns: string[];
}

export interface WhereOptions {
	/** Join the top-level parts with OR instead of AND. */
	useOr?: boolean;
	startIndex?: number;
	limits?: Pick<Limits, "maxInValues" | "maxOrBranches">;
}

export function buildWhereClause(
	conditions: readonly ConditionNode[],
	options: WhereOptions = {},
): WhereClause {
	const builder = new ParameterBuilder(options.startIndex ?? 1);
	const columns = new Set<string>();
	const limits = options.limits ?? DEFAULT_LIMITS;

	const clause = renderNodes(conditions, options.useOr ? " OR " : " AND ", builder, columns, limits);

	return {
		clause,
		params: builder.params,
		nextIndex: builder.nextIndex,
		columns: [...columns],
	};
}

/** Render into an existing builder; used when SET placeholders come first. */
export function renderWhere(
	conditions: readonly ConditionNode[],
	builder: ParameterBuilder,
	options: Pick<WhereOptions, "useOr" | "limits"> = {},
): { clause: string; columns: string[] } {
	const columns = new Set<string>();
	const clause = renderNodes(
		conditions,
		options.useOr ? " OR " : " AND ",
		builder,
		columns,
		options.limits ?? DEFAULT_LIMITS,
	);
	return { clause, columns: [...columns] };
}

function renderNodes(
	nodes: readonly ConditionNode[],
	joiner: string,
	builder: ParameterBuilder,
	columns: Set<string>,
	limits: Pick<Limits, "maxInValues" | "maxOrBranches">,
): string {
	const parts: string[] = [];

	for (const node of nodes) {
		const shape: unknown = node;
		if (!isPlainObject(shape)) {
			throw WardenError.securityViolation("Condition node must be an object");
		}
		if (node.kind === "or") {
			if (!Array.isArray(node.branches)) {
				throw WardenError.securityViolation("OR group branches must be a list");
			}
			assertOrSize(node.branches.length, limits);
			const branches = node.branches.map((branch) => {
				if (!Array.isArray(branch)) {
					throw WardenError.securityViolation("OR group branch must be a list of conditions");
				}
				return `(${renderNodes(branch, " AND ", builder, columns, limits)})`;
			});
			if (branches.length > 0) {
				parts.push(`(${branches.join(" OR ")})`);
			}
			continue;
		}

		columns.add(validateIdentifier(node.column));
		parts.push(renderCondition(node, builder, limits));
	}

	return parts.length > 0 ? parts.join(joiner) : "TRUE";
}

// Nodes may arrive from JSON rather than the where helpers, so the operator is
// re-checked against the node's kind before it is written into the statement.
function operatorFor<T extends Operator>(
	condition: { kind: string; column: string; op: unknown },
	family: (op: Operator) => op is T,
): T {
	const op = validateOperator(condition.op);
	if (!family(op)) {
		throw WardenError.securityViolation(`Operator ${op} is not valid for a ${condition.kind} condition`, {
			column: condition.column,
		});
	}
	return op;
}

function renderCondition(
	condition: Condition,
	builder: ParameterBuilder,
	limits: Pick<Limits, "maxInValues">,
): string {
	const { column } = condition;
	switch (condition.kind) {
		case "isNull":
			return `${column} IS NULL`;
		case "isNotNull":
			return `${column} IS NOT NULL`;
		case "equals":
			return `${column} = ${builder.add(condition.value)}`;
		case "compare": {
			const op = operatorFor(condition, isCompareOperator);
			return `${column} ${op} ${builder.add(condition.value)}`;
		}
		case "in": {
			const op = operatorFor(condition, isListOperator);
			if (!Array.isArray(condition.values)) {
				throw WardenError.securityViolation(`${op} values must be a list`, { column });
			}
			if (condition.values.length === 0) return "FALSE";
			assertInSize(column, condition.values.length, limits);
			const placeholders = condition.values.map((value) => builder.add(value));
			return `${column} ${op} (${placeholders.join(",")})`;
		}
		case "between": {
			const op = operatorFor(condition, isRangeOperator);
			return `${column} ${op} ${builder.add(condition.low)} AND ${builder.add(condition.high)}`;
		}
		default:
			throw WardenError.securityViolation("Unknown condition kind", { column });
	}
}
