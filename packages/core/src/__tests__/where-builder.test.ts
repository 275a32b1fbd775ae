import { describe, expect, it } from "vitest";
import { type ConditionNode, parseConditionSet, where } from "../db/conditions.js";
import { DEFAULT_LIMITS } from "../db/limits.js";
import { buildWhereClause, ParameterBuilder, renderWhere } from "../db/where-builder.js";
import { WardenError } from "../error/index.js";

function placeholderCount(text: string): number {
	return text.match(/\$\d+/g)?.length ?? 0;
}

describe("ParameterBuilder", () => {
	it("hands out sequential placeholders", () => {
		const builder = new ParameterBuilder();
		expect(builder.add("a")).toBe("$1");
		expect(builder.add("b")).toBe("$2");
		expect(builder.nextIndex).toBe(3);
		expect(builder.params).toEqual(["a", "b"]);
	});

	it("starts from the given index", () => {
		const builder = new ParameterBuilder(4);
		expect(builder.add(true)).toBe("$4");
		expect(builder.nextIndex).toBe(5);
	});

	it("returns a copy of the params", () => {
		const builder = new ParameterBuilder();
		builder.add(1);
		builder.params.push(2);
		expect(builder.params).toEqual([1]);
	});
});

describe("buildWhereClause", () => {
	it("renders comparison and IN conditions", () => {
		const result = buildWhereClause(parseConditionSet({ age: [">", 18], city: ["A", "B"] }));
		expect(result.clause).toBe("age > $1 AND city IN ($2,$3)");
		expect(result.params).toEqual([18, "A", "B"]);
		expect(result.nextIndex).toBe(4);
		expect(result.columns).toEqual(["age", "city"]);
	});

	it("renders every condition kind", () => {
		const result = buildWhereClause([
			where.eq("status", "paid"),
			where.ne("region", "eu"),
			where.like("email", "%@example.test"),
			where.notIn("id", [1, 2]),
			where.between("total", 10, 20),
			where.notBetween("score", 0, 5),
			where.isNull("deleted_at"),
			where.isNotNull("paid_at"),
		]);
		expect(result.clause).toBe(
			"status = $1 AND region != $2 AND email LIKE $3 AND id NOT IN ($4,$5)" +
				" AND total BETWEEN $6 AND $7 AND score NOT BETWEEN $8 AND $9" +
				" AND deleted_at IS NULL AND paid_at IS NOT NULL",
		);
		expect(result.params).toEqual(["paid", "eu", "%@example.test", 1, 2, 10, 20, 0, 5]);
	});

	it("joins with OR when asked", () => {
		const result = buildWhereClause(parseConditionSet({ a: 1, b: 2 }), { useOr: true });
		expect(result.clause).toBe("a = $1 OR b = $2");
	});

	it("renders nested $or groups", () => {
		const result = buildWhereClause(
			parseConditionSet({
				status: "paid",
				$or: [{ total: [">", 100] }, { priority: true, region: "eu" }],
			}),
		);
		expect(result.clause).toBe("status = $1 AND ((total > $2) OR (priority = $3 AND region = $4))");
		expect(result.params).toEqual(["paid", 100, true, "eu"]);
	});

	it("renders an empty branch as TRUE", () => {
		const result = buildWhereClause([where.or([], [where.eq("a", 1)])]);
		expect(result.clause).toBe("((TRUE) OR (a = $1))");
		expect(result.columns).toEqual(["a"]);
	});

	it("renders no conditions as TRUE", () => {
		expect(buildWhereClause([]).clause).toBe("TRUE");
	});

	it("renders an empty IN list as FALSE", () => {
		const result = buildWhereClause([where.in("id", [])]);
		expect(result.clause).toBe("FALSE");
		expect(result.params).toEqual([]);
	});

	it("continues numbering from startIndex", () => {
		const result = buildWhereClause([where.eq("id", 9)], { startIndex: 3 });
		expect(result.clause).toBe("id = $3");
		expect(result.nextIndex).toBe(4);
	});

	it("revalidates columns of hand-built nodes", () => {
		expect(() => buildWhereClause([where.eq("id; DROP TABLE users", 1)])).toThrow(
			'Invalid identifier: "id; DROP TABLE users"',
		);
	});

	it("enforces the IN limit on hand-built nodes", () => {
		const limits = { ...DEFAULT_LIMITS, maxInValues: 2 };
		expect(() => buildWhereClause([where.in("id", [1, 2, 3])], { limits })).toThrow(
			'Too many values in IN list for "id" (max 2)',
		);
	});

	it("never puts values into the clause text", () => {
		const hostile = "'; DROP TABLE users; --";
		const result = buildWhereClause(parseConditionSet({ name: hostile, tags: [hostile, "x"] }));
		expect(result.clause).toBe("name = $1 AND tags IN ($2,$3)");
		expect(result.params).toEqual([hostile, hostile, "x"]);
	});

	it("emits one placeholder per bound value", () => {
		const inputs = [
			{ a: 1 },
			{ a: [1, 2, 3], b: null },
			{ a: ["BETWEEN", [1, 2]], $or: [{ b: 1 }, { c: ["<", 3], d: [4, 5] }] },
			{ a: ["IS NULL", null], b: ["NOT IN", [1]] },
		];
		for (const input of inputs) {
			const result = buildWhereClause(parseConditionSet(input));
			expect(placeholderCount(result.clause)).toBe(result.params.length);
			expect(result.nextIndex).toBe(result.params.length + 1);
		}
	});
});

describe("renderWhere", () => {
	it("shares the builder with earlier placeholders", () => {
		const builder = new ParameterBuilder();
		builder.add("shipped");
		const { clause, columns } = renderWhere([where.eq("id", 7)], builder);
		expect(clause).toBe("id = $2");
		expect(columns).toEqual(["id"]);
		expect(builder.params).toEqual(["shipped", 7]);
	});
});

describe("node lists from JSON", () => {
	function nodesFrom(json: string): ConditionNode[] {
		return JSON.parse(json);
	}

	function rejection(json: string): { code: string; message: string } {
		try {
			buildWhereClause(nodesFrom(json));
		} catch (error) {
			if (error instanceof WardenError) return { code: error.code, message: error.message };
			throw error;
		}
		throw new Error("expected a WardenError");
	}

	it("rejects SQL smuggled in a compare operator", () => {
		expect(
			rejection('[{"kind":"compare","column":"id","op":"= 1 OR 1=1 OR id =","value":1}]'),
		).toEqual({
			code: "SECURITY_VIOLATION",
			message: 'Operator not allowed: "= 1 OR 1=1 OR id ="',
		});
	});

	it("rejects an operator from another condition kind", () => {
		expect(rejection('[{"kind":"compare","column":"id","op":"IN","value":1}]')).toEqual({
			code: "SECURITY_VIOLATION",
			message: "Operator IN is not valid for a compare condition",
		});
		expect(rejection('[{"kind":"in","column":"id","op":"BETWEEN","values":[1]}]')).toEqual({
			code: "SECURITY_VIOLATION",
			message: "Operator BETWEEN is not valid for a in condition",
		});
		expect(rejection('[{"kind":"between","column":"id","op":"LIKE","low":1,"high":2}]')).toEqual({
			code: "SECURITY_VIOLATION",
			message: "Operator LIKE is not valid for a between condition",
		});
	});

	it("rejects IN values that are not a list", () => {
		expect(rejection('[{"kind":"in","column":"id","op":"IN","values":"1) OR (1=1"}]')).toEqual({
			code: "SECURITY_VIOLATION",
			message: "IN values must be a list",
		});
	});

	it("rejects unknown condition kinds", () => {
		expect(rejection('[{"kind":"raw","column":"id","sql":"1=1"}]')).toEqual({
			code: "SECURITY_VIOLATION",
			message: "Unknown condition kind",
		});
	});

	it("rejects malformed nodes and OR groups", () => {
		expect(rejection("[42]")).toEqual({
			code: "SECURITY_VIOLATION",
			message: "Condition node must be an object",
		});
		expect(rejection('[{"kind":"or","branches":"x"}]')).toEqual({
			code: "SECURITY_VIOLATION",
			message: "OR group branches must be a list",
		});
		expect(rejection('[{"kind":"or","branches":[{"kind":"equals","column":"a","value":1}]}]')).toEqual({
			code: "SECURITY_VIOLATION",
			message: "OR group branch must be a list of conditions",
		});
	});

	it("renders well-formed nodes with the canonical operator", () => {
		const result = buildWhereClause(
			nodesFrom(
				'[{"kind":"compare","column":"email","op":" like ","value":"%@example.test"},' +
					'{"kind":"in","column":"id","op":"not in","values":[1,2]}]',
			),
		);
		expect(result.clause).toBe("email LIKE $1 AND id NOT IN ($2,$3)");
		expect(result.params).toEqual(["%@example.test", 1, 2]);
	});
});
