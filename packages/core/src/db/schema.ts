// =============================================================================
// TABLE ALLOW-LIST
// =============================================================================
// The closed set of tables the data access layer will ever name in SQL,
// with the columns each table may be ordered by and, optionally, the only
// columns it may touch at all.

import { WardenError } from "../error/index.js";
import { IDENTIFIER_PATTERN } from "./identifiers.js";

export interface TableDefinition {
	/** Columns accepted in ORDER BY. A table without this list cannot be ordered. */
	orderBy?: readonly string[];
	/**
	 * Every column statements against this table may reference. When omitted,
	 * any column that passes the identifier pattern is accepted.
	 */
	columns?: readonly string[];
}

export type SchemaDefinition = Readonly<Record<string, TableDefinition>>;

export const DEFAULT_SCHEMA: SchemaDefinition = {
	users: { orderBy: ["id", "created_at", "updated_at", "email"] },
	products: { orderBy: ["id", "name", "price", "created_at"] },
	orders: { orderBy: ["id", "created_at", "status", "total"] },
	payments: { orderBy: ["id", "created_at", "amount"] },
};

interface TableEntry {
	orderBy: ReadonlySet<string>;
	columns: ReadonlySet<string> | null;
}

export class TableAllowList {
	private readonly entries: ReadonlyMap<string, TableEntry>;

	constructor(definition: SchemaDefinition = DEFAULT_SCHEMA) {
		const entries = new Map<string, TableEntry>();
		for (const [table, def] of Object.entries(definition)) {
			assertDefinitionIdentifier(table, "table name");
			for (const column of def.orderBy ?? []) {
				assertDefinitionIdentifier(column, `${table}.orderBy column`);
			}
			for (const column of def.columns ?? []) {
				assertDefinitionIdentifier(column, `${table}.columns entry`);
			}

			const columns = def.columns ? new Set(def.columns) : null;
			if (columns) {
				for (const column of def.orderBy ?? []) {
					if (!columns.has(column)) {
						throw WardenError.invalidConfig(
							`schema: ${table}.orderBy column "${column}" is not listed in ${table}.columns`,
						);
					}
				}
			}

			entries.set(table, { orderBy: new Set(def.orderBy ?? []), columns });
		}

		if (entries.size === 0) {
			throw WardenError.invalidConfig("schema: at least one table must be allow-listed");
		}
		this.entries = entries;
	}

	hasTable(table: string): boolean {
		return this.entries.has(table);
	}

	tables(): string[] {
		return [...this.entries.keys()].sort();
	}

	orderByColumns(table: string): ReadonlySet<string> {
		return this.entries.get(table)?.orderBy ?? new Set();
	}

	/** `null` when the table accepts any well-formed column. */
	columns(table: string): ReadonlySet<string> | null {
		return this.entries.get(table)?.columns ?? null;
	}
}

function assertDefinitionIdentifier(name: string, what: string): void {
	if (!IDENTIFIER_PATTERN.test(name)) {
		throw WardenError.invalidConfig(`schema: invalid ${what} "${name}"`);
	}
}
