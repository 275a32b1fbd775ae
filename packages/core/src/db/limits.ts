// =============================================================================
// RESOURCE LIMITS — bounds on filter size and pagination
// =============================================================================

import { WardenError } from "../error/index.js";

export interface Limits {
	/** Values accepted in one IN / NOT IN list. */
	maxInValues: number;
	/** Branches accepted in one `$or` group. */
	maxOrBranches: number;
	/** How deeply `$or` groups may nest inside each other. */
	maxOrDepth: number;
	/** Largest LIMIT a SELECT may request. */
	maxLimit: number;
	/** Largest OFFSET a SELECT may request. */
	maxOffset: number;
	/** Columns one SELECT may list. */
	maxFields: number;
}

export type LimitsOptions = Partial<Limits>;

export const DEFAULT_LIMITS: Readonly<Limits> = Object.freeze({
	maxInValues: 1000,
	maxOrBranches: 100,
	maxOrDepth: 8,
	maxLimit: 10_000,
	maxOffset: 1_000_000,
	maxFields: 50,
});

/** PostgreSQL's wire protocol carries at most 65535 bind parameters per statement. */
export const MAX_BIND_PARAMETERS = 65_535;

export const LIMIT_KEYS = [
	"maxInValues",
	"maxOrBranches",
	"maxOrDepth",
	"maxLimit",
	"maxOffset",
	"maxFields",
] as const satisfies readonly (keyof Limits)[];

/** Merge overrides onto the defaults; every override must be a positive integer. */
export function resolveLimits(options: LimitsOptions = {}): Limits {
	const resolved: Limits = { ...DEFAULT_LIMITS };
	for (const key of LIMIT_KEYS) {
		const value = options[key];
		if (value === undefined) continue;
		if (!Number.isSafeInteger(value) || value < 1) {
			throw WardenError.invalidConfig(`limits.${key} must be a positive integer, got ${value}`);
		}
		resolved[key] = value;
	}
	return resolved;
}
