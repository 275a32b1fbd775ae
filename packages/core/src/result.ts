// =============================================================================
// RESULT — error-as-value view over the data access operations
// =============================================================================

import { toWardenError, type WardenError } from "./error/index.js";

export type Result<T, E = WardenError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/**
 * Run `fn` and capture its outcome. Anything thrown is normalized with
 * `toWardenError`, so `error.code` is always one of the registry codes.
 */
export async function settle<T>(fn: () => Promise<T>): Promise<Result<T>> {
	try {
		return ok(await fn());
	} catch (error) {
		return err(toWardenError(error));
	}
}
