// =============================================================================
// PARAMETER CODEC
// =============================================================================
// pg sends flat arrays as PostgreSQL arrays and calls JSON.stringify on any
// other object. Objects and nested arrays are serialized here instead, with
// sorted keys, so the same document always binds as the same text.

import { isPlainObject } from "@pgwarden/core/db";
import stringify from "safe-stable-stringify";

function isStructured(value: unknown): boolean {
	if (isPlainObject(value)) return true;
	return Array.isArray(value) && value.some((item) => Array.isArray(item) || isPlainObject(item));
}

export function encodeParameter(value: unknown): unknown {
	if (!isStructured(value)) return value;
	return stringify(value) ?? null;
}

export function encodeParameters(values: readonly unknown[]): unknown[] {
	return values.map(encodeParameter);
}
