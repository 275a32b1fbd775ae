// =============================================================================
// LOG REDACTION — shallow masking of sensitive keys in log data
// =============================================================================

export const REDACTED = "[REDACTED]";

const DEFAULT_REDACT_KEYS = [
	"password",
	"passwd",
	"secret",
	"token",
	"phone",
	"email",
	"connectionString",
];

/**
 * Replace values of matching keys with "[REDACTED]". Key matching is
 * case-insensitive. Returns the input untouched when nothing matches.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: ReadonlySet<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const key of Object.keys(data)) {
		if (keys.has(key.toLowerCase())) {
			if (!redacted) redacted = { ...data };
			redacted[key] = REDACTED;
		}
	}
	return redacted ?? data;
}

export function buildRedactKeys(userKeys?: readonly string[]): ReadonlySet<string> {
	return new Set((userKeys ?? DEFAULT_REDACT_KEYS).map((k) => k.toLowerCase()));
}
