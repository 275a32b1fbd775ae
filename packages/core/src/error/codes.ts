// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes with HTTP status and default messages. The façade
// decides whether to rethrow or swallow a failure from its code alone.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether the failure depends on database state rather than on the input.
	 *
	 * - `true`: the same call may succeed later (network, lock timeout, constraint).
	 * - `false`: the input itself is rejected; retrying always fails.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Rejected input. Always rethrown.
	SECURITY_VIOLATION: { message: "Security violation", status: 403, transient: false },
	VALIDATION_ERROR: { message: "Invalid input", status: 400, transient: false },
	INVALID_CONFIG: { message: "Invalid configuration", status: 500, transient: false },

	// Lifecycle
	NOT_INITIALIZED: {
		message: "Database pool not initialized. Call createPool() first.",
		status: 503,
		transient: false,
	},

	// Driver-side failures; the façade reports these as null.
	TRANSIENT_FAILURE: { message: "Database operation failed", status: 503, transient: true },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
