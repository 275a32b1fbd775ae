// Query construction
export * from "./db/index.js";

// Errors
export {
	BASE_ERROR_CODES,
	type BaseErrorCode,
	classifyDriverError,
	type DriverErrorDetails,
	isWardenError,
	type RawErrorCode,
	toWardenError,
	WardenError,
	type WardenErrorCode,
} from "./error/index.js";

// Results
export { err, ok, type Result, settle } from "./result.js";

// Configuration
export {
	DEFAULT_POOL_OPTIONS,
	type Env,
	loadConfigFromEnv,
	resolvePoolOptions,
	validateConfig,
} from "./config/index.js";

// Logging
export { createLogger, scopeLogger, silentLogger } from "./logger/index.js";

// Type definitions
export * from "./types/index.js";
