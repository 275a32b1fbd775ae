export { encodeParameter, encodeParameters } from "./codec.js";
export {
	ConnectionManager,
	type ConnectionManagerOptions,
	type ConnectionState,
} from "./connection-manager.js";
export {
	type BulkCreateOptions,
	createDatabase,
	Database,
	type DatabaseOptions,
	DatabaseResults,
	type Operation,
	type QueryEvent,
	type ReadOptions,
	type ResultType,
} from "./database.js";
export { buildPoolConfig, createPgPool, type ManagedPool, type PoolFactory } from "./pool.js";
