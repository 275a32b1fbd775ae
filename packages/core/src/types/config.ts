import type { LimitsOptions } from "../db/limits.js";
import type { SchemaDefinition } from "../db/schema.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "pretty" | "json";

export interface WardenLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

export interface ConnectionOptions {
	/** Full connection URL. Takes precedence over the discrete fields below. */
	connectionString?: string;
	host?: string;
	port?: number;
	database?: string;
	user?: string;
	password?: string;
}

export interface PoolOptions {
	/** Minimum idle clients kept open. Default: 10 */
	min?: number;
	/** Maximum clients. Default: 50 */
	max?: number;
	/** Statements served by one connection before it is recycled. Default: 50_000 */
	maxUses?: number;
	/** Close clients idle for longer than this. Default: 300_000 (5 min) */
	idleTimeoutMillis?: number;
	/** Fail acquisition when no client frees up within this window. Default: 10_000 */
	connectionTimeoutMillis?: number;
	/** Server-side statement_timeout per session. Default: 10_000 */
	statementTimeoutMs?: number;
	/** Server-side idle_in_transaction_session_timeout. Default: 60_000 */
	idleInTransactionTimeoutMs?: number;
	/** Reported in pg_stat_activity. Default: "pgwarden" */
	applicationName?: string;
	/** Session timezone set on every new connection. Default: "UTC" */
	timezone?: string;
}

export interface LoggingOptions {
	/** Default: "info" */
	level?: LogLevel;
	/** Default: "pretty" */
	format?: LogFormat;
}

export interface WardenConfig {
	connection: ConnectionOptions;
	pool?: PoolOptions;
	logging?: LoggingOptions;
	/** Allow-listed tables. Default: DEFAULT_SCHEMA */
	schema?: SchemaDefinition;
	/** Resource bounds for filters and pagination. */
	limits?: LimitsOptions;
}

export type ResolvedPoolOptions = Required<PoolOptions>;
