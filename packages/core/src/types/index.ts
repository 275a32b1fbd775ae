export type {
	ConnectionOptions,
	LogFormat,
	LoggingOptions,
	LogLevel,
	PoolOptions,
	ResolvedPoolOptions,
	WardenConfig,
	WardenLogger,
} from "./config.js";
