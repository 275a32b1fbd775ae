export {
	createFakePool,
	type FakePool,
	type FakePoolOptions,
	type FakeResponse,
	type QueryHandler,
	type RecordedQuery,
	type ScriptedPool,
} from "./fake-pool.js";
export { type CapturingLogger, createCapturingLogger, type LogEntry } from "./logger.js";
