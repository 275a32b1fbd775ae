// =============================================================================
// FAKE POOL — in-process stand-in for pg.Pool
// =============================================================================
// Records every statement, answers through a scripted handler and counts
// client checkouts, so tests can assert on SQL without a server.

import type { PoolClientLike, PoolLike, QueryResultLike, Row } from "@pgwarden/core/db";

export interface RecordedQuery {
	text: string;
	values: unknown[];
	/** `null` for statements sent through `pool.query`. */
	clientId: number | null;
}

export interface FakeResponse {
	rows?: Row[];
	rowCount?: number | null;
}

/** Return a response, or throw to simulate a driver failure. */
export type QueryHandler = (query: RecordedQuery) => FakeResponse | undefined;

export interface FakePoolOptions {
	handler?: QueryHandler;
}

export interface FakePool extends PoolLike {
	onConnect(listener: (client: PoolClientLike) => void): void;
	onError(listener: (error: Error) => void): void;

	/** Every statement in send order. */
	readonly queries: readonly RecordedQuery[];
	/** Statement texts in send order. */
	texts(): string[];
	/** Replace the scripted handler. */
	respond(handler: QueryHandler): void;
	/** Make the next `times` statements matching `pattern` throw `error`. */
	failOn(pattern: string | RegExp, error: Error, times?: number): void;
	/** Fire the pool's `error` event as an idle client failure would. */
	emitError(error: Error): void;

	readonly connects: number;
	readonly releases: number;
	/** Clients released with an error and thrown away. */
	readonly destroyed: number;
	readonly ended: boolean;
	/** The config the pool was created with, when built through `factory`. */
	readonly config: unknown;
}

const defaultHandler: QueryHandler = (query) => {
	if (/^SELECT 1\b/.test(query.text)) return { rows: [{ ok: 1 }], rowCount: 1 };
	return undefined;
};

interface Failure {
	pattern: string | RegExp;
	error: Error;
	remaining: number;
}

export interface ScriptedPool extends FakePool {
	/** Pool factory for `ConnectionManager`: records the config and returns this pool. */
	factory: (config: unknown) => FakePool;
}

export function createFakePool(options: FakePoolOptions = {}): ScriptedPool {
	const queries: RecordedQuery[] = [];
	const failures: Failure[] = [];
	const connectListeners: ((client: PoolClientLike) => void)[] = [];
	const errorListeners: ((error: Error) => void)[] = [];
	const idle: PoolClientLike[] = [];
	let handler = options.handler ?? defaultHandler;
	let nextClientId = 1;
	let live = 0;
	let connects = 0;
	let releases = 0;
	let destroyed = 0;
	let ended = false;
	let config: unknown;

	const execute = async (
		text: string,
		values: unknown[] | undefined,
		clientId: number | null,
	): Promise<QueryResultLike> => {
		const query: RecordedQuery = { text, values: values ?? [], clientId };
		queries.push(query);

		const failure = failures.find((f) => f.remaining > 0 && matches(f.pattern, text));
		if (failure) {
			failure.remaining--;
			throw failure.error;
		}

		const response = handler(query) ?? defaultHandler(query) ?? {};
		const rows = response.rows ?? [];
		return { rows, rowCount: response.rowCount === undefined ? rows.length : response.rowCount };
	};

	const newClient = (): PoolClientLike => {
		const id = nextClientId++;
		live++;
		const client: PoolClientLike = {
			query: (text, values) => execute(text, values, id),
			release: (error) => {
				releases++;
				if (error) {
					destroyed++;
					live--;
					return;
				}
				idle.push(client);
			},
		};
		for (const listener of connectListeners) listener(client);
		return client;
	};

	const pool: ScriptedPool = {
		get queries() {
			return queries;
		},
		get totalCount() {
			return live;
		},
		get idleCount() {
			return idle.length;
		},
		get waitingCount() {
			return 0;
		},
		get connects() {
			return connects;
		},
		get releases() {
			return releases;
		},
		get destroyed() {
			return destroyed;
		},
		get ended() {
			return ended;
		},
		get config() {
			return config;
		},

		query: (text, values) => execute(text, values, null),

		connect: async () => {
			if (ended) throw new Error("Cannot use a pool after calling end on the pool");
			connects++;
			return idle.pop() ?? newClient();
		},

		end: async () => {
			ended = true;
		},

		onConnect: (listener) => {
			connectListeners.push(listener);
		},
		onError: (listener) => {
			errorListeners.push(listener);
		},

		texts: () => queries.map((q) => q.text),
		respond: (next) => {
			handler = next;
		},
		failOn: (pattern, error, times = 1) => {
			failures.push({ pattern, error, remaining: times });
		},
		emitError: (error) => {
			for (const listener of errorListeners) listener(error);
		},

		factory: (poolConfig) => {
			config = poolConfig;
			return pool;
		},
	};

	return pool;
}

function matches(pattern: string | RegExp, text: string): boolean {
	return typeof pattern === "string" ? text.startsWith(pattern) : pattern.test(text);
}
