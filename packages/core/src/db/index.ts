export {
	assertInSize,
	assertOrSize,
	type Condition,
	type ConditionLimits,
	type ConditionNode,
	type ConditionSet,
	isPlainObject,
	normalizeCondition,
	OR_KEY,
	type OrGroup,
	parseConditionSet,
	toConditionNodes,
	where,
} from "./conditions.js";
export {
	assertColumnsAllowed,
	IDENTIFIER_PATTERN,
	type OrderByInput,
	type SortDirection,
	validateIdentifier,
	validateLimit,
	validateOffset,
	validateOrderBy,
	validateTable,
} from "./identifiers.js";
export {
	DEFAULT_LIMITS,
	LIMIT_KEYS,
	type Limits,
	type LimitsOptions,
	MAX_BIND_PARAMETERS,
	resolveLimits,
} from "./limits.js";
export {
	type CompareOperator,
	isOperatorToken,
	type ListOperator,
	type Operator,
	OPERATORS,
	type RangeOperator,
	validateOperator,
} from "./operators.js";
export {
	getPoolStats,
	type PoolClientLike,
	type PoolLike,
	type PoolStats,
	type QueryableLike,
	type QueryResultLike,
	type Row,
} from "./pool.js";
export {
	type BulkInsertOptions,
	type BulkInsertStatement,
	buildBulkInsert,
	buildCount,
	buildDelete,
	buildInsert,
	buildSelect,
	buildUpdate,
	createQueryContext,
	DEFAULT_CHUNK_SIZE,
	effectiveChunkSize,
	type QueryContext,
	type ReturningOptions,
	type SelectOptions,
	type SqlStatement,
	type WhereInput,
} from "./query-builder.js";
export { DEFAULT_SCHEMA, type SchemaDefinition, TableAllowList, type TableDefinition } from "./schema.js";
export {
	buildWhereClause,
	ParameterBuilder,
	renderWhere,
	type WhereClause,
	type WhereOptions,
} from "./where-builder.js";
