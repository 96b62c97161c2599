/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
export type * from './types/index.js';
export { split, estimateRecordBytes, type SplitOptions } from './utils/batcher.js';
export {
	createdWindowPredicate,
	escapeSoqlLiteral,
	idPredicate,
	namePatternPredicate,
	type CleanupPattern,
} from './utils/cleanupQuery.js';
export {
	DEFAULT_CONFIG,
	resolveConfig,
	type ConfigOverrides,
	type OrchestratorConfig,
	type PollSettings,
	type RetrySettings,
} from './utils/config.js';
export { ConnectionExecutor, ConnectionSchemaProvider, toObjectSchema, toRowResult } from './utils/connectionExecutor.js';
export * from './utils/errors.js';
export { ExecutionEngine, traceEffectOf, type ExecuteOptions, type ExecutionEngineOptions } from './utils/executionEngine.js';
export { BulkJob, JobPoller, TERMINAL_STATES, type JobEvent, type PollOptions, type PollResult } from './utils/jobPoller.js';
export {
	Orchestrator,
	type OrchestratorOptions,
	type PreparedOperation,
	type RunOptions,
} from './utils/orchestrator.js';
export { dependencyEdges, factoryFieldsFor, orderIntents, type DependencyEdge, type OrderedPlan } from './utils/planOrder.js';
export { normalizeOperationKind, RequestPlanner, resolveRecordCount } from './utils/planner.js';
export { RateLimiter, type Lease, type RateLimiterOptions } from './utils/rateLimiter.js';
export {
	createRollbackMarker,
	parseRollbackMarker,
	RecordTracker,
	RollbackManager,
	type RollbackSummary,
	type TraceInput,
} from './utils/recordTracker.js';
export { buildReport, countOutcomes, serializeReports } from './utils/report.js';
export { systemClock, type Clock } from './utils/retry.js';
export { ScoringEngine, ratingFor } from './utils/scoringEngine.js';
export { DEFAULT_RUBRIC, MAX_TOTAL, type RubricRule, type ScoringSettings } from './utils/scoringRubric.js';
export {
	TestDataFactoryRegistry,
	type FactorySpec,
	type FieldRule,
	type GeneratedRecords,
	type RelationshipBinding,
} from './utils/testDataFactory.js';
