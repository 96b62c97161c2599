/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { Logger } from '@salesforce/core';
import type {
	Batch,
	BatchResult,
	Executor,
	GenerationInfo,
	ObjectSchema,
	OperationIntent,
	OperationOutcome,
	OperationPlan,
	OperationReport,
	PlanIssue,
	RollbackMarker,
	RowOutcome,
	SchemaProvider,
	ScoreReport,
	SObjectRecord,
} from '../types/index.js';
import { split } from './batcher.js';
import { escapeSoqlLiteral } from './cleanupQuery.js';
import { type ConfigOverrides, type OrchestratorConfig, resolveConfig } from './config.js';
import { classifyThrown, errorMessageOf } from './errors.js';
import { ExecutionEngine } from './executionEngine.js';
import { isReadKind, mutationFor, normalizeOperationKind, RequestPlanner } from './planner.js';
import { RateLimiter } from './rateLimiter.js';
import { RecordTracker, RollbackManager } from './recordTracker.js';
import { buildReport } from './report.js';
import { type Clock, systemClock } from './retry.js';
import { ScoringEngine } from './scoringEngine.js';
import { TestDataFactoryRegistry } from './testDataFactory.js';

const BEFORE_IMAGE_CHUNK = 200;
// Stands in for parent ids during a dry run, when no parent has been created.
const PLACEHOLDER_PARENT_ID = '000000000000000AAA';

export type OrchestratorOptions = {
	executor: Executor;
	schemaProvider: SchemaProvider;
	config?: ConfigOverrides;
	tracker?: RecordTracker;
	clock?: Clock;
	random?: () => number;
};

export type RunOptions = {
	signal?: AbortSignal;
	deadline?: number; // epoch ms
};

export type PreparedOperation = {
	schema: ObjectSchema;
	plan: OperationPlan;
	preflightScore: ScoreReport;
	batches: Batch[];
};

/**
 * Runs operation intents end to end: plan, score, batch, execute, track, score
 * again, report. The RateLimiter and the trace log are shared by every
 * operation this instance runs.
 */
export class Orchestrator {
	public readonly config: OrchestratorConfig;
	public readonly tracker: RecordTracker;
	public readonly rollbackManager: RollbackManager;
	public readonly factories: TestDataFactoryRegistry;
	public readonly scoring: ScoringEngine;

	private readonly logger = Logger.childFromRoot('bulkops:orchestrator');
	private readonly planner = new RequestPlanner();
	private readonly limiter: RateLimiter;
	private readonly engine: ExecutionEngine;
	private readonly executor: Executor;
	private readonly schemaProvider: SchemaProvider;
	private readonly schemas = new Map<string, ObjectSchema>();

	public constructor(options: OrchestratorOptions) {
		this.config = resolveConfig(options.config ?? {});
		const clock = options.clock ?? systemClock;
		this.executor = options.executor;
		this.schemaProvider = options.schemaProvider;
		this.tracker = options.tracker ?? new RecordTracker(clock);
		this.limiter = new RateLimiter(
			{
				capacity: this.config.maxConcurrentRequests,
				requestsPerWindow: this.config.requestsPerWindow,
				windowMs: this.config.windowMs,
			},
			clock
		);
		this.engine = new ExecutionEngine({
			executor: this.executor,
			limiter: this.limiter,
			tracker: this.tracker,
			config: this.config,
			clock,
			random: options.random,
		});
		this.rollbackManager = new RollbackManager(this.tracker, this.executor, this.limiter);
		this.factories = new TestDataFactoryRegistry(this.config);
		this.scoring = new ScoringEngine({
			syncThreshold: this.config.syncThreshold,
			bulkBoundary: this.config.bulkBoundary,
			maxRowsPerBatch: this.config.limits.maxRowsPerBatch,
			maxRetries: this.config.retry.maxRetries,
		});
	}

	public async describe(sobject: string): Promise<ObjectSchema> {
		const cached = this.schemas.get(sobject.toLowerCase());
		if (cached) return cached;
		const schema = await this.schemaProvider.describeObject(sobject);
		this.schemas.set(sobject.toLowerCase(), schema);
		return schema;
	}

	/**
	 * Describes, generates, plans, scores and batches an intent without sending
	 * anything to the org. Throws the planner's ValidationError on a bad intent.
	 */
	public async prepare(intent: OperationIntent, { dryRun = false }: { dryRun?: boolean } = {}): Promise<PreparedOperation> {
		const schema = await this.describe(intent.sobject);
		const { records, generation } = this.recordsFor(intent, schema, dryRun);
		const plan = this.planner.plan({ ...intent, records }, schema, generation);
		const preflightScore = this.scoring.score(plan, undefined, schema);
		const batches = plan.mutation ? [...split(plan, this.config.limits, { onOversized: 'isolate' })] : [];
		return { schema, plan, preflightScore, batches };
	}

	public async run(intent: OperationIntent, options: RunOptions = {}): Promise<OperationReport> {
		const { schema, plan, preflightScore } = await this.prepare(intent);
		this.logger.debug(`${plan.kind} on ${plan.sobject}: ${plan.records.length} record(s), preflight ${preflightScore.total}`);

		const rollbackMarker = await this.rollbackManager.snapshot();

		if (isReadKind(plan.kind)) {
			return this.runRead(plan, schema, preflightScore, rollbackMarker);
		}

		const warnings: PlanIssue[] = [];
		const beforeImages = await this.captureBeforeImages(plan, warnings);
		const batches = await this.runBatches(plan, { ...options, beforeImages });

		const cleanupPredicate =
			this.config.cleanupPredicate === 'trackedIds'
				? this.tracker.generateCleanupQuery({ strategy: 'trackedIds', sobject: plan.sobject, since: rollbackMarker })[0]
				: undefined;

		const outcome: OperationOutcome = {
			batches,
			traces: this.tracker.since(rollbackMarker),
			cleanupPredicates: cleanupPredicate ? [cleanupPredicate] : [],
			rollbackMarker,
		};
		const scoreReport = this.scoring.score(plan, outcome, schema);

		return buildReport({
			plan,
			batches,
			preflightScore,
			scoreReport,
			rollbackMarker,
			cleanupPredicate,
			warnings,
			sampleSize: this.config.sampleSize,
		});
	}

	/** Runs intents in order; later steps can reference records created by earlier ones. */
	public async runAll(intents: readonly OperationIntent[], options: RunOptions = {}): Promise<OperationReport[]> {
		const reports: OperationReport[] = [];
		for (const intent of intents) {
			// eslint-disable-next-line no-await-in-loop
			reports.push(await this.run(intent, options));
		}
		return reports;
	}

	private recordsFor(
		intent: OperationIntent,
		schema: ObjectSchema,
		dryRun: boolean
	): { records?: SObjectRecord[]; generation?: GenerationInfo } {
		const kind = normalizeOperationKind(intent.operation);
		const mutation = mutationFor(kind);
		const references = (sobject: string): readonly string[] => (dryRun ? [PLACEHOLDER_PARENT_ID] : this.tracker.idsFor(sobject));
		if (intent.records?.length) {
			return { records: this.factories.resolveTemplates(schema, intent.records, { references }) };
		}
		const wantsGeneration = intent.factory !== undefined || intent.count !== undefined || intent.purpose === 'bulk-test';
		if (!wantsGeneration || (mutation !== 'Insert' && mutation !== 'Upsert')) {
			return { records: intent.records };
		}

		const { records, generation } = this.factories.generate(
			{
				schema,
				fields: intent.factory?.fields,
				edgeCases: intent.factory?.edgeCases,
				seed: intent.factory?.seed,
				purpose: intent.purpose,
				label: intent.label,
			},
			intent.count,
			{ references }
		);
		return { records, generation };
	}

	private async runRead(
		plan: OperationPlan,
		schema: ObjectSchema,
		preflightScore: ScoreReport,
		rollbackMarker: RollbackMarker
	): Promise<OperationReport> {
		let recordsRead = 0;
		const sampleRecordIds: string[] = [];
		for await (const record of this.executor.runQuery(plan.query ?? '')) {
			recordsRead++;
			if (sampleRecordIds.length < this.config.sampleSize && typeof record.Id === 'string') {
				sampleRecordIds.push(record.Id);
			}
		}
		this.logger.debug(`${plan.kind} on ${plan.sobject} read ${recordsRead} record(s)`);

		const outcome: OperationOutcome = { batches: [], traces: [], cleanupPredicates: [], rollbackMarker };
		return buildReport({
			plan,
			batches: [],
			preflightScore,
			scoreReport: this.scoring.score(plan, outcome, schema),
			rollbackMarker,
			sampleSize: this.config.sampleSize,
			recordsRead,
			sampleRecordIds,
		});
	}

	/**
	 * Reads the current values of every field an update is about to change,
	 * so rollback can restore them. Keys are record ids and, for upserts, the
	 * external id values.
	 */
	private async captureBeforeImages(plan: OperationPlan, warnings: PlanIssue[]): Promise<Map<string, SObjectRecord>> {
		const images = new Map<string, SObjectRecord>();
		if (!this.config.captureBeforeImage || (plan.mutation !== 'Update' && plan.mutation !== 'Upsert')) return images;

		const keyField = plan.mutation === 'Upsert' ? plan.externalIdField ?? 'Id' : 'Id';
		const fields = new Set<string>();
		for (const record of plan.records) {
			for (const name of Object.keys(record)) {
				if (name !== 'Id' && name !== keyField) fields.add(name);
			}
		}
		if (fields.size === 0) return images;

		const keys = [
			...new Set(
				plan.records.flatMap((record) => {
					const value = record[keyField];
					return value === undefined || value === null || value === '' ? [] : [String(value)];
				})
			),
		];
		const select = ['Id', ...(keyField === 'Id' ? [] : [keyField]), ...fields].join(', ');

		try {
			for (let start = 0; start < keys.length; start += BEFORE_IMAGE_CHUNK) {
				const chunk = keys.slice(start, start + BEFORE_IMAGE_CHUNK).map((key) => `'${escapeSoqlLiteral(key)}'`);
				const soql = `SELECT ${select} FROM ${plan.sobject} WHERE ${keyField} IN (${chunk.join(', ')})`;
				// eslint-disable-next-line no-await-in-loop
				for await (const row of this.executor.runQuery(soql)) {
					const image: SObjectRecord = {};
					for (const name of fields) image[name] = row[name] ?? null;
					if (typeof row.Id === 'string') images.set(row.Id, image);
					const key = row[keyField];
					if (keyField !== 'Id' && key !== undefined && key !== null) images.set(String(key), image);
				}
			}
		} catch (error) {
			this.logger.warn(`before-image capture failed: ${errorMessageOf(error)}`);
			warnings.push({
				code: 'BeforeImageUnavailable',
				message: `Could not read current values for rollback: ${errorMessageOf(error)}`,
			});
		}
		return images;
	}

	/**
	 * Pulls batches lazily from the batcher and keeps up to maxConcurrentBatches
	 * in flight. A batch that throws turns into failed rows; its siblings go on.
	 */
	private async runBatches(
		plan: OperationPlan,
		options: RunOptions & { beforeImages: Map<string, SObjectRecord> }
	): Promise<BatchResult[]> {
		const iterator = split(plan, this.config.limits, { onOversized: 'isolate' })[Symbol.iterator]();
		const results: BatchResult[] = [];

		const worker = async (): Promise<void> => {
			for (let next = iterator.next(); !next.done; next = iterator.next()) {
				const batch = next.value;
				try {
					// eslint-disable-next-line no-await-in-loop
					results.push(await this.engine.execute(batch, plan, options));
				} catch (error) {
					this.logger.warn(`batch ${batch.index} failed as a whole: ${errorMessageOf(error)}`);
					results.push(this.failedBatch(batch, plan, error));
				}
			}
		};

		await Promise.all(Array.from({ length: this.config.maxConcurrentBatches }, () => worker()));
		return results.sort((a, b) => a.batchIndex - b.batchIndex);
	}

	private failedBatch(batch: Batch, plan: OperationPlan, error: unknown): BatchResult {
		const errorCode = classifyThrown(error);
		const outcomes: RowOutcome[] = batch.records.map((record, local) => ({
			index: batch.offset + local,
			recordId: typeof record.Id === 'string' ? record.Id : undefined,
			success: false,
			errorCode: errorCode === 'Unknown' ? 'JobFailed' : errorCode,
			errorMessage: errorMessageOf(error),
			attempts: 0,
		}));
		return {
			batchIndex: batch.index,
			offset: batch.offset,
			mode: this.engine.selectMode(plan, batch),
			outcomes,
			successCount: 0,
			failureCount: outcomes.length,
			retries: 0,
			partialFailure: false,
			jobs: [],
		};
	}
}
