/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { Logger } from '@salesforce/core';
import type {
	Batch,
	BatchJobSummary,
	BatchResult,
	ErrorCode,
	ExecutionMode,
	Executor,
	ExecutorRowResult,
	JobHandle,
	MutationKind,
	MutationRequest,
	OperationPlan,
	RowOutcome,
	SObjectRecord,
	TraceEffect,
} from '../types/index.js';
import type { OrchestratorConfig } from './config.js';
import {
	classifyErrorCode,
	classifyThrown,
	errorMessageOf,
	errorMessages,
	isRetryable,
	OperationCancelledError,
	PartialFailureError,
	RetryExhaustedError,
	TimedOutError,
	ValidationError,
} from './errors.js';
import { BulkJob, JobPoller } from './jobPoller.js';
import type { RateLimiter } from './rateLimiter.js';
import type { RecordTracker } from './recordTracker.js';
import { BatchRetryBudget, backoffDelay, type Clock, systemClock, waitFor } from './retry.js';

export type ExecutionEngineOptions = {
	executor: Executor;
	limiter: RateLimiter;
	tracker: RecordTracker;
	config: Pick<OrchestratorConfig, 'syncThreshold' | 'rowConcurrency' | 'retry' | 'poll'>;
	poller?: JobPoller;
	clock?: Clock;
	random?: () => number;
};

export type ExecuteOptions = {
	signal?: AbortSignal;
	deadline?: number; // epoch ms
	/** Field values before an update, keyed by record Id or, for upserts, external id value. */
	beforeImages?: ReadonlyMap<string, SObjectRecord>;
};

type RowContext = {
	plan: OperationPlan;
	batch: Batch;
	request: MutationRequest;
	budget: BatchRetryBudget;
	options: ExecuteOptions;
};

/** What a successful row did to the org. An upsert reports whether it created the row. */
export function traceEffectOf(kind: MutationKind, created?: boolean): TraceEffect {
	switch (kind) {
		case 'Insert':
		case 'Undelete':
			return 'created';
		case 'Delete':
			return 'deleted';
		case 'Update':
			return 'updated';
		case 'Upsert':
			return created ? 'created' : 'updated';
	}
}

// Why a wait ended a row or job early.
type Interruption = { code: ErrorCode; message: string };

function interruptionOf(error: unknown): Interruption | undefined {
	if (error instanceof TimedOutError) return { code: 'TimedOut', message: error.message };
	if (error instanceof OperationCancelledError) return { code: 'Cancelled', message: error.message };
	return undefined;
}

/**
 * Runs batches against the Executor, one call per row for small batches and one
 * bulk job for large ones. Row failures stay on their row: a batch always
 * resolves with an outcome for every record it was given.
 */
export class ExecutionEngine {
	private readonly logger = Logger.childFromRoot('bulkops:engine');
	private readonly executor: Executor;
	private readonly limiter: RateLimiter;
	private readonly tracker: RecordTracker;
	private readonly poller: JobPoller;
	private readonly clock: Clock;
	private readonly random: () => number;

	public constructor(private readonly options: ExecutionEngineOptions) {
		this.executor = options.executor;
		this.limiter = options.limiter;
		this.tracker = options.tracker;
		this.clock = options.clock ?? systemClock;
		this.poller = options.poller ?? new JobPoller(options.executor, options.limiter, this.clock);
		this.random = options.random ?? Math.random;
	}

	public selectMode(plan: OperationPlan, batch: Batch): ExecutionMode {
		if (plan.mode !== 'auto') return plan.mode;
		return batch.records.length < this.options.config.syncThreshold ? 'sync' : 'async';
	}

	public async execute(batch: Batch, plan: OperationPlan, options: ExecuteOptions = {}): Promise<BatchResult> {
		if (!plan.mutation) {
			throw new ValidationError(errorMessages.getMessage('error.NotAMutation', [plan.kind]));
		}
		const mode = this.selectMode(plan, batch);
		const context: RowContext = {
			plan,
			batch,
			request: { kind: plan.mutation, sobject: plan.sobject, externalIdField: plan.externalIdField },
			budget: new BatchRetryBudget(this.options.config.retry.maxRetries),
			options,
		};

		this.logger.debug(`batch ${batch.index}: ${batch.records.length} ${plan.mutation} row(s) on ${plan.sobject}, ${mode}`);

		let outcomes: RowOutcome[];
		let jobs: BatchJobSummary[] = [];
		if (batch.rejection) {
			const { message } = batch.rejection;
			outcomes = batch.records.map((_, i) => this.failure(context, i, 'LimitConfiguration', message, 0));
		} else if (mode === 'sync') {
			outcomes = await this.runSync(context);
		} else {
			({ outcomes, jobs } = await this.runAsync(context));
		}

		const successCount = outcomes.filter((outcome) => outcome.success).length;
		const failureCount = outcomes.length - successCount;
		const partialFailure = successCount > 0 && failureCount > 0;
		const result: BatchResult = {
			batchIndex: batch.index,
			offset: batch.offset,
			mode,
			outcomes,
			successCount,
			failureCount,
			retries: context.budget.totalRetries,
			partialFailure,
			partialFailureError: partialFailure
				? new PartialFailureError(
						batch.index,
						outcomes.filter((outcome) => !outcome.success),
						outcomes.length
				  )
				: undefined,
			jobs,
		};

		this.logger.debug(
			`batch ${batch.index}: ${successCount} succeeded, ${failureCount} failed, ${result.retries} retr${result.retries === 1 ? 'y' : 'ies'}`
		);
		return result;
	}

	// Rows run on a small worker pool; outcomes land at their own index whatever the completion order.
	private async runSync(context: RowContext): Promise<RowOutcome[]> {
		const { records } = context.batch;
		const outcomes = new Array<RowOutcome>(records.length);
		let next = 0;

		const worker = async (): Promise<void> => {
			while (next < records.length) {
				const local = next++;
				// eslint-disable-next-line no-await-in-loop
				outcomes[local] = await this.runRow(context, local);
			}
		};

		const width = Math.max(1, Math.min(this.options.config.rowConcurrency, records.length));
		await Promise.all(Array.from({ length: width }, () => worker()));
		return outcomes;
	}

	private async runRow(context: RowContext, local: number): Promise<RowOutcome> {
		const record = context.batch.records[local];
		const { signal, deadline } = context.options;
		let attempts = 0;

		for (;;) {
			if (signal?.aborted) return this.failure(context, local, 'Cancelled', 'Cancelled before the call was made', attempts);
			if (deadline !== undefined && this.clock.now() >= deadline) {
				return this.failure(context, local, 'TimedOut', 'Deadline passed before the call was made', attempts);
			}

			attempts++;
			let code: ErrorCode;
			let message: string | undefined;
			try {
				// eslint-disable-next-line no-await-in-loop
				const result = await this.limiter.run(() => this.executor.runSingle(context.request, record), signal);
				if (result.success) return this.success(context, local, result, attempts);
				code = classifyErrorCode(result.errorCode);
				message = result.errorMessage;
			} catch (error) {
				code = classifyThrown(error);
				message = errorMessageOf(error);
			}

			if (code === 'Cancelled' || !isRetryable(code)) return this.failure(context, local, code, message, attempts);
			if (!context.budget.tryConsume(local)) {
				return this.failure(context, local, 'RetryExhausted', new RetryExhaustedError(attempts, code).message, attempts);
			}

			const delay = backoffDelay(attempts - 1, this.options.config.retry, this.random);
			this.logger.debug(`row ${context.batch.offset + local} hit ${code}, retrying in ${delay}ms`);
			try {
				// eslint-disable-next-line no-await-in-loop
				await waitFor(delay, { clock: this.clock, deadline, signal, what: 'Retry backoff' });
			} catch (error) {
				const interruption = interruptionOf(error);
				if (!interruption) throw error;
				return this.failure(context, local, interruption.code, interruption.message, attempts);
			}
		}
	}

	/**
	 * Submits the batch as one job. Rows that come back with a retryable error
	 * go out again as a smaller follow-up job, drawing on the same batch budget.
	 */
	private async runAsync(context: RowContext): Promise<{ outcomes: RowOutcome[]; jobs: BatchJobSummary[] }> {
		const { records } = context.batch;
		const { signal, deadline } = context.options;
		const outcomes = new Array<RowOutcome>(records.length);
		const attempts = new Array<number>(records.length).fill(0);
		const jobs: BatchJobSummary[] = [];
		let pending = records.map((_, i) => i);

		const failAll = (rows: number[], code: ErrorCode, message?: string): void => {
			for (const local of rows) outcomes[local] = this.failure(context, local, code, message, attempts[local]);
		};

		// Returns the rows to send again, failing the ones that are out of budget.
		const takeRetries = (rows: Array<{ local: number; code: ErrorCode; message?: string }>): number[] => {
			const again: number[] = [];
			for (const { local, code, message } of rows) {
				if (!isRetryable(code)) {
					outcomes[local] = this.failure(context, local, code, message, attempts[local]);
				} else if (context.budget.tryConsume(local)) {
					again.push(local);
				} else {
					const exhausted = new RetryExhaustedError(attempts[local], code).message;
					outcomes[local] = this.failure(context, local, 'RetryExhausted', exhausted, attempts[local]);
				}
			}
			return again;
		};

		const backOff = async (rows: number[]): Promise<boolean> => {
			const delay = backoffDelay(Math.max(0, context.budget.retriesFor(rows[0]) - 1), this.options.config.retry, this.random);
			this.logger.debug(`batch ${context.batch.index}: resubmitting ${rows.length} row(s) in ${delay}ms`);
			try {
				await waitFor(delay, { clock: this.clock, deadline, signal, what: 'Retry backoff' });
				return true;
			} catch (error) {
				const interruption = interruptionOf(error);
				if (!interruption) throw error;
				failAll(rows, interruption.code, interruption.message);
				return false;
			}
		};

		while (pending.length > 0) {
			if (signal?.aborted) {
				failAll(pending, 'Cancelled', 'Cancelled before the job was submitted');
				break;
			}
			const rows = pending;
			for (const local of rows) attempts[local]++;

			let handle: JobHandle;
			try {
				const slice = rows.map((local) => records[local]);
				// eslint-disable-next-line no-await-in-loop
				handle = await this.limiter.run(() => this.executor.submitJob(context.request, slice), signal);
			} catch (error) {
				const code = classifyThrown(error);
				const again = takeRetries(rows.map((local) => ({ local, code, message: errorMessageOf(error) })));
				// eslint-disable-next-line no-await-in-loop
				pending = again.length > 0 && (await backOff(again)) ? again : [];
				continue;
			}

			const job = new BulkJob(handle, rows.length);
			job.transition('submit_ack');
			// eslint-disable-next-line no-await-in-loop
			const polled = await this.poller.poll(job, { ...this.options.config.poll, signal, deadline });
			jobs.push({ handle, state: polled.state, backendState: polled.backendState, timedOut: polled.timedOut });

			if (!polled.results) {
				let code: ErrorCode = 'JobFailed';
				if (polled.timedOut) code = 'TimedOut';
				else if (polled.cancelled) code = 'Cancelled';
				failAll(rows, code, polled.errorMessage ?? `Job ${handle.id} ended ${polled.state} without results`);
				break;
			}

			const failed: Array<{ local: number; code: ErrorCode; message?: string }> = [];
			for (const [position, local] of rows.entries()) {
				const result: ExecutorRowResult | undefined = polled.results[position];
				if (!result) {
					outcomes[local] = this.failure(context, local, 'JobFailed', `Job ${handle.id} returned no result for this row`, attempts[local]);
				} else if (result.success) {
					outcomes[local] = this.success(context, local, result, attempts[local]);
				} else {
					failed.push({ local, code: classifyErrorCode(result.errorCode), message: result.errorMessage });
				}
			}

			// a cancelled job that still completed is not resubmitted
			const again = polled.cancelled ? [] : takeRetries(failed);
			if (polled.cancelled) {
				for (const { local, code, message } of failed) {
					outcomes[local] = this.failure(context, local, code, message, attempts[local]);
				}
			}
			// eslint-disable-next-line no-await-in-loop
			pending = again.length > 0 && (await backOff(again)) ? again : [];
		}

		return { outcomes, jobs };
	}

	private success(context: RowContext, local: number, result: ExecutorRowResult, attempts: number): RowOutcome {
		const record = context.batch.records[local];
		const recordId = result.recordId ?? (typeof record.Id === 'string' ? record.Id : undefined);
		const index = context.batch.offset + local;

		if (recordId) {
			const effect = traceEffectOf(context.request.kind, result.created);
			this.tracker.record({
				sobject: context.plan.sobject,
				operationKind: context.plan.kind,
				effect,
				recordId,
				before: effect === 'updated' ? this.beforeImageOf(context, record, recordId) : undefined,
			});
		} else {
			this.logger.warn(`row ${index} succeeded without a record id and is not tracked`);
		}

		return { index, recordId, success: true, created: result.created, attempts };
	}

	private failure(
		context: RowContext,
		local: number,
		errorCode: ErrorCode,
		errorMessage: string | undefined,
		attempts: number
	): RowOutcome {
		const record = context.batch.records[local];
		return {
			index: context.batch.offset + local,
			recordId: typeof record.Id === 'string' ? record.Id : undefined,
			success: false,
			errorCode,
			errorMessage,
			attempts,
		};
	}

	private beforeImageOf(context: RowContext, record: SObjectRecord, recordId: string): SObjectRecord | undefined {
		const images = context.options.beforeImages;
		if (!images) return undefined;
		const externalIdField = context.request.externalIdField;
		const key = externalIdField && externalIdField !== 'Id' ? record[externalIdField] : undefined;
		return images.get(recordId) ?? (key === undefined || key === null ? undefined : images.get(String(key)));
	}
}
