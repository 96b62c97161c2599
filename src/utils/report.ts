/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type {
	BatchResult,
	CleanupPredicate,
	FailureDetail,
	OperationCounts,
	OperationPlan,
	OperationReport,
	PendingJob,
	PlanIssue,
	RollbackMarker,
	ScoreReport,
} from '../types/index.js';
import { traceEffectOf } from './executionEngine.js';
import { TERMINAL_STATES } from './jobPoller.js';

export type ReportInput = {
	plan: OperationPlan;
	batches: readonly BatchResult[];
	preflightScore: ScoreReport;
	scoreReport: ScoreReport;
	rollbackMarker: RollbackMarker;
	cleanupPredicate?: CleanupPredicate;
	warnings?: readonly PlanIssue[];
	sampleSize: number;
	recordsRead?: number;
	sampleRecordIds?: string[];
};

/**
 * Counts come from row outcomes, not from traces, so every input record lands
 * in exactly one bucket even when a success came back without an id.
 */
export function countOutcomes(plan: OperationPlan, batches: readonly BatchResult[]): OperationCounts {
	const counts: OperationCounts = { created: 0, updated: 0, deleted: 0, failed: 0 };
	for (const row of batches.flatMap((batch) => batch.outcomes)) {
		if (!row.success || !plan.mutation) {
			counts.failed++;
			continue;
		}
		counts[traceEffectOf(plan.mutation, row.created)]++;
	}
	return counts;
}

export function buildReport(input: ReportInput): OperationReport {
	const { plan, batches } = input;
	const ordered = [...batches].sort((a, b) => a.batchIndex - b.batchIndex);
	const rows = ordered.flatMap((batch) => batch.outcomes);

	const failures: FailureDetail[] = rows
		.filter((row) => !row.success)
		.map((row) => ({ index: row.index, errorCode: row.errorCode ?? 'Unknown', errorMessage: row.errorMessage }));

	const pendingJobs: PendingJob[] = ordered.flatMap((batch) =>
		batch.jobs
			.filter((job) => job.timedOut && !TERMINAL_STATES.has(job.backendState))
			.map((job) => ({
				batchIndex: batch.batchIndex,
				offset: batch.offset,
				rowCount: batch.outcomes.length,
				handle: job.handle,
				backendState: job.backendState,
			}))
	);

	const sampleRecordIds =
		input.sampleRecordIds ??
		rows.flatMap((row) => (row.success && row.recordId ? [row.recordId] : [])).slice(0, input.sampleSize);

	return {
		operationKind: plan.kind,
		objectName: plan.sobject,
		totalRecords: plan.records.length,
		counts: countOutcomes(plan, ordered),
		recordsRead: input.recordsRead,
		sampleRecordIds: sampleRecordIds.slice(0, input.sampleSize),
		scoreReport: input.scoreReport,
		preflightScore: input.preflightScore,
		cleanupPredicate: input.cleanupPredicate,
		rollbackMarker: input.rollbackMarker,
		failures,
		pendingJobs,
		batches: ordered.length,
		warnings: [...plan.warnings, ...(input.warnings ?? [])],
	};
}

/** One JSON document per line. */
export function serializeReports(reports: readonly OperationReport[]): string {
	return reports.map((report) => `${JSON.stringify(report)}\n`).join('');
}
