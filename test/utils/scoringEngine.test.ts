/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { describe, expect, it } from 'vitest';
import type { OperationOutcome, OperationPlan, RecordTrace, SObjectRecord } from '../../src/types/index.js';
import { idPredicate } from '../../src/utils/cleanupQuery.js';
import { createRollbackMarker } from '../../src/utils/recordTracker.js';
import { ratingFor, ScoringEngine } from '../../src/utils/scoringEngine.js';
import { DEFAULT_RUBRIC, findSensitiveData, luhnValid, MAX_TOTAL } from '../../src/utils/scoringRubric.js';
import { widgetSchema } from '../helpers/schemas.js';

const engine = new ScoringEngine({ syncThreshold: 200, bulkBoundary: 250, maxRowsPerBatch: 10_000, maxRetries: 3 });

function insertPlan(records: SObjectRecord[], extra: Partial<OperationPlan> = {}): OperationPlan {
	return {
		kind: 'Insert',
		mutation: 'Insert',
		sobject: 'Widget',
		records,
		mode: 'auto',
		accessMode: 'user',
		purpose: 'general',
		warnings: [],
		...extra,
	};
}

function widgets(count: number): SObjectRecord[] {
	return Array.from({ length: count }, (_, i) => ({ Name: `Widget ${i + 1}` }));
}

function committedOutcome(count: number): OperationOutcome {
	const ids = Array.from({ length: count }, (_, i) => `a00${String(i + 1).padStart(12, '0')}AAA`);
	const traces: RecordTrace[] = ids.map((recordId, i) => ({
		seq: i + 1,
		sobject: 'Widget',
		operationKind: 'Insert',
		effect: 'created',
		recordId,
		timestamp: '2024-01-01T00:00:00.000Z',
	}));
	return {
		batches: [
			{
				batchIndex: 0,
				offset: 0,
				mode: 'async',
				outcomes: ids.map((recordId, index) => ({ index, recordId, success: true, created: true, attempts: 1 })),
				successCount: count,
				failureCount: 0,
				retries: 0,
				partialFailure: false,
				jobs: [],
			},
		],
		traces,
		cleanupPredicates: [idPredicate('Widget', ids)],
		rollbackMarker: createRollbackMarker(0),
	};
}

describe('ScoringEngine', () => {
	it('should measure bulk tests against the configured boundary', () => {
		const narrow = new ScoringEngine({ syncThreshold: 200, bulkBoundary: 200, maxRowsPerBatch: 10_000, maxRetries: 3 });
		const boundaryFinding = (count: number): unknown =>
			narrow.score(insertPlan(widgets(count)), undefined, widgetSchema).findings.find((finding) => finding.ruleId === 'TP-BULK-BOUNDARY');

		expect(boundaryFinding(201)).toEqual({
			ruleId: 'TP-BULK-BOUNDARY',
			category: 'testPatterns',
			delta: 8,
			message: 'Met: Record count crosses the configured bulk-test boundary',
		});
		expect(boundaryFinding(200)).toEqual({
			ruleId: 'TP-BULK-BOUNDARY',
			category: 'testPatterns',
			delta: 0,
			message: 'Not met: Record count crosses the configured bulk-test boundary',
		});
	});

	it('should score an undocumented plan with no cleanup at zero in those categories', () => {
		const report = engine.score(insertPlan(widgets(3)), undefined, widgetSchema);

		expect(report.categoryScores).toEqual({
			queryEfficiency: 25,
			bulkSafety: 25,
			dataIntegrity: 20,
			security: 20,
			testPatterns: 0,
			cleanupIsolation: 0,
			documentation: 0,
		});
		expect(report.total).toBe(90);
		expect(report.rating).toBe('Needs Work');
		expect(report.findings).toHaveLength(DEFAULT_RUBRIC.length);
	});

	it('should give full marks to a documented bulk test with tracked commits', () => {
		const plan = insertPlan(widgets(251), {
			description: 'Exercise the widget trigger past one chunk',
			label: 'widget-bulk',
			purpose: 'bulk-test',
			generation: { count: 251, edgeCaseFraction: 0.1 },
		});

		const report = engine.score(plan, committedOutcome(251), widgetSchema);

		expect(report.total).toBe(MAX_TOTAL);
		expect(report.total).toBe(130);
		expect(report.rating).toBe('Excellent');
	});

	it('should never lower the score when a description is added', () => {
		const bare = engine.score(insertPlan(widgets(3)));
		const documented = engine.score(insertPlan(widgets(3), { description: 'Seed three widgets' }));

		expect(documented.total - bare.total).toBe(6);
		expect(documented.categoryScores.documentation).toBe(6);
	});

	it('should clamp a category with only penalties at zero', () => {
		const plan: OperationPlan = { ...insertPlan([]), kind: 'Query', mutation: undefined, query: 'SELECT FIELDS(ALL) FROM Widget' };

		const report = engine.score(plan);

		expect(report.categoryScores.queryEfficiency).toBe(0);
		expect(report.findings.find((finding) => finding.ruleId === 'QE-UNBOUNDED-SCAN')).toEqual({
			ruleId: 'QE-UNBOUNDED-SCAN',
			category: 'queryEfficiency',
			delta: -10,
			message: 'Triggered: Synchronous query scans the whole object without WHERE or LIMIT',
		});
	});

	it('should penalize forcing per-record calls at volume', () => {
		const report = engine.score(insertPlan(widgets(300), { mode: 'sync' }));

		expect(report.categoryScores.bulkSafety).toBe(5);
	});

	it('should take security points for sensitive values', () => {
		const report = engine.score(insertPlan([{ Name: 'x', Description__c: 'SSN 123-45-6789' }]));

		expect(report.categoryScores.security).toBe(0);
	});

	it('should keep every total within range', () => {
		const plans = [
			insertPlan([]),
			insertPlan(widgets(251), { accessMode: 'system', mode: 'sync' }),
			insertPlan(widgets(5), { description: 'd', label: 'l', chunkSizeHint: 20_000 }),
		];
		for (const plan of plans) {
			const { total } = engine.score(plan, committedOutcome(plan.records.length));
			expect(total).toBeGreaterThanOrEqual(0);
			expect(total).toBeLessThanOrEqual(130);
		}
	});
});

describe('ratingFor', () => {
	it('should use the band floors', () => {
		expect([130, 117, 116, 104, 103, 91, 90, 78, 77, 0].map((total) => ratingFor(total))).toEqual([
			'Excellent',
			'Excellent',
			'Very Good',
			'Very Good',
			'Good',
			'Good',
			'Needs Work',
			'Needs Work',
			'Critical',
			'Critical',
		]);
	});
});

describe('findSensitiveData', () => {
	it('should recognize card numbers by their check digit', () => {
		expect(luhnValid('4111111111111111')).toBe(true);
		expect(luhnValid('4111111111111112')).toBe(false);
	});

	it('should name the record and field of each match', () => {
		const matches = findSensitiveData([
			{ Name: 'plain', Description__c: 'card 4111 1111 1111 1111' },
			{ Name: 'AKIA0000000000000000', Quantity__c: 42 },
		]);

		expect(matches).toEqual([
			{ kind: 'card', recordIndex: 0, field: 'Description__c' },
			{ kind: 'awsKey', recordIndex: 1, field: 'Name' },
		]);
	});
});
