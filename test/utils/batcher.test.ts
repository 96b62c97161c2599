/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { describe, expect, it } from 'vitest';
import type { OperationPlan, SObjectRecord } from '../../src/types/index.js';
import { estimateRecordBytes, split } from '../../src/utils/batcher.js';
import { LimitConfigurationError } from '../../src/utils/errors.js';

function planOf(records: SObjectRecord[], chunkSizeHint?: number): OperationPlan {
	return {
		kind: 'Insert',
		mutation: 'Insert',
		sobject: 'Widget',
		records,
		chunkSizeHint,
		mode: 'auto',
		accessMode: 'user',
		purpose: 'general',
		warnings: [],
	};
}

function rows(count: number): SObjectRecord[] {
	return Array.from({ length: count }, (_, i) => ({ Name: `Widget ${i + 1}` }));
}

describe('split', () => {
	it('should split 10,050 records into batches of 10000 and 50', () => {
		const batches = [...split(planOf(rows(10_050)), { maxRowsPerBatch: 10_000, maxBytesPerBatch: 50_000_000 })];

		expect(batches.map((batch) => batch.records.length)).toEqual([10_000, 50]);
		expect(batches.map((batch) => batch.offset)).toEqual([0, 10_000]);
		expect(batches.map((batch) => batch.index)).toEqual([0, 1]);
	});

	it('should keep every batch within the byte limit', () => {
		const records = rows(30);
		const size = estimateRecordBytes(records[0]);
		const limits = { maxRowsPerBatch: 100, maxBytesPerBatch: size * 4 + 1 };

		const batches = [...split(planOf(records), limits)];

		for (const batch of batches) {
			expect(batch.records.length).toBeLessThanOrEqual(limits.maxRowsPerBatch);
			expect(batch.estimatedBytes).toBeLessThanOrEqual(limits.maxBytesPerBatch);
		}
		expect(batches.reduce((sum, batch) => sum + batch.records.length, 0)).toBe(30);
	});

	it('should use the smaller of the row limit and the chunk size hint', () => {
		const batches = [...split(planOf(rows(25), 10), { maxRowsPerBatch: 200, maxBytesPerBatch: 10_000_000 })];

		expect(batches.map((batch) => batch.records.length)).toEqual([10, 10, 5]);
	});

	it('should yield the same batches every time it is iterated', () => {
		const batches = split(planOf(rows(7)), { maxRowsPerBatch: 3, maxBytesPerBatch: 10_000 });

		expect([...batches].map((batch) => batch.records.length)).toEqual([3, 3, 1]);
		expect([...batches].map((batch) => batch.records.length)).toEqual([3, 3, 1]);
	});

	it('should throw for a record larger than the byte limit by default', () => {
		const records = [{ Name: 'small' }, { Name: 'x'.repeat(500) }];

		expect(() => [...split(planOf(records), { maxRowsPerBatch: 10, maxBytesPerBatch: 100 })]).toThrow(LimitConfigurationError);
	});

	it('should isolate an oversized record in a rejected batch when asked to', () => {
		const records = [{ Name: 'a' }, { Name: 'x'.repeat(500) }, { Name: 'b' }];

		const batches = [...split(planOf(records), { maxRowsPerBatch: 10, maxBytesPerBatch: 100 }, { onOversized: 'isolate' })];

		expect(batches.map((batch) => [batch.offset, batch.records.length, batch.rejection?.code])).toEqual([
			[0, 1, undefined],
			[1, 1, 'LimitConfiguration'],
			[2, 1, undefined],
		]);
	});

	it('should reject limits that are not positive integers', () => {
		expect(() => split(planOf(rows(1)), { maxRowsPerBatch: 0, maxBytesPerBatch: 100 })).toThrow(
			'Batch limit "maxRowsPerBatch" must be a positive integer, got 0.'
		);
		expect(() => split(planOf(rows(1), 0), { maxRowsPerBatch: 10, maxBytesPerBatch: 100 })).toThrow(LimitConfigurationError);
	});

	it('should yield nothing for an empty plan', () => {
		expect([...split(planOf([]), { maxRowsPerBatch: 10, maxBytesPerBatch: 100 })]).toEqual([]);
	});
});
