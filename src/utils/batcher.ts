/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type { Batch, BatchLimits, OperationPlan, SObjectRecord } from '../types/index.js';
import { errorMessages, LimitConfigurationError } from './errors.js';

export type SplitOptions = {
	/**
	 * What to do with a record larger than maxBytesPerBatch. `throw` fails the
	 * whole split; `isolate` yields it alone in a batch carrying a rejection so
	 * the other batches can still run.
	 */
	onOversized?: 'throw' | 'isolate';
};

export function estimateRecordBytes(record: SObjectRecord): number {
	return Buffer.byteLength(JSON.stringify(record), 'utf8');
}

function checkLimit(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 1) {
		throw new LimitConfigurationError(errorMessages.getMessage('error.InvalidLimit', [name, value]));
	}
}

function* greedy(
	records: readonly SObjectRecord[],
	maxRows: number,
	maxBytes: number,
	onOversized: 'throw' | 'isolate'
): Generator<Batch> {
	let index = 0;
	let offset = 0;
	let current: SObjectRecord[] = [];
	let bytes = 0;

	const close = (): Batch => {
		const batch: Batch = Object.freeze({ index: index++, offset, records: Object.freeze(current), estimatedBytes: bytes });
		offset += current.length;
		current = [];
		bytes = 0;
		return batch;
	};

	for (const [position, record] of records.entries()) {
		const size = estimateRecordBytes(record);

		if (size > maxBytes) {
			if (onOversized === 'throw') {
				throw new LimitConfigurationError(
					errorMessages.getMessage('error.OversizedRecord', [position, size, maxBytes])
				);
			}
			if (current.length > 0) yield close();
			yield Object.freeze({
				index: index++,
				offset: position,
				records: Object.freeze([record]),
				estimatedBytes: size,
				rejection: {
					code: 'LimitConfiguration',
					message: errorMessages.getMessage('error.OversizedRecord', [position, size, maxBytes]),
				},
			} satisfies Batch);
			offset = position + 1;
			continue;
		}

		if (current.length > 0 && (current.length + 1 > maxRows || bytes + size > maxBytes)) {
			yield close();
		}
		current.push(record);
		bytes += size;
	}

	if (current.length > 0) yield close();
}

/**
 * Splits a plan's records into batches, greedily filling each one until the
 * next record would break the row or byte limit. Records are never split.
 *
 * The result is lazy and restartable: every iteration walks the records again
 * and yields the same batches.
 */
export function split(plan: OperationPlan, limits: BatchLimits, options: SplitOptions = {}): Iterable<Batch> {
	checkLimit('maxRowsPerBatch', limits.maxRowsPerBatch);
	checkLimit('maxBytesPerBatch', limits.maxBytesPerBatch);
	if (plan.chunkSizeHint !== undefined) checkLimit('chunkSize', plan.chunkSizeHint);

	const maxRows = Math.min(limits.maxRowsPerBatch, plan.chunkSizeHint ?? Infinity);
	const onOversized = options.onOversized ?? 'throw';

	return {
		[Symbol.iterator]: (): Iterator<Batch> =>
			greedy(plan.records, maxRows, limits.maxBytesPerBatch, onOversized),
	};
}
