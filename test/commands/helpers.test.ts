/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { describe, expect, it } from 'vitest';
import { cleanupPatternFrom } from '../../src/commands/bulkops/data/cleanup.js';
import { trackJobResults } from '../../src/commands/bulkops/job/poll.js';
import { ValidationError } from '../../src/utils/errors.js';
import { RecordTracker } from '../../src/utils/recordTracker.js';

describe('cleanupPatternFrom', () => {
	it('should build a tracked-id pattern with an optional marker', () => {
		expect(cleanupPatternFrom({ strategy: 'trackedIds' })).toEqual({ strategy: 'trackedIds', sobject: undefined });
		expect(cleanupPatternFrom({ strategy: 'trackedIds', sobject: 'Widget', since: '3' })).toEqual({
			strategy: 'trackedIds',
			sobject: 'Widget',
			since: '3',
		});
		expect(() => cleanupPatternFrom({ strategy: 'trackedIds', since: 'yesterday' })).toThrow(ValidationError);
	});

	it('should require the flags each pattern strategy needs', () => {
		expect(cleanupPatternFrom({ strategy: 'namePattern', sobject: 'Widget', pattern: 'Test*' })).toEqual({
			strategy: 'namePattern',
			sobject: 'Widget',
			pattern: 'Test*',
			field: undefined,
		});
		expect(() => cleanupPatternFrom({ strategy: 'namePattern', sobject: 'Widget' })).toThrow(
			'Cannot build a cleanup predicate: --sobject and --pattern are required for namePattern'
		);
		expect(() => cleanupPatternFrom({ strategy: 'createdWindow', sobject: 'Widget' })).toThrow(ValidationError);
	});

	it('should refuse an unknown strategy', () => {
		expect(() => cleanupPatternFrom({ strategy: 'everything' })).toThrow(
			'Cannot build a cleanup predicate: unknown strategy "everything"'
		);
	});
});

describe('trackJobResults', () => {
	const results = [
		{ success: true, recordId: 'a01', created: true },
		{ success: true, recordId: 'a02', created: false },
		{ success: false, errorCode: 'DUPLICATE_VALUE' },
		{ success: true },
	];

	it('should record every committed row of a finished job', () => {
		const tracker = new RecordTracker();

		expect(trackJobResults(tracker, 'Widget', 'upsert', results)).toBe(2);
		expect(tracker.traces.map((trace) => [trace.recordId, trace.effect, trace.operationKind])).toEqual([
			['a01', 'created', 'Upsert'],
			['a02', 'updated', 'Upsert'],
		]);
	});

	it('should track nothing for a job that only reads', () => {
		const tracker = new RecordTracker();

		expect(trackJobResults(tracker, 'Widget', 'query', results)).toBe(0);
		expect(tracker.traces).toEqual([]);
	});
});
