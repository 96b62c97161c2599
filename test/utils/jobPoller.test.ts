/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { describe, expect, it } from 'vitest';
import { InvalidJobTransitionError } from '../../src/utils/errors.js';
import { BulkJob, JobPoller } from '../../src/utils/jobPoller.js';
import { FakeClock } from '../helpers/fakeClock.js';
import { InMemoryExecutor } from '../helpers/inMemoryExecutor.js';

const insert = { kind: 'Insert', sobject: 'Widget' } as const;

describe('BulkJob', () => {
	it('should follow the legal transitions to a terminal state', () => {
		const job = new BulkJob({ id: '750000000000000001' }, 10);

		expect(job.transition('submit_ack')).toBe('InProgress');
		expect(job.transition('poll_success')).toBe('JobComplete');
		expect(job.isTerminal).toBe(true);
	});

	it('should refuse an event the current state does not accept', () => {
		const job = new BulkJob({ id: '750000000000000001' }, 10);

		expect(() => job.transition('poll_success')).toThrow('Job 750000000000000001 cannot move from Queued on event "poll_success".');
		job.transition('cancel');
		expect(() => job.transition('submit_ack')).toThrow(InvalidJobTransitionError);
		expect(job.state).toBe('Aborted');
	});
});

describe('JobPoller', () => {
	it('should poll with exponential backoff until the job completes', async () => {
		const clock = new FakeClock();
		const executor = new InMemoryExecutor({ pollsToComplete: 3 });
		const handle = await executor.submitJob(insert, [{ Name: 'one' }, { Name: 'two' }]);

		const result = await new JobPoller(executor, undefined, clock).poll(new BulkJob(handle, 2));

		expect(result.state).toBe('JobComplete');
		expect(result.polls).toBe(3);
		expect(result.results?.map((row) => row.success)).toEqual([true, true]);
		expect(clock.sleeps).toEqual([2000, 4000]);
	});

	it('should keep a fixed interval when asked to', async () => {
		const clock = new FakeClock();
		const executor = new InMemoryExecutor({ pollsToComplete: 3 });
		const handle = await executor.submitJob(insert, [{ Name: 'one' }]);

		await new JobPoller(executor, undefined, clock).poll(new BulkJob(handle, 1), { backoff: 'fixed', intervalMs: 100 });

		expect(clock.sleeps).toEqual([100, 100]);
	});

	it('should time out locally and let a later repoll pick up the results', async () => {
		const clock = new FakeClock();
		const executor = new InMemoryExecutor({ pollsToComplete: 3 });
		const handle = await executor.submitJob(insert, [{ Name: 'one' }]);
		const poller = new JobPoller(executor, undefined, clock);

		const first = await poller.poll(new BulkJob(handle, 1), { waitMs: 2500 });

		expect(first).toMatchObject({ state: 'Aborted', backendState: 'InProgress', timedOut: true, polls: 2 });
		expect(clock.sleeps).toEqual([2000, 500]);
		expect(executor.cancelled).toEqual([]);

		const second = await poller.repoll(handle, 1);

		expect(second.state).toBe('JobComplete');
		expect(second.results).toHaveLength(1);
	});

	it('should cancel the backend job when the signal is aborted', async () => {
		const executor = new InMemoryExecutor({ pollsToComplete: 5 });
		const handle = await executor.submitJob(insert, [{ Name: 'one' }]);
		const controller = new AbortController();
		controller.abort();

		const result = await new JobPoller(executor, undefined, new FakeClock()).poll(new BulkJob(handle, 1), {
			signal: controller.signal,
		});

		expect(result).toMatchObject({ state: 'Aborted', backendState: 'Aborted', cancelled: true, cancelConfirmed: true, polls: 1 });
		expect(executor.cancelled).toEqual([handle.id]);
		expect(executor.count('Widget')).toBe(0);
	});

	it('should report a job the backend failed', async () => {
		const executor = new InMemoryExecutor();

		const result = await new JobPoller(executor, undefined, new FakeClock()).repoll({ id: '750999999999999999' }, 0);

		expect(result.state).toBe('JobFailed');
		expect(result.errorMessage).toBe('Unknown job 750999999999999999');
	});
});
