/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { Logger } from '@salesforce/core';
import type { Executor, ExecutorRowResult, JobHandle, JobState, JobStatus } from '../types/index.js';
import type { PollSettings } from './config.js';
import {
	classifyThrown,
	errorMessageOf,
	InvalidJobTransitionError,
	isRetryable,
	OperationCancelledError,
	TimedOutError,
} from './errors.js';
import type { RateLimiter } from './rateLimiter.js';
import { type Clock, systemClock, waitFor } from './retry.js';

export type JobEvent = 'submit_ack' | 'poll_success' | 'poll_failure' | 'timeout_exceeded' | 'cancel';

const TRANSITIONS: Record<JobState, Partial<Record<JobEvent, JobState>>> = {
	Queued: { submit_ack: 'InProgress', timeout_exceeded: 'Aborted', cancel: 'Aborted' },
	InProgress: {
		poll_success: 'JobComplete',
		poll_failure: 'JobFailed',
		timeout_exceeded: 'Aborted',
		cancel: 'Aborted',
	},
	JobComplete: {},
	JobFailed: {},
	Aborted: {},
};

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['JobComplete', 'JobFailed', 'Aborted']);

/** Local view of one asynchronous job. Only legal transitions are accepted. */
export class BulkJob {
	private current: JobState;

	public constructor(public readonly handle: JobHandle, public readonly rowCount: number, initial: JobState = 'Queued') {
		this.current = initial;
	}

	public get state(): JobState {
		return this.current;
	}

	public get isTerminal(): boolean {
		return TERMINAL_STATES.has(this.current);
	}

	public transition(event: JobEvent): JobState {
		const next = TRANSITIONS[this.current][event];
		if (!next) throw new InvalidJobTransitionError(this.handle.id, this.current, event);
		this.current = next;
		return next;
	}
}

export type PollOptions = Partial<PollSettings> & {
	signal?: AbortSignal;
	deadline?: number; // epoch ms; the earlier of this and now + waitMs applies
};

export type PollResult = {
	/** Local terminal state. */
	state: JobState;
	/** Last state the backend reported. InProgress with timedOut means the job may still finish. */
	backendState: JobState;
	results?: ExecutorRowResult[];
	errorMessage?: string;
	timedOut: boolean;
	cancelled: boolean;
	cancelConfirmed?: boolean;
	polls: number;
};

const DEFAULT_POLL: PollSettings = { intervalMs: 2000, maxIntervalMs: 30_000, backoff: 'exponential', waitMs: 600_000 };

/**
 * Drives a submitted job to a terminal state by polling the Executor.
 * One poller can serve many jobs at once; each poll() call owns its own loop.
 */
export class JobPoller {
	private readonly logger = Logger.childFromRoot('bulkops:jobPoller');

	public constructor(
		private readonly executor: Executor,
		private readonly limiter?: RateLimiter,
		private readonly clock: Clock = systemClock
	) {}

	public async poll(job: BulkJob, options: PollOptions = {}): Promise<PollResult> {
		const settings: PollSettings = {
			intervalMs: options.intervalMs ?? DEFAULT_POLL.intervalMs,
			maxIntervalMs: options.maxIntervalMs ?? DEFAULT_POLL.maxIntervalMs,
			backoff: options.backoff ?? DEFAULT_POLL.backoff,
			waitMs: options.waitMs ?? DEFAULT_POLL.waitMs,
		};
		const budgetEnd = this.clock.now() + settings.waitMs;
		const deadline = options.deadline === undefined ? budgetEnd : Math.min(options.deadline, budgetEnd);
		const { signal } = options;

		if (job.state === 'Queued') job.transition('submit_ack');

		let backendState: JobState = job.state;
		let polls = 0;

		for (;;) {
			if (signal?.aborted) return this.cancel(job, backendState, polls);

			let status: JobStatus | undefined;
			try {
				// eslint-disable-next-line no-await-in-loop
				status = await this.pollOnce(job.handle, signal);
				polls++;
			} catch (error) {
				if (error instanceof OperationCancelledError) return this.cancel(job, backendState, polls);
				polls++;
				const code = classifyThrown(error);
				if (!isRetryable(code)) {
					job.transition('poll_failure');
					this.logger.debug(`job ${job.handle.id} failed while polling: ${errorMessageOf(error)}`);
					return { state: job.state, backendState, errorMessage: errorMessageOf(error), timedOut: false, cancelled: false, polls };
				}
				this.logger.debug(`job ${job.handle.id} poll ${polls} hit ${code}, will poll again`);
			}

			if (status) {
				backendState = status.state;
				const terminal = this.settle(job, status, polls);
				if (terminal) return terminal;
			}

			try {
				// eslint-disable-next-line no-await-in-loop
				await waitFor(this.intervalFor(polls, settings), {
					clock: this.clock,
					deadline,
					signal,
					what: `Polling job ${job.handle.id}`,
				});
			} catch (error) {
				if (error instanceof TimedOutError) {
					job.transition('timeout_exceeded');
					this.logger.debug(`job ${job.handle.id} wait budget exhausted, backend state ${backendState}`);
					return { state: job.state, backendState, timedOut: true, cancelled: false, polls };
				}
				if (error instanceof OperationCancelledError) return this.cancel(job, backendState, polls);
				throw error;
			}
		}
	}

	/** Resumes polling a job by its identity, e.g. one that timed out in an earlier session. */
	public async repoll(handle: JobHandle, rowCount: number, options: PollOptions = {}): Promise<PollResult> {
		return this.poll(new BulkJob(handle, rowCount, 'InProgress'), options);
	}

	private intervalFor(polls: number, settings: PollSettings): number {
		if (settings.backoff === 'fixed') return settings.intervalMs;
		return Math.min(settings.intervalMs * Math.pow(2, Math.max(0, polls - 1)), settings.maxIntervalMs);
	}

	private async pollOnce(handle: JobHandle, signal?: AbortSignal): Promise<JobStatus> {
		const call = (): Promise<JobStatus> => this.executor.pollJob(handle);
		return this.limiter ? this.limiter.run(call, signal) : call();
	}

	private settle(job: BulkJob, status: JobStatus, polls: number): PollResult | undefined {
		switch (status.state) {
			case 'JobComplete':
				job.transition('poll_success');
				this.logger.debug(`job ${job.handle.id} complete after ${polls} poll(s)`);
				return { state: job.state, backendState: status.state, results: status.results, timedOut: false, cancelled: false, polls };
			case 'JobFailed':
				job.transition('poll_failure');
				this.logger.debug(`job ${job.handle.id} failed: ${status.errorMessage ?? 'no detail'}`);
				return {
					state: job.state,
					backendState: status.state,
					results: status.results,
					errorMessage: status.errorMessage,
					timedOut: false,
					cancelled: false,
					polls,
				};
			case 'Aborted':
				// aborted on the backend by someone else
				job.transition('cancel');
				return {
					state: job.state,
					backendState: status.state,
					errorMessage: status.errorMessage,
					timedOut: false,
					cancelled: false,
					polls,
				};
			default:
				return undefined;
		}
	}

	/**
	 * Stops polling, asks the backend to cancel and confirms with one last poll.
	 * A job that finished before the cancel reached it keeps its results so the
	 * committed rows can still be tracked.
	 */
	private async cancel(job: BulkJob, lastKnown: JobState, polls: number): Promise<PollResult> {
		job.transition('cancel');
		this.logger.debug(`cancelling job ${job.handle.id}`);

		try {
			const call = (): Promise<boolean> => this.executor.cancelJob(job.handle);
			await (this.limiter ? this.limiter.run(call) : call());
		} catch (error) {
			this.logger.warn(`cancel request for job ${job.handle.id} failed: ${errorMessageOf(error)}`);
		}

		let confirm: JobStatus | undefined;
		try {
			confirm = await this.pollOnce(job.handle);
			polls++;
		} catch (error) {
			this.logger.warn(`could not confirm cancellation of job ${job.handle.id}: ${errorMessageOf(error)}`);
		}

		const backendState = confirm?.state ?? lastKnown;
		return {
			state: job.state,
			backendState,
			results: confirm?.state === 'JobComplete' ? confirm.results : undefined,
			timedOut: false,
			cancelled: true,
			cancelConfirmed: backendState === 'Aborted',
			polls,
		};
	}
}
