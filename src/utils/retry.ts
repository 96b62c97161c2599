/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { setTimeout as delay } from 'node:timers/promises';
import type { RetrySettings } from './config.js';
import { OperationCancelledError, TimedOutError } from './errors.js';

export type Clock = {
	now(): number;
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
};

export const systemClock: Clock = {
	now: () => Date.now(),
	async sleep(ms: number, signal?: AbortSignal): Promise<void> {
		try {
			await delay(ms, undefined, { signal });
		} catch (error) {
			if (signal?.aborted) throw new OperationCancelledError('Wait');
			throw error;
		}
	},
};

export type WaitOptions = {
	clock: Clock;
	deadline?: number; // epoch ms
	signal?: AbortSignal;
	what?: string;
};

/**
 * Sleeps for `ms`, but never past `deadline`. Reaching the deadline throws
 * TimedOutError instead of returning; an aborted signal throws OperationCancelledError.
 */
export async function waitFor(ms: number, options: WaitOptions): Promise<void> {
	const { clock, deadline, signal } = options;
	const what = options.what ?? 'Wait';
	if (signal?.aborted) throw new OperationCancelledError(what);

	const remaining = deadline === undefined ? Infinity : deadline - clock.now();
	if (remaining <= 0) throw new TimedOutError(what);

	if (ms >= remaining) {
		await clock.sleep(remaining, signal);
		throw new TimedOutError(what);
	}
	await clock.sleep(ms, signal);
}

/**
 * Exponential backoff: base * 2^attempt capped at maxDelayMs, plus jitter in [0, jitterMs).
 * `attempt` is zero based (the first retry waits roughly baseDelayMs).
 */
export function backoffDelay(attempt: number, settings: RetrySettings, random: () => number = Math.random): number {
	const exponential = settings.baseDelayMs * Math.pow(2, attempt);
	const capped = Math.min(exponential, settings.maxDelayMs);
	return capped + Math.floor(random() * settings.jitterMs);
}

/**
 * Retry counter scoped to one batch. A fresh budget is created for every
 * batch execution so unrelated batches never share retries.
 */
export class BatchRetryBudget {
	private readonly attempts = new Map<number, number>();
	private total = 0;

	public constructor(private readonly maxRetries: number) {}

	public get totalRetries(): number {
		return this.total;
	}

	public retriesFor(row: number): number {
		return this.attempts.get(row) ?? 0;
	}

	/** Takes one retry for `row`; false once the row has used maxRetries. */
	public tryConsume(row: number): boolean {
		const used = this.retriesFor(row);
		if (used >= this.maxRetries) return false;
		this.attempts.set(row, used + 1);
		this.total++;
		return true;
	}
}
