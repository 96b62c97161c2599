/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { Logger } from '@salesforce/core';
import { errorMessages, LimitConfigurationError, OperationCancelledError } from './errors.js';
import { type Clock, systemClock } from './retry.js';

export type RateLimiterOptions = {
	/** Tokens in the bucket: the org's concurrent request quota. */
	capacity: number;
	/** Optional cap on grants inside a sliding window of windowMs. */
	requestsPerWindow?: number;
	windowMs?: number;
};

export type Lease = {
	release(): void;
};

type Waiter = {
	grant: () => void;
	reject: (error: Error) => void;
	signal?: AbortSignal;
	onAbort?: () => void;
};

/**
 * Token bucket shared by every batch of a run. A caller that finds the bucket
 * empty waits in FIFO order until a lease is released; it never gets an error
 * for being over quota. Token changes happen synchronously, so a decrement and
 * its matching increment can't interleave with another caller's.
 *
 * ```typescript
 * const limiter = new RateLimiter({ capacity: 10 });
 * const result = await limiter.run(() => executor.runSingle(request, record));
 * ```
 */
export class RateLimiter {
	private available: number;
	private readonly waiters: Waiter[] = [];
	private readonly grants: number[] = [];
	private readonly logger = Logger.childFromRoot('bulkops:rateLimiter');

	public constructor(private readonly options: RateLimiterOptions, private readonly clock: Clock = systemClock) {
		if (!Number.isInteger(options.capacity) || options.capacity < 1) {
			throw new LimitConfigurationError(
				errorMessages.getMessage('error.InvalidLimit', ['capacity', options.capacity])
			);
		}
		this.available = options.capacity;
	}

	public get availableTokens(): number {
		return this.available;
	}

	public get waiting(): number {
		return this.waiters.length;
	}

	public async acquire(signal?: AbortSignal): Promise<Lease> {
		if (signal?.aborted) throw new OperationCancelledError('Rate limiter wait');

		if (this.available > 0 && this.waiters.length === 0) {
			this.available--;
		} else {
			await this.enqueue(signal);
		}

		const lease = this.createLease();
		try {
			await this.reserveWindowSlot(signal);
		} catch (error) {
			lease.release();
			throw error;
		}
		return lease;
	}

	public async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		const lease = await this.acquire(signal);
		try {
			return await fn();
		} finally {
			lease.release();
		}
	}

	private enqueue(signal?: AbortSignal): Promise<void> {
		this.logger.debug(`bucket empty, ${this.waiters.length} caller(s) already waiting`);
		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = { grant: resolve, reject, signal };
			if (signal) {
				waiter.onAbort = (): void => {
					const position = this.waiters.indexOf(waiter);
					if (position >= 0) this.waiters.splice(position, 1);
					reject(new OperationCancelledError('Rate limiter wait'));
				};
				signal.addEventListener('abort', waiter.onAbort, { once: true });
			}
			this.waiters.push(waiter);
		});
	}

	private createLease(): Lease {
		let released = false;
		return {
			release: (): void => {
				if (released) return;
				released = true;
				this.handOff();
			},
		};
	}

	// The released token goes straight to the next waiter, if any.
	private handOff(): void {
		const next = this.waiters.shift();
		if (!next) {
			this.available++;
			return;
		}
		if (next.signal && next.onAbort) next.signal.removeEventListener('abort', next.onAbort);
		next.grant();
	}

	private async reserveWindowSlot(signal?: AbortSignal): Promise<void> {
		const { requestsPerWindow, windowMs } = this.options;
		if (requestsPerWindow === undefined || windowMs === undefined) return;

		for (;;) {
			const now = this.clock.now();
			while (this.grants.length > 0 && this.grants[0] <= now - windowMs) this.grants.shift();
			if (this.grants.length < requestsPerWindow) {
				this.grants.push(now);
				return;
			}
			const waitMs = this.grants[0] + windowMs - now;
			this.logger.debug(`window quota of ${requestsPerWindow} reached, waiting ${waitMs}ms`);
			// eslint-disable-next-line no-await-in-loop
			await this.clock.sleep(waitMs, signal);
		}
	}
}
