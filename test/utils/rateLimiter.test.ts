/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { describe, expect, it } from 'vitest';
import { LimitConfigurationError, OperationCancelledError } from '../../src/utils/errors.js';
import { RateLimiter } from '../../src/utils/rateLimiter.js';
import { FakeClock } from '../helpers/fakeClock.js';

describe('RateLimiter', () => {
	it('should grant leases up to capacity without waiting', async () => {
		const limiter = new RateLimiter({ capacity: 2 });
		await limiter.acquire();
		await limiter.acquire();

		expect(limiter.availableTokens).toBe(0);
		expect(limiter.waiting).toBe(0);
	});

	it('should serve waiters in FIFO order as leases are released', async () => {
		const limiter = new RateLimiter({ capacity: 1 });
		const first = await limiter.acquire();
		const order: string[] = [];

		const second = limiter.acquire().then((lease) => {
			order.push('second');
			return lease;
		});
		const third = limiter.acquire().then((lease) => {
			order.push('third');
			return lease;
		});
		expect(limiter.waiting).toBe(2);

		first.release();
		(await second).release();
		(await third).release();

		expect(order).toEqual(['second', 'third']);
		expect(limiter.availableTokens).toBe(1);
	});

	it('should ignore a second release of the same lease', async () => {
		const limiter = new RateLimiter({ capacity: 1 });
		const lease = await limiter.acquire();
		lease.release();
		lease.release();

		expect(limiter.availableTokens).toBe(1);
	});

	it('should drop an aborted waiter from the queue', async () => {
		const limiter = new RateLimiter({ capacity: 1 });
		const held = await limiter.acquire();
		const controller = new AbortController();

		const waiting = limiter.acquire(controller.signal);
		controller.abort();

		await expect(waiting).rejects.toBeInstanceOf(OperationCancelledError);
		expect(limiter.waiting).toBe(0);
		held.release();
		expect(limiter.availableTokens).toBe(1);
	});

	it('should release the lease when the wrapped call throws', async () => {
		const limiter = new RateLimiter({ capacity: 1 });

		await expect(limiter.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
		expect(limiter.availableTokens).toBe(1);
	});

	it('should hold grants back once the window quota is used', async () => {
		const clock = new FakeClock();
		const limiter = new RateLimiter({ capacity: 5, requestsPerWindow: 2, windowMs: 1000 }, clock);

		for (let i = 0; i < 3; i++) {
			// eslint-disable-next-line no-await-in-loop
			(await limiter.acquire()).release();
		}

		expect(clock.sleeps).toEqual([1000]);
	});

	it('should reject a capacity below one', () => {
		expect(() => new RateLimiter({ capacity: 0 })).toThrow(LimitConfigurationError);
	});
});
