/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '../../src/utils/config.js';
import { LimitConfigurationError } from '../../src/utils/errors.js';

describe('resolveConfig', () => {
	it('should return the defaults when nothing is overridden', () => {
		const config = resolveConfig();

		expect(config).toEqual(DEFAULT_CONFIG);
		expect(config.limits).toEqual({ maxRowsPerBatch: 10_000, maxBytesPerBatch: 10_000_000 });
		expect(config.bulkBoundary).toBe(250);
	});

	it('should merge nested sections without dropping their other keys', () => {
		const config = resolveConfig({ retry: { maxRetries: 5 }, limits: { maxRowsPerBatch: 2000 } });

		expect(config.retry).toEqual({ maxRetries: 5, baseDelayMs: 500, maxDelayMs: 30_000, jitterMs: 250 });
		expect(config.limits).toEqual({ maxRowsPerBatch: 2000, maxBytesPerBatch: 10_000_000 });
	});

	it('should accept parsed JSON from a config file', () => {
		const parsed: unknown = JSON.parse('{"syncThreshold": 50, "poll": {"backoff": "fixed"}}');
		const config = resolveConfig(parsed);

		expect(config.syncThreshold).toBe(50);
		expect(config.poll.backoff).toBe('fixed');
	});

	it('should require requestsPerWindow and windowMs together', () => {
		expect(resolveConfig({ requestsPerWindow: 100, windowMs: 1000 })).toMatchObject({ requestsPerWindow: 100, windowMs: 1000 });
		expect(() => resolveConfig({ requestsPerWindow: 100 })).toThrow(LimitConfigurationError);
	});

	it('should reject unknown keys', () => {
		expect(() => resolveConfig({ maxRows: 10 })).toThrow('Invalid configuration value for "maxRows": unknown setting');
		expect(() => resolveConfig({ retry: { attempts: 2 } })).toThrow(LimitConfigurationError);
	});

	it('should reject out-of-range values', () => {
		expect(() => resolveConfig({ limits: { maxRowsPerBatch: 0 } })).toThrow(LimitConfigurationError);
		expect(() => resolveConfig({ rowConcurrency: 1.5 })).toThrow(LimitConfigurationError);
		expect(() => resolveConfig({ retry: { baseDelayMs: 1000, maxDelayMs: 10 } })).toThrow(
			'Invalid configuration value for "retry.maxDelayMs": must not be smaller than retry.baseDelayMs'
		);
		expect(() => resolveConfig({ cleanupPredicate: 'all' })).toThrow(LimitConfigurationError);
	});
});
