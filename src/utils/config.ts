/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { isDictionary, isNumber, isBoolean, isString } from '@salesforce/ts-types';
import type { BatchLimits } from '../types/index.js';
import { errorMessages, LimitConfigurationError } from './errors.js';

export type RetrySettings = {
	maxRetries: number;
	baseDelayMs: number;
	maxDelayMs: number;
	jitterMs: number;
};

export type PollSettings = {
	intervalMs: number;
	maxIntervalMs: number;
	backoff: 'fixed' | 'exponential';
	waitMs: number;
};

export type OrchestratorConfig = {
	limits: BatchLimits;
	syncThreshold: number;
	maxConcurrentRequests: number;
	requestsPerWindow?: number;
	windowMs?: number;
	maxConcurrentBatches: number;
	rowConcurrency: number;
	retry: RetrySettings;
	poll: PollSettings;
	bulkBoundary: number; // configured bulk-test boundary; bulk tests default to one more than this
	defaultGenerateCount: number;
	sampleSize: number;
	captureBeforeImage: boolean;
	cleanupPredicate: 'trackedIds' | 'none';
};

export const DEFAULT_CONFIG: Readonly<OrchestratorConfig> = Object.freeze<OrchestratorConfig>({
	limits: { maxRowsPerBatch: 10_000, maxBytesPerBatch: 10_000_000 },
	syncThreshold: 200,
	maxConcurrentRequests: 10,
	maxConcurrentBatches: 5,
	rowConcurrency: 5,
	retry: { maxRetries: 3, baseDelayMs: 500, maxDelayMs: 30_000, jitterMs: 250 },
	poll: { intervalMs: 2000, maxIntervalMs: 30_000, backoff: 'exponential', waitMs: 600_000 },
	bulkBoundary: 250,
	defaultGenerateCount: 3,
	sampleSize: 10,
	captureBeforeImage: true,
	cleanupPredicate: 'trackedIds',
});

export type ConfigOverrides = {
	limits?: Partial<BatchLimits>;
	syncThreshold?: number;
	maxConcurrentRequests?: number;
	requestsPerWindow?: number;
	windowMs?: number;
	maxConcurrentBatches?: number;
	rowConcurrency?: number;
	retry?: Partial<RetrySettings>;
	poll?: Partial<PollSettings>;
	bulkBoundary?: number;
	defaultGenerateCount?: number;
	sampleSize?: number;
	captureBeforeImage?: boolean;
	cleanupPredicate?: 'trackedIds' | 'none';
};

function invalid(key: string, reason: string): LimitConfigurationError {
	return new LimitConfigurationError(errorMessages.getMessage('error.InvalidConfig', [key, reason]));
}

function integerAtLeast(key: string, value: unknown, min: number): number {
	if (!isNumber(value) || !Number.isInteger(value) || value < min) {
		throw invalid(key, `expected an integer >= ${min}, got ${JSON.stringify(value)}`);
	}
	return value;
}

function sectionOf(key: string, value: unknown): Record<string, unknown> {
	if (value === undefined) return {};
	if (!isDictionary(value)) throw invalid(key, 'expected an object');
	return value;
}

function rejectUnknownKeys(section: string, value: Record<string, unknown>, known: readonly string[]): void {
	for (const key of Object.keys(value)) {
		if (!known.includes(key)) throw invalid(section ? `${section}.${key}` : key, 'unknown setting');
	}
}

const TOP_LEVEL_KEYS = [
	'limits',
	'syncThreshold',
	'maxConcurrentRequests',
	'requestsPerWindow',
	'windowMs',
	'maxConcurrentBatches',
	'rowConcurrency',
	'retry',
	'poll',
	'bulkBoundary',
	'defaultGenerateCount',
	'sampleSize',
	'captureBeforeImage',
	'cleanupPredicate',
] as const;

/**
 * Merges overrides onto the defaults and validates every value. Accepts the
 * parsed contents of a --config JSON file as well as typed overrides.
 * Throws LimitConfigurationError on the first bad value.
 */
export function resolveConfig(overrides: ConfigOverrides | unknown = {}): OrchestratorConfig {
	const raw = sectionOf('config', overrides ?? {});
	rejectUnknownKeys('', raw, TOP_LEVEL_KEYS);

	const limits = sectionOf('limits', raw.limits);
	rejectUnknownKeys('limits', limits, ['maxRowsPerBatch', 'maxBytesPerBatch']);
	const retry = sectionOf('retry', raw.retry);
	rejectUnknownKeys('retry', retry, ['maxRetries', 'baseDelayMs', 'maxDelayMs', 'jitterMs']);
	const poll = sectionOf('poll', raw.poll);
	rejectUnknownKeys('poll', poll, ['intervalMs', 'maxIntervalMs', 'backoff', 'waitMs']);

	const pick = (value: unknown, fallback: unknown): unknown => (value === undefined ? fallback : value);

	const backoff = pick(poll.backoff, DEFAULT_CONFIG.poll.backoff);
	if (backoff !== 'fixed' && backoff !== 'exponential') {
		throw invalid('poll.backoff', 'expected "fixed" or "exponential"');
	}

	const captureBeforeImage = pick(raw.captureBeforeImage, DEFAULT_CONFIG.captureBeforeImage);
	if (!isBoolean(captureBeforeImage)) throw invalid('captureBeforeImage', 'expected a boolean');

	const cleanupPredicate = pick(raw.cleanupPredicate, DEFAULT_CONFIG.cleanupPredicate);
	if (!isString(cleanupPredicate) || (cleanupPredicate !== 'trackedIds' && cleanupPredicate !== 'none')) {
		throw invalid('cleanupPredicate', 'expected "trackedIds" or "none"');
	}

	const config: OrchestratorConfig = {
		limits: {
			maxRowsPerBatch: integerAtLeast(
				'limits.maxRowsPerBatch',
				pick(limits.maxRowsPerBatch, DEFAULT_CONFIG.limits.maxRowsPerBatch),
				1
			),
			maxBytesPerBatch: integerAtLeast(
				'limits.maxBytesPerBatch',
				pick(limits.maxBytesPerBatch, DEFAULT_CONFIG.limits.maxBytesPerBatch),
				1
			),
		},
		syncThreshold: integerAtLeast('syncThreshold', pick(raw.syncThreshold, DEFAULT_CONFIG.syncThreshold), 0),
		maxConcurrentRequests: integerAtLeast(
			'maxConcurrentRequests',
			pick(raw.maxConcurrentRequests, DEFAULT_CONFIG.maxConcurrentRequests),
			1
		),
		maxConcurrentBatches: integerAtLeast(
			'maxConcurrentBatches',
			pick(raw.maxConcurrentBatches, DEFAULT_CONFIG.maxConcurrentBatches),
			1
		),
		rowConcurrency: integerAtLeast('rowConcurrency', pick(raw.rowConcurrency, DEFAULT_CONFIG.rowConcurrency), 1),
		retry: {
			maxRetries: integerAtLeast('retry.maxRetries', pick(retry.maxRetries, DEFAULT_CONFIG.retry.maxRetries), 0),
			baseDelayMs: integerAtLeast('retry.baseDelayMs', pick(retry.baseDelayMs, DEFAULT_CONFIG.retry.baseDelayMs), 0),
			maxDelayMs: integerAtLeast('retry.maxDelayMs', pick(retry.maxDelayMs, DEFAULT_CONFIG.retry.maxDelayMs), 0),
			jitterMs: integerAtLeast('retry.jitterMs', pick(retry.jitterMs, DEFAULT_CONFIG.retry.jitterMs), 0),
		},
		poll: {
			intervalMs: integerAtLeast('poll.intervalMs', pick(poll.intervalMs, DEFAULT_CONFIG.poll.intervalMs), 1),
			maxIntervalMs: integerAtLeast(
				'poll.maxIntervalMs',
				pick(poll.maxIntervalMs, DEFAULT_CONFIG.poll.maxIntervalMs),
				1
			),
			backoff,
			waitMs: integerAtLeast('poll.waitMs', pick(poll.waitMs, DEFAULT_CONFIG.poll.waitMs), 0),
		},
		bulkBoundary: integerAtLeast('bulkBoundary', pick(raw.bulkBoundary, DEFAULT_CONFIG.bulkBoundary), 1),
		defaultGenerateCount: integerAtLeast(
			'defaultGenerateCount',
			pick(raw.defaultGenerateCount, DEFAULT_CONFIG.defaultGenerateCount),
			0
		),
		sampleSize: integerAtLeast('sampleSize', pick(raw.sampleSize, DEFAULT_CONFIG.sampleSize), 0),
		captureBeforeImage,
		cleanupPredicate,
	};

	if (raw.requestsPerWindow !== undefined || raw.windowMs !== undefined) {
		config.requestsPerWindow = integerAtLeast('requestsPerWindow', raw.requestsPerWindow, 1);
		config.windowMs = integerAtLeast('windowMs', raw.windowMs, 1);
	}

	if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
		throw invalid('retry.maxDelayMs', 'must not be smaller than retry.baseDelayMs');
	}
	if (config.poll.maxIntervalMs < config.poll.intervalMs) {
		throw invalid('poll.maxIntervalMs', 'must not be smaller than poll.intervalMs');
	}

	return config;
}
