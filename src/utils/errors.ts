/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { Messages, SfError } from '@salesforce/core';
import type { ErrorCode, JobState, PlanIssue, RecordTrace, RowOutcome } from '../types/index.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-bulkops', 'bulkops.errors');

export { messages as errorMessages };

/**
 * A plan failed its schema checks. Nothing was sent to the org.
 * `issues` holds every problem found, not just the one in the message.
 */
export class ValidationError extends SfError {
	public readonly issues: PlanIssue[];

	public constructor(message: string, issues: PlanIssue[] = [], name = 'ValidationError') {
		super(message, name);
		this.issues = issues;
	}
}

export class MissingRequiredFieldError extends ValidationError {
	public readonly field: string;
	public readonly recordIndex: number;

	public constructor(sobject: string, field: string, recordIndex: number, issues: PlanIssue[] = []) {
		super(
			messages.getMessage('error.MissingRequiredField', [recordIndex, field, sobject]),
			issues,
			'MissingRequiredFieldError'
		);
		this.field = field;
		this.recordIndex = recordIndex;
	}
}

export class UnknownFieldError extends ValidationError {
	public readonly field: string;
	public readonly recordIndex?: number;

	public constructor(message: string, field: string, recordIndex?: number, issues: PlanIssue[] = []) {
		super(message, issues, 'UnknownFieldError');
		this.field = field;
		this.recordIndex = recordIndex;
	}
}

export class InvalidFieldValueError extends ValidationError {
	public readonly field: string;
	public readonly recordIndex: number;

	public constructor(field: string, recordIndex: number, reason: string, issues: PlanIssue[] = []) {
		super(
			messages.getMessage('error.InvalidFieldValue', [recordIndex, field, reason]),
			issues,
			'InvalidFieldValueError'
		);
		this.field = field;
		this.recordIndex = recordIndex;
	}
}

// Missing external id or relationship target. Fatal for the affected plan or record.
export class SchemaMismatchError extends SfError {
	public readonly issues: PlanIssue[];

	public constructor(message: string, issues: PlanIssue[] = []) {
		super(message, 'SchemaMismatchError');
		this.issues = issues;
	}
}

export class LimitConfigurationError extends SfError {
	public constructor(message: string) {
		super(message, 'LimitConfigurationError');
	}
}

export class RateLimitError extends SfError {
	public constructor(message = messages.getMessage('error.RateLimited')) {
		super(message, 'RateLimitError');
	}
}

export class TransientUnavailableError extends SfError {
	public constructor(detail: string) {
		super(messages.getMessage('error.TransientUnavailable', [detail]), 'TransientUnavailableError');
	}
}

export class RetryExhaustedError extends SfError {
	public readonly attempts: number;
	public readonly lastCode: ErrorCode;

	public constructor(attempts: number, lastCode: ErrorCode) {
		super(messages.getMessage('error.RetryExhausted', [attempts, lastCode]), 'RetryExhaustedError');
		this.attempts = attempts;
		this.lastCode = lastCode;
	}
}

// Describes a mixed batch. Carried on results, never thrown by the engine.
export class PartialFailureError extends SfError {
	public readonly failures: RowOutcome[];

	public constructor(batchIndex: number, failures: RowOutcome[], rowCount: number) {
		super(
			messages.getMessage('error.PartialFailure', [batchIndex, failures.length, rowCount]),
			'PartialFailureError'
		);
		this.failures = failures;
	}
}

export type RollbackFailure = {
	trace: RecordTrace;
	reason: string;
};

export class RollbackError extends SfError {
	public readonly failures: RollbackFailure[];
	public readonly undone: RecordTrace[];

	public constructor(failures: RollbackFailure[], undone: RecordTrace[]) {
		super(
			messages.getMessage('error.Rollback', [failures.length, failures.length + undone.length]),
			'RollbackError'
		);
		this.failures = failures;
		this.undone = undone;
	}
}

// Local only: the backend state is unknown and has to be queried again.
export class TimedOutError extends SfError {
	public constructor(what: string) {
		super(messages.getMessage('error.TimedOut', [what]), 'TimedOutError');
	}
}

export class OperationCancelledError extends SfError {
	public constructor(what: string) {
		super(messages.getMessage('error.Cancelled', [what]), 'OperationCancelledError');
	}
}

export class UnresolvedRelationshipError extends SfError {
	public readonly field: string;
	public readonly parentObject: string;
	public readonly recordIndex: number;

	public constructor(field: string, parentObject: string, recordIndex: number) {
		super(
			messages.getMessage('error.UnresolvedRelationship', [recordIndex, parentObject, field]),
			'UnresolvedRelationshipError'
		);
		this.field = field;
		this.parentObject = parentObject;
		this.recordIndex = recordIndex;
	}
}

export class InvalidJobTransitionError extends SfError {
	public constructor(jobId: string, from: JobState, event: string) {
		super(messages.getMessage('error.InvalidJobTransition', [jobId, from, event]), 'InvalidJobTransitionError');
	}
}

const STATUS_CODES: Record<string, ErrorCode> = {
	REQUEST_LIMIT_EXCEEDED: 'RateLimited',
	TOO_MANY_REQUESTS: 'RateLimited',
	CONCURRENT_REQUESTS_LIMIT_EXCEEDED: 'RateLimited',
	SERVER_UNAVAILABLE: 'TransientUnavailable',
	UNABLE_TO_LOCK_ROW: 'TransientUnavailable',
	QUERY_TIMEOUT: 'TransientUnavailable',
	ECONNRESET: 'TransientUnavailable',
	ETIMEDOUT: 'TransientUnavailable',
	DUPLICATE_VALUE: 'DuplicateValue',
	DUPLICATES_DETECTED: 'DuplicateValue',
	INVALID_CROSS_REFERENCE_KEY: 'InvalidReference',
	INVALID_ID_FIELD: 'InvalidReference',
	MALFORMED_ID: 'InvalidReference',
	ENTITY_IS_DELETED: 'EntityNotFound',
	NOT_FOUND: 'EntityNotFound',
	REQUIRED_FIELD_MISSING: 'ValidationFailed',
	MISSING_ARGUMENT: 'ValidationFailed',
	FIELD_CUSTOM_VALIDATION_EXCEPTION: 'ValidationFailed',
	FIELD_INTEGRITY_EXCEPTION: 'ValidationFailed',
	STRING_TOO_LONG: 'ValidationFailed',
	INVALID_OR_NULL_FOR_RESTRICTED_PICKLIST: 'ValidationFailed',
	INVALID_TYPE_ON_FIELD_IN_RECORD: 'ValidationFailed',
	INVALID_FIELD: 'ValidationFailed',
};

const ERROR_CODES: ReadonlySet<string> = new Set<ErrorCode>([
	'RateLimited',
	'TransientUnavailable',
	'ValidationFailed',
	'DuplicateValue',
	'InvalidReference',
	'EntityNotFound',
	'RetryExhausted',
	'TimedOut',
	'JobFailed',
	'LimitConfiguration',
	'Cancelled',
	'Unknown',
]);

function isErrorCode(value: string): value is ErrorCode {
	return ERROR_CODES.has(value);
}

/** Maps a backend status code (or an already normalized code) to an ErrorCode. */
export function classifyErrorCode(code: string | undefined): ErrorCode {
	if (!code) return 'Unknown';
	if (isErrorCode(code)) return code;
	return STATUS_CODES[code.toUpperCase()] ?? 'Unknown';
}

export function isRetryable(code: ErrorCode): boolean {
	return code === 'RateLimited' || code === 'TransientUnavailable';
}

/** Classifies something an Executor threw. */
export function classifyThrown(error: unknown): ErrorCode {
	if (error instanceof RateLimitError) return 'RateLimited';
	if (error instanceof TransientUnavailableError) return 'TransientUnavailable';
	if (error instanceof TimedOutError) return 'TimedOut';
	if (error instanceof OperationCancelledError) return 'Cancelled';
	if (!(error instanceof Error)) return 'Unknown';

	if ('errorCode' in error && typeof error.errorCode === 'string') {
		const byCode = classifyErrorCode(error.errorCode);
		if (byCode !== 'Unknown') return byCode;
	}

	const byName = classifyErrorCode(error.name);
	if (byName !== 'Unknown') return byName;

	const message = error.message.toLowerCase();
	if (message.includes('request_limit_exceeded') || message.includes('rate limit') || message.includes('429')) {
		return 'RateLimited';
	}
	if (
		message.includes('503') ||
		message.includes('service unavailable') ||
		message.includes('econnreset') ||
		message.includes('etimedout') ||
		message.includes('unable_to_lock_row')
	) {
		return 'TransientUnavailable';
	}
	return 'Unknown';
}

export function errorMessageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
