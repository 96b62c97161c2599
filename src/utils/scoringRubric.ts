/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type {
	ErrorCode,
	ObjectSchema,
	OperationOutcome,
	OperationPlan,
	RubricCategory,
	SObjectRecord,
} from '../types/index.js';

export const CATEGORY_MAX: Readonly<Record<RubricCategory, number>> = Object.freeze({
	queryEfficiency: 25,
	bulkSafety: 25,
	dataIntegrity: 20,
	security: 20,
	testPatterns: 15,
	cleanupIsolation: 15,
	documentation: 10,
});

export const CATEGORIES: readonly RubricCategory[] = [
	'queryEfficiency',
	'bulkSafety',
	'dataIntegrity',
	'security',
	'testPatterns',
	'cleanupIsolation',
	'documentation',
];

export const MAX_TOTAL = Object.values(CATEGORY_MAX).reduce((sum, max) => sum + max, 0);

export type ScoringSettings = {
	syncThreshold: number;
	bulkBoundary: number;
	maxRowsPerBatch: number;
	maxRetries: number;
};

export type ScoringContext = {
	plan: OperationPlan;
	outcome?: OperationOutcome;
	settings: ScoringSettings;
	schema?: ObjectSchema;
};

export type RubricRule = {
	id: string;
	category: RubricCategory;
	/** Points awarded (positive rule) or taken (negative rule) when the rule fires. */
	points: number;
	description: string;
	evaluate(context: ScoringContext): boolean;
};

// ---------- sensitive data ----------

export type SensitiveMatch = {
	kind: 'ssn' | 'card' | 'awsKey';
	recordIndex: number;
	field: string;
};

const SSN = /\b(?!000|666|9\d\d)\d{3}-(?!00)\d{2}-(?!0000)\d{4}\b/;
const CARD_CANDIDATE = /\b\d(?:[ -]?\d){12,18}\b/g;
const AWS_ACCESS_KEY = /\bAKIA[0-9A-Z]{16}\b/;

export function luhnValid(digits: string): boolean {
	let sum = 0;
	let double = false;
	for (let i = digits.length - 1; i >= 0; i--) {
		let digit = digits.charCodeAt(i) - 48;
		if (double) {
			digit *= 2;
			if (digit > 9) digit -= 9;
		}
		sum += digit;
		double = !double;
	}
	return sum % 10 === 0;
}

function containsCardNumber(text: string): boolean {
	for (const candidate of text.match(CARD_CANDIDATE) ?? []) {
		const digits = candidate.replace(/[ -]/g, '');
		if (digits.length >= 13 && digits.length <= 19 && luhnValid(digits)) return true;
	}
	return false;
}

export function findSensitiveData(records: readonly SObjectRecord[]): SensitiveMatch[] {
	const matches: SensitiveMatch[] = [];
	for (const [recordIndex, record] of records.entries()) {
		for (const [field, value] of Object.entries(record)) {
			if (typeof value !== 'string' && typeof value !== 'number') continue;
			const text = String(value);
			if (SSN.test(text)) matches.push({ kind: 'ssn', recordIndex, field });
			else if (containsCardNumber(text)) matches.push({ kind: 'card', recordIndex, field });
			else if (AWS_ACCESS_KEY.test(text)) matches.push({ kind: 'awsKey', recordIndex, field });
		}
	}
	return matches;
}

// ---------- helpers ----------

const REJECTION_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
	'ValidationFailed',
	'DuplicateValue',
	'InvalidReference',
	'LimitConfiguration',
]);

function issuesQuery(plan: OperationPlan): boolean {
	return plan.query !== undefined;
}

function hasWhere(query: string): boolean {
	return /\bWHERE\b/i.test(query);
}

function hasLimit(query: string): boolean {
	return /\bLIMIT\s+\d+/i.test(query);
}

function selectsEverything(query: string): boolean {
	return /^\s*SELECT\s+\*/i.test(query) || /\bFIELDS\s*\(\s*(ALL|CUSTOM)\s*\)/i.test(query);
}

function rowOutcomes(outcome?: OperationOutcome): Array<{ success: boolean; errorCode?: ErrorCode }> {
	return outcome ? outcome.batches.flatMap((batch) => batch.outcomes) : [];
}

function isBlank(value: unknown): boolean {
	return value === undefined || value === null || value === '';
}

// ---------- rubric ----------

export const DEFAULT_RUBRIC: readonly RubricRule[] = Object.freeze([
	{
		id: 'QE-SELECTIVE-FIELDS',
		category: 'queryEfficiency',
		points: 10,
		description: 'Query selects named fields only',
		evaluate: ({ plan }): boolean => !issuesQuery(plan) || !selectsEverything(plan.query ?? ''),
	},
	{
		id: 'QE-FILTERED',
		category: 'queryEfficiency',
		points: 8,
		description: 'Query filters rows with a WHERE clause',
		evaluate: ({ plan }): boolean => !issuesQuery(plan) || hasWhere(plan.query ?? ''),
	},
	{
		id: 'QE-BOUNDED',
		category: 'queryEfficiency',
		points: 7,
		description: 'Query is bounded by LIMIT or runs as a bulk export',
		evaluate: ({ plan }): boolean => !issuesQuery(plan) || plan.kind === 'BulkExport' || hasLimit(plan.query ?? ''),
	},
	{
		id: 'QE-UNBOUNDED-SCAN',
		category: 'queryEfficiency',
		points: -10,
		description: 'Synchronous query scans the whole object without WHERE or LIMIT',
		evaluate: ({ plan }): boolean =>
			plan.kind === 'Query' && issuesQuery(plan) && !hasWhere(plan.query ?? '') && !hasLimit(plan.query ?? ''),
	},
	{
		id: 'BS-WITHIN-QUOTA',
		category: 'bulkSafety',
		points: 10,
		description: 'Every batch stays within the per-call row quota',
		evaluate: ({ plan, outcome, settings }): boolean => {
			if (plan.chunkSizeHint !== undefined && plan.chunkSizeHint > settings.maxRowsPerBatch) return false;
			if (!outcome) return true;
			return outcome.batches.every(
				(batch) =>
					batch.outcomes.length <= settings.maxRowsPerBatch &&
					batch.outcomes.every((row) => row.errorCode !== 'LimitConfiguration')
			);
		},
	},
	{
		id: 'BS-ASYNC-FOR-VOLUME',
		category: 'bulkSafety',
		points: 10,
		description: 'Volumes at or above the sync threshold may run as bulk jobs',
		evaluate: ({ plan, settings }): boolean => plan.records.length < settings.syncThreshold || plan.mode !== 'sync',
	},
	{
		id: 'BS-RETRY-ENABLED',
		category: 'bulkSafety',
		points: 5,
		description: 'Rate-limited and transient failures are retried',
		evaluate: ({ settings }): boolean => settings.maxRetries > 0,
	},
	{
		id: 'BS-SYNC-AT-VOLUME',
		category: 'bulkSafety',
		points: -10,
		description: 'Plan forces per-record calls at bulk volume',
		evaluate: ({ plan, settings }): boolean => plan.mode === 'sync' && plan.records.length >= settings.syncThreshold,
	},
	{
		id: 'BS-RETRY-EXHAUSTED',
		category: 'bulkSafety',
		points: -5,
		description: 'Rows failed after using their whole retry budget',
		evaluate: ({ outcome }): boolean => rowOutcomes(outcome).some((row) => row.errorCode === 'RetryExhausted'),
	},
	{
		id: 'DI-REQUIRED-FIELDS',
		category: 'dataIntegrity',
		points: 8,
		description: 'Every inserted record carries all required fields',
		evaluate: ({ plan, schema }): boolean => {
			if (!schema || (plan.mutation !== 'Insert' && plan.mutation !== 'Upsert')) return true;
			const required = schema.fields.filter((field) => field.required).map((field) => field.name);
			return plan.records.every((record) => required.every((name) => !isBlank(record[name])));
		},
	},
	{
		id: 'DI-EXTERNAL-ID',
		category: 'dataIntegrity',
		points: 6,
		description: 'Upserts match on a declared external id',
		evaluate: ({ plan }): boolean => plan.mutation !== 'Upsert' || plan.externalIdField !== undefined,
	},
	{
		id: 'DI-PICKLIST-VALUES',
		category: 'dataIntegrity',
		points: 6,
		description: 'Picklist values are all known to the schema',
		evaluate: ({ plan }): boolean => !plan.warnings.some((warning) => warning.code === 'InvalidPicklistValue'),
	},
	{
		id: 'DI-REJECTED-ROWS',
		category: 'dataIntegrity',
		points: -10,
		description: 'The org rejected rows as invalid, duplicate or oversized',
		evaluate: ({ outcome }): boolean =>
			rowOutcomes(outcome).some((row) => row.errorCode !== undefined && REJECTION_CODES.has(row.errorCode)),
	},
	{
		id: 'SEC-USER-MODE',
		category: 'security',
		points: 10,
		description: 'Runs with the user’s field and sharing access',
		evaluate: ({ plan }): boolean => plan.accessMode === 'user',
	},
	{
		id: 'SEC-NO-SENSITIVE-DATA',
		category: 'security',
		points: 10,
		description: 'No record holds a recognized sensitive value',
		evaluate: ({ plan }): boolean => findSensitiveData(plan.records).length === 0,
	},
	{
		id: 'SEC-SENSITIVE-DATA',
		category: 'security',
		points: -10,
		description: 'Records hold an SSN, card number or cloud access key',
		evaluate: ({ plan }): boolean => findSensitiveData(plan.records).length > 0,
	},
	{
		id: 'TP-BULK-BOUNDARY',
		category: 'testPatterns',
		points: 8,
		description: 'Record count crosses the configured bulk-test boundary',
		evaluate: ({ plan, settings }): boolean => plan.records.length > settings.bulkBoundary,
	},
	{
		id: 'TP-EDGE-CASES',
		category: 'testPatterns',
		points: 7,
		description: 'Generated data includes edge-case records',
		evaluate: ({ plan }): boolean => (plan.generation?.edgeCaseFraction ?? 0) > 0,
	},
	{
		id: 'CI-CLEANUP-PREDICATE',
		category: 'cleanupIsolation',
		points: 5,
		description: 'A cleanup predicate was generated',
		evaluate: ({ outcome }): boolean => (outcome?.cleanupPredicates.length ?? 0) > 0,
	},
	{
		id: 'CI-TRACKED-COMMITS',
		category: 'cleanupIsolation',
		points: 5,
		description: 'Every committed row is in the trace log',
		evaluate: ({ outcome }): boolean =>
			outcome !== undefined && rowOutcomes(outcome).filter((row) => row.success).length === outcome.traces.length,
	},
	{
		id: 'CI-ROLLBACK-MARKER',
		category: 'cleanupIsolation',
		points: 5,
		description: 'A rollback marker was taken before the first write',
		evaluate: ({ outcome }): boolean => outcome?.rollbackMarker !== undefined,
	},
	{
		id: 'DOC-PURPOSE',
		category: 'documentation',
		points: 6,
		description: 'The operation states its purpose',
		evaluate: ({ plan }): boolean => (plan.description ?? '').trim() !== '',
	},
	{
		id: 'DOC-LABELLED',
		category: 'documentation',
		points: 4,
		description: 'The operation carries a label',
		evaluate: ({ plan }): boolean => (plan.label ?? '').trim() !== '',
	},
] satisfies RubricRule[]);
