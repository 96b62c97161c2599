/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type { PartialFailureError } from '../utils/errors.js';

export type FieldValue = string | number | boolean | null;

export type SObjectRecord = Record<string, FieldValue>;

export type OperationKind =
	| 'Query'
	| 'Insert'
	| 'Update'
	| 'Delete'
	| 'Upsert'
	| 'BulkImport'
	| 'BulkExport'
	| 'TreeImport';

// DML verbs understood by the Executor. Undelete is only issued by rollback.
export type MutationKind = 'Insert' | 'Update' | 'Delete' | 'Upsert' | 'Undelete';

export type PlanMutation = Exclude<MutationKind, 'Undelete'>;

export type ExecutionMode = 'sync' | 'async';

export type ModePreference = ExecutionMode | 'auto';

export type AccessMode = 'user' | 'system';

export type PlanPurpose = 'general' | 'bulk-test';

export type FieldDescriptor = {
	name: string;
	type: string; // describe type, e.g. "string", "reference", "picklist"
	required: boolean;
	picklistValues?: string[];
	isRelationship: boolean;
	relatedObject?: string;
	externalId?: boolean;
	length?: number;
};

export type ObjectSchema = {
	name: string;
	fields: FieldDescriptor[];
};

// Factory section of a plan file step. References use @{Parent.Id}.
export type FactoryTemplate = {
	fields?: Record<string, FieldValue>;
	edgeCases?: EdgeCaseOptions;
	seed?: number;
};

// One step of a plan file, before validation against the org schema.
export type OperationIntent = {
	operation: string;
	sobject: string;
	records?: SObjectRecord[];
	query?: string;
	externalId?: string;
	count?: number;
	purpose?: PlanPurpose;
	description?: string;
	label?: string;
	mode?: ModePreference;
	accessMode?: AccessMode;
	chunkSize?: number;
	factory?: FactoryTemplate;
};

export type PlanIssueCode =
	| 'UnknownOperation'
	| 'UnknownField'
	| 'MissingRequiredField'
	| 'InvalidFieldValue'
	| 'InvalidPicklistValue'
	| 'MissingExternalId'
	| 'ObjectMismatch'
	| 'MissingQuery'
	| 'BeforeImageUnavailable';

export type PlanIssue = {
	code: PlanIssueCode;
	message: string;
	field?: string;
	recordIndex?: number;
};

export type GenerationInfo = {
	count: number;
	edgeCaseFraction: number;
};

export type OperationPlan = {
	readonly kind: OperationKind;
	readonly mutation?: PlanMutation; // absent for Query and BulkExport
	readonly sobject: string;
	readonly records: readonly SObjectRecord[];
	readonly query?: string;
	readonly externalIdField?: string;
	readonly chunkSizeHint?: number;
	readonly mode: ModePreference;
	readonly accessMode: AccessMode;
	readonly purpose: PlanPurpose;
	readonly description?: string;
	readonly label?: string;
	readonly generation?: GenerationInfo;
	readonly warnings: readonly PlanIssue[];
};

export type BatchLimits = {
	maxRowsPerBatch: number;
	maxBytesPerBatch: number;
};

export type BatchRejection = {
	code: 'LimitConfiguration';
	message: string;
};

export type Batch = {
	readonly index: number;
	readonly offset: number; // position of the first record in the plan's record set
	readonly records: readonly SObjectRecord[];
	readonly estimatedBytes: number;
	readonly rejection?: BatchRejection;
};

export type ErrorCode =
	| 'RateLimited'
	| 'TransientUnavailable'
	| 'ValidationFailed'
	| 'DuplicateValue'
	| 'InvalidReference'
	| 'EntityNotFound'
	| 'RetryExhausted'
	| 'TimedOut'
	| 'JobFailed'
	| 'LimitConfiguration'
	| 'Cancelled'
	| 'Unknown';

export type RowOutcome = {
	readonly index: number;
	readonly recordId?: string;
	readonly success: boolean;
	readonly created?: boolean;
	readonly errorCode?: ErrorCode;
	readonly errorMessage?: string;
	readonly attempts: number;
};

// Raw per-row answer from an Executor; errorCode is the backend's status code.
export type ExecutorRowResult = {
	success: boolean;
	recordId?: string;
	created?: boolean;
	errorCode?: string;
	errorMessage?: string;
};

export type MutationRequest = {
	kind: MutationKind;
	sobject: string;
	externalIdField?: string;
};

export type JobState = 'Queued' | 'InProgress' | 'JobComplete' | 'JobFailed' | 'Aborted';

export type JobHandle = {
	readonly id: string;
	readonly batchId?: string;
};

export type JobStatus = {
	state: JobState;
	results?: ExecutorRowResult[]; // in submitted order, present once complete
	errorMessage?: string;
};

export type Executor = {
	runSingle(request: MutationRequest, record: SObjectRecord): Promise<ExecutorRowResult>;
	submitJob(request: MutationRequest, records: readonly SObjectRecord[]): Promise<JobHandle>;
	pollJob(handle: JobHandle): Promise<JobStatus>;
	cancelJob(handle: JobHandle): Promise<boolean>;
	runQuery(text: string): AsyncIterable<SObjectRecord>;
	setSavepoint?(): Promise<string>;
	rollbackToSavepoint?(savepoint: string): Promise<void>;
};

export type SchemaProvider = {
	describeObject(name: string): Promise<ObjectSchema>;
};

export type BatchJobSummary = {
	handle: JobHandle;
	state: JobState;
	backendState: JobState;
	timedOut: boolean;
};

export type BatchResult = {
	readonly batchIndex: number;
	readonly offset: number;
	readonly mode: ExecutionMode;
	readonly outcomes: readonly RowOutcome[];
	readonly successCount: number;
	readonly failureCount: number;
	readonly retries: number;
	readonly partialFailure: boolean;
	readonly partialFailureError?: PartialFailureError;
	readonly jobs: readonly BatchJobSummary[];
};

export type TraceEffect = 'created' | 'updated' | 'deleted';

export type RecordTrace = {
	readonly seq: number;
	readonly sobject: string;
	readonly operationKind: OperationKind;
	readonly effect: TraceEffect;
	readonly recordId: string;
	readonly timestamp: string;
	readonly before?: SObjectRecord;
};

// Opaque point-in-time reference into a trace log.
export type RollbackMarker = string & { readonly __brand: 'RollbackMarker' };

export type CleanupStrategy = 'trackedIds' | 'namePattern' | 'createdWindow';

export type CleanupPredicate = {
	sobject: string;
	strategy: CleanupStrategy;
	where: string;
	soql: string;
	apex: string;
};

export type RubricCategory =
	| 'queryEfficiency'
	| 'bulkSafety'
	| 'dataIntegrity'
	| 'security'
	| 'testPatterns'
	| 'cleanupIsolation'
	| 'documentation';

export type Rating = 'Excellent' | 'Very Good' | 'Good' | 'Needs Work' | 'Critical';

export type Finding = {
	ruleId: string;
	category: RubricCategory;
	delta: number;
	message: string;
};

export type ScoreReport = {
	readonly categoryScores: Readonly<Record<RubricCategory, number>>;
	readonly total: number;
	readonly rating: Rating;
	readonly findings: readonly Finding[];
};

// What the post-execution score looks at.
export type OperationOutcome = {
	batches: readonly BatchResult[];
	traces: readonly RecordTrace[];
	cleanupPredicates: readonly CleanupPredicate[];
	rollbackMarker?: RollbackMarker;
};

export type EdgeCaseOptions = {
	fraction: number;
	nulls?: boolean;
	boundaryStrings?: boolean;
	outOfRange?: boolean;
};

export type FailureDetail = {
	index: number;
	errorCode: ErrorCode;
	errorMessage?: string;
};

export type PendingJob = {
	batchIndex: number;
	offset: number;
	rowCount: number;
	handle: JobHandle;
	backendState: JobState;
};

export type OperationCounts = {
	created: number;
	updated: number;
	deleted: number;
	failed: number;
};

export type OperationReport = {
	operationKind: OperationKind;
	objectName: string;
	totalRecords: number;
	counts: OperationCounts;
	recordsRead?: number;
	sampleRecordIds: string[];
	scoreReport: ScoreReport;
	preflightScore: ScoreReport;
	cleanupPredicate?: CleanupPredicate;
	rollbackMarker: RollbackMarker;
	failures: FailureDetail[];
	pendingJobs: PendingJob[];
	batches: number;
	warnings: PlanIssue[];
};
