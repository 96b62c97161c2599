/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type { DescribeSObjectResult } from '@jsforce/jsforce-node';
import { Connection, Logger } from '@salesforce/core';
import { getString, isArray, isBoolean, isDictionary, isString } from '@salesforce/ts-types';
import type {
	Executor,
	ExecutorRowResult,
	FieldDescriptor,
	JobHandle,
	JobState,
	JobStatus,
	MutationRequest,
	ObjectSchema,
	SchemaProvider,
	SObjectRecord,
} from '../types/index.js';
import { escapeSoqlLiteral } from './cleanupQuery.js';
import { errorMessageOf } from './errors.js';
import { isFieldValue } from './validator.js';

type DescribeField = {
	name: string;
	type: string;
	createable: boolean;
	updateable: boolean;
	nillable: boolean;
	defaultedOnCreate: boolean;
	picklistValues?: Array<{ value: string; active: boolean }> | null;
	referenceTo?: string[] | null;
	externalId?: boolean;
	idLookup?: boolean;
	length?: number;
};

/** The part of a describe result the schema mapping reads. */
export type DescribeLike = {
	name: string;
	fields: DescribeField[];
};

function toFieldDescriptor(field: DescribeField): FieldDescriptor {
	const picklistValues = (field.picklistValues ?? []).filter((entry) => entry.active).map((entry) => entry.value);
	const relatedObject = field.referenceTo?.[0];
	return {
		name: field.name,
		type: field.type,
		required: field.createable && !field.nillable && !field.defaultedOnCreate,
		picklistValues: picklistValues.length > 0 ? picklistValues : undefined,
		isRelationship: field.type === 'reference',
		relatedObject,
		externalId: field.name === 'Id' ? true : field.externalId === true,
		length: field.length && field.length > 0 ? field.length : undefined,
	};
}

/** Keeps the fields a DML call can write, plus Id. */
export function toObjectSchema(describe: DescribeLike): ObjectSchema {
	return {
		name: describe.name,
		fields: describe.fields
			.filter((field) => field.name === 'Id' || field.createable || field.updateable)
			.map(toFieldDescriptor),
	};
}

const BATCH_STATES: Record<string, JobState> = {
	Queued: 'Queued',
	InProgress: 'InProgress',
	Completed: 'JobComplete',
	Failed: 'JobFailed',
	NotProcessed: 'Aborted',
};

function firstError(errors: unknown): { code?: string; message?: string } {
	if (!isArray(errors) || errors.length === 0) return {};
	const [first] = errors;
	if (isString(first)) {
		// bulk results report "STATUS_CODE:message"
		const separator = first.indexOf(':');
		return separator > 0 ? { code: first.slice(0, separator), message: first.slice(separator + 1).trim() } : { message: first };
	}
	return { code: getString(first, 'statusCode') ?? undefined, message: getString(first, 'message') ?? undefined };
}

/** Narrows a REST save result or a bulk result row. */
export function toRowResult(raw: unknown): ExecutorRowResult {
	if (!isDictionary(raw)) return { success: false, errorCode: 'Unknown', errorMessage: 'Unrecognized result' };
	const success = isBoolean(raw.success) ? raw.success : raw.success === 'true';
	const recordId = getString(raw, 'id') ?? getString(raw, 'Id');
	const created = isBoolean(raw.created) ? raw.created : raw.created === undefined ? undefined : raw.created === 'true';
	if (success) return { success, recordId: recordId ?? undefined, created };
	const { code, message } = firstError(raw.errors);
	return { success, recordId: recordId ?? undefined, errorCode: code, errorMessage: message };
}

function toFieldRecord(raw: unknown): SObjectRecord {
	const record: SObjectRecord = {};
	if (!isDictionary(raw)) return record;
	for (const [key, value] of Object.entries(raw)) {
		if (key !== 'attributes' && isFieldValue(value)) record[key] = value;
	}
	return record;
}

// A REST error carries the org's status code; hand it back as a row result.
function fromThrown(error: unknown): ExecutorRowResult {
	const code = error instanceof Error && 'errorCode' in error && isString(error.errorCode) ? error.errorCode : undefined;
	if (!code) throw error;
	return { success: false, errorCode: code, errorMessage: errorMessageOf(error) };
}

function idOf(record: SObjectRecord): string {
	return typeof record.Id === 'string' ? record.Id : '';
}

/**
 * Executor over an authenticated org connection: REST sObject calls for
 * single rows, Bulk API batches for jobs, anonymous Apex for undelete.
 * A job handle carries the bulk job id and its single batch id.
 */
export class ConnectionExecutor implements Executor {
	private readonly logger = Logger.childFromRoot('bulkops:connection');

	public constructor(private readonly conn: Connection) {}

	public async runSingle(request: MutationRequest, record: SObjectRecord): Promise<ExecutorRowResult> {
		const sobject = this.conn.sobject(request.sobject);
		try {
			switch (request.kind) {
				case 'Insert':
					return toRowResult(await sobject.create(record));
				case 'Update':
					return toRowResult(await sobject.update({ ...record, Id: idOf(record) }));
				case 'Upsert':
					return toRowResult(await sobject.upsert(record, request.externalIdField ?? 'Id'));
				case 'Delete':
					return toRowResult(await sobject.destroy(idOf(record)));
				case 'Undelete':
					return await this.undelete(request.sobject, idOf(record));
			}
		} catch (error) {
			return fromThrown(error);
		}
	}

	public async submitJob(request: MutationRequest, records: readonly SObjectRecord[]): Promise<JobHandle> {
		if (request.kind === 'Undelete') throw new Error('Undelete is not available as a bulk job');
		const operation = request.kind === 'Insert' ? 'insert' : request.kind === 'Update' ? 'update' : request.kind === 'Upsert' ? 'upsert' : 'delete';
		const job = this.conn.bulk.createJob(request.sobject, operation, { extIdField: request.externalIdField });
		const batch = job.createBatch();

		const batchId = await new Promise<string>((resolve, reject) => {
			batch.on('error', reject);
			batch.on('queue', (info: unknown) => {
				const id = getString(info, 'id');
				if (id) resolve(id);
				else reject(new Error('Bulk batch was queued without an id'));
			});
			batch.execute([...records]);
		});
		const jobId = job.id;
		if (!jobId) throw new Error('Bulk job was created without an id');

		await job.close();
		this.logger.debug(`submitted bulk ${operation} job ${jobId} (batch ${batchId}) with ${records.length} row(s)`);
		return { id: jobId, batchId };
	}

	public async pollJob(handle: JobHandle): Promise<JobStatus> {
		const batch = this.conn.bulk.job(handle.id).batch(handle.batchId ?? '');
		const info: unknown = await batch.check();
		const state = BATCH_STATES[getString(info, 'state') ?? ''] ?? 'InProgress';
		const errorMessage = getString(info, 'stateMessage') ?? undefined;

		if (state !== 'JobComplete') return { state, errorMessage };

		const rows: unknown = await batch.retrieve();
		return { state, results: isArray(rows) ? rows.map(toRowResult) : [], errorMessage };
	}

	public async cancelJob(handle: JobHandle): Promise<boolean> {
		await this.conn.bulk.job(handle.id).abort();
		return true;
	}

	public async *runQuery(text: string): AsyncIterable<SObjectRecord> {
		let result = await this.conn.query(text, { autoFetch: false });
		for (;;) {
			for (const raw of result.records) yield toFieldRecord(raw);
			if (result.done || !result.nextRecordsUrl) return;
			// eslint-disable-next-line no-await-in-loop
			result = await this.conn.queryMore(result.nextRecordsUrl);
		}
	}

	private async undelete(sobject: string, id: string): Promise<ExecutorRowResult> {
		const apex = `undelete [SELECT Id FROM ${sobject} WHERE Id = '${escapeSoqlLiteral(id)}' ALL ROWS];`;
		const result = await this.conn.tooling.executeAnonymous(apex);
		if (result.success) return { success: true, recordId: id };
		const message = result.exceptionMessage ?? result.compileProblem ?? 'Undelete failed';
		return {
			success: false,
			recordId: id,
			errorCode: /ENTITY_IS_DELETED|List has no rows/i.test(message) ? 'NOT_FOUND' : undefined,
			errorMessage: message,
		};
	}
}

export class ConnectionSchemaProvider implements SchemaProvider {
	public constructor(private readonly conn: Connection) {}

	public async describeObject(name: string): Promise<ObjectSchema> {
		const describe: DescribeSObjectResult = await this.conn.sobject(name).describe();
		return toObjectSchema(describe);
	}
}
