/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type {
	FieldDescriptor,
	FieldValue,
	GenerationInfo,
	ModePreference,
	ObjectSchema,
	OperationIntent,
	OperationKind,
	OperationPlan,
	PlanIssue,
	PlanMutation,
	SObjectRecord,
} from '../types/index.js';
import type { OrchestratorConfig } from './config.js';
import {
	errorMessages as messages,
	InvalidFieldValueError,
	MissingRequiredFieldError,
	SchemaMismatchError,
	UnknownFieldError,
	ValidationError,
} from './errors.js';
import { validateFieldValueType } from './validator.js';

const OPERATION_ALIASES: Record<string, OperationKind> = {
	query: 'Query',
	select: 'Query',
	insert: 'Insert',
	create: 'Insert',
	update: 'Update',
	delete: 'Delete',
	destroy: 'Delete',
	upsert: 'Upsert',
	bulkimport: 'BulkImport',
	import: 'BulkImport',
	bulkexport: 'BulkExport',
	export: 'BulkExport',
	treeimport: 'TreeImport',
	tree: 'TreeImport',
};

const MUTATIONS: Partial<Record<OperationKind, PlanMutation>> = {
	Insert: 'Insert',
	Update: 'Update',
	Delete: 'Delete',
	Upsert: 'Upsert',
	BulkImport: 'Insert',
	TreeImport: 'Insert',
};

// Kinds whose execution mode is implied when the intent leaves it on auto.
const PREFERRED_MODE: Partial<Record<OperationKind, ModePreference>> = {
	BulkImport: 'async',
	BulkExport: 'async',
	TreeImport: 'sync',
};

export function normalizeOperationKind(raw: string): OperationKind {
	const kind = OPERATION_ALIASES[raw.replace(/[^a-z]/gi, '').toLowerCase()];
	if (!kind) {
		const known = [...new Set(Object.values(OPERATION_ALIASES))].join(', ');
		throw new ValidationError(messages.getMessage('error.UnknownOperation', [raw, known]), [
			{ code: 'UnknownOperation', message: `Unknown operation "${raw}"` },
		]);
	}
	return kind;
}

export function mutationFor(kind: OperationKind): PlanMutation | undefined {
	return MUTATIONS[kind];
}

export function isReadKind(kind: OperationKind): boolean {
	return kind === 'Query' || kind === 'BulkExport';
}

/**
 * How many records a generated data set should have. An explicit count wins;
 * bulk tests default to one record past the configured bulk-test boundary.
 */
export function resolveRecordCount(
	intent: Pick<OperationIntent, 'count' | 'purpose'>,
	config: Pick<OrchestratorConfig, 'bulkBoundary' | 'defaultGenerateCount'>
): number {
	if (intent.count !== undefined) {
		if (!Number.isInteger(intent.count) || intent.count < 0) {
			throw new ValidationError(messages.getMessage('error.InvalidCount', [intent.count]));
		}
		return intent.count;
	}
	return intent.purpose === 'bulk-test' ? config.bulkBoundary + 1 : config.defaultGenerateCount;
}

function fieldIndex(schema: ObjectSchema): Map<string, FieldDescriptor> {
	const index = new Map<string, FieldDescriptor>();
	for (const field of schema.fields) index.set(field.name.toLowerCase(), field);
	return index;
}

function isBlank(value: FieldValue | undefined): boolean {
	return value === undefined || value === null || value === '';
}

const SELECT_LIST = /^\s*SELECT\s+(.+?)\s+FROM\s+(\w+)/is;

/**
 * Validates an intent against its object's schema and turns it into an
 * immutable OperationPlan. Every issue is collected; the first fatal one is
 * thrown as a typed error carrying the full list.
 */
export class RequestPlanner {
	public plan(intent: OperationIntent, schema: ObjectSchema, generation?: GenerationInfo): OperationPlan {
		const kind = normalizeOperationKind(intent.operation);
		const mutation = mutationFor(kind);

		if (intent.sobject.toLowerCase() !== schema.name.toLowerCase()) {
			throw new SchemaMismatchError(messages.getMessage('error.ObjectMismatch', [intent.sobject, schema.name]), [
				{ code: 'ObjectMismatch', message: `Plan targets ${intent.sobject}, schema is ${schema.name}` },
			]);
		}

		const fields = fieldIndex(schema);
		const issues: PlanIssue[] = [];
		const warnings: PlanIssue[] = [];
		let fatal: Error | undefined;
		const fail = (error: Error, issue: PlanIssue): void => {
			issues.push(issue);
			fatal ??= error;
		};

		let externalIdField: string | undefined;
		if (kind === 'Upsert') {
			externalIdField = this.resolveExternalId(intent, schema, fields);
		}

		let query: string | undefined;
		if (isReadKind(kind)) {
			query = this.checkQuery(kind, intent, schema, fields);
		}

		const records: SObjectRecord[] = [];
		if (mutation) {
			for (const [recordIndex, source] of (intent.records ?? []).entries()) {
				const record: SObjectRecord = {};
				for (const [rawName, value] of Object.entries(source)) {
					const field = fields.get(rawName.toLowerCase());
					if (!field) {
						if (rawName.toLowerCase() === 'id') {
							record.Id = value;
							continue;
						}
						fail(
							new UnknownFieldError(
								messages.getMessage('error.UnknownField', [recordIndex, rawName, schema.name]),
								rawName,
								recordIndex,
								issues
							),
							{ code: 'UnknownField', field: rawName, recordIndex, message: `Unknown field "${rawName}"` }
						);
						continue;
					}

					const reason = validateFieldValueType(field, value);
					if (reason) {
						fail(new InvalidFieldValueError(field.name, recordIndex, reason, issues), {
							code: 'InvalidFieldValue',
							field: field.name,
							recordIndex,
							message: reason,
						});
					} else if (
						field.picklistValues?.length &&
						typeof value === 'string' &&
						!field.picklistValues.includes(value)
					) {
						warnings.push({
							code: 'InvalidPicklistValue',
							field: field.name,
							recordIndex,
							message: `"${value}" is not a known value of ${field.name}`,
						});
					}
					record[field.name] = value;
				}

				const missing = this.missingRequired(mutation, record, schema);
				for (const name of missing) {
					fail(new MissingRequiredFieldError(schema.name, name, recordIndex, issues), {
						code: 'MissingRequiredField',
						field: name,
						recordIndex,
						message: `Missing required field "${name}"`,
					});
				}
				if (externalIdField && externalIdField !== 'Id' && isBlank(record[externalIdField])) {
					fail(
						new SchemaMismatchError(
							messages.getMessage('error.MissingExternalIdValue', [recordIndex, externalIdField]),
							issues
						),
						{
							code: 'MissingExternalId',
							field: externalIdField,
							recordIndex,
							message: `Missing external id value for "${externalIdField}"`,
						}
					);
				}
				records.push(record);
			}
		}

		if (fatal) throw fatal;

		const plan: OperationPlan = {
			kind,
			mutation,
			sobject: schema.name,
			records: Object.freeze(records.map((record) => Object.freeze(record))),
			query,
			externalIdField,
			chunkSizeHint: intent.chunkSize,
			mode: intent.mode && intent.mode !== 'auto' ? intent.mode : PREFERRED_MODE[kind] ?? 'auto',
			accessMode: intent.accessMode ?? 'user',
			purpose: intent.purpose ?? 'general',
			description: intent.description?.trim() ? intent.description.trim() : undefined,
			label: intent.label?.trim() ? intent.label.trim() : undefined,
			generation,
			warnings: Object.freeze(warnings),
		};
		return Object.freeze(plan);
	}

	private missingRequired(mutation: PlanMutation, record: SObjectRecord, schema: ObjectSchema): string[] {
		if (mutation === 'Update' || mutation === 'Delete') {
			return isBlank(record.Id) ? ['Id'] : [];
		}
		return schema.fields
			.filter((field) => field.required && isBlank(record[field.name]))
			.map((field) => field.name);
	}

	private resolveExternalId(
		intent: OperationIntent,
		schema: ObjectSchema,
		fields: Map<string, FieldDescriptor>
	): string {
		if (!intent.externalId) {
			throw new SchemaMismatchError(messages.getMessage('error.MissingExternalId', [schema.name]), [
				{ code: 'MissingExternalId', message: `Upsert on ${schema.name} needs an external id` },
			]);
		}
		const field = fields.get(intent.externalId.toLowerCase());
		if (!field) {
			throw new SchemaMismatchError(
				messages.getMessage('error.UnknownExternalId', [intent.externalId, schema.name]),
				[{ code: 'MissingExternalId', field: intent.externalId, message: 'External id field not found' }]
			);
		}
		if (field.externalId === false && field.name !== 'Id') {
			throw new SchemaMismatchError(messages.getMessage('error.NotExternalId', [field.name, schema.name]), [
				{ code: 'MissingExternalId', field: field.name, message: 'Field is not an external id' },
			]);
		}
		return field.name;
	}

	private checkQuery(
		kind: OperationKind,
		intent: OperationIntent,
		schema: ObjectSchema,
		fields: Map<string, FieldDescriptor>
	): string {
		const query = intent.query?.trim();
		if (!query) {
			throw new ValidationError(messages.getMessage('error.MissingQuery', [kind, schema.name]), [
				{ code: 'MissingQuery', message: 'Query text is required' },
			]);
		}

		const match = SELECT_LIST.exec(query);
		if (!match) return query;

		const [, fieldListRaw, from] = match;
		if (from.toLowerCase() !== schema.name.toLowerCase()) {
			throw new SchemaMismatchError(messages.getMessage('error.QueryObjectMismatch', [from, schema.name]), [
				{ code: 'ObjectMismatch', message: `Query reads ${from}` },
			]);
		}

		for (const field of fieldListRaw.split(',').map((f) => f.trim())) {
			// relationship paths, functions, FIELDS(...) and subqueries are left to the org
			if (!/^\w+$/.test(field)) continue;
			if (!fields.has(field.toLowerCase()) && field.toLowerCase() !== 'id') {
				throw new UnknownFieldError(messages.getMessage('error.UnknownQueryField', [field, schema.name]), field, undefined, [
					{ code: 'UnknownField', field, message: `Query selects unknown field "${field}"` },
				]);
			}
		}
		return query;
	}
}
