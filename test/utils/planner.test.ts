/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../src/utils/config.js';
import {
	InvalidFieldValueError,
	MissingRequiredFieldError,
	SchemaMismatchError,
	UnknownFieldError,
	ValidationError,
} from '../../src/utils/errors.js';
import { normalizeOperationKind, RequestPlanner, resolveRecordCount } from '../../src/utils/planner.js';
import { validatePlanStructure } from '../../src/utils/validator.js';
import { widgetSchema } from '../helpers/schemas.js';

const planner = new RequestPlanner();

function planError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error('expected the call to throw');
}

describe('normalizeOperationKind', () => {
	it('should accept aliases in any case and punctuation', () => {
		expect(normalizeOperationKind('INSERT')).toBe('Insert');
		expect(normalizeOperationKind('create')).toBe('Insert');
		expect(normalizeOperationKind('bulk-import')).toBe('BulkImport');
		expect(normalizeOperationKind('tree')).toBe('TreeImport');
	});

	it('should reject an unknown operation and list the known ones', () => {
		expect(() => normalizeOperationKind('merge')).toThrow(
			'Unknown operation "merge". Use one of: Query, Insert, Update, Delete, Upsert, BulkImport, BulkExport, TreeImport.'
		);
	});
});

describe('RequestPlanner.plan', () => {
	it('should canonicalize field names to the schema spelling', () => {
		const plan = planner.plan({ operation: 'insert', sobject: 'widget', records: [{ name: 'Bolt', SKU__C: 'B-1' }] }, widgetSchema);

		expect(plan.sobject).toBe('Widget');
		expect(plan.mutation).toBe('Insert');
		expect(plan.records).toEqual([{ Name: 'Bolt', Sku__c: 'B-1' }]);
		expect(Object.isFrozen(plan.records[0])).toBe(true);
	});

	it('should collect a missing required field on every record and throw the first', () => {
		const error = planError(() =>
			planner.plan(
				{ operation: 'Insert', sobject: 'Widget', records: [{ Sku__c: 'A' }, { Sku__c: 'B' }, { Sku__c: 'C' }] },
				widgetSchema
			)
		);

		expect(error).toBeInstanceOf(MissingRequiredFieldError);
		if (!(error instanceof MissingRequiredFieldError)) return;
		expect(error.field).toBe('Name');
		expect(error.recordIndex).toBe(0);
		expect(error.message).toBe('Record 0 is missing required field "Name" on Widget.');
		expect(error.issues.map((issue) => issue.recordIndex)).toEqual([0, 1, 2]);
	});

	it('should require an Id for updates and deletes', () => {
		expect(() => planner.plan({ operation: 'update', sobject: 'Widget', records: [{ Name: 'x' }] }, widgetSchema)).toThrow(
			'Record 0 is missing required field "Id" on Widget.'
		);
	});

	it('should reject fields the object does not have', () => {
		expect(() =>
			planner.plan({ operation: 'insert', sobject: 'Widget', records: [{ Name: 'x', Colour__c: 'red' }] }, widgetSchema)
		).toThrow(UnknownFieldError);
	});

	it('should reject values of the wrong type', () => {
		expect(() =>
			planner.plan({ operation: 'insert', sobject: 'Widget', records: [{ Name: 'x', Quantity__c: 'ten' }] }, widgetSchema)
		).toThrow(InvalidFieldValueError);
	});

	it('should warn about unknown picklist values without failing', () => {
		const plan = planner.plan(
			{ operation: 'insert', sobject: 'Widget', records: [{ Name: 'x', Status__c: 'Broken' }] },
			widgetSchema
		);

		expect(plan.warnings).toEqual([
			{ code: 'InvalidPicklistValue', field: 'Status__c', recordIndex: 0, message: '"Broken" is not a known value of Status__c' },
		]);
	});

	it('should need an external id for upserts', () => {
		expect(() => planner.plan({ operation: 'upsert', sobject: 'Widget', records: [] }, widgetSchema)).toThrow(
			'An upsert on Widget needs an external id field.'
		);
		expect(planner.plan({ operation: 'upsert', sobject: 'Widget', externalId: 'sku__c', records: [] }, widgetSchema).externalIdField).toBe(
			'Sku__c'
		);
	});

	it('should reject an upsert record without an external id value', () => {
		const error = planError(() =>
			planner.plan(
				{ operation: 'upsert', sobject: 'Widget', externalId: 'Sku__c', records: [{ Name: 'no key' }, { Name: 'k', Sku__c: 'K-1' }] },
				widgetSchema
			)
		);

		expect(error).toBeInstanceOf(SchemaMismatchError);
		expect(error).toMatchObject({
			message: 'Record 0 has no value for external id field "Sku__c".',
			issues: [{ code: 'MissingExternalId', field: 'Sku__c', recordIndex: 0, message: 'Missing external id value for "Sku__c"' }],
		});
	});

	it('should check the object a query reads from and the fields it selects', () => {
		expect(() => planner.plan({ operation: 'query', sobject: 'Widget', query: 'SELECT Id, Name FROM Account' }, widgetSchema)).toThrow(
			SchemaMismatchError
		);
		expect(() => planner.plan({ operation: 'query', sobject: 'Widget', query: 'SELECT Id, Colour__c FROM Widget' }, widgetSchema)).toThrow(
			'The query selects field "Colour__c", which does not exist on Widget.'
		);
		expect(() => planner.plan({ operation: 'query', sobject: 'Widget' }, widgetSchema)).toThrow(ValidationError);
	});

	it('should reject a schema for another object', () => {
		expect(() => planner.plan({ operation: 'insert', sobject: 'Account', records: [] }, widgetSchema)).toThrow(
			'The plan targets Account but the schema describes Widget.'
		);
	});

	it('should pick the execution mode implied by the operation', () => {
		const mode = (operation: string, preference?: 'auto' | 'sync' | 'async'): string =>
			planner.plan({ operation, sobject: 'Widget', records: [], mode: preference }, widgetSchema).mode;

		expect(mode('BulkImport')).toBe('async');
		expect(mode('TreeImport')).toBe('sync');
		expect(mode('insert')).toBe('auto');
		expect(mode('BulkImport', 'sync')).toBe('sync');
	});
});

describe('resolveRecordCount', () => {
	it('should default bulk tests to one past the chunk boundary', () => {
		expect(resolveRecordCount({ purpose: 'bulk-test' }, DEFAULT_CONFIG)).toBe(251);
		expect(resolveRecordCount({ purpose: 'bulk-test' }, { bulkBoundary: 200, defaultGenerateCount: 3 })).toBe(201);
	});

	it('should prefer an explicit count and fall back to the general default', () => {
		expect(resolveRecordCount({ count: 7, purpose: 'bulk-test' }, DEFAULT_CONFIG)).toBe(7);
		expect(resolveRecordCount({}, DEFAULT_CONFIG)).toBe(3);
		expect(() => resolveRecordCount({ count: -1 }, DEFAULT_CONFIG)).toThrow('Record count must be a non-negative integer, got -1.');
	});
});

describe('validatePlanStructure', () => {
	it('should accept a well-formed plan', () => {
		const warnings: string[] = [];
		const plan = [
			{ operation: 'insert', sobject: 'Account', count: 2 },
			{ operation: 'insert', sobject: 'Contact', factory: { fields: { AccountId: '@{Account.Id}' } } },
		];

		expect(validatePlanStructure(plan, (msg) => warnings.push(msg))).toBe(true);
		expect(warnings).toEqual([]);
	});

	it('should report references to objects no earlier step creates', () => {
		const warnings: string[] = [];
		const plan = [{ operation: 'insert', sobject: 'Contact', records: [{ AccountId: '@{Account.Id}' }] }];

		expect(validatePlanStructure(plan, (msg) => warnings.push(msg))).toBe(false);
		expect(warnings).toEqual(['Step 1, record 0: Reference "Account" is not created by an earlier step.']);
	});

	it('should report every malformed step', () => {
		const warnings: string[] = [];

		expect(validatePlanStructure([{ sobject: 'Widget', mode: 'fast' }, 'oops'], (msg) => warnings.push(msg))).toBe(false);
		expect(warnings).toEqual([
			'Step 1: Missing or invalid "operation"',
			'Step 1: "mode" must be one of auto, sync, async',
			'Step 2: must be an object',
		]);
	});
});
