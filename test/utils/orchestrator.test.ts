/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { describe, expect, it } from 'vitest';
import type { OperationIntent, RecordTrace, SObjectRecord } from '../../src/types/index.js';
import type { ConfigOverrides } from '../../src/utils/config.js';
import { MissingRequiredFieldError, SchemaMismatchError, UnresolvedRelationshipError } from '../../src/utils/errors.js';
import { Orchestrator } from '../../src/utils/orchestrator.js';
import { RecordTracker, type TraceInput } from '../../src/utils/recordTracker.js';
import { FakeClock } from '../helpers/fakeClock.js';
import { InMemoryExecutor } from '../helpers/inMemoryExecutor.js';
import { StaticSchemaProvider } from '../helpers/schemas.js';

function setup(
	config: ConfigOverrides = {},
	executor = new InMemoryExecutor({ unique: { Widget: ['Sku__c'] } }),
	tracker?: RecordTracker
): { orchestrator: Orchestrator; executor: InMemoryExecutor; schemas: StaticSchemaProvider } {
	const schemas = new StaticSchemaProvider();
	const clock = new FakeClock();
	const orchestrator = new Orchestrator({ executor, schemaProvider: schemas, config, tracker, clock, random: () => 0 });
	return { orchestrator, executor, schemas };
}

function widgets(count: number, prefix = 'S'): SObjectRecord[] {
	return Array.from({ length: count }, (_, i) => ({ Name: `Widget ${i + 1}`, Sku__c: `${prefix}-${i + 1}` }));
}

/** Refuses to log a third change. */
class FullTracker extends RecordTracker {
	public record(input: TraceInput): RecordTrace {
		if (this.traces.length >= 2) throw new Error('trace log is full');
		return super.record(input);
	}
}

describe('Orchestrator', () => {
	it('should reject a plan missing a required field before anything reaches the org', async () => {
		const { orchestrator, executor } = setup();

		await expect(
			orchestrator.run({ operation: 'insert', sobject: 'Widget', records: [{ Sku__c: 'A' }, { Sku__c: 'B' }, { Sku__c: 'C' }] })
		).rejects.toBeInstanceOf(MissingRequiredFieldError);
		expect(executor.calls).toEqual([]);
		expect(executor.submitted).toEqual([]);
		expect(orchestrator.tracker.traces).toHaveLength(0);
	});

	it('should generate, batch and insert a counted data set', async () => {
		const { orchestrator, executor } = setup({ limits: { maxRowsPerBatch: 100 } });

		const report = await orchestrator.run({ operation: 'insert', sobject: 'Widget', count: 250 });

		expect(report.batches).toBe(3);
		expect(report.totalRecords).toBe(250);
		expect(report.counts).toEqual({ created: 250, updated: 0, deleted: 0, failed: 0 });
		expect(report.sampleRecordIds).toHaveLength(10);
		expect(executor.count('Widget')).toBe(250);
		expect(orchestrator.tracker.traces).toHaveLength(250);
	});

	it('should keep no more than maxConcurrentBatches batches running', async () => {
		const { orchestrator, executor } = setup({ maxConcurrentBatches: 2, rowConcurrency: 1, limits: { maxRowsPerBatch: 2 } });
		executor.latency = async (): Promise<void> => {
			for (let tick = 0; tick < 5; tick++) {
				// eslint-disable-next-line no-await-in-loop
				await Promise.resolve();
			}
		};

		const report = await orchestrator.run({ operation: 'insert', sobject: 'Widget', records: widgets(10) });

		expect(report.batches).toBe(5);
		expect(report.counts.created).toBe(10);
		expect(executor.maxInFlight).toBe(2);
	});

	it('should account for every input record once', async () => {
		const { orchestrator } = setup();
		const records = widgets(10);
		records[8] = { Name: 'Copy A', Sku__c: 'S-1' };
		records[9] = { Name: 'Copy B', Sku__c: 'S-2' };

		const report = await orchestrator.run({ operation: 'insert', sobject: 'Widget', records });
		const { created, updated, deleted, failed } = report.counts;

		expect(created + updated + deleted + failed).toBe(10);
		expect(failed).toBe(2);
		expect(report.failures.map((failure) => failure.errorCode)).toEqual(['DuplicateValue', 'DuplicateValue']);
	});

	it('should create on the first upsert and update on the second', async () => {
		const { orchestrator, executor } = setup();
		const intent = { operation: 'upsert', sobject: 'Widget', externalId: 'Sku__c', records: widgets(3) };

		const first = await orchestrator.run(intent);
		const second = await orchestrator.run(intent);

		expect(first.counts).toMatchObject({ created: 3, updated: 0 });
		expect(second.counts).toMatchObject({ created: 0, updated: 3 });
		expect(executor.count('Widget')).toBe(3);
		expect(orchestrator.tracker.traces.slice(3).map((trace) => trace.before)).toEqual([
			{ Name: 'Widget 1' },
			{ Name: 'Widget 2' },
			{ Name: 'Widget 3' },
		]);
	});

	it('should refuse an upsert whose records lack the external id before touching the org', async () => {
		const { orchestrator, executor } = setup();
		const intent: OperationIntent = {
			operation: 'upsert',
			sobject: 'Widget',
			externalId: 'Sku__c',
			records: [{ Name: 'no key' }, { Name: 'k', Sku__c: 'K-1' }],
		};

		await expect(orchestrator.run(intent)).rejects.toBeInstanceOf(SchemaMismatchError);
		await expect(orchestrator.run(intent)).rejects.toBeInstanceOf(SchemaMismatchError);
		expect(executor.calls).toEqual([]);
		expect(executor.count('Widget')).toBe(0);
	});

	it('should restore updated values on rollback', async () => {
		const { orchestrator, executor } = setup();
		const id = executor.seed('Widget', { Name: 'Old', Quantity__c: 1 });

		const report = await orchestrator.run({ operation: 'update', sobject: 'Widget', records: [{ Id: id, Name: 'New' }] });
		expect(executor.rows('Widget')).toEqual([{ Name: 'New', Quantity__c: 1, Id: id }]);

		await orchestrator.rollbackManager.rollback(report.rollbackMarker);

		expect(executor.rows('Widget')).toEqual([{ Name: 'Old', Quantity__c: 1, Id: id }]);
	});

	it('should fail a batch that throws without stopping its siblings', async () => {
		const { orchestrator } = setup(
			{ limits: { maxRowsPerBatch: 2 }, maxConcurrentBatches: 1, rowConcurrency: 1 },
			undefined,
			new FullTracker(new FakeClock())
		);

		const report = await orchestrator.run({ operation: 'insert', sobject: 'Widget', records: widgets(6) });

		expect(report.batches).toBe(3);
		expect(report.counts).toEqual({ created: 2, updated: 0, deleted: 0, failed: 4 });
		expect(report.failures.map((failure) => [failure.index, failure.errorCode])).toEqual([
			[2, 'JobFailed'],
			[3, 'JobFailed'],
			[4, 'JobFailed'],
			[5, 'JobFailed'],
		]);
	});

	it('should build a cleanup predicate for the records it created', async () => {
		const { orchestrator, executor } = setup();

		const report = await orchestrator.run({ operation: 'insert', sobject: 'Widget', records: widgets(2) });
		const ids = executor.rows('Widget').map((row) => row.Id);

		expect(report.cleanupPredicate?.soql).toBe(`SELECT Id FROM Widget WHERE Id IN ('${ids[0]}', '${ids[1]}')`);
		expect(report.rollbackMarker).toBe('0');
	});

	it('should run later steps against parents created by earlier ones', async () => {
		const { orchestrator, executor } = setup();

		const [accounts, contacts] = await orchestrator.runAll([
			{ operation: 'insert', sobject: 'Account', count: 2 },
			{ operation: 'insert', sobject: 'Contact', count: 3, factory: { fields: { AccountId: '@{Account.Id}' } } },
		]);

		const accountIds = executor.rows('Account').map((row) => row.Id);
		expect(accounts.counts.created).toBe(2);
		expect(contacts.counts.created).toBe(3);
		expect(executor.rows('Contact').map((row) => row.AccountId)).toEqual([accountIds[0], accountIds[1], accountIds[0]]);
	});

	it('should resolve parent references and counters inside explicit records', async () => {
		const { orchestrator, executor } = setup();

		const [, contacts] = await orchestrator.runAll([
			{ operation: 'insert', sobject: 'Account', records: [{ Name: 'A' }] },
			{
				operation: 'insert',
				sobject: 'Contact',
				records: [
					{ LastName: 'x', AccountId: '@{Account.Id}' },
					{ LastName: 'y #{counter}', AccountId: '@{Account.Id}' },
				],
			},
		]);

		const [accountId] = executor.rows('Account').map((row) => row.Id);
		expect(contacts.counts.created).toBe(2);
		expect(executor.rows('Contact').map((row) => [row.LastName, row.AccountId])).toEqual([
			['x', accountId],
			['y 2', accountId],
		]);
	});

	it('should refuse an explicit record whose required parent was never created', async () => {
		const { orchestrator, executor } = setup();

		await expect(
			orchestrator.run({ operation: 'insert', sobject: 'Contact', records: [{ LastName: 'x', AccountId: '@{Account.Id}' }] })
		).rejects.toBeInstanceOf(UnresolvedRelationshipError);
		expect(executor.calls).toEqual([]);
	});

	it('should prepare a dry run without calling the org', async () => {
		const { orchestrator, executor } = setup();

		const prepared = await orchestrator.prepare({ operation: 'insert', sobject: 'Contact', count: 2 }, { dryRun: true });

		expect(prepared.plan.records.map((record) => record.AccountId)).toEqual(['000000000000000AAA', '000000000000000AAA']);
		expect(prepared.batches).toHaveLength(1);
		expect(prepared.preflightScore.total).toBeGreaterThan(0);
		expect(executor.calls).toEqual([]);
	});

	it('should count the rows a query reads', async () => {
		const { orchestrator, executor, schemas } = setup();
		const ids = [executor.seed('Widget', { Name: 'a' }), executor.seed('Widget', { Name: 'b' })];

		const report = await orchestrator.run({ operation: 'query', sobject: 'Widget', query: 'SELECT Id, Name FROM Widget' });
		await orchestrator.run({ operation: 'query', sobject: 'Widget', query: 'SELECT Id FROM Widget LIMIT 1' });

		expect(report.recordsRead).toBe(2);
		expect(report.sampleRecordIds).toEqual(ids);
		expect(report.counts).toEqual({ created: 0, updated: 0, deleted: 0, failed: 0 });
		expect(schemas.calls).toEqual(['Widget']);
	});
});
