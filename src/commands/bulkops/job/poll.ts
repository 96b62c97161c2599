/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import chalk from 'chalk';
import { SfCommand, Flags } from '@salesforce/sf-plugins-core';
import { Messages } from '@salesforce/core';
import type { ExecutorRowResult } from '../../../types/index.js';
import { ConnectionExecutor } from '../../../utils/connectionExecutor.js';
import { errorMessageOf } from '../../../utils/errors.js';
import { traceEffectOf } from '../../../utils/executionEngine.js';
import { JobPoller } from '../../../utils/jobPoller.js';
import { DEFAULT_TRACE_LOG, loadTracker, saveTracker } from '../../../utils/planFile.js';
import { mutationFor, normalizeOperationKind } from '../../../utils/planner.js';
import type { RecordTracker } from '../../../utils/recordTracker.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-bulkops', 'bulkops.job.poll');

/**
 * Records the committed rows of a finished job. Returns how many traces were
 * added; rows without an id are skipped.
 */
export function trackJobResults(
	tracker: RecordTracker,
	sobject: string,
	operation: string,
	results: readonly ExecutorRowResult[]
): number {
	const kind = normalizeOperationKind(operation);
	const mutation = mutationFor(kind);
	if (!mutation) return 0;
	let tracked = 0;
	for (const row of results) {
		if (!row.success || !row.recordId) continue;
		tracker.record({
			sobject,
			operationKind: kind,
			effect: traceEffectOf(mutation, row.created),
			recordId: row.recordId,
		});
		tracked++;
	}
	return tracked;
}

export default class BulkopsJobPoll extends SfCommand<void> {
	public static readonly summary = messages.getMessage('summary');
	public static readonly description = messages.getMessage('description');
	public static readonly examples = messages.getMessages('examples');

	public static readonly flags = {
		'target-org': Flags.requiredOrg({
			summary: messages.getMessage('flags.target-org.summary'),
		}),
		'job-id': Flags.string({
			char: 'i',
			summary: messages.getMessage('flags.job-id.summary'),
			required: true,
		}),
		'batch-id': Flags.string({
			char: 'b',
			summary: messages.getMessage('flags.batch-id.summary'),
			required: true,
		}),
		rows: Flags.integer({
			summary: messages.getMessage('flags.rows.summary'),
			min: 0,
			default: 0,
		}),
		wait: Flags.integer({
			char: 'w',
			summary: messages.getMessage('flags.wait.summary'),
			min: 0,
			default: 10,
		}),
		track: Flags.boolean({
			summary: messages.getMessage('flags.track.summary'),
			default: false,
			dependsOn: ['sobject', 'operation'],
		}),
		sobject: Flags.string({
			char: 'o',
			summary: messages.getMessage('flags.sobject.summary'),
		}),
		operation: Flags.string({
			summary: messages.getMessage('flags.operation.summary'),
		}),
		'trace-log': Flags.string({
			summary: messages.getMessage('flags.trace-log.summary'),
			default: DEFAULT_TRACE_LOG,
		}),
	};

	public async run(): Promise<void> {
		const { flags } = await this.parse(BulkopsJobPoll);

		const conn = flags['target-org'].getConnection();
		const poller = new JobPoller(new ConnectionExecutor(conn));
		const handle = { id: flags['job-id'], batchId: flags['batch-id'] };

		this.log(chalk.cyan(`Polling job ${handle.id} for up to ${flags.wait} minute(s)...`));
		const result = await poller.repoll(handle, flags.rows, { waitMs: flags.wait * 60_000 });

		if (result.timedOut) {
			this.warn(`Job ${handle.id} is still ${result.backendState}. Poll it again later.`);
			return;
		}
		if (result.state !== 'JobComplete') {
			this.error(`Job ${handle.id} ended as ${result.state}: ${result.errorMessage ?? 'no details'}`);
		}

		const rows = result.results ?? [];
		const failed = rows.filter((row) => !row.success).length;
		this.log(chalk.green(`Job ${handle.id} completed: ${rows.length - failed} succeeded, ${failed} failed.`));

		if (flags.track && flags.sobject && flags.operation) {
			try {
				const tracker = loadTracker(flags['trace-log']);
				const tracked = trackJobResults(tracker, flags.sobject, flags.operation, rows);
				saveTracker(flags['trace-log'], tracker);
				this.logSuccess(`Recorded ${tracked} change(s) in ${flags['trace-log']}.`);
			} catch (err) {
				this.error(errorMessageOf(err));
			}
		}
	}
}
