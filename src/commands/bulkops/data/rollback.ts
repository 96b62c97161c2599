/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import chalk from 'chalk';
import inquirer from 'inquirer';
import { SfCommand, Flags } from '@salesforce/sf-plugins-core';
import { Messages } from '@salesforce/core';
import { ConnectionExecutor } from '../../../utils/connectionExecutor.js';
import { errorMessageOf, RollbackError } from '../../../utils/errors.js';
import { DEFAULT_TRACE_LOG, loadTracker, saveTracker } from '../../../utils/planFile.js';
import { parseRollbackMarker, RollbackManager, type RecordTracker } from '../../../utils/recordTracker.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-bulkops', 'bulkops.data.rollback');

export default class BulkopsDataRollback extends SfCommand<void> {
	public static readonly summary = messages.getMessage('summary');
	public static readonly description = messages.getMessage('description');
	public static readonly examples = messages.getMessages('examples');

	public static readonly flags = {
		'target-org': Flags.requiredOrg({
			summary: messages.getMessage('flags.target-org.summary'),
		}),
		'trace-log': Flags.file({
			summary: messages.getMessage('flags.trace-log.summary'),
			default: DEFAULT_TRACE_LOG,
			exists: true,
		}),
		marker: Flags.string({
			char: 'm',
			summary: messages.getMessage('flags.marker.summary'),
		}),
		'no-prompt': Flags.boolean({
			summary: messages.getMessage('flags.no-prompt.summary'),
			default: false,
		}),
	};

	public async run(): Promise<void> {
		const { flags } = await this.parse(BulkopsDataRollback);
		const traceLog = flags['trace-log'];
		const marker = flags.marker;

		const tracker = this.loadTrace(traceLog, marker);
		const open = tracker.since(marker).filter((trace) => !tracker.isUndone(trace));
		if (open.length === 0) {
			this.log('Nothing to roll back.');
			return;
		}

		const byObject = new Map<string, number>();
		for (const trace of open) byObject.set(trace.sobject, (byObject.get(trace.sobject) ?? 0) + 1);
		this.log(chalk.cyan(`Rolling back ${open.length} change(s) recorded after marker ${marker ?? '0'}:`));
		for (const [sobject, count] of byObject) this.log(chalk.gray(`  ${sobject}: ${count}`));

		if (!flags['no-prompt']) {
			const answer = await inquirer.prompt<{ proceed: boolean }>([
				{
					type: 'confirm',
					name: 'proceed',
					message: `Undo ${open.length} change(s) in the org?`,
					default: false,
				},
			]);
			if (!answer.proceed) {
				this.log('Rollback cancelled.');
				return;
			}
		}

		const conn = flags['target-org'].getConnection();
		const manager = new RollbackManager(tracker, new ConnectionExecutor(conn));
		try {
			const summary = await manager.rollback(marker);
			this.logSuccess(`Undid ${summary.undone.length} change(s)${summary.skipped ? `, ${summary.skipped} already undone` : ''}.`);
		} catch (err) {
			if (err instanceof RollbackError) {
				for (const failure of err.failures) {
					this.log(chalk.red(`  ✖ ${failure.trace.sobject} ${failure.trace.recordId}: ${failure.reason}`));
				}
			}
			this.error(errorMessageOf(err));
		} finally {
			saveTracker(traceLog, tracker);
		}
	}

	private loadTrace(traceLog: string, marker?: string): RecordTracker {
		try {
			if (marker !== undefined) parseRollbackMarker(marker);
			return loadTracker(traceLog);
		} catch (err) {
			this.error(errorMessageOf(err));
		}
	}
}
