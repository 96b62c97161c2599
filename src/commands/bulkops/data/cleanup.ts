/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import chalk from 'chalk';
import { SfCommand, Flags } from '@salesforce/sf-plugins-core';
import { Messages } from '@salesforce/core';
import type { CleanupPredicate } from '../../../types/index.js';
import type { CleanupPattern } from '../../../utils/cleanupQuery.js';
import { errorMessageOf, errorMessages, ValidationError } from '../../../utils/errors.js';
import { DEFAULT_TRACE_LOG, loadTracker } from '../../../utils/planFile.js';
import { createRollbackMarker, parseRollbackMarker, RecordTracker } from '../../../utils/recordTracker.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-bulkops', 'bulkops.data.cleanup');

export type CleanupFlags = {
	strategy: string;
	sobject?: string;
	pattern?: string;
	field?: string;
	from?: string;
	to?: string;
	since?: string;
};

function invalid(reason: string): ValidationError {
	return new ValidationError(errorMessages.getMessage('error.InvalidCleanupPattern', [reason]));
}

/** Turns command flags into a cleanup pattern. */
export function cleanupPatternFrom(flags: CleanupFlags): CleanupPattern {
	switch (flags.strategy) {
		case 'trackedIds': {
			if (flags.since === undefined) return { strategy: 'trackedIds', sobject: flags.sobject };
			const { seq, savepoint } = parseRollbackMarker(flags.since);
			return { strategy: 'trackedIds', sobject: flags.sobject, since: createRollbackMarker(seq, savepoint) };
		}
		case 'namePattern':
			if (!flags.sobject || !flags.pattern) throw invalid('--sobject and --pattern are required for namePattern');
			return { strategy: 'namePattern', sobject: flags.sobject, pattern: flags.pattern, field: flags.field };
		case 'createdWindow':
			if (!flags.sobject || !flags.from) throw invalid('--sobject and --from are required for createdWindow');
			return { strategy: 'createdWindow', sobject: flags.sobject, from: flags.from, to: flags.to };
		default:
			throw invalid(`unknown strategy "${flags.strategy}"`);
	}
}

export default class BulkopsDataCleanup extends SfCommand<void> {
	public static readonly summary = messages.getMessage('summary');
	public static readonly description = messages.getMessage('description');
	public static readonly examples = messages.getMessages('examples');

	public static readonly flags = {
		strategy: Flags.string({
			char: 's',
			summary: messages.getMessage('flags.strategy.summary'),
			options: ['trackedIds', 'namePattern', 'createdWindow'],
			default: 'trackedIds',
		}),
		'trace-log': Flags.string({
			summary: messages.getMessage('flags.trace-log.summary'),
			default: DEFAULT_TRACE_LOG,
		}),
		sobject: Flags.string({
			char: 'o',
			summary: messages.getMessage('flags.sobject.summary'),
		}),
		pattern: Flags.string({
			summary: messages.getMessage('flags.pattern.summary'),
		}),
		field: Flags.string({
			summary: messages.getMessage('flags.field.summary'),
		}),
		from: Flags.string({
			summary: messages.getMessage('flags.from.summary'),
		}),
		to: Flags.string({
			summary: messages.getMessage('flags.to.summary'),
		}),
		since: Flags.string({
			summary: messages.getMessage('flags.since.summary'),
		}),
	};

	public async run(): Promise<void> {
		const { flags } = await this.parse(BulkopsDataCleanup);

		let predicates: CleanupPredicate[];
		try {
			const pattern = cleanupPatternFrom(flags);
			const tracker = pattern.strategy === 'trackedIds' ? loadTracker(flags['trace-log']) : new RecordTracker();
			predicates = tracker.generateCleanupQuery(pattern);
		} catch (err) {
			this.error(errorMessageOf(err));
		}

		if (predicates.length === 0) {
			this.log('No tracked records to clean up.');
			return;
		}

		for (const predicate of predicates) {
			this.log(chalk.cyan(`\n▶ ${predicate.sobject} (${predicate.strategy})`));
			this.log(`  SOQL: ${predicate.soql}`);
			this.log(`  Apex: ${predicate.apex}`);
		}
	}
}
