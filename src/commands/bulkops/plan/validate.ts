/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import chalk from 'chalk';
import { SfCommand, Flags } from '@salesforce/sf-plugins-core';
import { Messages } from '@salesforce/core';
import type { OperationIntent } from '../../../types/index.js';
import { ConnectionExecutor, ConnectionSchemaProvider } from '../../../utils/connectionExecutor.js';
import { errorMessageOf, SchemaMismatchError, ValidationError } from '../../../utils/errors.js';
import { Orchestrator } from '../../../utils/orchestrator.js';
import { readConfigFile, readPlanFile } from '../../../utils/planFile.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-bulkops', 'bulkops.plan.validate');

export default class BulkopsPlanValidate extends SfCommand<void> {
	public static readonly summary = messages.getMessage('summary');
	public static readonly description = messages.getMessage('description');
	public static readonly examples = messages.getMessages('examples');

	public static readonly flags = {
		'target-org': Flags.requiredOrg({
			summary: messages.getMessage('flags.target-org.summary'),
		}),
		plan: Flags.file({
			char: 'p',
			summary: messages.getMessage('flags.plan.summary'),
			required: true,
			exists: true,
		}),
		config: Flags.file({
			char: 'c',
			summary: messages.getMessage('flags.config.summary'),
			exists: true,
		}),
	};

	public async run(): Promise<void> {
		const { flags } = await this.parse(BulkopsPlanValidate);
		const conn = flags['target-org'].getConnection();
		const userInfo = await conn.identity();

		this.log(`Connected to org: ${userInfo.username}`);

		let intents: OperationIntent[];
		try {
			intents = readPlanFile(flags.plan, this.warn.bind(this));
		} catch (err) {
			this.error(errorMessageOf(err));
		}

		const orchestrator = new Orchestrator({
			executor: new ConnectionExecutor(conn),
			schemaProvider: new ConnectionSchemaProvider(conn),
			config: readConfigFile(flags.config),
		});

		let failed = 0;
		for (const [index, intent] of intents.entries()) {
			const label = `Step ${index + 1} (${intent.operation} ${intent.sobject})`;
			try {
				// eslint-disable-next-line no-await-in-loop
				const { plan, preflightScore } = await orchestrator.prepare(intent, { dryRun: true });
				this.log(chalk.green(`✔ ${label}: ${plan.records.length} record(s), score ${preflightScore.total} (${preflightScore.rating})`));
				for (const warning of plan.warnings) this.warn(`${label}: ${warning.message}`);
				for (const finding of preflightScore.findings) {
					if (finding.delta < 0) this.log(chalk.yellow(`  ${finding.ruleId} ${finding.message}`));
				}
			} catch (err) {
				failed++;
				if (err instanceof ValidationError || err instanceof SchemaMismatchError) {
					for (const issue of err.issues) this.warn(`${label}: ${issue.message}`);
				}
				this.log(chalk.red(`✖ ${label}: ${errorMessageOf(err)}`));
			}
		}

		if (failed > 0) {
			this.error(`Plan validation failed for ${failed} step(s). Fix the above issues.`);
		} else {
			this.logSuccess('Plan is valid and ready to run.');
		}
	}
}
