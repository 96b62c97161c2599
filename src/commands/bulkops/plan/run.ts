/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import { SfCommand, Flags } from '@salesforce/sf-plugins-core';
import { Messages } from '@salesforce/core';
import type { OperationIntent, OperationReport, SObjectRecord } from '../../../types/index.js';
import { ConnectionExecutor, ConnectionSchemaProvider } from '../../../utils/connectionExecutor.js';
import { errorMessageOf, ValidationError } from '../../../utils/errors.js';
import { Orchestrator } from '../../../utils/orchestrator.js';
import { DEFAULT_TRACE_LOG, loadTracker, readConfigFile, readPlanFile, saveTracker } from '../../../utils/planFile.js';
import { serializeReports } from '../../../utils/report.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-bulkops', 'bulkops.plan.run');

export default class BulkopsPlanRun extends SfCommand<void> {
	public static readonly summary = messages.getMessage('summary');
	public static readonly description = messages.getMessage('description');
	public static readonly examples = messages.getMessages('examples');

	public static readonly flags = {
		'target-org': Flags.requiredOrg({
			summary: messages.getMessage('flags.target-org.summary'),
		}),
		plan: Flags.file({
			summary: messages.getMessage('flags.plan.summary'),
			char: 'p',
			required: true,
			exists: true,
		}),
		config: Flags.file({
			summary: messages.getMessage('flags.config.summary'),
			char: 'c',
			exists: true,
		}),
		dryrun: Flags.boolean({
			summary: messages.getMessage('flags.dryrun.summary'),
			default: false,
		}),
		save: Flags.string({
			summary: messages.getMessage('flags.save.summary'),
		}),
		report: Flags.string({
			summary: messages.getMessage('flags.report.summary'),
			default: 'bulkops-report.ndjson',
		}),
		'trace-log': Flags.string({
			summary: messages.getMessage('flags.trace-log.summary'),
			default: DEFAULT_TRACE_LOG,
		}),
	};

	public async run(): Promise<void> {
		const { flags } = await this.parse(BulkopsPlanRun);

		const isDryRun = flags['dryrun'];
		const traceLog = flags['trace-log'];

		if (isDryRun) this.log('⚙️  Dry run mode enabled. No records will be written.');

		const conn = flags['target-org'].getConnection();
		const userInfo = await conn.identity();
		this.log(`Connected to org: ${userInfo.username}`);

		const intents = readPlanFile(flags.plan, this.warn.bind(this));
		const tracker = loadTracker(traceLog);
		const orchestrator = new Orchestrator({
			executor: new ConnectionExecutor(conn),
			schemaProvider: new ConnectionSchemaProvider(conn),
			config: readConfigFile(flags.config),
			tracker,
		});

		if (isDryRun) {
			await this.dryRun(orchestrator, intents, flags.save);
			return;
		}

		const controller = new AbortController();
		const onInterrupt = (): void => {
			this.warn('Interrupted. Cancelling running jobs...');
			controller.abort();
		};
		process.once('SIGINT', onInterrupt);

		const reports: OperationReport[] = [];
		try {
			for (const [index, intent] of intents.entries()) {
				this.log(chalk.cyan(`\n▶ Step ${index + 1}: ${intent.operation} ${intent.sobject}`));
				// eslint-disable-next-line no-await-in-loop
				const report = await orchestrator.run(intent, { signal: controller.signal });
				reports.push(report);
				this.logReport(report);
			}
		} catch (err) {
			if (err instanceof ValidationError) {
				for (const issue of err.issues) this.warn(issue.message);
			}
			this.error(`Plan stopped: ${errorMessageOf(err)}`);
		} finally {
			process.removeListener('SIGINT', onInterrupt);
			saveTracker(traceLog, tracker);
			fs.writeFileSync(path.resolve(flags.report), serializeReports(reports));
			this.log(chalk.gray(`Trace log: ${path.resolve(traceLog)}`));
			this.log(chalk.gray(`Report: ${path.resolve(flags.report)}`));
		}

		this.logSuccess(`Ran ${reports.length} step(s).`);
	}

	private async dryRun(orchestrator: Orchestrator, intents: OperationIntent[], savePath?: string): Promise<void> {
		const output: Record<string, SObjectRecord[]> = {};

		for (const [index, intent] of intents.entries()) {
			// eslint-disable-next-line no-await-in-loop
			const { plan, preflightScore, batches } = await orchestrator.prepare(intent, { dryRun: true });
			this.log(chalk.magenta(`\n▶ Step ${index + 1}: ${plan.kind} ${plan.sobject} (${plan.records.length} records)`));
			this.log(chalk.gray(`  Batches: ${batches.length}, mode: ${plan.mode}`));
			this.log(chalk.gray(`  Pre-check score: ${preflightScore.total} (${preflightScore.rating})`));
			for (const warning of plan.warnings) this.warn(warning.message);
			output[`${index + 1}:${plan.sobject}`] = [...plan.records];
		}

		if (savePath) {
			const outputPath = path.resolve(savePath);
			fs.writeFileSync(outputPath, JSON.stringify(output, null, 2));
			this.log(chalk.green(`✅ Dry run output saved to ${outputPath}`));
		}
	}

	private logReport(report: OperationReport): void {
		const { counts } = report;
		if (report.recordsRead !== undefined) {
			this.log(chalk.green(`  Read ${report.recordsRead} record(s).`));
		} else {
			const line = `  created ${counts.created}, updated ${counts.updated}, deleted ${counts.deleted}, failed ${counts.failed} of ${report.totalRecords}`;
			this.log(counts.failed > 0 ? chalk.yellow(line) : chalk.green(line));
		}
		this.log(chalk.gray(`  Score: ${report.scoreReport.total} (${report.scoreReport.rating}), marker ${report.rollbackMarker}`));

		for (const failure of report.failures.slice(0, 5)) {
			this.log(chalk.red(`  ✖ record ${failure.index}: ${failure.errorCode} ${failure.errorMessage ?? ''}`));
		}
		if (report.failures.length > 5) this.log(chalk.red(`  … ${report.failures.length - 5} more failure(s)`));

		for (const job of report.pendingJobs) {
			this.warn(`Job ${job.handle.id} was still ${job.backendState} at the deadline; check it with "sf bulkops job poll".`);
		}
		for (const warning of report.warnings) this.warn(warning.message);
	}
}
