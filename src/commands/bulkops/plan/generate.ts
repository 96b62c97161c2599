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
import type { ObjectSchema, OperationIntent } from '../../../types/index.js';
import { ConnectionSchemaProvider } from '../../../utils/connectionExecutor.js';
import { errorMessageOf } from '../../../utils/errors.js';
import { factoryFieldsFor, orderIntents, type OrderedPlan } from '../../../utils/planOrder.js';

Messages.importMessagesDirectoryFromMetaUrl(import.meta.url);
const messages = Messages.loadMessages('sf-bulkops', 'bulkops.plan.generate');

export default class BulkopsPlanGenerate extends SfCommand<void> {
	public static readonly summary = messages.getMessage('summary');
	public static readonly description = messages.getMessage('description');
	public static readonly examples = messages.getMessages('examples');

	public static readonly flags = {
		'target-org': Flags.requiredOrg({
			summary: messages.getMessage('flags.target-org.summary'),
		}),
		objects: Flags.string({
			summary: messages.getMessage('flags.objects.summary'),
			required: true,
		}),
		count: Flags.integer({
			summary: messages.getMessage('flags.count.summary'),
			min: 0,
		}),
		'bulk-test': Flags.boolean({
			summary: messages.getMessage('flags.bulk-test.summary'),
			default: false,
		}),
		seed: Flags.integer({
			summary: messages.getMessage('flags.seed.summary'),
		}),
		output: Flags.string({
			summary: messages.getMessage('flags.output.summary'),
			default: 'bulkops-plan.json',
		}),
	};

	public async run(): Promise<void> {
		const { flags } = await this.parse(BulkopsPlanGenerate);

		const conn = flags['target-org'].getConnection();
		const userInfo = await conn.identity();

		this.log(chalk.green(`Connected to org: ${userInfo.username}`));

		const sobjectNames = flags.objects
			.split(',')
			.map((name) => name.trim())
			.filter((name) => name !== '');
		const planned = new Set(sobjectNames.map((name) => name.toLowerCase()));
		const provider = new ConnectionSchemaProvider(conn);
		const schemas = new Map<string, ObjectSchema>();

		for (const sobject of sobjectNames) {
			this.log(chalk.cyan(`🔍 Describing ${sobject}...`));
			// eslint-disable-next-line no-await-in-loop
			schemas.set(sobject.toLowerCase(), await provider.describeObject(sobject));
		}

		const intents: OperationIntent[] = sobjectNames.map((sobject) => {
			const schema = schemas.get(sobject.toLowerCase());
			for (const field of schema?.fields ?? []) {
				if (field.required && field.relatedObject && !planned.has(field.relatedObject.toLowerCase())) {
					this.warn(`${sobject}.${field.name} needs a ${field.relatedObject} record; add ${field.relatedObject} to the plan or create it first.`);
				}
			}
			return {
				operation: 'Insert',
				sobject,
				count: flags.count,
				purpose: flags['bulk-test'] ? 'bulk-test' : undefined,
				factory: { fields: schema ? factoryFieldsFor(schema, planned) : {}, seed: flags.seed },
			};
		});

		let ordered: OrderedPlan;
		try {
			ordered = orderIntents(intents, schemas);
		} catch (err) {
			this.error(errorMessageOf(err));
		}

		for (const edge of ordered.dropped) {
			this.log(chalk.yellow(`🔁 Dropped optional lookup ${edge.from}.${edge.field} -> ${edge.to} to break a cycle`));
		}

		const outputPath = path.resolve(flags.output);
		fs.writeFileSync(outputPath, JSON.stringify(ordered.intents, null, 2));
		this.log(chalk.green(`✅ Plan generated and saved to ${outputPath}`));
	}
}
