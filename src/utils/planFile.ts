/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { OperationIntent } from '../types/index.js';
import { type OrchestratorConfig, resolveConfig } from './config.js';
import { errorMessageOf, ValidationError } from './errors.js';
import { RecordTracker } from './recordTracker.js';
import { validatePlanStructure } from './validator.js';

export const DEFAULT_TRACE_LOG = path.join('.bulkops', 'trace.ndjson');

function readJson(filePath: string, what: string): unknown {
	const content = fs.readFileSync(filePath, 'utf-8');
	try {
		return JSON.parse(content);
	} catch (err) {
		throw new ValidationError(`Invalid JSON in ${what} ${filePath}: ${errorMessageOf(err)}`);
	}
}

/** Reads a plan file and checks its structure. Every problem goes to `warn` before the throw. */
export function readPlanFile(filePath: string, warn: (msg: string) => void): OperationIntent[] {
	const plan = readJson(filePath, 'plan file');
	if (!validatePlanStructure(plan, warn)) {
		throw new ValidationError(`Plan ${filePath} is not valid. Fix the issues above.`);
	}
	return plan;
}

export function readConfigFile(filePath: string | undefined): OrchestratorConfig {
	return resolveConfig(filePath ? readJson(filePath, 'config file') : {});
}

/** Loads the trace log, or starts an empty one when the file does not exist yet. */
export function loadTracker(filePath: string): RecordTracker {
	if (!fs.existsSync(filePath)) return new RecordTracker();
	return RecordTracker.fromNdjson(fs.readFileSync(filePath, 'utf-8'));
}

export function saveTracker(filePath: string, tracker: RecordTracker): void {
	fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
	fs.writeFileSync(filePath, tracker.toNdjson());
}
