/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LimitConfigurationError, ValidationError } from '../../src/utils/errors.js';
import { loadTracker, readConfigFile, readPlanFile, saveTracker } from '../../src/utils/planFile.js';

describe('plan files', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bulkops-'));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	function write(name: string, content: string): string {
		const file = path.join(dir, name);
		fs.writeFileSync(file, content);
		return file;
	}

	it('should read a valid plan', () => {
		const file = write('plan.json', JSON.stringify([{ operation: 'insert', sobject: 'Widget', count: 2 }]));

		expect(readPlanFile(file, () => {})).toEqual([{ operation: 'insert', sobject: 'Widget', count: 2 }]);
	});

	it('should report structural problems before refusing the plan', () => {
		const file = write('plan.json', JSON.stringify([{ operation: 'insert' }]));
		const warnings: string[] = [];

		expect(() => readPlanFile(file, (msg) => warnings.push(msg))).toThrow(ValidationError);
		expect(warnings).toEqual(['Step 1: Missing or invalid "sobject"']);
	});

	it('should refuse a file that is not JSON', () => {
		const file = write('plan.json', '[{');

		expect(() => readPlanFile(file, () => {})).toThrow(ValidationError);
	});

	it('should resolve a config file against the defaults', () => {
		expect(readConfigFile(write('config.json', '{"syncThreshold": 25}')).syncThreshold).toBe(25);
		expect(readConfigFile(undefined).syncThreshold).toBe(200);
		expect(() => readConfigFile(write('bad.json', '{"syncThreshold": -1}'))).toThrow(LimitConfigurationError);
	});

	it('should start an empty trace log and round-trip a saved one', () => {
		const file = path.join(dir, 'nested', 'trace.ndjson');
		const tracker = loadTracker(file);
		expect(tracker.traces).toEqual([]);

		tracker.record({ sobject: 'Widget', operationKind: 'Insert', effect: 'created', recordId: 'a01' });
		saveTracker(file, tracker);

		expect(loadTracker(file).traces).toEqual(tracker.traces);
	});
});
