/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { isArray, isBoolean, isDictionary, isNumber, isString } from '@salesforce/ts-types';
import type { FieldDescriptor, FieldValue, OperationIntent } from '../types/index.js';
import { isValidFakerExpression, suggestFakerAlternative } from './faker.js';

const MODES = ['auto', 'sync', 'async'];
const ACCESS_MODES = ['user', 'system'];
const PURPOSES = ['general', 'bulk-test'];
const WRITING_OPERATIONS = /^(insert|create|upsert|bulk-?import|import|tree-?import|tree)$/i;

const REFERENCE_PATTERN = /^@\{([^}]*)\}$/;
const SALESFORCE_ID = /^[a-zA-Z0-9]{15}([a-zA-Z0-9]{3})?$/;

export function isFieldValue(value: unknown): value is FieldValue {
	return value === null || isString(value) || isNumber(value) || isBoolean(value);
}

/** Parses `@{Account.Id}` into its object and field parts. */
export function parseReference(value: string): { sobject: string; field: string } | undefined {
	const match = REFERENCE_PATTERN.exec(value);
	if (!match) return undefined;
	const [sobject, field] = match[1].split('.');
	return sobject && field ? { sobject, field } : undefined;
}

function validateFieldMap(
	label: string,
	fields: unknown,
	createdBefore: Set<string>,
	warn: (msg: string) => void
): boolean {
	if (!isDictionary(fields)) {
		warn(`${label}: "fields" must be an object`);
		return false;
	}

	let valid = true;
	for (const [field, value] of Object.entries(fields)) {
		if (!isFieldValue(value)) {
			warn(`${label}: Field "${field}" must be a string, number, boolean or null`);
			valid = false;
			continue;
		}
		if (!isString(value)) continue;

		if (value.startsWith('@{') && value.endsWith('}')) {
			const reference = parseReference(value);
			if (!reference) {
				warn(`${label}: Invalid reference "${value}"`);
				valid = false;
			} else if (!createdBefore.has(reference.sobject.toLowerCase())) {
				warn(`${label}: Reference "${reference.sobject}" is not created by an earlier step.`);
				valid = false;
			}
		}

		if (value.startsWith('#{faker.') && value.endsWith('}') && !isValidFakerExpression(value)) {
			let message = `${label}: Field "${field}" has invalid faker expression: "${value}"`;
			const suggestion = suggestFakerAlternative(value);
			if (suggestion) {
				message += `\n  👉 Did you mean: "${suggestion}"?`;
			}
			warn(message);
			valid = false;
		}
	}
	return valid;
}

function validateOneOf(label: string, key: string, value: unknown, allowed: string[], warn: (msg: string) => void): boolean {
	if (value === undefined) return true;
	if (isString(value) && allowed.includes(value)) return true;
	warn(`${label}: "${key}" must be one of ${allowed.join(', ')}`);
	return false;
}

/**
 * Checks the shape of a parsed plan file. Reports every problem through `warn`
 * and narrows the value to OperationIntent[] when there were none.
 */
export function validatePlanStructure(plan: unknown, warn: (msg: string) => void): plan is OperationIntent[] {
	if (!isArray(plan)) {
		warn('The plan must be a JSON array of steps.');
		return false;
	}

	let hasError = false;
	const createdBefore = new Set<string>();

	for (const [index, step] of plan.entries()) {
		const label = `Step ${index + 1}`;
		if (!isDictionary(step)) {
			warn(`${label}: must be an object`);
			hasError = true;
			continue;
		}

		if (!step.sobject || !isString(step.sobject)) {
			warn(`${label}: Missing or invalid "sobject"`);
			hasError = true;
		}

		if (!step.operation || !isString(step.operation)) {
			warn(`${label}: Missing or invalid "operation"`);
			hasError = true;
		}

		if (step.count !== undefined && (!isNumber(step.count) || !Number.isInteger(step.count) || step.count < 0)) {
			warn(`${label}: "count" must be a non-negative integer`);
			hasError = true;
		}

		if (step.chunkSize !== undefined && (!isNumber(step.chunkSize) || !Number.isInteger(step.chunkSize) || step.chunkSize < 1)) {
			warn(`${label}: "chunkSize" must be a positive integer`);
			hasError = true;
		}

		for (const key of ['query', 'externalId', 'description', 'label'] as const) {
			if (step[key] !== undefined && !isString(step[key])) {
				warn(`${label}: "${key}" must be a string`);
				hasError = true;
			}
		}

		if (!validateOneOf(label, 'mode', step.mode, MODES, warn)) hasError = true;
		if (!validateOneOf(label, 'accessMode', step.accessMode, ACCESS_MODES, warn)) hasError = true;
		if (!validateOneOf(label, 'purpose', step.purpose, PURPOSES, warn)) hasError = true;

		if (step.records !== undefined) {
			if (!isArray(step.records)) {
				warn(`${label}: "records" must be an array`);
				hasError = true;
			} else {
				for (const [recordIndex, record] of step.records.entries()) {
					if (!validateFieldMap(`${label}, record ${recordIndex}`, record, createdBefore, warn)) hasError = true;
				}
			}
		}

		if (step.factory !== undefined) {
			if (!isDictionary(step.factory)) {
				warn(`${label}: "factory" must be an object`);
				hasError = true;
			} else {
				const { fields, edgeCases, seed } = step.factory;
				if (fields !== undefined && !validateFieldMap(label, fields, createdBefore, warn)) hasError = true;
				if (seed !== undefined && !isNumber(seed)) {
					warn(`${label}: "factory.seed" must be a number`);
					hasError = true;
				}
				if (edgeCases !== undefined) {
					if (!isDictionary(edgeCases) || !isNumber(edgeCases.fraction) || edgeCases.fraction < 0 || edgeCases.fraction > 1) {
						warn(`${label}: "factory.edgeCases.fraction" must be a number between 0 and 1`);
						hasError = true;
					} else {
						for (const toggle of ['nulls', 'boundaryStrings', 'outOfRange'] as const) {
							if (edgeCases[toggle] !== undefined && !isBoolean(edgeCases[toggle])) {
								warn(`${label}: "factory.edgeCases.${toggle}" must be a boolean`);
								hasError = true;
							}
						}
					}
				}
			}
		}

		if (isString(step.sobject) && isString(step.operation) && WRITING_OPERATIONS.test(step.operation)) {
			createdBefore.add(step.sobject.toLowerCase());
		}
	}

	return !hasError;
}

/**
 * Checks one value against its field's describe type. Returns the reason the
 * value is invalid, or undefined when it is acceptable.
 */
export function validateFieldValueType(field: FieldDescriptor, value: FieldValue): string | undefined {
	if (value === null) return undefined;

	const valueStr = String(value);

	switch (field.type) {
		case 'boolean':
			if (typeof value !== 'boolean') return `"${field.name}" must be a boolean.`;
			break;
		case 'int':
			if (!Number.isInteger(value)) return `"${field.name}" must be an integer.`;
			break;
		case 'double':
		case 'currency':
		case 'percent':
			if (typeof value !== 'number') return `"${field.name}" must be a number.`;
			break;
		case 'date':
			if (!/^\d{4}-\d{2}-\d{2}$/.test(valueStr)) return `"${field.name}" must be a valid Date (YYYY-MM-DD).`;
			break;
		case 'datetime':
			if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/.test(valueStr)) {
				return `"${field.name}" must be a valid DateTime (YYYY-MM-DDTHH:MM:SSZ).`;
			}
			break;
		case 'reference':
		case 'id':
			if (!SALESFORCE_ID.test(valueStr)) return `"${field.name}" must be a 15 or 18 character record id.`;
			break;
		default:
			if (field.length !== undefined && typeof value === 'string' && value.length > field.length) {
				return `"${field.name}" is longer than ${field.length} characters.`;
			}
	}

	return undefined;
}
