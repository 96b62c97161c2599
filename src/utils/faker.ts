/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { faker } from '@faker-js/faker';
import type { FieldDescriptor, FieldValue } from '../types/index.js';

const PREFIX = '#{faker.';

function isFakerTemplate(value: string): boolean {
	return value.startsWith(PREFIX) && value.endsWith('}');
}

function pathOf(value: string): string[] {
	return value.slice(PREFIX.length, -1).split('.'); // Remove #{faker. and trailing }
}

function memberOf(target: unknown, key: string): unknown {
	if ((typeof target === 'object' && target !== null) || typeof target === 'function') {
		return key in target ? Reflect.get(target, key) : undefined;
	}
	return undefined;
}

// Faker modules are class instances, so their methods live on the prototype chain.
function keysOf(target: unknown): string[] {
	const keys = new Set<string>();
	let current: unknown = target;
	while (typeof current === 'object' && current !== null && current !== Object.prototype) {
		for (const key of Object.getOwnPropertyNames(current)) {
			if (key !== 'constructor' && !key.startsWith('_')) keys.add(key);
		}
		current = Object.getPrototypeOf(current);
	}
	return [...keys];
}

function toFieldValue(result: unknown): FieldValue | undefined {
	if (result instanceof Date) return result.toISOString();
	if (typeof result === 'string' || typeof result === 'number' || typeof result === 'boolean') return result;
	if (result === undefined || result === null) return undefined;
	return String(result);
}

/**
 * Evaluates `#{faker.section.method}` against faker. Returns undefined when the
 * value is not a faker template or the path does not resolve.
 */
export function resolveFakerExpression(value: string, warn: (msg: string) => void): FieldValue | undefined {
	if (!isFakerTemplate(value)) return undefined;

	const expression = value.slice(PREFIX.length, -1);
	let owner: unknown = faker;
	let result: unknown = faker;
	for (const part of pathOf(value)) {
		const member = memberOf(result, part);
		owner = result;
		result = typeof member === 'function' ? Reflect.apply(member, owner, []) : member;
		if (result === undefined || result === null) {
			warn(`Invalid faker path: ${expression}`);
			return undefined;
		}
	}

	return toFieldValue(result);
}

export function isValidFakerExpression(value: string): boolean {
	if (!isFakerTemplate(value)) return false;

	let result: unknown = faker;
	for (const part of pathOf(value)) {
		result = memberOf(result, part);
		if (result === undefined) return false;
	}
	// If the final resolved thing is a function, it's usable
	return typeof result === 'function' || typeof result === 'string' || typeof result === 'number';
}

function findClosestMatch(input: string, candidates: string[]): string | null {
	let closest = null;
	let shortestDistance = Infinity;

	for (const candidate of candidates) {
		const distance = levenshteinDistance(input, candidate);
		if (distance < shortestDistance) {
			shortestDistance = distance;
			closest = candidate;
		}
	}

	return shortestDistance <= 5 ? closest : null;
}

function levenshteinDistance(a: string, b: string): number {
	const dp: number[][] = Array.from({ length: a.length + 1 }, () => new Array<number>(b.length + 1).fill(0));

	for (let i = 0; i <= a.length; i++) dp[i][0] = i;
	for (let j = 0; j <= b.length; j++) dp[0][j] = j;

	for (let i = 1; i <= a.length; i++) {
		for (let j = 1; j <= b.length; j++) {
			dp[i][j] = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1));
		}
	}

	return dp[a.length][b.length];
}

export function suggestFakerAlternative(value: string): string | null {
	if (!isFakerTemplate(value)) return null;

	const parts = pathOf(value); // 'internet.fakeMail'
	if (parts.length < 2) return null;

	const [rawSection, rawMethod] = parts;
	const section = memberOf(faker, rawSection);

	if (typeof section !== 'object' || section === null) {
		const closestSection = findClosestMatch(rawSection, keysOf(faker));
		if (closestSection) {
			const validMethods = keysOf(memberOf(faker, closestSection));
			const closestMethod = findClosestMatch(rawMethod, validMethods);
			return closestMethod ? `#{faker.${closestSection}.${closestMethod}}` : null;
		}
		return null;
	}

	const validMethods = keysOf(section);
	if (!validMethods.includes(rawMethod)) {
		const closestMethod = findClosestMatch(rawMethod, validMethods);
		return closestMethod ? `#{faker.${rawSection}.${closestMethod}}` : null;
	}

	return null;
}

const BY_NAME: Array<[RegExp, string]> = [
	[/^(first_?name)$/i, '#{faker.person.firstName}'],
	[/^(last_?name)$/i, '#{faker.person.lastName}'],
	[/(^|_)city$/i, '#{faker.location.city}'],
	[/(^|_)street$/i, '#{faker.location.streetAddress}'],
	[/(postal_?code|zip)$/i, '#{faker.location.zipCode}'],
	[/(^|_)country$/i, '#{faker.location.country}'],
	[/^title$/i, '#{faker.person.jobTitle}'],
	[/^website$/i, '#{faker.internet.url}'],
];

const BY_TYPE: Record<string, string> = {
	email: '#{faker.internet.email}',
	phone: '#{faker.phone.number}',
	url: '#{faker.internet.url}',
	textarea: '#{faker.lorem.sentence}',
	currency: '#{faker.finance.amount}',
	boolean: '#{faker.datatype.boolean}',
	date: '#{faker.date.past}',
	datetime: '#{faker.date.past}',
};

/**
 * Picks a faker template for a described field, or undefined when the field
 * needs a value a bare template can't produce (names, numbers, picklists, lookups).
 */
export function fakerExpressionForField(field: FieldDescriptor): string | undefined {
	if (field.isRelationship || field.picklistValues?.length) return undefined;
	for (const [pattern, expression] of BY_NAME) {
		if (pattern.test(field.name)) return expression;
	}
	return BY_TYPE[field.type];
}

/** Coerces a generated value to the wire format of the field's type. */
export function formatForField(field: FieldDescriptor, value: FieldValue): FieldValue {
	if (value === null) return null;
	switch (field.type) {
		case 'date':
			return typeof value === 'string' && /^\d{4}-\d{2}-\d{2}T/.test(value) ? value.slice(0, 10) : value;
		case 'datetime':
			return typeof value === 'string' ? value.replace(/\.\d{3}Z$/, 'Z') : value;
		case 'int':
			return typeof value === 'number' ? Math.trunc(value) : value;
		case 'currency':
		case 'double':
		case 'percent':
			return typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value)) ? Number(value) : value;
		default:
			return value;
	}
}
