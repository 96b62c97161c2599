/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type { CleanupPredicate, CleanupStrategy, RollbackMarker } from '../types/index.js';
import { errorMessages, ValidationError } from './errors.js';

export type CleanupPattern =
	| { strategy: 'trackedIds'; sobject?: string; since?: RollbackMarker }
	| { strategy: 'namePattern'; sobject: string; pattern: string; field?: string }
	| { strategy: 'createdWindow'; sobject: string; from: Date | string; to?: Date | string };

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;

function invalid(reason: string): ValidationError {
	return new ValidationError(errorMessages.getMessage('error.InvalidCleanupPattern', [reason]));
}

export function escapeSoqlLiteral(value: string): string {
	return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

function identifier(name: string, what: string): string {
	if (!IDENTIFIER.test(name)) throw invalid(`${what} "${name}" is not a valid name`);
	return name;
}

export function toPredicate(sobject: string, strategy: CleanupStrategy, where: string): CleanupPredicate {
	const soql = `SELECT Id FROM ${sobject} WHERE ${where}`;
	return { sobject, strategy, where, soql, apex: `delete [${soql}];` };
}

export function idPredicate(sobject: string, ids: readonly string[]): CleanupPredicate {
	const list = ids.map((id) => `'${escapeSoqlLiteral(id)}'`).join(', ');
	return toPredicate(identifier(sobject, 'Object'), 'trackedIds', `Id IN (${list})`);
}

/** `*` works as a wildcard alongside SOQL's own `%`. */
export function namePatternPredicate(sobject: string, pattern: string, field = 'Name'): CleanupPredicate {
	if (pattern.trim() === '') throw invalid('the name pattern is empty');
	const like = escapeSoqlLiteral(pattern).replace(/\*/g, '%');
	return toPredicate(identifier(sobject, 'Object'), 'namePattern', `${identifier(field, 'Field')} LIKE '${like}'`);
}

function toDateTimeLiteral(value: Date | string, bound: string): string {
	const date = value instanceof Date ? value : new Date(value);
	if (Number.isNaN(date.getTime())) throw invalid(`${bound} "${String(value)}" is not a date`);
	// SOQL datetime literals are unquoted and take no milliseconds
	return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function createdWindowPredicate(sobject: string, from: Date | string, to?: Date | string): CleanupPredicate {
	const start = toDateTimeLiteral(from, 'from');
	let where = `CreatedDate >= ${start}`;
	if (to !== undefined) {
		const end = toDateTimeLiteral(to, 'to');
		if (end < start) throw invalid('the window ends before it starts');
		where += ` AND CreatedDate <= ${end}`;
	}
	return toPredicate(identifier(sobject, 'Object'), 'createdWindow', where);
}
