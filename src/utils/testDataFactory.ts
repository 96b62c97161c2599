/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { faker } from '@faker-js/faker';
import { Logger } from '@salesforce/core';
import type {
	EdgeCaseOptions,
	FieldDescriptor,
	FieldValue,
	GenerationInfo,
	ObjectSchema,
	PlanPurpose,
	SObjectRecord,
} from '../types/index.js';
import type { OrchestratorConfig } from './config.js';
import { errorMessages, UnresolvedRelationshipError, ValidationError } from './errors.js';
import { fakerExpressionForField, formatForField, resolveFakerExpression } from './faker.js';
import { resolveRecordCount } from './planner.js';
import { parseReference } from './validator.js';

/** A literal, a template string, or a function of the zero-based row index. */
export type FieldRule = FieldValue | ((index: number) => FieldValue);

export type RelationshipBinding = {
	parentObject: string;
	/** Supplies the parent id for a row; falls back to the reference lookup when absent. */
	supplier?: (index: number) => string | undefined;
};

export type FactorySpec = {
	name?: string;
	schema: ObjectSchema;
	fields?: Record<string, FieldRule>;
	relationships?: Record<string, RelationshipBinding>;
	edgeCases?: EdgeCaseOptions;
	purpose?: PlanPurpose;
	seed?: number;
	label?: string;
};

/** Ids already created for an object, usually from the trace log. */
export type ReferenceLookup = (sobject: string) => readonly string[] | undefined;

export type GenerateOptions = {
	references?: ReferenceLookup;
};

export type GeneratedRecords = {
	records: SObjectRecord[];
	generation: GenerationInfo;
	edgeCaseRows: number[];
};

type EdgeVariant = 'nulls' | 'boundaryStrings' | 'outOfRange';

const STRING_TYPES = new Set(['string', 'textarea']);
const NUMERIC_TYPES = new Set(['int', 'double', 'currency', 'percent']);
const DEFAULT_STRING_LENGTH = 255;
const EARLIEST_DATE = '1700-01-01';
const TEMPLATE_MARK = /[#@]\{/;

/** Row i is an edge case when floor((i+1)f) > floor(i f); spreads them evenly and deterministically. */
export function isEdgeCaseRow(index: number, fraction: number): boolean {
	return Math.floor((index + 1) * fraction) > Math.floor(index * fraction);
}

function variantsOf(options: EdgeCaseOptions): EdgeVariant[] {
	const toggles: Array<[EdgeVariant, boolean | undefined]> = [
		['nulls', options.nulls],
		['boundaryStrings', options.boundaryStrings],
		['outOfRange', options.outOfRange],
	];
	const anySet = toggles.some(([, enabled]) => enabled !== undefined);
	// with no toggle given every variant is on
	return toggles.filter(([, enabled]) => (anySet ? enabled === true : true)).map(([variant]) => variant);
}

/**
 * Builds synthetic record sets for an object. Every record carries all of the
 * schema's required fields; lookups are filled from parents that already exist.
 */
export class TestDataFactoryRegistry {
	private readonly specs = new Map<string, FactorySpec>();
	private readonly logger = Logger.childFromRoot('bulkops:factory');

	public constructor(private readonly config: Pick<OrchestratorConfig, 'bulkBoundary' | 'defaultGenerateCount'>) {}

	public register(spec: FactorySpec): void {
		this.specs.set((spec.name ?? spec.schema.name).toLowerCase(), spec);
	}

	public has(name: string): boolean {
		return this.specs.has(name.toLowerCase());
	}

	public generate(specOrName: FactorySpec | string, count?: number, options: GenerateOptions = {}): GeneratedRecords {
		const spec = typeof specOrName === 'string' ? this.specs.get(specOrName.toLowerCase()) : specOrName;
		if (!spec) {
			throw new ValidationError(errorMessages.getMessage('error.UnknownFactory', [String(specOrName)]));
		}

		const total = resolveRecordCount({ count, purpose: spec.purpose }, this.config);
		if (spec.seed !== undefined) faker.seed(spec.seed);

		const fraction = spec.edgeCases?.fraction ?? 0;
		const variants = spec.edgeCases ? variantsOf(spec.edgeCases) : [];
		const fields = new Map(spec.schema.fields.map((field) => [field.name.toLowerCase(), field]));

		const records: SObjectRecord[] = [];
		const edgeCaseRows: number[] = [];
		for (let index = 0; index < total; index++) {
			const record = this.buildRecord(spec, fields, index, options.references);
			if (variants.length > 0 && isEdgeCaseRow(index, fraction)) {
				this.applyVariant(variants[edgeCaseRows.length % variants.length], record, spec.schema);
				edgeCaseRows.push(index);
			}
			records.push(record);
		}

		this.logger.debug(`generated ${total} ${spec.schema.name} record(s), ${edgeCaseRows.length} edge case(s)`);
		return { records, generation: { count: total, edgeCaseFraction: fraction }, edgeCaseRows };
	}

	/**
	 * Resolves faker, counter and reference templates inside explicit records.
	 * Values without a template pass through untouched.
	 */
	public resolveTemplates(schema: ObjectSchema, records: readonly SObjectRecord[], options: GenerateOptions = {}): SObjectRecord[] {
		const fields = new Map(schema.fields.map((field) => [field.name.toLowerCase(), field]));
		return records.map((record, index) => {
			const resolved: SObjectRecord = {};
			for (const [name, value] of Object.entries(record)) {
				if (typeof value !== 'string' || !TEMPLATE_MARK.test(value)) {
					resolved[name] = value;
					continue;
				}
				const field = fields.get(name.toLowerCase());
				const next = this.applyRule(value, index, field, field?.name ?? name, options.references) ?? null;
				resolved[name] = field ? formatForField(field, next) : next;
			}
			return resolved;
		});
	}

	private buildRecord(
		spec: FactorySpec,
		fields: Map<string, FieldDescriptor>,
		index: number,
		references?: ReferenceLookup
	): SObjectRecord {
		const record: SObjectRecord = {};

		for (const [name, rule] of Object.entries(spec.fields ?? {})) {
			const field = fields.get(name.toLowerCase());
			const key = field?.name ?? name;
			const value = this.applyRule(rule, index, field, key, references);
			if (value !== undefined) record[key] = field ? formatForField(field, value) : value;
		}

		for (const [name, binding] of Object.entries(spec.relationships ?? {})) {
			const field = fields.get(name.toLowerCase());
			const key = field?.name ?? name;
			const parentId = binding.supplier?.(index) ?? this.pickReference(references, binding.parentObject, index);
			if (parentId !== undefined) record[key] = parentId;
			else if (field?.required) throw new UnresolvedRelationshipError(key, binding.parentObject, index);
		}

		for (const field of spec.schema.fields) {
			if (!field.required || field.name === 'Id') continue;
			const present = record[field.name];
			if (present !== undefined && present !== null && present !== '') continue;
			record[field.name] = this.defaultValue(spec, field, index, references);
		}

		return record;
	}

	private applyRule(
		rule: FieldRule,
		index: number,
		field: FieldDescriptor | undefined,
		key: string,
		references?: ReferenceLookup
	): FieldValue | undefined {
		const value = typeof rule === 'function' ? rule(index) : rule;
		if (typeof value !== 'string') return value;

		const fakerResolved = resolveFakerExpression(value, (msg) => this.logger.warn(msg));
		if (fakerResolved !== undefined) return fakerResolved;

		const resolved = value.replace(/#\{counter\}/g, String(index + 1));

		const reference = parseReference(resolved);
		if (reference) {
			const parentId = this.pickReference(references, reference.sobject, index);
			if (parentId !== undefined) return parentId;
			if (field?.required) throw new UnresolvedRelationshipError(key, reference.sobject, index);
			return null;
		}
		return resolved;
	}

	// Rows are spread across parents round-robin.
	private pickReference(references: ReferenceLookup | undefined, sobject: string, index: number): string | undefined {
		const ids = references?.(sobject);
		return ids && ids.length > 0 ? ids[index % ids.length] : undefined;
	}

	private defaultValue(
		spec: FactorySpec,
		field: FieldDescriptor,
		index: number,
		references?: ReferenceLookup
	): FieldValue {
		if (field.isRelationship || field.type === 'reference') {
			const parent = field.relatedObject ?? field.name.replace(/Id$/, '');
			const parentId = this.pickReference(references, parent, index);
			if (parentId === undefined) throw new UnresolvedRelationshipError(field.name, parent, index);
			return parentId;
		}
		if (field.picklistValues?.length) return field.picklistValues[index % field.picklistValues.length];

		switch (field.type) {
			case 'string':
			case 'textarea': {
				const text = `${spec.label ?? spec.schema.name} ${index + 1}`;
				return text.slice(0, field.length ?? DEFAULT_STRING_LENGTH);
			}
			case 'boolean':
				return false;
			case 'int':
				return faker.number.int({ min: 1, max: 10_000 });
			case 'double':
			case 'currency':
			case 'percent':
				return faker.number.float({ min: 1, max: 100, fractionDigits: 2 });
			default: {
				const expression = fakerExpressionForField(field);
				const generated = expression ? resolveFakerExpression(expression, (msg) => this.logger.warn(msg)) : undefined;
				return formatForField(field, generated ?? `${spec.label ?? spec.schema.name} ${index + 1}`);
			}
		}
	}

	private applyVariant(variant: EdgeVariant, record: SObjectRecord, schema: ObjectSchema): void {
		for (const field of schema.fields) {
			if (field.name === 'Id') continue;
			const current = record[field.name];
			switch (variant) {
				case 'nulls':
					if (!field.required) record[field.name] = null;
					break;
				case 'boundaryStrings':
					if (STRING_TYPES.has(field.type) && typeof current === 'string') {
						const length = field.length ?? DEFAULT_STRING_LENGTH;
						record[field.name] = current.padEnd(length, 'x').slice(0, length);
					}
					break;
				case 'outOfRange':
					if (current === undefined || current === null) break;
					if (NUMERIC_TYPES.has(field.type)) record[field.name] = 0;
					else if (field.type === 'date') record[field.name] = EARLIEST_DATE;
					else if (field.type === 'datetime') record[field.name] = `${EARLIEST_DATE}T00:00:00Z`;
					break;
			}
		}
	}
}
