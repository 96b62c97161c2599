/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type { FieldValue, ObjectSchema, OperationIntent } from '../types/index.js';
import { errorMessages, ValidationError } from './errors.js';
import { fakerExpressionForField } from './faker.js';
import { parseReference } from './validator.js';

/** `from.field` looks up a record of `to`. */
export type DependencyEdge = {
	from: string;
	field: string;
	to: string;
	required: boolean;
};

export type OrderedPlan = {
	intents: OperationIntent[];
	dropped: DependencyEdge[];
};

const key = (name: string): string => name.toLowerCase();

/**
 * Lookups between the objects of a plan: `@{Parent.Id}` factory references,
 * and required reference fields whose parent is also in the plan. Self
 * lookups are left out.
 */
export function dependencyEdges(
	intents: readonly OperationIntent[],
	schemas: ReadonlyMap<string, ObjectSchema>
): DependencyEdge[] {
	const planned = new Set(intents.map((intent) => key(intent.sobject)));
	const edges: DependencyEdge[] = [];

	for (const intent of intents) {
		const schema = schemas.get(key(intent.sobject));
		const requiredOf = (field: string): boolean =>
			schema?.fields.some((descriptor) => key(descriptor.name) === key(field) && descriptor.required) ?? false;
		const seen = new Set<string>();

		for (const [field, value] of Object.entries(intent.factory?.fields ?? {})) {
			if (typeof value !== 'string') continue;
			const reference = parseReference(value);
			if (!reference || key(reference.sobject) === key(intent.sobject) || !planned.has(key(reference.sobject))) continue;
			edges.push({ from: intent.sobject, field, to: reference.sobject, required: requiredOf(field) });
			seen.add(key(field));
		}

		for (const field of schema?.fields ?? []) {
			const parent = field.relatedObject;
			if (!field.required || !parent || seen.has(key(field.name))) continue;
			if (key(parent) === key(intent.sobject) || !planned.has(key(parent))) continue;
			edges.push({ from: intent.sobject, field: field.name, to: parent, required: true });
		}
	}
	return edges;
}

function findCycle(nodes: readonly string[], edges: readonly DependencyEdge[]): DependencyEdge[] | undefined {
	const outgoing = new Map<string, DependencyEdge[]>();
	for (const edge of edges) {
		const list = outgoing.get(key(edge.from)) ?? [];
		list.push(edge);
		outgoing.set(key(edge.from), list);
	}

	const visited = new Set<string>();
	const path: DependencyEdge[] = [];
	const onPath = new Set<string>();

	const visit = (node: string): DependencyEdge[] | undefined => {
		visited.add(node);
		onPath.add(node);
		for (const edge of outgoing.get(node) ?? []) {
			const next = key(edge.to);
			path.push(edge);
			if (onPath.has(next)) {
				const start = path.findIndex((step) => key(step.from) === next);
				return path.slice(start);
			}
			if (!visited.has(next)) {
				const cycle = visit(next);
				if (cycle) return cycle;
			}
			path.pop();
		}
		onPath.delete(node);
		return undefined;
	};

	for (const node of nodes) {
		if (visited.has(node)) continue;
		const cycle = visit(node);
		if (cycle) return cycle;
	}
	return undefined;
}

/**
 * Orders a plan so parents are written before the records that look them up.
 * Cycles are broken by dropping an optional lookup from the plan; a cycle made
 * only of required lookups raises a ValidationError.
 */
export function orderIntents(
	intents: readonly OperationIntent[],
	schemas: ReadonlyMap<string, ObjectSchema>
): OrderedPlan {
	const nodes = [...new Set(intents.map((intent) => key(intent.sobject)))];
	let edges = dependencyEdges(intents, schemas);
	const dropped: DependencyEdge[] = [];

	for (let cycle = findCycle(nodes, edges); cycle; cycle = findCycle(nodes, edges)) {
		const optional = cycle.find((edge) => !edge.required);
		if (!optional) {
			const objects = [...new Set(cycle.map((edge) => edge.from))].join(', ');
			throw new ValidationError(errorMessages.getMessage('error.DependencyCycle', [objects]));
		}
		dropped.push(optional);
		edges = edges.filter((edge) => edge !== optional);
	}

	const parentsOf = new Map<string, string[]>();
	for (const edge of edges) {
		parentsOf.set(key(edge.from), [...(parentsOf.get(key(edge.from)) ?? []), key(edge.to)]);
	}
	const order: string[] = [];
	const placed = new Set<string>();
	const place = (node: string): void => {
		if (placed.has(node)) return;
		placed.add(node);
		for (const parent of parentsOf.get(node) ?? []) place(parent);
		order.push(node);
	};
	for (const node of nodes) place(node);

	const rank = new Map(order.map((node, index) => [node, index]));
	const ordered = intents
		.map((intent, index) => ({ intent: withoutDropped(intent, dropped), index }))
		.sort((a, b) => (rank.get(key(a.intent.sobject)) ?? 0) - (rank.get(key(b.intent.sobject)) ?? 0) || a.index - b.index)
		.map(({ intent }) => intent);

	return { intents: ordered, dropped };
}

function withoutDropped(intent: OperationIntent, dropped: readonly DependencyEdge[]): OperationIntent {
	const mine = dropped.filter((edge) => key(edge.from) === key(intent.sobject));
	if (mine.length === 0 || !intent.factory?.fields) return intent;
	const fields = Object.fromEntries(
		Object.entries(intent.factory.fields).filter(([field]) => !mine.some((edge) => key(edge.field) === key(field)))
	);
	return { ...intent, factory: { ...intent.factory, fields } };
}

/** Factory field templates for one object: lookups to planned parents, faker templates elsewhere. */
export function factoryFieldsFor(schema: ObjectSchema, planned: ReadonlySet<string>): Record<string, FieldValue> {
	const fields: Record<string, FieldValue> = {};
	for (const field of schema.fields) {
		if (field.name === 'Id') continue;
		if (field.relatedObject) {
			const parent = field.relatedObject;
			if (parent.toLowerCase() !== schema.name.toLowerCase() && planned.has(parent.toLowerCase())) {
				fields[field.name] = `@{${parent}.Id}`;
			}
			continue;
		}
		const expression = fakerExpressionForField(field);
		if (expression) fields[field.name] = expression;
	}
	return fields;
}
