/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type { FieldDescriptor, ObjectSchema, SchemaProvider } from '../../src/types/index.js';

export function field(name: string, type: string, extra: Partial<FieldDescriptor> = {}): FieldDescriptor {
	return { name, type, required: false, isRelationship: type === 'reference', ...extra };
}

export const widgetSchema: ObjectSchema = {
	name: 'Widget',
	fields: [
		field('Id', 'id', { externalId: true }),
		field('Name', 'string', { required: true, length: 80 }),
		field('Sku__c', 'string', { externalId: true, length: 20 }),
		field('Quantity__c', 'int'),
		field('Status__c', 'picklist', { picklistValues: ['New', 'Active', 'Retired'] }),
		field('Description__c', 'textarea'),
	],
};

export const accountSchema: ObjectSchema = {
	name: 'Account',
	fields: [field('Id', 'id', { externalId: true }), field('Name', 'string', { required: true, length: 255 }), field('Phone', 'phone')],
};

export const contactSchema: ObjectSchema = {
	name: 'Contact',
	fields: [
		field('Id', 'id', { externalId: true }),
		field('LastName', 'string', { required: true, length: 80 }),
		field('Email', 'email'),
		field('AccountId', 'reference', { required: true, relatedObject: 'Account' }),
	],
};

export class StaticSchemaProvider implements SchemaProvider {
	public readonly calls: string[] = [];
	private readonly schemas: Map<string, ObjectSchema>;

	public constructor(schemas: ObjectSchema[] = [widgetSchema, accountSchema, contactSchema]) {
		this.schemas = new Map(schemas.map((schema) => [schema.name.toLowerCase(), schema]));
	}

	public async describeObject(name: string): Promise<ObjectSchema> {
		this.calls.push(name);
		const schema = this.schemas.get(name.toLowerCase());
		if (!schema) throw new Error(`No such object ${name}`);
		return schema;
	}
}
