/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

import {ModelDefinitionError} from '@cqlsync/errors/src/domains/schema/ModelDefinitionError';
import {type ColumnDefinition, Columns} from '@cqlsync/schema_sync/src/model/Columns';
import {z} from 'zod';

export const DEFAULT_READ_REPAIR_CHANCE = 0.1;

const MODEL_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SCHEMA_NAME_REGEX = /^\w{1,48}$/;
const INDEX_NAME_REGEX = /^\w+$/;
const CQL_TYPE_REGEX = /^[a-z]+(?:<[A-Za-z0-9_<>, ]+>)?$/;
const CAMEL_BOUNDARY_REGEX = /([a-z0-9])([A-Z])/g;

const ModelOptionsSchema = z.object({
	name: z.string().regex(MODEL_NAME_REGEX, 'model name must be an identifier'),
	tableName: z.string().regex(SCHEMA_NAME_REGEX, 'table name must be 1-48 word characters').optional(),
	keyspace: z.string().regex(SCHEMA_NAME_REGEX, 'keyspace must be 1-48 word characters').optional(),
	abstract: z.boolean().optional(),
	readRepairChance: z.number().min(0).max(1).nullable().optional(),
});

export interface ModelDefinitionInput {
	name: string;
	/** Defaults to the snake_cased model name. */
	tableName?: string;
	/** Defaults to the synchronizer's default keyspace. */
	keyspace?: string;
	/** Abstract models declare shared columns but have no table of their own. */
	abstract?: boolean;
	/** `null` leaves the option out of CREATE TABLE. */
	readRepairChance?: number | null;
	extends?: TableModel;
	columns: ReadonlyArray<ColumnDefinition>;
}

export interface TableModel {
	readonly name: string;
	readonly tableName: string;
	readonly keyspace: string | null;
	readonly abstract: boolean;
	readonly readRepairChance: number | null;
	readonly columns: ReadonlyArray<ColumnDefinition>;
	readonly partitionKeys: ReadonlyArray<ColumnDefinition>;
	readonly clusteringKeys: ReadonlyArray<ColumnDefinition>;
	readonly indexedColumns: ReadonlyArray<ColumnDefinition>;
	/** Db field name to attribute name. */
	readonly dbMap: ReadonlyMap<string, string>;
	column(name: string): ColumnDefinition | undefined;
}

export function toSnakeCase(name: string): string {
	return name.replace(CAMEL_BOUNDARY_REGEX, '$1_$2').toLowerCase();
}

/**
 * Runs after key resolution so that a promoted partition key is checked as one.
 */
function validateColumns(model: string, tableName: string, columns: ReadonlyArray<ColumnDefinition>): void {
	const names = new Set<string>();
	const dbFields = new Set<string>();

	for (const col of columns) {
		if (col.name.length === 0) {
			throw new ModelDefinitionError(model, 'column attribute names must not be empty');
		}
		if (col.dbField.length === 0) {
			throw new ModelDefinitionError(model, `column "${col.name}" has an empty db field name`);
		}
		if (!CQL_TYPE_REGEX.test(col.type)) {
			throw new ModelDefinitionError(model, `column "${col.name}" has an unsupported type "${col.type}"`);
		}
		if (names.has(col.name)) {
			throw new ModelDefinitionError(model, `column attribute "${col.name}" is declared more than once`);
		}
		if (dbFields.has(col.dbField)) {
			throw new ModelDefinitionError(model, `column name "${col.dbField}" is used more than once`);
		}
		if (col.clusteringOrder !== null && (!col.primaryKey || col.partitionKey)) {
			throw new ModelDefinitionError(model, `clustering order on "${col.name}" requires a clustering key column`);
		}
		if (col.index && col.primaryKey) {
			throw new ModelDefinitionError(model, `primary key column "${col.name}" cannot carry a secondary index`);
		}
		if (col.index && !INDEX_NAME_REGEX.test(`index_${tableName}_${col.dbField}`)) {
			throw new ModelDefinitionError(
				model,
				`indexed column "${col.name}" needs a db field name of letters, digits or underscores, got "${col.dbField}"`,
			);
		}
		names.add(col.name);
		dbFields.add(col.dbField);
	}
}

function resolveKeyColumns(columns: ReadonlyArray<ColumnDefinition>): Array<ColumnDefinition> {
	if (columns.some((col) => col.partitionKey)) return [...columns];

	const firstPrimary = columns.findIndex((col) => col.primaryKey);
	if (firstPrimary === -1) return [...columns];

	return columns.map((col, index) => (index === firstPrimary ? {...col, partitionKey: true} : col));
}

export function defineModel(input: ModelDefinitionInput): TableModel {
	const parsed = ModelOptionsSchema.safeParse({
		name: input.name,
		tableName: input.tableName,
		keyspace: input.keyspace,
		abstract: input.abstract,
		readRepairChance: input.readRepairChance,
	});
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new ModelDefinitionError(
			typeof input.name === 'string' && input.name.length > 0 ? input.name : '<anonymous>',
			issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid model options',
		);
	}

	const base = input.extends;
	const abstract = input.abstract ?? false;
	let declared: Array<ColumnDefinition> = [...(base?.columns ?? []), ...input.columns];

	if (!abstract && !declared.some((col) => col.primaryKey)) {
		declared = [Columns.uuid('id', {partitionKey: true}), ...declared];
	}
	if (!abstract && declared.length === 0) {
		throw new ModelDefinitionError(input.name, 'a table model needs at least one column');
	}

	const tableName = input.tableName ?? toSnakeCase(input.name);
	const columns = resolveKeyColumns(declared);
	validateColumns(input.name, tableName, columns);

	let readRepairChance: number | null = DEFAULT_READ_REPAIR_CHANCE;
	if (input.readRepairChance !== undefined) {
		readRepairChance = input.readRepairChance;
	} else if (base) {
		readRepairChance = base.readRepairChance;
	}
	const byName = new Map(columns.map((col) => [col.name, col]));

	return {
		name: input.name,
		tableName,
		keyspace: input.keyspace ?? base?.keyspace ?? null,
		abstract,
		readRepairChance,
		columns,
		partitionKeys: columns.filter((col) => col.partitionKey),
		clusteringKeys: columns.filter((col) => col.primaryKey && !col.partitionKey),
		indexedColumns: columns.filter((col) => col.index),
		dbMap: new Map(columns.map((col) => [col.dbField, col.name])),
		column: (name) => byName.get(name),
	};
}
