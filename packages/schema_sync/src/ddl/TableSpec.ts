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

import {SchemaError} from '@cqlsync/errors/src/domains/schema/SchemaError';
import {assertSchemaName, quoteIdentifier} from '@cqlsync/schema_sync/src/ddl/CqlIdentifiers';
import type {ColumnDefinition} from '@cqlsync/schema_sync/src/model/Columns';
import type {TableModel} from '@cqlsync/schema_sync/src/model/ModelDefinition';

export interface TableSpec {
	readonly keyspace: string;
	readonly name: string;
	/** `<keyspace>.<table>` with identifiers quoted as needed. */
	readonly qualifiedName: string;
	readonly columns: ReadonlyArray<ColumnDefinition>;
	readonly partitionKeys: ReadonlyArray<ColumnDefinition>;
	readonly clusteringKeys: ReadonlyArray<ColumnDefinition>;
	readonly indexedColumns: ReadonlyArray<ColumnDefinition>;
	readonly readRepairChance: number | null;
}

export function resolveKeyspace(model: TableModel, defaultKeyspace: string | null): string {
	const keyspace = model.keyspace ?? defaultKeyspace;
	if (!keyspace) {
		throw new SchemaError(`Model ${model.name} has no keyspace and no default keyspace is configured`);
	}
	assertSchemaName('keyspace', keyspace);
	return keyspace;
}

export function qualifiedTableName(keyspace: string, table: string): string {
	return `${quoteIdentifier(keyspace)}.${quoteIdentifier(table)}`;
}

export function toTableSpec(model: TableModel, defaultKeyspace: string | null): TableSpec {
	const keyspace = resolveKeyspace(model, defaultKeyspace);
	assertSchemaName('table', model.tableName);
	if (model.partitionKeys.length === 0) {
		throw new SchemaError(`Model ${model.name} has no partition key`);
	}

	return {
		keyspace,
		name: model.tableName,
		qualifiedName: qualifiedTableName(keyspace, model.tableName),
		columns: model.columns,
		partitionKeys: model.partitionKeys,
		clusteringKeys: model.clusteringKeys,
		indexedColumns: model.indexedColumns,
		readRepairChance: model.readRepairChance,
	};
}
