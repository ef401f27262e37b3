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

import {BaseCatalogReader} from '@cqlsync/schema_sync/src/catalog/BaseCatalogReader';
import {
	IndexRowSchema,
	KeyspaceNameRowSchema,
	TableNameRowSchema,
} from '@cqlsync/schema_sync/src/catalog/CatalogRows';

export const KEYSPACES_QUERY = 'SELECT keyspace_name FROM system_schema.keyspaces';
export const TABLES_QUERY = 'SELECT table_name FROM system_schema.tables WHERE keyspace_name = ?';
export const INDEXES_QUERY = 'SELECT table_name, index_name FROM system_schema.indexes WHERE keyspace_name = ?';

export class SystemSchemaCatalogReader extends BaseCatalogReader {
	readonly version = 'system_schema' as const;

	async listKeyspaces(): Promise<Array<string>> {
		const rows = await this.query(KEYSPACES_QUERY, [], KeyspaceNameRowSchema);
		return rows.map((row) => row.keyspace_name);
	}

	async listColumnFamilies(keyspace: string): Promise<Array<string>> {
		const rows = await this.query(TABLES_QUERY, [keyspace], TableNameRowSchema);
		return rows.map((row) => row.table_name);
	}

	async listIndexNames(keyspace: string): Promise<Array<string>> {
		const rows = await this.query(INDEXES_QUERY, [keyspace], IndexRowSchema);
		return rows.map((row) => `${row.table_name}.${row.index_name}`);
	}
}
