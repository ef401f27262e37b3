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
	KeyspaceNameRowSchema,
	LegacyColumnFamilyRowSchema,
	LegacyIndexInfoRowSchema,
} from '@cqlsync/schema_sync/src/catalog/CatalogRows';

export const LEGACY_KEYSPACES_QUERY = 'SELECT keyspace_name FROM system.schema_keyspaces';
export const LEGACY_COLUMN_FAMILIES_QUERY =
	'SELECT columnfamily_name FROM system.schema_columnfamilies WHERE keyspace_name = ?';
// IndexInfo is partitioned by keyspace even though the column is called table_name.
export const LEGACY_INDEXES_QUERY = 'SELECT index_name FROM system."IndexInfo" WHERE table_name = ?';

/**
 * Reads the pre-3.0 `system.schema_*` tables.
 */
export class LegacyCatalogReader extends BaseCatalogReader {
	readonly version = 'legacy' as const;

	async listKeyspaces(): Promise<Array<string>> {
		const rows = await this.query(LEGACY_KEYSPACES_QUERY, [], KeyspaceNameRowSchema);
		return rows.map((row) => row.keyspace_name);
	}

	async listColumnFamilies(keyspace: string): Promise<Array<string>> {
		const rows = await this.query(LEGACY_COLUMN_FAMILIES_QUERY, [keyspace], LegacyColumnFamilyRowSchema);
		return rows.map((row) => row.columnfamily_name);
	}

	async listIndexNames(keyspace: string): Promise<Array<string>> {
		const rows = await this.query(LEGACY_INDEXES_QUERY, [keyspace], LegacyIndexInfoRowSchema);
		return rows.map((row) => row.index_name);
	}
}
