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

import {createCatalogReader} from '@cqlsync/schema_sync/src/catalog/CatalogReaderFactory';
import {
	LEGACY_COLUMN_FAMILIES_QUERY,
	LEGACY_INDEXES_QUERY,
	LEGACY_KEYSPACES_QUERY,
	LegacyCatalogReader,
} from '@cqlsync/schema_sync/src/catalog/LegacyCatalogReader';
import {
	INDEXES_QUERY,
	KEYSPACES_QUERY,
	SystemSchemaCatalogReader,
	TABLES_QUERY,
} from '@cqlsync/schema_sync/src/catalog/SystemSchemaCatalogReader';
import type {ICqlConnectionManager} from '@cqlsync/schema_sync/src/database/ICqlConnection';
import {createComponentLogger} from '@cqlsync/schema_sync/src/Logger';
import {InMemoryCqlConnectionManager} from '@cqlsync/schema_sync/src/test/mocks/InMemoryCqlConnectionManager';
import {beforeEach, describe, expect, it, vi} from 'vitest';
import {ZodError} from 'zod';

describe('catalog readers', () => {
	let connections: InMemoryCqlConnectionManager;

	beforeEach(() => {
		connections = new InMemoryCqlConnectionManager();
		connections.addIndex('app', 'users', 'index_users_email').addTable('app', 'sessions').addKeyspace('empty');
	});

	describe('LegacyCatalogReader', () => {
		it('lists keyspaces, column families and indexes from the system tables', async () => {
			const reader = new LegacyCatalogReader(connections, createComponentLogger('catalog'));

			expect(reader.version).toBe('legacy');
			expect(await reader.listKeyspaces()).toEqual(['app', 'empty']);
			expect(await reader.listColumnFamilies('app')).toEqual(['users', 'sessions']);
			expect(await reader.listIndexNames('app')).toEqual(['users.index_users_email']);
			expect(connections.queries).toEqual([
				{statement: LEGACY_KEYSPACES_QUERY, params: []},
				{statement: LEGACY_COLUMN_FAMILIES_QUERY, params: ['app']},
				{statement: LEGACY_INDEXES_QUERY, params: ['app']},
			]);
			expect(connections.acquisitions).toBe(3);
		});

		it('returns nothing for unknown keyspaces', async () => {
			const reader = new LegacyCatalogReader(connections, createComponentLogger('catalog'));

			expect(await reader.listColumnFamilies('missing')).toEqual([]);
			expect(await reader.listIndexNames('missing')).toEqual([]);
		});
	});

	describe('SystemSchemaCatalogReader', () => {
		it('lists keyspaces, tables and table-qualified indexes from system_schema', async () => {
			const reader = new SystemSchemaCatalogReader(connections, createComponentLogger('catalog'));

			expect(reader.version).toBe('system_schema');
			expect(await reader.listKeyspaces()).toEqual(['app', 'empty']);
			expect(await reader.listColumnFamilies('app')).toEqual(['users', 'sessions']);
			expect(await reader.listColumnFamilies('empty')).toEqual([]);
			expect(await reader.listIndexNames('app')).toEqual(['users.index_users_email']);
			expect(connections.queries.map((query) => query.statement)).toEqual([
				KEYSPACES_QUERY,
				TABLES_QUERY,
				TABLES_QUERY,
				INDEXES_QUERY,
			]);
		});
	});

	it('creates the reader for the configured catalog', () => {
		const logger = createComponentLogger('catalog');

		expect(createCatalogReader('legacy', connections, logger)).toBeInstanceOf(LegacyCatalogReader);
		expect(createCatalogReader('system_schema', connections, logger)).toBeInstanceOf(SystemSchemaCatalogReader);
	});

	it('rejects catalog rows of an unexpected shape', async () => {
		const malformed: ICqlConnectionManager = {
			withConnection: (fn) =>
				fn({
					execute: async (_statement, _params, rowFactory) => [rowFactory({keyspace_name: 42})],
				}),
			execute: vi.fn(async () => {}),
			shutdown: vi.fn(async () => {}),
		};
		const reader = new SystemSchemaCatalogReader(malformed, createComponentLogger('catalog'));

		await expect(reader.listKeyspaces()).rejects.toBeInstanceOf(ZodError);
	});
});
