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

import type {CatalogVersion} from '@cqlsync/config/src/ConfigSchema';
import {type ConfigObject, deepMerge} from '@cqlsync/config/src/config_loader/ConfigObjectMerge';
import {SchemaError} from '@cqlsync/errors/src/domains/schema/SchemaError';
import {LEGACY_COLUMN_FAMILIES_QUERY, LEGACY_KEYSPACES_QUERY} from '@cqlsync/schema_sync/src/catalog/LegacyCatalogReader';
import {INDEXES_QUERY, KEYSPACES_QUERY, TABLES_QUERY} from '@cqlsync/schema_sync/src/catalog/SystemSchemaCatalogReader';
import {Columns} from '@cqlsync/schema_sync/src/model/Columns';
import {defineModel, type TableModel} from '@cqlsync/schema_sync/src/model/ModelDefinition';
import {createSchemaSync} from '@cqlsync/schema_sync/src/SchemaSync';
import type {SchemaSynchronizer} from '@cqlsync/schema_sync/src/sync/SchemaSynchronizer';
import {InMemoryCqlConnectionManager} from '@cqlsync/schema_sync/src/test/mocks/InMemoryCqlConnectionManager';
import {createTestConfig} from '@cqlsync/schema_sync/src/test/TestConfig';
import {
	AuditableModel,
	CREATE_APP_KEYSPACE,
	CREATE_SESSION_TABLE,
	CREATE_USERS_EMAIL_INDEX,
	CREATE_USERS_TABLE,
	SessionModel,
	UserModel,
} from '@cqlsync/schema_sync/src/test/TestModels';
import {beforeEach, describe, expect, it} from 'vitest';

function createTables(
	connections: InMemoryCqlConnectionManager,
	catalog: CatalogVersion = 'system_schema',
	overrides: ConfigObject = {},
): SchemaSynchronizer {
	const config = createTestConfig(deepMerge(overrides, {schema: {catalog}}));
	return createSchemaSync({config, connections}).tables;
}

describe('SchemaSynchronizer', () => {
	let connections: InMemoryCqlConnectionManager;
	let tables: SchemaSynchronizer;

	beforeEach(() => {
		connections = new InMemoryCqlConnectionManager();
		tables = createTables(connections);
	});

	describe('createTable', () => {
		it('creates the keyspace, the table and its indexes', async () => {
			const result = await tables.createTable(UserModel);

			expect(result).toEqual({
				model: 'User',
				table: 'app.users',
				tableCreated: true,
				indexesCreated: ['index_users_email'],
			});
			expect(connections.statements).toEqual([CREATE_APP_KEYSPACE, CREATE_USERS_TABLE, CREATE_USERS_EMAIL_INDEX]);
			expect(connections.hasIndex('app', 'index_users_email')).toBe(true);
		});

		it('is idempotent', async () => {
			await tables.createTable(UserModel);
			const issued = connections.statements.length;

			const second = await tables.createTable(UserModel);

			expect(second).toEqual({model: 'User', table: 'app.users', tableCreated: false, indexesCreated: []});
			expect(connections.statements).toHaveLength(issued);
		});

		it('adds indexes missing from an existing table', async () => {
			connections.addTable('app', 'users');

			const result = await tables.createTable(UserModel);

			expect(result.tableCreated).toBe(false);
			expect(result.indexesCreated).toEqual(['index_users_email']);
			expect(connections.statements).toEqual([CREATE_USERS_EMAIL_INDEX]);
		});

		it('skips the index catalog for models without indexed columns', async () => {
			await tables.createTable(SessionModel);

			expect(connections.statements).toEqual([CREATE_APP_KEYSPACE, CREATE_SESSION_TABLE]);
			expect(connections.queries.map((query) => query.statement)).toEqual([KEYSPACES_QUERY, TABLES_QUERY]);
		});

		it('reads the index catalog of the table keyspace', async () => {
			connections.addKeyspace('app');

			await tables.createTable(UserModel);

			expect(connections.queries).toEqual([
				{statement: KEYSPACES_QUERY, params: []},
				{statement: TABLES_QUERY, params: ['app']},
				{statement: INDEXES_QUERY, params: ['app']},
			]);
		});

		it('uses the model keyspace over the default', async () => {
			const pinned = defineModel({name: 'AuditEntry', keyspace: 'audit', columns: [Columns.text('action')]});

			const result = await tables.createTable(pinned);

			expect(result.table).toBe('audit.audit_entry');
			expect(connections.statements).toEqual([
				"CREATE KEYSPACE audit WITH REPLICATION = {'class': 'SimpleStrategy', 'replication_factor': 3}",
				'CREATE TABLE audit.audit_entry (id uuid, action text, PRIMARY KEY ((id))) WITH read_repair_chance = 0.1',
			]);
		});

		it('creates missing keyspaces with the configured replication', async () => {
			const configured = createTables(connections, 'system_schema', {
				schema: {
					replication: {
						strategy_class: 'NetworkTopologyStrategy',
						replication_factor: 2,
						durable_writes: false,
						options: {dc1: 3},
					},
				},
			});

			await configured.createTable(SessionModel);

			expect(connections.statements[0]).toBe(
				"CREATE KEYSPACE app WITH REPLICATION = {'class': 'NetworkTopologyStrategy', 'replication_factor': 2, 'dc1': 3} AND DURABLE_WRITES = false",
			);
		});

		it('leaves keyspace creation to the caller when asked', async () => {
			await expect(tables.createTable(SessionModel, {createMissingKeyspace: false})).rejects.toThrow(
				'Keyspace app does not exist',
			);
			expect(connections.statements).toEqual([CREATE_SESSION_TABLE]);
		});

		it('fails on an invalid index name before creating anything', async () => {
			const model: TableModel = {
				...UserModel,
				indexedColumns: [Columns.text('contact', {dbField: 'e-mail', index: true})],
			};

			await expect(tables.createTable(model)).rejects.toThrow('Invalid index name "index_users_e-mail"');
			expect(connections.statements).toEqual([]);
			expect(connections.hasTable('app', 'users')).toBe(false);
		});

		it('refuses abstract models before touching the cluster', async () => {
			await expect(tables.createTable(AuditableModel)).rejects.toThrow(
				new SchemaError('Cannot create table from abstract model Auditable'),
			);
			expect(connections.queries).toEqual([]);
			expect(connections.statements).toEqual([]);
		});

		it('treats a concurrent table creation as success', async () => {
			const legacy = createTables(connections, 'legacy');
			connections
				.addKeyspace('app')
				.failNext(/^CREATE TABLE/, new Error('Cannot add already existing column family "session" to keyspace "app"'));

			const result = await legacy.createTable(SessionModel);

			expect(result.tableCreated).toBe(false);
			expect(connections.queries.map((query) => query.statement)).toEqual([
				LEGACY_KEYSPACES_QUERY,
				LEGACY_COLUMN_FAMILIES_QUERY,
			]);
		});

		it('propagates other table creation failures', async () => {
			connections.addKeyspace('app').failNext(/^CREATE TABLE/, new Error('Unknown type inet'));

			const error = await tables.createTable(SessionModel).catch((err: unknown) => err);

			expect(error).toBeInstanceOf(SchemaError);
			if (error instanceof SchemaError) {
				expect(error.message).toBe('Unknown type inet');
				expect(error.statement).toBe(CREATE_SESSION_TABLE);
			}
		});

		it('renders conditional DDL when enabled', async () => {
			const conditional = createTables(connections, 'system_schema', {schema: {use_if_not_exists: true}});
			connections.addKeyspace('app');

			await conditional.createTable(UserModel);

			expect(connections.statements).toEqual([
				'CREATE TABLE IF NOT EXISTS app.users (id uuid, email text, display_name text, PRIMARY KEY ((id))) WITH read_repair_chance = 0.1',
				'CREATE INDEX IF NOT EXISTS index_users_email ON app.users ("email")',
			]);
		});
	});

	describe('deleteTable', () => {
		it('is a no-op for a missing table', async () => {
			await expect(tables.deleteTable(UserModel)).resolves.toBe(false);
			expect(connections.statements).toEqual([]);
		});

		it('drops an existing table', async () => {
			connections.addIndex('app', 'users', 'index_users_email');

			await expect(tables.deleteTable(UserModel)).resolves.toBe(true);
			expect(connections.statements).toEqual(['DROP TABLE app.users']);
			expect(connections.hasTable('app', 'users')).toBe(false);
		});
	});

	describe('deleteIndex', () => {
		it('drops an existing index', async () => {
			connections.addIndex('app', 'users', 'index_users_email');

			await expect(tables.deleteIndex(UserModel, 'email')).resolves.toBe(true);
			expect(connections.statements).toEqual(['DROP INDEX app.index_users_email']);
			expect(connections.hasIndex('app', 'index_users_email')).toBe(false);
		});

		it('is a no-op for a missing index', async () => {
			connections.addTable('app', 'users');

			await expect(tables.deleteIndex(UserModel, 'email')).resolves.toBe(false);
			expect(connections.statements).toEqual([]);
		});

		it('rejects unknown columns', async () => {
			await expect(tables.deleteIndex(UserModel, 'nickname')).rejects.toThrow('Model User has no column nickname');
		});

		it('finds legacy index entries', async () => {
			const legacy = createTables(connections, 'legacy');
			connections.addIndex('app', 'users', 'index_users_email');

			await expect(legacy.deleteIndex(UserModel, 'email')).resolves.toBe(true);
		});
	});

	describe('syncModels', () => {
		it('creates every concrete model and skips abstract ones', async () => {
			const results = await tables.syncModels([AuditableModel, UserModel, SessionModel]);

			expect(results.map((result) => result.table)).toEqual(['app.users', 'app.session']);
			expect(connections.statements).toEqual([
				CREATE_APP_KEYSPACE,
				CREATE_USERS_TABLE,
				CREATE_USERS_EMAIL_INDEX,
				CREATE_SESSION_TABLE,
			]);
		});
	});
});
