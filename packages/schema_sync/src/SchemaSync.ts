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

import type {Config} from '@cqlsync/config/src/ConfigSchema';
import type {Logger} from '@cqlsync/logger/src/Logger';
import {createCatalogReader} from '@cqlsync/schema_sync/src/catalog/CatalogReaderFactory';
import type {ICatalogReader} from '@cqlsync/schema_sync/src/catalog/ICatalogReader';
import {CassandraConnectionManager} from '@cqlsync/schema_sync/src/database/Cassandra';
import type {ICqlConnectionManager} from '@cqlsync/schema_sync/src/database/ICqlConnection';
import type {DdlCapabilities} from '@cqlsync/schema_sync/src/ddl/DdlBuilder';
import {getLogger} from '@cqlsync/schema_sync/src/Logger';
import {type AlreadyExistsMatcher, createAlreadyExistsMatcher} from '@cqlsync/schema_sync/src/sync/AlreadyExistsMatcher';
import {DdlExecutor} from '@cqlsync/schema_sync/src/sync/DdlExecutor';
import {type CreateKeyspaceOptions, KeyspaceManager} from '@cqlsync/schema_sync/src/sync/KeyspaceManager';
import {SchemaSynchronizer} from '@cqlsync/schema_sync/src/sync/SchemaSynchronizer';

export interface SchemaSyncOptions {
	config: Config;
	logger?: Logger;
	connections?: ICqlConnectionManager;
	alreadyExists?: AlreadyExistsMatcher;
}

export interface SchemaSync {
	readonly catalog: ICatalogReader;
	readonly keyspaces: KeyspaceManager;
	readonly tables: SchemaSynchronizer;
	shutdown(): Promise<void>;
}

export function keyspaceDefaultsFromConfig(config: Config): CreateKeyspaceOptions {
	const {replication} = config.schema;
	return {
		strategyClass: replication.strategy_class,
		replicationFactor: replication.replication_factor,
		durableWrites: replication.durable_writes,
		replicationOptions: replication.options,
	};
}

export function createSchemaSync({config, logger, connections, alreadyExists}: SchemaSyncOptions): SchemaSync {
	const baseLogger = (logger ?? getLogger()).child({component: 'schema-sync'});
	const connectionManager =
		connections ??
		new CassandraConnectionManager({
			hosts: config.cassandra.hosts,
			localDc: config.cassandra.local_dc,
			username: config.cassandra.username,
			password: config.cassandra.password,
			keyspace: config.cassandra.keyspace,
			logQueries: config.env === 'development',
			logger: baseLogger.child({component: 'cassandra'}),
		});

	const capabilities: DdlCapabilities = {conditionalDdl: config.schema.use_if_not_exists};
	const catalog = createCatalogReader(config.schema.catalog, connectionManager, baseLogger.child({component: 'catalog'}));
	const executor = new DdlExecutor(
		connectionManager,
		alreadyExists ?? createAlreadyExistsMatcher(config.schema.catalog),
		baseLogger.child({component: 'ddl'}),
	);
	const keyspaces = new KeyspaceManager({
		catalog,
		executor,
		capabilities,
		logger: baseLogger.child({component: 'keyspaces'}),
	});
	const tables = new SchemaSynchronizer({
		catalog,
		executor,
		keyspaces,
		capabilities,
		defaultKeyspace: config.schema.default_keyspace,
		keyspaceDefaults: keyspaceDefaultsFromConfig(config),
		logger: baseLogger.child({component: 'tables'}),
	});

	return {
		catalog,
		keyspaces,
		tables,
		shutdown: () => connectionManager.shutdown(),
	};
}
