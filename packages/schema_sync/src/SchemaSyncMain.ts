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

import type {ConfigObject} from '@cqlsync/config/src/config_loader/ConfigObjectMerge';
import {loadConfig, resolveConfigPaths} from '@cqlsync/config/src/ConfigLoader';
import {createLogger} from '@cqlsync/logger/src/Logger';
import type {ICqlConnectionManager} from '@cqlsync/schema_sync/src/database/ICqlConnection';
import {initializeLogger} from '@cqlsync/schema_sync/src/Logger';
import type {TableModel} from '@cqlsync/schema_sync/src/model/ModelDefinition';
import {createSchemaSync} from '@cqlsync/schema_sync/src/SchemaSync';
import type {TableSyncResult} from '@cqlsync/schema_sync/src/sync/SchemaSynchronizer';

export interface RunSchemaSyncOptions {
	configPaths?: ReadonlyArray<string>;
	configOverrides?: ConfigObject;
	connections?: ICqlConnectionManager;
}

/**
 * Loads configuration, creates every concrete model's table and indexes, and closes the connection.
 */
export async function runSchemaSync(
	models: ReadonlyArray<TableModel>,
	options: RunSchemaSyncOptions = {},
): Promise<Array<TableSyncResult>> {
	const config = await loadConfig(options.configPaths ?? resolveConfigPaths(), options.configOverrides);
	const logger = createLogger({name: 'cqlsync', level: config.log_level});
	initializeLogger(logger);

	const sync = createSchemaSync({config, logger, connections: options.connections});
	try {
		logger.info(
			{keyspace: config.schema.default_keyspace, catalog: config.schema.catalog, models: models.length},
			'Synchronizing schema',
		);
		const results = await sync.tables.syncModels(models);
		logger.info(
			{
				tablesCreated: results.filter((result) => result.tableCreated).length,
				indexesCreated: results.reduce((total, result) => total + result.indexesCreated.length, 0),
			},
			'Schema synchronized',
		);
		return results;
	} finally {
		await sync.shutdown();
	}
}
