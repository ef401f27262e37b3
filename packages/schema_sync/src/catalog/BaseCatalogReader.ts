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
import type {Logger} from '@cqlsync/logger/src/Logger';
import {rowParser} from '@cqlsync/schema_sync/src/catalog/CatalogRows';
import type {ICatalogReader} from '@cqlsync/schema_sync/src/catalog/ICatalogReader';
import type {CqlParams, ICqlConnectionManager} from '@cqlsync/schema_sync/src/database/ICqlConnection';
import type {z} from 'zod';

export abstract class BaseCatalogReader implements ICatalogReader {
	abstract readonly version: CatalogVersion;

	constructor(
		protected readonly connections: ICqlConnectionManager,
		protected readonly logger: Logger,
	) {}

	abstract listKeyspaces(): Promise<Array<string>>;

	abstract listColumnFamilies(keyspace: string): Promise<Array<string>>;

	abstract listIndexNames(keyspace: string): Promise<Array<string>>;

	protected async query<Schema extends z.ZodTypeAny>(
		statement: string,
		params: CqlParams,
		schema: Schema,
	): Promise<Array<z.output<Schema>>> {
		const rows = await this.connections.withConnection((connection) =>
			connection.execute(statement, params, rowParser(schema)),
		);
		this.logger.debug({catalog: this.version, query: statement, params, rows: rows.length}, 'Read schema catalog');
		return rows;
	}
}
