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

import {errorMessage} from '@cqlsync/errors/src/CqlSyncError';
import {SchemaError} from '@cqlsync/errors/src/domains/schema/SchemaError';
import type {Logger} from '@cqlsync/logger/src/Logger';
import type {ICqlConnectionManager} from '@cqlsync/schema_sync/src/database/ICqlConnection';
import type {AlreadyExistsMatcher} from '@cqlsync/schema_sync/src/sync/AlreadyExistsMatcher';

function toSchemaError(error: unknown, statement: string): SchemaError {
	return error instanceof SchemaError ? error : new SchemaError(errorMessage(error), {statement, cause: error});
}

export class DdlExecutor {
	constructor(
		private readonly connections: ICqlConnectionManager,
		private readonly alreadyExists: AlreadyExistsMatcher,
		private readonly logger: Logger,
	) {}

	/**
	 * Returns false when the statement lost a creation race, which is not an error.
	 */
	async create(statement: string, target: string): Promise<boolean> {
		try {
			await this.connections.execute(statement);
		} catch (error) {
			if (this.alreadyExists(error)) {
				this.logger.warn({target, error: errorMessage(error)}, 'Schema object was created concurrently');
				return false;
			}
			throw toSchemaError(error, statement);
		}
		this.logger.info({target, statement}, 'Created schema object');
		return true;
	}

	async drop(statement: string, target: string): Promise<void> {
		try {
			await this.connections.execute(statement);
		} catch (error) {
			throw toSchemaError(error, statement);
		}
		this.logger.info({target, statement}, 'Dropped schema object');
	}
}
