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

import {CqlSyncError} from '@cqlsync/errors/src/CqlSyncError';

export const SCHEMA_ERROR_CODE = 'SCHEMA_ERROR';

export class SchemaError extends CqlSyncError {
	constructor(message: string, options: {statement?: string; cause?: unknown} = {}) {
		super({
			code: SCHEMA_ERROR_CODE,
			message,
			data: options.statement === undefined ? undefined : {statement: options.statement},
			cause: options.cause,
		});
		this.name = 'SchemaError';
	}

	get statement(): string | undefined {
		const statement = this.data?.statement;
		return typeof statement === 'string' ? statement : undefined;
	}
}
