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

export type CqlRow = Record<string, unknown>;
export type CqlParams = Array<unknown> | Record<string, unknown>;
export type RowFactory<T> = (row: CqlRow) => T;

export interface ICqlConnection {
	execute<T>(statement: string, params: CqlParams, rowFactory: RowFactory<T>): Promise<Array<T>>;
}

export interface ICqlConnectionManager {
	/** Acquires a connection for the duration of `fn`. */
	withConnection<T>(fn: (connection: ICqlConnection) => Promise<T>): Promise<T>;

	/** Runs a DDL statement. Failures are raised as `SchemaError` with the driver error as cause. */
	execute(statement: string): Promise<void>;

	shutdown(): Promise<void>;
}
