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
import type {
	CqlParams,
	ICqlConnection,
	ICqlConnectionManager,
	RowFactory,
} from '@cqlsync/schema_sync/src/database/ICqlConnection';
import {createComponentLogger} from '@cqlsync/schema_sync/src/Logger';
import cassandra from 'cassandra-driver';

export interface CassandraConnectionOptions {
	hosts: ReadonlyArray<string>;
	localDc: string;
	username?: string;
	password?: string;
	/** Session keyspace; schema statements always qualify their targets. */
	keyspace?: string;
	logQueries?: boolean;
	logger?: Logger;
}

export function createCassandraClient(options: CassandraConnectionOptions): cassandra.Client {
	const clientOptions: cassandra.ClientOptions = {
		contactPoints: [...options.hosts],
		localDataCenter: options.localDc,
		keyspace: options.keyspace,
	};

	if (options.username && options.password) {
		clientOptions.credentials = {
			username: options.username,
			password: options.password,
		};
	}

	return new cassandra.Client(clientOptions);
}

export function formatCql(cql: string): string {
	return cql
		.replace(/\s+/g, ' ')
		.replace(/\s*;\s*$/, '')
		.trim();
}

export function getStatementType(cql: string): string {
	const words = formatCql(cql).toUpperCase().split(' ');
	const [verb = 'QUERY', target] = words;
	if ((verb === 'CREATE' || verb === 'DROP' || verb === 'ALTER') && target) {
		return `${verb} ${target}`;
	}
	if (verb === 'SELECT' || verb === 'INSERT' || verb === 'UPDATE' || verb === 'DELETE') {
		return verb;
	}
	return 'QUERY';
}

export class CassandraConnectionManager implements ICqlConnectionManager {
	private readonly client: cassandra.Client;
	private readonly logger: Logger;
	private readonly logQueries: boolean;
	private connecting: Promise<void> | null = null;

	constructor(options: CassandraConnectionOptions, client?: cassandra.Client) {
		this.client = client ?? createCassandraClient(options);
		this.logger = options.logger ?? createComponentLogger('cassandra');
		this.logQueries = options.logQueries ?? false;
	}

	async withConnection<T>(fn: (connection: ICqlConnection) => Promise<T>): Promise<T> {
		await this.ensureConnected();
		const connection: ICqlConnection = {
			execute: (statement, params, rowFactory) => this.run(statement, params, rowFactory),
		};
		return fn(connection);
	}

	async execute(statement: string): Promise<void> {
		try {
			await this.withConnection((connection) => connection.execute(statement, [], () => null));
		} catch (error) {
			throw new SchemaError(errorMessage(error), {statement, cause: error});
		}
	}

	async shutdown(): Promise<void> {
		if (!this.connecting) return;
		this.connecting = null;
		await this.client.shutdown();
		this.logger.info('Cassandra connection closed');
	}

	private async ensureConnected(): Promise<void> {
		if (!this.connecting) {
			this.connecting = this.client.connect().catch((error: unknown) => {
				this.connecting = null;
				throw error;
			});
		}
		await this.connecting;
	}

	private async run<T>(statement: string, params: CqlParams, rowFactory: RowFactory<T>): Promise<Array<T>> {
		const startTime = performance.now();
		const hasParams = Array.isArray(params) ? params.length > 0 : Object.keys(params).length > 0;

		try {
			const result = await this.client.execute(statement, params, {prepare: hasParams});
			const rows = (result.rows ?? []).map((row) => rowFactory(row));

			if (this.logQueries) {
				this.logger.debug(
					{
						type: getStatementType(statement),
						query: formatCql(statement),
						params,
						durationMs: Number((performance.now() - startTime).toFixed(2)),
						rows: rows.length,
					},
					'Cassandra query',
				);
			}

			return rows;
		} catch (error: unknown) {
			this.logger.warn(
				{error: errorMessage(error), query: formatCql(statement), type: getStatementType(statement)},
				'Cassandra query failed',
			);
			throw error;
		}
	}
}
