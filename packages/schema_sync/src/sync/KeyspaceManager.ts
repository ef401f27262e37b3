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

import type {Logger} from '@cqlsync/logger/src/Logger';
import type {ICatalogReader} from '@cqlsync/schema_sync/src/catalog/ICatalogReader';
import {
	buildCreateKeyspace,
	buildDropKeyspace,
	type DdlCapabilities,
	DEFAULT_REPLICATION_FACTOR,
	type KeyspaceSpec,
	LEGACY_DDL_CAPABILITIES,
	type ReplicationValue,
	SIMPLE_STRATEGY,
} from '@cqlsync/schema_sync/src/ddl/DdlBuilder';
import type {DdlExecutor} from '@cqlsync/schema_sync/src/sync/DdlExecutor';

export interface CreateKeyspaceOptions {
	strategyClass?: string;
	replicationFactor?: number;
	/** Only rendered for strategies other than SimpleStrategy. */
	durableWrites?: boolean;
	/** Merged into the replication map after class and factor; same keys win. */
	replicationOptions?: Readonly<Record<string, ReplicationValue>>;
}

export interface KeyspaceManagerOptions {
	catalog: ICatalogReader;
	executor: DdlExecutor;
	logger: Logger;
	capabilities?: DdlCapabilities;
}

export function toKeyspaceSpec(name: string, options: CreateKeyspaceOptions = {}): KeyspaceSpec {
	return {
		name,
		strategyClass: options.strategyClass ?? SIMPLE_STRATEGY,
		replicationFactor: options.replicationFactor ?? DEFAULT_REPLICATION_FACTOR,
		durableWrites: options.durableWrites ?? true,
		replicationOptions: options.replicationOptions ?? {},
	};
}

export class KeyspaceManager {
	private readonly catalog: ICatalogReader;
	private readonly executor: DdlExecutor;
	private readonly logger: Logger;
	private readonly capabilities: DdlCapabilities;

	constructor(options: KeyspaceManagerOptions) {
		this.catalog = options.catalog;
		this.executor = options.executor;
		this.logger = options.logger;
		this.capabilities = options.capabilities ?? LEGACY_DDL_CAPABILITIES;
	}

	async exists(name: string): Promise<boolean> {
		const keyspaces = await this.catalog.listKeyspaces();
		return keyspaces.includes(name);
	}

	/**
	 * Creates the keyspace unless the catalog already lists it. Returns whether a statement was issued
	 * and took effect.
	 */
	async createKeyspace(name: string, options: CreateKeyspaceOptions = {}): Promise<boolean> {
		const statement = buildCreateKeyspace(toKeyspaceSpec(name, options), this.capabilities);
		if (await this.exists(name)) {
			this.logger.debug({keyspace: name}, 'Keyspace already exists');
			return false;
		}
		return this.executor.create(statement, name);
	}

	async deleteKeyspace(name: string): Promise<boolean> {
		if (!(await this.exists(name))) {
			this.logger.debug({keyspace: name}, 'Keyspace does not exist, nothing to drop');
			return false;
		}
		await this.executor.drop(buildDropKeyspace(name, this.capabilities), name);
		return true;
	}
}
