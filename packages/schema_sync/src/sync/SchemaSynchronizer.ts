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

import {SchemaError} from '@cqlsync/errors/src/domains/schema/SchemaError';
import type {Logger} from '@cqlsync/logger/src/Logger';
import type {ICatalogReader} from '@cqlsync/schema_sync/src/catalog/ICatalogReader';
import {
	buildCreateIndex,
	buildCreateTable,
	buildDropIndex,
	buildDropTable,
	type DdlCapabilities,
	indexName,
	LEGACY_DDL_CAPABILITIES,
	qualifiedIndexName,
} from '@cqlsync/schema_sync/src/ddl/DdlBuilder';
import {type TableSpec, toTableSpec} from '@cqlsync/schema_sync/src/ddl/TableSpec';
import type {TableModel} from '@cqlsync/schema_sync/src/model/ModelDefinition';
import type {DdlExecutor} from '@cqlsync/schema_sync/src/sync/DdlExecutor';
import type {CreateKeyspaceOptions, KeyspaceManager} from '@cqlsync/schema_sync/src/sync/KeyspaceManager';

export interface SchemaSynchronizerOptions {
	catalog: ICatalogReader;
	executor: DdlExecutor;
	keyspaces: KeyspaceManager;
	logger: Logger;
	defaultKeyspace?: string | null;
	/** Replication used when a missing keyspace is created on a table's behalf. */
	keyspaceDefaults?: CreateKeyspaceOptions;
	capabilities?: DdlCapabilities;
}

export interface CreateTableOptions {
	createMissingKeyspace?: boolean;
}

export interface TableSyncResult {
	model: string;
	table: string;
	tableCreated: boolean;
	indexesCreated: Array<string>;
}

interface PlannedIndex {
	name: string;
	/** `<table>.<index>`, as the catalog readers report it. */
	qualifiedName: string;
	statement: string;
}

export class SchemaSynchronizer {
	private readonly catalog: ICatalogReader;
	private readonly executor: DdlExecutor;
	private readonly keyspaces: KeyspaceManager;
	private readonly logger: Logger;
	private readonly defaultKeyspace: string | null;
	private readonly keyspaceDefaults: CreateKeyspaceOptions;
	private readonly capabilities: DdlCapabilities;

	constructor(options: SchemaSynchronizerOptions) {
		this.catalog = options.catalog;
		this.executor = options.executor;
		this.keyspaces = options.keyspaces;
		this.logger = options.logger;
		this.defaultKeyspace = options.defaultKeyspace ?? null;
		this.keyspaceDefaults = options.keyspaceDefaults ?? {};
		this.capabilities = options.capabilities ?? LEGACY_DDL_CAPABILITIES;
	}

	async createTable(model: TableModel, options: CreateTableOptions = {}): Promise<TableSyncResult> {
		if (model.abstract) {
			throw new SchemaError(`Cannot create table from abstract model ${model.name}`);
		}

		const spec = toTableSpec(model, this.defaultKeyspace);
		const tableStatement = buildCreateTable(spec, this.capabilities);
		// Built up front: an invalid index name must fail before anything is created.
		const indexStatements = spec.indexedColumns.map((column): PlannedIndex => ({
			name: indexName(spec.name, column),
			qualifiedName: qualifiedIndexName(spec.name, column),
			statement: buildCreateIndex(spec, column, this.capabilities),
		}));
		if (options.createMissingKeyspace ?? true) {
			await this.keyspaces.createKeyspace(spec.keyspace, this.keyspaceDefaults);
		}

		let tableCreated = false;
		const tables = await this.catalog.listColumnFamilies(spec.keyspace);
		if (tables.includes(spec.name)) {
			this.logger.debug({table: spec.qualifiedName}, 'Table already exists');
		} else {
			tableCreated = await this.executor.create(tableStatement, spec.qualifiedName);
		}

		const indexesCreated = await this.createMissingIndexes(spec, indexStatements);
		return {model: model.name, table: spec.qualifiedName, tableCreated, indexesCreated};
	}

	async deleteTable(model: TableModel): Promise<boolean> {
		const spec = toTableSpec(model, this.defaultKeyspace);
		const tables = await this.catalog.listColumnFamilies(spec.keyspace);
		if (!tables.includes(spec.name)) {
			this.logger.debug({table: spec.qualifiedName}, 'Table does not exist, nothing to drop');
			return false;
		}
		await this.executor.drop(buildDropTable(spec, this.capabilities), spec.qualifiedName);
		return true;
	}

	async deleteIndex(model: TableModel, columnName: string): Promise<boolean> {
		const column = model.column(columnName);
		if (!column) {
			throw new SchemaError(`Model ${model.name} has no column ${columnName}`);
		}

		const spec = toTableSpec(model, this.defaultKeyspace);
		const existing = await this.catalog.listIndexNames(spec.keyspace);
		if (!existing.includes(qualifiedIndexName(spec.name, column))) {
			this.logger.debug({table: spec.qualifiedName, index: indexName(spec.name, column)}, 'Index does not exist');
			return false;
		}
		await this.executor.drop(buildDropIndex(spec, column, this.capabilities), indexName(spec.name, column));
		return true;
	}

	/**
	 * Creates every concrete model's table and indexes, one after another.
	 */
	async syncModels(models: ReadonlyArray<TableModel>, options: CreateTableOptions = {}): Promise<Array<TableSyncResult>> {
		const results: Array<TableSyncResult> = [];
		for (const model of models) {
			if (model.abstract) {
				this.logger.debug({model: model.name}, 'Skipping abstract model');
				continue;
			}
			results.push(await this.createTable(model, options));
		}
		return results;
	}

	private async createMissingIndexes(spec: TableSpec, indexes: ReadonlyArray<PlannedIndex>): Promise<Array<string>> {
		if (indexes.length === 0) return [];

		const existing = new Set(await this.catalog.listIndexNames(spec.keyspace));
		const created: Array<string> = [];
		for (const index of indexes) {
			if (existing.has(index.qualifiedName)) {
				this.logger.debug({table: spec.qualifiedName, index: index.name}, 'Index already exists');
				continue;
			}
			if (await this.executor.create(index.statement, index.name)) {
				created.push(index.name);
			}
		}
		return created;
	}
}
