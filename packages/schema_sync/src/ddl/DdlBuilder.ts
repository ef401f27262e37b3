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
import {
	assertSchemaName,
	forceQuoteIdentifier,
	formatNumberLiteral,
	quoteIdentifier,
	quoteStringLiteral,
} from '@cqlsync/schema_sync/src/ddl/CqlIdentifiers';
import type {TableSpec} from '@cqlsync/schema_sync/src/ddl/TableSpec';
import type {ColumnDefinition} from '@cqlsync/schema_sync/src/model/Columns';

export const SIMPLE_STRATEGY = 'SimpleStrategy';
export const DEFAULT_REPLICATION_FACTOR = 3;

export type ReplicationValue = string | number;

export interface KeyspaceSpec {
	name: string;
	strategyClass: string;
	replicationFactor: number;
	durableWrites: boolean;
	replicationOptions: Readonly<Record<string, ReplicationValue>>;
}

export interface DdlCapabilities {
	/** Render IF NOT EXISTS / IF EXISTS guards. */
	conditionalDdl: boolean;
}

export const LEGACY_DDL_CAPABILITIES: DdlCapabilities = {conditionalDdl: false};

/**
 * Class and factor first, then the extra options in insertion order. An extra option with the
 * same key replaces the value in place.
 */
export function buildReplicationMap(spec: KeyspaceSpec): Map<string, ReplicationValue> {
	const map = new Map<string, ReplicationValue>([
		['class', spec.strategyClass],
		['replication_factor', spec.replicationFactor],
	]);
	for (const [key, value] of Object.entries(spec.replicationOptions)) {
		map.set(key, value);
	}
	return map;
}

function formatReplicationValue(value: ReplicationValue): string {
	return typeof value === 'number' ? formatNumberLiteral(value) : quoteStringLiteral(value);
}

export function formatReplicationMap(map: ReadonlyMap<string, ReplicationValue>): string {
	const entries = [...map].map(([key, value]) => `${quoteStringLiteral(key)}: ${formatReplicationValue(value)}`);
	return `{${entries.join(', ')}}`;
}

function ifNotExists(capabilities: DdlCapabilities): string {
	return capabilities.conditionalDdl ? 'IF NOT EXISTS ' : '';
}

function ifExists(capabilities: DdlCapabilities): string {
	return capabilities.conditionalDdl ? 'IF EXISTS ' : '';
}

export function buildCreateKeyspace(spec: KeyspaceSpec, capabilities = LEGACY_DDL_CAPABILITIES): string {
	assertSchemaName('keyspace', spec.name);
	const replication = formatReplicationMap(buildReplicationMap(spec));
	let statement = `CREATE KEYSPACE ${ifNotExists(capabilities)}${quoteIdentifier(spec.name)} WITH REPLICATION = ${replication}`;
	if (spec.strategyClass !== SIMPLE_STRATEGY) {
		statement += ` AND DURABLE_WRITES = ${spec.durableWrites ? 'true' : 'false'}`;
	}
	return statement;
}

export function buildDropKeyspace(name: string, capabilities = LEGACY_DDL_CAPABILITIES): string {
	assertSchemaName('keyspace', name);
	return `DROP KEYSPACE ${ifExists(capabilities)}${quoteIdentifier(name)}`;
}

export function buildPrimaryKeyClause(
	partitionKeys: ReadonlyArray<ColumnDefinition>,
	clusteringKeys: ReadonlyArray<ColumnDefinition>,
): string {
	if (partitionKeys.length === 0) {
		throw new SchemaError('A primary key needs at least one partition key column');
	}
	const partition = partitionKeys.map((col) => quoteIdentifier(col.dbField)).join(', ');
	const clustering = clusteringKeys.map((col) => `, ${quoteIdentifier(col.dbField)}`).join('');
	return `PRIMARY KEY ((${partition})${clustering})`;
}

export function buildClusteringOrderClause(clusteringKeys: ReadonlyArray<ColumnDefinition>): string | null {
	if (!clusteringKeys.some((col) => col.clusteringOrder === 'DESC')) return null;
	const order = clusteringKeys.map((col) => `${quoteIdentifier(col.dbField)} ${col.clusteringOrder ?? 'ASC'}`);
	return `clustering order by (${order.join(', ')})`;
}

export function buildCreateTable(spec: TableSpec, capabilities = LEGACY_DDL_CAPABILITIES): string {
	const definitions = spec.columns.map((col) => `${quoteIdentifier(col.dbField)} ${col.type}`);
	definitions.push(buildPrimaryKeyClause(spec.partitionKeys, spec.clusteringKeys));

	const options: Array<string> = [];
	if (spec.readRepairChance !== null) {
		options.push(`read_repair_chance = ${formatNumberLiteral(spec.readRepairChance)}`);
	}
	const clusteringOrder = buildClusteringOrderClause(spec.clusteringKeys);
	if (clusteringOrder) {
		options.push(clusteringOrder);
	}

	const parts = [`CREATE TABLE ${ifNotExists(capabilities)}${spec.qualifiedName}`, `(${definitions.join(', ')})`];
	if (options.length > 0) {
		parts.push(`WITH ${options.join(' AND ')}`);
	}
	return parts.join(' ');
}

export function buildDropTable(spec: TableSpec, capabilities = LEGACY_DDL_CAPABILITIES): string {
	return `DROP TABLE ${ifExists(capabilities)}${spec.qualifiedName}`;
}

export function indexName(table: string, column: ColumnDefinition): string {
	return `index_${table}_${column.dbField}`;
}

/** The form the catalog readers report index names in. */
export function qualifiedIndexName(table: string, column: ColumnDefinition): string {
	return `${table}.${indexName(table, column)}`;
}

export function buildCreateIndex(
	spec: TableSpec,
	column: ColumnDefinition,
	capabilities = LEGACY_DDL_CAPABILITIES,
): string {
	const name = indexName(spec.name, column);
	assertSchemaName('index', name);
	return `CREATE INDEX ${ifNotExists(capabilities)}${quoteIdentifier(name)} ON ${spec.qualifiedName} (${forceQuoteIdentifier(column.dbField)})`;
}

export function buildDropIndex(spec: TableSpec, column: ColumnDefinition, capabilities = LEGACY_DDL_CAPABILITIES): string {
	const name = indexName(spec.name, column);
	assertSchemaName('index', name);
	return `DROP INDEX ${ifExists(capabilities)}${quoteIdentifier(spec.keyspace)}.${quoteIdentifier(name)}`;
}
