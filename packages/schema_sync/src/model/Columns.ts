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

export type ClusteringOrder = 'ASC' | 'DESC';

export interface ColumnOptions {
	/** Column name in the database, when it differs from the attribute name. */
	dbField?: string;
	primaryKey?: boolean;
	/** Implies `primaryKey`. */
	partitionKey?: boolean;
	index?: boolean;
	/** Only meaningful on clustering (primary, non-partition) columns. */
	clusteringOrder?: ClusteringOrder;
}

export interface ColumnDefinition {
	readonly name: string;
	readonly dbField: string;
	readonly type: string;
	readonly primaryKey: boolean;
	readonly partitionKey: boolean;
	readonly index: boolean;
	readonly clusteringOrder: ClusteringOrder | null;
}

export function column(name: string, type: string, options: ColumnOptions = {}): ColumnDefinition {
	const partitionKey = options.partitionKey ?? false;
	return {
		name,
		dbField: options.dbField ?? name,
		type,
		primaryKey: partitionKey || (options.primaryKey ?? false),
		partitionKey,
		index: options.index ?? false,
		clusteringOrder: options.clusteringOrder ?? null,
	};
}

type ScalarColumnFactory = (name: string, options?: ColumnOptions) => ColumnDefinition;

function scalar(type: string): ScalarColumnFactory {
	return (name, options) => column(name, type, options);
}

export const Columns = {
	ascii: scalar('ascii'),
	text: scalar('text'),
	varchar: scalar('varchar'),
	tinyint: scalar('tinyint'),
	smallint: scalar('smallint'),
	int: scalar('int'),
	bigint: scalar('bigint'),
	varint: scalar('varint'),
	float: scalar('float'),
	double: scalar('double'),
	decimal: scalar('decimal'),
	boolean: scalar('boolean'),
	uuid: scalar('uuid'),
	timeuuid: scalar('timeuuid'),
	timestamp: scalar('timestamp'),
	date: scalar('date'),
	time: scalar('time'),
	blob: scalar('blob'),
	inet: scalar('inet'),
	counter: scalar('counter'),
	list(name: string, elementType: string, options?: ColumnOptions): ColumnDefinition {
		return column(name, `list<${elementType}>`, options);
	},
	set(name: string, elementType: string, options?: ColumnOptions): ColumnDefinition {
		return column(name, `set<${elementType}>`, options);
	},
	map(name: string, keyType: string, valueType: string, options?: ColumnOptions): ColumnDefinition {
		return column(name, `map<${keyType}, ${valueType}>`, options);
	},
} as const;
