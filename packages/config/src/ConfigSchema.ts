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

import {z} from 'zod';

const SCHEMA_NAME_REGEX = /^\w{1,48}$/;

export const ReplicationConfigSchema = z.object({
	strategy_class: z.string().min(1).default('SimpleStrategy'),
	replication_factor: z.number().int().positive().default(3),
	durable_writes: z.boolean().default(true),
	options: z.record(z.union([z.string(), z.number()])).default({}),
});

export const CassandraConfigSchema = z.object({
	hosts: z.array(z.string().min(1)).min(1),
	local_dc: z.string().min(1),
	username: z.string().optional(),
	password: z.string().optional(),
	keyspace: z.string().regex(SCHEMA_NAME_REGEX).optional(),
});

export const SchemaSyncConfigSchema = z.object({
	default_keyspace: z.string().regex(SCHEMA_NAME_REGEX, 'must be 1-48 word characters'),
	catalog: z.enum(['legacy', 'system_schema']).default('system_schema'),
	use_if_not_exists: z.boolean().default(false),
	replication: ReplicationConfigSchema.default({}),
});

export const ConfigSchema = z.object({
	env: z.enum(['development', 'production', 'test']).default('development'),
	log_level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
	cassandra: CassandraConfigSchema,
	schema: SchemaSyncConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type CassandraConfig = z.infer<typeof CassandraConfigSchema>;
export type SchemaSyncConfig = z.infer<typeof SchemaSyncConfigSchema>;
export type ReplicationConfig = z.infer<typeof ReplicationConfigSchema>;
export type CatalogVersion = SchemaSyncConfig['catalog'];
