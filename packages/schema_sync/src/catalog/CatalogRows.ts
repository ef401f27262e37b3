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

import type {RowFactory} from '@cqlsync/schema_sync/src/database/ICqlConnection';
import {z} from 'zod';

export const KeyspaceNameRowSchema = z.object({
	keyspace_name: z.string(),
});

export const LegacyColumnFamilyRowSchema = z.object({
	columnfamily_name: z.string(),
});

export const LegacyIndexInfoRowSchema = z.object({
	index_name: z.string(),
});

export const TableNameRowSchema = z.object({
	table_name: z.string(),
});

export const IndexRowSchema = z.object({
	table_name: z.string(),
	index_name: z.string(),
});

export function rowParser<Schema extends z.ZodTypeAny>(schema: Schema): RowFactory<z.output<Schema>> {
	return (row) => schema.parse(row);
}
