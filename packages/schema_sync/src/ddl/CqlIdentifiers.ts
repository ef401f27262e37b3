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
import reservedKeywords from './CqlReservedKeywords.json';

const RESERVED_KEYWORDS: ReadonlySet<string> = new Set(reservedKeywords);
const UNQUOTED_IDENTIFIER_REGEX = /^[a-z][a-z0-9_]*$/;
const SCHEMA_NAME_REGEX = /^\w{1,48}$/;
const INDEX_NAME_REGEX = /^\w+$/;

export function isReservedKeyword(name: string): boolean {
	return RESERVED_KEYWORDS.has(name.toLowerCase());
}

export function forceQuoteIdentifier(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Lowercase identifiers that are not keywords go out bare; everything else is double-quoted so
 * that case and special characters survive.
 */
export function quoteIdentifier(name: string): string {
	if (UNQUOTED_IDENTIFIER_REGEX.test(name) && !isReservedKeyword(name)) {
		return name;
	}
	return forceQuoteIdentifier(name);
}

export function quoteStringLiteral(value: string): string {
	return `'${value.replace(/'/g, "''")}'`;
}

export function formatNumberLiteral(value: number): string {
	if (!Number.isFinite(value)) {
		throw new SchemaError(`Cannot render non-finite number ${value} in a statement`);
	}
	return String(value);
}

export function assertSchemaName(kind: 'keyspace' | 'table' | 'index', name: string): void {
	const pattern = kind === 'index' ? INDEX_NAME_REGEX : SCHEMA_NAME_REGEX;
	if (!pattern.test(name)) {
		throw new SchemaError(`Invalid ${kind} name "${name}": expected letters, digits or underscores only`);
	}
}
