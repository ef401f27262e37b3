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

import {CqlSyncError, errorChain, errorMessage} from '@cqlsync/errors/src/CqlSyncError';
import {ModelDefinitionError} from '@cqlsync/errors/src/domains/schema/ModelDefinitionError';
import {SCHEMA_ERROR_CODE, SchemaError} from '@cqlsync/errors/src/domains/schema/SchemaError';
import {describe, expect, test} from 'vitest';

describe('CqlSyncError', () => {
	test('SchemaError carries its code, statement and cause', () => {
		const cause = new Error('boom');
		const error = new SchemaError('Cannot create table', {statement: 'CREATE TABLE app.t (id uuid PRIMARY KEY)', cause});

		expect(error).toBeInstanceOf(CqlSyncError);
		expect(error.name).toBe('SchemaError');
		expect(error.code).toBe(SCHEMA_ERROR_CODE);
		expect(error.statement).toBe('CREATE TABLE app.t (id uuid PRIMARY KEY)');
		expect(error.cause).toBe(cause);
	});

	test('SchemaError without a statement has no data', () => {
		const error = new SchemaError('No keyspace');

		expect(error.statement).toBeUndefined();
		expect(error.data).toBeUndefined();
		expect(error.cause).toBeUndefined();
	});

	test('ModelDefinitionError prefixes the model name', () => {
		const error = new ModelDefinitionError('User', 'column name "id" is used more than once');

		expect(error.message).toBe('User: column name "id" is used more than once');
		expect(error.model).toBe('User');
		expect(error.data).toEqual({model: 'User'});
	});

	test('errorChain walks causes outermost first', () => {
		const root = new Error('root');
		const middle = new SchemaError('middle', {cause: root});
		const outer = new Error('outer', {cause: middle});

		expect([...errorChain(outer)]).toEqual([outer, middle, root]);
		expect([...errorChain('plain')]).toEqual(['plain']);
		expect([...errorChain(null)]).toEqual([]);
	});

	test('errorChain stops on cycles', () => {
		const first = new Error('first');
		const second = new Error('second', {cause: first});
		first.cause = second;

		expect([...errorChain(first)]).toEqual([first, second]);
	});

	test('errorMessage stringifies non-errors', () => {
		expect(errorMessage(new Error('boom'))).toBe('boom');
		expect(errorMessage(42)).toBe('42');
	});
});
