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

import type {CatalogVersion} from '@cqlsync/config/src/ConfigSchema';
import {errorChain} from '@cqlsync/errors/src/CqlSyncError';
import cassandra from 'cassandra-driver';

/**
 * Decides whether a failed CREATE lost a race against another creator of the same object.
 */
export type AlreadyExistsMatcher = (error: unknown) => boolean;

export const LEGACY_ALREADY_EXISTS_MESSAGES: ReadonlyArray<string> = ['Cannot add already existing column family'];

export function messageAlreadyExistsMatcher(
	fragments: ReadonlyArray<string> = LEGACY_ALREADY_EXISTS_MESSAGES,
): AlreadyExistsMatcher {
	return (error) => {
		for (const link of errorChain(error)) {
			const message = link instanceof Error ? link.message : String(link);
			if (fragments.some((fragment) => message.includes(fragment))) {
				return true;
			}
		}
		return false;
	};
}

export function responseCodeAlreadyExistsMatcher(): AlreadyExistsMatcher {
	return (error) => {
		for (const link of errorChain(error)) {
			if (
				link instanceof cassandra.errors.ResponseError &&
				link.code === cassandra.types.responseErrorCodes.alreadyExists
			) {
				return true;
			}
		}
		return false;
	};
}

export function anyAlreadyExistsMatcher(...matchers: Array<AlreadyExistsMatcher>): AlreadyExistsMatcher {
	return (error) => matchers.some((matcher) => matcher(error));
}

export function createAlreadyExistsMatcher(version: CatalogVersion): AlreadyExistsMatcher {
	if (version === 'legacy') {
		return messageAlreadyExistsMatcher();
	}
	return anyAlreadyExistsMatcher(responseCodeAlreadyExistsMatcher(), messageAlreadyExistsMatcher());
}
