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

export interface CqlSyncErrorOptions {
	code: string;
	message: string;
	data?: Record<string, unknown>;
	cause?: unknown;
}

export class CqlSyncError extends Error {
	readonly code: string;
	readonly data?: Record<string, unknown>;

	constructor({code, message, data, cause}: CqlSyncErrorOptions) {
		super(message, cause === undefined ? undefined : {cause});
		this.name = 'CqlSyncError';
		this.code = code;
		this.data = data;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Walks `error` and its `cause` chain, outermost first.
 */
export function* errorChain(error: unknown): Generator<unknown> {
	const seen = new Set<unknown>();
	let current: unknown = error;
	while (current !== undefined && current !== null && !seen.has(current)) {
		seen.add(current);
		yield current;
		current = current instanceof Error ? current.cause : undefined;
	}
}
