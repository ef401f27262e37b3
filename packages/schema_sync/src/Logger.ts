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

import {createLogger, type Logger} from '@cqlsync/logger/src/Logger';

let rootLogger: Logger = createLogger({name: 'cqlsync'});

export function initializeLogger(logger: Logger): void {
	rootLogger = logger;
}

export function getLogger(): Logger {
	return rootLogger;
}

export function createComponentLogger(component: string): Logger {
	return rootLogger.child({component});
}
