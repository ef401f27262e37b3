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

import {access, readFile} from 'node:fs/promises';
import {type Config, ConfigSchema} from '@cqlsync/config/src/ConfigSchema';
import {type ConfigObject, deepMerge, isConfigObject} from '@cqlsync/config/src/config_loader/ConfigObjectMerge';
import {z} from 'zod';

export const CONFIG_PATH_ENV = 'CQLSYNC_CONFIG';

let cachedConfig: Config | null = null;

async function fileExists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
}

async function findConfigFile(paths: ReadonlyArray<string>): Promise<string> {
	for (const path of paths) {
		if (await fileExists(path)) {
			return path;
		}
	}
	throw new Error(`No config file found (checked: ${paths.join(', ')})`);
}

async function readConfigObject(path: string): Promise<ConfigObject> {
	const raw = await readFile(path, 'utf8');
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new Error(`Invalid JSON in config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
	}
	if (!isConfigObject(parsed)) {
		throw new Error(`Config file ${path} must contain a JSON object`);
	}
	return parsed;
}

function unwrapSchema(schema: z.ZodTypeAny): z.ZodTypeAny {
	if (schema instanceof z.ZodDefault) return unwrapSchema(schema.removeDefault());
	if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return unwrapSchema(schema.unwrap());
	return schema;
}

function collectUnknownKeys(schema: z.ZodTypeAny, value: unknown, parent: string, out: Array<string>): void {
	const objectSchema = unwrapSchema(schema);
	if (!(objectSchema instanceof z.ZodObject) || !isConfigObject(value)) return;

	const shape: Record<string, z.ZodTypeAny> = objectSchema.shape;
	for (const [key, child] of Object.entries(value)) {
		const childSchema = shape[key];
		if (!childSchema) {
			out.push(`Unknown config property "${key}" at "${parent}" is ignored`);
			continue;
		}
		collectUnknownKeys(childSchema, child, parent === '<root>' ? key : `${parent}.${key}`, out);
	}
}

function formatIssues(error: z.ZodError): string {
	return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export function resolveConfigPaths(env: NodeJS.ProcessEnv = process.env): Array<string> {
	const value = env[CONFIG_PATH_ENV] ?? '';
	return value
		.split(',')
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

export function parseConfig(raw: ConfigObject): Config {
	const warnings: Array<string> = [];
	collectUnknownKeys(ConfigSchema, raw, '<root>', warnings);
	for (const warning of warnings) {
		console.warn(warning);
	}

	const result = ConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
	}
	return result.data;
}

export async function loadConfig(paths: ReadonlyArray<string>, overrides: ConfigObject = {}): Promise<Config> {
	if (paths.length === 0) {
		throw new Error(`${CONFIG_PATH_ENV} must be set`);
	}

	const path = await findConfigFile(paths);
	const fromFile = await readConfigObject(path);
	cachedConfig = parseConfig(deepMerge(fromFile, overrides));
	return cachedConfig;
}

export function getConfig(): Config {
	if (!cachedConfig) {
		throw new Error('Config not loaded. Call loadConfig() first.');
	}
	return cachedConfig;
}

export function resetConfig(): void {
	cachedConfig = null;
}
