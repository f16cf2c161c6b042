import { existsSync } from 'node:fs';
import { chmod, readFile, writeFile } from 'node:fs/promises';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import { MissingFieldError, NotFoundError, PersistenceFailedError } from '../errors';
import type { SecretGenerator } from '../secrets/generator';
import {
	DEFAULT_VALUES,
	deriveBrokerUrl,
	ENV_KEYS,
	type EnvironmentField,
	type EnvironmentValues,
	REQUIRED_KEYS,
} from './types';

export interface CreateEnvironmentOptions {
	generator: SecretGenerator;
	lookupPublicIp: () => Promise<string>;
}

/**
 * Populate every field with fresh credentials and placeholder storage
 * settings.
 */
export async function createWithGeneratedValues({
	generator,
	lookupPublicIp,
}: CreateEnvironmentOptions): Promise<EnvironmentValues> {
	const databaseUser = generator.generateIdentifier('user');
	const databasePassword = generator.generate(20);
	const brokerUser = generator.generateIdentifier('rabbit');
	const brokerPassword = generator.generate(20);

	return {
		databaseUser,
		databasePassword,
		databaseUsername: databaseUser,
		databaseSecret: databasePassword,
		brokerUser,
		brokerPassword,
		brokerUrl: deriveBrokerUrl(brokerUser, brokerPassword),
		secretKey: generator.generate(50),
		allowedHosts: await lookupPublicIp(),
		debug: DEFAULT_VALUES.debug,
		forcedAlignmentSecretKey: generator.generate(50),
		storageAccessKey: DEFAULT_VALUES.storageAccessKey,
		storageSecretKey: DEFAULT_VALUES.storageSecretKey,
		storageEndpoint: DEFAULT_VALUES.storageEndpoint,
		uploadMaxBodySize: DEFAULT_VALUES.uploadMaxBodySize,
		adminUsername: generator.generateIdentifier('admin'),
		adminPassword: generator.generate(20),
		adminEmail: DEFAULT_VALUES.adminEmail,
	};
}

const HEADER = [
	'# Deployment environment',
	'# Generated automatically. You CAN edit these values if needed.',
	'# This file is deleted after the configuration is applied.',
	'#',
	'# Any changes you make here are used in the final configuration.',
	'# Save your credentials somewhere safe: they cannot be recovered later.',
];

const SECTIONS: { comment?: string[]; fields: EnvironmentField[] }[] = [
	{
		fields: [
			'databaseUser',
			'databasePassword',
			'databaseUsername',
			'databaseSecret',
			'brokerUser',
			'brokerPassword',
			'brokerUrl',
			'secretKey',
			'allowedHosts',
			'debug',
			'forcedAlignmentSecretKey',
		],
	},
	{
		comment: ['# S3-compatible storage'],
		fields: ['storageAccessKey', 'storageSecretKey', 'storageEndpoint'],
	},
	{
		comment: ['# Maximum request body size for uploads'],
		fields: ['uploadMaxBodySize'],
	},
	{
		comment: [
			'# Administrator account',
			'# Created automatically once the containers are ready',
		],
		fields: ['adminUsername', 'adminPassword', 'adminEmail'],
	},
];

export function serialize(values: EnvironmentValues): string {
	const lines = [...HEADER];
	for (const section of SECTIONS) {
		lines.push('', ...(section.comment ?? []));
		for (const field of section.fields) {
			lines.push(`${ENV_KEYS[field]}=${values[field]}`);
		}
	}
	return `${lines.join('\n')}\n`;
}

/**
 * Parse `KEY=value` lines. Blank lines and comments are skipped, an
 * `export ` prefix is allowed and one pair of matching quotes is stripped.
 */
export function parse(content: string): Map<string, string> {
	const entries = new Map<string, string>();

	for (const rawLine of content.split(/\r?\n/)) {
		let line = rawLine.trim();
		if (!line || line.startsWith('#')) continue;
		if (line.startsWith('export ')) line = line.slice(7).trimStart();

		const eq = line.indexOf('=');
		if (eq <= 0) continue;

		const key = line.slice(0, eq).trim();
		let value = line.slice(eq + 1).trim();
		if (
			value.length >= 2 &&
			(value[0] === '"' || value[0] === "'") &&
			value.at(-1) === value[0]
		) {
			value = value.slice(1, -1);
		}
		entries.set(key, value);
	}

	return entries;
}

export interface PersistOptions {
	logger?: Logger;
}

/**
 * Write the values with owner-only permissions.
 */
export async function persist(
	values: EnvironmentValues,
	path: string,
	options: PersistOptions = {},
): Promise<void> {
	const logger = options.logger ?? SILENT_LOGGER;

	try {
		await writeFile(path, serialize(values), { mode: 0o600 });
	} catch (error) {
		throw new PersistenceFailedError(`Could not write ${path}`, path, {
			cause: error,
		});
	}

	// writeFile only applies the mode when it creates the file
	try {
		await chmod(path, 0o600);
	} catch (error) {
		logger.warn({ path, reason: String(error) }, 'Could not restrict file permissions');
	}

	logger.debug({ path }, 'Environment file written');
}

export async function load(path: string): Promise<EnvironmentValues> {
	if (!existsSync(path)) {
		throw new NotFoundError(`Environment file not found: ${path}`, path);
	}

	const entries = parse(await readFile(path, 'utf-8'));

	for (const key of REQUIRED_KEYS) {
		if (!entries.get(key)) {
			throw new MissingFieldError(key);
		}
	}

	const get = (field: EnvironmentField, fallback = ''): string =>
		entries.get(ENV_KEYS[field]) || fallback;

	const databaseUser = get('databaseUser');
	const databasePassword = get('databasePassword');
	const brokerUser = get('brokerUser');
	const brokerPassword = get('brokerPassword');

	return {
		databaseUser,
		databasePassword,
		databaseUsername: get('databaseUsername', databaseUser),
		databaseSecret: get('databaseSecret', databasePassword),
		brokerUser,
		brokerPassword,
		// Re-derived so an edited password reaches the URL
		brokerUrl: deriveBrokerUrl(brokerUser, brokerPassword),
		secretKey: get('secretKey'),
		allowedHosts: get('allowedHosts', DEFAULT_VALUES.allowedHosts),
		debug: get('debug', DEFAULT_VALUES.debug),
		forcedAlignmentSecretKey: get('forcedAlignmentSecretKey'),
		storageAccessKey: get('storageAccessKey', DEFAULT_VALUES.storageAccessKey),
		storageSecretKey: get('storageSecretKey', DEFAULT_VALUES.storageSecretKey),
		storageEndpoint: get('storageEndpoint', DEFAULT_VALUES.storageEndpoint),
		uploadMaxBodySize: get('uploadMaxBodySize', DEFAULT_VALUES.uploadMaxBodySize),
		adminUsername: get('adminUsername'),
		adminPassword: get('adminPassword'),
		adminEmail: get('adminEmail'),
	};
}

/**
 * Show only the first and last four characters.
 */
export function maskSecret(value: string): string {
	if (value.length <= 8) {
		return '*'.repeat(value.length);
	}
	return `${value.slice(0, 4)}${'*'.repeat(value.length - 8)}${value.slice(-4)}`;
}
