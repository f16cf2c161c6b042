import { type Logger, SILENT_LOGGER } from '@berth/logger';
import prompts from 'prompts';
import { login, logout } from '../importer/client';
import { type TokenOptions, getTokenPath } from './token';

export interface LoginOptions {
	apiUrl: string;
	/** Prompted for when omitted */
	username?: string;
	/** Prompted for when omitted */
	password?: string;
	interactive?: boolean;
	tokenOptions?: TokenOptions;
	logger?: Logger;
}

export interface LogoutOptions {
	tokenOptions?: TokenOptions;
	logger?: Logger;
}

async function ask(
	name: 'username' | 'password',
	interactive: boolean,
): Promise<string> {
	if (!interactive) {
		throw new Error(`Interactive input required. Please provide the ${name} argument.`);
	}

	const { value } = await prompts({
		type: name === 'password' ? 'password' : 'text',
		name: 'value',
		message: name === 'password' ? 'Password' : 'Username',
	});
	if (typeof value !== 'string' || !value) {
		throw new Error(`${name} is required`);
	}
	return value;
}

/**
 * Log in to the API and store the token for later imports
 */
export async function loginCommand(options: LoginOptions): Promise<void> {
	const {
		apiUrl,
		interactive = process.stdin.isTTY === true,
		tokenOptions,
		logger = SILENT_LOGGER,
	} = options;

	try {
		new URL(apiUrl);
	} catch {
		throw new Error(`Invalid URL: ${apiUrl}`);
	}

	const username = options.username ?? (await ask('username', interactive));
	const password = options.password ?? (await ask('password', interactive));

	await login(apiUrl, username, password, { tokenOptions, logger });

	logger.info({ path: getTokenPath(tokenOptions) }, 'Successfully logged in');
}

export async function logoutCommand(options: LogoutOptions = {}): Promise<void> {
	const { tokenOptions, logger = SILENT_LOGGER } = options;

	if (await logout(tokenOptions)) {
		logger.info('Logged out');
	} else {
		logger.info('No stored token found');
	}
}
