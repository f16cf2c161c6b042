import { existsSync, mkdirSync } from 'node:fs';
import { chmod, readFile, unlink, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Options for token storage
 */
export interface TokenOptions {
	/** Root directory for token storage (default: user home directory) */
	root?: string;
}

export function getTokenDir(options?: TokenOptions): string {
	const root = options?.root ?? homedir();
	return join(root, '.berth');
}

export function getTokenPath(options?: TokenOptions): string {
	return join(getTokenDir(options), 'importer-token');
}

function ensureTokenDir(options?: TokenOptions): void {
	const dir = getTokenDir(options);
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true, mode: 0o700 });
	}
}

/**
 * Store the importer token as a single line, readable by the owner only
 */
export async function saveToken(
	token: string,
	options?: TokenOptions,
): Promise<string> {
	ensureTokenDir(options);
	const path = getTokenPath(options);

	await writeFile(path, `${token.trim()}\n`, { mode: 0o600 });
	// writeFile keeps the mode of an existing file
	await chmod(path, 0o600);
	return path;
}

/**
 * Read the stored token, or undefined when none is stored
 */
export async function readToken(
	options?: TokenOptions,
): Promise<string | undefined> {
	const path = getTokenPath(options);

	if (!existsSync(path)) {
		return undefined;
	}

	const token = (await readFile(path, 'utf-8')).trim();
	return token || undefined;
}

/**
 * Remove the stored token. Returns false when there was none.
 */
export async function removeToken(options?: TokenOptions): Promise<boolean> {
	const path = getTokenPath(options);

	if (!existsSync(path)) {
		return false;
	}

	await unlink(path);
	return true;
}
