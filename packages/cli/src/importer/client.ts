import { existsSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import fg from 'fast-glob';
import { z } from 'zod/v4';
import { removeToken, saveToken, type TokenOptions } from '../auth/token';
import { AuthError, NotFoundError, UploadError } from '../errors';

export type ImportKind = 'mushaf' | 'translation';

export const IMPORT_ENDPOINTS: Record<ImportKind, string> = {
	mushaf: 'mushafs/import/',
	translation: 'translations/import/',
};

const LoginResponseSchema = z.object({
	token: z.string().min(1),
});

export interface ImporterClientOptions {
	/** API base URL (e.g., https://api.example.com) */
	apiUrl: string;
	token?: string;
	tokenOptions?: TokenOptions;
	logger?: Logger;
}

export interface ImportSummary {
	succeeded: number;
	failed: number;
	failedFiles: string[];
}

/**
 * HTTP client for the API's login and import endpoints
 */
export class ImporterClient {
	private readonly apiUrl: string;
	private token: string | undefined;
	private readonly tokenOptions: TokenOptions | undefined;
	private readonly logger: Logger;

	constructor(options: ImporterClientOptions) {
		this.apiUrl = options.apiUrl.replace(/\/+$/, '');
		this.token = options.token;
		this.tokenOptions = options.tokenOptions;
		this.logger = options.logger ?? SILENT_LOGGER;
	}

	private url(endpoint: string): string {
		return `${this.apiUrl}/${endpoint}`;
	}

	/**
	 * Exchange credentials for a token and store it
	 */
	async login(username: string, password: string): Promise<string> {
		const url = this.url('auth/login/');
		this.logger.debug({ url }, 'Logging in');

		const response = await fetch(url, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify({ username, password }),
		});
		const body = await response.text();

		if (!response.ok) {
			throw new AuthError(
				`Login failed: ${response.status} ${response.statusText}`,
				response.status,
				body,
			);
		}

		const parsed = LoginResponseSchema.safeParse(parseJson(body));
		if (!parsed.success) {
			throw new AuthError('Login response did not contain a token', response.status, body);
		}

		this.token = parsed.data.token;
		const path = await saveToken(parsed.data.token, this.tokenOptions);
		this.logger.info({ path }, 'Logged in, token saved');
		return parsed.data.token;
	}

	/**
	 * Upload one JSON file as multipart/form-data
	 */
	async importFile(kind: ImportKind, path: string): Promise<void> {
		if (!existsSync(path)) {
			throw new NotFoundError(`File not found: ${path}`, path);
		}

		const name = basename(path);
		const form = new FormData();
		form.append(
			'file',
			new Blob([await readFile(path, 'utf-8')], { type: 'application/json' }),
			name,
		);

		const headers: Record<string, string> = {};
		if (this.token) {
			headers.Authorization = `Token ${this.token}`;
		}

		const url = this.url(IMPORT_ENDPOINTS[kind]);
		this.logger.info({ file: name, kind }, 'Uploading');

		let response: Response;
		try {
			response = await fetch(url, { method: 'POST', headers, body: form });
		} catch (error) {
			throw new UploadError(`Failed to upload ${name}`, name, undefined, undefined, {
				cause: error,
			});
		}

		if (!response.ok) {
			const body = await response.text();
			throw new UploadError(
				`Upload of ${name} failed: ${response.status} ${response.statusText}`,
				name,
				response.status,
				body,
			);
		}

		this.logger.info({ file: name }, 'Upload complete');
	}

	/**
	 * Upload every *.json file in `dir`, in lexical order, one at a time.
	 * Failures are counted and do not stop the run.
	 */
	async importDirectory(
		dir: string,
		{ kind = 'translation' }: { kind?: ImportKind } = {},
	): Promise<ImportSummary> {
		if (!existsSync(dir) || !(await stat(dir)).isDirectory()) {
			throw new NotFoundError(`Directory not found: ${dir}`, dir);
		}

		const files = (
			await fg('*.json', { cwd: dir, absolute: true, onlyFiles: true })
		).sort();

		const summary: ImportSummary = { succeeded: 0, failed: 0, failedFiles: [] };
		if (files.length === 0) {
			this.logger.warn({ dir }, 'No JSON files found');
			return summary;
		}

		for (const file of files) {
			try {
				await this.importFile(kind, file);
				summary.succeeded++;
			} catch (error) {
				summary.failed++;
				summary.failedFiles.push(basename(file));
				this.logger.error(
					{ file: basename(file), reason: error instanceof Error ? error.message : String(error) },
					'Upload failed',
				);
			}
		}

		this.logger.info(
			{ succeeded: summary.succeeded, failed: summary.failed },
			'Import finished',
		);
		return summary;
	}
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

export async function login(
	apiUrl: string,
	username: string,
	password: string,
	options: Omit<ImporterClientOptions, 'apiUrl' | 'token'> = {},
): Promise<string> {
	return new ImporterClient({ apiUrl, ...options }).login(username, password);
}

export async function importFile(
	kind: ImportKind,
	path: string,
	apiUrl: string,
	token?: string,
	options: Omit<ImporterClientOptions, 'apiUrl' | 'token'> = {},
): Promise<void> {
	return new ImporterClient({ apiUrl, token, ...options }).importFile(kind, path);
}

export async function importDirectory(
	path: string,
	apiUrl: string,
	token?: string,
	options: Omit<ImporterClientOptions, 'apiUrl' | 'token'> & { kind?: ImportKind } = {},
): Promise<ImportSummary> {
	const { kind, ...clientOptions } = options;
	return new ImporterClient({ apiUrl, token, ...clientOptions }).importDirectory(path, {
		kind,
	});
}

/**
 * Forget the stored token. Returns false when none was stored.
 */
export async function logout(options?: TokenOptions): Promise<boolean> {
	return removeToken(options);
}
