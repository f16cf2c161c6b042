import { type Logger, SILENT_LOGGER } from '@berth/logger';
import { readToken, type TokenOptions } from '../auth/token';
import { type ImportKind, type ImportSummary, ImporterClient } from './client';

export interface ImportCommandOptions {
	apiUrl: string;
	tokenOptions?: TokenOptions;
	logger?: Logger;
}

async function createClient(options: ImportCommandOptions): Promise<ImporterClient> {
	const { apiUrl, tokenOptions, logger = SILENT_LOGGER } = options;
	const token = await readToken(tokenOptions);
	if (!token) {
		logger.warn("No stored token, uploading without one (run 'berth login' first)");
	}
	return new ImporterClient({ apiUrl, token, tokenOptions, logger });
}

export async function importFileCommand(
	kind: ImportKind,
	file: string,
	options: ImportCommandOptions,
): Promise<void> {
	const client = await createClient(options);
	await client.importFile(kind, file);
}

/**
 * Upload every translation file in `dir`. Throws when any upload failed,
 * after all of them were attempted.
 */
export async function importTranslationsCommand(
	dir: string,
	options: ImportCommandOptions,
): Promise<ImportSummary> {
	const client = await createClient(options);
	const summary = await client.importDirectory(dir, { kind: 'translation' });

	if (summary.failed > 0) {
		throw new Error(
			`${summary.failed} of ${summary.succeeded + summary.failed} uploads failed: ${summary.failedFiles.join(', ')}`,
		);
	}
	return summary;
}

export type { ImportKind, ImportSummary } from './client';
