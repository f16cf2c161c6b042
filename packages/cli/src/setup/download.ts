import { mkdir, writeFile } from 'node:fs/promises';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import type { DeployConfig, ProjectPaths } from '../config';
import { DownloadFailedError } from '../errors';

export async function downloadFile(url: string, destination: string): Promise<void> {
	let body: string;
	try {
		const response = await fetch(url);
		if (!response.ok) {
			throw new DownloadFailedError(`Failed to download ${url}: HTTP ${response.status}`, url);
		}
		body = await response.text();
	} catch (error) {
		if (error instanceof DownloadFailedError) throw error;
		throw new DownloadFailedError(`Failed to download ${url}`, url, { cause: error });
	}

	if (body.length === 0) {
		throw new DownloadFailedError(`Downloaded file is empty: ${url}`, url);
	}

	await writeFile(destination, body);
}

/**
 * Fetch the compose template and nginx.conf into the project directory.
 */
export async function downloadFiles(
	config: Pick<DeployConfig, 'composeUrl' | 'nginxUrl'>,
	paths: Pick<ProjectPaths, 'root' | 'source' | 'nginx'>,
	logger: Logger = SILENT_LOGGER,
): Promise<void> {
	logger.info({ dir: paths.root }, 'Setting up project folder');
	await mkdir(paths.root, { recursive: true });

	logger.info('Downloading configuration files');
	await downloadFile(config.composeUrl, paths.source);
	await downloadFile(config.nginxUrl, paths.nginx);
	logger.info('Configuration files downloaded');
}
