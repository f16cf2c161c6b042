import { existsSync } from 'node:fs';
import { statfs } from 'node:fs/promises';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import { MissingDependencyError, NetworkUnavailableError } from '../errors';

export const MIN_FREE_BYTES = 2 * 1024 ** 3;

export interface SystemCheckOptions {
	osReleasePath?: string;
	cwd?: string;
	minFreeBytes?: number;
	/** Effective user id; undefined on platforms without one */
	uid?: number;
	logger?: Logger;
}

export interface SystemReport {
	freeBytes: number;
	lowDisk: boolean;
	root: boolean;
}

/**
 * Fails on hosts without /etc/os-release. Low disk space and running as
 * root only warn.
 */
export async function checkSystem(
	options: SystemCheckOptions = {},
): Promise<SystemReport> {
	const {
		osReleasePath = '/etc/os-release',
		cwd = process.cwd(),
		minFreeBytes = MIN_FREE_BYTES,
		uid = process.geteuid?.(),
		logger = SILENT_LOGGER,
	} = options;

	logger.info('Checking system requirements');

	if (!existsSync(osReleasePath)) {
		throw new MissingDependencyError(
			`Unsupported OS: ${osReleasePath} not found`,
			osReleasePath,
		);
	}

	const stats = await statfs(cwd);
	const freeBytes = stats.bavail * stats.bsize;
	const lowDisk = freeBytes < minFreeBytes;
	if (lowDisk) {
		logger.warn(
			{ freeBytes },
			`Low disk space (${(freeBytes / 1024 ** 3).toFixed(1)} GiB available, 2 GiB recommended)`,
		);
	}

	const root = uid === 0;
	if (root) {
		logger.warn('Running as root');
	}

	return { freeBytes, lowDisk, root };
}

export interface ConnectivityOptions {
	timeoutMs?: number;
	logger?: Logger;
}

/**
 * Any HTTP response counts as connected; only transport failures and
 * timeouts fail.
 */
export async function checkInternet(
	url: string,
	{ timeoutMs = 5_000, logger = SILENT_LOGGER }: ConnectivityOptions = {},
): Promise<void> {
	logger.info('Checking internet connectivity');
	try {
		await fetch(url, { method: 'HEAD', signal: AbortSignal.timeout(timeoutMs) });
	} catch (error) {
		throw new NetworkUnavailableError(`No internet connection (could not reach ${url})`, {
			cause: error,
		});
	}
	logger.debug({ url }, 'Internet connection verified');
}
