import { unlink, writeFile } from 'node:fs/promises';
import { tmpdir, userInfo } from 'node:os';
import { join } from 'node:path';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import type { CommandRunner } from '../deploy/runner';
import { DownloadFailedError, MissingDependencyError } from '../errors';

export const DOCKER_INSTALL_URL = 'https://get.docker.com';

/** First `x.y.z` in `docker --version` output. */
export function parseDockerVersion(output: string): string | undefined {
	return /(\d+\.\d+\.\d+)/.exec(output)?.[1];
}

export function compareVersions(a: string, b: string): number {
	const left = a.split('.').map(Number);
	const right = b.split('.').map(Number);
	for (let i = 0; i < Math.max(left.length, right.length); i++) {
		const diff = (left[i] ?? 0) - (right[i] ?? 0);
		if (diff !== 0) return Math.sign(diff);
	}
	return 0;
}

export interface DockerSetupOptions {
	runner: CommandRunner;
	skipInstall: boolean;
	minVersion: string;
	installUrl?: string;
	uid?: number;
	username?: string;
	logger?: Logger;
}

export type DockerSetupResult = 'skipped' | 'up-to-date' | 'installed';

async function installedVersion(runner: CommandRunner): Promise<string | undefined> {
	if (!(await runner.commandExists('docker'))) return undefined;
	const result = await runner.run('docker', ['--version']);
	return result.exitCode === 0 ? parseDockerVersion(result.stdout) : undefined;
}

async function downloadInstaller(url: string): Promise<string> {
	let script: string;
	try {
		const response = await fetch(url);
		if (!response.ok) {
			throw new DownloadFailedError(
				`Failed to download Docker installer: HTTP ${response.status}`,
				url,
			);
		}
		script = await response.text();
	} catch (error) {
		if (error instanceof DownloadFailedError) throw error;
		throw new DownloadFailedError('Failed to download Docker installer', url, {
			cause: error,
		});
	}

	if (!script.trim()) {
		throw new DownloadFailedError('Docker installer is empty', url);
	}

	const path = join(tmpdir(), `docker-install-${process.pid}.sh`);
	await writeFile(path, script, { mode: 0o700 });
	return path;
}

/**
 * Make sure a recent enough Docker is installed, installing it with the
 * official convenience script when it is not.
 */
export async function setupDocker(options: DockerSetupOptions): Promise<DockerSetupResult> {
	const {
		runner,
		skipInstall,
		minVersion,
		installUrl = DOCKER_INSTALL_URL,
		uid = process.geteuid?.(),
		logger = SILENT_LOGGER,
	} = options;

	if (skipInstall) {
		logger.info('Skipping Docker installation as requested');
		if (!(await runner.commandExists('docker'))) {
			throw new MissingDependencyError(
				'Docker not found and --no-install was given',
				'docker',
			);
		}
		return 'skipped';
	}

	const version = await installedVersion(runner);
	if (version && compareVersions(version, minVersion) >= 0) {
		logger.info({ version }, 'Docker is already installed and up to date');
		return 'up-to-date';
	}

	logger.info(
		version ? `Docker ${version} is older than ${minVersion}, upgrading` : 'Installing Docker',
	);

	const script = await downloadInstaller(installUrl);
	try {
		const result = await runner.run('sh', [script], { interactive: true });
		if (result.exitCode !== 0) {
			throw new MissingDependencyError('Docker installation failed', 'docker');
		}
	} finally {
		await unlink(script);
	}

	if (uid !== undefined && uid !== 0) {
		const username = options.username ?? userInfo().username;
		const groups = await runner.run('id', ['-nG', username]);
		if (!groups.stdout.split(/\s+/).includes('docker')) {
			logger.info({ username }, 'Adding user to the docker group');
			const result = await runner.run('sudo', ['usermod', '-aG', 'docker', username], {
				interactive: true,
			});
			if (result.exitCode === 0) {
				logger.warn('Log out and back in for the docker group change to take effect');
			} else {
				logger.warn({ username }, 'Could not add user to the docker group');
			}
		}
	}

	logger.info('Docker installed');
	return 'installed';
}
