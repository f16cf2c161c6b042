import { randomFillSync } from 'node:crypto';
import { closeSync, existsSync, fstatSync, fsyncSync, openSync, unlinkSync, writeSync } from 'node:fs';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import type { CommandRunner } from '../deploy/runner';

/**
 * One way of making a file's contents unrecoverable and removing it.
 * Throws when it cannot.
 */
export interface DestroyStrategy {
	readonly name: string;
	destroy(path: string): Promise<void>;
}

export function shredStrategy(runner: CommandRunner): DestroyStrategy {
	return {
		name: 'shred',
		async destroy(path) {
			if (!(await runner.commandExists('shred'))) {
				throw new Error('shred is not installed');
			}
			const result = await runner.run('shred', ['-u', '-z', '-n', '3', path]);
			if (result.exitCode !== 0) {
				throw new Error(`shred exited with ${result.exitCode}: ${result.stderr.trim()}`);
			}
		},
	};
}

const CHUNK_SIZE = 64 * 1024;

/**
 * Overwrite a file in place with random bytes, fsync, then unlink.
 * Synchronous so it can also run from a signal handler.
 */
export function overwriteFileSync(path: string, passes = 1): void {
	const fd = openSync(path, 'r+');
	try {
		const { size } = fstatSync(fd);
		const chunk = Buffer.alloc(Math.min(size, CHUNK_SIZE));
		for (let pass = 0; pass < passes; pass++) {
			let offset = 0;
			while (offset < size) {
				const length = Math.min(chunk.length, size - offset);
				randomFillSync(chunk, 0, length);
				offset += writeSync(fd, chunk, 0, length, offset);
			}
			fsyncSync(fd);
		}
	} finally {
		closeSync(fd);
	}
	unlinkSync(path);
}

export function overwriteStrategy(passes = 1): DestroyStrategy {
	return {
		name: 'overwrite',
		async destroy(path) {
			overwriteFileSync(path, passes);
		},
	};
}

export interface SecureDestroyOptions {
	strategies: readonly DestroyStrategy[];
	logger?: Logger;
}

/**
 * Remove a secret-bearing file so its contents cannot be recovered.
 * A missing file is not an error.
 */
export async function secureDestroy(
	path: string,
	{ strategies, logger = SILENT_LOGGER }: SecureDestroyOptions,
): Promise<void> {
	if (!existsSync(path)) {
		logger.debug({ path }, 'Nothing to destroy');
		return;
	}

	for (const strategy of strategies) {
		try {
			await strategy.destroy(path);
		} catch (error) {
			logger.debug(
				{ path, strategy: strategy.name, reason: String(error) },
				'Secure delete strategy failed',
			);
			continue;
		}
		if (!existsSync(path)) {
			logger.debug({ path, strategy: strategy.name }, 'File securely destroyed');
			return;
		}
	}

	if (existsSync(path)) {
		logger.warn({ path }, 'Could not securely overwrite file, removing it');
		unlinkSync(path);
	}
}

export function defaultDestroyStrategies(
	runner: CommandRunner,
): DestroyStrategy[] {
	return [shredStrategy(runner), overwriteStrategy()];
}
