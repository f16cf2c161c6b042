import { existsSync, unlinkSync } from 'node:fs';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import { overwriteFileSync } from '../env/destroy';

export interface CleanupEntry {
	/** Overwrite before unlinking */
	secret: boolean;
}

/**
 * Files that must not outlive the process. Commands remove them in
 * `finally`; signal handlers remove whatever is still registered.
 */
export class CleanupRegistry {
	private readonly entries = new Map<string, CleanupEntry>();

	register(path: string, entry: CleanupEntry = { secret: false }): void {
		this.entries.set(path, entry);
	}

	unregister(path: string): void {
		this.entries.delete(path);
	}

	has(path: string): boolean {
		return this.entries.has(path);
	}

	get paths(): string[] {
		return [...this.entries.keys()];
	}

	/**
	 * Remove every registered file. Synchronous so it is safe in a signal
	 * handler. Returns the paths that could not be removed.
	 */
	cleanupSync(logger: Logger = SILENT_LOGGER): string[] {
		const failed: string[] = [];

		for (const [path, { secret }] of this.entries) {
			try {
				if (existsSync(path)) {
					if (secret) {
						overwriteFileSync(path);
					} else {
						unlinkSync(path);
					}
				}
				this.entries.delete(path);
			} catch (error) {
				logger.error({ path, reason: String(error) }, 'Could not remove file');
				failed.push(path);
			}
		}

		return failed;
	}
}

export const cleanupRegistry = new CleanupRegistry();

export const INTERRUPTED_EXIT_CODE = 130;

export interface SignalCleanupOptions {
	registry?: CleanupRegistry;
	logger?: Logger;
	exit?: (code: number) => void;
	signals?: NodeJS.Signals[];
}

/**
 * On SIGINT/SIGTERM, remove registered files and exit with 130.
 * Returns a function that removes the handlers.
 */
export function installSignalCleanup(options: SignalCleanupOptions = {}): () => void {
	const {
		registry = cleanupRegistry,
		logger = SILENT_LOGGER,
		exit = (code: number) => process.exit(code),
		signals = ['SIGINT', 'SIGTERM'],
	} = options;

	const handler = (signal: NodeJS.Signals) => {
		logger.warn({ signal }, 'Interrupted, cleaning up');
		registry.cleanupSync(logger);
		exit(INTERRUPTED_EXIT_CODE);
	};

	for (const signal of signals) {
		process.on(signal, handler);
	}

	return () => {
		for (const signal of signals) {
			process.off(signal, handler);
		}
	};
}
