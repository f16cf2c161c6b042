import { spawn } from 'node:child_process';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import { MissingDependencyError } from '../errors';

export interface CommandResult {
	exitCode: number | null;
	stdout: string;
	stderr: string;
	durationMs: number;
}

export interface RunOptions {
	cwd?: string;
	env?: Record<string, string>;
	/** Pass the terminal through instead of capturing output */
	interactive?: boolean;
}

/**
 * Everything that touches the host's processes goes through this, so tests
 * can script results instead of running docker.
 */
export interface CommandRunner {
	run(
		command: string,
		args: readonly string[],
		options?: RunOptions,
	): Promise<CommandResult>;
	commandExists(name: string): Promise<boolean>;
}

export async function findExecutable(
	name: string,
	path = process.env.PATH ?? '',
): Promise<string | undefined> {
	for (const dir of path.split(delimiter)) {
		if (!dir) continue;
		const candidate = join(dir, name);
		try {
			await access(candidate, constants.X_OK);
			return candidate;
		} catch {
			// not in this directory
		}
	}
	return undefined;
}

/**
 * Hide values passed as `-e KEY=value` so they never reach the logs.
 */
export function redactArgs(args: readonly string[]): string {
	return args
		.map((arg, i) =>
			args[i - 1] === '-e' ? arg.replace(/=.*$/s, '=[Redacted]') : arg,
		)
		.join(' ');
}

export function createCommandRunner(logger: Logger = SILENT_LOGGER): CommandRunner {
	return {
		run(command, args, options = {}) {
			const startedAt = Date.now();
			logger.debug({ command, args: redactArgs(args) }, 'Running command');

			const child = spawn(command, args, {
				cwd: options.cwd,
				env: { ...process.env, ...options.env },
				stdio: options.interactive ? 'inherit' : ['ignore', 'pipe', 'pipe'],
			});

			let stdout = '';
			let stderr = '';
			child.stdout?.on('data', (chunk: Buffer) => {
				stdout += chunk.toString();
			});
			child.stderr?.on('data', (chunk: Buffer) => {
				stderr += chunk.toString();
			});

			return new Promise((resolve, reject) => {
				child.on('close', (code) => {
					resolve({
						exitCode: code,
						stdout,
						stderr,
						durationMs: Date.now() - startedAt,
					});
				});

				child.on('error', (error: NodeJS.ErrnoException) => {
					if (error.code === 'ENOENT') {
						reject(
							new MissingDependencyError(`${command} is not installed`, command, {
								cause: error,
							}),
						);
						return;
					}
					reject(error);
				});
			});
		},

		async commandExists(name) {
			return (await findExecutable(name)) !== undefined;
		},
	};
}
