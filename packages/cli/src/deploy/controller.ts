import { existsSync } from 'node:fs';
import { chmod, unlink, writeFile } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import type { EnvironmentValues } from '../env/types';
import { OrchestratorError, PersistenceFailedError, ReadinessTimeoutError } from '../errors';
import { type CleanupRegistry, cleanupRegistry } from './cleanup';
import type { CommandResult, CommandRunner } from './runner';

export type LifecycleState =
	| 'Stopped'
	| 'Configuring'
	| 'Starting'
	| 'Running'
	| 'Failed';

export interface ReadinessProbe {
	/** Shown in logs and in ReadinessTimeoutError */
	name: string;
	service: string;
	command: string[];
}

export interface ReadinessOptions {
	attempts: number;
	intervalMs: number;
}

export interface ServiceLifecycleOptions {
	runner: CommandRunner;
	projectDir: string;
	/** Compose file used for stop, pull and exec */
	templatePath: string;
	/** Where the rendered document is written before `up` */
	derivedPath: string;
	targetService: string;
	databaseService: string;
	logger?: Logger;
	registry?: CleanupRegistry;
	sleep?: (ms: number) => Promise<unknown>;
}

const CREATE_SUPERUSER_SCRIPT = [
	'import os',
	'from django.contrib.auth import get_user_model',
	'User = get_user_model()',
	"username = os.environ['DJANGO_SUPERUSER_USERNAME']",
	'if User.objects.filter(username=username).exists():',
	"    print('Superuser already exists')",
	'else:',
	"    User.objects.create_superuser(username, os.environ['DJANGO_SUPERUSER_EMAIL'], os.environ['DJANGO_SUPERUSER_PASSWORD'])",
	"    print('Superuser created')",
].join('\n');

/**
 * Drives `docker compose` through stop, configure, start and readiness.
 * The rendered compose file only exists between `configure` and the end of
 * `start`.
 */
export class ServiceLifecycleController {
	private _state: LifecycleState = 'Stopped';
	private readonly logger: Logger;
	private readonly registry: CleanupRegistry;
	private readonly sleep: (ms: number) => Promise<unknown>;

	constructor(private readonly options: ServiceLifecycleOptions) {
		this.logger = options.logger ?? SILENT_LOGGER;
		this.registry = options.registry ?? cleanupRegistry;
		this.sleep = options.sleep ?? sleep;
	}

	get state(): LifecycleState {
		return this._state;
	}

	defaultProbes(): ReadinessProbe[] {
		return [
			{
				name: 'database',
				service: this.options.databaseService,
				command: ['pg_isready', '-U', 'postgres'],
			},
			{
				name: 'application',
				service: this.options.targetService,
				command: ['python3', '-c', 'import django'],
			},
		];
	}

	private compose(file: string, args: string[], interactive = false): Promise<CommandResult> {
		return this.options.runner.run('docker', ['compose', '-f', file, ...args], {
			cwd: this.options.projectDir,
			interactive,
		});
	}

	private exec(
		service: string,
		command: string[],
		env: Record<string, string> = {},
	): Promise<CommandResult> {
		const envArgs = Object.entries(env).flatMap(([key, value]) => [
			'-e',
			`${key}=${value}`,
		]);
		return this.compose(this.options.templatePath, [
			'exec',
			'-T',
			...envArgs,
			service,
			...command,
		]);
	}

	/** Best effort: containers that were never started are fine. */
	async stop(): Promise<void> {
		const result = await this.compose(this.options.templatePath, [
			'down',
			'--remove-orphans',
		]);
		if (result.exitCode !== 0) {
			this.logger.warn(
				{ stderr: result.stderr.trim() },
				'Some containers may not have stopped cleanly',
			);
		}
		this._state = 'Stopped';
	}

	async pull(): Promise<void> {
		this.logger.info('Pulling latest images');
		const result = await this.compose(this.options.templatePath, ['pull'], true);
		if (result.exitCode !== 0) {
			throw new OrchestratorError('Failed to pull images', result.exitCode, result.stderr);
		}
	}

	async configure(document: string): Promise<string> {
		const path = this.options.derivedPath;
		this._state = 'Configuring';
		this.registry.register(path);

		try {
			await writeFile(path, document, { mode: 0o600 });
			await chmod(path, 0o600);
		} catch (error) {
			throw new PersistenceFailedError(`Could not write ${path}`, path, {
				cause: error,
			});
		}

		this.logger.debug({ path }, 'Derived compose file written');
		return path;
	}

	async start(): Promise<number> {
		const path = this.options.derivedPath;
		this._state = 'Starting';
		this.logger.info('Starting containers');

		try {
			let result: CommandResult;
			try {
				result = await this.compose(path, ['up', '-d']);
			} catch (error) {
				this._state = 'Failed';
				this.logger.error(
					{ reason: error instanceof Error ? error.message : String(error) },
					'Failed to start containers',
				);
				throw error;
			}

			if (result.exitCode !== 0) {
				const logs = await this.compose(path, ['logs', '--tail=20']);
				this.logger.error(
					{ stderr: result.stderr.trim(), logs: logs.stdout.trim() },
					'Failed to start containers',
				);
				this._state = 'Failed';
				throw new OrchestratorError(
					'Failed to start containers',
					result.exitCode,
					result.stderr,
				);
			}

			this._state = 'Running';
			this.logger.info(
				{ durationMs: result.durationMs },
				`Containers started in ${Math.round(result.durationMs / 1000)}s`,
			);
			return result.durationMs;
		} finally {
			await this.release();
		}
	}

	/** Remove the rendered compose file if it is still on disk. */
	async release(): Promise<void> {
		const path = this.options.derivedPath;
		if (existsSync(path)) {
			await unlink(path);
			this.logger.debug({ path }, 'Derived compose file removed');
		}
		this.registry.unregister(path);
	}

	async awaitReady(
		probes: ReadinessProbe[],
		{ attempts, intervalMs }: ReadinessOptions,
	): Promise<void> {
		for (const probe of probes) {
			this.logger.info({ service: probe.service }, `Waiting for ${probe.name}`);

			let ready = false;
			for (let attempt = 1; attempt <= attempts; attempt++) {
				const result = await this.exec(probe.service, probe.command);
				if (result.exitCode === 0) {
					ready = true;
					break;
				}
				this.logger.debug(
					{ service: probe.service, attempt, attempts },
					`${probe.name} not ready`,
				);
				if (attempt < attempts) {
					await this.sleep(intervalMs);
				}
			}

			if (!ready) {
				throw new ReadinessTimeoutError(probe.name, attempts);
			}
			this.logger.info(`${probe.name} is ready`);
		}
	}

	async migrate(): Promise<void> {
		this.logger.info('Running database migrations');
		const result = await this.exec(this.options.targetService, [
			'python3',
			'manage.py',
			'migrate',
			'--noinput',
		]);
		if (result.exitCode !== 0) {
			throw new OrchestratorError('Database migrations failed', result.exitCode, result.stderr);
		}
	}

	/**
	 * Create the administrator unless it already exists.
	 * Credentials travel as environment variables, never inside the script.
	 */
	async createSuperuser(
		values: Pick<EnvironmentValues, 'adminUsername' | 'adminPassword' | 'adminEmail'>,
	): Promise<boolean> {
		const { adminUsername, adminPassword, adminEmail } = values;
		if (!adminUsername || !adminPassword || !adminEmail) {
			this.logger.warn(
				'Administrator credentials missing, skipping. Set DJANGO_SUPERUSER_USERNAME, DJANGO_SUPERUSER_PASSWORD and DJANGO_SUPERUSER_EMAIL',
			);
			return false;
		}

		const result = await this.exec(
			this.options.targetService,
			['python3', 'manage.py', 'shell', '-c', CREATE_SUPERUSER_SCRIPT],
			{
				DJANGO_SUPERUSER_USERNAME: adminUsername,
				DJANGO_SUPERUSER_PASSWORD: adminPassword,
				DJANGO_SUPERUSER_EMAIL: adminEmail,
			},
		);

		if (result.exitCode !== 0) {
			this.logger.warn(
				{ stderr: result.stderr.trim() },
				`Superuser creation failed. Create one later with: docker compose -f ${this.options.templatePath} exec ${this.options.targetService} python3 manage.py createsuperuser`,
			);
			return false;
		}

		this.logger.info(result.stdout.trim() || 'Superuser ready');
		return true;
	}
}
