/**
 * Deploy Module
 *
 * The `install`, `restart` and `update` commands.
 *
 * ## Secret files
 *
 * Two files carry credentials in plain text:
 *
 * - `.env`: generated (or loaded) credentials, mode 600
 * - `docker-compose.prod.yaml`: the rendered compose file, mode 600
 *
 * Both are registered with the cleanup registry as soon as they exist, so an
 * interrupt removes them. The rendered compose file is deleted after every
 * start attempt. `.env` is securely destroyed at the end of `install`, and at
 * the end of `restart`/`update` when it was created by that run and the
 * operator does not choose to keep it.
 *
 * ### Example Flow
 *
 * ```
 * berth install
 *   ├─ Check host, connectivity, Docker, firewall
 *   ├─ Download docker-compose.source.yaml and nginx.conf
 *   ├─ Generate .env (offer to edit)
 *   ├─ Render docker-compose.prod.yaml (offer to edit)
 *   ├─ Apply client_max_body_size to nginx.conf (offer to edit)
 *   ├─ docker compose up -d, then delete docker-compose.prod.yaml
 *   ├─ Wait for postgres and the API, migrate, create the administrator
 *   └─ Securely destroy .env
 * ```
 *
 * @module deploy
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import { updateNginxConfig } from '../compose/nginx';
import { render } from '../compose/templater';
import type { DeployConfig, ProjectPaths } from '../config';
import {
	type DestroyStrategy,
	defaultDestroyStrategies,
	secureDestroy,
} from '../env/destroy';
import { lookupPublicIp } from '../env/public-ip';
import {
	createWithGeneratedValues,
	load,
	maskSecret,
	persist,
} from '../env/store';
import type { EnvironmentValues } from '../env/types';
import { CancelledError, NotFoundError } from '../errors';
import type { Prompter } from '../prompt';
import { createSecretGenerator, type SecretGenerator } from '../secrets/generator';
import { setupDocker } from '../setup/docker';
import { downloadFiles } from '../setup/download';
import { setupFirewall } from '../setup/firewall';
import { checkInternet, checkSystem } from '../setup/system';
import { type CleanupRegistry, cleanupRegistry } from './cleanup';
import { ServiceLifecycleController } from './controller';
import type { CommandRunner } from './runner';

/**
 * Everything the deploy commands touch outside the process
 */
export interface DeployContext {
	config: DeployConfig;
	paths: ProjectPaths;
	runner: CommandRunner;
	prompter: Prompter;
	logger?: Logger;
	registry?: CleanupRegistry;
	generator?: SecretGenerator;
	lookupPublicIp?: () => Promise<string>;
	destroyStrategies?: readonly DestroyStrategy[];
	sleep?: (ms: number) => Promise<unknown>;
	/** Passed to the host checks; defaults to the real host */
	host?: {
		osReleasePath?: string;
		uid?: number;
		username?: string;
		dockerInstallUrl?: string;
	};
}

export interface InstallOptions {
	/** Skip Docker installation (`--no-install`) */
	skipInstall?: boolean;
	/** Skip firewall configuration (`--no-firewall`) */
	skipFirewall?: boolean;
}

export type ManageAction = 'restart' | 'update';

interface ResolvedContext extends Required<Omit<DeployContext, 'host'>> {
	host: NonNullable<DeployContext['host']>;
	controller: ServiceLifecycleController;
}

function resolve(context: DeployContext): ResolvedContext {
	const logger = context.logger ?? SILENT_LOGGER;
	const registry = context.registry ?? cleanupRegistry;
	const wait = context.sleep ?? sleep;
	const { config, paths, runner } = context;

	return {
		...context,
		logger,
		registry,
		sleep: wait,
		generator: context.generator ?? createSecretGenerator({ logger }),
		lookupPublicIp: context.lookupPublicIp ?? (() => lookupPublicIp(undefined, { logger })),
		destroyStrategies: context.destroyStrategies ?? defaultDestroyStrategies(runner),
		host: context.host ?? {},
		controller: new ServiceLifecycleController({
			runner,
			projectDir: paths.root,
			templatePath: paths.source,
			derivedPath: paths.prod,
			targetService: config.targetService,
			databaseService: config.databaseService,
			logger,
			registry,
			sleep: wait,
		}),
	};
}

async function generateEnvFile(ctx: ResolvedContext): Promise<void> {
	const { paths, registry, logger } = ctx;

	logger.info('Generating .env with random credentials');
	const values = await createWithGeneratedValues({
		generator: ctx.generator,
		lookupPublicIp: ctx.lookupPublicIp,
	});

	registry.register(paths.env, { secret: true });
	await persist(values, paths.env, { logger });
	logger.info({ path: paths.env }, '.env created');
}

async function destroyEnvFile(ctx: ResolvedContext): Promise<void> {
	await secureDestroy(ctx.paths.env, {
		strategies: ctx.destroyStrategies,
		logger: ctx.logger,
	});
	ctx.registry.unregister(ctx.paths.env);
}

/**
 * Render the template with `values` and write the derived compose file.
 */
async function renderProductionConfig(
	ctx: ResolvedContext,
	values: EnvironmentValues,
): Promise<void> {
	const { paths, config, logger } = ctx;

	if (!existsSync(paths.source)) {
		throw new NotFoundError(
			`Compose template not found: ${paths.source}. Run 'install' first.`,
			paths.source,
		);
	}

	logger.info('Creating production configuration');
	const template = await readFile(paths.source, 'utf-8');
	const result = render(template, values, config.targetService);
	logger.debug(
		{ substituted: result.substituted, inserted: result.inserted },
		'Template rendered',
	);

	await ctx.controller.configure(result.document);
}

/** nginx.conf is not required to start, so failures only warn. */
async function applyNginxConfig(ctx: ResolvedContext, size: string): Promise<void> {
	try {
		await updateNginxConfig(ctx.paths.nginx, size);
		ctx.logger.info({ size }, 'Nginx max body size updated');
	} catch (error) {
		ctx.logger.warn(
			{ reason: error instanceof Error ? error.message : String(error) },
			'Failed to update nginx configuration',
		);
	}
}

function printSummary(ctx: ResolvedContext, values: EnvironmentValues): void {
	const { logger, paths } = ctx;

	logger.info('Installation completed successfully');
	logger.info(
		{
			username: maskSecret(values.adminUsername),
			email: values.adminEmail,
			uploadMaxBodySize: values.uploadMaxBodySize,
		},
		'Administrator account and settings applied from .env',
	);
	logger.warn('Save your credentials somewhere safe: .env is deleted next and cannot be recovered');
	logger.info(`Access your API at: http://${values.allowedHosts}`);
	logger.info(`View logs: docker compose -f ${paths.source} logs -f`);
	logger.info(`Stop services: docker compose -f ${paths.source} down`);
}

/**
 * Prepare the host and deploy the stack from scratch
 */
export async function installCommand(
	options: InstallOptions,
	context: DeployContext,
): Promise<void> {
	const ctx = resolve(context);
	const { config, paths, runner, prompter, logger, controller } = ctx;

	await checkSystem({
		osReleasePath: ctx.host.osReleasePath,
		cwd: dirname(paths.root),
		uid: ctx.host.uid,
		logger,
	});
	await checkInternet(config.connectivityUrl, { logger });
	await setupDocker({
		runner,
		skipInstall: options.skipInstall ?? false,
		minVersion: config.minDockerVersion,
		installUrl: ctx.host.dockerInstallUrl,
		uid: ctx.host.uid,
		username: ctx.host.username,
		logger,
	});

	if (!options.skipFirewall && !(await setupFirewall(runner, logger))) {
		logger.warn('Firewall setup failed, continuing without it');
	}

	await downloadFiles(config, paths, logger);

	try {
		await generateEnvFile(ctx);
		await prompter.offerEdit(paths.env, '.env');
		const values = await load(paths.env);

		try {
			await renderProductionConfig(ctx, values);
			await prompter.offerEdit(paths.prod, 'the production docker-compose configuration');

			await applyNginxConfig(ctx, values.uploadMaxBodySize);
			await prompter.offerEdit(paths.nginx, 'the nginx configuration');

			await controller.start();
		} finally {
			await controller.release();
		}

		if (config.startGraceMs > 0) {
			logger.info('Waiting for containers to initialise');
			await ctx.sleep(config.startGraceMs);
		}

		await controller.awaitReady(controller.defaultProbes(), config.readiness);
		await controller.migrate();
		await controller.createSuperuser(values);

		printSummary(ctx, values);
	} finally {
		logger.info('Cleaning up .env');
		await destroyEnvFile(ctx);
	}
}

/**
 * Re-render the compose file from `.env` and bring the stack back up.
 * `update` pulls newer images first.
 */
export async function manageCommand(
	action: ManageAction,
	context: DeployContext,
): Promise<void> {
	const ctx = resolve(context);
	const { paths, prompter, logger, controller, registry } = ctx;

	if (!existsSync(paths.source)) {
		throw new NotFoundError("Project not found. Run 'install' first.", paths.source);
	}

	let created = false;
	let succeeded = false;
	try {
		if (!existsSync(paths.env)) {
			logger.warn({ path: paths.env }, '.env file not found');
			if (!(await prompter.confirm('Do you want to create a new .env file?', true))) {
				throw new CancelledError();
			}
			created = true;
			await generateEnvFile(ctx);
			await prompter.offerEdit(paths.env, '.env', true);
		}

		const values = await load(paths.env);

		logger.info('Stopping all services');
		await controller.stop();
		if (action === 'update') {
			await controller.pull();
		}

		try {
			await renderProductionConfig(ctx, values);
			await applyNginxConfig(ctx, values.uploadMaxBodySize);
			await controller.start();
		} finally {
			await controller.release();
		}

		logger.info(action === 'update' ? 'Services updated' : 'Services restarted');
		succeeded = true;
	} finally {
		if (created) {
			const keep =
				succeeded &&
				(await prompter.confirm(
					`.env was created during ${action} and contains credentials. Do you want to keep it?`,
					false,
				));
			if (keep) {
				registry.unregister(paths.env);
				logger.warn({ path: paths.env }, 'Keeping .env, it contains sensitive information');
			} else {
				await destroyEnvFile(ctx);
				logger.info('.env securely removed');
			}
		}
	}
}

export const restartCommand = (context: DeployContext) => manageCommand('restart', context);
export const updateCommand = (context: DeployContext) => manageCommand('update', context);
