#!/usr/bin/env -S npx tsx

import { createLogger, type Logger, LogLevel } from '@berth/logger';
import { Command } from 'commander';
import { z } from 'zod/v4';
import pkg from '../package.json' with { type: 'json' };
import { loginCommand, logoutCommand } from './auth';
import { getProjectPaths, loadDeployConfig } from './config';
import { type DeployContext, installCommand, restartCommand, updateCommand } from './deploy';
import { cleanupRegistry, installSignalCleanup } from './deploy/cleanup';
import { createCommandRunner } from './deploy/runner';
import { BERTH_REDACT_PATHS } from './env/types';
import { isBerthError } from './errors';
import { importFileCommand, importTranslationsCommand } from './importer';
import { createPrompter } from './prompt';

interface GlobalOptions {
	debug?: boolean;
	yes?: boolean;
}

const program = new Command();

program
	.name('berth')
	.description('Deploy the Quran API with Docker Compose and import data into it')
	.version(pkg.version)
	.option('--debug', 'Enable debug logging (also BERTH_DEBUG=1)')
	.option('-y, --yes', 'Accept every default answer without prompting');

function debugRequested(): boolean {
	const env = process.env.BERTH_DEBUG?.toLowerCase();
	return program.opts<GlobalOptions>().debug === true || env === '1' || env === 'true';
}

function reportError(logger: Logger, error: unknown): void {
	if (error instanceof z.ZodError) {
		logger.error(`Invalid configuration:\n${z.prettifyError(error)}`);
		return;
	}

	const message = error instanceof Error ? error.message : String(error);
	logger.error(isBerthError(error) ? { code: error.code } : {}, message);
	if (error instanceof Error && error.cause !== undefined) {
		logger.debug({ cause: String(error.cause) }, 'Caused by');
	}
}

/**
 * Run an action with the CLI logger. Any error is logged, registered
 * temporary files are removed, and the exit code is set to 1.
 */
async function run(action: (logger: Logger) => Promise<unknown>): Promise<void> {
	const logger = createLogger({
		pretty: true,
		level: debugRequested() ? LogLevel.Debug : LogLevel.Info,
		redact: BERTH_REDACT_PATHS,
	});
	const uninstall = installSignalCleanup({ logger });

	try {
		await action(logger);
	} catch (error) {
		reportError(logger, error);
		cleanupRegistry.cleanupSync(logger);
		process.exitCode = 1;
	} finally {
		uninstall();
	}
}

function createDeployContext(logger: Logger): DeployContext {
	const config = loadDeployConfig();
	const runner = createCommandRunner(logger);
	return {
		config,
		paths: getProjectPaths(config),
		runner,
		prompter: createPrompter({
			runner,
			assumeYes: program.opts<GlobalOptions>().yes === true,
			timeoutMs: config.promptTimeoutMs,
			logger,
		}),
		logger,
	};
}

program
	.command('install', { isDefault: true })
	.description('Prepare this host and deploy the API from scratch')
	.option('--no-install', 'Skip Docker installation')
	.option('--no-firewall', 'Skip firewall configuration')
	.action((options: { install: boolean; firewall: boolean }) =>
		run((logger) =>
			installCommand(
				{ skipInstall: !options.install, skipFirewall: !options.firewall },
				createDeployContext(logger),
			),
		),
	);

program
	.command('restart')
	.description('Re-render the configuration from .env and restart the services')
	.action(() => run((logger) => restartCommand(createDeployContext(logger))));

program
	.command('update')
	.description('Pull the latest images and restart the services')
	.action(() => run((logger) => updateCommand(createDeployContext(logger))));

program
	.command('login')
	.description('Log in to the API and store the token for imports')
	.argument('<apiUrl>', 'API base URL')
	.argument('[username]', 'Prompted for when omitted')
	.argument('[password]', 'Prompted for when omitted')
	.action((apiUrl: string, username: string | undefined, password: string | undefined) =>
		run((logger) => loginCommand({ apiUrl, username, password, logger })),
	);

program
	.command('logout')
	.description('Remove the stored token')
	.action(() => run((logger) => logoutCommand({ logger })));

const importer = program.command('import').description('Upload data to the API');

importer
	.command('mushaf')
	.description('Upload a mushaf JSON file')
	.argument('<file>')
	.argument('<apiUrl>')
	.action((file: string, apiUrl: string) =>
		run((logger) => importFileCommand('mushaf', file, { apiUrl, logger })),
	);

importer
	.command('translation')
	.description('Upload a translation JSON file')
	.argument('<file>')
	.argument('<apiUrl>')
	.action((file: string, apiUrl: string) =>
		run((logger) => importFileCommand('translation', file, { apiUrl, logger })),
	);

importer
	.command('translations')
	.description('Upload every translation JSON file in a directory')
	.argument('<dir>')
	.argument('<apiUrl>')
	.action((dir: string, apiUrl: string) =>
		run((logger) => importTranslationsCommand(dir, { apiUrl, logger })),
	);

await program.parseAsync();
