import { type Logger, SILENT_LOGGER } from '@berth/logger';
import type { CommandRunner } from '../deploy/runner';

export const FIREWALL_RULES: readonly string[][] = [
	['--force', 'reset'],
	['default', 'deny', 'incoming'],
	['default', 'allow', 'outgoing'],
	['allow', 'ssh'],
	['allow', '80/tcp'],
	['allow', '443/tcp'],
	['--force', 'enable'],
];

/**
 * Reset ufw to allow only SSH, HTTP and HTTPS.
 * Returns false instead of throwing; the firewall is not required to deploy.
 */
export async function setupFirewall(
	runner: CommandRunner,
	logger: Logger = SILENT_LOGGER,
): Promise<boolean> {
	logger.info('Setting up UFW firewall');

	if (!(await runner.commandExists('ufw'))) {
		if (!(await runner.commandExists('apt-get'))) {
			logger.warn('Cannot install UFW automatically, install it manually');
			return false;
		}

		const update = await runner.run('sudo', ['apt-get', 'update', '-qq']);
		const install =
			update.exitCode === 0
				? await runner.run('sudo', ['apt-get', 'install', '-y', 'ufw'])
				: update;
		if (install.exitCode !== 0) {
			logger.warn({ stderr: install.stderr.trim() }, 'Could not install UFW');
			return false;
		}
	}

	for (const rule of FIREWALL_RULES) {
		const result = await runner.run('sudo', ['ufw', ...rule]);
		if (result.exitCode !== 0) {
			logger.warn(
				{ rule: rule.join(' '), stderr: result.stderr.trim() },
				'Firewall rule failed',
			);
			return false;
		}
	}

	logger.info('UFW configured (SSH, HTTP, HTTPS allowed)');
	return true;
}
