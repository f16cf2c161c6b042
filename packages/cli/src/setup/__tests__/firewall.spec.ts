import { describe, expect, it } from 'vitest';
import { createMockLogger, FakeCommandRunner } from '../../__tests__/test-helpers';
import { setupFirewall } from '../firewall';

describe('setupFirewall', () => {
	it('should apply every rule through sudo', async () => {
		const runner = new FakeCommandRunner(['ufw']);

		await expect(setupFirewall(runner)).resolves.toBe(true);

		expect(runner.commandLines()).toEqual([
			'sudo ufw --force reset',
			'sudo ufw default deny incoming',
			'sudo ufw default allow outgoing',
			'sudo ufw allow ssh',
			'sudo ufw allow 80/tcp',
			'sudo ufw allow 443/tcp',
			'sudo ufw --force enable',
		]);
	});

	it('should install ufw with apt-get when missing', async () => {
		const runner = new FakeCommandRunner(['apt-get']);

		await expect(setupFirewall(runner)).resolves.toBe(true);

		expect(runner.commandLines().slice(0, 2)).toEqual([
			'sudo apt-get update -qq',
			'sudo apt-get install -y ufw',
		]);
	});

	it('should return false when ufw cannot be installed', async () => {
		const logger = createMockLogger();

		await expect(setupFirewall(new FakeCommandRunner([]), logger)).resolves.toBe(false);
		expect(logger.warn).toHaveBeenCalledWith(
			'Cannot install UFW automatically, install it manually',
		);
	});

	it('should stop at the first failing rule', async () => {
		const runner = new FakeCommandRunner(['ufw']).when('deny incoming', {
			exitCode: 1,
			stderr: 'ERROR: problem running',
		});

		await expect(setupFirewall(runner)).resolves.toBe(false);
		expect(runner.calls).toHaveLength(2);
	});
});
