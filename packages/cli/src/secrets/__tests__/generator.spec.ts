import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from '@berth/logger';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InsufficientEntropyError } from '../../errors';
import {
	createSecretGenerator,
	cryptoStrategy,
	entropyDeviceStrategy,
	MAX_SECRET_LENGTH,
	type SecretStrategy,
	timestampStrategy,
} from '../generator';

function createMockLogger(): Logger {
	const logger: Logger = {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		fatal: vi.fn(),
		trace: vi.fn(),
		child: () => logger,
	};
	return logger;
}

const unavailable: SecretStrategy = {
	name: 'unavailable',
	generate: () => undefined,
};

const throwing: SecretStrategy = {
	name: 'throwing',
	generate: () => {
		throw new Error('ENOENT');
	},
};

describe('createSecretGenerator', () => {
	it('should generate a secret of the requested length', () => {
		const generator = createSecretGenerator();

		expect(generator.generate(20)).toHaveLength(20);
		expect(generator.generate(50)).toHaveLength(50);
		expect(generator.generate(MAX_SECRET_LENGTH)).toHaveLength(
			MAX_SECRET_LENGTH,
		);
	});

	it('should only contain alphanumeric characters', () => {
		const secret = createSecretGenerator().generate(200);
		expect(secret).toMatch(/^[A-Za-z0-9]{200}$/);
	});

	it('should generate different secrets each call', () => {
		const generator = createSecretGenerator();
		expect(generator.generate(32)).not.toBe(generator.generate(32));
	});

	it.each([0, -1, 1.5, MAX_SECRET_LENGTH + 1, Number.NaN])(
		'should reject length %s',
		(length) => {
			expect(() => createSecretGenerator().generate(length)).toThrow(
				RangeError,
			);
		},
	);

	it('should fall through unavailable strategies', () => {
		const logger = createMockLogger();
		const generator = createSecretGenerator({
			strategies: [unavailable, throwing, { name: 'fixed', generate: () => 'abc123XYZ' }],
			logger,
		});

		expect(generator.generate(6)).toBe('abc123');
		expect(logger.debug).toHaveBeenCalledTimes(2);
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it('should warn when a degraded strategy is used', () => {
		const logger = createMockLogger();
		const generator = createSecretGenerator({
			strategies: [unavailable, timestampStrategy],
			logger,
		});

		expect(generator.generate(40)).toMatch(/^[0-9a-f]{40}$/);
		expect(logger.warn).toHaveBeenCalledWith(
			{ strategy: 'timestamp' },
			'No secure random source available, secrets are predictable',
		);
	});

	it('should fail on short output instead of returning it', () => {
		const generator = createSecretGenerator({
			strategies: [timestampStrategy],
		});

		expect(() => generator.generate(100)).toThrow(InsufficientEntropyError);
	});

	it('should report requested and produced lengths', () => {
		const generator = createSecretGenerator({
			strategies: [{ name: 'short', generate: () => 'ab+/cd' }],
		});

		try {
			generator.generate(10);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(InsufficientEntropyError);
			if (error instanceof InsufficientEntropyError) {
				expect(error.requested).toBe(10);
				expect(error.produced).toBe(4);
				expect(error.code).toBe('INSUFFICIENT_ENTROPY');
			}
		}
	});

	it('should fail when every strategy is unavailable', () => {
		const generator = createSecretGenerator({
			strategies: [unavailable, throwing],
		});

		expect(() => generator.generate(8)).toThrow(InsufficientEntropyError);
	});
});

describe('generateIdentifier', () => {
	it('should prefix eight lowercase characters', () => {
		const id = createSecretGenerator().generateIdentifier('user');
		expect(id).toMatch(/^user_[a-z0-9]{8}$/);
	});
});

describe('cryptoStrategy', () => {
	it('should return exactly the requested length', () => {
		expect(cryptoStrategy.generate(1)).toHaveLength(1);
		expect(cryptoStrategy.generate(333)).toHaveLength(333);
	});
});

describe('entropyDeviceStrategy', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'berth-entropy-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('should keep only alphanumeric bytes', async () => {
		const device = join(tempDir, 'random');
		await writeFile(device, Buffer.from('a!b@c#1$2%3^XYZ'.repeat(10), 'latin1'));

		const strategy = entropyDeviceStrategy({ path: device, bytesPerChar: 4 });

		expect(strategy.generate(9)).toBe('abc123XYZ');
	});

	it('should return short output when the source runs dry', async () => {
		const device = join(tempDir, 'random');
		await writeFile(device, '!!ab!!');

		const strategy = entropyDeviceStrategy({ path: device });

		expect(strategy.generate(10)).toBe('ab');
	});

	it('should keep reading until enough characters survive', async () => {
		const device = join(tempDir, 'random');
		await writeFile(device, `${'!'.repeat(40)}k`);

		const strategy = entropyDeviceStrategy({ path: device });

		expect(strategy.generate(1)).toBe('k');
	});

	it('should stop reading at the byte limit', async () => {
		const device = join(tempDir, 'random');
		await writeFile(device, `${'!'.repeat(200)}k`);

		const strategy = entropyDeviceStrategy({ path: device, maxBytesPerChar: 64 });

		expect(strategy.generate(1)).toBe('');
	});

	it('should produce exact short secrets from the system device', () => {
		const generator = createSecretGenerator({ strategies: [entropyDeviceStrategy()] });

		for (let i = 0; i < 200; i++) {
			expect(generator.generate(1)).toMatch(/^[A-Za-z0-9]$/);
		}
	});

	it('should throw when the device is missing', () => {
		const strategy = entropyDeviceStrategy({ path: join(tempDir, 'none') });
		expect(() => strategy.generate(4)).toThrow();
	});

	it('should read the system device by default', () => {
		expect(entropyDeviceStrategy().generate(16)).toMatch(/^[A-Za-z0-9]{16}$/);
	});
});
