import { createHash, randomBytes } from 'node:crypto';
import { closeSync, openSync, readSync } from 'node:fs';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import { InsufficientEntropyError } from '../errors';

export const MAX_SECRET_LENGTH = 512;

const NON_ALPHANUMERIC = /[^A-Za-z0-9]/g;

/**
 * A source of random alphanumeric text.
 * Returns undefined (or throws) when the source is unavailable.
 */
export interface SecretStrategy {
	readonly name: string;
	/** Output is predictable; using it logs a warning. */
	readonly degraded?: boolean;
	generate(length: number): string | undefined;
}

export const cryptoStrategy: SecretStrategy = {
	name: 'crypto',
	generate(length) {
		let out = '';
		while (out.length < length) {
			out += randomBytes(Math.max(length, 32))
				.toString('base64')
				.replace(NON_ALPHANUMERIC, '');
		}
		return out.slice(0, length);
	},
};

export interface EntropyDeviceOptions {
	path?: string;
	/** Raw bytes read per requested character in each chunk. Only ~1 in 4 bytes survives filtering. */
	bytesPerChar?: number;
	/** Stop reading after `length * maxBytesPerChar` bytes */
	maxBytesPerChar?: number;
}

export function entropyDeviceStrategy(
	options: EntropyDeviceOptions = {},
): SecretStrategy {
	const { path = '/dev/urandom', bytesPerChar = 8, maxBytesPerChar = 64 } = options;

	return {
		name: 'entropy-device',
		generate(length) {
			const limit = length * maxBytesPerChar;
			const chunk = Buffer.alloc(length * bytesPerChar);
			const fd = openSync(path, 'r');
			let out = '';
			let total = 0;
			try {
				while (out.length < length && total < limit) {
					const read = readSync(fd, chunk, 0, Math.min(chunk.length, limit - total), null);
					if (read === 0) break;
					total += read;
					out += chunk
						.subarray(0, read)
						.toString('latin1')
						.replace(NON_ALPHANUMERIC, '');
				}
			} finally {
				closeSync(fd);
			}

			// Short output is reported by the generator, not padded here.
			return out.slice(0, length);
		},
	};
}

export const timestampStrategy: SecretStrategy = {
	name: 'timestamp',
	degraded: true,
	generate(length) {
		const seed = `${process.hrtime.bigint()}:${process.pid}:${Date.now()}`;
		return createHash('sha256').update(seed).digest('hex').slice(0, length);
	},
};

export const DEFAULT_STRATEGIES: readonly SecretStrategy[] = [
	cryptoStrategy,
	entropyDeviceStrategy(),
	timestampStrategy,
];

export interface SecretGenerator {
	/** Random `[A-Za-z0-9]` string of exactly `length` characters. */
	generate(length: number): string;
	/** `<prefix>_` followed by 8 lowercase random characters. */
	generateIdentifier(prefix: string): string;
}

export interface SecretGeneratorOptions {
	strategies?: readonly SecretStrategy[];
	logger?: Logger;
}

export function createSecretGenerator(
	options: SecretGeneratorOptions = {},
): SecretGenerator {
	const { strategies = DEFAULT_STRATEGIES, logger = SILENT_LOGGER } = options;

	const generate = (length: number): string => {
		if (
			!Number.isInteger(length) ||
			length < 1 ||
			length > MAX_SECRET_LENGTH
		) {
			throw new RangeError(
				`Secret length must be an integer between 1 and ${MAX_SECRET_LENGTH}, got ${length}`,
			);
		}

		for (const strategy of strategies) {
			let raw: string | undefined;
			try {
				raw = strategy.generate(length);
			} catch (error) {
				logger.debug(
					{ strategy: strategy.name, reason: String(error) },
					'Secret source unavailable',
				);
				continue;
			}

			if (raw === undefined) {
				logger.debug({ strategy: strategy.name }, 'Secret source unavailable');
				continue;
			}

			if (strategy.degraded) {
				logger.warn(
					{ strategy: strategy.name },
					'No secure random source available, secrets are predictable',
				);
			}

			const value = raw.replace(NON_ALPHANUMERIC, '');
			if (value.length < length) {
				throw new InsufficientEntropyError(length, value.length);
			}

			return value.slice(0, length);
		}

		throw new InsufficientEntropyError(length, 0);
	};

	return {
		generate,
		generateIdentifier: (prefix) =>
			`${prefix}_${generate(8).toLowerCase()}`,
	};
}
