import { type Logger, SILENT_LOGGER } from '@berth/logger';

export const PUBLIC_IP_ENDPOINTS = [
	'https://api.ipify.org',
	'https://ipecho.net/plain',
	'https://icanhazip.com',
];

const FALLBACK_HOST = 'localhost';

export function isIPv4(value: string): boolean {
	const parts = value.split('.');
	return (
		parts.length === 4 &&
		parts.every((part) => /^\d{1,3}$/.test(part) && Number(part) <= 255)
	);
}

export interface PublicIpOptions {
	timeoutMs?: number;
	logger?: Logger;
}

/**
 * Ask each endpoint in turn for this host's public IPv4 address.
 * Falls back to `localhost` when none answers with one.
 */
export async function lookupPublicIp(
	endpoints: readonly string[] = PUBLIC_IP_ENDPOINTS,
	options: PublicIpOptions = {},
): Promise<string> {
	const { timeoutMs = 5_000, logger = SILENT_LOGGER } = options;

	for (const endpoint of endpoints) {
		try {
			const response = await fetch(endpoint, {
				signal: AbortSignal.timeout(timeoutMs),
			});
			if (!response.ok) {
				logger.debug({ endpoint, status: response.status }, 'IP lookup failed');
				continue;
			}

			const body = (await response.text()).trim();
			if (isIPv4(body)) {
				return body;
			}
			logger.debug({ endpoint }, 'IP lookup returned no IPv4 address');
		} catch (error) {
			logger.debug({ endpoint, reason: String(error) }, 'IP lookup failed');
		}
	}

	logger.warn(`Could not detect public IP, using ${FALLBACK_HOST}`);
	return FALLBACK_HOST;
}
