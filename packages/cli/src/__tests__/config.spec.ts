import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod/v4';
import { getProjectPaths, loadDeployConfig } from '../config';

describe('loadDeployConfig', () => {
	it('should apply defaults for every variable', () => {
		const config = loadDeployConfig({});

		expect(config).toEqual({
			projectDir: 'quran-api',
			composeUrl:
				'https://raw.githubusercontent.com/NatiqQuran/quran-api/main/docker-compose.yaml',
			nginxUrl: 'https://raw.githubusercontent.com/NatiqQuran/quran-api/main/nginx.conf',
			targetService: 'natiq-api',
			databaseService: 'postgres-db',
			readiness: { attempts: 30, intervalMs: 5_000 },
			startGraceMs: 10_000,
			promptTimeoutMs: 15_000,
			minDockerVersion: '20.10.0',
			connectivityUrl: 'https://www.google.com',
			debug: false,
		});
	});

	it('should read overrides from the environment', () => {
		const config = loadDeployConfig({
			BERTH_PROJECT_DIR: 'api',
			BERTH_TARGET_SERVICE: 'web',
			BERTH_READY_ATTEMPTS: '3',
			BERTH_READY_INTERVAL_MS: '250',
			BERTH_START_GRACE_MS: '0',
			BERTH_DEBUG: 'true',
		});

		expect(config.projectDir).toBe('api');
		expect(config.targetService).toBe('web');
		expect(config.readiness).toEqual({ attempts: 3, intervalMs: 250 });
		expect(config.startGraceMs).toBe(0);
		expect(config.debug).toBe(true);
	});

	it('should treat BERTH_DEBUG=1 as enabled', () => {
		expect(loadDeployConfig({ BERTH_DEBUG: '1' }).debug).toBe(true);
		expect(loadDeployConfig({ BERTH_DEBUG: '0' }).debug).toBe(false);
	});

	it('should reject a non-numeric attempt count', () => {
		expect(() => loadDeployConfig({ BERTH_READY_ATTEMPTS: 'many' })).toThrow(ZodError);
	});

	it('should reject an invalid URL', () => {
		expect(() => loadDeployConfig({ BERTH_COMPOSE_URL: 'not a url' })).toThrow(ZodError);
	});

	it('should reject a malformed Docker version', () => {
		expect(() => loadDeployConfig({ BERTH_MIN_DOCKER_VERSION: '20' })).toThrow(ZodError);
	});
});

describe('getProjectPaths', () => {
	it('should place every file inside the project directory', () => {
		const paths = getProjectPaths({ projectDir: 'quran-api' }, '/srv');

		expect(paths).toEqual({
			root: join('/srv', 'quran-api'),
			source: join('/srv', 'quran-api', 'docker-compose.source.yaml'),
			prod: join('/srv', 'quran-api', 'docker-compose.prod.yaml'),
			nginx: join('/srv', 'quran-api', 'nginx.conf'),
			env: join('/srv', 'quran-api', '.env'),
		});
	});
});
