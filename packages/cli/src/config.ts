import { join } from 'node:path';
import { z } from 'zod/v4';

export const SOURCE_FILE = 'docker-compose.source.yaml';
export const PROD_FILE = 'docker-compose.prod.yaml';
export const NGINX_FILE = 'nginx.conf';
export const ENV_FILE = '.env';

const DEFAULT_COMPOSE_URL =
	'https://raw.githubusercontent.com/NatiqQuran/quran-api/main/docker-compose.yaml';
const DEFAULT_NGINX_URL =
	'https://raw.githubusercontent.com/NatiqQuran/quran-api/main/nginx.conf';

const flag = z
	.string()
	.optional()
	.transform((v) => v === '1' || v?.toLowerCase() === 'true');

const positiveInt = (fallback: number) =>
	z.coerce.number().int().positive().default(fallback);

const DeployEnvSchema = z.object({
	BERTH_PROJECT_DIR: z.string().min(1).default('quran-api'),
	BERTH_COMPOSE_URL: z.url().default(DEFAULT_COMPOSE_URL),
	BERTH_NGINX_URL: z.url().default(DEFAULT_NGINX_URL),
	BERTH_TARGET_SERVICE: z.string().min(1).default('natiq-api'),
	BERTH_DATABASE_SERVICE: z.string().min(1).default('postgres-db'),
	BERTH_READY_ATTEMPTS: positiveInt(30),
	BERTH_READY_INTERVAL_MS: positiveInt(5_000),
	BERTH_START_GRACE_MS: z.coerce.number().int().min(0).default(10_000),
	BERTH_PROMPT_TIMEOUT_MS: positiveInt(15_000),
	BERTH_MIN_DOCKER_VERSION: z
		.string()
		.regex(/^\d+\.\d+\.\d+$/)
		.default('20.10.0'),
	BERTH_CONNECTIVITY_URL: z.url().default('https://www.google.com'),
	BERTH_DEBUG: flag,
});

export interface DeployConfig {
	projectDir: string;
	composeUrl: string;
	nginxUrl: string;
	targetService: string;
	databaseService: string;
	readiness: {
		attempts: number;
		intervalMs: number;
	};
	startGraceMs: number;
	promptTimeoutMs: number;
	minDockerVersion: string;
	connectivityUrl: string;
	debug: boolean;
}

/**
 * Load deployment settings from environment variables.
 * Every variable is optional; invalid values throw a ZodError.
 */
export function loadDeployConfig(
	env: Record<string, string | undefined> = process.env,
): DeployConfig {
	const parsed = DeployEnvSchema.parse(env);

	return {
		projectDir: parsed.BERTH_PROJECT_DIR,
		composeUrl: parsed.BERTH_COMPOSE_URL,
		nginxUrl: parsed.BERTH_NGINX_URL,
		targetService: parsed.BERTH_TARGET_SERVICE,
		databaseService: parsed.BERTH_DATABASE_SERVICE,
		readiness: {
			attempts: parsed.BERTH_READY_ATTEMPTS,
			intervalMs: parsed.BERTH_READY_INTERVAL_MS,
		},
		startGraceMs: parsed.BERTH_START_GRACE_MS,
		promptTimeoutMs: parsed.BERTH_PROMPT_TIMEOUT_MS,
		minDockerVersion: parsed.BERTH_MIN_DOCKER_VERSION,
		connectivityUrl: parsed.BERTH_CONNECTIVITY_URL,
		debug: parsed.BERTH_DEBUG,
	};
}

export interface ProjectPaths {
	root: string;
	source: string;
	prod: string;
	nginx: string;
	env: string;
}

export function getProjectPaths(
	config: Pick<DeployConfig, 'projectDir'>,
	cwd = process.cwd(),
): ProjectPaths {
	const root = join(cwd, config.projectDir);
	return {
		root,
		source: join(root, SOURCE_FILE),
		prod: join(root, PROD_FILE),
		nginx: join(root, NGINX_FILE),
		env: join(root, ENV_FILE),
	};
}
