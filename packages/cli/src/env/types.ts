/**
 * Values written to the project `.env` file and consumed by the templater.
 */
export interface EnvironmentValues {
	databaseUser: string;
	databasePassword: string;
	databaseUsername: string;
	databaseSecret: string;
	brokerUser: string;
	brokerPassword: string;
	/** Always derived from `brokerUser` and `brokerPassword` */
	brokerUrl: string;
	secretKey: string;
	allowedHosts: string;
	debug: string;
	forcedAlignmentSecretKey: string;
	storageAccessKey: string;
	storageSecretKey: string;
	storageEndpoint: string;
	uploadMaxBodySize: string;
	adminUsername: string;
	adminPassword: string;
	adminEmail: string;
}

export type EnvironmentField = keyof EnvironmentValues;

/** `.env` key for every field, in file order. */
export const ENV_KEYS = {
	databaseUser: 'POSTGRES_USER',
	databasePassword: 'POSTGRES_PASSWORD',
	databaseUsername: 'DATABASE_USERNAME',
	databaseSecret: 'DATABASE_PASSWORD',
	brokerUser: 'RABBIT_USER',
	brokerPassword: 'RABBITMQ_PASS',
	brokerUrl: 'CELERY_BROKER_URL',
	secretKey: 'SECRET_KEY',
	allowedHosts: 'DJANGO_ALLOWED_HOSTS',
	debug: 'DEBUG',
	forcedAlignmentSecretKey: 'FORCED_ALIGNMENT_SECRET_KEY',
	storageAccessKey: 'AWS_ACCESS_KEY_ID',
	storageSecretKey: 'AWS_SECRET_ACCESS_KEY',
	storageEndpoint: 'AWS_S3_ENDPOINT_URL',
	uploadMaxBodySize: 'NGINX_CLIENT_MAX_BODY_SIZE',
	adminUsername: 'DJANGO_SUPERUSER_USERNAME',
	adminPassword: 'DJANGO_SUPERUSER_PASSWORD',
	adminEmail: 'DJANGO_SUPERUSER_EMAIL',
} as const satisfies Record<EnvironmentField, string>;

export type EnvKey = (typeof ENV_KEYS)[EnvironmentField];

export const REQUIRED_KEYS: readonly EnvKey[] = [
	'POSTGRES_USER',
	'POSTGRES_PASSWORD',
	'RABBIT_USER',
	'RABBITMQ_PASS',
	'SECRET_KEY',
];

export const DEFAULT_VALUES = {
	allowedHosts: 'localhost',
	debug: '0',
	storageAccessKey: 'example123',
	storageSecretKey: 'secretExample',
	storageEndpoint: 'https://example.com',
	uploadMaxBodySize: '10M',
	adminEmail: 'example@gmail.com',
} as const;

export const BROKER_HOST = 'rabbitmq:5672';

export function deriveBrokerUrl(user: string, password: string): string {
	return `amqp://${user}:${password}@${BROKER_HOST}//`;
}

/**
 * Log redaction paths for every secret-bearing field, at the top level and
 * one level down (e.g. `{ values: { secretKey } }`).
 */
export const SECRET_FIELDS: readonly EnvironmentField[] = [
	'databasePassword',
	'databaseSecret',
	'brokerPassword',
	'brokerUrl',
	'secretKey',
	'forcedAlignmentSecretKey',
	'storageSecretKey',
	'adminPassword',
];

export const BERTH_REDACT_PATHS: string[] = SECRET_FIELDS.flatMap((field) => [
	field,
	`*.${field}`,
]);
