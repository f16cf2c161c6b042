export type BerthErrorCode =
	| 'MISSING_DEPENDENCY'
	| 'NETWORK_UNAVAILABLE'
	| 'DOWNLOAD_FAILED'
	| 'TEMPLATE_MALFORMED'
	| 'EMPTY_OUTPUT'
	| 'INSUFFICIENT_ENTROPY'
	| 'PERSISTENCE_FAILED'
	| 'READINESS_TIMEOUT'
	| 'AUTH_ERROR'
	| 'UPLOAD_ERROR'
	| 'NOT_FOUND'
	| 'MISSING_FIELD'
	| 'ORCHESTRATOR_ERROR'
	| 'CANCELLED';

/**
 * Base class for every failure the CLI reports.
 * `code` is stable and safe to switch on.
 */
export class BerthError extends Error {
	constructor(
		message: string,
		public readonly code: BerthErrorCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = this.constructor.name;
	}
}

export function isBerthError(value: unknown): value is BerthError {
	return value instanceof BerthError;
}

/** A required external tool is absent or unusable. */
export class MissingDependencyError extends BerthError {
	constructor(
		message: string,
		public readonly dependency: string,
		options?: { cause?: unknown },
	) {
		super(message, 'MISSING_DEPENDENCY', options);
	}
}

export class NetworkUnavailableError extends BerthError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 'NETWORK_UNAVAILABLE', options);
	}
}

export class DownloadFailedError extends BerthError {
	constructor(
		message: string,
		public readonly url: string,
		options?: { cause?: unknown },
	) {
		super(message, 'DOWNLOAD_FAILED', options);
	}
}

export class TemplateMalformedError extends BerthError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 'TEMPLATE_MALFORMED', options);
	}
}

export class EmptyOutputError extends BerthError {
	constructor(message = 'Rendered document is empty') {
		super(message, 'EMPTY_OUTPUT');
	}
}

export class InsufficientEntropyError extends BerthError {
	constructor(
		public readonly requested: number,
		public readonly produced: number,
	) {
		super(
			`Could not produce a ${requested}-character secret (got ${produced})`,
			'INSUFFICIENT_ENTROPY',
		);
	}
}

export class PersistenceFailedError extends BerthError {
	constructor(
		message: string,
		public readonly path: string,
		options?: { cause?: unknown },
	) {
		super(message, 'PERSISTENCE_FAILED', options);
	}
}

export class ReadinessTimeoutError extends BerthError {
	constructor(
		public readonly probe: string,
		public readonly attempts: number,
	) {
		super(
			`${probe} failed to become ready after ${attempts} attempts`,
			'READINESS_TIMEOUT',
		);
	}
}

/**
 * The API rejected the credentials.
 */
export class AuthError extends BerthError {
	constructor(
		message: string,
		public readonly status?: number,
		public readonly body?: string,
	) {
		super(message, 'AUTH_ERROR');
	}
}

/**
 * The API rejected an uploaded file. `body` is the raw response text.
 */
export class UploadError extends BerthError {
	constructor(
		message: string,
		public readonly file: string,
		public readonly status?: number,
		public readonly body?: string,
		options?: { cause?: unknown },
	) {
		super(message, 'UPLOAD_ERROR', options);
	}
}

export class NotFoundError extends BerthError {
	constructor(
		message: string,
		public readonly path: string,
	) {
		super(message, 'NOT_FOUND');
	}
}

export class MissingFieldError extends BerthError {
	constructor(public readonly field: string) {
		super(`Required field ${field} is missing or empty`, 'MISSING_FIELD');
	}
}

/**
 * A `docker compose` invocation exited non-zero.
 */
export class OrchestratorError extends BerthError {
	constructor(
		message: string,
		public readonly exitCode: number | null,
		public readonly stderr: string,
	) {
		super(message, 'ORCHESTRATOR_ERROR');
	}
}

/** The operator aborted a prompt or declined to continue. */
export class CancelledError extends BerthError {
	constructor(message = 'Operation cancelled by user') {
		super(message, 'CANCELLED');
	}
}
