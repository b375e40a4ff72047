/**
 * Error taxonomy for logweave.
 *
 * Every error raised by the framework extends LogweaveError, giving callers
 * a consistent shape to catch and inspect. Construction-time problems are
 * ConfigError/SchemaError/BackendNotFoundError and are always thrown to the
 * caller building the logger; runtime sink failures never leave the
 * dispatch loop.
 */

export class LogweaveError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'LogweaveError';
		this.code = code;
	}
}

export class ConfigError extends LogweaveError {
	constructor(message: string, options?: ErrorOptions) {
		super('CONFIG_ERROR', message, options);
		this.name = 'ConfigError';
	}
}

export class SchemaError extends LogweaveError {
	readonly validationErrors: string[];

	constructor(message: string, validationErrors: string[] = [], options?: ErrorOptions) {
		super('SCHEMA_ERROR', message, options);
		this.name = 'SchemaError';
		this.validationErrors = validationErrors;
	}
}

export class BackendNotFoundError extends LogweaveError {
	readonly backendName: string;
	readonly available: string[];

	constructor(backendName: string, available: string[], options?: ErrorOptions) {
		super(
			'BACKEND_NOT_FOUND',
			`Unknown backend "${backendName}"\n` +
				`  Available backends: ${available.length > 0 ? available.join(', ') : '(none registered)'}\n` +
				'  Solution: use a registered handler (onLocal, onS3, onAzure, onWebhook) or register the backend first',
			options,
		);
		this.name = 'BackendNotFoundError';
		this.backendName = backendName;
		this.available = available;
	}
}

export class SinkError extends LogweaveError {
	readonly sinkName: string;

	constructor(sinkName: string, message: string, options?: ErrorOptions) {
		super('SINK_ERROR', `[${sinkName}] ${message}`, options);
		this.name = 'SinkError';
		this.sinkName = sinkName;
	}
}

export class QueueFullError extends LogweaveError {
	readonly maxQueueSize: number;

	constructor(maxQueueSize: number, options?: ErrorOptions) {
		super('QUEUE_FULL', `Async queue is full (${maxQueueSize} events)`, options);
		this.name = 'QueueFullError';
		this.maxQueueSize = maxQueueSize;
	}
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
