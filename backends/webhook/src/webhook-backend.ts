/**
 * HTTP webhook backend.
 *
 * Sends one request per event. Server errors (5xx) and network failures
 * are retried with exponential backoff; anything still failing after
 * `maxTries` attempts, or any other non-2xx answer, is thrown as a
 * SinkError for the dispatch loop to isolate.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
	attachBackend,
	ConfigError,
	describeCall,
	errorMessage,
	type Formatter,
	type FormatterConfig,
	isTableFormatter,
	type LogEvent,
	readEnum,
	readNumber,
	readOptionalString,
	readPositiveInt,
	readString,
	readStringRecord,
	type Sink,
	SinkError,
} from '@logweave/sdk';

export const WEBHOOK_METHODS = ['POST', 'PUT', 'PATCH'] as const;
export type WebhookMethod = (typeof WEBHOOK_METHODS)[number];

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface WebhookOptions {
	/** http:// or https:// endpoint */
	url: string;
	/** Default POST */
	method?: WebhookMethod;
	/** Extra request headers, e.g. `{ Authorization: 'Bearer ...' }` */
	headers?: Record<string, string>;
	/** Inferred from the formatter when omitted */
	contentType?: string;
	/** Per-attempt timeout (default 30) */
	timeoutSeconds?: number;
	/** Attempts per event, first one included (default 3) */
	maxTries?: number;
	/** Replacement for the global fetch */
	fetch?: FetchLike;
}

export function inferContentType(formatKind: string): string {
	switch (formatKind) {
		case 'json':
		case 'teams':
			return 'application/json';
		case 'csv':
			return 'text/csv';
		default:
			return 'text/plain';
	}
}

/**
 * ```ts
 * onWebhook(toTeams({ title: 'Billing' }), { url: process.env.TEAMS_WEBHOOK_URL })
 * ```
 */
export function onWebhook<F extends Formatter>(formatter: F, options: WebhookOptions): F {
	if (isTableFormatter(formatter)) {
		throw new ConfigError(
			`onWebhook() sends one text body per event and cannot take ${formatter.label}`,
		);
	}
	if (typeof options.url !== 'string' || !/^https?:\/\//i.test(options.url)) {
		throw new ConfigError(
			`onWebhook() url must start with http:// or https://\n` +
				`  Got: ${String(options.url)}\n` +
				'  Example: https://example.com/webhook',
		);
	}
	const method = (options.method ?? 'POST').toUpperCase();
	if (!WEBHOOK_METHODS.some((m) => m === method)) {
		throw new ConfigError(`onWebhook() method must be one of ${WEBHOOK_METHODS.join(', ')}, got ${method}`);
	}
	if (options.timeoutSeconds !== undefined && !(options.timeoutSeconds > 0)) {
		throw new ConfigError(`onWebhook() timeoutSeconds must be positive, got ${options.timeoutSeconds}`);
	}
	if (options.maxTries !== undefined && (!Number.isInteger(options.maxTries) || options.maxTries < 1)) {
		throw new ConfigError(`onWebhook() maxTries must be an integer >= 1, got ${options.maxTries}`);
	}

	const config: Record<string, unknown> = {
		...options,
		method,
		contentType: options.contentType ?? inferContentType(formatter.config.formatKind),
	};
	// the url often embeds a token; headers may carry credentials
	const host = new URL(options.url).host;
	return attachBackend(
		formatter,
		'webhook',
		config,
		describeCall('onWebhook', { host, method, maxTries: options.maxTries }),
	);
}

// ─── Builder ──────────────────────────────────────────────────────────────────

export interface WebhookSinkOptions {
	/** Wait between attempts; tests pass a stub */
	sleep?: (ms: number) => Promise<void>;
	/** First backoff delay, doubled per retry (default 1000) */
	baseDelayMs?: number;
	/** Upper bound for a single backoff delay (default 30000) */
	maxDelayMs?: number;
}

function isFetch(value: unknown): value is FetchLike {
	return typeof value === 'function';
}

/** Delay before attempt `attempt + 1` */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
	return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

class WebhookSink implements Sink {
	readonly kind = 'sink' as const;
	private headerSent = false;

	constructor(
		readonly label: string,
		private readonly formatter: Formatter,
		private readonly url: string,
		private readonly init: { method: string; headers: Record<string, string>; timeoutMs: number },
		private readonly maxTries: number,
		private readonly fetchImpl: FetchLike,
		private readonly options: Required<WebhookSinkOptions>,
	) {}

	async write(event: LogEvent): Promise<void> {
		const formatter = this.formatter;
		if (isTableFormatter(formatter)) return;
		let body = formatter.format(event);
		if (!this.headerSent && formatter.header) {
			body = `${formatter.header(event)}\n${body}`;
		}
		await this.send(body);
		this.headerSent = true;
	}

	private async send(body: string): Promise<void> {
		for (let attempt = 1; ; attempt++) {
			const failure = await this.attempt(body);
			if (failure === null) return;
			if (attempt >= this.maxTries) {
				throw new SinkError(
					this.label,
					`Webhook request failed after ${attempt} attempt(s): ${failure}`,
				);
			}
			await this.options.sleep(
				backoffDelay(attempt, this.options.baseDelayMs, this.options.maxDelayMs),
			);
		}
	}

	/** null on success, the failure when it is worth retrying; throws otherwise */
	private async attempt(body: string): Promise<string | null> {
		let response: Response;
		try {
			response = await this.fetchImpl(this.url, {
				method: this.init.method,
				headers: this.init.headers,
				body,
				signal: AbortSignal.timeout(this.init.timeoutMs),
			});
		} catch (err) {
			return errorMessage(err);
		}
		if (response.ok) return null;
		// Release the connection before a retry or the final throw
		await response.body?.cancel();
		if (response.status >= 500) return `status ${response.status}`;
		throw new SinkError(this.label, `Webhook request failed with status ${response.status}`);
	}
}

export function buildWebhookSink(
	formatter: Formatter,
	config: FormatterConfig,
	options: WebhookSinkOptions = {},
): Sink {
	if (isTableFormatter(formatter)) {
		throw new ConfigError(`The webhook backend cannot send table formatter ${formatter.label}`);
	}
	const bc = config.backendConfig;
	const url = readString(bc, 'url');
	const method = readEnum(bc, 'method', WEBHOOK_METHODS, 'POST');
	const contentType =
		readOptionalString(bc, 'contentType') ?? inferContentType(config.formatKind);
	const timeoutSeconds = readNumber(bc, 'timeoutSeconds', 30);
	const maxTries = readPositiveInt(bc, 'maxTries', 3);
	if (bc.fetch !== undefined && !isFetch(bc.fetch)) {
		throw new ConfigError('Webhook option "fetch" must be a function');
	}
	const fetchImpl: FetchLike = isFetch(bc.fetch) ? bc.fetch : (input, init) => fetch(input, init);

	return new WebhookSink(
		formatter.label,
		formatter,
		url,
		{
			method,
			headers: { 'Content-Type': contentType, ...readStringRecord(bc, 'headers') },
			timeoutMs: timeoutSeconds * 1000,
		},
		maxTries,
		fetchImpl,
		{
			sleep: options.sleep ?? ((ms) => delay(ms)),
			baseDelayMs: options.baseDelayMs ?? 1000,
			maxDelayMs: options.maxDelayMs ?? 30_000,
		},
	);
}
