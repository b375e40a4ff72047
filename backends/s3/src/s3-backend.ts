/**
 * Amazon S3 backend.
 *
 * Buffers formatted events and uploads each flush as a new object named
 * `{keyPrefix}-{YYYYMMDD-HHMMSS}.log` (`.{extension}` for table formatters).
 * Two flushes within the same second get a `-2`, `-3`... suffix.
 */

import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { BufferedSink } from '@logweave/core';
import {
	attachBackend,
	ConfigError,
	describeCall,
	type Formatter,
	type FormatterConfig,
	isTableFormatter,
	readPositiveInt,
	readString,
	type Sink,
} from '@logweave/sdk';

/** The part of S3Client this backend uses */
export interface S3Uploader {
	send(command: PutObjectCommand): Promise<unknown>;
	destroy?(): void;
}

export interface S3Options {
	bucket: string;
	keyPrefix: string;
	/** Default "us-east-1" */
	region?: string;
	/** Events buffered per object (default 100) */
	flushThreshold?: number;
	/** Pre-configured client; one is created from `region` otherwise */
	client?: S3Uploader;
}

/**
 * ```ts
 * onS3(toJson(), { bucket: 'logs', keyPrefix: 'app/events', flushThreshold: 500 })
 * ```
 */
export function onS3<F extends Formatter>(formatter: F, options: S3Options): F {
	const config: Record<string, unknown> = { ...options };
	return attachBackend(formatter, 's3', config, describeCall('onS3', config));
}

// ─── Builder ──────────────────────────────────────────────────────────────────

function isUploader(value: unknown): value is S3Uploader {
	return typeof value === 'object' && value !== null && 'send' in value && typeof value.send === 'function';
}

function pad(n: number): string {
	return String(n).padStart(2, '0');
}

/** `YYYYMMDD-HHMMSS` in UTC */
export function keyTimestamp(date: Date): string {
	return (
		`${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
		`${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
	);
}

function contentTypeFor(formatter: Formatter): string {
	if (isTableFormatter(formatter)) {
		return formatter.extension === 'parquet'
			? 'application/vnd.apache.parquet'
			: 'application/vnd.apache.arrow.file';
	}
	switch (formatter.config.formatKind) {
		case 'json':
			return 'application/x-ndjson';
		case 'csv':
			return 'text/csv; charset=utf-8';
		default:
			return 'text/plain; charset=utf-8';
	}
}

export interface S3SinkOptions {
	now?: () => Date;
}

export function buildS3Sink(
	formatter: Formatter,
	config: FormatterConfig,
	options: S3SinkOptions = {},
): Sink {
	const bc = config.backendConfig;
	const bucket = readString(bc, 'bucket');
	const keyPrefix = readString(bc, 'keyPrefix');
	const region = readString(bc, 'region', 'us-east-1');
	const flushThreshold = readPositiveInt(bc, 'flushThreshold', 100);
	if (bc.client !== undefined && !isUploader(bc.client)) {
		throw new ConfigError('S3 option "client" must have a send() method');
	}
	const ownsClient = bc.client === undefined;
	const client: S3Uploader = isUploader(bc.client) ? bc.client : new S3Client({ region });
	const now = options.now ?? (() => new Date());
	const extension = isTableFormatter(formatter) ? formatter.extension : 'log';
	const contentType = contentTypeFor(formatter);

	let lastStamp = '';
	let sameStampCount = 0;
	const nextKey = (): string => {
		const stamp = keyTimestamp(now());
		sameStampCount = stamp === lastStamp ? sameStampCount + 1 : 1;
		lastStamp = stamp;
		const suffix = sameStampCount > 1 ? `-${sameStampCount}` : '';
		return `${keyPrefix}-${stamp}${suffix}.${extension}`;
	};

	const upload = async (body: Uint8Array | string): Promise<void> => {
		await client.send(
			new PutObjectCommand({ Bucket: bucket, Key: nextKey(), Body: body, ContentType: contentType }),
		);
	};
	const close = async (): Promise<void> => {
		if (ownsClient) client.destroy?.();
	};

	if (isTableFormatter(formatter)) {
		const table = formatter;
		return new BufferedSink({
			label: table.label,
			flushThreshold,
			accumulate: (event) => table.format(event),
			write: (rows) => upload(table.encode(rows)),
			close,
		});
	}

	const lines = formatter;
	let headerDone = false;
	return new BufferedSink<string>({
		label: lines.label,
		flushThreshold,
		accumulate: (event) => {
			const line = lines.format(event);
			if (headerDone || !lines.header) return line;
			headerDone = true;
			return `${lines.header(event)}\n${line}`;
		},
		write: (batch) => upload(`${batch.join('\n')}\n`),
		close,
	});
}
