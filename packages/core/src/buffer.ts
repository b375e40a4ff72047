/**
 * Buffering engine shared by every batching backend.
 *
 * Events are accumulated (as lines or rows) until the threshold is reached
 * or flush() is called. Flushes are serialized through a mutex; the
 * accumulator loses only the flushed prefix, and only after the backend
 * write succeeded. A failed flush keeps everything for the next attempt.
 */

import { Mutex } from 'async-mutex';
import { ConfigError, type LogEvent, type Sink } from '@logweave/sdk';
import { warn } from './diagnostics.js';

export interface BufferedSinkOptions<T> {
	/** Human-readable reconstruction of the sink */
	label: string;
	/** Accumulated items that trigger an automatic flush */
	flushThreshold: number;
	/** Convert one event into an accumulator item (line or row) */
	accumulate: (event: LogEvent) => T;
	/** Backend write for one batch; throwing leaves the batch buffered */
	write: (batch: T[]) => Promise<void>;
	/** Release backend resources after the final flush */
	close?: () => Promise<void>;
}

export class BufferedSink<T> implements Sink {
	readonly kind = 'sink' as const;
	readonly label: string;
	readonly flushThreshold: number;
	private readonly pending: T[] = [];
	private readonly mutex = new Mutex();
	private readonly accumulate: (event: LogEvent) => T;
	private readonly writeBatch: (batch: T[]) => Promise<void>;
	private readonly closeBackend?: () => Promise<void>;

	constructor(options: BufferedSinkOptions<T>) {
		if (!Number.isInteger(options.flushThreshold) || options.flushThreshold < 1) {
			throw new ConfigError(
				`flushThreshold must be a positive integer, got ${options.flushThreshold}`,
			);
		}
		this.label = options.label;
		this.flushThreshold = options.flushThreshold;
		this.accumulate = options.accumulate;
		this.writeBatch = options.write;
		this.closeBackend = options.close;
	}

	async write(event: LogEvent): Promise<void> {
		this.pending.push(this.accumulate(event));
		if (this.pending.length >= this.flushThreshold) {
			await this.flush();
		}
	}

	/** Write out everything accumulated so far. Never rejects. */
	async flush(): Promise<void> {
		await this.mutex.runExclusive(async () => {
			if (this.pending.length === 0) return;
			const batch = this.pending.slice();
			try {
				await this.writeBatch(batch);
				this.pending.splice(0, batch.length);
			} catch (err) {
				warn(
					'LOGWEAVE_FLUSH_FAILED',
					`Flush failed for ${this.label}; ${batch.length} buffered event(s) kept for the next attempt`,
					err,
				);
			}
		});
	}

	bufferedCount(): number {
		return this.pending.length;
	}

	/** True while a backend write is running */
	get flushInFlight(): boolean {
		return this.mutex.isLocked();
	}

	async close(): Promise<void> {
		await this.flush();
		await this.closeBackend?.();
	}
}
