/**
 * Async delivery wrapper.
 *
 * `write` enqueues and returns; a fixed pool of workers drains the queue
 * in batches of `flushThreshold` and drives the wrapped sink. Workers are
 * plain promise loops started on demand, so an idle wrapper holds no
 * timers and never keeps the process alive.
 */

import {
	ConfigError,
	type LogEvent,
	QueueFullError,
	type Sink,
	SinkError,
} from '@logweave/sdk';
import { warn } from './diagnostics.js';
import type { DispatchMetrics } from './metrics.js';

export type OverflowPolicy = 'block' | 'drop-oldest' | 'reject';

export const OVERFLOW_POLICIES: readonly OverflowPolicy[] = ['block', 'drop-oldest', 'reject'];

export interface AsyncOptions {
	/** Events a worker takes per batch (default 100) */
	flushThreshold?: number;
	/** Queue capacity (default 10000) */
	maxQueueSize?: number;
	/** Worker count (default 1); more than one gives up cross-event ordering */
	workers?: number;
	/** What write() does on a full queue (default 'block') */
	overflow?: OverflowPolicy;
	/** Publishes the queue depth gauge */
	metrics?: DispatchMetrics;
}

function positiveInt(name: string, value: number | undefined, fallback: number): number {
	if (value === undefined) return fallback;
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigError(`${name} must be a positive integer, got ${value}`);
	}
	return value;
}

export class AsyncSink implements Sink {
	readonly kind = 'sink' as const;
	readonly label: string;
	readonly flushThreshold: number;
	readonly maxQueueSize: number;
	readonly workers: number;
	readonly overflow: OverflowPolicy;

	private readonly inner: Sink;
	private readonly metrics?: DispatchMetrics;
	private readonly queue: LogEvent[] = [];
	private readonly spaceWaiters: Array<() => void> = [];
	private readonly idleWaiters: Array<() => void> = [];
	private readonly running = new Set<Promise<void>>();
	private inFlight = 0;
	private closed = false;
	private dropped = 0;

	constructor(inner: Sink, options: AsyncOptions = {}) {
		this.inner = inner;
		this.flushThreshold = positiveInt('flushThreshold', options.flushThreshold, 100);
		this.maxQueueSize = positiveInt('maxQueueSize', options.maxQueueSize, 10_000);
		this.workers = positiveInt('workers', options.workers, 1);
		this.overflow = options.overflow ?? 'block';
		if (!OVERFLOW_POLICIES.includes(this.overflow)) {
			throw new ConfigError(
				`overflow must be one of ${OVERFLOW_POLICIES.join(', ')}, got "${this.overflow}"`,
			);
		}
		this.metrics = options.metrics;
		this.label = `asAsync(${inner.label}, workers=${this.workers}, maxQueueSize=${this.maxQueueSize}, overflow=${this.overflow})`;
	}

	async write(event: LogEvent): Promise<void> {
		this.assertOpen();
		while (this.queue.length >= this.maxQueueSize) {
			if (this.overflow === 'reject') {
				throw new QueueFullError(this.maxQueueSize);
			}
			if (this.overflow === 'drop-oldest') {
				this.queue.shift();
				this.dropped++;
				if (this.dropped === 1 || this.dropped % 1000 === 0) {
					warn(
						'LOGWEAVE_QUEUE_OVERFLOW',
						`Async queue full for ${this.inner.label}; ${this.dropped} oldest event(s) dropped so far`,
					);
				}
				break;
			}
			await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
			this.assertOpen();
		}
		this.queue.push(event);
		this.publishDepth();
		this.startWorkers();
	}

	/** Drain the queue, then flush the wrapped sink */
	async flush(): Promise<void> {
		await this.drain();
		await this.inner.flush?.();
	}

	/** Queued plus in-flight events plus whatever the wrapped sink still buffers */
	bufferedCount(): number {
		return this.queue.length + this.inFlight + (this.inner.bufferedCount?.() ?? 0);
	}

	/** Events discarded by the drop-oldest policy */
	get droppedCount(): number {
		return this.dropped;
	}

	/** Drain, stop accepting events and close the wrapped sink */
	async close(): Promise<void> {
		if (this.closed) return;
		await this.flush();
		this.closed = true;
		await Promise.all(this.running);
		await this.inner.close?.();
	}

	// ─── Workers ─────────────────────────────────────────────────────────────

	private assertOpen(): void {
		if (this.closed) {
			throw new SinkError(this.label, 'Async sink is closed');
		}
	}

	private startWorkers(): void {
		while (this.running.size < this.workers && this.running.size < this.queue.length) {
			const worker: Promise<void> = this.runWorker().finally(() => {
				this.running.delete(worker);
				if (this.queue.length > 0) this.startWorkers();
				this.notifyIdle();
			});
			this.running.add(worker);
		}
	}

	private async runWorker(): Promise<void> {
		// Yield so the producer's write() returns before delivery starts
		await Promise.resolve();
		while (this.queue.length > 0) {
			const batch = this.queue.splice(0, this.flushThreshold);
			this.inFlight += batch.length;
			this.releaseSpace(batch.length);
			this.publishDepth();
			for (const event of batch) {
				try {
					await this.inner.write(event);
				} catch (err) {
					warn('LOGWEAVE_WORKER_FAILED', `Async delivery to ${this.inner.label} failed`, err);
				} finally {
					this.inFlight--;
				}
			}
		}
	}

	private releaseSpace(slots: number): void {
		for (let i = 0; i < slots && this.spaceWaiters.length > 0; i++) {
			this.spaceWaiters.shift()?.();
		}
	}

	private notifyIdle(): void {
		if (this.running.size > 0 || this.queue.length > 0) return;
		for (const resolve of this.idleWaiters.splice(0)) resolve();
	}

	private drain(): Promise<void> {
		this.startWorkers();
		if (this.running.size === 0 && this.queue.length === 0) return Promise.resolve();
		return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
	}

	private publishDepth(): void {
		this.metrics?.queueDepth.set({ sink: this.inner.label }, this.queue.length);
	}
}

/**
 * Wrap a sink so producers never wait on its I/O.
 *
 * ```ts
 * const logger = Logger.create().withSinks([asAsync(slowSink, { workers: 2, overflow: 'drop-oldest' })]);
 * ```
 */
export function asAsync(sink: Sink, options: AsyncOptions = {}): AsyncSink {
	if (!sink || typeof sink.write !== 'function') {
		throw new ConfigError('asAsync() needs a sink; resolve formatters through a BackendRegistry first');
	}
	return new AsyncSink(sink, options);
}
