/**
 * Prometheus metrics for the dispatch engine.
 *
 * Opt-in: pass a DispatchMetrics to Logger.create() and expose
 * `metrics.registry` through whatever HTTP endpoint the application runs.
 */

import { Counter, collectDefaultMetrics, Gauge, Registry } from 'prom-client';

export interface DispatchMetricsOptions {
	/** Registry to register into (default: a fresh one) */
	registry?: Registry;
	/** Also collect default Node.js process metrics */
	collectDefaults?: boolean;
	/** Metric name prefix (default: "logweave_") */
	prefix?: string;
}

export class DispatchMetrics {
	readonly registry: Registry;

	// ─── Metrics ─────────────────────────────────────────────────────────────

	readonly eventsDispatched: Counter<'sink'>;
	readonly eventsFiltered: Counter;
	readonly eventsDropped: Counter;
	readonly sinkFailures: Counter<'sink'>;
	readonly flushes: Counter<'sink' | 'result'>;
	readonly queueDepth: Gauge<'sink'>;

	constructor(options: DispatchMetricsOptions = {}) {
		this.registry = options.registry ?? new Registry();
		const prefix = options.prefix ?? 'logweave_';

		if (options.collectDefaults) {
			collectDefaultMetrics({ register: this.registry, prefix });
		}

		this.eventsDispatched = new Counter({
			name: `${prefix}events_dispatched_total`,
			help: 'Events delivered to a sink without error',
			labelNames: ['sink'] as const,
			registers: [this.registry],
		});

		this.eventsFiltered = new Counter({
			name: `${prefix}events_filtered_total`,
			help: 'Events rejected by the logger level filter',
			registers: [this.registry],
		});

		this.eventsDropped = new Counter({
			name: `${prefix}events_dropped_total`,
			help: 'Events dropped by logger middleware',
			registers: [this.registry],
		});

		this.sinkFailures = new Counter({
			name: `${prefix}sink_failures_total`,
			help: 'Sink calls that raised during dispatch',
			labelNames: ['sink'] as const,
			registers: [this.registry],
		});

		this.flushes = new Counter({
			name: `${prefix}flushes_total`,
			help: 'Manual flushes by result',
			labelNames: ['sink', 'result'] as const,
			registers: [this.registry],
		});

		this.queueDepth = new Gauge({
			name: `${prefix}async_queue_depth`,
			help: 'Events waiting in an async sink queue',
			labelNames: ['sink'] as const,
			registers: [this.registry],
		});
	}

	/** Prometheus exposition text */
	async render(): Promise<string> {
		return this.registry.metrics();
	}

	get contentType(): string {
		return this.registry.contentType;
	}
}
