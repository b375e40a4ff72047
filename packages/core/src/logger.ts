/**
 * Logger — the dispatch engine.
 *
 * A Logger is an immutable value: every with* method returns a new Logger
 * and the parent keeps its configuration. log() runs the middleware chain,
 * applies the level filter, merges tags and hands the event to each sink in
 * registration order. A failing sink never affects its siblings: the
 * failure is reported to the fallback console sink, and if that fails too,
 * as a process warning.
 */

import {
	applyMiddleware,
	ConfigError,
	ERROR,
	errorMessage,
	type Formatter,
	isFormatter,
	isSink,
	type LevelLike,
	type LogEvent,
	levelNameFor,
	levelNumberOf,
	mergeTags,
	type Middleware,
	passesLimits,
	type Sink,
	validateLimits,
	withEventTags,
} from '@logweave/sdk';
import { toConsole } from './console.js';
import { warn } from './diagnostics.js';
import type { DispatchMetrics } from './metrics.js';
import type { BackendRegistry } from './registry.js';

/** What withSinks accepts: ready sinks, or formatters routed through the registry */
export type SinkTarget = Sink | Formatter;

/** Sink name, 1-based position, or a list of either */
export type FlushTarget = string | number | ReadonlyArray<string | number>;

export interface LoggerOptions {
	/** Resolves formatters passed to withSinks() */
	registry?: BackendRegistry;
	/** Receives sink-failure events (default: toConsole() on stderr) */
	fallback?: Sink;
	metrics?: DispatchMetrics;
}

interface LoggerState {
	readonly lowerLimit: number;
	readonly upperLimit: number;
	readonly sinks: readonly Sink[];
	readonly sinkLabels: readonly string[];
	readonly sinkNames: readonly string[];
	readonly tags: readonly string[];
	readonly middleware: readonly Middleware[];
	readonly registry?: BackendRegistry;
	readonly fallback: Sink;
	readonly metrics?: DispatchMetrics;
}

export const SINK_ERROR_TAG = 'sink_error';

function isTargetList(
	targets: readonly SinkTarget[] | Readonly<Record<string, SinkTarget>>,
): targets is readonly SinkTarget[] {
	return Array.isArray(targets);
}

export class Logger {
	private readonly state: LoggerState;

	private constructor(state: LoggerState) {
		this.state = Object.freeze(state);
	}

	/** A logger with no sinks, full limits and no tags */
	static create(options: LoggerOptions = {}): Logger {
		return new Logger({
			lowerLimit: 0,
			upperLimit: 100,
			sinks: [],
			sinkLabels: [],
			sinkNames: [],
			tags: [],
			middleware: [],
			registry: options.registry,
			fallback: options.fallback ?? toConsole({ stream: process.stderr }),
			metrics: options.metrics,
		});
	}

	private with(changes: Partial<LoggerState>): Logger {
		return new Logger({ ...this.state, ...changes });
	}

	// ─── Accessors ───────────────────────────────────────────────────────────

	get lowerLimit(): number {
		return this.state.lowerLimit;
	}

	get upperLimit(): number {
		return this.state.upperLimit;
	}

	get tags(): readonly string[] {
		return this.state.tags;
	}

	get sinkNames(): readonly string[] {
		return this.state.sinkNames;
	}

	get sinkLabels(): readonly string[] {
		return this.state.sinkLabels;
	}

	get middlewareCount(): number {
		return this.state.middleware.length;
	}

	// ─── Configuration ───────────────────────────────────────────────────────

	/**
	 * Add sinks (or replace them with `{ append: false }`).
	 *
	 * Formatters are resolved into sinks here, once, so a bad backend name or
	 * config fails now rather than at the first event. Unnamed sinks are
	 * called `sink_N`; a name already in use gets a `_2`, `_3`... suffix.
	 */
	withSinks(
		targets: readonly SinkTarget[] | Readonly<Record<string, SinkTarget>>,
		options: { append?: boolean } = {},
	): Logger {
		const append = options.append ?? true;
		const entries: Array<[string | undefined, SinkTarget]> = isTargetList(targets)
			? targets.map((t): [undefined, SinkTarget] => [undefined, t])
			: Object.entries(targets);

		const existing = append ? this.state.sinkNames : [];
		const taken = new Set(existing);
		const sinks: Sink[] = [];
		const labels: string[] = [];
		const names: string[] = [];

		entries.forEach(([name, target], i) => {
			const sink = this.toSink(target, i + 1);
			const base = name ?? `sink_${existing.length + i + 1}`;
			let unique = base;
			for (let suffix = 2; taken.has(unique); suffix++) {
				unique = `${base}_${suffix}`;
			}
			taken.add(unique);
			sinks.push(sink);
			labels.push(sink.label);
			names.push(unique);
		});

		if (!append) {
			return this.with({ sinks, sinkLabels: labels, sinkNames: names });
		}
		return this.with({
			sinks: [...this.state.sinks, ...sinks],
			sinkLabels: [...this.state.sinkLabels, ...labels],
			sinkNames: [...this.state.sinkNames, ...names],
		});
	}

	/** Set the logger's inclusive level range; an omitted bound keeps its value */
	withLimits(lower?: LevelLike, upper?: LevelLike): Logger {
		const lowerLimit = lower === undefined ? this.state.lowerLimit : levelNumberOf(lower);
		const upperLimit = upper === undefined ? this.state.upperLimit : levelNumberOf(upper);
		validateLimits(lowerLimit, upperLimit);
		return this.with({ lowerLimit, upperLimit });
	}

	/** Tags appended to every dispatched event, after event and level tags */
	withTags(tags: readonly string[], options: { append?: boolean } = {}): Logger {
		for (const tag of tags) {
			if (typeof tag !== 'string') {
				throw new ConfigError(`Tags must be strings, got ${typeof tag}`);
			}
		}
		const append = options.append ?? true;
		return this.with({ tags: append ? [...this.state.tags, ...tags] : [...tags] });
	}

	/** Middleware run once per event, before the level filter */
	withMiddleware(...middleware: Middleware[]): Logger {
		middleware.forEach((mw, i) => {
			if (typeof mw !== 'function') {
				throw new ConfigError(`Middleware #${i + 1} must be a function, got ${typeof mw}`);
			}
		});
		return this.with({ middleware: [...this.state.middleware, ...middleware] });
	}

	// ─── Dispatch ────────────────────────────────────────────────────────────

	/**
	 * Dispatch one event. Resolves with the event as the sinks saw it (for
	 * chaining into another logger), the untouched event when the level
	 * filter rejected it, or null when middleware dropped it.
	 */
	async log(event: LogEvent): Promise<LogEvent | null> {
		const { metrics } = this.state;

		const transformed = applyMiddleware(this.state.middleware, event);
		if (transformed === null) {
			metrics?.eventsDropped.inc();
			return null;
		}

		if (!passesLimits(transformed.levelNumber, this.state.lowerLimit, this.state.upperLimit)) {
			metrics?.eventsFiltered.inc();
			return transformed;
		}

		const merged = mergeTags(transformed, this.state.tags);

		for (let i = 0; i < this.state.sinks.length; i++) {
			const name = this.state.sinkNames[i];
			try {
				await this.state.sinks[i].write(merged);
				metrics?.eventsDispatched.inc({ sink: name });
			} catch (err) {
				metrics?.sinkFailures.inc({ sink: name });
				await this.reportSinkFailure(i, err);
			}
		}

		return merged;
	}

	private async reportSinkFailure(index: number, err: unknown): Promise<void> {
		const sinkIndex = index + 1;
		const sinkName = this.state.sinkNames[index];
		const sinkLabel = this.state.sinkLabels[index];
		const failure = withEventTags(
			ERROR(`Sink #${sinkIndex} failed: ${errorMessage(err)}\nSink: ${sinkLabel}`, {
				sinkIndex,
				sinkName,
				sinkLabel,
			}),
			[SINK_ERROR_TAG],
		);
		try {
			await this.state.fallback.write(failure);
		} catch (fallbackErr) {
			warn(
				'LOGWEAVE_FALLBACK_FAILED',
				`Sink #${sinkIndex} (${sinkName}) failed with "${errorMessage(err)}" and the console fallback failed too`,
				fallbackErr,
			);
		}
	}

	// ─── Buffers ─────────────────────────────────────────────────────────────

	/**
	 * Flush buffered sinks: all of them, or the ones named or numbered in
	 * `target`. Unbuffered sinks are skipped. A failing flush becomes a
	 * warning; the others still run.
	 */
	async flush(target?: FlushTarget): Promise<void> {
		const indices =
			target === undefined ? this.state.sinks.map((_, i) => i) : this.resolveTargets(target);
		for (const i of indices) {
			const sink = this.state.sinks[i];
			if (!sink.flush) continue;
			const name = this.state.sinkNames[i];
			try {
				await sink.flush();
				this.state.metrics?.flushes.inc({ sink: name, result: 'ok' });
			} catch (err) {
				this.state.metrics?.flushes.inc({ sink: name, result: 'error' });
				warn('LOGWEAVE_FLUSH_FAILED', `Flush failed for sink "${name}"`, err);
			}
		}
	}

	/** Buffered event count per sink name; null for sinks that do not buffer */
	bufferStatus(): Record<string, number | null> {
		const status: Record<string, number | null> = {};
		this.state.sinks.forEach((sink, i) => {
			status[this.state.sinkNames[i]] = sink.bufferedCount ? sink.bufferedCount() : null;
		});
		return status;
	}

	/** Look up one sink by name or 1-based position */
	getSink(target: string | number): Sink {
		const [index] = this.resolveTargets(target);
		return this.state.sinks[index];
	}

	/** Flush and release every sink; failures become warnings */
	async close(): Promise<void> {
		for (let i = 0; i < this.state.sinks.length; i++) {
			const sink = this.state.sinks[i];
			try {
				if (sink.close) {
					await sink.close();
				} else if (sink.flush) {
					await sink.flush();
				}
			} catch (err) {
				warn('LOGWEAVE_FLUSH_FAILED', `Closing sink "${this.state.sinkNames[i]}" failed`, err);
			}
		}
	}

	private resolveTargets(target: FlushTarget): number[] {
		const list: ReadonlyArray<string | number> =
			typeof target === 'string' || typeof target === 'number' ? [target] : target;
		return list.map((t) => {
			if (typeof t === 'number') {
				if (!Number.isInteger(t) || t < 1 || t > this.state.sinks.length) {
					throw new ConfigError(
						`Sink position ${t} is out of range; logger has ${this.state.sinks.length} sink(s)`,
					);
				}
				return t - 1;
			}
			const index = this.state.sinkNames.indexOf(t);
			if (index === -1) {
				const available =
					this.state.sinkNames.length > 0 ? this.state.sinkNames.join(', ') : '(none)';
				throw new ConfigError(`Unknown sink "${t}"\n  Available sinks: ${available}`);
			}
			return index;
		});
	}

	// ─── Inspection ──────────────────────────────────────────────────────────

	/** Multi-line summary of the logger's configuration */
	describe(): string {
		const { lowerLimit, upperLimit, tags, middleware, sinks, sinkNames, sinkLabels } = this.state;
		const lines = [
			'<logger>',
			`Level limits: ${lowerLimit} (${levelNameFor(lowerLimit)}) to ${upperLimit} (${levelNameFor(upperLimit)})`,
		];
		if (tags.length > 0) lines.push(`Tags: ${tags.join(', ')}`);
		if (middleware.length > 0) lines.push(`Middleware: ${middleware.length}`);
		if (sinks.length === 0) {
			lines.push('Sinks: (none)');
		} else {
			lines.push('Sinks:');
			sinks.forEach((_, i) => {
				lines.push(`  [${i + 1}] ${sinkNames[i]}: ${sinkLabels[i]}`);
			});
		}
		return lines.join('\n');
	}

	private toSink(target: SinkTarget, position: number): Sink {
		if (isFormatter(target)) {
			if (!this.state.registry) {
				throw new ConfigError(
					`Sink #${position} is a formatter (${target.label}) but this logger has no backend registry\n` +
						'  Solution: Logger.create({ registry }) or use createLogger() from the logweave package',
				);
			}
			return this.state.registry.resolve(target);
		}
		if (isSink(target)) return target;
		throw new ConfigError(
			`Sink #${position} must be a sink or a formatter with a handler\n` +
				`  Got: ${target === null ? 'null' : typeof target}\n` +
				"  Example: withSinks([toConsole(), onLocal(toJson(), { path: 'app.jsonl' })])",
		);
	}
}

/** Process-wide default: no sinks, so every event is discarded after filtering */
export const voidLogger: Logger = Logger.create();
