/**
 * Sink helpers — build sinks from plain functions and wrap existing sinks
 * with per-sink limits or middleware.
 */

import { ConfigError } from './errors.js';
import { levelNumberOf, passesLimits, validateLimits } from './levels.js';
import { applyMiddleware } from './middleware.js';
import type { LevelLike, LogEvent, Middleware, Sink } from './types.js';

export function isSink(value: unknown): value is Sink {
	return (
		typeof value === 'object' &&
		value !== null &&
		'kind' in value &&
		value.kind === 'sink' &&
		'write' in value &&
		typeof value.write === 'function'
	);
}

/**
 * Wrap a single-parameter function as a sink.
 *
 * ```ts
 * const sink = defineSink((event) => lines.push(event.message), 'memory');
 * ```
 */
export function defineSink(
	fn: (event: LogEvent) => void | Promise<void>,
	label = fn.name || 'anonymous',
): Sink {
	if (typeof fn !== 'function') {
		throw new ConfigError(`Sink must be a function, got ${typeof fn}`);
	}
	if (fn.length !== 1) {
		throw new ConfigError(
			`Sink function must take exactly one argument (the event), got ${fn.length}\n` +
				'  Example: defineSink((event) => console.log(event.message))',
		);
	}
	return Object.freeze({
		kind: 'sink' as const,
		label: `sink(${label})`,
		write: (event: LogEvent) => fn(event),
	});
}

/** Copy the optional lifecycle methods of `inner` onto a wrapping sink */
function forwardLifecycle(inner: Sink, label: string, write: Sink['write']): Sink {
	const wrapped: Sink = {
		kind: 'sink',
		label,
		write,
		...(inner.flush ? { flush: () => inner.flush?.() ?? Promise.resolve() } : {}),
		...(inner.bufferedCount ? { bufferedCount: () => inner.bufferedCount?.() ?? 0 } : {}),
		...(inner.close ? { close: () => inner.close?.() ?? Promise.resolve() } : {}),
	};
	return Object.freeze(wrapped);
}

/** Restrict a sink to events whose level number lies in [lower, upper] */
export function withSinkLimits(sink: Sink, lower: LevelLike = 0, upper: LevelLike = 100): Sink {
	const lowerLimit = levelNumberOf(lower);
	const upperLimit = levelNumberOf(upper);
	validateLimits(lowerLimit, upperLimit);
	if (lowerLimit === 0 && upperLimit === 100) return sink;
	return forwardLifecycle(sink, `${sink.label}[${lowerLimit}..${upperLimit}]`, (event) => {
		if (!passesLimits(event.levelNumber, lowerLimit, upperLimit)) return;
		return sink.write(event);
	});
}

/** Run middleware in front of one sink only */
export function withSinkMiddleware(sink: Sink, ...middleware: Middleware[]): Sink {
	if (middleware.length === 0) return sink;
	for (const mw of middleware) {
		if (typeof mw !== 'function') {
			throw new ConfigError(`Middleware must be a function, got ${typeof mw}`);
		}
	}
	return forwardLifecycle(sink, `${sink.label}+middleware(${middleware.length})`, (event) => {
		const result = applyMiddleware(middleware, event);
		if (result === null) return;
		return sink.write(result);
	});
}
