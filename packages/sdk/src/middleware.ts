/**
 * Middleware — sequential event transforms.
 *
 * Each middleware receives the output of the previous one. Returning `null`
 * drops the event and short-circuits the rest of the chain.
 */

import { ConfigError } from './errors.js';
import { isLogEvent, updateEvent, withFields } from './event.js';
import type { EventFields, LogEvent, Middleware } from './types.js';

export function applyMiddleware(chain: readonly Middleware[], event: LogEvent): LogEvent | null {
	let current = event;
	for (let i = 0; i < chain.length; i++) {
		const result = chain[i](current);
		if (result === null) return null;
		if (!isLogEvent(result)) {
			throw new ConfigError(
				`Middleware #${i + 1} must return an event or null, got ${typeof result}`,
			);
		}
		current = result;
	}
	return current;
}

// ─── Built-in middleware ─────────────────────────────────────────────────────

/** Add static or computed fields to every event; existing fields win */
export function addFields(fields: EventFields | ((event: LogEvent) => EventFields)): Middleware {
	return (event) => {
		const extra = typeof fields === 'function' ? fields(event) : fields;
		return withFields(event, { ...extra, ...event.fields });
	};
}

export interface RedactOptions {
	/** Field names whose values are replaced */
	fields?: readonly string[];
	/** Patterns replaced inside the message */
	patterns?: readonly RegExp[];
	/** Replacement text (default "***") */
	replacement?: string;
}

/** Replace sensitive field values and message fragments */
export function redactFields(options: RedactOptions): Middleware {
	const replacement = options.replacement ?? '***';
	const names = new Set(options.fields ?? []);
	const patterns = (options.patterns ?? []).map(
		(p) => new RegExp(p.source, p.flags.includes('g') ? p.flags : `${p.flags}g`),
	);

	return (event) => {
		let message = event.message;
		for (const pattern of patterns) {
			message = message.replace(pattern, replacement);
		}
		let fields = event.fields;
		if (names.size > 0 && Object.keys(fields).some((k) => names.has(k))) {
			fields = Object.fromEntries(
				Object.entries(fields).map(([k, v]) => [k, names.has(k) ? replacement : v]),
			);
		}
		if (message === event.message && fields === event.fields) return event;
		return updateEvent(event, { message, fields });
	};
}

export interface SampleOptions {
	/** Fraction of events kept, in [0, 1] */
	rate: number;
	/** Events at or above this level number are always kept (default 60) */
	keepAtOrAbove?: number;
	/** Source of randomness in [0, 1) */
	random?: () => number;
}

/** Keep a random fraction of low-severity events */
export function sampleEvents(options: SampleOptions): Middleware {
	const { rate } = options;
	if (typeof rate !== 'number' || Number.isNaN(rate) || rate < 0 || rate > 1) {
		throw new ConfigError(`Sample rate must be between 0 and 1, got ${rate}`);
	}
	const keepAtOrAbove = options.keepAtOrAbove ?? 60;
	const random = options.random ?? Math.random;

	return (event) => {
		if (event.levelNumber >= keepAtOrAbove) return event;
		if (random() >= rate) return null;
		return withFields(event, { sampled: true, sampleRate: rate });
	};
}
