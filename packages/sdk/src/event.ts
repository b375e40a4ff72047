/**
 * Event helpers — construction and functional updates.
 *
 * Events are frozen values: every helper here returns a new event and
 * leaves its input untouched, so sinks can never observe each other's
 * changes.
 */

import { ConfigError } from './errors.js';
import type { EventFields, LogEvent } from './types.js';

export interface CreateEventOptions {
	message?: string;
	levelName: string;
	levelNumber: number;
	tags?: readonly string[];
	levelTags?: readonly string[];
	fields?: EventFields;
	time?: Date;
}

/** Build a frozen event. Level constructors are the usual entry point. */
export function createEvent(options: CreateEventOptions): LogEvent {
	return Object.freeze({
		message: options.message ?? '',
		time: options.time ?? new Date(),
		levelName: options.levelName,
		levelNumber: options.levelNumber,
		tags: Object.freeze([...(options.tags ?? [])]),
		levelTags: Object.freeze([...(options.levelTags ?? [])]),
		fields: Object.freeze({ ...(options.fields ?? {}) }),
	});
}

/** Functional update of an event; level name/number are never changed */
export function updateEvent(
	event: LogEvent,
	changes: Partial<Pick<LogEvent, 'message' | 'tags' | 'levelTags' | 'fields' | 'time'>>,
): LogEvent {
	return createEvent({
		message: changes.message ?? event.message,
		time: changes.time ?? event.time,
		levelName: event.levelName,
		levelNumber: event.levelNumber,
		tags: changes.tags ?? event.tags,
		levelTags: changes.levelTags ?? event.levelTags,
		fields: changes.fields ?? event.fields,
	});
}

function assertTags(tags: readonly unknown[]): asserts tags is readonly string[] {
	for (const tag of tags) {
		if (typeof tag !== 'string') {
			throw new ConfigError(`Tags must be strings, got ${typeof tag}`);
		}
	}
}

/** Append tags to an event (or replace them with `{ append: false }`) */
export function withEventTags(
	event: LogEvent,
	tags: readonly string[],
	options: { append?: boolean } = {},
): LogEvent {
	assertTags(tags);
	const append = options.append ?? true;
	return updateEvent(event, { tags: append ? [...event.tags, ...tags] : tags });
}

/** Merge fields into an event; later keys win */
export function withFields(event: LogEvent, fields: EventFields): LogEvent {
	return updateEvent(event, { fields: { ...event.fields, ...fields } });
}

/**
 * Final tag order for dispatch: event tags, then level tags, then logger tags.
 * Level tags are folded in once so a chained logger does not repeat them.
 */
export function mergeTags(event: LogEvent, loggerTags: readonly string[]): LogEvent {
	if (event.levelTags.length === 0 && loggerTags.length === 0) return event;
	return updateEvent(event, {
		tags: [...event.tags, ...event.levelTags, ...loggerTags],
		levelTags: [],
	});
}

/** Runtime check for values crossing an untyped boundary */
export function isLogEvent(value: unknown): value is LogEvent {
	if (value === null || typeof value !== 'object') return false;
	return (
		'message' in value &&
		typeof value.message === 'string' &&
		'time' in value &&
		value.time instanceof Date &&
		'levelName' in value &&
		typeof value.levelName === 'string' &&
		'levelNumber' in value &&
		typeof value.levelNumber === 'number' &&
		'tags' in value &&
		Array.isArray(value.tags) &&
		'levelTags' in value &&
		Array.isArray(value.levelTags) &&
		'fields' in value &&
		value.fields !== null &&
		typeof value.fields === 'object'
	);
}
