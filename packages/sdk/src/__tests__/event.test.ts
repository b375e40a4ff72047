import { describe, expect, it } from 'vitest';
import {
	createEvent,
	isLogEvent,
	mergeTags,
	updateEvent,
	withEventTags,
	withFields,
} from '../event.js';
import { createTestEvent } from '../testing.js';

describe('createEvent', () => {
	it('fills defaults', () => {
		const event = createEvent({ levelName: 'NOTE', levelNumber: 30 });
		expect(event.message).toBe('');
		expect(event.tags).toEqual([]);
		expect(event.levelTags).toEqual([]);
		expect(event.fields).toEqual({});
		expect(event.time).toBeInstanceOf(Date);
	});

	it('copies caller arrays', () => {
		const tags = ['a'];
		const event = createEvent({ levelName: 'NOTE', levelNumber: 30, tags });
		tags.push('b');
		expect(event.tags).toEqual(['a']);
	});
});

describe('functional updates', () => {
	it('updateEvent keeps level and returns a new value', () => {
		const event = createTestEvent();
		const next = updateEvent(event, { message: 'changed' });
		expect(next).not.toBe(event);
		expect(next.message).toBe('changed');
		expect(next.levelNumber).toBe(30);
		expect(event.message).toBe('test message');
	});

	it('withEventTags appends, keeping duplicates and order', () => {
		const event = createTestEvent({ tags: ['a', 'b'] });
		expect(withEventTags(event, ['a', 'c']).tags).toEqual(['a', 'b', 'a', 'c']);
	});

	it('withEventTags replaces on request', () => {
		const event = createTestEvent({ tags: ['a'] });
		expect(withEventTags(event, ['z'], { append: false }).tags).toEqual(['z']);
	});

	it('withFields merges, later keys winning', () => {
		const event = createTestEvent({ fields: { a: 1, b: 2 } });
		expect(withFields(event, { b: 3, c: 4 }).fields).toEqual({ a: 1, b: 3, c: 4 });
	});
});

describe('mergeTags', () => {
	it('orders event tags, then level tags, then logger tags', () => {
		const event = createTestEvent({ tags: ['event'], levelTags: ['level'] });
		const merged = mergeTags(event, ['logger']);
		expect(merged.tags).toEqual(['event', 'level', 'logger']);
		expect(merged.levelTags).toEqual([]);
	});

	it('does not repeat level tags when merged twice', () => {
		const event = createTestEvent({ levelTags: ['level'] });
		const once = mergeTags(event, ['outer']);
		const twice = mergeTags(once, ['inner']);
		expect(twice.tags).toEqual(['level', 'outer', 'inner']);
	});

	it('returns the same event when there is nothing to merge', () => {
		const event = createTestEvent({ tags: ['a'] });
		expect(mergeTags(event, [])).toBe(event);
	});
});

describe('isLogEvent', () => {
	it('accepts events and rejects other values', () => {
		expect(isLogEvent(createTestEvent())).toBe(true);
		expect(isLogEvent({ message: 'x' })).toBe(false);
		expect(isLogEvent(null)).toBe(false);
		expect(isLogEvent('event')).toBe(false);
	});
});
