import { describe, expect, it } from 'vitest';
import { createTestEvent, MockSink, toIdentity, toVoid } from '../testing.js';

describe('MockSink', () => {
	it('records written events', async () => {
		const sink = new MockSink('test');
		const event = createTestEvent();

		await sink.write(event);
		expect(sink.events).toHaveLength(1);
		expect(sink.events[0]).toBe(event);
		expect(sink.messages).toEqual(['test message']);
	});

	it('can be set to error', async () => {
		const sink = new MockSink();
		sink.setError('disk full');

		await expect(sink.write(createTestEvent())).rejects.toThrow('disk full');
		expect(sink.events).toHaveLength(0);
	});

	it('recovers when the error is cleared', async () => {
		const sink = new MockSink();
		sink.setError(new Error('boom'));
		sink.setError(null);

		await sink.write(createTestEvent());
		expect(sink.events).toHaveLength(1);
	});

	it('tracks flush and close', async () => {
		const sink = new MockSink();
		await sink.flush();
		await sink.flush();
		await sink.close();
		expect(sink.flushCount).toBe(2);
		expect(sink.closed).toBe(true);
	});

	it('reset clears recorded state', async () => {
		const sink = new MockSink();
		await sink.write(createTestEvent());
		await sink.flush();
		sink.reset();
		expect(sink.events).toHaveLength(0);
		expect(sink.flushCount).toBe(0);
	});
});

describe('toIdentity', () => {
	it('keeps only the last event', () => {
		const sink = toIdentity();
		expect(sink.last).toBeNull();

		const first = createTestEvent({ message: 'first' });
		const second = createTestEvent({ message: 'second' });
		sink.write(first);
		sink.write(second);
		expect(sink.last).toBe(second);
	});
});

describe('toVoid', () => {
	it('accepts events without side effects', () => {
		const sink = toVoid();
		expect(sink.label).toBe('toVoid()');
		expect(sink.write(createTestEvent())).toBeUndefined();
	});
});

describe('createTestEvent', () => {
	it('creates event with defaults', () => {
		const event = createTestEvent();
		expect(event.message).toBe('test message');
		expect(event.levelName).toBe('NOTE');
		expect(event.levelNumber).toBe(30);
		expect(event.time.toISOString()).toBe('2024-01-15T10:30:00.000Z');
	});

	it('allows overrides', () => {
		const event = createTestEvent({ message: 'custom', levelName: 'ERROR', levelNumber: 80 });
		expect(event.message).toBe('custom');
		expect(event.levelName).toBe('ERROR');
		expect(event.levelNumber).toBe(80);
	});
});
