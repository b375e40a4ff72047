/**
 * Test harness for logweave sink and formatter authors.
 *
 * Provides mock sinks and event helpers for testing dispatch, backends and
 * middleware in isolation.
 */

import { createEvent, type CreateEventOptions } from './event.js';
import type { LogEvent, Sink } from './types.js';

// ─── Mock Sink ────────────────────────────────────────────────────────────────

/**
 * Mock sink for testing.
 * Records every event it receives; can be told to fail.
 */
export class MockSink implements Sink {
	readonly kind = 'sink' as const;
	readonly label: string;
	readonly events: LogEvent[] = [];
	flushCount = 0;
	closed = false;
	private failure: Error | null = null;

	constructor(label = 'mock-sink') {
		this.label = label;
	}

	async write(event: LogEvent): Promise<void> {
		if (this.failure) throw this.failure;
		this.events.push(event);
	}

	async flush(): Promise<void> {
		this.flushCount++;
	}

	async close(): Promise<void> {
		this.closed = true;
	}

	/** Make every following write throw (pass `null` to recover) */
	setError(error: Error | string | null): void {
		this.failure = typeof error === 'string' ? new Error(error) : error;
	}

	/** Messages received, in order */
	get messages(): string[] {
		return this.events.map((e) => e.message);
	}

	reset(): void {
		this.events.length = 0;
		this.flushCount = 0;
		this.failure = null;
	}
}

// ─── Identity / Void ─────────────────────────────────────────────────────────

export interface IdentitySink extends Sink {
	/** The last event written, or null */
	readonly last: LogEvent | null;
}

/** Sink that keeps only the most recent event */
export function toIdentity(): IdentitySink {
	let last: LogEvent | null = null;
	return {
		kind: 'sink',
		label: 'toIdentity()',
		write(event) {
			last = event;
		},
		get last() {
			return last;
		},
	};
}

/** Sink that discards everything */
export function toVoid(): Sink {
	return Object.freeze({
		kind: 'sink' as const,
		label: 'toVoid()',
		write: (_event: LogEvent) => {},
	});
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Create a test event with sensible defaults.
 */
export function createTestEvent(overrides?: Partial<CreateEventOptions>): LogEvent {
	return createEvent({
		message: 'test message',
		levelName: 'NOTE',
		levelNumber: 30,
		time: new Date('2024-01-15T10:30:00.000Z'),
		...overrides,
	});
}
