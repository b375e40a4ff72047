/**
 * Narrowing readers for untyped option records (handler params, backend
 * config blobs, YAML sections). Each reader throws ConfigError naming the
 * offending key when the value has the wrong type.
 */

import { ConfigError } from './errors.js';

export type OptionRecord = Readonly<Record<string, unknown>>;

function typeError(key: string, expected: string, value: unknown): ConfigError {
	const got = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
	return new ConfigError(`Option "${key}" must be ${expected}, got ${got}`);
}

/** Required string; pass a fallback to make it optional */
export function readString(options: OptionRecord, key: string, fallback?: string): string {
	const value = options[key];
	if (value === undefined) {
		if (fallback === undefined) throw new ConfigError(`Option "${key}" is required`);
		return fallback;
	}
	if (typeof value !== 'string') throw typeError(key, 'a string', value);
	return value;
}

export function readOptionalString(options: OptionRecord, key: string): string | undefined {
	const value = options[key];
	if (value === undefined) return undefined;
	if (typeof value !== 'string') throw typeError(key, 'a string', value);
	return value;
}

export function readNumber(options: OptionRecord, key: string, fallback: number): number {
	const value = options[key];
	if (value === undefined) return fallback;
	if (typeof value !== 'number' || Number.isNaN(value)) throw typeError(key, 'a number', value);
	return value;
}

/** Positive integer, e.g. thresholds and counts */
export function readPositiveInt(options: OptionRecord, key: string, fallback: number): number {
	const value = readNumber(options, key, fallback);
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigError(`Option "${key}" must be a positive integer, got ${value}`);
	}
	return value;
}

export function readBoolean(options: OptionRecord, key: string, fallback: boolean): boolean {
	const value = options[key];
	if (value === undefined) return fallback;
	if (typeof value !== 'boolean') throw typeError(key, 'a boolean', value);
	return value;
}

export function readStringRecord(options: OptionRecord, key: string): Record<string, string> {
	const value = options[key];
	if (value === undefined) return {};
	if (value === null || typeof value !== 'object' || Array.isArray(value)) {
		throw typeError(key, 'an object', value);
	}
	const out: Record<string, string> = {};
	for (const [k, v] of Object.entries(value)) {
		if (typeof v !== 'string') throw typeError(`${key}.${k}`, 'a string', v);
		out[k] = v;
	}
	return out;
}

export function readStringArray(options: OptionRecord, key: string): string[] {
	const value = options[key];
	if (value === undefined) return [];
	if (!Array.isArray(value)) throw typeError(key, 'an array of strings', value);
	return value.map((v, i) => {
		if (typeof v !== 'string') throw typeError(`${key}[${i}]`, 'a string', v);
		return v;
	});
}

/** Narrow to one of a fixed set of string literals */
export function readEnum<T extends string>(
	options: OptionRecord,
	key: string,
	allowed: readonly T[],
	fallback: T,
): T {
	const value = options[key];
	if (value === undefined) return fallback;
	const match = allowed.find((a) => a === value);
	if (match === undefined) {
		throw new ConfigError(
			`Option "${key}" must be one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`,
		);
	}
	return match;
}

/** Plain object check for nested option sections */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}
