/**
 * Event levels — a totally ordered 0–100 severity scale.
 *
 * Built-in checkpoints: LOWEST 0, TRACE 10, DEBUG 20, NOTE 30, MESSAGE 40,
 * WARNING 60, ERROR 80, CRITICAL 90, HIGHEST 100. LOWEST and HIGHEST are
 * bounds only: they express filter ranges and cannot construct events.
 */

import { ConfigError } from './errors.js';
import { createEvent } from './event.js';
import type { EventFields, EventLevel, LevelBound, LevelLike, LogEvent } from './types.js';

export const MIN_LEVEL = 0;
export const MAX_LEVEL = 100;

function validateLevelNumber(levelNumber: number): void {
	if (!Number.isInteger(levelNumber) || levelNumber < MIN_LEVEL || levelNumber > MAX_LEVEL) {
		throw new ConfigError(
			`Level number must be an integer in [${MIN_LEVEL}, ${MAX_LEVEL}], got ${levelNumber}`,
		);
	}
}

function buildLevel(
	levelName: string,
	levelNumber: number,
	tags: readonly string[],
	builtin: boolean,
): EventLevel {
	const construct = (message = '', fields: EventFields = {}): LogEvent =>
		createEvent({ message, levelName, levelNumber, levelTags: tags, fields });
	return Object.freeze(
		Object.assign(construct, {
			levelName,
			levelNumber,
			tags: Object.freeze([...tags]),
			builtin,
		}),
	);
}

/**
 * Define a custom level.
 *
 * ```ts
 * const AUDIT = withLevelTags(defineLevel('AUDIT', 70), 'security');
 * logger.log(AUDIT('user deleted', { userId: 42 }));
 * ```
 */
export function defineLevel(levelName: string, levelNumber: number): EventLevel {
	if (typeof levelName !== 'string' || levelName.trim() === '') {
		throw new ConfigError('Level name must be a non-empty string');
	}
	validateLevelNumber(levelNumber);
	return buildLevel(levelName, levelNumber, [], false);
}

function bound(levelName: string, levelNumber: number): LevelBound {
	return Object.freeze({ levelName, levelNumber });
}

// ─── Built-in levels ─────────────────────────────────────────────────────────

export const LOWEST: LevelBound = bound('LOWEST', 0);
export const TRACE: EventLevel = buildLevel('TRACE', 10, [], true);
export const DEBUG: EventLevel = buildLevel('DEBUG', 20, [], true);
export const NOTE: EventLevel = buildLevel('NOTE', 30, [], true);
export const MESSAGE: EventLevel = buildLevel('MESSAGE', 40, [], true);
export const WARNING: EventLevel = buildLevel('WARNING', 60, [], true);
export const ERROR: EventLevel = buildLevel('ERROR', 80, [], true);
export const CRITICAL: EventLevel = buildLevel('CRITICAL', 90, [], true);
export const HIGHEST: LevelBound = bound('HIGHEST', 100);

/** Built-in checkpoints, ascending */
export const BUILTIN_LEVELS: readonly LevelBound[] = Object.freeze([
	LOWEST,
	TRACE,
	DEBUG,
	NOTE,
	MESSAGE,
	WARNING,
	ERROR,
	CRITICAL,
	HIGHEST,
]);

/**
 * Return a new level whose events carry `tags`. Built-in levels are
 * rejected so standard behaviour stays predictable.
 */
export function withLevelTags(
	level: EventLevel,
	tags: readonly string[],
	options: { append?: boolean } = {},
): EventLevel {
	if (level.builtin) {
		throw new ConfigError(
			`Cannot add tags to built-in level "${level.levelName}".\n` +
				'  Solution: create a custom level with defineLevel() and tag that instead\n' +
				"  Example: withLevelTags(defineLevel('AUDIT', 70), ['security'])",
		);
	}
	for (const tag of tags) {
		if (typeof tag !== 'string') {
			throw new ConfigError(`Tags must be strings, got ${typeof tag}`);
		}
	}
	const append = options.append ?? true;
	return buildLevel(
		level.levelName,
		level.levelNumber,
		append ? [...level.tags, ...tags] : tags,
		false,
	);
}

// ─── Level numbers & filtering ───────────────────────────────────────────────

/** Resolve a number, bound or level to its level number */
export function levelNumberOf(level: LevelLike): number {
	const n = typeof level === 'number' ? level : level.levelNumber;
	validateLevelNumber(n);
	return n;
}

/** Resolve a built-in level by name (case-insensitive) */
export function levelByName(name: string): LevelBound | undefined {
	const upper = name.toUpperCase();
	return BUILTIN_LEVELS.find((l) => l.levelName === upper);
}

/** Name of the highest built-in checkpoint at or below `levelNumber` */
export function levelNameFor(levelNumber: number): string {
	let name = LOWEST.levelName;
	for (const level of BUILTIN_LEVELS) {
		if (level.levelNumber <= levelNumber) name = level.levelName;
	}
	return name;
}

/** Inclusive on both ends */
export function passesLimits(levelNumber: number, lower: number, upper: number): boolean {
	return lower <= levelNumber && levelNumber <= upper;
}

/**
 * Validate a [lower, upper] pair for loggers and sinks.
 * lower ∈ [0, 99], upper ∈ [1, 100], lower ≤ upper.
 */
export function validateLimits(lower: number, upper: number): void {
	if (!Number.isInteger(lower) || lower < 0 || lower > 99) {
		throw new ConfigError(`Lower limit must be an integer in [0, 99], got ${lower}`);
	}
	if (!Number.isInteger(upper) || upper < 1 || upper > 100) {
		throw new ConfigError(`Upper limit must be an integer in [1, 100], got ${upper}`);
	}
	if (lower > upper) {
		throw new ConfigError(`Lower limit (${lower}) must be <= upper limit (${upper})`);
	}
}
