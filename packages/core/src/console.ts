/**
 * Console sink — one colored line per event.
 *
 * Also serves as the dispatch engine's fallback: when a sink fails, the
 * synthetic error event is written here.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
	type LevelLike,
	type LogEvent,
	levelNumberOf,
	passesLimits,
	type Sink,
	validateLimits,
} from '@logweave/sdk';

/** Anything with a string `write`, e.g. process.stdout */
export interface WritableLike {
	write(chunk: string): unknown;
}

export interface ConsoleOptions {
	lower?: LevelLike;
	upper?: LevelLike;
	/** Force color on or off (default: detect from the stream) */
	color?: boolean;
	/** Output stream (default: process.stdout) */
	stream?: WritableLike;
}

type Paint = (text: string) => string;

/** Level bands, ascending; each applies from its floor up to the next */
function levelPainters(chalk: ChalkInstance): Array<{ floor: number; paint: Paint }> {
	return [
		{ floor: 0, paint: chalk.whiteBright },
		{ floor: 10, paint: chalk.gray },
		{ floor: 20, paint: chalk.cyan },
		{ floor: 30, paint: chalk.green },
		{ floor: 40, paint: chalk.yellow },
		{ floor: 60, paint: chalk.red },
		{ floor: 80, paint: chalk.bold.red },
	];
}

function painterFor(bands: Array<{ floor: number; paint: Paint }>, levelNumber: number): Paint {
	let paint = bands[0].paint;
	for (const band of bands) {
		if (levelNumber >= band.floor) paint = band.paint;
	}
	return paint;
}

function isTty(stream: WritableLike): boolean {
	return 'isTTY' in stream && stream.isTTY === true;
}

/** `2024-01-15T10:30:00.000Z [WARNING] message` */
export function formatConsoleLine(event: LogEvent): string {
	return `${event.time.toISOString()} [${event.levelName}] ${event.message}`;
}

export function toConsole(options: ConsoleOptions = {}): Sink {
	const lower = levelNumberOf(options.lower ?? 0);
	const upper = levelNumberOf(options.upper ?? 100);
	validateLimits(lower, upper);

	const stream = options.stream ?? process.stdout;
	const useColor = options.color ?? isTty(stream);
	const bands = levelPainters(new Chalk({ level: useColor ? 1 : 0 }));

	const range = lower === 0 && upper === 100 ? '' : `lower=${lower}, upper=${upper}`;
	return Object.freeze({
		kind: 'sink' as const,
		label: `toConsole(${range})`,
		write(event: LogEvent) {
			if (!passesLimits(event.levelNumber, lower, upper)) return;
			const paint = painterFor(bands, event.levelNumber);
			stream.write(`${paint(formatConsoleLine(event))}\n`);
		},
	});
}
