/**
 * Local file backend.
 *
 * Line formatters (text, JSON, CSV) write each event as it arrives, after a
 * rotation check. Table formatters (feather, parquet) buffer rows and rewrite the
 * file on flush, merging with what is already there.
 */

import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';
import { Mutex } from 'async-mutex';
import { BufferedSink } from '@logweave/core';
import {
	attachBackend,
	describeCall,
	type Formatter,
	type FormatterConfig,
	isTableFormatter,
	type LineFormatter,
	type LogEvent,
	readBoolean,
	readPositiveInt,
	readString,
	type Sink,
	type TableFormatter,
	type TabularRow,
} from '@logweave/sdk';
import { needsRotation, parseSize, rotateFile } from './rotation.js';

export interface LocalOptions {
	/** Target file; `~/` expands to the home directory */
	path: string;
	/** Keep existing content (default true); false truncates on the first write */
	append?: boolean;
	/** Rotate once the file reaches this size, in bytes or as "10MB" (default: never) */
	maxSize?: number | string;
	/** Rotated files kept as path.1 … path.N (default 5) */
	maxFiles?: number;
	/** Rows buffered before a table formatter writes (default 1000) */
	flushThreshold?: number;
}

/**
 * ```ts
 * onLocal(toJson(), { path: 'logs/app.jsonl', maxSize: '10MB', maxFiles: 3 })
 * ```
 */
export function onLocal<F extends Formatter>(formatter: F, options: LocalOptions): F {
	if (options.maxSize !== undefined) parseSize(options.maxSize);
	const config: Record<string, unknown> = { ...options };
	return attachBackend(formatter, 'local', config, describeCall('onLocal', config));
}

// ─── Builder ──────────────────────────────────────────────────────────────────

export interface LocalSettings {
	path: string;
	append: boolean;
	maxSize: number | null;
	maxFiles: number;
	flushThreshold: number;
}

function expandHome(rawPath: string): string {
	const expanded = rawPath.startsWith('~/') ? rawPath.replace('~', homedir()) : rawPath;
	return resolve(expanded);
}

function readSettings(config: FormatterConfig): LocalSettings {
	const bc = config.backendConfig;
	const rawMaxSize = bc.maxSize;
	return {
		path: expandHome(readString(bc, 'path')),
		append: readBoolean(bc, 'append', true),
		maxSize:
			typeof rawMaxSize === 'number' || typeof rawMaxSize === 'string' ? parseSize(rawMaxSize) : null,
		maxFiles: readPositiveInt(bc, 'maxFiles', 5),
		flushThreshold: readPositiveInt(bc, 'flushThreshold', 1000),
	};
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readIfExists(filePath: string): Promise<Uint8Array | undefined> {
	try {
		return await readFile(filePath);
	} catch (err) {
		if (isNotFound(err)) return undefined;
		throw err;
	}
}

export class LocalLineSink implements Sink {
	readonly kind = 'sink' as const;
	readonly label: string;
	private readonly formatter: LineFormatter;
	private readonly settings: LocalSettings;
	private readonly mutex = new Mutex();
	private prepared = false;
	private headerWritten = false;

	constructor(formatter: LineFormatter, settings: LocalSettings) {
		this.formatter = formatter;
		this.settings = settings;
		this.label = formatter.label;
	}

	async write(event: LogEvent): Promise<void> {
		const line = this.formatter.format(event);
		await this.mutex.runExclusive(async () => {
			const { path, maxSize, maxFiles } = this.settings;
			await this.prepare();
			if (maxSize !== null && (await needsRotation(path, maxSize))) {
				await rotateFile(path, maxFiles);
			}
			const header =
				!this.headerWritten && this.formatter.header ? `${this.formatter.header(event)}\n` : '';
			await appendFile(path, `${header}${line}\n`, 'utf-8');
			if (header) this.headerWritten = true;
		});
	}

	private async prepare(): Promise<void> {
		if (this.prepared) return;
		await mkdir(dirname(this.settings.path), { recursive: true });
		if (!this.settings.append) {
			await writeFile(this.settings.path, '', 'utf-8');
		}
		this.prepared = true;
	}
}

function buildTableSink(formatter: TableFormatter, settings: LocalSettings): BufferedSink<TabularRow> {
	let written = false;
	return new BufferedSink<TabularRow>({
		label: formatter.label,
		flushThreshold: settings.flushThreshold,
		accumulate: (event) => formatter.format(event),
		write: async (rows) => {
			await mkdir(dirname(settings.path), { recursive: true });
			const existing = settings.append || written ? await readIfExists(settings.path) : undefined;
			await writeFile(settings.path, formatter.encode(rows, existing));
			written = true;
		},
	});
}

/** Backend builder: one sink per formatter, holding its own file state */
export function buildLocalSink(formatter: Formatter, config: FormatterConfig): Sink {
	const settings = readSettings(config);
	if (isTableFormatter(formatter)) {
		return buildTableSink(formatter, settings);
	}
	return new LocalLineSink(formatter, settings);
}
