/**
 * Numbered rotation for local log files.
 *
 * `app.log` rotates to `app.log.1`, `app.log.1` to `app.log.2` and so on up
 * to `app.log.<maxFiles>`; whatever sat in the last slot is overwritten.
 */

import { rename, stat } from 'node:fs/promises';
import { ConfigError } from '@logweave/sdk';

/**
 * Parse a size (e.g., 1048576, "100MB", "1.5GB") to bytes.
 */
export function parseSize(size: number | string): number {
	if (typeof size === 'number') {
		if (!Number.isFinite(size) || size <= 0) {
			throw new ConfigError(`Invalid size: ${size}. Expected a positive number of bytes`);
		}
		return size;
	}
	const match = size.match(/^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB)$/i);
	if (!match) {
		throw new ConfigError(
			`Invalid size format: "${size}". Expected format: <number><unit> (e.g., 100MB, 1GB)`,
		);
	}
	const value = Number.parseFloat(match[1]);
	switch (match[2].toUpperCase()) {
		case 'KB':
			return value * 1024;
		case 'MB':
			return value * 1024 * 1024;
		case 'GB':
			return value * 1024 * 1024 * 1024;
		default:
			return value;
	}
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Check if a file has reached the max size. A missing file never needs rotation.
 */
export async function needsRotation(filePath: string, maxSize: number): Promise<boolean> {
	try {
		const st = await stat(filePath);
		return st.size >= maxSize;
	} catch (err) {
		if (isNotFound(err)) return false;
		throw err;
	}
}

async function renameIfExists(from: string, to: string): Promise<void> {
	try {
		await rename(from, to);
	} catch (err) {
		if (!isNotFound(err)) throw err;
	}
}

/**
 * Shift `path.(N-1)` → `path.N` for N from maxFiles down to 2, then
 * `path` → `path.1`.
 */
export async function rotateFile(filePath: string, maxFiles: number): Promise<void> {
	for (let i = maxFiles - 1; i >= 1; i--) {
		await renameIfExists(`${filePath}.${i}`, `${filePath}.${i + 1}`);
	}
	await renameIfExists(filePath, `${filePath}.1`);
}
