/**
 * JSON Lines formatter: one object per event.
 *
 * Keys: `time`, `level`, `levelNumber`, `message`, `tags` (only when there
 * are any), then the event's fields flattened in. Fields named like one of
 * those keys are skipped.
 */

import { customFields, defineLineFormatter, describeCall, type LineFormatter, type LogEvent } from '@logweave/sdk';

export interface JsonOptions {
	/** Indent output over several lines; meant for debugging, not for JSONL files */
	pretty?: boolean;
}

export function toJsonRecord(event: LogEvent): Record<string, unknown> {
	const record: Record<string, unknown> = {
		time: event.time.toISOString(),
		level: event.levelName,
		levelNumber: event.levelNumber,
		message: event.message,
	};
	if (event.tags.length > 0) {
		record.tags = [...event.tags];
	}
	for (const [name, value] of customFields(event)) {
		record[name] = value;
	}
	return record;
}

export function toJson(options: JsonOptions = {}): LineFormatter {
	const pretty = options.pretty ?? false;
	return defineLineFormatter({
		formatKind: 'json',
		label: describeCall('toJson', pretty ? { pretty } : {}),
		format: (event) => JSON.stringify(toJsonRecord(event), null, pretty ? 2 : undefined),
		options: { pretty },
	});
}
