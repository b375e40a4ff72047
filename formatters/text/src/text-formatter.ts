/**
 * Plain-text line formatter.
 *
 * Templates use `{name}` placeholders. Built-in names are `time`, `level`,
 * `levelNumber`, `message` and `tags`; any other name is looked up in the
 * event's fields. Unknown placeholders render as an empty string.
 */

import {
	ConfigError,
	customFields,
	describeCall,
	type LineFormatter,
	type LogEvent,
	defineLineFormatter,
} from '@logweave/sdk';

export const DEFAULT_TEMPLATE = '{time} [{level}:{levelNumber}] {message}';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function renderValue(value: unknown): string {
	if (value === undefined || value === null) return '';
	if (typeof value === 'string') return value;
	if (value instanceof Date) return value.toISOString();
	if (typeof value === 'object') return JSON.stringify(value);
	return String(value);
}

function templateValues(event: LogEvent): Map<string, string> {
	const values = new Map<string, string>();
	for (const [name, value] of customFields(event)) {
		values.set(name, renderValue(value));
	}
	values.set('time', event.time.toISOString());
	values.set('level', event.levelName);
	values.set('levelNumber', String(event.levelNumber));
	values.set('message', event.message);
	values.set('tags', event.tags.length > 0 ? `[${event.tags.join(', ')}]` : '');
	return values;
}

export function renderTemplate(template: string, event: LogEvent): string {
	const values = templateValues(event);
	return template.replace(PLACEHOLDER, (_match, name: string) => values.get(name) ?? '');
}

/**
 * ```ts
 * onLocal(toText('{time} {level} {tags} {message}'), { path: 'app.log' })
 * ```
 */
export function toText(template: string = DEFAULT_TEMPLATE): LineFormatter {
	if (typeof template !== 'string' || template.length === 0) {
		throw new ConfigError('Text template must be a non-empty string');
	}
	return defineLineFormatter({
		formatKind: 'text',
		label: describeCall('toText', template === DEFAULT_TEMPLATE ? {} : { template }),
		format: (event) => renderTemplate(template, event),
		options: { template },
	});
}
