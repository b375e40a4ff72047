/**
 * Adaptive Card formatter for chat webhooks (Teams, Power Automate).
 *
 * Each event becomes one `message` payload carrying a single Adaptive Card:
 * a colored heading, the message text and a fact set with level, time, tags
 * and scalar fields. Pair it with onWebhook().
 */

import {
	customFields,
	defineLineFormatter,
	describeCall,
	isScalar,
	type LineFormatter,
	type LogEvent,
} from '@logweave/sdk';

export interface TeamsOptions {
	/** Card heading (default "Application Log") */
	title?: string;
}

export interface CardFact {
	title: string;
	value: string;
}

type CardColor = 'Attention' | 'Warning' | 'Good';

export function cardColor(levelNumber: number): CardColor {
	if (levelNumber >= 80) return 'Attention';
	if (levelNumber >= 60) return 'Warning';
	return 'Good';
}

function cardFacts(event: LogEvent): CardFact[] {
	const facts: CardFact[] = [
		{ title: 'Level', value: `${event.levelName} (${event.levelNumber})` },
		{ title: 'Time', value: event.time.toISOString() },
	];
	if (event.tags.length > 0) {
		facts.push({ title: 'Tags', value: event.tags.join(', ') });
	}
	for (const [name, value] of customFields(event)) {
		if (isScalar(value) && value !== null) {
			facts.push({ title: name, value: String(value) });
		}
	}
	return facts;
}

export function buildCard(event: LogEvent, title: string): Record<string, unknown> {
	return {
		type: 'message',
		attachments: [
			{
				contentType: 'application/vnd.microsoft.card.adaptive',
				contentUrl: null,
				content: {
					$schema: 'http://adaptivecards.io/schemas/adaptive-card.json',
					type: 'AdaptiveCard',
					version: '1.2',
					body: [
						{
							type: 'TextBlock',
							size: 'Large',
							weight: 'Bolder',
							text: `[${event.levelName}] ${title}`,
							color: cardColor(event.levelNumber),
						},
						{ type: 'TextBlock', text: event.message, wrap: true },
						{ type: 'FactSet', facts: cardFacts(event) },
					],
				},
			},
		],
	};
}

export function toTeams(options: TeamsOptions = {}): LineFormatter {
	const title = options.title ?? 'Application Log';
	return defineLineFormatter({
		formatKind: 'teams',
		label: describeCall('toTeams', title === 'Application Log' ? {} : { title }),
		format: (event) => JSON.stringify(buildCard(event, title)),
		options: { title },
	});
}
