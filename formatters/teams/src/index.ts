/**
 * @logweave/formatter-teams — registration entry point.
 */

import { type FormatterRegistration, readString } from '@logweave/sdk';
import { toTeams } from './teams-formatter.js';

export function register(): FormatterRegistration {
	return {
		name: 'teams',
		create: (options) => toTeams({ title: readString(options, 'title', 'Application Log') }),
		optionsSchema: {
			type: 'object',
			properties: {
				title: { type: 'string', description: 'Card heading', default: 'Application Log' },
			},
			additionalProperties: false,
		},
	};
}

export { buildCard, type CardFact, cardColor, type TeamsOptions, toTeams } from './teams-formatter.js';
