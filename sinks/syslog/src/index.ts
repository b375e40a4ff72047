/**
 * @logweave/sink-syslog — registration entry point.
 */

import {
	readBoolean,
	readEnum,
	readNumber,
	readOptionalString,
	type SinkRegistration,
} from '@logweave/sdk';
import {
	FACILITY_MAP,
	type SyslogFacility,
	type SyslogProtocol,
	type SyslogTransportKind,
	toSyslog,
} from './syslog-sink.js';

const FACILITIES = Object.keys(FACILITY_MAP).filter((name): name is SyslogFacility => name in FACILITY_MAP);

export function register(): SinkRegistration {
	return {
		name: 'syslog',
		create: (options) =>
			toSyslog({
				transport: readEnum<SyslogTransportKind>(options, 'transport', ['udp', 'tcp', 'unix'], 'udp'),
				host: readOptionalString(options, 'host'),
				port: readNumber(options, 'port', 514),
				path: readOptionalString(options, 'path'),
				facility: readEnum(options, 'facility', FACILITIES, 'user'),
				appName: readOptionalString(options, 'appName'),
				protocol: readEnum<SyslogProtocol>(options, 'protocol', ['rfc3164', 'rfc5424'], 'rfc3164'),
				includeStructuredData: readBoolean(options, 'includeStructuredData', true),
				hostName: readOptionalString(options, 'hostName'),
			}),
		optionsSchema: {
			type: 'object',
			properties: {
				transport: {
					type: 'string',
					enum: ['udp', 'tcp', 'unix'],
					description: 'Syslog transport protocol.',
					default: 'udp',
				},
				host: {
					type: 'string',
					description: 'Syslog server host.',
					default: '127.0.0.1',
				},
				port: {
					type: 'integer',
					minimum: 1,
					maximum: 65535,
					description: 'Syslog server port.',
					default: 514,
				},
				path: {
					type: 'string',
					description: 'Unix socket path (for transport: unix).',
					default: '/dev/log',
				},
				facility: {
					type: 'string',
					enum: FACILITIES,
					description: 'Syslog facility name.',
					default: 'user',
				},
				appName: {
					type: 'string',
					description: 'APP-NAME field in syslog messages.',
					default: 'logweave',
				},
				protocol: {
					type: 'string',
					enum: ['rfc3164', 'rfc5424'],
					description: 'Message format.',
					default: 'rfc3164',
				},
				includeStructuredData: {
					type: 'boolean',
					description: 'Include the [logweave@32473 ...] structured data element (rfc5424).',
					default: true,
				},
				hostName: {
					type: 'string',
					description: 'HOSTNAME field (defaults to the machine name).',
				},
			},
			additionalProperties: false,
		},
	};
}

export type {
	SyslogFacility,
	SyslogHeader,
	SyslogOptions,
	SyslogProtocol,
	SyslogTransport,
	SyslogTransportKind,
} from './syslog-sink.js';
export {
	FACILITY_MAP,
	formatRfc3164,
	formatRfc5424,
	MAX_PENDING,
	rfc3164Timestamp,
	SD_ID,
	severityFor,
	StreamTransport,
	toSyslog,
	UdpTransport,
} from './syslog-sink.js';
