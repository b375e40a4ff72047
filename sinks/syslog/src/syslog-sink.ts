/**
 * Syslog sink — RFC 3164 or RFC 5424 messages over UDP, TCP or a Unix socket.
 *
 * UDP sends one datagram per event. TCP and Unix sockets are
 * newline-delimited, reconnect in the background and hold a bounded
 * number of messages while disconnected.
 */

import { type Socket as UdpSocket, createSocket } from 'node:dgram';
import { type NetConnectOpts, type Socket as StreamSocket, createConnection } from 'node:net';
import { hostname } from 'node:os';
import {
	ConfigError,
	customFields,
	isScalar,
	type LevelLike,
	type LogEvent,
	levelNumberOf,
	passesLimits,
	type Sink,
	validateLimits,
} from '@logweave/sdk';

// ─── Facilities ──────────────────────────────────────────────────────────────

export const FACILITY_MAP = {
	kern: 0,
	user: 1,
	mail: 2,
	daemon: 3,
	auth: 4,
	syslog: 5,
	lpr: 6,
	news: 7,
	uucp: 8,
	cron: 9,
	authpriv: 10,
	ftp: 11,
	local0: 16,
	local1: 17,
	local2: 18,
	local3: 19,
	local4: 20,
	local5: 21,
	local6: 22,
	local7: 23,
} as const;

export type SyslogFacility = keyof typeof FACILITY_MAP;

function isFacility(name: string): name is SyslogFacility {
	return Object.hasOwn(FACILITY_MAP, name);
}

// ─── Severity Mapping ────────────────────────────────────────────────────────

/** Map a level number (0-100) to a syslog severity (0 emergency … 7 debug) */
export function severityFor(levelNumber: number): number {
	if (levelNumber >= 100) return 0;
	if (levelNumber >= 90) return 2;
	if (levelNumber >= 80) return 3;
	if (levelNumber >= 60) return 4;
	if (levelNumber >= 50) return 5;
	if (levelNumber >= 40) return 6;
	return 7;
}

// ─── Message Formatting ──────────────────────────────────────────────────────

export interface SyslogHeader {
	facility: number;
	appName: string;
	hostName: string;
	procId: number;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad2(n: number): string {
	return String(n).padStart(2, '0');
}

/** `Mmm dd hh:mm:ss` with a space-padded day, in UTC */
export function rfc3164Timestamp(date: Date): string {
	const day = String(date.getUTCDate()).padStart(2, ' ');
	const time = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
	return `${MONTHS[date.getUTCMonth()]} ${day} ${time}`;
}

/**
 * BSD syslog line.
 *
 * Format: <PRI>TIMESTAMP SP HOSTNAME SP APP-NAME[PID]: MSG
 */
export function formatRfc3164(event: LogEvent, header: SyslogHeader): string {
	const pri = header.facility * 8 + severityFor(event.levelNumber);
	return (
		`<${pri}>${rfc3164Timestamp(event.time)} ${header.hostName} ` +
		`${header.appName}[${header.procId}]: ${event.message}`
	);
}

/**
 * Escape structured data param values per RFC 5424 section 6.3.3:
 * `"`, `\`, and `]` must be escaped with backslash.
 */
function escapeSDValue(value: string): string {
	return value.replace(/["\\\]]/g, (ch) => `\\${ch}`);
}

/** SD-NAMEs are printable US-ASCII without `=`, space, `]` or `"`, at most 32 chars */
function isSDName(name: string): boolean {
	return /^[!#-<>-\\^-~]{1,32}$/.test(name);
}

/** Enterprise number 32473 is reserved for documentation (RFC 5612) */
export const SD_ID = 'logweave@32473';

function structuredData(event: LogEvent): string {
	const params: string[] = [];
	if (event.tags.length > 0) params.push(`tags="${escapeSDValue(event.tags.join(','))}"`);
	for (const [name, value] of customFields(event)) {
		if (!isSDName(name) || !isScalar(value) || value === null) continue;
		params.push(`${name}="${escapeSDValue(String(value))}"`);
	}
	return params.length > 0 ? `[${SD_ID} ${params.join(' ')}]` : '-';
}

/**
 * Build an RFC 5424 syslog message.
 *
 * Format: <PRI>VERSION SP TIMESTAMP SP HOSTNAME SP APP-NAME SP PROCID SP MSGID SP SD SP MSG
 */
export function formatRfc5424(
	event: LogEvent,
	header: SyslogHeader,
	includeStructuredData = true,
): string {
	const pri = header.facility * 8 + severityFor(event.levelNumber);
	const sd = includeStructuredData ? structuredData(event) : '-';
	return (
		`<${pri}>1 ${event.time.toISOString()} ${header.hostName} ${header.appName} ` +
		`${header.procId} ${event.levelName} ${sd} ${event.message}`
	);
}

// ─── Transport Interface ─────────────────────────────────────────────────────

export interface SyslogTransport {
	send(message: string): Promise<void>;
	close(): Promise<void>;
}

// ─── UDP Transport ───────────────────────────────────────────────────────────

export class UdpTransport implements SyslogTransport {
	private socket: UdpSocket;
	private closed = false;

	constructor(
		private readonly host: string,
		private readonly port: number,
	) {
		this.socket = createSocket('udp4');
		// Unref so the socket doesn't keep the process alive
		this.socket.unref();
	}

	send(message: string): Promise<void> {
		const buf = Buffer.from(message, 'utf-8');
		return new Promise<void>((resolve, reject) => {
			this.socket.send(buf, this.port, this.host, (err) => (err ? reject(err) : resolve()));
		});
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await new Promise<void>((resolve) => this.socket.close(() => resolve()));
	}
}

// ─── Stream Transport (TCP and Unix socket) ──────────────────────────────────

/** Messages held while the stream is reconnecting */
export const MAX_PENDING = 1000;
const RECONNECT_DELAY_MS = 1000;

export class StreamTransport implements SyslogTransport {
	private socket: StreamSocket | null = null;
	private connecting = false;
	private closed = false;
	private lastError: Error | null = null;
	private readonly pending: string[] = [];

	constructor(private readonly target: NetConnectOpts) {
		this.connect();
	}

	private describeTarget(): string {
		return 'path' in this.target ? this.target.path : `${this.target.host ?? 'localhost'}:${this.target.port}`;
	}

	private connect(): void {
		if (this.closed || this.connecting) return;
		this.connecting = true;

		const socket = createConnection(this.target, () => {
			this.connecting = false;
			this.lastError = null;
			this.socket = socket;
			for (const message of this.pending.splice(0)) {
				socket.write(`${message}\n`);
			}
		});

		socket.setKeepAlive(true);
		socket.unref();

		socket.on('error', (err) => {
			this.lastError = err;
		});

		socket.on('close', () => {
			this.socket = null;
			this.connecting = false;
			if (!this.closed) {
				setTimeout(() => this.connect(), RECONNECT_DELAY_MS).unref();
			}
		});
	}

	send(message: string): Promise<void> {
		const socket = this.socket;
		if (socket && !socket.destroyed) {
			// RFC 6587 non-transparent framing: newline-delimited
			return new Promise<void>((resolve, reject) => {
				socket.write(`${message}\n`, (err) => (err ? reject(err) : resolve()));
			});
		}
		if (this.pending.length >= MAX_PENDING) {
			const reason = this.lastError ? `: ${this.lastError.message}` : '';
			return Promise.reject(
				new Error(
					`Syslog ${this.describeTarget()} unreachable with ${MAX_PENDING} messages pending${reason}`,
				),
			);
		}
		this.pending.push(message);
		return Promise.resolve();
	}

	async close(): Promise<void> {
		this.closed = true;
		this.pending.length = 0;
		const socket = this.socket;
		if (!socket) return;
		await new Promise<void>((resolve) => socket.end(() => resolve()));
	}
}

// ─── Syslog Sink ─────────────────────────────────────────────────────────────

export type SyslogProtocol = 'rfc3164' | 'rfc5424';
export type SyslogTransportKind = 'udp' | 'tcp' | 'unix';

export interface SyslogOptions {
	/** Default udp */
	transport?: SyslogTransportKind;
	/** Default 127.0.0.1 */
	host?: string;
	/** Default 514 */
	port?: number;
	/** Unix socket path (default /dev/log) */
	path?: string;
	/** Default user */
	facility?: SyslogFacility;
	/** APP-NAME field (default logweave) */
	appName?: string;
	/** Default rfc3164 */
	protocol?: SyslogProtocol;
	/** Tags and scalar fields as an RFC 5424 SD element (default true) */
	includeStructuredData?: boolean;
	/** HOSTNAME field (default: os.hostname()) */
	hostName?: string;
	lower?: LevelLike;
	upper?: LevelLike;
	/** Pre-built transport; replaces transport/host/port/path */
	connection?: SyslogTransport;
}

function createTransport(options: SyslogOptions): SyslogTransport {
	const host = options.host ?? '127.0.0.1';
	const port = options.port ?? 514;
	switch (options.transport ?? 'udp') {
		case 'tcp':
			return new StreamTransport({ host, port });
		case 'unix':
			return new StreamTransport({ path: options.path ?? '/dev/log' });
		default:
			return new UdpTransport(host, port);
	}
}

function describeOptions(options: SyslogOptions, lower: number, upper: number): string {
	const parts: string[] = [];
	if (options.connection) {
		parts.push('connection=custom');
	} else {
		const transport = options.transport ?? 'udp';
		parts.push(`transport="${transport}"`);
		parts.push(
			transport === 'unix'
				? `path="${options.path ?? '/dev/log'}"`
				: `host="${options.host ?? '127.0.0.1'}", port=${options.port ?? 514}`,
		);
	}
	parts.push(`protocol="${options.protocol ?? 'rfc3164'}"`, `facility="${options.facility ?? 'user'}"`);
	if (lower !== 0 || upper !== 100) parts.push(`lower=${lower}, upper=${upper}`);
	return `toSyslog(${parts.join(', ')})`;
}

/**
 * ```ts
 * toSyslog({ transport: 'tcp', host: 'syslog.internal', facility: 'local1', lower: WARNING })
 * ```
 */
export function toSyslog(options: SyslogOptions = {}): Sink {
	const lower = levelNumberOf(options.lower ?? 0);
	const upper = levelNumberOf(options.upper ?? 100);
	validateLimits(lower, upper);

	const facilityName = options.facility ?? 'user';
	if (!isFacility(facilityName)) {
		throw new ConfigError(
			`Unknown syslog facility "${String(facilityName)}"\n` +
				`  Available: ${Object.keys(FACILITY_MAP).join(', ')}`,
		);
	}
	const header: SyslogHeader = {
		facility: FACILITY_MAP[facilityName],
		appName: options.appName ?? 'logweave',
		hostName: options.hostName ?? hostname(),
		procId: process.pid,
	};
	const protocol = options.protocol ?? 'rfc3164';
	const includeStructuredData = options.includeStructuredData ?? true;
	const format = (event: LogEvent): string =>
		protocol === 'rfc5424'
			? formatRfc5424(event, header, includeStructuredData)
			: formatRfc3164(event, header);

	// opened on first write
	let transport: SyslogTransport | null = options.connection ?? null;
	let closed = false;

	return Object.freeze({
		kind: 'sink' as const,
		label: describeOptions(options, lower, upper),
		async write(event: LogEvent) {
			if (!passesLimits(event.levelNumber, lower, upper)) return;
			if (closed) throw new Error('Syslog sink is closed');
			transport ??= createTransport(options);
			await transport.send(format(event));
		},
		async close() {
			closed = true;
			if (!transport) return;
			const open = transport;
			transport = null;
			await open.close();
		},
	});
}
