/**
 * BackendRegistry — maps backend names to sink builders.
 *
 * Resolution happens once, at logger-build time: a formatter whose config
 * names an unknown backend fails fast here instead of at the first event.
 * Names are unique; registering a duplicate throws ConfigError.
 */

import type { ErrorObject, ValidateFunction } from 'ajv';
import { Ajv } from 'ajv';
import {
	type BackendRegistration,
	BackendNotFoundError,
	ConfigError,
	type Formatter,
	isFormatter,
	SchemaError,
	type Sink,
	withSinkLimits,
} from '@logweave/sdk';

interface RegistryEntry {
	registration: BackendRegistration;
	validate: ValidateFunction | null;
}

export class BackendRegistry {
	private readonly backends = new Map<string, RegistryEntry>();
	private readonly ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

	/** Register a backend. Throws ConfigError if the name is already taken. */
	register(registration: BackendRegistration): this {
		if (this.backends.has(registration.name)) {
			throw new ConfigError(`Backend "${registration.name}" is already registered`);
		}
		const validate = registration.configSchema ? this.ajv.compile(registration.configSchema) : null;
		this.backends.set(registration.name, { registration, validate });
		return this;
	}

	/** Unregister a backend by name. Returns the removed registration or undefined. */
	unregister(name: string): BackendRegistration | undefined {
		const entry = this.backends.get(name);
		if (entry) {
			this.backends.delete(name);
		}
		return entry?.registration;
	}

	/** Check if a backend name is registered. */
	has(name: string): boolean {
		return this.backends.has(name);
	}

	/** Registered backend names, sorted. */
	names(): string[] {
		return [...this.backends.keys()].sort();
	}

	get size(): number {
		return this.backends.size;
	}

	/**
	 * Turn a configured formatter into a sink: check the backend name,
	 * validate the backend config, invoke the builder exactly once and apply
	 * the formatter's own limits.
	 */
	resolve(formatter: Formatter): Sink {
		if (!isFormatter(formatter)) {
			throw new ConfigError('Only formatters can be resolved through the backend registry');
		}
		const { config } = formatter;
		if (config.backendName === undefined) {
			throw new ConfigError(
				`Formatter ${formatter.label} has no backend\n` +
					'  Solution: pass it through a handler first\n' +
					"  Example: onLocal(toText(), { path: 'app.log' })",
			);
		}

		const entry = this.backends.get(config.backendName);
		if (!entry) {
			throw new BackendNotFoundError(config.backendName, this.names());
		}

		if (entry.validate && !entry.validate(config.backendConfig)) {
			const errors = (entry.validate.errors ?? []).map(
				(e: ErrorObject) => `${e.instancePath || '/'}: ${e.message}`,
			);
			throw new SchemaError(`Invalid configuration for backend "${config.backendName}"`, errors);
		}

		const sink = entry.registration.build(formatter, config);
		return withSinkLimits(sink, config.lowerLimit ?? 0, config.upperLimit ?? 100);
	}
}
