/**
 * Shutdown hooks — a best-effort final flush of every buffered sink.
 *
 * `beforeExit` flushes once; SIGINT/SIGTERM close the logger and then
 * re-raise the signal so the process still exits the usual way. A failed
 * shutdown flush is reported and not retried.
 */

import { warn } from './diagnostics.js';
import type { Logger } from './logger.js';

export interface ShutdownOptions {
	/** Signals that trigger a close (default SIGINT, SIGTERM) */
	signals?: NodeJS.Signals[];
}

export function registerShutdownFlush(logger: Logger, options: ShutdownOptions = {}): () => void {
	const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
	let flushedBeforeExit = false;

	const onBeforeExit = (): void => {
		if (flushedBeforeExit) return;
		flushedBeforeExit = true;
		void logger.flush().catch((err: unknown) => {
			warn('LOGWEAVE_SHUTDOWN_FLUSH_FAILED', 'Final flush before exit failed', err);
		});
	};

	const onSignal = (signal: NodeJS.Signals): void => {
		unregister();
		void logger
			.close()
			.catch((err: unknown) => {
				warn('LOGWEAVE_SHUTDOWN_FLUSH_FAILED', `Final flush on ${signal} failed`, err);
			})
			.finally(() => {
				process.kill(process.pid, signal);
			});
	};

	function unregister(): void {
		process.off('beforeExit', onBeforeExit);
		for (const signal of signals) {
			process.off(signal, onSignal);
		}
	}

	process.on('beforeExit', onBeforeExit);
	for (const signal of signals) {
		process.on(signal, onSignal);
	}

	return unregister;
}
