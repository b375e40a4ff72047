/**
 * Internal diagnostics — the framework's own warnings.
 *
 * Logweave cannot log its own failures through the logger that failed, so
 * non-fatal problems (flush failures, queue overflow, a broken fallback)
 * surface as process warnings. Applications observe them with
 * `process.on('warning', ...)`.
 */

import { errorMessage } from '@logweave/sdk';

export const WARNING_TYPE = 'LogweaveWarning';

export type WarningCode =
	| 'LOGWEAVE_FLUSH_FAILED'
	| 'LOGWEAVE_WORKER_FAILED'
	| 'LOGWEAVE_QUEUE_OVERFLOW'
	| 'LOGWEAVE_FALLBACK_FAILED'
	| 'LOGWEAVE_SHUTDOWN_FLUSH_FAILED';

export function warn(code: WarningCode, message: string, cause?: unknown): void {
	const detail = cause === undefined ? message : `${message}: ${errorMessage(cause)}`;
	process.emitWarning(detail, { type: WARNING_TYPE, code });
}
