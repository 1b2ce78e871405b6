/**
 * Cooperative cancellation for index builds.
 *
 * Builds check the signal between files, never inside one. A cancelled build
 * fails with an error named 'AbortError', the name Node gives its own aborts.
 */

import {describeCause} from './errors.js';

class BuildAbortedError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'AbortError';
	}
}

/**
 * Throw if `signal` has been aborted. `stage` prefixes the message, the abort
 * reason (if any) follows it.
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
	if (!signal?.aborted) {
		return;
	}
	const reason: unknown = signal.reason;
	throw new BuildAbortedError(
		reason === undefined ? stage : `${stage}: ${describeCause(reason)}`,
	);
}

export function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === 'AbortError';
}
