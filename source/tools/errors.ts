import type {ZodError} from 'zod';

/**
 * An action was called with parameters that fail validation.
 */
export class InvalidParamsError extends Error {
	readonly action: string;
	readonly issues: string[];

	constructor(action: string, error: ZodError) {
		const issues = error.issues.map(
			issue =>
				`${issue.path.length > 0 ? issue.path.join('.') : '(params)'}: ${issue.message}`,
		);
		super(`invalid parameters for ${action}: ${issues.join('; ')}`, {
			cause: error,
		});
		this.name = 'InvalidParamsError';
		this.action = action;
		this.issues = issues;
	}
}

export class UnknownActionError extends Error {
	readonly action: string;

	constructor(action: string, known: readonly string[]) {
		super(`unknown action "${action}" (expected one of: ${known.join(', ')})`);
		this.name = 'UnknownActionError';
		this.action = action;
	}
}
