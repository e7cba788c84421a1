// ============================================================================
// Stepscope - Error taxonomy
// Every failure carries a stable code, and most carry a hint telling the
// user what to change.
//
// Catalog/config problems are fatal to the command that hit them.
// Scenario- and feature-local problems are recorded in the result tree.
// ============================================================================

/** Stable error codes written into reports and used by the CLI */
export type ErrorCode =
	| 'PATTERN_COMPILE_ERROR'
	| 'REGISTRY_SEALED'
	| 'UNMATCHED_STEP'
	| 'STEP_EXECUTION_ERROR'
	| 'UNKNOWN_STEP_HANDLER'
	| 'BATCH_FEATURE_ERROR'
	| 'REPORT_PARSE_ERROR'
	| 'CONFIG_ERROR'
	| 'DISCOVERY_ERROR'
	| 'FEATURE_PARSE_ERROR';

/**
 * Base error class for all Stepscope errors.
 */
export class StepscopeError extends Error {
	override readonly name: string = 'StepscopeError';

	readonly code: ErrorCode;
	/** Hint for how to fix the issue */
	readonly hint?: string;

	constructor(options: { code: ErrorCode; message: string; hint?: string; cause?: unknown }) {
		super(options.message);
		this.code = options.code;
		this.hint = options.hint;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

/**
 * A step pattern is not a valid regular expression. Raised while the
 * registry is being built, never while matching.
 */
export class PatternCompileError extends StepscopeError {
	override readonly name = 'PatternCompileError';
	readonly pattern: string;
	readonly identifier: string;

	constructor(options: { pattern: string; identifier: string; cause?: unknown }) {
		const reason = options.cause instanceof Error ? options.cause.message : 'invalid pattern';
		super({
			code: 'PATTERN_COMPILE_ERROR',
			message: `Could not compile pattern for '${options.identifier}': ${reason}`,
			hint: `Check the regular expression: ${options.pattern}`,
			cause: options.cause,
		});
		this.pattern = options.pattern;
		this.identifier = options.identifier;
	}
}

export class RegistrySealedError extends StepscopeError {
	override readonly name = 'RegistrySealedError';

	constructor(identifier: string) {
		super({
			code: 'REGISTRY_SEALED',
			message: `Cannot register '${identifier}': the step registry is sealed`,
			hint: 'Register every pattern before the registry is sealed, or build a new registry.',
		});
	}
}

/** No pattern in the registry matches the step text. */
export class UnmatchedStepError extends StepscopeError {
	override readonly name = 'UnmatchedStepError';
	readonly stepText: string;
	readonly suggestions: string[];

	constructor(stepText: string, suggestions: string[] = []) {
		super({
			code: 'UNMATCHED_STEP',
			message: `Step '${stepText}' does not match any registered pattern`,
			hint: suggestions.length > 0 ? `Did you mean: ${suggestions.join(' or ')}?` : undefined,
		});
		this.stepText = stepText;
		this.suggestions = suggestions;
	}
}

/** The automation backend reported a failure. The message is kept verbatim. */
export class StepExecutionError extends StepscopeError {
	override readonly name = 'StepExecutionError';
	readonly identifier: string;

	constructor(identifier: string, message: string, cause?: unknown) {
		super({ code: 'STEP_EXECUTION_ERROR', message, cause });
		this.identifier = identifier;
	}
}

export class UnknownStepHandlerError extends StepscopeError {
	override readonly name = 'UnknownStepHandlerError';

	constructor(identifier: string) {
		super({
			code: 'UNKNOWN_STEP_HANDLER',
			message: `No handler registered for step '${identifier}'`,
			hint: 'Register a handler for this identifier in the step handler table.',
		});
	}
}

/** One feature file of a batch failed. Never aborts the batch. */
export class BatchFeatureError extends StepscopeError {
	override readonly name = 'BatchFeatureError';
	readonly path: string;

	constructor(path: string, message: string, cause?: unknown) {
		super({ code: 'BATCH_FEATURE_ERROR', message, cause });
		this.path = path;
	}
}

/** A baseline/current report could not be read or does not have the report shape. */
export class ReportParseError extends StepscopeError {
	override readonly name = 'ReportParseError';
	readonly source: string;

	constructor(source: string, message: string, cause?: unknown) {
		super({
			code: 'REPORT_PARSE_ERROR',
			message: `Invalid execution report '${source}': ${message}`,
			hint: 'Reports must be JSON or YAML documents produced by a stepscope run.',
			cause,
		});
		this.source = source;
	}
}

export class ConfigError extends StepscopeError {
	override readonly name = 'ConfigError';

	constructor(message: string, hint?: string, cause?: unknown) {
		super({ code: 'CONFIG_ERROR', message, hint, cause });
	}
}

export class DiscoveryError extends StepscopeError {
	override readonly name = 'DiscoveryError';

	constructor(message: string, hint?: string) {
		super({ code: 'DISCOVERY_ERROR', message, hint });
	}
}

export class FeatureParseError extends StepscopeError {
	override readonly name = 'FeatureParseError';

	constructor(message: string, uri?: string) {
		super({
			code: 'FEATURE_PARSE_ERROR',
			message: uri ? `${uri}: ${message}` : message,
			hint: 'A feature file starts with a "Feature:" line followed by scenarios.',
		});
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Normalise anything thrown into an Error. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

/** Message of anything thrown, without the stack. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
