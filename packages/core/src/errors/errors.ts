/**
 * Engine Errors
 *
 * Error taxonomy raised while binding, resolving, dispatching and validating.
 * Every error is fatal to the testcase step that raised it.
 */

/**
 * Base class for all engine errors
 */
export class ReqflowError extends Error {
	/**
	 * The original error that caused this error
	 */
	cause?: Error;

	constructor(message: string, cause?: Error) {
		super(message);
		this.name = new.target.name;
		this.cause = cause;
	}
}

/**
 * A module named in `requires` is not registered
 */
export class ImportError extends ReqflowError {
	constructor(public readonly moduleName: string) {
		super(`Module "${moduleName}" not found`);
	}
}

/**
 * A function binding expression does not name a callable
 */
export class FunctionBindError extends ReqflowError {
	constructor(
		public readonly functionName: string,
		public readonly expression: string,
		reason: string,
	) {
		super(`Cannot bind function "${functionName}" to "${expression}": ${reason}`);
	}
}

/**
 * A variable spec calls an unknown function or the call throws
 */
export class VariableBindError extends ReqflowError {
	constructor(
		public readonly variableName: string,
		reason: string,
		cause?: Error,
	) {
		super(`Cannot bind variable "${variableName}": ${reason}`, cause);
	}
}

/**
 * A placeholder references a variable missing from the context
 */
export class VariableNotFoundError extends ReqflowError {
	constructor(
		public readonly variableName: string,
		public readonly path: string,
	) {
		super(`Variable "${variableName}" not found${path ? ` at "${path}"` : ""}`);
	}
}

/**
 * A call placeholder references a function missing from the context
 */
export class FunctionNotFoundError extends ReqflowError {
	constructor(
		public readonly functionName: string,
		public readonly path: string,
	) {
		super(`Function "${functionName}" not found${path ? ` at "${path}"` : ""}`);
	}
}

/**
 * A call placeholder's function threw or returned a non-Value
 */
export class FunctionCallError extends ReqflowError {
	constructor(
		public readonly functionName: string,
		public readonly path: string,
		cause: Error,
	) {
		super(`Calling function "${functionName}"${path ? ` at "${path}"` : ""} failed: ${cause.message}`, cause);
	}
}

/**
 * Resolved request lacks required parameters
 */
export class ParamsError extends ReqflowError {}

/**
 * An extraction path cannot be read from a response
 */
export class ExtractionError extends ReqflowError {
	constructor(
		public readonly variableName: string,
		public readonly path: string,
		reason: string,
	) {
		super(`Cannot extract "${variableName}" from "${path}": ${reason}`);
	}
}

/**
 * A validator cannot be evaluated (unknown comparator, bad operand)
 */
export class ValidatorError extends ReqflowError {
	constructor(
		public readonly comparator: string,
		reason: string,
	) {
		super(`Validator "${comparator}" failed: ${reason}`);
	}
}

/**
 * Input configuration does not match the testset shape
 */
export class ConfigError extends ReqflowError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(issues.length ? `${message}\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : message);
	}
}

/**
 * Convert an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
