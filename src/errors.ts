// symtrace Error Types
// Error domain for symbolic mapping variables during trace capture

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Capture errors (abort the current trace region)
	Unsupported: "Unsupported",
	KeyMissing: "KeyMissing",
	SchemaMismatch: "SchemaMismatch",

	// Normalizer rejection (returned, escalated by callers)
	KeyRejected: "KeyRejected",

	// Configuration errors
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// TraceError Class
//==============================================================================

export class TraceError extends Error {
	readonly code: ErrorCode;
	readonly meta?: ReadonlyMap<string, string>;

	constructor(code: ErrorCode, message: string, meta?: ReadonlyMap<string, string>) {
		super(message);
		this.name = "TraceError";
		this.code = code;
		if (meta !== undefined) this.meta = meta;
	}

	/**
	 * Create an Unsupported error
	 */
	static unsupported(message: string): TraceError {
		return new TraceError(ErrorCodes.Unsupported, "Unsupported: " + message);
	}

	/**
	 * Create a KeyMissing error
	 */
	static keyMissing(key: string): TraceError {
		return new TraceError(
			ErrorCodes.KeyMissing,
			"Key missing: " + key,
			new Map([["key", key]]),
		);
	}

	/**
	 * Create a SchemaMismatch error naming the record class and the offending fields
	 */
	static schemaMismatch(className: string, fields: string[], reason: string): TraceError {
		return new TraceError(
			ErrorCodes.SchemaMismatch,
			"Schema mismatch for " +
				className +
				": " +
				reason +
				(fields.length > 0 ? " (" + fields.join(", ") + ")" : ""),
			new Map([
				["class", className],
				["fields", fields.join(",")],
			]),
		);
	}

	/**
	 * Create a KeyRejected error from a normalizer rejection reason
	 */
	static keyRejected(reason: string): TraceError {
		return new TraceError(ErrorCodes.KeyRejected, "Key rejected: " + reason);
	}

	/**
	 * Create a ValidationError
	 */
	static validation(
		path: string,
		message: string,
		value?: unknown,
	): TraceError {
		return new TraceError(
			ErrorCodes.ValidationError,
			"Validation error at " +
				path +
				": " +
				message +
				(value !== undefined ? " (value: " + JSON.stringify(value) + ")" : ""),
		);
	}
}

/**
 * Abort the current trace region: the instruction cannot be captured.
 */
export function unimplemented(message: string): never {
	throw TraceError.unsupported(message);
}

export function isTraceError(e: unknown): e is TraceError {
	return e instanceof TraceError;
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (variable.kind) {
 *   case "dict": return ...;
 *   case "tuple": return ...;
 *   default:
 *     exhaustive(variable); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
