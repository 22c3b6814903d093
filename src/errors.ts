// tagfold Error Types
// Error domain for registration, construction, matching and evaluation

import { formatKind } from "./print.js";
import type { Kind } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Registration errors
	DuplicateType: "DuplicateType",
	DuplicateConstructor: "DuplicateConstructor",
	DuplicateDefinition: "DuplicateDefinition",
	DuplicateParameter: "DuplicateParameter",
	UnknownKindReference: "UnknownKindReference",

	// Construction errors
	ArityMismatch: "ArityMismatch",
	KindMismatch: "KindMismatch",

	// Lookup errors
	UnknownType: "UnknownType",
	UnknownConstructor: "UnknownConstructor",
	UnknownOperator: "UnknownOperator",
	UnboundIdentifier: "UnboundIdentifier",

	// Matching errors
	NonExhaustiveMatch: "NonExhaustiveMatch",

	// Evaluation errors
	StackExhausted: "StackExhausted",
	DivideByZero: "DivideByZero",
	IntegerOverflow: "IntegerOverflow",

	// Validation errors
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// tagfold Error Class
//==============================================================================

export class TagfoldError extends Error {
	readonly code: ErrorCode;
	/** Offending argument position, for ArityMismatch/KindMismatch at a call or construction */
	readonly position?: number;

	constructor(code: ErrorCode, message: string, position?: number) {
		super(message);
		this.name = "TagfoldError";
		this.code = code;
		// Required for exactOptionalPropertyTypes compatibility
		if (position !== undefined) this.position = position;
	}

	static duplicateType(name: string): TagfoldError {
		return new TagfoldError(
			ErrorCodes.DuplicateType,
			"Duplicate type: " + name + " is already registered",
		);
	}

	static duplicateConstructor(type: string, ctor: string): TagfoldError {
		return new TagfoldError(
			ErrorCodes.DuplicateConstructor,
			"Duplicate constructor: " + type + " declares " + ctor + " more than once",
		);
	}

	static duplicateDefinition(name: string): TagfoldError {
		return new TagfoldError(
			ErrorCodes.DuplicateDefinition,
			"Duplicate definition: " + name + " is already defined",
		);
	}

	static duplicateParameter(owner: string, name: string): TagfoldError {
		return new TagfoldError(
			ErrorCodes.DuplicateParameter,
			"Duplicate parameter: " + owner + " declares " + name + " more than once",
		);
	}

	static unknownKindReference(name: string, context: string): TagfoldError {
		return new TagfoldError(
			ErrorCodes.UnknownKindReference,
			"Unknown kind reference: " + name + " (" + context + ")",
		);
	}

	/**
	 * `what` names the thing applied, e.g. "constructor cons" or "function map".
	 */
	static arityMismatch(
		what: string,
		expected: number,
		got: number,
		position?: number,
	): TagfoldError {
		return new TagfoldError(
			ErrorCodes.ArityMismatch,
			"Arity mismatch: " +
				what +
				" expects " +
				String(expected) +
				", got " +
				String(got),
			position,
		);
	}

	static kindMismatch(
		expected: Kind,
		got: Kind,
		context: string,
		position?: number,
	): TagfoldError {
		return new TagfoldError(
			ErrorCodes.KindMismatch,
			"Kind mismatch (" +
				context +
				"): expected " +
				formatKind(expected) +
				", got " +
				formatKind(got),
			position,
		);
	}

	/** KindMismatch where no single expected kind exists */
	static kindMismatchMessage(message: string, position?: number): TagfoldError {
		return new TagfoldError(ErrorCodes.KindMismatch, "Kind mismatch: " + message, position);
	}

	static unknownType(name: string): TagfoldError {
		return new TagfoldError(ErrorCodes.UnknownType, "Unknown type: " + name);
	}

	static unknownConstructor(type: string, ctor: string): TagfoldError {
		return new TagfoldError(
			ErrorCodes.UnknownConstructor,
			"Unknown constructor: " + type + " has no constructor " + ctor,
		);
	}

	static unknownOperator(ns: string, name: string): TagfoldError {
		return new TagfoldError(
			ErrorCodes.UnknownOperator,
			"Unknown operator: " + ns + ":" + name,
		);
	}

	static unboundIdentifier(name: string): TagfoldError {
		return new TagfoldError(
			ErrorCodes.UnboundIdentifier,
			"Unbound identifier: " + name,
		);
	}

	static nonExhaustiveMatch(type: string, missing: readonly string[]): TagfoldError {
		return new TagfoldError(
			ErrorCodes.NonExhaustiveMatch,
			"Non-exhaustive match on " + type + ": missing " + missing.join(", "),
		);
	}

	static stackExhausted(maxDepth: number): TagfoldError {
		return new TagfoldError(
			ErrorCodes.StackExhausted,
			"Stack exhausted: recursion deeper than " + String(maxDepth) + " frames",
		);
	}

	static hostStackExhausted(): TagfoldError {
		return new TagfoldError(
			ErrorCodes.StackExhausted,
			"Stack exhausted: host call stack overflowed",
		);
	}

	static divideByZero(): TagfoldError {
		return new TagfoldError(ErrorCodes.DivideByZero, "Division by zero");
	}

	static integerOverflow(op: string, result: number): TagfoldError {
		return new TagfoldError(
			ErrorCodes.IntegerOverflow,
			"Integer overflow: " + op + " produced " + String(result) + ", outside the safe integer range",
		);
	}
}

//==============================================================================
// Result Type
//==============================================================================

export type Result<T> =
	| { ok: true; value: T }
	| { ok: false; error: TagfoldError };

export function ok<T>(value: T): Result<T> {
	return { ok: true, value };
}

export function err<T>(error: TagfoldError): Result<T> {
	return { ok: false, error };
}

/**
 * Run `fn`, turning a thrown TagfoldError into a failed Result.
 * Anything else propagates.
 */
export function attempt<T>(fn: () => T): Result<T> {
	try {
		return ok(fn());
	} catch (e) {
		if (e instanceof TagfoldError) return err(e);
		throw e;
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export type ValidationResult<T> =
	| { valid: true; errors: []; value: T }
	| { valid: false; errors: ValidationError[] };

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

/**
 * Render validation errors as a single TagfoldError.
 */
export function validationFailure(errors: readonly ValidationError[]): TagfoldError {
	return new TagfoldError(
		ErrorCodes.ValidationError,
		"Validation failed: " +
			errors.map((e) => e.path + ": " + e.message).join("; "),
	);
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
