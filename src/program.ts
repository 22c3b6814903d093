// tagfold Program Runner
// Validates a program document, loads its types and definitions, then
// evaluates its result expression

import { err, type Result, validationFailure } from "./errors.js";
import type { EvalOptions, Evaluator } from "./evaluator.js";
import { loadLibrary } from "./stdlib/loader.js";
import { createEvaluator } from "./stdlib/prelude.js";
import type { ProgramDocument, Value } from "./types.js";
import { validateProgram } from "./validator.js";

export interface ProgramOptions extends EvalOptions {
	/** Load the prelude before the program (default true) */
	prelude?: boolean | undefined;
}

export interface ProgramRun {
	doc: ProgramDocument;
	evaluator: Evaluator;
	result: Result<Value>;
}

/**
 * Run a program that has already been validated.
 */
export function runValidProgram(doc: ProgramDocument, options: ProgramOptions = {}): ProgramRun {
	const evaluator = createEvaluator({ prelude: options.prelude });
	const loaded = loadLibrary(evaluator, doc);
	const result: Result<Value> = loaded.ok
		? evaluator.evaluate(doc.result, undefined, options)
		: err(loaded.error);
	return { doc, evaluator, result };
}

/**
 * Validate and run a program document given as parsed JSON.
 */
export function runProgram(doc: unknown, options: ProgramOptions = {}): Result<Value> {
	const validation = validateProgram(doc);
	if (!validation.valid) return err(validationFailure(validation.errors));
	return runValidProgram(validation.value, options).result;
}
