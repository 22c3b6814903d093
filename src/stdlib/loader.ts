// tagfold Library Loader
// Registers the types and definitions of validated library documents

import { readFileSync } from "node:fs";
import {
	attempt,
	err,
	ErrorCodes,
	type Result,
	TagfoldError,
	validationFailure,
} from "../errors.js";
import type { Evaluator } from "../evaluator.js";
import type { LibraryDocument } from "../types.js";
import { validateLibrary } from "../validator.js";

/**
 * Register a library's types (in order, so later types may refer to earlier
 * ones), then all of its definitions as one group.
 */
export function loadLibrary(evaluator: Evaluator, doc: LibraryDocument): Result<void> {
	for (const type of doc.types ?? []) {
		const registered = evaluator.types.register(type);
		if (!registered.ok) return registered;
	}
	return evaluator.defineFunctions(doc.defs ?? []);
}

/**
 * Read, validate and load a library document from disk.
 */
export function loadLibraryFile(evaluator: Evaluator, path: string): Result<void> {
	const parsed = attempt((): unknown => {
		try {
			return JSON.parse(readFileSync(path, "utf-8"));
		} catch (e) {
			throw new TagfoldError(
				ErrorCodes.ValidationError,
				"Cannot read library " + path + ": " + (e instanceof Error ? e.message : String(e)),
			);
		}
	});
	if (!parsed.ok) return parsed;

	const validation = validateLibrary(parsed.value);
	if (!validation.valid) return err(validationFailure(validation.errors));
	return loadLibrary(evaluator, validation.value);
}
