// tagfold Document Validator
// Two-phase validation: Zod safeParse for structure, then semantic checks.

import type { z } from "zod/v4";
import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import type { Expr, LibraryDocument, LitExpr, ProgramDocument } from "./types.js";
import { children } from "./walk.js";
import { LibraryDocumentSchema, ProgramDocumentSchema } from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map((issue) => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Semantic Checks
//==============================================================================

function checkUniqueNames(
	errors: ValidationError[],
	path: string,
	names: readonly string[],
	what: string,
): void {
	const seen = new Set<string>();
	names.forEach((name, i) => {
		if (seen.has(name)) {
			errors.push({ path: path + "." + String(i) + ".name", message: "Duplicate " + what + ": " + name, value: name });
		}
		seen.add(name);
	});
}

function litProblem(expr: LitExpr): string | undefined {
	const v = expr.value;
	switch (expr.type.kind) {
	case "int":
		return typeof v === "number" && Number.isSafeInteger(v) ? undefined : "int literal must be a safe integer";
	case "string":
		return typeof v === "string" ? undefined : "string literal must be a string";
	case "bool":
		return typeof v === "boolean" ? undefined : "bool literal must be a boolean";
	}
}

/**
 * Check literal values against their declared kinds. Paths are approximate
 * below the root expression: they name the chain of expression kinds.
 */
function checkLiterals(errors: ValidationError[], path: string, expr: Expr): void {
	if (expr.kind === "lit") {
		const problem = litProblem(expr);
		if (problem !== undefined) errors.push({ path, message: problem, value: expr.value });
		return;
	}
	children(expr).forEach((child, i) => {
		checkLiterals(errors, path + "." + expr.kind + "[" + String(i) + "]", child);
	});
}

function checkLibrary(doc: LibraryDocument): ValidationError[] {
	const errors: ValidationError[] = [];
	const types = doc.types ?? [];
	const defs = doc.defs ?? [];
	checkUniqueNames(errors, "types", types.map((t) => t.name), "type");
	checkUniqueNames(errors, "defs", defs.map((d) => d.name), "definition");
	defs.forEach((def, i) => {
		checkLiterals(errors, "defs." + String(i) + ".body", def.body);
	});
	return errors;
}

//==============================================================================
// Public API
//==============================================================================

export function validateLibrary(doc: unknown): ValidationResult<LibraryDocument> {
	const parsed = LibraryDocumentSchema.safeParse(doc);
	if (!parsed.success) return invalidResult(zodToValidationErrors(parsed.error));
	const errors = checkLibrary(parsed.data);
	return errors.length > 0 ? invalidResult(errors) : validResult(parsed.data);
}

export function validateProgram(doc: unknown): ValidationResult<ProgramDocument> {
	const parsed = ProgramDocumentSchema.safeParse(doc);
	if (!parsed.success) return invalidResult(zodToValidationErrors(parsed.error));
	const errors = checkLibrary(parsed.data);
	checkLiterals(errors, "result", parsed.data.result);
	return errors.length > 0 ? invalidResult(errors) : validResult(parsed.data);
}
