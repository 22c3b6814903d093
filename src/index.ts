// tagfold - Algebraic data types with exhaustive pattern matching
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	AdtKind, ApplyExpr, BoolVal, CallExpr, ClosureVal, ConstructExpr, ConstructorDef,
	Expr, FnDef, FnKind, IfExpr, IntVal, Kind, LambdaExpr, LetExpr, LibraryDocument,
	LitExpr, MatchCase, MatchExpr, MatchFallback, Param, ParamKind, PrimitiveKind,
	ProgramDocument, StringVal, TypeDef, Value, VarExpr, VariantVal,
} from "./types.js";

export type { Defs, TypeEnv, ValueEnv } from "./env.js";

export type { ErrorCode, Result, ValidationError, ValidationResult } from "./errors.js";

export type { OperandKind, Operator, OperatorRegistry } from "./domains/registry.js";

export type { ConstructorInfo, TypeInfo } from "./type-registry.js";

//==============================================================================
// Kind and Value Constructors
//==============================================================================

export {
	adtKind, boolKind, fnKind, intKind, paramKind, stringKind,
	boolVal, intVal, stringVal,
	isClosure, isVariant,
} from "./types.js";

export { kindEqual, kindOf, substituteKind } from "./kinds.js";

//==============================================================================
// Errors
//==============================================================================

export { ErrorCodes, TagfoldError, attempt, err, ok } from "./errors.js";

//==============================================================================
// Registries and Evaluation
//==============================================================================

export { TypeRegistry } from "./type-registry.js";
export { constructVariant } from "./construct.js";
export { compileMatch, selectCase } from "./match.js";
export { DEFAULT_MAX_DEPTH, Evaluator, type EvalOptions } from "./evaluator.js";
export { emptyDefs, emptyValueEnv, extendValueEnv } from "./env.js";

//==============================================================================
// Kernel Operators
//==============================================================================

export { defineOperator, lookupOperator, mergeRegistries, registerOperator } from "./domains/registry.js";
export { createCoreRegistry, valueEqual } from "./domains/core.js";
export { createBoolRegistry } from "./domains/bool.js";
export { createStringRegistry } from "./domains/string.js";
export { createKernelRegistry } from "./stdlib/kernel.js";

//==============================================================================
// Prelude and Programs
//==============================================================================

export {
	createEvaluator, type EvaluatorOptions,
	eitherKind, listKind, natKind, optionKind, pairKind,
	listOf, listToArray, natOf, noneOf, pairOf, someOf,
} from "./stdlib/prelude.js";
export { loadLibrary, loadLibraryFile } from "./stdlib/loader.js";
export { runProgram, runValidProgram, type ProgramOptions, type ProgramRun } from "./program.js";

//==============================================================================
// Documents
//==============================================================================

export { validateLibrary, validateProgram } from "./validator.js";
export { LibraryDocumentSchema, ProgramDocumentSchema } from "./zod-schemas.js";
export { librarySchema, programSchema } from "./schemas.js";

//==============================================================================
// Printing and Builders
//==============================================================================

export { formatKind, formatSignature, formatValue, type FormatOptions } from "./print.js";
export * from "./exprs.js";
