// tagfold Zod Schemas
// Single source of truth for every document-serializable shape.
// Runtime-only types (Value, ClosureVal, ...) live in types.ts.
//
// Interfaces are written out by hand rather than taken from z.infer: the
// recursive schemas are declared as z.ZodType<ExplicitType>, which would
// otherwise erase the inferred types.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

/** Semantic version pattern */
const SemVer = z.string().regex(/^\d+\.\d+\.\d+(-[a-zA-Z0-9.]+)?$/);

/** Identifier used for types, constructors, functions and variables */
const Identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_']*$/);

//==============================================================================
// Kind Domain - Manual Interfaces
//==============================================================================

export interface IntKind { kind: "int" }
export interface StringKind { kind: "string" }
export interface BoolKind { kind: "bool" }
export interface AdtKind { kind: "adt"; name: string; args: Kind[] }
export interface ParamKind { kind: "param"; name: string }
export interface FnKind { kind: "fn"; params: Kind[]; returns: Kind }

export type PrimitiveKind = IntKind | StringKind | BoolKind;
export type Kind = PrimitiveKind | AdtKind | ParamKind | FnKind;

export interface ConstructorDef {
	name: string;
	args: Kind[];
}

export interface TypeDef {
	name: string;
	params?: string[] | undefined;
	constructors: ConstructorDef[];
}

//==============================================================================
// Expression Domain - Manual Interfaces
//==============================================================================

export interface LitExpr { kind: "lit"; type: PrimitiveKind; value: number | string | boolean }
export interface VarExpr { kind: "var"; name: string }
export interface ConstructExpr { kind: "construct"; type: string; typeArgs?: Kind[] | undefined; ctor: string; args: Expr[] }
export interface MatchCase { ctor: string; binds: string[]; body: Expr }
export interface MatchFallback { bind?: string | undefined; body: Expr }
export interface MatchExpr { kind: "match"; on: string; scrutinee: Expr; cases: MatchCase[]; otherwise?: MatchFallback | undefined }
export interface ApplyExpr { kind: "apply"; fn: Expr; typeArgs?: Kind[] | undefined; args: Expr[] }
export interface CallExpr { kind: "call"; ns: string; name: string; args: Expr[] }
export interface IfExpr { kind: "if"; cond: Expr; then: Expr; else: Expr }
export interface LetExpr { kind: "let"; name: string; value: Expr; body: Expr }
export interface Param { name: string; type: Kind }
export interface LambdaExpr { kind: "lambda"; params: Param[]; returns: Kind; body: Expr }

export type Expr =
	| LitExpr | VarExpr | ConstructExpr | MatchExpr | ApplyExpr
	| CallExpr | IfExpr | LetExpr | LambdaExpr;

//==============================================================================
// Definitions & Documents
//==============================================================================

export interface FnDef {
	name: string;
	typeParams?: string[] | undefined;
	params: Param[];
	returns: Kind;
	body: Expr;
}

export interface LibraryDocument {
	version: string;
	description?: string | undefined;
	types?: TypeDef[] | undefined;
	defs?: FnDef[] | undefined;
}

export interface ProgramDocument extends LibraryDocument {
	result: Expr;
	expected_result?: string | undefined;
	expected_error?: string | undefined;
}

//==============================================================================
// Zod Schemas - Kind Domain
//==============================================================================

export const IntKindSchema = z.object({ kind: z.literal("int") }).meta({ id: "IntKind", title: "Integer Kind", description: "Safe integer" });
export const StringKindSchema = z.object({ kind: z.literal("string") }).meta({ id: "StringKind", title: "String Kind", description: "UTF-16 string" });
export const BoolKindSchema = z.object({ kind: z.literal("bool") }).meta({ id: "BoolKind", title: "Boolean Kind", description: "Boolean truth value" });

export const PrimitiveKindSchema: z.ZodType<PrimitiveKind> = z.union([
	IntKindSchema,
	StringKindSchema,
	BoolKindSchema,
]).meta({ id: "PrimitiveKind", title: "Primitive Kind", description: "Kind of a literal value" });

export const AdtKindSchema: z.ZodType<AdtKind> = z.object({
	kind: z.literal("adt"),
	name: Identifier,
	get args() { return z.array(KindSchema); },
}).meta({ id: "AdtKind", title: "Variant Type Kind", description: "Registered variant type applied to explicit type arguments" });

export const ParamKindSchema = z.object({
	kind: z.literal("param"),
	name: Identifier,
}).meta({ id: "ParamKind", title: "Type Parameter Kind", description: "Type parameter bound by the enclosing type or function" });

export const FnKindSchema: z.ZodType<FnKind> = z.object({
	kind: z.literal("fn"),
	get params() { return z.array(KindSchema); },
	get returns() { return KindSchema; },
}).meta({ id: "FnKind", title: "Function Kind", description: "Function from parameter kinds to a return kind" });

/** Uses z.union (not discriminatedUnion) due to recursion. */
export const KindSchema: z.ZodType<Kind> = z.union([
	IntKindSchema,
	StringKindSchema,
	BoolKindSchema,
	AdtKindSchema,
	ParamKindSchema,
	FnKindSchema,
]).meta({ id: "Kind", title: "Kind", description: "Declared kind of a constructor argument, parameter or result" });

export const ConstructorDefSchema: z.ZodType<ConstructorDef> = z.object({
	name: Identifier,
	args: z.array(KindSchema),
}).meta({ id: "ConstructorDef", title: "Constructor Definition", description: "Named fixed-arity alternative of a variant type" });

export const TypeDefSchema: z.ZodType<TypeDef> = z.object({
	name: Identifier,
	params: z.array(Identifier).optional(),
	constructors: z.array(ConstructorDefSchema).min(1),
}).meta({ id: "TypeDef", title: "Type Definition", description: "Closed set of constructors forming a variant type" });

//==============================================================================
// Zod Schemas - Expression Domain
//==============================================================================

export const LitExprSchema: z.ZodType<LitExpr> = z.object({
	kind: z.literal("lit"),
	type: PrimitiveKindSchema,
	value: z.union([z.number(), z.string(), z.boolean()]),
}).meta({ id: "LitExpr", title: "Literal Expression", description: "Primitive constant with its kind" });

export const VarExprSchema = z.object({
	kind: z.literal("var"),
	name: Identifier,
}).meta({ id: "VarExpr", title: "Variable Expression", description: "Local binding or function definition by name" });

export const ConstructExprSchema: z.ZodType<ConstructExpr> = z.object({
	kind: z.literal("construct"),
	type: Identifier,
	typeArgs: z.array(KindSchema).optional(),
	ctor: Identifier,
	get args() { return z.array(ExprSchema); },
}).meta({ id: "ConstructExpr", title: "Construct Expression", description: "Application of a constructor to arguments" });

export const MatchCaseSchema: z.ZodType<MatchCase> = z.object({
	ctor: Identifier,
	binds: z.array(Identifier),
	get body() { return ExprSchema; },
}).meta({ id: "MatchCase", title: "Match Case", description: "Case for one constructor, binding its arguments by position" });

export const MatchFallbackSchema: z.ZodType<MatchFallback> = z.object({
	bind: Identifier.optional(),
	get body() { return ExprSchema; },
}).meta({ id: "MatchFallback", title: "Match Fallback", description: "Wildcard case covering every constructor without a case" });

export const MatchExprSchema: z.ZodType<MatchExpr> = z.object({
	kind: z.literal("match"),
	on: Identifier,
	get scrutinee() { return ExprSchema; },
	get cases() { return z.array(MatchCaseSchema); },
	get otherwise() { return MatchFallbackSchema.optional(); },
}).meta({ id: "MatchExpr", title: "Match Expression", description: "Exhaustive dispatch on the constructor of a variant value" });

export const ApplyExprSchema: z.ZodType<ApplyExpr> = z.object({
	kind: z.literal("apply"),
	get fn() { return ExprSchema; },
	typeArgs: z.array(KindSchema).optional(),
	get args() { return z.array(ExprSchema); },
}).meta({ id: "ApplyExpr", title: "Apply Expression", description: "Strict application of a function definition or closure" });

export const CallExprSchema: z.ZodType<CallExpr> = z.object({
	kind: z.literal("call"),
	ns: Identifier,
	name: Identifier,
	get args() { return z.array(ExprSchema); },
}).meta({ id: "CallExpr", title: "Call Expression", description: "Namespaced kernel operator call (e.g., core:add)" });

export const IfExprSchema: z.ZodType<IfExpr> = z.object({
	kind: z.literal("if"),
	get cond() { return ExprSchema; },
	get then() { return ExprSchema; },
	get else() { return ExprSchema; },
}).meta({ id: "IfExpr", title: "If Expression", description: "Conditional on a boolean" });

export const LetExprSchema: z.ZodType<LetExpr> = z.object({
	kind: z.literal("let"),
	name: Identifier,
	get value() { return ExprSchema; },
	get body() { return ExprSchema; },
}).meta({ id: "LetExpr", title: "Let Expression", description: "Local binding that scopes a name to a value within a body" });

export const ParamSchema: z.ZodType<Param> = z.object({
	name: Identifier,
	type: KindSchema,
}).meta({ id: "Param", title: "Parameter", description: "Named parameter with its declared kind" });

export const LambdaExprSchema: z.ZodType<LambdaExpr> = z.object({
	kind: z.literal("lambda"),
	params: z.array(ParamSchema),
	returns: KindSchema,
	get body() { return ExprSchema; },
}).meta({ id: "LambdaExpr", title: "Lambda Expression", description: "Anonymous function capturing its environment" });

export const ExprSchema: z.ZodType<Expr> = z.union([
	LitExprSchema,
	VarExprSchema,
	ConstructExprSchema,
	MatchExprSchema,
	ApplyExprSchema,
	CallExprSchema,
	IfExprSchema,
	LetExprSchema,
	LambdaExprSchema,
]).meta({ id: "Expr", title: "Expression", description: "Union of all tagfold expressions" });

//==============================================================================
// Zod Schemas - Definitions & Documents
//==============================================================================

export const FnDefSchema: z.ZodType<FnDef> = z.object({
	name: Identifier,
	typeParams: z.array(Identifier).optional(),
	params: z.array(ParamSchema),
	returns: KindSchema,
	body: ExprSchema,
}).meta({ id: "FnDef", title: "Function Definition", description: "Named, possibly recursive, possibly generic function" });

const libraryShape = {
	version: SemVer,
	description: z.string().optional(),
	types: z.array(TypeDefSchema).optional(),
	defs: z.array(FnDefSchema).optional(),
};

export const LibraryDocumentSchema: z.ZodType<LibraryDocument> = z.object(libraryShape)
	.meta({ id: "LibraryDocument", title: "Library Document", description: "Types and function definitions without a result" });

export const ProgramDocumentSchema: z.ZodType<ProgramDocument> = z.object({
	...libraryShape,
	result: ExprSchema,
	expected_result: z.string().optional(),
	expected_error: z.string().optional(),
}).meta({ id: "ProgramDocument", title: "Program Document", description: "Types, definitions and a result expression" });
