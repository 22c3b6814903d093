// tagfold Type Definitions
// Kind, Value and Expression domains

import type { TypeEnv, ValueEnv } from "./env.js";
import type { AdtKind, Expr, FnKind, Kind } from "./zod-schemas.js";

export type {
	AdtKind,
	ApplyExpr,
	BoolKind,
	CallExpr,
	ConstructExpr,
	ConstructorDef,
	Expr,
	FnDef,
	FnKind,
	IfExpr,
	IntKind,
	Kind,
	LambdaExpr,
	LetExpr,
	LibraryDocument,
	LitExpr,
	MatchCase,
	MatchExpr,
	MatchFallback,
	Param,
	ParamKind,
	PrimitiveKind,
	ProgramDocument,
	StringKind,
	TypeDef,
	VarExpr,
} from "./zod-schemas.js";

//==============================================================================
// Value Domain (v - runtime values)
//==============================================================================

export type Value =
	| IntVal
	| StringVal
	| BoolVal
	| VariantVal
	| ClosureVal;

export interface IntVal {
	readonly kind: "int";
	readonly value: number;
}

export interface StringVal {
	readonly kind: "string";
	readonly value: string;
}

export interface BoolVal {
	readonly kind: "bool";
	readonly value: boolean;
}

/**
 * Tagged value. `type` is fully resolved (no type parameters), `tag` is the
 * constructor's position in its type definition.
 */
export interface VariantVal {
	readonly kind: "variant";
	readonly type: AdtKind;
	readonly ctor: string;
	readonly tag: number;
	readonly args: readonly Value[];
}

export interface ClosureVal {
	readonly kind: "closure";
	readonly type: FnKind;
	readonly name?: string | undefined;
	readonly params: readonly string[];
	readonly body: Expr;
	readonly env: ValueEnv;
	readonly typeEnv: TypeEnv;
}

//==============================================================================
// Type Guards
//==============================================================================

export function isVariant(v: Value): v is VariantVal {
	return v.kind === "variant";
}

export function isClosure(v: Value): v is ClosureVal {
	return v.kind === "closure";
}

//==============================================================================
// Value Constructors
//==============================================================================

export const intVal = (value: number): IntVal => ({ kind: "int", value });
export const stringVal = (value: string): StringVal => ({
	kind: "string",
	value,
});
export const boolVal = (value: boolean): BoolVal => ({ kind: "bool", value });

//==============================================================================
// Kind Constructors
//==============================================================================

export const intKind: Kind = { kind: "int" };
export const stringKind: Kind = { kind: "string" };
export const boolKind: Kind = { kind: "bool" };
export const adtKind = (name: string, args: Kind[] = []): AdtKind => ({
	kind: "adt",
	name,
	args,
});
export const paramKind = (name: string): Kind => ({ kind: "param", name });
export const fnKind = (params: Kind[], returns: Kind): FnKind => ({
	kind: "fn",
	params,
	returns,
});
