// tagfold Expression Builders
// Shorthand for writing expressions in TypeScript

import type {
	ApplyExpr,
	CallExpr,
	ConstructExpr,
	Expr,
	IfExpr,
	Kind,
	LambdaExpr,
	LetExpr,
	LitExpr,
	MatchCase,
	MatchExpr,
	MatchFallback,
	Param,
	VarExpr,
} from "./types.js";

export const litInt = (value: number): LitExpr => ({ kind: "lit", type: { kind: "int" }, value });
export const litStr = (value: string): LitExpr => ({ kind: "lit", type: { kind: "string" }, value });
export const litBool = (value: boolean): LitExpr => ({ kind: "lit", type: { kind: "bool" }, value });

export const varRef = (name: string): VarExpr => ({ kind: "var", name });

export function construct(
	type: string,
	ctor: string,
	args: Expr[] = [],
	typeArgs: Kind[] = [],
): ConstructExpr {
	return typeArgs.length > 0
		? { kind: "construct", type, typeArgs, ctor, args }
		: { kind: "construct", type, ctor, args };
}

export const caseOf = (ctor: string, binds: string[], body: Expr): MatchCase => ({ ctor, binds, body });

export function match(
	on: string,
	scrutinee: Expr,
	cases: MatchCase[],
	otherwise?: MatchFallback,
): MatchExpr {
	return otherwise !== undefined
		? { kind: "match", on, scrutinee, cases, otherwise }
		: { kind: "match", on, scrutinee, cases };
}

export function apply(fn: Expr | string, args: Expr[], typeArgs: Kind[] = []): ApplyExpr {
	const callee = typeof fn === "string" ? varRef(fn) : fn;
	return typeArgs.length > 0
		? { kind: "apply", fn: callee, typeArgs, args }
		: { kind: "apply", fn: callee, args };
}

export const callOp = (ns: string, name: string, ...args: Expr[]): CallExpr => ({ kind: "call", ns, name, args });

export const ifExpr = (cond: Expr, then: Expr, otherwise: Expr): IfExpr => ({ kind: "if", cond, then, else: otherwise });

export const letExpr = (name: string, value: Expr, body: Expr): LetExpr => ({ kind: "let", name, value, body });

export const param = (name: string, type: Kind): Param => ({ name, type });

export const lambda = (params: Param[], returns: Kind, body: Expr): LambdaExpr => ({ kind: "lambda", params, returns, body });
