// tagfold Kinds
// Structural equality, substitution and reference checks over kinds

import type { TypeEnv } from "./env.js";
import { TagfoldError } from "./errors.js";
import type { Kind, Value } from "./types.js";

//==============================================================================
// Equality
//==============================================================================

export function kindEqual(a: Kind, b: Kind): boolean {
	switch (a.kind) {
	case "int":
	case "string":
	case "bool":
		return a.kind === b.kind;
	case "param":
		return b.kind === "param" && a.name === b.name;
	case "adt":
		return b.kind === "adt" && a.name === b.name && kindsEqual(a.args, b.args);
	case "fn":
		return b.kind === "fn" && kindsEqual(a.params, b.params) && kindEqual(a.returns, b.returns);
	}
}

function kindsEqual(as: readonly Kind[], bs: readonly Kind[]): boolean {
	return as.length === bs.length && as.every((k, i) => {
		const other = bs[i];
		return other !== undefined && kindEqual(k, other);
	});
}

//==============================================================================
// Kind of a runtime value
//==============================================================================

export function kindOf(v: Value): Kind {
	switch (v.kind) {
	case "int":
		return { kind: "int" };
	case "string":
		return { kind: "string" };
	case "bool":
		return { kind: "bool" };
	case "variant":
	case "closure":
		return v.type;
	}
}

//==============================================================================
// Substitution
//==============================================================================

/**
 * Replace every type parameter with its binding in `env`.
 * An unbound parameter is an UnknownKindReference.
 */
export function substituteKind(k: Kind, env: TypeEnv): Kind {
	switch (k.kind) {
	case "int":
	case "string":
	case "bool":
		return k;
	case "param": {
		const bound = env.get(k.name);
		if (bound === undefined) {
			throw TagfoldError.unknownKindReference(k.name, "unbound type parameter");
		}
		return bound;
	}
	case "adt":
		return k.args.length === 0
			? k
			: { kind: "adt", name: k.name, args: k.args.map((a) => substituteKind(a, env)) };
	case "fn":
		return {
			kind: "fn",
			params: k.params.map((p) => substituteKind(p, env)),
			returns: substituteKind(k.returns, env),
		};
	}
}

/**
 * Pair type parameters with explicit type arguments.
 */
export function bindTypeParams(
	owner: string,
	params: readonly string[],
	args: readonly Kind[],
): TypeEnv {
	if (params.length !== args.length) {
		throw TagfoldError.arityMismatch("type arguments of " + owner, params.length, args.length);
	}
	const env = new Map<string, Kind>();
	args.forEach((arg, i) => {
		const name = params[i];
		if (name !== undefined) env.set(name, arg);
	});
	return env;
}

//==============================================================================
// Reference Checks
//==============================================================================

export interface KindScope {
	/** Number of type parameters of a known type, or undefined when unknown */
	arityOf(name: string): number | undefined;
	params: ReadonlySet<string>;
	/** Human-readable location used in error messages */
	context: string;
}

/**
 * Check that every type and parameter a kind names is in scope, and that
 * every type is applied to the right number of arguments.
 */
export function checkKindRefs(k: Kind, scope: KindScope): void {
	switch (k.kind) {
	case "int":
	case "string":
	case "bool":
		return;
	case "param":
		if (!scope.params.has(k.name)) {
			throw TagfoldError.unknownKindReference(k.name, scope.context);
		}
		return;
	case "adt": {
		const arity = scope.arityOf(k.name);
		if (arity === undefined) {
			throw TagfoldError.unknownKindReference(k.name, scope.context);
		}
		if (arity !== k.args.length) {
			throw TagfoldError.arityMismatch("type arguments of " + k.name, arity, k.args.length);
		}
		for (const a of k.args) checkKindRefs(a, scope);
		return;
	}
	case "fn":
		for (const p of k.params) checkKindRefs(p, scope);
		checkKindRefs(k.returns, scope);
		return;
	}
}

/**
 * Throw DuplicateParameter for the first name that appears twice.
 */
export function checkDistinct(owner: string, names: readonly string[]): void {
	const seen = new Set<string>();
	for (const name of names) {
		if (seen.has(name)) throw TagfoldError.duplicateParameter(owner, name);
		seen.add(name);
	}
}
