// tagfold Pattern Matching
// Compiles match expressions into tag-indexed dispatch tables

import { TagfoldError } from "./errors.js";
import { kindOf } from "./kinds.js";
import type { TypeInfo, TypeRegistry } from "./type-registry.js";
import { adtKind, paramKind, type Expr, type MatchExpr, type Value } from "./types.js";
import { walkExpr } from "./walk.js";

//==============================================================================
// Compiled Match
//==============================================================================

/** Table entry for a constructor handled by the `otherwise` fallback */
export const FALLBACK = -1;

export interface CompiledMatch {
	readonly expr: MatchExpr;
	readonly type: TypeInfo;
	/** Case index per constructor tag, or FALLBACK */
	readonly table: readonly number[];
}

export interface MatchSelection {
	body: Expr;
	bindings: [string, Value][];
}

/**
 * Resolve every case of `expr` against its type once.
 *
 * The first case (in declaration order) naming a constructor wins; later
 * cases for the same constructor are unreachable. Every constructor needs a
 * case or the fallback.
 */
export function compileMatch(registry: TypeRegistry, expr: MatchExpr): CompiledMatch {
	const type = registry.require(expr.on);
	const table: number[] = type.constructors.map(() => FALLBACK);

	expr.cases.forEach((c, index) => {
		const info = type.byName.get(c.ctor);
		if (info === undefined) throw TagfoldError.unknownConstructor(type.name, c.ctor);
		if (c.binds.length !== info.args.length) {
			throw TagfoldError.arityMismatch("pattern " + c.ctor, info.args.length, c.binds.length);
		}
		if (table[info.tag] === FALLBACK) table[info.tag] = index;
	});

	if (expr.otherwise === undefined) {
		const missing = type.constructors
			.filter((c) => table[c.tag] === FALLBACK)
			.map((c) => c.name);
		if (missing.length > 0) throw TagfoldError.nonExhaustiveMatch(type.name, missing);
	}

	return { expr, type, table };
}

/**
 * Pick the case for `scrutinee` and bind its arguments by position.
 * A bind named `_` is skipped.
 */
export function selectCase(compiled: CompiledMatch, scrutinee: Value): MatchSelection {
	const { expr, type, table } = compiled;
	if (scrutinee.kind !== "variant" || scrutinee.type.name !== type.name) {
		throw TagfoldError.kindMismatch(
			adtKind(type.name, type.params.map(paramKind)),
			kindOf(scrutinee),
			"match scrutinee",
		);
	}

	const index = table[scrutinee.tag] ?? FALLBACK;
	const chosen = index === FALLBACK ? undefined : expr.cases[index];
	if (chosen !== undefined) {
		const args = scrutinee.args;
		const bindings: [string, Value][] = [];
		chosen.binds.forEach((name, i) => {
			const arg = args[i];
			if (name !== "_" && arg !== undefined) bindings.push([name, arg]);
		});
		return { body: chosen.body, bindings };
	}

	if (expr.otherwise === undefined) {
		throw TagfoldError.nonExhaustiveMatch(type.name, [scrutinee.ctor]);
	}
	const bind = expr.otherwise.bind;
	return {
		body: expr.otherwise.body,
		bindings: bind !== undefined && bind !== "_" ? [[bind, scrutinee]] : [],
	};
}

//==============================================================================
// Traversal
//==============================================================================

/**
 * Visit every match expression nested in `expr`, outermost first.
 */
export function forEachMatch(expr: Expr, visit: (m: MatchExpr) => void): void {
	walkExpr(expr, (e) => {
		if (e.kind === "match") visit(e);
	});
}
