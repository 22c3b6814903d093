// tagfold Expression Traversal

import type { Expr } from "./types.js";

/**
 * Direct sub-expressions of `expr`, in evaluation order.
 */
export function children(expr: Expr): Expr[] {
	switch (expr.kind) {
	case "lit":
	case "var":
		return [];
	case "construct":
	case "call":
		return expr.args;
	case "apply":
		return [expr.fn, ...expr.args];
	case "match":
		return [
			expr.scrutinee,
			...expr.cases.map((c) => c.body),
			...(expr.otherwise !== undefined ? [expr.otherwise.body] : []),
		];
	case "if":
		return [expr.cond, expr.then, expr.else];
	case "let":
		return [expr.value, expr.body];
	case "lambda":
		return [expr.body];
	}
}

/**
 * Visit `expr` and every nested expression, parents before children.
 */
export function walkExpr(expr: Expr, visit: (e: Expr) => void): void {
	const stack: Expr[] = [expr];
	for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
		visit(next);
		stack.push(...children(next).slice().reverse());
	}
}
