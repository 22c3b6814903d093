// tagfold Operator Registry
// Kernel operators invoked by `call` expressions

import { TagfoldError } from "../errors.js";
import { kindEqual, kindOf } from "../kinds.js";
import type { Kind, Value } from "../types.js";

//==============================================================================
// Operator Types
//==============================================================================

/** Operand kind; "any" accepts every value */
export type OperandKind = Kind | { kind: "any" };

export interface Operator {
	ns: string;
	name: string;
	params: readonly OperandKind[];
	returns: OperandKind;
	fn: (...args: Value[]) => Value;
}

export type OperatorRegistry = ReadonlyMap<string, Operator>;

//==============================================================================
// Operator Builder
//==============================================================================

class OperatorBuilder {
	private readonly ns: string;
	private readonly name: string;
	private params: OperandKind[] = [];
	private returns: OperandKind = { kind: "any" };
	private impl: ((...args: Value[]) => Value) | undefined;

	constructor(ns: string, name: string) {
		this.ns = ns;
		this.name = name;
	}

	setParams(...params: OperandKind[]): this {
		this.params = params;
		return this;
	}

	setReturns(returns: OperandKind): this {
		this.returns = returns;
		return this;
	}

	setImpl(fn: (...args: Value[]) => Value): this {
		this.impl = fn;
		return this;
	}

	build(): Operator {
		if (this.impl === undefined) {
			throw new Error("Operator " + this.ns + ":" + this.name + " has no implementation");
		}
		return {
			ns: this.ns,
			name: this.name,
			params: this.params,
			returns: this.returns,
			fn: this.impl,
		};
	}
}

export function defineOperator(ns: string, name: string): OperatorBuilder {
	return new OperatorBuilder(ns, name);
}

//==============================================================================
// Registry Functions
//==============================================================================

export function operatorKey(ns: string, name: string): string {
	return ns + ":" + name;
}

export function registerOperator(registry: OperatorRegistry, op: Operator): OperatorRegistry {
	const next = new Map(registry);
	next.set(operatorKey(op.ns, op.name), op);
	return next;
}

export function lookupOperator(
	registry: OperatorRegistry,
	ns: string,
	name: string,
): Operator | undefined {
	return registry.get(operatorKey(ns, name));
}

export function mergeRegistries(...registries: OperatorRegistry[]): OperatorRegistry {
	const merged = new Map<string, Operator>();
	for (const registry of registries) {
		for (const [key, op] of registry) merged.set(key, op);
	}
	return merged;
}

/**
 * Check arity and operand kinds, then run the operator.
 */
export function applyOperator(op: Operator, args: readonly Value[]): Value {
	if (args.length !== op.params.length) {
		throw TagfoldError.arityMismatch(
			"operator " + operatorKey(op.ns, op.name),
			op.params.length,
			args.length,
		);
	}
	op.params.forEach((param, i) => {
		const arg = args[i];
		if (param.kind === "any" || arg === undefined) return;
		const actual = kindOf(arg);
		if (!kindEqual(param, actual)) {
			throw TagfoldError.kindMismatch(
				param,
				actual,
				"operand " + String(i) + " of " + operatorKey(op.ns, op.name),
				i,
			);
		}
	});
	return op.fn(...args);
}

export function formatOperand(k: OperandKind, format: (k: Kind) => string): string {
	return k.kind === "any" ? "any" : format(k);
}
