// tagfold Core Domain
// Integer arithmetic, comparison and structural equality

import { TagfoldError } from "../errors.js";
import { kindOf } from "../kinds.js";
import { boolKind, boolVal, intKind, intVal, type Value } from "../types.js";
import {
	defineOperator,
	type Operator,
	type OperatorRegistry,
	registerOperator,
} from "./registry.js";

//==============================================================================
// Helper Functions
//==============================================================================

export function expectInt(v: Value): number {
	if (v.kind === "int") return v.value;
	throw TagfoldError.kindMismatch(intKind, kindOf(v), "integer operand");
}

/**
 * Structural equality. Closures are never equal to anything. Variant
 * arguments are compared from a worklist, so deep values need no host stack.
 */
export function valueEqual(a: Value, b: Value): boolean {
	const pending: [Value, Value][] = [[a, b]];
	for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
		const [x, y] = pair;
		switch (x.kind) {
		case "int":
			if (y.kind !== "int" || y.value !== x.value) return false;
			break;
		case "string":
			if (y.kind !== "string" || y.value !== x.value) return false;
			break;
		case "bool":
			if (y.kind !== "bool" || y.value !== x.value) return false;
			break;
		case "variant":
			if (
				y.kind !== "variant" ||
				x.type.name !== y.type.name ||
				x.tag !== y.tag ||
				x.args.length !== y.args.length
			) {
				return false;
			}
			x.args.forEach((arg, i) => {
				const other = y.args[i];
				if (other !== undefined) pending.push([arg, other]);
			});
			break;
		case "closure":
			return false;
		}
	}
	return true;
}

/**
 * Results must stay inside the safe integer range of the int kind.
 */
function checkedInt(name: string, n: number): number {
	if (!Number.isSafeInteger(n)) throw TagfoldError.integerOverflow("core:" + name, n);
	return n;
}

function intBinary(name: string, op: (a: number, b: number) => number): Operator {
	return defineOperator("core", name)
		.setParams(intKind, intKind)
		.setReturns(intKind)
		.setImpl((a, b) => intVal(checkedInt(name, op(expectInt(a), expectInt(b)))))
		.build();
}

function intCompare(name: string, op: (a: number, b: number) => boolean): Operator {
	return defineOperator("core", name)
		.setParams(intKind, intKind)
		.setReturns(boolKind)
		.setImpl((a, b) => boolVal(op(expectInt(a), expectInt(b))))
		.build();
}

function nonZero(n: number): number {
	if (n === 0) throw TagfoldError.divideByZero();
	return n;
}

//==============================================================================
// Arithmetic Operators
//==============================================================================

const add = intBinary("add", (a, b) => a + b);
const sub = intBinary("sub", (a, b) => a - b);
const mul = intBinary("mul", (a, b) => a * b);
// Truncating division, as on the integers of most hosts
const div = intBinary("div", (a, b) => Math.trunc(a / nonZero(b)));
const mod = intBinary("mod", (a, b) => a % nonZero(b));

const neg: Operator = defineOperator("core", "neg")
	.setParams(intKind)
	.setReturns(intKind)
	.setImpl((a) => intVal(checkedInt("neg", -expectInt(a))))
	.build();

//==============================================================================
// Comparison Operators
//==============================================================================

const lt = intCompare("lt", (a, b) => a < b);
const lte = intCompare("lte", (a, b) => a <= b);
const gt = intCompare("gt", (a, b) => a > b);
const gte = intCompare("gte", (a, b) => a >= b);

const eq: Operator = defineOperator("core", "eq")
	.setParams({ kind: "any" }, { kind: "any" })
	.setReturns(boolKind)
	.setImpl((a, b) => boolVal(valueEqual(a, b)))
	.build();

const neq: Operator = defineOperator("core", "neq")
	.setParams({ kind: "any" }, { kind: "any" })
	.setReturns(boolKind)
	.setImpl((a, b) => boolVal(!valueEqual(a, b)))
	.build();

//==============================================================================
// Registry Creation
//==============================================================================

/**
 * Create the core domain registry with all arithmetic and comparison operators.
 */
export function createCoreRegistry(): OperatorRegistry {
	const operators: Operator[] = [
		add, sub, mul, div, mod, neg,
		eq, neq, lt, lte, gt, gte,
	];

	return operators.reduce<OperatorRegistry>(
		(reg, op) => registerOperator(reg, op),
		new Map(),
	);
}
