// tagfold Evaluator
// Strict evaluation on an explicit continuation stack, bounded by call depth

import { constructVariant } from "./construct.js";
import {
	applyOperator,
	lookupOperator,
	type Operator,
	type OperatorRegistry,
} from "./domains/registry.js";
import {
	type Defs,
	type TypeEnv,
	type ValueEnv,
	emptyDefs,
	emptyTypeEnv,
	emptyValueEnv,
	extendValueEnv,
	extendValueEnvMany,
	lookupDef,
	lookupValue,
	registerDef,
} from "./env.js";
import {
	attempt,
	err,
	exhaustive,
	ok,
	type Result,
	TagfoldError,
} from "./errors.js";
import {
	bindTypeParams,
	checkDistinct,
	checkKindRefs,
	kindEqual,
	kindOf,
	type KindScope,
	substituteKind,
} from "./kinds.js";
import { type CompiledMatch, compileMatch, forEachMatch, selectCase } from "./match.js";
import { formatKind, formatValue } from "./print.js";
import { createKernelRegistry } from "./stdlib/kernel.js";
import { type TypeInfo, TypeRegistry } from "./type-registry.js";
import {
	type AdtKind,
	adtKind,
	boolKind,
	boolVal,
	type ApplyExpr,
	type ClosureVal,
	type ConstructorDef,
	type Expr,
	type FnDef,
	fnKind,
	type IfExpr,
	intVal,
	type Kind,
	type LambdaExpr,
	type LetExpr,
	type LitExpr,
	type MatchExpr,
	stringVal,
	type Value,
	type VariantVal,
} from "./types.js";
import { walkExpr } from "./walk.js";

//==============================================================================
// Evaluation Options
//==============================================================================

export const DEFAULT_MAX_DEPTH = 2000;

export interface EvalOptions {
	/** Maximum number of active function frames before StackExhausted */
	maxDepth?: number | undefined;
	/** Log every function entry through `log` */
	trace?: boolean | undefined;
	log?: ((line: string) => void) | undefined;
}

//==============================================================================
// Evaluator State
//==============================================================================

interface EvalContext {
	depth: number;
	maxDepth: number;
	trace: boolean;
	log: (line: string) => void;
}

interface Scope {
	env: ValueEnv;
	types: TypeEnv;
}

/** A function ready to be entered, whether a definition or a closure */
interface Frame {
	name: string;
	params: readonly string[];
	paramKinds: readonly Kind[];
	returns: Kind;
	body: Expr;
	env: ValueEnv;
	types: TypeEnv;
}

/** An expression still to reduce, or a value on its way back */
type Control =
	| { tag: "Expr"; e: Expr; scope: Scope }
	| { tag: "Val"; v: Value };

/** Where evaluated arguments go once the last one is ready */
type ArgTarget =
	| { tag: "construct"; type: AdtKind; ctor: string }
	| { tag: "call"; op: Operator }
	| { tag: "invoke"; frame: Frame };

/** Continuation frames, pushed and popped at the end of the stack */
type Kont =
	| { tag: "KArgs"; target: ArgTarget; args: readonly Expr[]; acc: Value[]; scope: Scope }
	| { tag: "KApplyFn"; args: readonly Expr[]; typeArgs: readonly Kind[]; scope: Scope }
	| { tag: "KMatch"; compiled: CompiledMatch; scope: Scope }
	| { tag: "KIf"; expr: IfExpr; scope: Scope }
	| { tag: "KLet"; expr: LetExpr; scope: Scope }
	| { tag: "KReturn"; frame: Frame };

function createContext(options: EvalOptions | undefined): EvalContext {
	return {
		depth: 0,
		maxDepth: options?.maxDepth ?? DEFAULT_MAX_DEPTH,
		trace: options?.trace ?? false,
		log: options?.log ?? ((line) => { console.error(line); }),
	};
}

function isHostStackOverflow(e: unknown): boolean {
	return e instanceof RangeError && /call stack/i.test(e.message);
}

//==============================================================================
// Evaluator Class
//==============================================================================

export class Evaluator {
	private readonly _types: TypeRegistry;
	private readonly _operators: OperatorRegistry;
	private readonly _defs: Defs;
	private readonly compiled = new WeakMap<MatchExpr, CompiledMatch>();

	constructor(
		types: TypeRegistry = new TypeRegistry(),
		operators: OperatorRegistry = createKernelRegistry(),
		defs: Defs = emptyDefs(),
	) {
		this._types = types;
		this._operators = operators;
		this._defs = defs;
	}

	get types(): TypeRegistry {
		return this._types;
	}

	get operators(): OperatorRegistry {
		return this._operators;
	}

	get defs(): Defs {
		return this._defs;
	}

	registerType(
		name: string,
		constructors: readonly ConstructorDef[],
		params: readonly string[] = [],
	): Result<TypeInfo> {
		return this._types.registerType(name, constructors, params);
	}

	defineFunction(def: FnDef): Result<void> {
		return this.defineFunctions([def]);
	}

	/**
	 * Define a group of functions at once so they may refer to each other.
	 * Nothing is defined if any of them fails its checks.
	 */
	defineFunctions(defs: readonly FnDef[]): Result<void> {
		return attempt(() => {
			const staged = new Set<string>();
			for (const def of defs) {
				if (this._defs.has(def.name) || staged.has(def.name)) {
					throw TagfoldError.duplicateDefinition(def.name);
				}
				staged.add(def.name);
				this.checkDefinition(def);
			}
			for (const def of defs) registerDef(this._defs, def);
		});
	}

	/**
	 * Construct a value of `type` applied to closed `typeArgs`.
	 */
	construct(
		type: string,
		ctor: string,
		args: readonly Value[],
		typeArgs: readonly Kind[] = [],
	): Result<VariantVal> {
		return attempt(() => {
			const resolved = this.resolveKinds(typeArgs, emptyTypeEnv());
			return constructVariant(this._types, adtKind(type, resolved), ctor, args);
		});
	}

	/**
	 * Evaluate a closed expression. Errors leave the evaluator untouched, so
	 * a failed evaluation never affects the next one.
	 */
	evaluate(expr: Expr, env: ValueEnv = emptyValueEnv(), options?: EvalOptions): Result<Value> {
		const ctx = createContext(options);
		try {
			forEachMatch(expr, (m) => { this.compile(m); });
			return ok(this.run(expr, { env, types: emptyTypeEnv() }, ctx));
		} catch (e) {
			if (e instanceof TagfoldError) return err(e);
			if (isHostStackOverflow(e)) return err(TagfoldError.hostStackExhausted());
			throw e;
		}
	}

	//==========================================================================
	// Definition Checks
	//==========================================================================

	private checkDefinition(def: FnDef): void {
		const typeParams = def.typeParams ?? [];
		const owner = "function " + def.name;
		checkDistinct(owner, typeParams);
		checkDistinct(owner, def.params.map((p) => p.name));

		const signature = this.kindScope(typeParams, "signature of " + def.name);
		for (const p of def.params) checkKindRefs(p.type, signature);
		checkKindRefs(def.returns, signature);

		const body = this.kindScope(typeParams, "body of " + def.name);
		walkExpr(def.body, (e) => {
			switch (e.kind) {
			case "construct":
				this._types.require(e.type);
				for (const k of e.typeArgs ?? []) checkKindRefs(k, body);
				return;
			case "apply":
				for (const k of e.typeArgs ?? []) checkKindRefs(k, body);
				return;
			case "lambda":
				checkDistinct("lambda in " + def.name, e.params.map((p) => p.name));
				for (const p of e.params) checkKindRefs(p.type, body);
				checkKindRefs(e.returns, body);
				return;
			case "match":
				this.compile(e);
				return;
			default:
				return;
			}
		});
	}

	private kindScope(params: readonly string[], context: string): KindScope {
		return {
			arityOf: (name) => this._types.lookup(name)?.params.length,
			params: new Set(params),
			context,
		};
	}

	/**
	 * Substitute type parameters and check the closed kind names only
	 * registered types.
	 */
	private resolveKind(k: Kind, types: TypeEnv): Kind {
		const resolved = substituteKind(k, types);
		checkKindRefs(resolved, this.kindScope([], "type argument"));
		return resolved;
	}

	private resolveKinds(kinds: readonly Kind[], types: TypeEnv): Kind[] {
		return kinds.map((k) => this.resolveKind(k, types));
	}

	private compile(expr: MatchExpr): CompiledMatch {
		const cached = this.compiled.get(expr);
		if (cached !== undefined) return cached;
		const compiled = compileMatch(this._types, expr);
		this.compiled.set(expr, compiled);
		return compiled;
	}

	//==========================================================================
	// Machine
	//==========================================================================

	/**
	 * Reduce `expr` on an explicit continuation stack. Host stack use stays
	 * flat however deep the program recurses; only `maxDepth` bounds it.
	 */
	private run(expr: Expr, scope: Scope, ctx: EvalContext): Value {
		const kont: Kont[] = [];
		let control: Control = { tag: "Expr", e: expr, scope };
		for (;;) {
			if (control.tag === "Expr") {
				control = this.step(control.e, control.scope, kont, ctx);
				continue;
			}
			const frame = kont.pop();
			if (frame === undefined) return control.v;
			control = this.resume(frame, control.v, kont, ctx);
		}
	}

	private step(expr: Expr, scope: Scope, kont: Kont[], ctx: EvalContext): Control {
		switch (expr.kind) {
		case "lit":
			return { tag: "Val", v: evalLit(expr) };
		case "var":
			return { tag: "Val", v: this.evalVar(expr.name, scope) };
		case "construct": {
			const typeArgs = this.resolveKinds(expr.typeArgs ?? [], scope.types);
			const target: ArgTarget = { tag: "construct", type: adtKind(expr.type, typeArgs), ctor: expr.ctor };
			return this.collect(target, expr.args, scope, kont, ctx);
		}
		case "match":
			kont.push({ tag: "KMatch", compiled: this.compile(expr), scope });
			return { tag: "Expr", e: expr.scrutinee, scope };
		case "apply":
			return this.stepApply(expr, scope, kont, ctx);
		case "call": {
			const op = lookupOperator(this._operators, expr.ns, expr.name);
			if (op === undefined) throw TagfoldError.unknownOperator(expr.ns, expr.name);
			return this.collect({ tag: "call", op }, expr.args, scope, kont, ctx);
		}
		case "if":
			kont.push({ tag: "KIf", expr, scope });
			return { tag: "Expr", e: expr.cond, scope };
		case "let":
			kont.push({ tag: "KLet", expr, scope });
			return { tag: "Expr", e: expr.value, scope };
		case "lambda":
			return { tag: "Val", v: this.evalLambda(expr, scope) };
		default:
			return exhaustive(expr);
		}
	}

	/**
	 * Pop one continuation frame and feed it the value just produced.
	 */
	private resume(frame: Kont, v: Value, kont: Kont[], ctx: EvalContext): Control {
		switch (frame.tag) {
		case "KArgs": {
			frame.acc.push(v);
			const next = frame.args[frame.acc.length];
			if (next !== undefined) {
				kont.push(frame);
				return { tag: "Expr", e: next, scope: frame.scope };
			}
			return this.deliver(frame.target, frame.acc, kont, ctx);
		}
		case "KApplyFn": {
			if (v.kind !== "closure") {
				throw TagfoldError.kindMismatchMessage(
					"cannot apply a value of kind " + formatKind(kindOf(v)),
				);
			}
			if (frame.typeArgs.length > 0) {
				throw TagfoldError.arityMismatch(
					"type arguments of " + (v.name ?? "closure"),
					0,
					frame.typeArgs.length,
				);
			}
			return this.collect({ tag: "invoke", frame: closureFrame(v) }, frame.args, frame.scope, kont, ctx);
		}
		case "KMatch": {
			const { body, bindings } = selectCase(frame.compiled, v);
			const env = extendValueEnvMany(frame.scope.env, bindings);
			return { tag: "Expr", e: body, scope: { env, types: frame.scope.types } };
		}
		case "KIf":
			if (v.kind !== "bool") {
				throw TagfoldError.kindMismatch(boolKind, kindOf(v), "if condition");
			}
			return { tag: "Expr", e: v.value ? frame.expr.then : frame.expr.else, scope: frame.scope };
		case "KLet": {
			const env = extendValueEnv(frame.scope.env, frame.expr.name, v);
			return { tag: "Expr", e: frame.expr.body, scope: { env, types: frame.scope.types } };
		}
		case "KReturn": {
			const actual = kindOf(v);
			if (!kindEqual(frame.frame.returns, actual)) {
				throw TagfoldError.kindMismatch(frame.frame.returns, actual, "result of " + frame.frame.name);
			}
			ctx.depth--;
			return { tag: "Val", v };
		}
		default:
			return exhaustive(frame);
		}
	}

	//==========================================================================
	// Expressions
	//==========================================================================

	/**
	 * Locals shadow definitions. A generic definition cannot become a value
	 * without its type arguments.
	 */
	private evalVar(name: string, scope: Scope): Value {
		const local = lookupValue(scope.env, name);
		if (local !== undefined) return local;

		const def = lookupDef(this._defs, name);
		if (def === undefined) throw TagfoldError.unboundIdentifier(name);
		if ((def.typeParams ?? []).length > 0) {
			throw TagfoldError.kindMismatchMessage(
				"generic function " + name + " needs explicit type arguments; apply it directly",
			);
		}
		return defClosure(def);
	}

	private evalLambda(expr: LambdaExpr, scope: Scope): ClosureVal {
		const params = expr.params.map((p) => p.name);
		checkDistinct("lambda", params);
		const paramKinds = this.resolveKinds(expr.params.map((p) => p.type), scope.types);
		return {
			kind: "closure",
			type: fnKind(paramKinds, this.resolveKind(expr.returns, scope.types)),
			params,
			body: expr.body,
			env: scope.env,
			typeEnv: scope.types,
		};
	}

	/**
	 * Evaluate `args` left to right, then hand them to `target`.
	 */
	private collect(
		target: ArgTarget,
		args: readonly Expr[],
		scope: Scope,
		kont: Kont[],
		ctx: EvalContext,
	): Control {
		const first = args[0];
		if (first === undefined) return this.deliver(target, [], kont, ctx);
		kont.push({ tag: "KArgs", target, args, acc: [], scope });
		return { tag: "Expr", e: first, scope };
	}

	private deliver(target: ArgTarget, args: readonly Value[], kont: Kont[], ctx: EvalContext): Control {
		switch (target.tag) {
		case "construct":
			return { tag: "Val", v: constructVariant(this._types, target.type, target.ctor, args) };
		case "call":
			return { tag: "Val", v: applyOperator(target.op, args) };
		case "invoke":
			return this.enter(target.frame, args, kont, ctx);
		default:
			return exhaustive(target);
		}
	}

	//==========================================================================
	// Application
	//==========================================================================

	/**
	 * The callee is resolved, then every argument is evaluated, before the
	 * body is entered.
	 */
	private stepApply(expr: ApplyExpr, scope: Scope, kont: Kont[], ctx: EvalContext): Control {
		const typeArgs = this.resolveKinds(expr.typeArgs ?? [], scope.types);

		const def = expr.fn.kind === "var" && !scope.env.has(expr.fn.name)
			? lookupDef(this._defs, expr.fn.name)
			: undefined;
		if (def !== undefined) {
			return this.collect({ tag: "invoke", frame: defFrame(def, typeArgs) }, expr.args, scope, kont, ctx);
		}

		kont.push({ tag: "KApplyFn", args: expr.args, typeArgs, scope });
		return { tag: "Expr", e: expr.fn, scope };
	}

	private enter(frame: Frame, args: readonly Value[], kont: Kont[], ctx: EvalContext): Control {
		const bindings = bindArgs(frame, args);
		if (ctx.depth >= ctx.maxDepth) throw TagfoldError.stackExhausted(ctx.maxDepth);

		ctx.depth++;
		if (ctx.trace) {
			ctx.log(
				"  ".repeat(ctx.depth - 1) +
					"-> " +
					frame.name +
					"(" +
					args.map((a) => formatValue(a)).join(", ") +
					")",
			);
		}
		kont.push({ tag: "KReturn", frame });
		const env = extendValueEnvMany(frame.env, bindings);
		return { tag: "Expr", e: frame.body, scope: { env, types: frame.types } };
	}
}

//==============================================================================
// Helpers
//==============================================================================

function evalLit(expr: LitExpr): Value {
	const v = expr.value;
	switch (expr.type.kind) {
	case "int":
		if (typeof v === "number" && Number.isSafeInteger(v)) return intVal(v);
		break;
	case "string":
		if (typeof v === "string") return stringVal(v);
		break;
	case "bool":
		if (typeof v === "boolean") return boolVal(v);
		break;
	}
	throw TagfoldError.kindMismatchMessage(
		"literal " + JSON.stringify(v) + " is not a valid " + expr.type.kind,
	);
}

function defClosure(def: FnDef): ClosureVal {
	return {
		kind: "closure",
		type: fnKind(def.params.map((p) => p.type), def.returns),
		name: def.name,
		params: def.params.map((p) => p.name),
		body: def.body,
		env: emptyValueEnv(),
		typeEnv: emptyTypeEnv(),
	};
}

function defFrame(def: FnDef, typeArgs: readonly Kind[]): Frame {
	const types = bindTypeParams("function " + def.name, def.typeParams ?? [], typeArgs);
	return {
		name: def.name,
		params: def.params.map((p) => p.name),
		paramKinds: def.params.map((p) => substituteKind(p.type, types)),
		returns: substituteKind(def.returns, types),
		body: def.body,
		env: emptyValueEnv(),
		types,
	};
}

function closureFrame(fn: ClosureVal): Frame {
	return {
		name: fn.name ?? "lambda",
		params: fn.params,
		paramKinds: fn.type.params,
		returns: fn.type.returns,
		body: fn.body,
		env: fn.env,
		types: fn.typeEnv,
	};
}

/**
 * Check argument count and kinds against the frame's parameters.
 */
function bindArgs(frame: Frame, args: readonly Value[]): [string, Value][] {
	if (args.length !== frame.params.length) {
		throw TagfoldError.arityMismatch("function " + frame.name, frame.params.length, args.length);
	}
	const bindings: [string, Value][] = [];
	frame.params.forEach((name, i) => {
		const arg = args[i];
		const expected = frame.paramKinds[i];
		if (arg === undefined || expected === undefined) return;
		const actual = kindOf(arg);
		if (!kindEqual(expected, actual)) {
			throw TagfoldError.kindMismatch(
				expected,
				actual,
				"argument " + String(i) + " of " + frame.name,
				i,
			);
		}
		bindings.push([name, arg]);
	});
	return bindings;
}
