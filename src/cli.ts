#!/usr/bin/env node
// tagfold CLI
// Runs a program document and prints its result

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs, readProgramFile, type Options } from "./cli-utils.js";
import { formatOperand } from "./domains/registry.js";
import type { TagfoldError } from "./errors.js";
import { createKernelRegistry } from "./stdlib/kernel.js";
import { createEvaluator } from "./stdlib/prelude.js";
import { formatKind, formatSignature, formatValue } from "./print.js";
import { runValidProgram } from "./program.js";
import { programSchema } from "./schemas.js";
import { validateProgram } from "./validator.js";

//==============================================================================
// Output
//==============================================================================

export interface CliIO {
	out: (line: string) => void;
	err: (line: string) => void;
}

const consoleIO: CliIO = {
	out: (line) => { console.log(line); },
	err: (line) => { console.error(line); },
};

const USAGE = [
	"Usage: tagfold <program.json> [options]",
	"",
	"Options:",
	"  --max-depth <n>  Maximum call depth before StackExhausted (default 2000)",
	"  --no-prelude     Do not load the prelude types and functions",
	"  --validate       Validate the program without evaluating it",
	"  -v, --verbose    Trace every function entry to stderr",
	"  -l, --list       List kernel operators and prelude functions",
	"  --schema         Print the program JSON Schema",
	"  -h, --help       Show this help",
];

function reportError(io: CliIO, error: TagfoldError): void {
	io.err("Error [" + error.code + "]: " + error.message);
}

//==============================================================================
// Commands
//==============================================================================

function listDefinitions(io: CliIO, options: Options): void {
	io.out("Operators:");
	for (const op of createKernelRegistry().values()) {
		const params = op.params.map((p) => formatOperand(p, formatKind)).join(", ");
		io.out("  " + op.ns + ":" + op.name + "(" + params + ") -> " + formatOperand(op.returns, formatKind));
	}
	if (!options.prelude) return;

	const evaluator = createEvaluator();
	io.out("Types:");
	for (const name of evaluator.types.names) {
		const info = evaluator.types.require(name);
		const params = info.params.length > 0 ? "<" + info.params.join(", ") + ">" : "";
		io.out("  " + name + params + " = " + info.constructors.map((c) => c.name).join(" | "));
	}
	io.out("Functions:");
	for (const def of evaluator.defs.values()) {
		io.out("  " + formatSignature(def));
	}
}

async function runFile(io: CliIO, path: string, options: Options): Promise<number> {
	const read = await readProgramFile(path);
	if (!read.ok) {
		reportError(io, read.error);
		return 1;
	}

	const validation = validateProgram(read.value);
	if (!validation.valid) {
		io.err("Validation failed:");
		for (const e of validation.errors) io.err("  " + e.path + ": " + e.message);
		return 1;
	}
	if (options.validate) {
		io.out("Validation passed");
		return 0;
	}

	const doc = validation.value;
	const { result } = runValidProgram(doc, {
		prelude: options.prelude,
		maxDepth: options.maxDepth,
		trace: options.verbose,
		log: io.err,
	});

	if (!result.ok) {
		reportError(io, result.error);
		return doc.expected_error === result.error.code ? 0 : 1;
	}

	const printed = formatValue(result.value, { sugar: true });
	io.out("Result: " + printed);
	if (doc.expected_error !== undefined) {
		io.err("Expected error: " + doc.expected_error);
		return 1;
	}
	if (doc.expected_result !== undefined && doc.expected_result !== printed) {
		io.err("Expected: " + doc.expected_result);
		return 1;
	}
	return 0;
}

//==============================================================================
// Entry Point
//==============================================================================

/**
 * Run the CLI with `argv` (without the node and script paths) and return the
 * exit code.
 */
export async function main(argv: string[], io: CliIO = consoleIO): Promise<number> {
	const { path, options, errors } = parseArgs(argv);

	if (errors.length > 0) {
		for (const message of errors) io.err("Error: " + message);
		io.err("Run tagfold --help for usage");
		return 1;
	}

	if (options.help) {
		for (const line of USAGE) io.out(line);
		return 0;
	}
	if (options.schema) {
		io.out(JSON.stringify(programSchema, null, 2));
		return 0;
	}
	if (options.list) {
		listDefinitions(io, options);
		return 0;
	}
	if (path === null) {
		for (const line of USAGE) io.err(line);
		return 1;
	}
	return runFile(io, path, options);
}

function isEntryPoint(): boolean {
	const script = process.argv[1];
	if (script === undefined) return false;
	try {
		return realpathSync(script) === fileURLToPath(import.meta.url);
	} catch {
		return false;
	}
}

if (isEntryPoint()) {
	main(process.argv.slice(2)).then(
		(code) => { process.exitCode = code; },
		(e: unknown) => {
			console.error(e);
			process.exitCode = 1;
		},
	);
}
