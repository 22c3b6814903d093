/**
 * tagfold CLI Utilities
 *
 * Argument parsing and program file reading, kept apart from the entry point
 * so both can be tested without spawning a process.
 */

import { readFile } from "node:fs/promises";
import { attempt, err, ErrorCodes, type Result, TagfoldError } from "./errors.js";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	validate: boolean;
	help: boolean;
	list: boolean;
	schema: boolean;
	prelude: boolean;
	maxDepth?: number;
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 *
 * Supports:
 *   - Positional path argument
 *   - Flags: --verbose/-v, --help/-h, --list/-l, --validate, --schema, --no-prelude
 *   - Options with values: --max-depth <n>
 *   - Subcommand style: list, help, validate, schema
 */
function normalizeArgs(args: string[]): string[] {
	const subcommands: Record<string, string> = {
		list: "--list",
		validate: "--validate",
		help: "--help",
		schema: "--schema",
	};
	return args.map((arg) => subcommands[arg] ?? arg);
}

function consumeNextArg(normalized: string[], i: number): string | undefined {
	const nextArg = normalized[i + 1];
	if (nextArg !== undefined && !nextArg.startsWith("-")) return nextArg;
	return undefined;
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--validate": options.validate = true; return true;
	case "--help": case "-h": options.help = true; return true;
	case "--list": case "-l": options.list = true; return true;
	case "--schema": options.schema = true; return true;
	case "--no-prelude": options.prelude = false; return true;
	default: return false;
	}
}

/** Positive integer, or undefined for anything else */
function parseDepth(value: string): number | undefined {
	if (!/^\d+$/.test(value)) return undefined;
	const n = Number(value);
	return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

interface ArgContext {
	options: Options;
	normalized: string[];
	errors: string[];
	i: number;
}

function processArg(ctx: ArgContext, arg: string): { i: number; path?: string } {
	if (processFlag(ctx.options, arg)) return { i: ctx.i };
	if (arg === "--max-depth") {
		const nextVal = consumeNextArg(ctx.normalized, ctx.i);
		if (nextVal === undefined) {
			ctx.errors.push("--max-depth expects a positive integer");
			return { i: ctx.i };
		}
		const depth = parseDepth(nextVal);
		if (depth === undefined) {
			ctx.errors.push("--max-depth expects a positive integer, got " + JSON.stringify(nextVal));
		} else {
			ctx.options.maxDepth = depth;
		}
		return { i: ctx.i + 1 };
	}
	return !arg.startsWith("-") ? { i: ctx.i, path: arg } : { i: ctx.i };
}

export interface ParsedArgs {
	path: string | null;
	options: Options;
	/** Usage errors, such as a flag given an invalid value */
	errors: string[];
}

export function parseArgs(args: string[]): ParsedArgs {
	const normalized = normalizeArgs(args);
	const options: Options = {
		verbose: false,
		validate: false,
		help: false,
		list: false,
		schema: false,
		prelude: true,
	};
	const errors: string[] = [];
	let path: string | null = null;

	for (let i = 0; i < normalized.length; i++) {
		const arg = normalized[i];
		if (arg === undefined) break;
		const result = processArg({ options, normalized, errors, i }, arg);
		i = result.i;
		if (result.path !== undefined) path = result.path;
	}

	return { path, options, errors };
}

/**
 * Read and parse a JSON program file. Read and parse failures become
 * ValidationError results.
 */
export async function readProgramFile(filePath: string): Promise<Result<unknown>> {
	let content: string;
	try {
		content = await readFile(filePath, "utf-8");
	} catch (e) {
		return err(new TagfoldError(
			ErrorCodes.ValidationError,
			"Cannot read " + filePath + ": " + (e instanceof Error ? e.message : String(e)),
		));
	}
	return attempt((): unknown => {
		try {
			return JSON.parse(content);
		} catch (e) {
			throw new TagfoldError(
				ErrorCodes.ValidationError,
				"Invalid JSON in " + filePath + ": " + (e instanceof Error ? e.message : String(e)),
			);
		}
	});
}
