/**
 * Fickle CLI Utilities
 *
 * Extracted CLI functions for testability:
 * - Argument parsing (flags and options with values)
 * - Reading program documents from disk
 */

import { readFile } from "node:fs/promises";
import { SEED_MAX, SEED_MIN } from "./zod-schemas.ts";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	help: boolean;
	seed?: number | undefined;
}

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

export const USAGE = `Usage: fickle <program.json> [options]

Options:
  --seed <n>       Seed the chaos RNG (integer) for a reproducible run
  --verbose, -v    Log every chaos decision to stderr
  --help, -h       Show this message

Exit codes: 0 success, 1 uncaught error, 2 fatal error, 3 internal error`;

/**
 * Read and JSON-parse a program document.
 *
 * @throws UsageError when the file cannot be read or is not JSON
 */
export async function readProgramFile(filePath: string): Promise<unknown> {
	let content: string;
	try {
		content = await readFile(filePath, "utf-8");
	} catch (error) {
		throw new UsageError("Cannot read " + filePath + ": " + errorMessage(error));
	}
	try {
		return JSON.parse(content);
	} catch (error) {
		throw new UsageError(filePath + " is not valid JSON: " + errorMessage(error));
	}
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a seed option value.
 *
 * @throws UsageError unless the value is a 32-bit signed integer
 */
export function parseSeed(value: string): number {
	const seed = Number(value);
	if (value.trim() === "" || !Number.isInteger(seed)) {
		throw new UsageError("--seed expects an integer, got '" + value + "'");
	}
	if (seed < SEED_MIN || seed > SEED_MAX) {
		throw new UsageError("--seed must be between " + SEED_MIN + " and " + SEED_MAX + ", got " + value);
	}
	return seed;
}

//==============================================================================
// Argument parsing
//==============================================================================

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--help": case "-h": options.help = true; return true;
	default: return false;
	}
}

interface ArgContext {
	options: Options;
	args: string[];
	i: number;
}

function processArg(ctx: ArgContext, arg: string): { i: number; path?: string } {
	if (processFlag(ctx.options, arg)) return { i: ctx.i };
	if (arg === "--seed") {
		const value = ctx.args[ctx.i + 1];
		if (value === undefined) throw new UsageError("--seed expects a value");
		ctx.options.seed = parseSeed(value);
		return { i: ctx.i + 1 };
	}
	if (arg.startsWith("--seed=")) {
		ctx.options.seed = parseSeed(arg.slice("--seed=".length));
		return { i: ctx.i };
	}
	if (arg.startsWith("-")) throw new UsageError("Unknown option " + arg);
	return { i: ctx.i, path: arg };
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 * @returns Object with parsed path and options
 * @throws UsageError on unknown options or a malformed seed
 */
export function parseArgs(args: string[]): { path: string | null; options: Options } {
	const options: Options = { verbose: false, help: false };
	let path: string | null = null;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		const result = processArg({ options, args, i }, arg);
		i = result.i;
		if (result.path !== undefined) path = result.path;
	}

	return { path, options };
}
