#!/usr/bin/env -S node --import tsx
// Fickle CLI
// Run a program document: fickle <program.json> [--seed N] [--verbose]

import { parseArgs, readProgramFile, USAGE, UsageError } from "./cli-utils.ts";
import { ProgramValidationError } from "./errors.ts";
import { ExitCodes, runProgram } from "./runner.ts";

async function main(argv: string[]): Promise<number> {
	try {
		const { path, options } = parseArgs(argv);
		if (options.help) {
			console.log(USAGE);
			return ExitCodes.Success;
		}
		if (path === null) {
			throw new UsageError("Missing program path");
		}
		const doc = await readProgramFile(path);
		const result = await runProgram(doc, {
			config: { seed: options.seed, trace: options.verbose },
		});
		if (options.verbose && result.seed !== undefined) {
			console.warn(`[Fickle] seed ${result.seed}, ${result.ticks} ticks`);
		}
		return result.exitCode;
	} catch (error) {
		if (error instanceof UsageError) {
			console.error(error.message + "\n\n" + USAGE);
		} else if (error instanceof ProgramValidationError) {
			console.error(error.message);
		} else {
			console.error("[Fickle] Internal error:", error);
		}
		return ExitCodes.Internal;
	}
}

process.exitCode = await main(process.argv.slice(2));
