// Fickle Runner
// Validate a program document, run it, and map the outcome to an exit code

import { Evaluator, type RunOutcome } from "./evaluator.ts";
import { ConsolePresenter, type Presenter } from "./presenter.ts";
import type { RandomSource } from "./random.ts";
import { parseProgram } from "./validator.ts";
import type { RuntimeConfigInput } from "./zod-schemas.ts";

export const ExitCodes = {
	Success: 0,
	/** Uncaught non-fatal error: crashed by chaos. */
	Uncaught: 1,
	/** Uncaught Fatal error: crashed by design. */
	Fatal: 2,
	/** Engine defect, including an invalid program document. */
	Internal: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export function exitCodeFor(outcome: RunOutcome): ExitCode {
	if (outcome.status === "completed") return ExitCodes.Success;
	return outcome.error.fatal ? ExitCodes.Fatal : ExitCodes.Uncaught;
}

export interface RunOptions {
	presenter?: Presenter | undefined;
	config?: RuntimeConfigInput | undefined;
	random?: RandomSource | undefined;
}

export type RunResult = RunOutcome & { exitCode: ExitCode; seed: number | undefined };

/**
 * @throws ProgramValidationError when `doc` is not a valid program
 */
export async function runProgram(doc: unknown, options: RunOptions = {}): Promise<RunResult> {
	const program = parseProgram(doc);
	const evaluator = new Evaluator({
		presenter: options.presenter ?? new ConsolePresenter(),
		config: options.config,
		random: options.random,
	});
	const outcome = await evaluator.run(program);
	return { ...outcome, exitCode: exitCodeFor(outcome), seed: evaluator.seed };
}
