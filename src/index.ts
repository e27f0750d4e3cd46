// Fickle - a deliberately unreliable scripting runtime
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Value, ValueKind,
	NumberVal, TextVal, BooleanVal, NullVal, ArrayVal, RecordVal, FunctionVal, PromiseVal,
} from "./types.ts";

export type {
	Program, Expr, Stmt, Span, RuntimeConfig, RuntimeConfigInput,
} from "./zod-schemas.ts";

export type {
	ErrorKind, ErrorValue, ValidationError, ValidationResult,
} from "./errors.ts";

export type { ChaosTag, RandomSource } from "./random.ts";
export type { ArithOp, BooleanForm, Settlement } from "./chaos.ts";
export type {
	PromiseInfo, PromiseOrigin, PromiseState, SettledState,
} from "./scheduler.ts";
export type { Presenter, PresenterCall } from "./presenter.ts";
export type { EvaluatorOptions, RunOutcome } from "./evaluator.ts";
export type { ExitCode, RunOptions, RunResult } from "./runner.ts";

//==============================================================================
// Value Constructors
//==============================================================================

export {
	numberVal, textVal, booleanVal, nullVal, arrayVal, recordVal, promiseVal,
	isBoolean, isFunction, isPromise,
} from "./types.ts";

//==============================================================================
// Value Operations
//==============================================================================

export {
	coerceBoolean, valueEquals, valueLessThan, applyArith, formatValue,
} from "./domains/core.ts";

//==============================================================================
// Errors
//==============================================================================

export {
	ErrorKinds, FickleError, ProgramValidationError, BROWSER_ERROR_MESSAGE,
	isFatalKind, isErrorKind, exhaustive,
} from "./errors.ts";

//==============================================================================
// Validation
//==============================================================================

export {
	ProgramSchema, ExprSchema, StmtSchema, RuntimeConfigSchema,
} from "./zod-schemas.ts";

export { validateProgram, parseProgram, parseConfig } from "./validator.ts";

//==============================================================================
// Runtime
//==============================================================================

export { Scope, globalScope } from "./env.ts";
export {
	SeededRandom, ScriptedRandom, createRandomSource, scriptedRandom, CALM_DRAW,
} from "./random.ts";
export { ChaosPolicy, CHAOS_TABLE, CONFETTI } from "./chaos.ts";
export { PromiseScheduler } from "./scheduler.ts";
export { Task } from "./task.ts";
export { ConsolePresenter, RecordingPresenter } from "./presenter.ts";
export { Evaluator } from "./evaluator.ts";
export { BUILTINS, isBuiltin } from "./evaluator/builtins.ts";
export { ExitCodes, exitCodeFor, runProgram } from "./runner.ts";
