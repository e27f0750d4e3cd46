// Fickle Built-in Operations
// Reserved names resolved before user functions: arithmetic, comparison,
// container access, output, and promises

import { applyArith, valueEquals, valueLessThan } from "../domains/core.ts";
import { BROWSER_ERROR_MESSAGE, ErrorKinds, FickleError } from "../errors.ts";
import type { Value } from "../types.ts";
import { booleanVal, nullVal, numberVal } from "../types.ts";
import type { EvalServices } from "./types.ts";

//==============================================================================
// Built-in Signature
//==============================================================================

export interface BuiltinOp {
	name: string;
	minArgs: number;
	maxArgs: number;
	/** Eligible for the teapot after it succeeds. */
	teapot: boolean;
	fn: (services: EvalServices, args: Value[]) => Value;
}

export type BuiltinRegistry = ReadonlyMap<string, BuiltinOp>;

//==============================================================================
// Helpers
//==============================================================================

function arg(args: Value[], i: number): Value {
	return args[i] ?? nullVal();
}

function arithmetic(op: "add" | "multiply"): BuiltinOp["fn"] {
	return ({ chaos }, args) => {
		const a = arg(args, 0);
		const b = arg(args, 1);
		if (a.kind !== "number" || b.kind !== "number") {
			throw FickleError.mathIsHard(op, [a.kind, b.kind]);
		}
		return numberVal(applyArith(chaos.pickArithOp(op), a.value, b.value));
	};
}

/** A comparison TypeMismatch may be papered over with a random Boolean. */
function comparison(compare: (a: Value, b: Value) => boolean): BuiltinOp["fn"] {
	return ({ chaos }, args) => {
		try {
			return booleanVal(compare(arg(args, 0), arg(args, 1)));
		} catch (error) {
			if (!(error instanceof FickleError) || error.kind !== ErrorKinds.TypeMismatch) {
				throw error;
			}
			const substitute = chaos.substituteMismatch();
			if (substitute === undefined) throw error;
			return substitute;
		}
	};
}

//==============================================================================
// Containers
//==============================================================================

const indexOp: BuiltinOp["fn"] = ({ chaos }, args) => {
	const arr = arg(args, 0);
	const i = arg(args, 1);
	if (arr.kind !== "array") {
		throw FickleError.typeMismatch("index", "expected array, got " + arr.kind);
	}
	if (i.kind !== "number" || !Number.isInteger(i.value)) {
		throw FickleError.typeMismatch("index", "expected an integer index");
	}
	const picked = arr.value[chaos.pickIndex(arr.value.length, i.value)];
	return picked ?? nullVal();
};

const accessOp: BuiltinOp["fn"] = ({ chaos }, args) => {
	const rec = arg(args, 0);
	const key = arg(args, 1);
	if (rec.kind !== "record") {
		throw FickleError.typeMismatch("access", "expected record, got " + rec.kind);
	}
	if (key.kind !== "text") {
		throw FickleError.typeMismatch("access", "expected text key, got " + key.kind);
	}
	const field = chaos.pickField([...rec.value.keys()], key.value);
	return rec.value.get(field) ?? nullVal();
};

//==============================================================================
// Output and promises
//==============================================================================

const printOp: BuiltinOp["fn"] = ({ chaos, presenter }, args) => {
	if (chaos.browserError()) {
		presenter.presentError(BROWSER_ERROR_MESSAGE);
	} else {
		presenter.present(arg(args, 0));
	}
	return nullVal();
};

const promiseOp: BuiltinOp["fn"] = ({ scheduler, config }, args) => {
	const timeout = args[1];
	if (timeout === undefined) {
		return scheduler.create(arg(args, 0), config.defaultTimeoutMs);
	}
	if (timeout.kind !== "number" || !Number.isFinite(timeout.value) || timeout.value < 0) {
		throw FickleError.typeMismatch("promise", "timeout must be a non-negative number");
	}
	return scheduler.create(arg(args, 0), timeout.value);
};

//==============================================================================
// Registry
//==============================================================================

export const builtinOps: BuiltinOp[] = [
	{ name: "add", minArgs: 2, maxArgs: 2, teapot: true, fn: arithmetic("add") },
	{ name: "multiply", minArgs: 2, maxArgs: 2, teapot: true, fn: arithmetic("multiply") },
	{ name: "equals", minArgs: 2, maxArgs: 2, teapot: true, fn: comparison(valueEquals) },
	{ name: "lessThan", minArgs: 2, maxArgs: 2, teapot: true, fn: comparison(valueLessThan) },
	{ name: "index", minArgs: 2, maxArgs: 2, teapot: true, fn: indexOp },
	{ name: "access", minArgs: 2, maxArgs: 2, teapot: true, fn: accessOp },
	{ name: "print", minArgs: 1, maxArgs: 1, teapot: true, fn: printOp },
	{
		name: "save",
		minArgs: 0,
		maxArgs: Number.POSITIVE_INFINITY,
		teapot: false,
		fn: () => {
			throw FickleError.saveAlwaysFails();
		},
	},
	// Never terminates anything.
	{ name: "exit", minArgs: 0, maxArgs: Number.POSITIVE_INFINITY, teapot: false, fn: () => nullVal() },
	{ name: "promise", minArgs: 1, maxArgs: 2, teapot: true, fn: promiseOp },
];

export const BUILTINS: BuiltinRegistry = new Map(builtinOps.map((op) => [op.name, op]));

export function isBuiltin(name: string): boolean {
	return BUILTINS.has(name);
}

/**
 * Apply a built-in to already evaluated arguments.
 * @throws FickleError TypeMismatch on a wrong argument count
 */
export function applyBuiltin(op: BuiltinOp, services: EvalServices, args: Value[]): Value {
	if (args.length < op.minArgs || args.length > op.maxArgs) {
		throw FickleError.typeMismatch(op.name, arityText(op) + ", got " + String(args.length));
	}
	const result = op.fn(services, args);
	if (op.teapot && services.chaos.teapot()) {
		throw FickleError.teapot();
	}
	return result;
}

function arityText(op: BuiltinOp): string {
	const count = op.minArgs === op.maxArgs
		? String(op.minArgs)
		: String(op.minArgs) + " to " + String(op.maxArgs);
	return "expected " + count + (op.maxArgs === 1 ? " argument" : " arguments");
}
