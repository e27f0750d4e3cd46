// Fickle Error Types
// Error taxonomy raised by the evaluator, built-ins, and promise scheduler

import type { Span } from "./zod-schemas.ts";
import type { RecordVal, Value } from "./types.ts";
import { numberVal, recordVal, textVal } from "./types.ts";

//==============================================================================
// Error Kinds
//==============================================================================

export const ErrorKinds = {
	NameNotFound: "NameNotFound",
	TypeMismatch: "TypeMismatch",
	DivisionByZero: "DivisionByZero",
	IndexOutOfVacation: "IndexOutOfVacation",
	EmptyRecordAccess: "EmptyRecordAccess",
	PromiseAbandoned: "PromiseAbandoned",
	PromiseRejected: "PromiseRejected",
	SaveAlwaysFails: "SaveAlwaysFails",
	TeapotError: "TeapotError",
} as const;

export type ErrorKind = (typeof ErrorKinds)[keyof typeof ErrorKinds];

/** Kinds that bypass every catch boundary. */
const FATAL_KINDS: ReadonlySet<ErrorKind> = new Set([ErrorKinds.SaveAlwaysFails]);

export function isFatalKind(kind: ErrorKind): boolean {
	return FATAL_KINDS.has(kind);
}

export function isErrorKind(name: string): name is ErrorKind {
	return Object.values<string>(ErrorKinds).includes(name);
}

/** Plain data form of an error, as stored in a Rejected promise. */
export interface ErrorValue {
	kind: ErrorKind;
	message: string;
	span?: Span | undefined;
}

export const BROWSER_ERROR_MESSAGE =
	"Failed to open browser tab. Either your internet is as reliable as a chocolate teapot, or the universe is working exactly as intended.";

//==============================================================================
// Fickle Error Class
//==============================================================================

export class FickleError extends Error {
	readonly kind: ErrorKind;
	span: Span | undefined;

	constructor(kind: ErrorKind, message: string, span?: Span) {
		super(message);
		this.name = "FickleError";
		this.kind = kind;
		this.span = span;
	}

	get fatal(): boolean {
		return isFatalKind(this.kind);
	}

	/** Attach a source location unless a more precise one is already set. */
	at(span: Span | undefined): this {
		this.span ??= span;
		return this;
	}

	toErrorValue(): ErrorValue {
		const result: ErrorValue = { kind: this.kind, message: this.message };
		if (this.span !== undefined) result.span = this.span;
		return result;
	}

	/**
	 * Record bound to a catch variable: `kind`, `message`, and the source
	 * position when one is known.
	 */
	toValue(): RecordVal {
		const fields = new Map<string, Value>([
			["kind", textVal(this.kind)],
			["message", textVal(this.message)],
		]);
		if (this.span !== undefined) {
			fields.set("line", numberVal(this.span.line));
			fields.set("column", numberVal(this.span.column));
		}
		return recordVal(fields);
	}

	static fromErrorValue(ev: ErrorValue): FickleError {
		return new FickleError(ev.kind, ev.message, ev.span);
	}

	static nameNotFound(name: string, onVacation = false): FickleError {
		const who = onVacation ? name + " (it's on vacation)" : name;
		return new FickleError(
			ErrorKinds.NameNotFound,
			"Variable '" + who + "' not found. Have you tried looking under the couch?",
		);
	}

	static typeMismatch(operation: string, detail: string): FickleError {
		return new FickleError(ErrorKinds.TypeMismatch, operation + ": " + detail);
	}

	/**
	 * Arithmetic on non-numbers
	 */
	static mathIsHard(operation: string, got: string[]): FickleError {
		return new FickleError(
			ErrorKinds.TypeMismatch,
			"Math is hard, let's go shopping! 🛍️ (" +
				operation +
				" got " +
				got.join(", ") +
				")",
		);
	}

	static divisionByZero(): FickleError {
		return new FickleError(
			ErrorKinds.DivisionByZero,
			"Division by zero. Congratulations, you've broken mathematics! 🎉",
		);
	}

	static indexOutOfVacation(index: number, length: number): FickleError {
		return new FickleError(
			ErrorKinds.IndexOutOfVacation,
			"Index " +
				String(index) +
				" is on vacation outside [0, " +
				String(length) +
				"). The array lost it in the Bermuda Triangle.",
		);
	}

	static emptyRecordAccess(key: string): FickleError {
		return new FickleError(
			ErrorKinds.EmptyRecordAccess,
			"Cannot access '" + key + "': the record is empty, like my promises.",
		);
	}

	static promiseAbandoned(handle: number): FickleError {
		return new FickleError(
			ErrorKinds.PromiseAbandoned,
			"Promise #" + String(handle) + " went out for milk and never came back.",
		);
	}

	static promiseRejected(handle: number): FickleError {
		return new FickleError(
			ErrorKinds.PromiseRejected,
			"Promise #" + String(handle) + " changed its mind.",
		);
	}

	static saveAlwaysFails(): FickleError {
		return new FickleError(
			ErrorKinds.SaveAlwaysFails,
			"Saving is overrated. Maybe try writing it down with a crayon instead? 📝",
		);
	}

	static teapot(): FickleError {
		return new FickleError(
			ErrorKinds.TeapotError,
			"Error 418: I'm a teapot. Yes, really. No, I won't make coffee. ☕",
		);
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

export function invalidResult<T>(errors: ValidationError[]): ValidationResult<T> {
	return { valid: false, errors };
}

/**
 * Thrown when a program document or configuration fails validation.
 */
export class ProgramValidationError extends Error {
	readonly errors: ValidationError[];

	constructor(what: string, errors: ValidationError[]) {
		super(
			"Invalid " +
				what +
				": " +
				errors.map((e) => e.path + ": " + e.message).join("; "),
		);
		this.name = "ProgramValidationError";
		this.errors = errors;
	}
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
