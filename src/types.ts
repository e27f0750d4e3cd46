// Fickle Type Definitions
// Runtime value domain (v) and its constructors

import type { Scope } from "./env.ts";
import type { Stmt } from "./zod-schemas.ts";

//==============================================================================
// Value Domain (v - runtime values)
//==============================================================================

export type Value =
	| NumberVal
	| TextVal
	| BooleanVal
	| NullVal
	| ArrayVal
	| RecordVal
	| FunctionVal
	| PromiseVal;

export type ValueKind = Value["kind"];

export interface NumberVal {
	kind: "number";
	value: number;
}

export interface TextVal {
	kind: "text";
	value: string;
}

export interface BooleanVal {
	kind: "boolean";
	value: boolean;
}

export interface NullVal {
	kind: "null";
}

export interface ArrayVal {
	kind: "array";
	value: Value[];
}

/** Insertion order of `value` is the record's field order. */
export interface RecordVal {
	kind: "record";
	value: Map<string, Value>;
}

/**
 * Closure over the scope it was declared in. The scope is shared, so later
 * `let`s in that scope are visible to the body.
 */
export interface FunctionVal {
	kind: "function";
	name: string;
	params: string[];
	body: Stmt[];
	env: Scope;
	async: boolean;
}

/** Handle into the PromiseScheduler state table. */
export interface PromiseVal {
	kind: "promise";
	handle: number;
}

//==============================================================================
// Value Constructors
//==============================================================================

export const numberVal = (value: number): NumberVal => ({ kind: "number", value });
export const textVal = (value: string): TextVal => ({ kind: "text", value });
export const booleanVal = (value: boolean): BooleanVal => ({
	kind: "boolean",
	value,
});
export const nullVal = (): NullVal => ({ kind: "null" });
export const arrayVal = (value: Value[]): ArrayVal => ({ kind: "array", value });
export const recordVal = (value: Map<string, Value>): RecordVal => ({
	kind: "record",
	value,
});
export const functionVal = (
	decl: { name: string; params: string[]; body: Stmt[]; async: boolean },
	env: Scope,
): FunctionVal => ({
	kind: "function",
	name: decl.name,
	params: decl.params,
	body: decl.body,
	env,
	async: decl.async,
});
export const promiseVal = (handle: number): PromiseVal => ({
	kind: "promise",
	handle,
});

//==============================================================================
// Type Guards
//==============================================================================

export function isBoolean(v: Value): v is BooleanVal {
	return v.kind === "boolean";
}

export function isPromise(v: Value): v is PromiseVal {
	return v.kind === "promise";
}

export function isFunction(v: Value): v is FunctionVal {
	return v.kind === "function";
}
