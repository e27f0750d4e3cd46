// Fickle Core Domain
// Truthiness, structural comparison, arithmetic, and display of values

import type { ArithOp } from "../chaos.ts";
import { exhaustive, FickleError } from "../errors.ts";
import type { Value } from "../types.ts";

//==============================================================================
// Truthiness
//==============================================================================

/** Null, 0, NaN and "" are false; every other non-Boolean is true. */
export function coerceBoolean(v: Value): boolean {
	switch (v.kind) {
	case "boolean": return v.value;
	case "null": return false;
	case "number": return v.value !== 0 && !Number.isNaN(v.value);
	case "text": return v.value !== "";
	case "array":
	case "record":
	case "function":
	case "promise":
		return true;
	default:
		return exhaustive(v);
	}
}

//==============================================================================
// Comparison
//==============================================================================

/**
 * Structural equality. Null compares unequal to everything but Null;
 * any other pair of different shapes is a TypeMismatch.
 */
export function valueEquals(a: Value, b: Value): boolean {
	if (a.kind === "null" || b.kind === "null") {
		return a.kind === b.kind;
	}
	if (a.kind !== b.kind) {
		throw FickleError.typeMismatch(
			"equals",
			"cannot compare " + a.kind + " with " + b.kind,
		);
	}
	return sameShapeEquals(a, b);
}

function sameShapeEquals(a: Value, b: Value): boolean {
	switch (a.kind) {
	case "number":
	case "text":
	case "boolean":
		return b.kind === a.kind && a.value === b.value;
	case "null":
		return b.kind === "null";
	case "array":
		return b.kind === "array" && arraysEqual(a.value, b.value);
	case "record":
		return b.kind === "record" && recordsEqual(a.value, b.value);
	case "function":
		return a === b;
	case "promise":
		return b.kind === "promise" && a.handle === b.handle;
	default:
		return exhaustive(a);
	}
}

/** Nested elements of different shapes are simply unequal. */
function nestedEquals(a: Value, b: Value): boolean {
	return a.kind === b.kind && sameShapeEquals(a, b);
}

function arraysEqual(a: Value[], b: Value[]): boolean {
	if (a.length !== b.length) return false;
	return a.every((item, i) => {
		const other = b[i];
		return other !== undefined && nestedEquals(item, other);
	});
}

function recordsEqual(a: Map<string, Value>, b: Map<string, Value>): boolean {
	if (a.size !== b.size) return false;
	for (const [key, item] of a) {
		const other = b.get(key);
		if (other === undefined || !nestedEquals(item, other)) return false;
	}
	return true;
}

/** Numeric order for numbers, lexical order for text. */
export function valueLessThan(a: Value, b: Value): boolean {
	if (a.kind === "number" && b.kind === "number") return a.value < b.value;
	if (a.kind === "text" && b.kind === "text") return a.value < b.value;
	throw FickleError.typeMismatch(
		"lessThan",
		"cannot order " + a.kind + " against " + b.kind,
	);
}

//==============================================================================
// Arithmetic
//==============================================================================

export function applyArith(op: ArithOp, a: number, b: number): number {
	switch (op) {
	case "add": return a + b;
	case "subtract": return a - b;
	case "multiply": return a * b;
	case "divide":
		if (b === 0) throw FickleError.divisionByZero();
		return a / b;
	default:
		return exhaustive(op);
	}
}

//==============================================================================
// Display
//==============================================================================

export function formatValue(v: Value): string {
	switch (v.kind) {
	case "number": return String(v.value);
	case "text": return v.value;
	case "boolean": return v.value ? "true" : "false";
	case "null": return "null";
	case "array":
		return "[" + v.value.map(formatNested).join(", ") + "]";
	case "record":
		return (
			"{" +
				[...v.value].map(([k, item]) => k + ": " + formatNested(item)).join(", ") +
				"}"
		);
	case "function":
		return "<" + (v.async ? "async function " : "function ") + v.name + ">";
	case "promise":
		return "<promise #" + String(v.handle) + ">";
	default:
		return exhaustive(v);
	}
}

/** Text inside containers is quoted. */
function formatNested(v: Value): string {
	return v.kind === "text" ? JSON.stringify(v.value) : formatValue(v);
}
