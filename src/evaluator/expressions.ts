// Expression evaluation: ρ ⊢ e ⇓ v, followed by the per-expression chaos step

import { exhaustive, FickleError } from "../errors.ts";
import type { Value } from "../types.ts";
import { arrayVal, booleanVal, nullVal, recordVal, textVal } from "../types.ts";
import type { AwaitExpr, CallExpr, Expr } from "../zod-schemas.ts";
import { applyBuiltin, BUILTINS } from "./builtins.ts";
import { callFunction } from "./calls.ts";
import type { EvalCtx, EvalState } from "./types.ts";

//==============================================================================
// Entry point
//==============================================================================

/**
 * Evaluate `expr`, then let chaos rewrite the result. Errors leave with the
 * innermost span that produced them.
 */
export async function evalExpr(ctx: EvalCtx, expr: Expr): Promise<Value> {
	checkSteps(ctx.state);
	let value: Value;
	try {
		value = await dispatchExpr(ctx, expr);
	} catch (error) {
		if (error instanceof FickleError) error.at(expr.span);
		throw error;
	}
	return ctx.services.chaos.applyExpressionChaos(value);
}

export function checkSteps(state: EvalState): void {
	state.steps++;
	if (state.steps > state.maxSteps) {
		throw new Error("Step limit exceeded");
	}
}

function dispatchExpr(ctx: EvalCtx, expr: Expr): Value | Promise<Value> {
	switch (expr.kind) {
	case "number": return ctx.services.chaos.numberLiteral(expr.value);
	case "text": return textVal(expr.value);
	case "boolean": return booleanVal(expr.value);
	case "null": return nullVal();
	case "array": return evalArray(ctx, expr.elements);
	case "record": return evalRecord(ctx, expr.fields);
	case "identifier": return evalIdentifier(ctx, expr.name);
	case "call": return evalCall(ctx, expr);
	case "await": return evalAwait(ctx, expr);
	default:
		return exhaustive(expr);
	}
}

//==============================================================================
// Literals and names
//==============================================================================

async function evalList(ctx: EvalCtx, exprs: Expr[]): Promise<Value[]> {
	const values: Value[] = [];
	for (const e of exprs) {
		values.push(await evalExpr(ctx, e));
	}
	return values;
}

async function evalArray(ctx: EvalCtx, elements: Expr[]): Promise<Value> {
	return arrayVal(await evalList(ctx, elements));
}

/** A repeated key keeps its first position and its last value. */
async function evalRecord(
	ctx: EvalCtx,
	fields: { key: string; value: Expr }[],
): Promise<Value> {
	const entries = new Map<string, Value>();
	for (const field of fields) {
		entries.set(field.key, await evalExpr(ctx, field.value));
	}
	return recordVal(entries);
}

function evalIdentifier(ctx: EvalCtx, name: string): Value {
	const value = ctx.scope.lookup(name);
	if (ctx.services.chaos.onVacation()) {
		throw FickleError.nameNotFound(name, true);
	}
	return value;
}

//==============================================================================
// Calls
//==============================================================================

async function evalCall(ctx: EvalCtx, expr: CallExpr): Promise<Value> {
	const args = await evalList(ctx, expr.args);
	const op = BUILTINS.get(expr.callee);
	if (op) return applyBuiltin(op, ctx.services, args);

	const callee = ctx.scope.lookup(expr.callee);
	if (callee.kind !== "function") {
		throw FickleError.typeMismatch(
			"call",
			"'" + expr.callee + "' is a " + callee.kind + ", not a function",
		);
	}
	return callFunction(ctx, callee, args);
}

//==============================================================================
// Await
//==============================================================================

/**
 * The only suspension point. A non-promise operand is its own result.
 * @throws FickleError PromiseAbandoned, or the stored error of a Rejected promise
 */
async function evalAwait(ctx: EvalCtx, expr: AwaitExpr): Promise<Value> {
	const target = await evalExpr(ctx, expr.value);
	if (target.kind !== "promise") return target;

	const { scheduler } = ctx.services;
	let state = scheduler.stateOf(target.handle);
	if (state.status === "pending") {
		state = await scheduler.suspend(ctx.task, target.handle);
	}
	switch (state.status) {
	case "resolved": return state.value;
	case "rejected": throw FickleError.fromErrorValue(state.error);
	case "abandoned": throw FickleError.promiseAbandoned(target.handle);
	default:
		return exhaustive(state);
	}
}
