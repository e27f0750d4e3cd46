// User function calls: synchronous bodies run inline, async bodies as tasks

import { FickleError } from "../errors.ts";
import type { FunctionVal, Value } from "../types.ts";
import { nullVal } from "../types.ts";
import type { Stmt } from "../zod-schemas.ts";
import { execBlock } from "./statements.ts";
import type { EvalCtx } from "./types.ts";

/**
 * Bind arguments in a fresh child of the closure scope and run the body.
 * Calling an async function yields its task promise instead of its result.
 */
export async function callFunction(
	ctx: EvalCtx,
	fn: FunctionVal,
	args: Value[],
): Promise<Value> {
	if (args.length !== fn.params.length) {
		throw FickleError.typeMismatch(
			fn.name,
			"expected " + String(fn.params.length) + " arguments, got " + String(args.length),
		);
	}
	const scope = fn.env.child();
	fn.params.forEach((param, i) => {
		scope.define(param, args[i] ?? nullVal());
	});
	const callCtx: EvalCtx = { ...ctx, scope, inLoop: false };

	if (!fn.async) {
		return runBody(callCtx, fn.body);
	}
	return ctx.services.scheduler.spawn(fn.name, (task) =>
		runBody({ ...callCtx, task }, fn.body),
	);
}

async function runBody(ctx: EvalCtx, body: Stmt[]): Promise<Value> {
	const completion = await execBlock(ctx, body);
	return completion.type === "return" ? completion.value : nullVal();
}
