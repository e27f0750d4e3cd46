// Statement execution and block completion

import { exhaustive, FickleError } from "../errors.ts";
import { functionVal, nullVal } from "../types.ts";
import type {
	IfStmt,
	LoopStmt,
	ReturnStmt,
	Stmt,
	TryStmt,
} from "../zod-schemas.ts";
import { checkSteps, evalExpr } from "./expressions.ts";
import { type Completion, type EvalCtx, NORMAL } from "./types.ts";

//==============================================================================
// Blocks
//==============================================================================

/** Run statements in order until one completes abruptly. */
export async function execBlock(ctx: EvalCtx, stmts: Stmt[]): Promise<Completion> {
	for (const stmt of stmts) {
		const completion = await execStmt(ctx, stmt);
		if (completion.type !== "normal") return completion;
	}
	return NORMAL;
}

export async function execStmt(ctx: EvalCtx, stmt: Stmt): Promise<Completion> {
	checkSteps(ctx.state);
	try {
		return await dispatchStmt(ctx, stmt);
	} catch (error) {
		if (error instanceof FickleError) error.at(stmt.span);
		throw error;
	}
}

async function dispatchStmt(ctx: EvalCtx, stmt: Stmt): Promise<Completion> {
	switch (stmt.kind) {
	case "let":
		ctx.scope.define(stmt.name, await evalExpr(ctx, stmt.value));
		return NORMAL;
	case "expr":
		await evalExpr(ctx, stmt.expr);
		return NORMAL;
	case "if": return execIf(ctx, stmt);
	case "loop": return execLoop(ctx, stmt);
	case "function":
		ctx.scope.define(stmt.name, functionVal(stmt, ctx.scope));
		return NORMAL;
	case "return": return execReturn(ctx, stmt);
	case "break":
		return ctx.inLoop ? { type: "break" } : NORMAL;
	case "try": return execTry(ctx, stmt);
	case "directive":
		applyDirective(ctx, stmt.name);
		return NORMAL;
	default:
		return exhaustive(stmt);
	}
}

//==============================================================================
// Control flow
//==============================================================================

/** The condition is evaluated for its effects only; the else branch always wins. */
async function execIf(ctx: EvalCtx, stmt: IfStmt): Promise<Completion> {
	await evalExpr(ctx, stmt.cond);
	const branch = ctx.services.chaos.selectBranch(stmt.else !== undefined);
	if (branch === "skip" || stmt.else === undefined) return NORMAL;
	return execBlock(ctx, stmt.else);
}

async function execLoop(ctx: EvalCtx, stmt: LoopStmt): Promise<Completion> {
	if (stmt.cond) await evalExpr(ctx, stmt.cond);
	const bodyCtx: EvalCtx = { ...ctx, inLoop: true };
	const passes = ctx.services.chaos.loopPasses();
	for (let pass = 0; pass < passes; pass++) {
		const completion = await execBlock(bodyCtx, stmt.body);
		if (completion.type === "break") break;
		if (completion.type === "return") return completion;
	}
	return NORMAL;
}

async function execReturn(ctx: EvalCtx, stmt: ReturnStmt): Promise<Completion> {
	const value = stmt.value ? await evalExpr(ctx, stmt.value) : nullVal();
	return { type: "return", value };
}

/**
 * Non-fatal errors bind the catch variable in the current scope and run the
 * handler. Fatal errors and internal defects pass through untouched.
 */
async function execTry(ctx: EvalCtx, stmt: TryStmt): Promise<Completion> {
	try {
		return await execBlock(ctx, stmt.body);
	} catch (error) {
		if (!(error instanceof FickleError) || error.fatal) throw error;
		ctx.scope.define(stmt.param, error.toValue());
		return execBlock(ctx, stmt.handler);
	}
}

//==============================================================================
// Directives
//==============================================================================

function applyDirective(ctx: EvalCtx, name: string): void {
	switch (name) {
	case "disable_useless":
		ctx.services.chaos.calmDown();
		return;
	case "experimental":
		return;
	default:
		console.warn(`[Evaluator] Unknown directive '${name}' ignored`);
	}
}
