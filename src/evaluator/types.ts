// Shared types and interfaces for the evaluator subsystem

import type { ChaosPolicy } from "../chaos.ts";
import type { Scope } from "../env.ts";
import type { Presenter } from "../presenter.ts";
import type { PromiseScheduler } from "../scheduler.ts";
import type { Task } from "../task.ts";
import type { Value } from "../types.ts";
import type { RuntimeConfig } from "../zod-schemas.ts";

//==============================================================================
// Evaluator State
//==============================================================================

/** Shared by every task of one run. */
export interface EvalState {
	steps: number;
	maxSteps: number;
}

/** Capabilities and policies fixed for the whole run. */
export interface EvalServices {
	chaos: ChaosPolicy;
	scheduler: PromiseScheduler;
	presenter: Presenter;
	config: RuntimeConfig;
}

//==============================================================================
// Context objects (consolidate repeated params)
//==============================================================================

export interface EvalCtx {
	services: EvalServices;
	state: EvalState;
	scope: Scope;
	/** Task this code runs in; `await` suspends it. */
	task: Task;
	/** Inside a loop body of the current function; `break` is a no-op otherwise. */
	inLoop: boolean;
}

//==============================================================================
// Result types
//==============================================================================

/** How a statement list finished. */
export type Completion =
	| { type: "normal" }
	| { type: "return"; value: Value }
	| { type: "break" };

export const NORMAL: Completion = { type: "normal" };
