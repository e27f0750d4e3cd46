// Fickle Evaluator
// Walks a validated program under the chaos policy and drives the scheduler

import { ChaosPolicy } from "./chaos.ts";
import { globalScope } from "./env.ts";
import { FickleError } from "./errors.ts";
import { execBlock } from "./evaluator/statements.ts";
import type { EvalCtx, EvalServices } from "./evaluator/types.ts";
import type { Presenter } from "./presenter.ts";
import { createRandomSource, type RandomSource } from "./random.ts";
import { PromiseScheduler } from "./scheduler.ts";
import { parseConfig } from "./validator.ts";
import type { Program, RuntimeConfig, RuntimeConfigInput } from "./zod-schemas.ts";

//==============================================================================
// Run Outcome
//==============================================================================

export type RunOutcome =
	| { status: "completed"; ticks: number }
	| { status: "crashed"; error: FickleError; ticks: number };

export interface EvaluatorOptions {
	presenter: Presenter;
	config?: RuntimeConfigInput | undefined;
	/** Overrides the seeded source built from `config.seed`. */
	random?: RandomSource | undefined;
}

//==============================================================================
// Evaluator Class
//==============================================================================

/** One Evaluator runs one program; chaos state does not carry over between runs. */
export class Evaluator {
	readonly config: RuntimeConfig;
	readonly chaos: ChaosPolicy;
	readonly scheduler: PromiseScheduler;
	/** Seed of the built-in source; undefined when a source was injected. */
	readonly seed: number | undefined;
	private readonly presenter: Presenter;
	private started = false;

	constructor(options: EvaluatorOptions) {
		this.config = parseConfig(options.config);
		let random = options.random;
		if (random === undefined) {
			const seeded = createRandomSource(this.config.seed);
			this.seed = seeded.seed;
			random = seeded;
		} else {
			this.seed = undefined;
		}
		this.chaos = new ChaosPolicy(random, { trace: this.config.trace });
		this.scheduler = new PromiseScheduler(this.chaos, {
			tickMs: this.config.tickMs,
			mindChange: this.config.mindChange,
		});
		this.presenter = options.presenter;
	}

	/**
	 * Execute the program body, then drive the scheduler until no promise is
	 * pending. An uncaught Fickle error is reported through the presenter and
	 * returned; anything else is an engine defect and is thrown.
	 */
	async run(program: Program): Promise<RunOutcome> {
		if (this.started) {
			throw new Error("Evaluator.run may only be called once");
		}
		this.started = true;

		const services: EvalServices = {
			chaos: this.chaos,
			scheduler: this.scheduler,
			presenter: this.presenter,
			config: this.config,
		};
		const state = { steps: 0, maxSteps: this.config.maxSteps };
		const scope = globalScope();

		try {
			await this.scheduler.run(async (task) => {
				const ctx: EvalCtx = { services, state, scope, task, inLoop: false };
				await execBlock(ctx, program.body);
			});
		} catch (error) {
			if (!(error instanceof FickleError)) throw error;
			this.presenter.presentError(error.message);
			return { status: "crashed", error, ticks: this.scheduler.ticks };
		}
		return { status: "completed", ticks: this.scheduler.ticks };
	}
}
