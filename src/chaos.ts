// Fickle Chaos Policy
// Probabilistic decision points consulted by the evaluator and scheduler
//
// Every draw-based rule compares one draw against a fixed table entry, and
// the nominal (non-chaotic) outcome always sits at the top of [0, 1). A draw
// of 0.99 therefore takes the nominal branch everywhere.

import { FickleError } from "./errors.ts";
import type { ChaosTag, RandomSource } from "./random.ts";
import type { Value } from "./types.ts";
import { booleanVal, numberVal, textVal } from "./types.ts";

//==============================================================================
// Probability Table
//==============================================================================

export const CHAOS_TABLE = {
	/** Any expression result becomes a random Boolean. */
	randomizeResult: 0.25,
	/** Weighted representation of a Boolean result; buckets in draw order. */
	booleanForm: [
		["opposite", 0.3],
		["stringified", 0.2],
		["numeric", 0.2],
		["unchanged", 0.3],
	],
	/** Number literal turns into party emoji. */
	confetti: 0.1,
	/** Most emoji groups a confetti literal expands to. */
	confettiMax: 1000,
	/** Existing variable reported missing. */
	vacation: 0.15,
	/** Chance of the residual alternate; otherwise the primary alternate. */
	arithResidual: 0.2,
	/** Comparison TypeMismatch replaced by a random Boolean. */
	mismatchSubstitute: 0.5,
	indexShuffle: 0.7,
	fieldShuffle: 0.5,
	teapot: 0.02,
	browserError: 0.1,
	/** Per-tick fate of a pending promise; buckets in draw order. */
	settle: [
		["abandon", 0.2],
		["wait", 0.3],
		["resolve", 0.5],
	],
	mindChange: 0.2,
	flip: 0.3,
} as const;

export type BooleanForm = (typeof CHAOS_TABLE.booleanForm)[number][0];
export type Settlement = (typeof CHAOS_TABLE.settle)[number][0];

export type ArithOp = "add" | "subtract" | "multiply" | "divide";

const ARITH_ALTERNATES = {
	add: { primary: "subtract", residual: "multiply" },
	multiply: { primary: "divide", residual: "add" },
} as const;

export const CONFETTI = "🎉🎊🎈";

//==============================================================================
// Chaos Policy
//==============================================================================

export interface ChaosPolicyOptions {
	trace?: boolean;
}

export class ChaosPolicy {
	private readonly random: RandomSource;
	private readonly trace: boolean;
	private _calm = false;

	constructor(random: RandomSource, options: ChaosPolicyOptions = {}) {
		this.random = random;
		this.trace = options.trace ?? false;
	}

	/** Calm mode: probabilistic rules take their nominal outcome without drawing. */
	get calm(): boolean {
		return this._calm;
	}

	calmDown(): void {
		this._calm = true;
	}

	//--------------------------------------------------------------------------
	// Decision primitives
	//--------------------------------------------------------------------------

	private draw(tag: ChaosTag): number {
		const r = this.random.next(tag);
		if (this.trace) console.warn(`[Chaos] ${tag} drew ${r.toFixed(4)}`);
		return r;
	}

	/** True with probability `p`; false without drawing in calm mode. */
	private chance(tag: ChaosTag, p: number): boolean {
		if (this._calm) return false;
		return this.draw(tag) < p;
	}

	private weighted<T extends string>(
		tag: ChaosTag,
		buckets: readonly (readonly [T, number])[],
	): T {
		const r = this.draw(tag);
		let upper = 0;
		for (const [outcome, weight] of buckets) {
			upper += weight;
			if (r < upper) return outcome;
		}
		const last = buckets[buckets.length - 1];
		if (!last) throw new Error(`Empty probability table for ${tag}`);
		return last[0];
	}

	/** Uniform index in [0, length). */
	private pick(tag: ChaosTag, length: number): number {
		return Math.min(length - 1, Math.floor(this.draw(tag) * length));
	}

	//--------------------------------------------------------------------------
	// Expression results
	//--------------------------------------------------------------------------

	/**
	 * Post-step of every expression: maybe replace the result with a random
	 * Boolean, then reshape it if it is Boolean. The two draws are independent.
	 */
	applyExpressionChaos(v: Value): Value {
		const randomized = this.randomizeResult(v);
		return randomized.kind === "boolean"
			? this.reshapeBoolean(randomized.value)
			: randomized;
	}

	randomizeResult(v: Value): Value {
		if (!this.chance("randomize", CHAOS_TABLE.randomizeResult)) return v;
		return booleanVal(this.draw("coin") < 0.5);
	}

	/**
	 * Opposite, stringified, numeric, or unchanged. The stringified and
	 * numeric forms render the opposite value.
	 */
	reshapeBoolean(b: boolean): Value {
		if (this._calm) return booleanVal(b);
		const form = this.weighted("booleanForm", CHAOS_TABLE.booleanForm);
		switch (form) {
		case "opposite": return booleanVal(!b);
		case "stringified": return textVal(b ? "false" : "true");
		case "numeric": return numberVal(b ? 0 : 1);
		case "unchanged": return booleanVal(b);
		}
	}

	/** Number literal, possibly as confetti. */
	numberLiteral(n: number): Value {
		if (!this.chance("confetti", CHAOS_TABLE.confetti)) return numberVal(n);
		const count = Math.min(Math.trunc(Math.abs(n)), CHAOS_TABLE.confettiMax);
		return textVal(CONFETTI.repeat(count));
	}

	onVacation(): boolean {
		return this.chance("vacation", CHAOS_TABLE.vacation);
	}

	//--------------------------------------------------------------------------
	// Built-ins
	//--------------------------------------------------------------------------

	/** `add` runs as subtract (or multiply); `multiply` as divide (or add). */
	pickArithOp(op: "add" | "multiply"): ArithOp {
		if (this._calm) return op;
		const alternates = ARITH_ALTERNATES[op];
		return this.draw("arith") < CHAOS_TABLE.arithResidual
			? alternates.residual
			: alternates.primary;
	}

	/** Random Boolean standing in for a failed comparison, or undefined to surface the error. */
	substituteMismatch(): Value | undefined {
		if (!this.chance("mismatch", CHAOS_TABLE.mismatchSubstitute)) return undefined;
		return booleanVal(this.draw("coin") < 0.5);
	}

	/**
	 * Index actually read for `index(arr, requested)`.
	 * @throws FickleError IndexOutOfVacation when requested is outside [0, length)
	 */
	pickIndex(length: number, requested: number): number {
		if (requested < 0 || requested >= length) {
			throw FickleError.indexOutOfVacation(requested, length);
		}
		if (!this.chance("index", CHAOS_TABLE.indexShuffle)) return requested;
		return this.pick("indexPick", length);
	}

	/**
	 * Key actually read for `access(record, requested)`.
	 * @throws FickleError EmptyRecordAccess when the record has no fields
	 */
	pickField(keys: readonly string[], requested: string): string {
		if (keys.length === 0) {
			throw FickleError.emptyRecordAccess(requested);
		}
		if (!this.chance("field", CHAOS_TABLE.fieldShuffle)) return requested;
		return keys[this.pick("fieldPick", keys.length)] ?? requested;
	}

	teapot(): boolean {
		return this.chance("teapot", CHAOS_TABLE.teapot);
	}

	browserError(): boolean {
		return this.chance("browserError", CHAOS_TABLE.browserError);
	}

	//--------------------------------------------------------------------------
	// Control flow (deterministic)
	//--------------------------------------------------------------------------

	/** The else branch always wins; without one the whole statement is skipped. */
	selectBranch(hasElse: boolean): "else" | "skip" {
		return hasElse ? "else" : "skip";
	}

	loopPasses(): number {
		return 1;
	}

	//--------------------------------------------------------------------------
	// Promises
	//--------------------------------------------------------------------------

	settle(): Settlement {
		if (this._calm) return "resolve";
		return this.weighted("settle", CHAOS_TABLE.settle);
	}

	mindChange(): boolean {
		return this.chance("mindChange", CHAOS_TABLE.mindChange);
	}

	flip(): boolean {
		return this.chance("flip", CHAOS_TABLE.flip);
	}
}
