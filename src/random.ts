// Fickle Random Sources
// Seeded and scripted draws in [0, 1) feeding the chaos policy

import { randomInt } from "node:crypto";

//==============================================================================
// Chaos Tags
//==============================================================================

/** Every chaos point names the decision it draws for. */
export type ChaosTag =
	| "randomize"
	| "coin"
	| "booleanForm"
	| "confetti"
	| "vacation"
	| "arith"
	| "mismatch"
	| "index"
	| "indexPick"
	| "field"
	| "fieldPick"
	| "teapot"
	| "browserError"
	| "settle"
	| "mindChange"
	| "flip";

export interface RandomSource {
	/** Next draw in [0, 1). Seeded sources ignore the tag. */
	next(tag: ChaosTag): number;
}

//==============================================================================
// Seeded Source (mulberry32)
//==============================================================================

export class SeededRandom implements RandomSource {
	readonly seed: number;
	private state: number;

	constructor(seed: number) {
		this.seed = seed;
		this.state = seed | 0;
	}

	next(_tag: ChaosTag): number {
		this.state = (this.state + 0x6d2b79f5) | 0;
		let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	}
}

/** Seed drawn from the OS entropy pool when none is configured. */
export function entropySeed(): number {
	return randomInt(0, 2 ** 31 - 1);
}

export function createRandomSource(seed?: number): SeededRandom {
	return new SeededRandom(seed ?? entropySeed());
}

//==============================================================================
// Scripted Source (deterministic fixtures)
//==============================================================================

/** Draw that takes the nominal branch of every chaos point. */
export const CALM_DRAW = 0.99;

/**
 * Replays per-tag queues of draws; a tag with an empty queue yields
 * `fallback`. Records every tag drawn, in order.
 */
export class ScriptedRandom implements RandomSource {
	readonly drawn: ChaosTag[] = [];
	private readonly queues: Map<ChaosTag, number[]>;
	private readonly fallback: number;

	constructor(script: Partial<Record<ChaosTag, number[]>> = {}, fallback = CALM_DRAW) {
		this.queues = new Map();
		for (const [tag, draws] of Object.entries(script)) {
			if (isChaosTag(tag)) this.queues.set(tag, [...draws]);
		}
		this.fallback = fallback;
	}

	next(tag: ChaosTag): number {
		this.drawn.push(tag);
		return this.queues.get(tag)?.shift() ?? this.fallback;
	}

	/** Queue more draws for a tag after construction. */
	push(tag: ChaosTag, ...draws: number[]): void {
		const queue = this.queues.get(tag) ?? [];
		queue.push(...draws);
		this.queues.set(tag, queue);
	}
}

export function scriptedRandom(
	script: Partial<Record<ChaosTag, number[]>> = {},
	fallback?: number,
): ScriptedRandom {
	return new ScriptedRandom(script, fallback);
}

const CHAOS_TAGS: ReadonlySet<string> = new Set<ChaosTag>([
	"randomize", "coin", "booleanForm", "confetti", "vacation", "arith",
	"mismatch", "index", "indexPick", "field", "fieldPick", "teapot",
	"browserError", "settle", "mindChange", "flip",
]);

function isChaosTag(tag: string): tag is ChaosTag {
	return CHAOS_TAGS.has(tag);
}
