// Fickle Promise Scheduler
// Cooperative single-threaded scheduling of promises, tasks, and virtual time

import type { ChaosPolicy } from "./chaos.ts";
import { type ErrorValue, FickleError } from "./errors.ts";
import { Task } from "./task.ts";
import type { PromiseVal, Value } from "./types.ts";
import { nullVal, promiseVal } from "./types.ts";

//==============================================================================
// Promise State
//==============================================================================

export type SettledState =
	| { status: "resolved"; value: Value }
	| { status: "rejected"; error: ErrorValue }
	| { status: "abandoned" };

export type PromiseState = { status: "pending" } | SettledState;

/** `chaos` promises come from `promise(...)`; `task` promises from async calls. */
export type PromiseOrigin = "chaos" | "task";

export interface PromiseInfo {
	readonly handle: number;
	readonly origin: PromiseOrigin;
	readonly state: PromiseState;
	readonly createdAt: number;
	readonly timeoutMs: number;
	readonly mindChange: boolean;
	readonly flipped: boolean;
}

interface PromiseEntry {
	handle: number;
	origin: PromiseOrigin;
	state: PromiseState;
	createdAt: number;
	timeoutMs: number;
	mindChange: boolean;
	flipped: boolean;
	settledAtTick: number | undefined;
	/** Value a chaos promise resolves with. */
	payload: Value;
}

interface Waiter {
	task: Task;
	handle: number;
	resume: (state: SettledState) => void;
}

export interface SchedulerOptions {
	tickMs?: number;
	/** When false, no promise is ever flagged mind-change. */
	mindChange?: boolean;
}

//==============================================================================
// Promise Scheduler
//==============================================================================

export class PromiseScheduler {
	private readonly chaos: ChaosPolicy;
	private readonly tickMs: number;
	private readonly mindChangeEnabled: boolean;
	private readonly entries = new Map<number, PromiseEntry>();
	private nextHandle = 1;
	private nextTaskId = 1;
	private _now = 0;
	private _ticks = 0;
	/** Suspended continuations, in suspension order. */
	private waiting: Waiter[] = [];
	/** Continuations whose promise settled, in resume order. */
	private ready: Waiter[] = [];

	constructor(chaos: ChaosPolicy, options: SchedulerOptions = {}) {
		this.chaos = chaos;
		this.tickMs = options.tickMs ?? 100;
		this.mindChangeEnabled = options.mindChange ?? true;
	}

	/** Virtual milliseconds elapsed. */
	get now(): number {
		return this._now;
	}

	get ticks(): number {
		return this._ticks;
	}

	get waitingCount(): number {
		return this.waiting.length;
	}

	//--------------------------------------------------------------------------
	// Promise table
	//--------------------------------------------------------------------------

	/** `promise(value, timeoutMs)`: a Pending entry settled by later ticks. */
	create(value: Value, timeoutMs: number): PromiseVal {
		const mindChange = this.mindChangeEnabled && this.chaos.mindChange();
		return this.insert("chaos", { payload: value, timeoutMs, mindChange });
	}

	private insert(
		origin: PromiseOrigin,
		init: { payload: Value; timeoutMs: number; mindChange: boolean },
	): PromiseVal {
		const handle = this.nextHandle++;
		this.entries.set(handle, {
			handle,
			origin,
			state: { status: "pending" },
			createdAt: this._now,
			settledAtTick: undefined,
			flipped: false,
			...init,
		});
		return promiseVal(handle);
	}

	/** @throws Error for an unknown handle (an engine defect, never chaos) */
	private entry(handle: number): PromiseEntry {
		const entry = this.entries.get(handle);
		if (!entry) {
			throw new Error(`Promise handle #${handle} not found`);
		}
		return entry;
	}

	stateOf(handle: number): PromiseState {
		return this.entry(handle).state;
	}

	inspect(handle: number): PromiseInfo {
		const e = this.entry(handle);
		return {
			handle: e.handle,
			origin: e.origin,
			state: e.state,
			createdAt: e.createdAt,
			timeoutMs: e.timeoutMs,
			mindChange: e.mindChange,
			flipped: e.flipped,
		};
	}

	hasPending(origin?: PromiseOrigin): boolean {
		for (const entry of this.entries.values()) {
			if (entry.state.status !== "pending") continue;
			if (origin === undefined || entry.origin === origin) return true;
		}
		return false;
	}

	private settle(entry: PromiseEntry, state: SettledState): void {
		entry.state = state;
		entry.settledAtTick = this._ticks;
	}

	//--------------------------------------------------------------------------
	// Tasks and suspension
	//--------------------------------------------------------------------------

	/**
	 * Start an async body as its own task. Runs it up to its first suspension
	 * and returns the promise its completion settles. Non-fatal errors reject
	 * that promise; anything else escapes to the caller.
	 */
	async spawn(name: string, body: (task: Task) => Promise<Value>): Promise<PromiseVal> {
		const result = this.insert("task", {
			payload: nullVal(),
			timeoutMs: Number.POSITIVE_INFINITY,
			mindChange: false,
		});
		const entry = this.entry(result.handle);
		const task = new Task(name + "#" + String(this.nextTaskId++));
		await task.start(async () => {
			try {
				this.settleTask(entry, { status: "resolved", value: await body(task) });
			} catch (error) {
				if (!(error instanceof FickleError) || error.fatal) throw error;
				this.settleTask(entry, { status: "rejected", error: error.toErrorValue() });
			}
		});
		return result;
	}

	/** A task promise abandoned by a wait cycle stays abandoned. */
	private settleTask(entry: PromiseEntry, state: SettledState): void {
		if (entry.state.status !== "pending") return;
		this.settle(entry, state);
		this.promoteSettled();
	}

	/**
	 * Park `task` until `handle` leaves Pending. The only suspension point.
	 */
	suspend(task: Task, handle: number): Promise<SettledState> {
		this.entry(handle);
		return new Promise<SettledState>((resume) => {
			this.waiting.push({ task, handle, resume });
			task.markSuspended();
		});
	}

	/** Move waiters whose promise settled to the ready queue, keeping suspension order. */
	private promoteSettled(): void {
		const still: Waiter[] = [];
		for (const waiter of this.waiting) {
			const pending = this.stateOf(waiter.handle).status === "pending";
			(pending ? still : this.ready).push(waiter);
		}
		this.waiting = still;
	}

	private settledState(handle: number): SettledState {
		const state = this.stateOf(handle);
		if (state.status === "pending") {
			throw new Error(`Promise handle #${handle} resumed while pending`);
		}
		return state;
	}

	//--------------------------------------------------------------------------
	// Runner loop
	//--------------------------------------------------------------------------

	/**
	 * Run `main` as the root task, then keep resuming and ticking until no
	 * promise is pending and no continuation is parked.
	 */
	async run(main: (task: Task) => Promise<void>): Promise<void> {
		const task = new Task("main");
		await task.start(() => main(task));
		await this.drain();
	}

	async drain(): Promise<void> {
		for (;;) {
			await this.resumeReady();
			if (!this.hasPending() && this.waiting.length === 0) return;
			if (this.hasPending("chaos")) {
				this.tick();
			} else {
				this.breakWaitCycle();
			}
		}
	}

	private async resumeReady(): Promise<void> {
		for (let waiter = this.ready.shift(); waiter; waiter = this.ready.shift()) {
			const { task, handle, resume } = waiter;
			const state = this.settledState(handle);
			await task.advance(() => { resume(state); });
		}
	}

	/**
	 * Only task promises are pending and every task waits on one: nothing can
	 * make progress, so those promises are abandoned.
	 */
	private breakWaitCycle(): void {
		const stuck = [...this.entries.values()].filter(
			(e) => e.state.status === "pending",
		);
		console.warn(
			`[PromiseScheduler] Wait cycle among ${stuck.length} task promises; abandoning them`,
		);
		for (const entry of stuck) {
			this.settle(entry, { status: "abandoned" });
		}
		this.promoteSettled();
	}

	//--------------------------------------------------------------------------
	// Ticks
	//--------------------------------------------------------------------------

	/**
	 * Advance virtual time one step. Chaos promises are visited in creation
	 * order: pending ones draw their fate and then face their timeout; settled
	 * mind-change ones may flip once.
	 */
	tick(): void {
		this._ticks++;
		this._now += this.tickMs;
		for (const entry of this.entries.values()) {
			if (entry.origin !== "chaos") continue;
			if (entry.state.status === "pending") {
				this.tickPending(entry);
			} else {
				this.maybeFlip(entry);
			}
		}
		this.promoteSettled();
	}

	private tickPending(entry: PromiseEntry): void {
		const fate = this.chaos.settle();
		if (fate === "resolve") {
			this.settle(entry, { status: "resolved", value: entry.payload });
		} else if (fate === "abandon") {
			this.settle(entry, { status: "abandoned" });
		}
		const expired = this._now - entry.createdAt > entry.timeoutMs;
		if (entry.state.status === "pending" && expired) {
			this.settle(entry, { status: "abandoned" });
		}
	}

	private maybeFlip(entry: PromiseEntry): void {
		if (!entry.mindChange || entry.flipped) return;
		if (entry.state.status === "abandoned" || entry.state.status === "pending") return;
		if (entry.settledAtTick === undefined || entry.settledAtTick >= this._ticks) return;
		if (!this.chaos.flip()) return;
		entry.flipped = true;
		entry.state = entry.state.status === "resolved"
			? {
				status: "rejected",
				error: FickleError.promiseRejected(entry.handle).toErrorValue(),
			}
			: { status: "resolved", value: entry.payload };
	}
}
