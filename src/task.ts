// Fickle Task
// One cooperatively scheduled evaluation: the main program or an async call
//
// Whoever advances a task (the runner, or the caller of an async function)
// waits until the task either suspends on `await` or finishes. At most one
// task makes progress at a time.

export type TaskStatus = "created" | "running" | "suspended" | "done";

interface Signal {
	promise: Promise<void>;
	resolve: () => void;
}

function signal(): Signal {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

export class Task {
	readonly id: string;
	private _status: TaskStatus = "created";
	private yielded: Signal | undefined;
	private failure: { error: unknown } | undefined;

	constructor(id: string) {
		this.id = id;
	}

	get status(): TaskStatus {
		return this._status;
	}

	/** Begin running `body`; resolves at its first suspension or completion. */
	start(body: () => Promise<void>): Promise<void> {
		return this.advance(() => {
			void body().then(
				() => { this.finish(undefined); },
				(error: unknown) => { this.finish({ error }); },
			);
		});
	}

	/**
	 * Run `step` (which starts or resumes the body) and wait for the next
	 * suspension or completion. An error that escaped the body is rethrown
	 * to whoever advanced the task.
	 */
	async advance(step: () => void): Promise<void> {
		const next = signal();
		this.yielded = next;
		this._status = "running";
		step();
		await next.promise;
		if (this.failure) {
			const { error } = this.failure;
			this.failure = undefined;
			throw error;
		}
	}

	/** Called by the scheduler when the body parks on an unsettled promise. */
	markSuspended(): void {
		this._status = "suspended";
		this.release();
	}

	private finish(failure: { error: unknown } | undefined): void {
		this._status = "done";
		this.failure = failure;
		this.release();
	}

	private release(): void {
		const current = this.yielded;
		this.yielded = undefined;
		current?.resolve();
	}
}
