// Fickle Presenter
// Output capability injected into the evaluator (replaces printing)

import { formatValue } from "./domains/core.ts";
import type { Value } from "./types.ts";

export interface Presenter {
	present(value: Value): void;
	presentError(message: string): void;
}

export type PresenterCall =
	| { method: "present"; value: Value }
	| { method: "presentError"; message: string };

/** Writes values to stdout and errors to stderr. */
export class ConsolePresenter implements Presenter {
	present(value: Value): void {
		console.log(formatValue(value));
	}

	presentError(message: string): void {
		console.error(message);
	}
}

/** Keeps every call in order, for fixtures and replay comparison. */
export class RecordingPresenter implements Presenter {
	readonly calls: PresenterCall[] = [];

	present(value: Value): void {
		this.calls.push({ method: "present", value });
	}

	presentError(message: string): void {
		this.calls.push({ method: "presentError", message });
	}

	/** One line per call: `present <formatted>` or `presentError <message>`. */
	transcript(): string[] {
		return this.calls.map((call) =>
			call.method === "present"
				? "present " + formatValue(call.value)
				: "presentError " + call.message,
		);
	}
}
