import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ChaosPolicy } from "../src/chaos.ts";
import { FickleError } from "../src/errors.ts";
import { applyBuiltin, BUILTINS, isBuiltin } from "../src/evaluator/builtins.ts";
import type { EvalServices } from "../src/evaluator/types.ts";
import { RecordingPresenter } from "../src/presenter.ts";
import { ScriptedRandom } from "../src/random.ts";
import type { ChaosTag } from "../src/random.ts";
import { PromiseScheduler } from "../src/scheduler.ts";
import type { Value } from "../src/types.ts";
import { arrayVal, nullVal, numberVal, promiseVal, textVal } from "../src/types.ts";
import { parseConfig } from "../src/validator.ts";

//==============================================================================
// Helpers
//==============================================================================

function services(script: Partial<Record<ChaosTag, number[]>> = {}): EvalServices & {
	presenter: RecordingPresenter;
} {
	const chaos = new ChaosPolicy(new ScriptedRandom(script));
	return {
		chaos,
		scheduler: new PromiseScheduler(chaos),
		presenter: new RecordingPresenter(),
		config: parseConfig({ defaultTimeoutMs: 300 }),
	};
}

function apply(name: string, args: Value[], svc: EvalServices = services()): Value {
	const op = BUILTINS.get(name);
	if (!op) throw new Error("no built-in " + name);
	return applyBuiltin(op, svc, args);
}

function errorKind(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (error) {
		return error instanceof FickleError ? error.kind : "other";
	}
	return undefined;
}

//==============================================================================
// Tests
//==============================================================================

describe("Built-in registry", () => {
	it("reserves the built-in names", () => {
		for (const name of ["add", "multiply", "equals", "lessThan", "index", "access", "print", "save", "exit", "promise"]) {
			assert.equal(isBuiltin(name), true, name);
		}
		assert.equal(isBuiltin("subtract"), false);
	});

	it("checks argument counts", () => {
		const err = (() => {
			try {
				apply("add", [numberVal(1)]);
			} catch (error) {
				return error;
			}
			return undefined;
		})();
		assert.ok(err instanceof FickleError);
		assert.equal(err.message, "add: expected 2 arguments, got 1");
		assert.equal(errorKind(() => apply("print", [])), "TypeMismatch");
		assert.equal(errorKind(() => apply("promise", [nullVal(), nullVal(), nullVal()])), "TypeMismatch");
	});
});

describe("index and access", () => {
	it("validates the container and index", () => {
		assert.equal(errorKind(() => apply("index", [textVal("abc"), numberVal(0)])), "TypeMismatch");
		assert.equal(errorKind(() => apply("index", [arrayVal([numberVal(1)]), numberVal(0.5)])), "TypeMismatch");
		assert.equal(errorKind(() => apply("access", [arrayVal([]), textVal("k")])), "TypeMismatch");
	});
});

describe("print", () => {
	it("presents its argument and returns null", () => {
		const svc = services();
		assert.deepEqual(apply("print", [numberVal(4)], svc), nullVal());
		assert.deepEqual(svc.presenter.transcript(), ["present 4"]);
	});
});

describe("save and exit", () => {
	it("save always fails fatally, with any arguments", () => {
		assert.equal(errorKind(() => apply("save", [])), "SaveAlwaysFails");
		assert.equal(errorKind(() => apply("save", [textVal("a"), textVal("b")])), "SaveAlwaysFails");
	});

	it("exit does nothing and never meets the teapot", () => {
		const svc = services({ teapot: [0] });
		assert.deepEqual(apply("exit", [numberVal(1)], svc), nullVal());
	});
});

describe("promise", () => {
	it("creates a pending promise with the default timeout", () => {
		const svc = services();
		assert.deepEqual(apply("promise", [textVal("v")], svc), promiseVal(1));
		assert.equal(svc.scheduler.inspect(1).timeoutMs, 300);
		assert.equal(svc.scheduler.stateOf(1).status, "pending");
	});

	it("takes an explicit timeout", () => {
		const svc = services();
		apply("promise", [textVal("v"), numberVal(0)], svc);
		assert.equal(svc.scheduler.inspect(1).timeoutMs, 0);
	});

	it("rejects a non-numeric timeout", () => {
		assert.equal(errorKind(() => apply("promise", [nullVal(), textVal("soon")])), "TypeMismatch");
	});
});
