import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { CONFETTI } from "../src/chaos.ts";
import { Evaluator } from "../src/evaluator.ts";
import { RecordingPresenter } from "../src/presenter.ts";
import { ScriptedRandom } from "../src/random.ts";
import { booleanVal, numberVal, textVal } from "../src/types.ts";
import {
	arr, at, bool, brk, call, directive, expr, fn, id, if_, let_, loop, num,
	print, program, rec, ret, runScripted, try_, txt,
} from "./builders.ts";

//==============================================================================
// Helpers
//==============================================================================

function crashedKind(outcome: { status: string; error?: { kind: string } }): string | undefined {
	return outcome.status === "crashed" ? outcome.error?.kind : undefined;
}

/** Catch handler that prints one field of the caught error record. */
const printCaught = (field: string) => [print(call("access", id("e"), txt(field)))];

//==============================================================================
// Arithmetic
//==============================================================================

describe("Evaluator - arithmetic", () => {
	it("add runs as subtract on the primary draw", async () => {
		const { lines, outcome } = await runScripted([print(call("add", num(5), num(3)))]);
		assert.deepEqual(lines, ["present 2"]);
		assert.equal(outcome.status, "completed");
	});

	it("add runs as multiply on the residual draw", async () => {
		const { lines } = await runScripted(
			[print(call("add", num(5), num(3)))],
			{ arith: [0.1] },
		);
		assert.deepEqual(lines, ["present 15"]);
	});

	it("multiply runs as divide, and add on the residual draw", async () => {
		const primary = await runScripted([print(call("multiply", num(6), num(3)))]);
		assert.deepEqual(primary.lines, ["present 2"]);
		const residual = await runScripted(
			[print(call("multiply", num(6), num(3)))],
			{ arith: [0.1] },
		);
		assert.deepEqual(residual.lines, ["present 9"]);
	});

	it("raises DivisionByZero only when divide is chosen with a zero divisor", async () => {
		const divided = await runScripted([print(call("multiply", num(6), num(0)))]);
		assert.equal(crashedKind(divided.outcome), "DivisionByZero");
		const added = await runScripted(
			[print(call("multiply", num(6), num(0)))],
			{ arith: [0.1] },
		);
		assert.deepEqual(added.lines, ["present 6"]);
	});

	it("rejects non-numbers with a TypeMismatch", async () => {
		const { outcome, lines } = await runScripted([print(call("add", txt("a"), num(1)))]);
		assert.equal(crashedKind(outcome), "TypeMismatch");
		assert.deepEqual(lines, [
			"presentError Math is hard, let's go shopping! 🛍️ (add got text, number)",
		]);
	});

	it("computes correctly after disable_useless", async () => {
		const { lines } = await runScripted([
			directive("disable_useless"),
			print(call("add", num(5), num(3))),
			print(call("multiply", num(5), num(3))),
		]);
		assert.deepEqual(lines, ["present 8", "present 15"]);
	});
});

//==============================================================================
// Expression chaos
//==============================================================================

describe("Evaluator - expression chaos", () => {
	it("replaces a result with a random Boolean", async () => {
		const { presenter } = await runScripted([print(num(5))], { randomize: [0.1], coin: [0.2] });
		assert.deepEqual(presenter.calls, [{ method: "present", value: booleanVal(true) }]);
	});

	it("reshapes Boolean results", async () => {
		const opposite = await runScripted([print(bool(true))], { booleanForm: [0.1] });
		assert.deepEqual(opposite.presenter.calls, [{ method: "present", value: booleanVal(false) }]);
		const stringified = await runScripted([print(bool(true))], { booleanForm: [0.35] });
		assert.deepEqual(stringified.presenter.calls, [{ method: "present", value: textVal("false") }]);
		const numeric = await runScripted([print(bool(false))], { booleanForm: [0.6] });
		assert.deepEqual(numeric.presenter.calls, [{ method: "present", value: numberVal(1) }]);
	});

	it("turns a number literal into confetti", async () => {
		const { lines } = await runScripted([print(num(3))], { confetti: [0.05] });
		assert.deepEqual(lines, ["present " + CONFETTI.repeat(3)]);
	});

	it("runs a huge confetti literal to completion", async () => {
		const { outcome, lines } = await runScripted(
			[try_([print(num(1e9))], "e", [print(txt("caught"))])],
			{ confetti: [0] },
		);
		assert.equal(outcome.status, "completed");
		assert.deepEqual(lines, ["present " + CONFETTI.repeat(1000)]);
	});

	it("sends an existing variable on vacation", async () => {
		const { outcome, lines } = await runScripted(
			[let_("x", num(1)), print(id("x"))],
			{ vacation: [0.1] },
		);
		assert.equal(crashedKind(outcome), "NameNotFound");
		assert.deepEqual(lines, [
			"presentError Variable 'x (it's on vacation)' not found. Have you tried looking under the couch?",
		]);
	});

	it("reports an unbound name", async () => {
		const { outcome, lines } = await runScripted([print(id("ghost"))]);
		assert.equal(crashedKind(outcome), "NameNotFound");
		assert.deepEqual(lines, [
			"presentError Variable 'ghost' not found. Have you tried looking under the couch?",
		]);
	});
});

//==============================================================================
// Comparisons
//==============================================================================

describe("Evaluator - comparisons", () => {
	it("compares structurally", async () => {
		const { lines } = await runScripted([
			print(call("equals", arr(num(1), txt("a")), arr(num(1), txt("a")))),
			print(call("lessThan", txt("apple"), txt("banana"))),
		]);
		assert.deepEqual(lines, ["present true", "present true"]);
	});

	it("surfaces a comparison TypeMismatch", async () => {
		const { outcome } = await runScripted([print(call("equals", num(1), txt("1")))]);
		assert.equal(crashedKind(outcome), "TypeMismatch");
	});

	it("may substitute a random Boolean for a comparison TypeMismatch", async () => {
		const { lines, outcome } = await runScripted(
			[print(call("lessThan", num(1), txt("1")))],
			{ mismatch: [0.1], coin: [0.9] },
		);
		assert.equal(outcome.status, "completed");
		assert.deepEqual(lines, ["present false"]);
	});
});

//==============================================================================
// Containers
//==============================================================================

describe("Evaluator - containers", () => {
	it("reads the requested index on a calm draw", async () => {
		const { lines } = await runScripted([print(call("index", arr(num(10), num(20), num(30)), num(2)))]);
		assert.deepEqual(lines, ["present 30"]);
	});

	it("reads a random index when shuffled", async () => {
		const { lines } = await runScripted(
			[print(call("index", arr(num(10), num(20), num(30)), num(2)))],
			{ index: [0.1], indexPick: [0.0] },
		);
		assert.deepEqual(lines, ["present 10"]);
	});

	it("always raises IndexOutOfVacation out of bounds", async () => {
		const { outcome } = await runScripted(
			[print(call("index", arr(num(1)), num(1)))],
			{ index: [0.1] },
		);
		assert.equal(crashedKind(outcome), "IndexOutOfVacation");
	});

	it("reads a random field when shuffled", async () => {
		const { lines } = await runScripted(
			[print(call("access", rec({ a: num(1), b: num(2) }), txt("a")))],
			{ field: [0.1], fieldPick: [0.6] },
		);
		assert.deepEqual(lines, ["present 2"]);
	});

	it("returns null for a missing key", async () => {
		const { lines } = await runScripted([print(call("access", rec({ a: num(1) }), txt("z")))]);
		assert.deepEqual(lines, ["present null"]);
	});

	it("raises EmptyRecordAccess on an empty record", async () => {
		const { outcome } = await runScripted([print(call("access", rec({}), txt("a")))]);
		assert.equal(crashedKind(outcome), "EmptyRecordAccess");
	});
});

//==============================================================================
// Control flow
//==============================================================================

describe("Evaluator - control flow", () => {
	it("always takes the else branch", async () => {
		const { lines } = await runScripted([
			if_(bool(true), [print(txt("then"))], [print(txt("else"))]),
		]);
		assert.deepEqual(lines, ["present else"]);
	});

	it("skips an if without else", async () => {
		const { lines } = await runScripted([
			if_(bool(true), [print(txt("then"))]),
			print(txt("after")),
		]);
		assert.deepEqual(lines, ["present after"]);
	});

	it("runs a loop body exactly once", async () => {
		const { lines } = await runScripted([loop([print(txt("pass"))], bool(false))]);
		assert.deepEqual(lines, ["present pass"]);
	});

	it("honours break inside the loop body", async () => {
		const { lines } = await runScripted([
			loop([if_(bool(true), [], [brk()]), print(txt("unreached"))]),
			print(txt("after")),
		]);
		assert.deepEqual(lines, ["present after"]);
	});

	it("treats break outside a loop as a no-op", async () => {
		const { lines } = await runScripted([brk(), print(num(1))]);
		assert.deepEqual(lines, ["present 1"]);
	});

	it("stops the program at a top-level return", async () => {
		const { lines, outcome } = await runScripted([ret(), print(num(1))]);
		assert.deepEqual(lines, []);
		assert.equal(outcome.status, "completed");
	});
});

//==============================================================================
// Functions
//==============================================================================

describe("Evaluator - functions", () => {
	it("binds parameters and returns a value", async () => {
		const { lines } = await runScripted([
			directive("disable_useless"),
			fn("sum3", ["a", "b", "c"], [ret(call("add", call("add", id("a"), id("b")), id("c")))]),
			print(call("sum3", num(1), num(2), num(3))),
		]);
		assert.deepEqual(lines, ["present 6"]);
	});

	it("closes over the defining scope", async () => {
		const { lines } = await runScripted([
			fn("outer", ["v"], [
				fn("inner", [], [ret(id("v"))]),
				ret(call("inner")),
			]),
			print(call("outer", num(7))),
		]);
		assert.deepEqual(lines, ["present 7"]);
	});

	it("sees later bindings of the defining scope", async () => {
		const { lines } = await runScripted([
			fn("late", [], [ret(id("later"))]),
			let_("later", txt("here")),
			print(call("late")),
		]);
		assert.deepEqual(lines, ["present here"]);
	});

	it("returns null without a return statement", async () => {
		const { lines } = await runScripted([fn("noop", [], []), print(call("noop"))]);
		assert.deepEqual(lines, ["present null"]);
	});

	it("rejects a wrong argument count", async () => {
		const { outcome } = await runScripted([fn("one", ["x"], []), expr(call("one"))]);
		assert.equal(crashedKind(outcome), "TypeMismatch");
	});

	it("rejects calling a non-function", async () => {
		const { outcome, lines } = await runScripted([let_("x", num(1)), expr(call("x"))]);
		assert.equal(crashedKind(outcome), "TypeMismatch");
		assert.deepEqual(lines, ["presentError call: 'x' is a number, not a function"]);
	});

	it("resolves built-in names before user functions", async () => {
		const { lines } = await runScripted([
			fn("add", ["a", "b"], [ret(num(100))]),
			print(call("add", num(1), num(1))),
		]);
		assert.deepEqual(lines, ["present 0"]);
	});
});

//==============================================================================
// Errors and try/catch
//==============================================================================

describe("Evaluator - try/catch", () => {
	it("binds the caught error as a record", async () => {
		const { lines, outcome } = await runScripted([
			try_([print(call("index", arr(num(1), num(2)), num(5)))], "e", printCaught("kind")),
		]);
		assert.deepEqual(lines, ["present IndexOutOfVacation"]);
		assert.equal(outcome.status, "completed");
	});

	it("carries the innermost span into the caught record", async () => {
		const failing = at({ line: 3, column: 5 }, call("index", arr(), num(0)));
		const { lines } = await runScripted([
			try_([expr(failing)], "e", [
				print(call("access", id("e"), txt("line"))),
				print(call("access", id("e"), txt("column"))),
			]),
		]);
		assert.deepEqual(lines, ["present 3", "present 5"]);
	});

	it("never catches save", async () => {
		const { lines, outcome } = await runScripted([
			try_([expr(call("save", txt("f.txt")))], "e", [print(txt("caught"))]),
			print(txt("after")),
		]);
		assert.equal(crashedKind(outcome), "SaveAlwaysFails");
		assert.deepEqual(lines, [
			"presentError Saving is overrated. Maybe try writing it down with a crayon instead? 📝",
		]);
	});

	it("skips the handler when the body succeeds", async () => {
		const { lines } = await runScripted([
			try_([print(txt("fine"))], "e", [print(txt("caught"))]),
		]);
		assert.deepEqual(lines, ["present fine"]);
	});
});

//==============================================================================
// Built-in side channels
//==============================================================================

describe("Evaluator - output built-ins", () => {
	it("raises the teapot after a successful print", async () => {
		const { lines, outcome } = await runScripted([print(num(1))], { teapot: [0.01] });
		assert.equal(crashedKind(outcome), "TeapotError");
		assert.deepEqual(lines, [
			"present 1",
			"presentError Error 418: I'm a teapot. Yes, really. No, I won't make coffee. ☕",
		]);
	});

	it("reports a browser error instead of printing", async () => {
		const { presenter, outcome } = await runScripted([print(num(1))], { browserError: [0.05] });
		assert.equal(outcome.status, "completed");
		assert.equal(presenter.calls.length, 1);
		assert.equal(presenter.calls[0]?.method, "presentError");
	});

	it("treats exit as a no-op", async () => {
		const { lines } = await runScripted([expr(call("exit")), print(num(1))]);
		assert.deepEqual(lines, ["present 1"]);
	});
});

//==============================================================================
// Evaluator lifecycle
//==============================================================================

describe("Evaluator - lifecycle", () => {
	it("treats an exceeded step budget as an engine defect", async () => {
		const evaluator = new Evaluator({
			presenter: new RecordingPresenter(),
			random: new ScriptedRandom(),
			config: { maxSteps: 5 },
		});
		await assert.rejects(
			evaluator.run(program(print(num(1)), print(num(2)), print(num(3)))),
			/Step limit exceeded/,
		);
	});

	it("runs a program only once", async () => {
		const evaluator = new Evaluator({ presenter: new RecordingPresenter(), random: new ScriptedRandom() });
		await evaluator.run(program());
		await assert.rejects(evaluator.run(program()), /only be called once/);
	});

	it("reports the seed of its built-in source", () => {
		const evaluator = new Evaluator({ presenter: new RecordingPresenter(), config: { seed: 42 } });
		assert.equal(evaluator.seed, 42);
	});
});
