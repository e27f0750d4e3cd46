// Fickle Environment
// Lexical scope chain: ρ = name -> value, innermost first
//
// Scopes are plain garbage-collected objects. A closure holds its defining
// scope, so a scope lives as long as its longest holder (a call frame or any
// function value created inside it).

import { FickleError } from "./errors.ts";
import type { Value } from "./types.ts";

export class Scope {
	readonly parent: Scope | undefined;
	private readonly slots = new Map<string, Value>();

	constructor(parent?: Scope) {
		this.parent = parent;
	}

	/** Bind `name` in this scope, replacing an existing binding here only. */
	define(name: string, value: Value): void {
		this.slots.set(name, value);
	}

	/**
	 * Resolve `name` innermost-to-outermost.
	 * @throws FickleError NameNotFound when no scope binds it
	 */
	lookup(name: string): Value {
		const value = this.find(name);
		if (value === undefined) {
			throw FickleError.nameNotFound(name);
		}
		return value;
	}

	find(name: string): Value | undefined {
		for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
			const value = scope.slots.get(name);
			if (value !== undefined) return value;
		}
		return undefined;
	}

	has(name: string): boolean {
		return this.find(name) !== undefined;
	}

	child(): Scope {
		return new Scope(this);
	}

	/** Names bound directly in this scope, in definition order. */
	ownNames(): string[] {
		return [...this.slots.keys()];
	}
}

export function globalScope(): Scope {
	return new Scope();
}
