// Fickle Document Validator
// Structural validation of program documents and runtime configuration

import { z } from "zod/v4";
import {
	invalidResult,
	ProgramValidationError,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.ts";
import {
	ProgramSchema,
	RuntimeConfigSchema,
	type Program,
	type RuntimeConfig,
	type RuntimeConfigInput,
} from "./zod-schemas.ts";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Public API
//==============================================================================

export function validateProgram(doc: unknown): ValidationResult<Program> {
	const parsed = ProgramSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult(zodToValidationErrors(parsed.error));
	}
	return validResult(parsed.data);
}

/**
 * Validate a program document, throwing ProgramValidationError on failure.
 */
export function parseProgram(doc: unknown): Program {
	const parsed = ProgramSchema.safeParse(doc);
	if (!parsed.success) {
		throw new ProgramValidationError("program", zodToValidationErrors(parsed.error));
	}
	return parsed.data;
}

/**
 * Validate runtime configuration and fill in defaults.
 */
export function parseConfig(input: RuntimeConfigInput = {}): RuntimeConfig {
	const parsed = RuntimeConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new ProgramValidationError("configuration", zodToValidationErrors(parsed.error));
	}
	return parsed.data;
}
