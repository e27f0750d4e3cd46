import eslint from "@eslint/js";
import tseslint from "typescript-eslint";
import type { ConfigArray } from "typescript-eslint";

export default [
	{
		ignores: ["dist/**", "node_modules/**", "*.config.ts"],
	},

	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// Type-aware rules for the runtime
	...tseslint.configs.strictTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	{
		files: ["src/**/*.ts"],
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			// Error messages concatenate numbers
			"@typescript-eslint/restrict-template-expressions": ["error", { allowNumber: true }],
			"@typescript-eslint/restrict-plus-operands": ["error", { allowNumberAndString: true }],
			// Narrow values instead of asserting them
			"@typescript-eslint/consistent-type-assertions": ["error", { assertionStyle: "never" }],
			"max-lines-per-function": ["warn", { max: 50, skipBlankLines: true, skipComments: true }],
			complexity: ["warn", { max: 10 }],
			indent: ["error", "tab"],
			quotes: ["error", "double", { avoidEscape: true }],
		},
	},

	...tseslint.configs.recommended.map((config) => ({
		...config,
		files: ["test/**/*.ts"],
	})),
	{
		files: ["test/**/*.ts"],
		rules: {
			indent: ["error", "tab"],
			quotes: ["error", "double", { avoidEscape: true }],
		},
	},
] satisfies ConfigArray;
