// @ts-check
import eslint from "@eslint/js";
import eslintCommentsConfigs from "@eslint-community/eslint-plugin-eslint-comments/configs";
import vitest from "eslint-plugin-vitest";
import { defineConfig } from "eslint/config";
import globals from "globals";
import tseslint from "typescript-eslint";

export default defineConfig(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	eslintCommentsConfigs.recommended,
	{
		files: ["**/*.ts"],
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			complexity: ["error", 8],
			"max-params": ["error", 4],
			"max-depth": ["error", 3],
			"max-lines-per-function": [
				"error",
				{ max: 50, skipBlankLines: true, skipComments: true },
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{ "ts-ignore": true, "ts-nocheck": true, "ts-expect-error": true },
			],
			"@eslint-community/eslint-comments/no-unlimited-disable": "error",
			"@eslint-community/eslint-comments/disable-enable-pair": "error",
			"no-restricted-syntax": [
				"error",
				{
					selector: "SwitchStatement",
					message:
						"Use ts-pattern match() or discriminated-union narrowing instead of switch.",
				},
				{
					selector: "FunctionDeclaration[async=true], ArrowFunctionExpression[async=true]",
					message: "Compose effects with Effect.gen / Effect.try instead of async/await.",
				},
				{
					selector: 'CallExpression[callee.name="require"]',
					message: "Use ES module imports.",
				},
			],
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{ allowNumber: true, allowBoolean: true },
			],
		},
	},
	{
		files: ["test/**/*.ts"],
		...vitest.configs.all,
		rules: {
			"max-lines-per-function": "off",
			"vitest/prefer-expect-assertions": "off",
		},
	},
	{ ignores: ["dist/**", "coverage/**", "test/fixtures/**"] },
);
