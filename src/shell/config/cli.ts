// CHANGE: Command-line parsing for durationcheck
// WHY: CLI parsing stays in the shell; the rest of the program receives CLIOptions as a value
// REF: durationcheck CLI
// SOURCE: n/a

import type { CLIOptions } from "../../core/types/index.js";

type ParseState = CLIOptions & { readonly skipNext: boolean };

// CHANGE: Handlers for flags that take a value
// WHY: Eliminates branching in processArgument
type ValueFlagHandler = (
	value: string | undefined,
	current: CLIOptions,
) => ParseState | null;

const projectHandler: ValueFlagHandler = (value, current) =>
	value === undefined ? null : { ...current, project: value, skipNext: true };

const valueHandlers: Readonly<Record<string, ValueFlagHandler | undefined>> = {
	"--project": projectHandler,
	"-p": projectHandler,
};

function processArgument(
	arg: string,
	next: string | undefined,
	current: CLIOptions,
): ParseState {
	const handler = valueHandlers[arg];
	if (handler !== undefined) {
		const result = handler(next, current);
		if (result !== null) return result;
	}

	if (arg === "--json") {
		return { ...current, format: "json", skipNext: false };
	}

	// Handle positional argument
	if (!arg.startsWith("-")) {
		return { ...current, targetPath: arg, skipNext: false };
	}

	return { ...current, skipNext: false };
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Аргументы без `node` и имени скрипта
 * @returns Опции командной строки
 *
 * @example
 * ```ts
 * // Command: durationcheck src/ --project tsconfig.build.json --json
 * const options = parseCLIArgs(["src/", "--project", "tsconfig.build.json", "--json"]);
 * // Returns: { targetPath: "src/", project: "tsconfig.build.json", format: "json" }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: CLIOptions = {
		targetPath: ".",
		project: "tsconfig.json",
		format: "text",
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const { skipNext, ...options } = processArgument(arg, args.at(i + 1), state);
		state = options;
		if (skipNext) {
			i++;
		}
	}

	return state;
}
