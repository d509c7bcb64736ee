// CHANGE: Application layer orchestration for durationcheck (APP)
// WHY: Compose pure CORE analysis with SHELL project loading and printing
// REF: durationcheck driver
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; no termination side effects
// COMPLEXITY: O(n) where n = nodes across analysed units

import { Effect } from "effect";
import type ts from "typescript";

import { computeExitCodeEffect } from "../core/decision.js";
import { analyzeUnits, durationAnalyzer } from "../core/duration/analyzer.js";
import { TIME_MODULE } from "../core/duration/policy.js";
import { hasImport } from "../core/duration/scan.js";
import type { AppError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import type {
	CLIOptions,
	CompiledUnit,
	Diagnostic,
} from "../core/types/index.js";
import { parseCLIArgs } from "../shell/config/index.js";
import { debugLog } from "../shell/log.js";
import { printReport } from "../shell/output/printer.js";
import { loadProject } from "../shell/project/load.js";

/**
 * Human-readable description of a run failure.
 *
 * @pure true
 */
export const describeAppError = (error: AppError): string =>
	error._tag === "ConfigError"
		? `Failed to load ${error.path}: ${error.detail}`
		: `Invariant violated in ${error.where}: ${error.detail}`;

/**
 * Runs the analyzer over units, tracing units the import gate skips.
 *
 * @pure false (debug logging only)
 */
export function analyze(
	units: ReadonlyArray<CompiledUnit<ts.Node>>,
): ReadonlyArray<Diagnostic> {
	for (const unit of units) {
		if (!hasImport(unit, TIME_MODULE)) {
			debugLog(`skip ${unit.fileName}: no "${TIME_MODULE}" import`);
		}
	}
	return analyzeUnits(durationAnalyzer, units);
}

/**
 * Orchestrates one check and returns ExitCode as value (no process.exit).
 *
 * @param cliOptions - Parsed CLI options
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @effect Effect<ExitCode, never> - errors are reported and mapped to exit code 2
 * @invariant ExitCode ∈ {0,1,2}
 */
export function runCheck(cliOptions: CLIOptions): Effect.Effect<ExitCode> {
	return loadProject(cliOptions).pipe(
		Effect.map(({ units }) => analyze(units)),
		Effect.tap((diagnostics) => printReport(diagnostics, cliOptions.format)),
		Effect.flatMap((diagnostics) =>
			computeExitCodeEffect({ hasFindings: diagnostics.length > 0, hasFailed: false }),
		),
		Effect.catchAll((error) =>
			Effect.sync(() => {
				console.error(`❌ ${describeAppError(error)}`);
			}).pipe(
				Effect.flatMap(() =>
					computeExitCodeEffect({ hasFindings: false, hasFailed: true }),
				),
			),
		),
	);
}

/**
 * Main entry point for the application.
 *
 * @returns Effect<ExitCode, never>
 * @pure false (coordinates effects)
 */
export function main(): Effect.Effect<ExitCode> {
	return runCheck(parseCLIArgs());
}
