// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE analysis and the TypeScript front end; hide CLI plumbing
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect values
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run the checker programmatically.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runCheck } from "durationcheck";
 *
 * const exitCode = await Effect.runPromise(
 *   runCheck({ targetPath: "src/", project: "tsconfig.json", format: "text" }),
 * );
 * ```
 *
 * @pure false - Orchestrates SHELL effects (tsconfig loading, console output)
 * @returns Effect<ExitCode> (0 = clean, 1 = findings, 2 = failure)
 */
export { analyze, runCheck } from "./app/runCheck.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode } from "./core/models.js";
export type {
	CalleeShape,
	CLIOptions,
	CompiledUnit,
	Diagnostic,
	DiagnosticSummary,
	ExprShape,
	OutputFormat,
	ResolvedType,
	SourcePosition,
	SyntaxTree,
	TypeTable,
} from "./core/types/index.js";
export { ConfigError, InvariantViolation, RenderError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Analyzer descriptor, scanner and classifiers.
 *
 * @pure true
 * @complexity O(n) where n = |nodes| per unit
 */
export {
	type Analyzer,
	analyzeUnits,
	checkUnit,
	DURATION_TYPE,
	durationAnalyzer,
	isAcceptableCast,
	isAcceptableCastArg,
	isDuration,
	isUnacceptableOperand,
	TIME_MODULE,
} from "./core/duration/index.js";
export { computeExitCode, computeExitCodeEffect } from "./core/decision.js";
export {
	formatDiagnosticLine,
	summarize,
	toJsonReport,
} from "./core/format/report.js";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPESCRIPT FRONT END
// ═══════════════════════════════════════════════════════════════════════════════

export { createUnit, createUnits } from "./shell/frontend/index.js";
export { loadProject } from "./shell/project/load.js";
