// CHANGE: Functional Core domain models for the run outcome (pure, immutable)
// WHY: The exit code is derived from values, never from side effects
// REF: durationcheck exit codes
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the checker process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1, 2}: clean, findings, analysis failed
 */
export type ExitCode = 0 | 1 | 2;

/**
 * Minimal decision state for producing exit code from diagnostics.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hasFindings: boolean;
	readonly hasFailed: boolean;
}
