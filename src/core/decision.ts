// CHANGE: Pure decision function mapping run state to an exit code
// WHY: Centralize termination logic in Functional Core with Effect composition support
// REF: durationcheck exit codes, Effect integration
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s: s.hasFailed → 2; ¬s.hasFailed ∧ s.hasFindings → 1; otherwise 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from run state (pure function).
 *
 * @param state - Immutable flags computed from the run
 * @returns 2 if the analysis failed, 1 if anything was reported, otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1,2}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({ hasFindings: true, hasFailed: false });
 * // exitCode === 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode => {
	if (state.hasFailed) return 2;
	return state.hasFindings ? 1 : 0;
};

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @pure false - wraps in Effect for composition
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 */
export const computeExitCodeEffect = (
	state: DecisionState,
): Effect.Effect<ExitCode> => pipe(state, computeExitCode, Effect.succeed);
