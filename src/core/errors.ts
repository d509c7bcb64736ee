// CHANGE: Typed domain error ADT for durationcheck using Effect.Data
// WHY: Failures travel as values through Effect signatures instead of thrown exceptions
// REF: Effect Data API (typed errors)
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * tsconfig could not be read or parsed
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 * @complexity O(1)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Invariant violation - mathematical guarantee broken
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 * @complexity O(1)
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Pretty-printer could not turn a node back into source text
 *
 * @pure true (Data class)
 * @complexity O(1)
 */
export class RenderError extends Data.TaggedError("RenderError")<{
	readonly detail: string;
}> {}

/**
 * Union of the errors that can abort a run (rendering failures never do).
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError = ConfigError | InvariantViolation;
