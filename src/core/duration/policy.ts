// CHANGE: Single definition of "what counts as a duration"
// WHY: Type identity is by canonical qualified name; every comparison goes through isDuration
// REF: durationcheck policy
// PURITY: CORE
// INVARIANT: DURATION_TYPE = TIME_MODULE + "." + DURATION_CONSTRUCTOR
// COMPLEXITY: O(1)

import type { ResolvedType } from "../types/index.js";

/** Module specifier of the time-handling module. */
export const TIME_MODULE = "time";

/** Exported name of both the duration type and its conversion function. */
export const DURATION_CONSTRUCTOR = "Duration";

/** Canonical qualified name of the duration type. */
export const DURATION_TYPE = `${TIME_MODULE}.${DURATION_CONSTRUCTOR}`;

/**
 * @returns true iff the type is the duration type (aliases included, they share the canonical name)
 *
 * @pure true
 * @invariant isDuration(undefined) = false
 * @complexity O(1)
 */
export const isDuration = (type: ResolvedType | undefined): boolean =>
	type !== undefined && type.canonicalName === DURATION_TYPE;
