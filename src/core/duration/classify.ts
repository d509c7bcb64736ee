// CHANGE: Operand classification for duration × duration multiplications
// WHY: Separates disguised scalars (literals, constant conversions) from real duration expressions
// REF: durationcheck classifiers
// FORMAT THEOREM:
//   safe(lit) = ⊤; safe(a ∘ b) = safe(a) ∧ safe(b); safe(e) = ¬isDuration(typeOf(e)) otherwise
//   cast(c) = |c.args| = 1 ∧ safe(c.args₀) ∧ c.callee = time.Duration
//   unacceptable(lit) = ⊥; unacceptable(c) = ¬cast(c); unacceptable(e) = ⊤ otherwise
// PURITY: CORE
// INVARIANT: Every function is total and terminates (tree is finite and acyclic)
// COMPLEXITY: O(k) where k = size of the inspected subtree

import type { CallShape, UnitView } from "../types/index.js";
import { DURATION_CONSTRUCTOR, isDuration, TIME_MODULE } from "./policy.js";

/**
 * Decides whether the argument of a duration conversion is a genuine scalar.
 *
 * @param unit - Tree and type table of the current unit
 * @param node - Argument expression
 * @returns false when the argument (or any non-literal leaf of its arithmetic) is already a duration
 *
 * @pure true
 * @invariant a missing type binding counts as "not a duration"
 * @complexity O(k) where k = nodes in the argument's binary-operation spine
 *
 * @example
 * ```ts
 * // time.Duration(10 * 60 * 1000) → argument is safe
 * // time.Duration(timeout)         → safe iff timeout is not a duration
 * ```
 */
export function isAcceptableCastArg<N>(unit: UnitView<N>, node: N): boolean {
	const shape = unit.tree.shapeOf(node);
	if (shape.kind === "literal") return true;
	if (shape.kind === "binary") {
		return (
			isAcceptableCastArg(unit, shape.left) &&
			isAcceptableCastArg(unit, shape.right)
		);
	}
	return !isDuration(unit.types.typeOf(node));
}

/**
 * Decides whether a call is the sanctioned `time.Duration(<scalar>)` conversion.
 *
 * @pure true
 * @postcondition result → call.args.length = 1
 * @complexity O(k) where k = size of the argument
 */
export function isAcceptableCast<N>(
	unit: UnitView<N>,
	call: CallShape<N>,
): boolean {
	const [arg] = call.args;
	if (call.args.length !== 1 || arg === undefined) return false;
	if (!isAcceptableCastArg(unit, arg)) return false;

	const { callee } = call;
	return (
		callee.kind === "qualified" &&
		callee.qualifier === TIME_MODULE &&
		callee.member === DURATION_CONSTRUCTOR
	);
}

/**
 * Decides whether one operand of a duration × duration product counts toward the bug pattern.
 *
 * @param unit - Tree and type table of the current unit
 * @param node - Operand already known to have the duration type
 * @returns false for literals and legitimate conversions; true for everything else
 *
 * @pure true
 * @invariant unrecognized shapes are unacceptable
 * @complexity O(k) where k = size of a conversion argument, O(1) otherwise
 */
export function isUnacceptableOperand<N>(unit: UnitView<N>, node: N): boolean {
	const shape = unit.tree.shapeOf(node);
	if (shape.kind === "literal") return false;
	if (shape.kind === "call") return !isAcceptableCast(unit, shape);
	return true;
}
