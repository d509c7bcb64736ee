// CHANGE: Multiplication scanner, unit gate and reporter
// WHY: One pre-order pass per unit turns duration × duration products into diagnostics
// REF: durationcheck scanner
// FORMAT THEOREM:
//   report(e) ⇔ e = l * r ∧ isDuration(τ(l)) ∧ isDuration(τ(r)) ∧ unacceptable(l) ∧ unacceptable(r)
// PURITY: CORE
// INVARIANT: Every node is visited exactly once; output order = pre-order, left to right
// COMPLEXITY: O(n) where n = |nodes| (plus conversion arguments of flagged candidates)

import { Either } from "effect";

import type {
	CompiledUnit,
	Diagnostic,
	SyntaxTree,
} from "../types/index.js";
import { isUnacceptableOperand } from "./classify.js";
import { isDuration, TIME_MODULE } from "./policy.js";

/** Name carried by every diagnostic this scanner produces. */
export const ANALYZER_NAME = "durationcheck";

const MESSAGE_PREFIX = "Multiplication of durations";

/**
 * @pure true
 * @complexity O(|imports|)
 */
export const hasImport = <N>(
	unit: Pick<CompiledUnit<N>, "imports">,
	modulePath: string,
): boolean => unit.imports.includes(modulePath);

/**
 * @pure true
 * @example formatMessage("a * b") === "Multiplication of durations: `a * b`"
 */
export const formatMessage = (rendered: string): string =>
	`${MESSAGE_PREFIX}: \`${rendered}\``;

/**
 * Lists the nodes of a tree in pre-order, left to right.
 *
 * @pure true (the stack is local)
 * @invariant ∀n ∈ tree: n occurs exactly once in the result
 * @complexity O(n) time / O(depth · fan-out) space
 */
export function preorder<N>(tree: SyntaxTree<N>): ReadonlyArray<N> {
	const visited: N[] = [];
	const stack: N[] = [tree.root];
	for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
		visited.push(node);
		const children = tree.children(node);
		for (let i = children.length - 1; i >= 0; i--) {
			const child = children[i];
			if (child !== undefined) stack.push(child);
		}
	}
	return visited;
}

/**
 * Builds the diagnostic for a flagged expression.
 *
 * @pure false (render may log)
 * @invariant a rendering failure yields an empty expression text, never a missing diagnostic
 */
export const reportAt = <N>(unit: CompiledUnit<N>, node: N): Diagnostic => ({
	analyzer: ANALYZER_NAME,
	position: unit.locate(node),
	message: formatMessage(Either.getOrElse(unit.render(node), () => "")),
});

/**
 * Checks a single node; only `*` binary nodes can produce a diagnostic.
 *
 * @pure true
 * @postcondition |result| ≤ 1
 * @complexity O(1) plus the classification of both operands
 */
export function checkNode<N>(
	unit: CompiledUnit<N>,
	node: N,
): ReadonlyArray<Diagnostic> {
	const shape = unit.tree.shapeOf(node);
	if (shape.kind !== "binary" || shape.operator !== "*") return [];

	const leftType = unit.types.typeOf(shape.left);
	const rightType = unit.types.typeOf(shape.right);
	if (leftType === undefined || rightType === undefined) return [];
	if (!isDuration(leftType) || !isDuration(rightType)) return [];

	// Both sides must read as raw durations; one disguised scalar is enough to pass
	const flagged =
		isUnacceptableOperand(unit, shape.left) &&
		isUnacceptableOperand(unit, shape.right);
	return flagged ? [reportAt(unit, node)] : [];
}

/**
 * Scans one compiled unit.
 *
 * @param unit - Parsed and type-resolved source file
 * @returns Diagnostics in pre-order; [] when the unit never imports the time module
 *
 * @pure true
 * @invariant checkUnit(u) deep-equals checkUnit(u) (idempotent over an unmodified unit)
 * @complexity O(n) where n = |nodes|
 */
export function checkUnit<N>(unit: CompiledUnit<N>): ReadonlyArray<Diagnostic> {
	if (!hasImport(unit, TIME_MODULE)) return [];
	return preorder(unit.tree).flatMap((node) => checkNode(unit, node));
}
