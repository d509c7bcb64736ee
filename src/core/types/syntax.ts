// CHANGE: Describe the front end as read-only capabilities consumed by the CORE
// WHY: The detector must not depend on a concrete compiler API; the shell injects tree, types and printer
// REF: durationcheck front-end boundary
// PURITY: CORE (types only)
// INVARIANT: Nothing here is mutated by the core; every capability is a pure lookup for one unit
// COMPLEXITY: O(1)

import type { Either } from "effect";

import type { RenderError } from "../errors.js";

/**
 * Callee of a call expression, as far as the conversion check cares.
 *
 * @remarks
 * - `qualified` is `qualifier.member(...)` where `qualifier` is a bare identifier
 * - every other callee form collapses into `other`
 */
export type CalleeShape =
	| {
			readonly kind: "qualified";
			readonly qualifier: string;
			readonly member: string;
	  }
	| { readonly kind: "other" };

export interface BinaryShape<N> {
	readonly kind: "binary";
	readonly operator: string;
	readonly left: N;
	readonly right: N;
}

export interface CallShape<N> {
	readonly kind: "call";
	readonly callee: CalleeShape;
	readonly args: ReadonlyArray<N>;
}

/**
 * Closed view of an expression node.
 *
 * @pure true
 * @invariant kind ∈ {"binary", "literal", "call", "other"}
 */
export type ExprShape<N> =
	| BinaryShape<N>
	| { readonly kind: "literal" }
	| CallShape<N>
	| { readonly kind: "other" };

/**
 * Read-only syntax tree of one compiled unit.
 *
 * @invariant finite and acyclic; children(n) never contains an ancestor of n
 */
export interface SyntaxTree<N> {
	readonly root: N;
	readonly children: (node: N) => ReadonlyArray<N>;
	readonly shapeOf: (node: N) => ExprShape<N>;
}

/** Statically resolved type, identified by its canonical qualified name. */
export interface ResolvedType {
	readonly canonicalName: string;
}

/**
 * Best-effort node → type table supplied by the front end.
 *
 * @remarks `undefined` means "no binding"; the core treats it as a skip, never as an error.
 */
export interface TypeTable<N> {
	readonly typeOf: (node: N) => ResolvedType | undefined;
}

/**
 * Location of a node in its unit's source text.
 *
 * @invariant offset ≥ 0 ∧ line ≥ 1 ∧ column ≥ 1
 */
export interface SourcePosition {
	readonly fileName: string;
	readonly offset: number;
	readonly line: number;
	readonly column: number;
}

/**
 * One source file, parsed and type-resolved, as handed to the analyzer.
 *
 * @pure true (read-only record of capabilities)
 * @invariant tree, types, locate and render all refer to the same source file
 */
export interface CompiledUnit<N> {
	readonly fileName: string;
	readonly imports: ReadonlyArray<string>;
	readonly tree: SyntaxTree<N>;
	readonly types: TypeTable<N>;
	readonly locate: (node: N) => SourcePosition;
	readonly render: (node: N) => Either.Either<string, RenderError>;
}

/** The part of a unit the classifiers need. */
export type UnitView<N> = Pick<CompiledUnit<N>, "tree" | "types">;
