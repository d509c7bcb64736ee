// CHANGE: Diagnostic record emitted by the duration analyzer
// WHY: Findings leave the CORE as plain immutable values; printing belongs to the shell
// REF: durationcheck output boundary
// PURITY: CORE
// INVARIANT: message.length > 0
// COMPLEXITY: O(1)

import type { SourcePosition } from "./syntax.js";

/**
 * A reported finding.
 *
 * @property analyzer Name of the analyzer that produced it
 * @property position Start of the flagged expression
 * @property message Human-readable text
 */
export interface Diagnostic {
	readonly analyzer: string;
	readonly position: SourcePosition;
	readonly message: string;
}

/**
 * Aggregate counts over a diagnostic sequence.
 *
 * @invariant files ≤ total
 */
export interface DiagnosticSummary {
	readonly total: number;
	readonly files: number;
}
