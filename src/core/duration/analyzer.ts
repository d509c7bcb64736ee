// CHANGE: Analyzer descriptor and multi-unit runner
// WHY: Drivers address the pass by name and run it unit by unit
// REF: durationcheck analyzer
// PURITY: CORE
// INVARIANT: analyzeUnits preserves unit order and per-unit diagnostic order
// COMPLEXITY: O(Σ|nodes(u)|)

import type { CompiledUnit, Diagnostic } from "../types/index.js";
import { ANALYZER_NAME, checkUnit } from "./scan.js";

/**
 * A named analysis pass over compiled units.
 *
 * @pure true
 */
export interface Analyzer {
	readonly name: string;
	readonly doc: string;
	readonly run: <N>(unit: CompiledUnit<N>) => ReadonlyArray<Diagnostic>;
}

export const durationAnalyzer: Analyzer = {
	name: ANALYZER_NAME,
	doc: "check for two durations multiplied together",
	run: checkUnit,
};

/**
 * Runs an analyzer over every unit and concatenates the findings.
 *
 * @pure true
 * @complexity O(Σ|nodes(u)|)
 */
export const analyzeUnits = <N>(
	analyzer: Analyzer,
	units: ReadonlyArray<CompiledUnit<N>>,
): ReadonlyArray<Diagnostic> => units.flatMap((unit) => analyzer.run(unit));
