// CHANGE: Pure report formatting for duration diagnostics
// WHY: Text and JSON renderings are deterministic functions of the diagnostic list
// REF: durationcheck output
// FORMAT THEOREM: ∀d ∈ D: formatDiagnosticLine(d) = path(d) + ":" + line + ":" + column + ": " + message
// PURITY: CORE
// INVARIANT: Input order is preserved in every rendering
// COMPLEXITY: O(n) where n = |diagnostics|

import type { Diagnostic, DiagnosticSummary } from "../types/index.js";

/** Maps an absolute file name to the form shown to the user. */
export type DisplayPath = (fileName: string) => string;

const identity: DisplayPath = (fileName) => fileName;

/**
 * One JSON entry, keyed under file and analyzer name.
 */
export interface JsonDiagnostic {
	readonly posn: string;
	readonly message: string;
}

export type JsonReport = Readonly<
	Record<string, Readonly<Record<string, ReadonlyArray<JsonDiagnostic>>>>
>;

/**
 * @pure true
 * @example formatPosition(d) === "src/a.ts:3:14"
 */
export const formatPosition = (
	diagnostic: Diagnostic,
	displayPath: DisplayPath = identity,
): string => {
	const { fileName, line, column } = diagnostic.position;
	return `${displayPath(fileName)}:${line}:${column}`;
};

/**
 * @pure true
 * @complexity O(1)
 */
export const formatDiagnosticLine = (
	diagnostic: Diagnostic,
	displayPath: DisplayPath = identity,
): string => `${formatPosition(diagnostic, displayPath)}: ${diagnostic.message}`;

/**
 * @pure true
 * @invariant result.files = |{d.position.fileName | d ∈ diagnostics}|
 */
export const summarize = (
	diagnostics: ReadonlyArray<Diagnostic>,
): DiagnosticSummary => ({
	total: diagnostics.length,
	files: new Set(diagnostics.map((d) => d.position.fileName)).size,
});

/**
 * Groups diagnostics by displayed file, then by analyzer.
 *
 * @pure true (accumulators are local)
 * @complexity O(n)
 */
export function toJsonReport(
	diagnostics: ReadonlyArray<Diagnostic>,
	displayPath: DisplayPath = identity,
): JsonReport {
	const byFile = new Map<string, Map<string, JsonDiagnostic[]>>();
	for (const d of diagnostics) {
		const file = displayPath(d.position.fileName);
		const byAnalyzer = byFile.get(file) ?? new Map<string, JsonDiagnostic[]>();
		const entries = byAnalyzer.get(d.analyzer) ?? [];
		entries.push({
			posn: formatPosition(d, displayPath),
			message: d.message,
		});
		byAnalyzer.set(d.analyzer, entries);
		byFile.set(file, byAnalyzer);
	}

	const report: Record<string, Record<string, JsonDiagnostic[]>> = {};
	for (const [file, byAnalyzer] of byFile) {
		report[file] = Object.fromEntries(byAnalyzer);
	}
	return report;
}
