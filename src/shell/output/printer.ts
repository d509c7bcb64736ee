// CHANGE: Print duration diagnostics as text lines or a JSON document
// WHY: Rendering is pure (core/format/report); this module only owns stdout
// REF: durationcheck output
// PURITY: SHELL
// EFFECT: Effect<void> (console output)
// INVARIANT: diagnostics are printed in the order received

import * as path from "node:path";
import { Effect } from "effect";
import { match } from "ts-pattern";

import {
	type DisplayPath,
	formatDiagnosticLine,
	summarize,
	toJsonReport,
} from "../../core/format/report.js";
import type { Diagnostic, OutputFormat } from "../../core/types/index.js";

/** Paths relative to `cwd`, with forward slashes. */
export const relativeTo =
	(cwd: string): DisplayPath =>
	(fileName) =>
		path.relative(cwd, fileName).split(path.sep).join("/");

/**
 * Text report: one line per diagnostic and a closing summary.
 *
 * @pure true
 */
export function textReportLines(
	diagnostics: ReadonlyArray<Diagnostic>,
	displayPath: DisplayPath,
): ReadonlyArray<string> {
	const { total, files } = summarize(diagnostics);
	if (total === 0) return ["✅ No duration multiplications found!"];
	return [
		...diagnostics.map((d) => formatDiagnosticLine(d, displayPath)),
		`\n❌ ${total} duration multiplication(s) in ${files} file(s)`,
	];
}

/**
 * Writes the report for the selected format to stdout.
 *
 * @effect console.log
 */
export function printReport(
	diagnostics: ReadonlyArray<Diagnostic>,
	format: OutputFormat,
	cwd: string = process.cwd(),
): Effect.Effect<void> {
	const displayPath = relativeTo(cwd);
	return Effect.sync(() => {
		const output = match(format)
			.with("json", () => JSON.stringify(toJsonReport(diagnostics, displayPath), null, 2))
			.with("text", () => textReportLines(diagnostics, displayPath).join("\n"))
			.exhaustive();
		console.log(output);
	});
}
