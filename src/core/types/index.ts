// CHANGE: Single import point for the CORE data model
// WHY: Core, shell and tests share one set of syntax, diagnostic and config types
// REF: durationcheck data model

export type { CLIOptions, OutputFormat } from "./config.js";
export type { Diagnostic, DiagnosticSummary } from "./diagnostic.js";
export type {
	BinaryShape,
	CalleeShape,
	CallShape,
	CompiledUnit,
	ExprShape,
	ResolvedType,
	SourcePosition,
	SyntaxTree,
	TypeTable,
	UnitView,
} from "./syntax.js";
