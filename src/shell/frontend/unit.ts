// CHANGE: Build CompiledUnit capabilities from a ts.Program
// WHY: The CORE consumes tree, types, positions and printer output through narrow interfaces
// REF: durationcheck front end
// PURITY: SHELL
// EFFECT: printer failures are logged as warnings and returned as RenderError values
// INVARIANT: one unit ↔ one non-declaration, non-library source file
// COMPLEXITY: O(1) per capability call

import { Either } from "effect";
import ts from "typescript";

import { RenderError } from "../../core/errors.js";
import type {
	CompiledUnit,
	ResolvedType,
	SourcePosition,
} from "../../core/types/index.js";
import { debugLog, isDebugEnabled, warnLog } from "../log.js";
import { canonicalTypeOf } from "./canonical.js";
import { childrenOf, collectImports, shapeOf } from "./syntax.js";

const printer = ts.createPrinter({ removeComments: true });

/**
 * Indented syntax-kind dump of a subtree, used for debug tracing.
 *
 * @pure true
 */
export function describeNode(node: ts.Node, depth = 0): string {
	const line = `${"  ".repeat(depth)}${ts.SyntaxKind[node.kind]}`;
	const nested = childrenOf(node).map((child) => describeNode(child, depth + 1));
	return [line, ...nested].join("\n");
}

/**
 * Type binding of a node; `any` carries no information and counts as unresolved.
 *
 * @pure false (queries the type checker)
 */
export function resolveType(
	checker: ts.TypeChecker,
	node: ts.Node,
): ResolvedType | undefined {
	const type = checker.getTypeAtLocation(node);
	if ((type.flags & ts.TypeFlags.Any) !== 0) return undefined;
	return { canonicalName: canonicalTypeOf(checker, type) };
}

export function locate(
	sourceFile: ts.SourceFile,
	node: ts.Node,
): SourcePosition {
	const offset = node.getStart(sourceFile);
	const { line, character } = sourceFile.getLineAndCharacterOfPosition(offset);
	return {
		fileName: sourceFile.fileName,
		offset,
		line: line + 1,
		column: character + 1,
	};
}

/** The part of ts.Printer the renderer needs. */
export type NodePrinter = Pick<ts.Printer, "printNode">;

/**
 * Pretty-prints an expression back to source text.
 *
 * @effect logs a warning on failure; logs the rendered text and a syntax dump in debug mode
 */
export function renderNode(
	node: ts.Node,
	sourceFile: ts.SourceFile,
	nodePrinter: NodePrinter = printer,
): Either.Either<string, RenderError> {
	const rendered = Either.try({
		try: () => nodePrinter.printNode(ts.EmitHint.Expression, node, sourceFile),
		catch: (error) => new RenderError({ detail: String(error) }),
	});
	if (Either.isLeft(rendered)) {
		warnLog(`Error formatting expression: ${rendered.left.detail}`);
	} else if (isDebugEnabled()) {
		debugLog(`>>> ${rendered.right}\n${describeNode(node)}`);
	}
	return rendered;
}

/**
 * Wraps one source file of a program as a CompiledUnit.
 *
 * @pure false (captures the program's type checker)
 * @invariant every capability answers for nodes of `sourceFile` only
 */
export function createUnit(
	program: ts.Program,
	sourceFile: ts.SourceFile,
): CompiledUnit<ts.Node> {
	const checker = program.getTypeChecker();
	return {
		fileName: sourceFile.fileName,
		imports: collectImports(sourceFile),
		tree: { root: sourceFile, children: childrenOf, shapeOf },
		types: { typeOf: (node) => resolveType(checker, node) },
		locate: (node) => locate(sourceFile, node),
		render: (node) => renderNode(node, sourceFile),
	};
}

/**
 * Units for the program's own source files accepted by `include`.
 *
 * @invariant declaration files and files from external libraries are never units
 * @complexity O(|files|)
 */
export function createUnits(
	program: ts.Program,
	include: (fileName: string) => boolean = () => true,
): ReadonlyArray<CompiledUnit<ts.Node>> {
	return program
		.getSourceFiles()
		.filter(
			(sf) =>
				!sf.isDeclarationFile &&
				!program.isSourceFileFromExternalLibrary(sf) &&
				include(sf.fileName),
		)
		.map((sf) => createUnit(program, sf));
}
