// CHANGE: Project TypeScript AST nodes onto the CORE's closed expression shapes
// WHY: The detector only distinguishes binary, literal, call and other
// REF: durationcheck front end
// PURITY: SHELL (reads ts.Node, never mutates it)
// INVARIANT: shapeOf is total; parenthesized and prefix-unary expressions are "other"
// COMPLEXITY: O(1) per node, O(|statements|) for imports

import { match } from "ts-pattern";
import ts from "typescript";

import type { CalleeShape, ExprShape } from "../../core/types/index.js";

const LITERAL: ExprShape<ts.Node> = { kind: "literal" };
const OTHER: ExprShape<ts.Node> = { kind: "other" };
const OTHER_CALLEE: CalleeShape = { kind: "other" };

const isLiteralNode = (node: ts.Node): boolean =>
	ts.isNumericLiteral(node) ||
	ts.isBigIntLiteral(node) ||
	ts.isStringLiteral(node) ||
	ts.isNoSubstitutionTemplateLiteral(node);

/** `ns.member` with a bare identifier qualifier; anything else is `other`. */
export function calleeOf(expression: ts.Expression): CalleeShape {
	if (
		ts.isPropertyAccessExpression(expression) &&
		ts.isIdentifier(expression.expression)
	) {
		return {
			kind: "qualified",
			qualifier: expression.expression.text,
			member: expression.name.text,
		};
	}
	return OTHER_CALLEE;
}

export const shapeOf = (node: ts.Node): ExprShape<ts.Node> =>
	match<ts.Node, ExprShape<ts.Node>>(node)
		.when(ts.isBinaryExpression, (n) => ({
			kind: "binary",
			operator: ts.tokenToString(n.operatorToken.kind) ?? "",
			left: n.left,
			right: n.right,
		}))
		.when(isLiteralNode, () => LITERAL)
		.when(ts.isCallExpression, (n) => ({
			kind: "call",
			callee: calleeOf(n.expression),
			args: n.arguments,
		}))
		.otherwise(() => OTHER);

/**
 * Direct AST children in source order (ts.forEachChild semantics).
 */
export function childrenOf(node: ts.Node): ReadonlyArray<ts.Node> {
	const children: ts.Node[] = [];
	ts.forEachChild(node, (child) => {
		children.push(child);
	});
	return children;
}

function staticSpecifier(statement: ts.Statement): string | undefined {
	if (
		ts.isImportDeclaration(statement) &&
		ts.isStringLiteral(statement.moduleSpecifier)
	) {
		return statement.moduleSpecifier.text;
	}
	if (
		ts.isExportDeclaration(statement) &&
		statement.moduleSpecifier !== undefined &&
		ts.isStringLiteral(statement.moduleSpecifier)
	) {
		return statement.moduleSpecifier.text;
	}
	if (
		ts.isImportEqualsDeclaration(statement) &&
		ts.isExternalModuleReference(statement.moduleReference) &&
		ts.isStringLiteral(statement.moduleReference.expression)
	) {
		return statement.moduleReference.expression.text;
	}
	return undefined;
}

/**
 * Module specifiers a source file depends on statically, first occurrence order.
 *
 * @pure true
 * @invariant result has no duplicates
 */
export function collectImports(sourceFile: ts.SourceFile): ReadonlyArray<string> {
	const specifiers = new Set<string>();
	for (const statement of sourceFile.statements) {
		const specifier = staticSpecifier(statement);
		if (specifier !== undefined) specifiers.add(specifier);
	}
	return [...specifiers];
}
