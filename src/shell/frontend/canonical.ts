// CHANGE: Canonical qualified names for checker symbols
// WHY: Duration identity is a name comparison; the checker spells module names as quoted paths
// REF: durationcheck front end
// FORMAT THEOREM:
//   canonical('"time".Duration') = canonical('"/p/node_modules/time/index".Duration')
//     = canonical('"/p/node_modules/@types/time/index".Duration') = "time.Duration"
// PURITY: SHELL (string functions are pure; canonicalTypeOf queries the checker)
// COMPLEXITY: O(|name|)

import ts from "typescript";

const NODE_MODULES = "/node_modules/";

/** `scope__pkg` → `@scope/pkg`, `pkg` → `pkg` (DefinitelyTyped naming). */
function typesPackageTarget(name: string): string {
	const at = name.indexOf("__");
	return at < 0 ? name : `@${name.slice(0, at)}/${name.slice(at + 2)}`;
}

/**
 * Maps a module name as the checker prints it to the name a user imports.
 *
 * @pure true
 * @example canonicalModuleName("/p/node_modules/@scope/pkg/dist/index") === "@scope/pkg"
 */
export function canonicalModuleName(moduleName: string): string {
	const normalized = moduleName.replace(/\\/g, "/");
	const at = normalized.lastIndexOf(NODE_MODULES);
	if (at < 0) return normalized;

	const [first = "", second = ""] = normalized
		.slice(at + NODE_MODULES.length)
		.split("/");
	if (first === "@types") return typesPackageTarget(second);
	return first.startsWith("@") ? `${first}/${second}` : first;
}

/**
 * Rewrites `"<module>".Member` into `<canonical module>.Member`; other names pass through.
 *
 * @pure true
 */
export function canonicalQualifiedName(fullyQualified: string): string {
	if (!fullyQualified.startsWith('"')) return fullyQualified;
	const close = fullyQualified.indexOf('"', 1);
	if (close < 0) return fullyQualified;

	const moduleName = canonicalModuleName(fullyQualified.slice(1, close));
	const member = fullyQualified.slice(close + 1);
	return member.startsWith(".") ? `${moduleName}${member}` : moduleName;
}

/**
 * Canonical name of a checker type: alias symbol first, then the type's own symbol.
 *
 * @pure false (queries the type checker)
 */
export function canonicalTypeOf(checker: ts.TypeChecker, type: ts.Type): string {
	const symbol = type.aliasSymbol ?? type.getSymbol();
	return symbol === undefined
		? checker.typeToString(type)
		: canonicalQualifiedName(checker.getFullyQualifiedName(symbol));
}
