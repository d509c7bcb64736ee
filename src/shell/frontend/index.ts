export {
	canonicalModuleName,
	canonicalQualifiedName,
	canonicalTypeOf,
} from "./canonical.js";
export { calleeOf, childrenOf, collectImports, shapeOf } from "./syntax.js";
export {
	createUnit,
	createUnits,
	describeNode,
	locate,
	renderNode,
	resolveType,
} from "./unit.js";
