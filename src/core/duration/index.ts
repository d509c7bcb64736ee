export { analyzeUnits, type Analyzer, durationAnalyzer } from "./analyzer.js";
export {
	isAcceptableCast,
	isAcceptableCastArg,
	isUnacceptableOperand,
} from "./classify.js";
export {
	DURATION_CONSTRUCTOR,
	DURATION_TYPE,
	isDuration,
	TIME_MODULE,
} from "./policy.js";
export {
	ANALYZER_NAME,
	checkNode,
	checkUnit,
	formatMessage,
	hasImport,
	preorder,
	reportAt,
} from "./scan.js";
