// CHANGE: End-to-end specs of the analyzer over a real type checker
// WHY: Verifies canonical naming, shapes, positions and printer output together
// PURITY: SHELL (in-memory program, default libs read from the typescript package)

import { Either } from "effect";
import ts from "typescript";
import { afterEach, describe, expect, it, vi } from "vitest";

import { checkUnit } from "../../../src/core/duration/scan.js";
import { RenderError } from "../../../src/core/errors.js";
import {
	createUnit,
	createUnits,
	describeNode,
	type NodePrinter,
	renderNode,
	resolveType,
} from "../../../src/shell/frontend/unit.js";
import {
	createVirtualProgram,
	sourceFileOf,
} from "../../utils/virtual-program.js";

const MAIN = "/virtual/main.ts";
const PLAIN = "/virtual/plain.ts";

const mainSource = [
	'import * as time from "time";',
	"",
	"declare const a: time.Duration;",
	"declare const b: time.Duration;",
	"declare const n: number;",
	"",
	"export const product = a * b;",
	"export const scaled = a * time.Duration(10 * 60);",
	"export const rewrapped = a * time.Duration(b);",
	"export const constants = time.Duration(10) * time.Duration(20);",
	"export const literal = 5 * a;",
	"export const scalar = a * n;",
	"export const second = time.Second * time.Second;",
	"",
].join("\n");

const plainSource = [
	"type Duration = number & { readonly __unit: \"ns\" };",
	"declare const a: Duration;",
	"declare const b: Duration;",
	"export const product = a * b;",
	"",
].join("\n");

afterEach(() => {
	vi.restoreAllMocks();
	vi.unstubAllEnvs();
});

const program = createVirtualProgram({ [MAIN]: mainSource, [PLAIN]: plainSource });
const main = sourceFileOf(program, MAIN);

/** First node of the main file whose text is exactly `text`. */
function findNode(text: string): ts.Node {
	const visit = (node: ts.Node): ts.Node | undefined =>
		node.getText(main) === text ? node : ts.forEachChild(node, visit);
	const found = ts.forEachChild(main, visit);
	if (found === undefined) throw new Error(`no node ${text}`);
	return found;
}

describe("createUnit + checkUnit", () => {
	const diagnostics = checkUnit(createUnit(program, main));

	it("flags exactly the raw duration products", () => {
		expect(diagnostics.map((d) => d.message)).toEqual([
			"Multiplication of durations: `a * b`",
			"Multiplication of durations: `a * time.Duration(b)`",
			"Multiplication of durations: `time.Second * time.Second`",
		]);
	});

	it("positions each diagnostic at the start of the product", () => {
		expect(diagnostics.map((d) => d.position)).toEqual([
			{ fileName: MAIN, offset: mainSource.indexOf("a * b;"), line: 7, column: 24 },
			{
				fileName: MAIN,
				offset: mainSource.indexOf("a * time.Duration(b)"),
				line: 9,
				column: 26,
			},
			{
				fileName: MAIN,
				offset: mainSource.indexOf("time.Second * time.Second"),
				line: 13,
				column: 23,
			},
		]);
	});

	it("gates out a file that does not import the time module", () => {
		const plain = createUnit(program, sourceFileOf(program, PLAIN));
		expect(plain.imports).toEqual([]);
		expect(checkUnit(plain)).toEqual([]);
	});

	it("is idempotent", () => {
		expect(checkUnit(createUnit(program, main))).toEqual(diagnostics);
	});
});

describe("resolveType", () => {
	const checker = program.getTypeChecker();

	it("names the duration type canonically", () => {
		expect(resolveType(checker, findNode("time.Duration(b)"))).toEqual({
			canonicalName: "time.Duration",
		});
	});

	it("names primitive types by their text", () => {
		const scalar = findNode("a * n");
		const shape = ts.isBinaryExpression(scalar) ? scalar.right : scalar;
		expect(resolveType(checker, shape)).toEqual({ canonicalName: "number" });
	});

	it("does not treat a local alias with the same name as the duration type", () => {
		const plain = sourceFileOf(program, PLAIN);
		const statement = plain.statements[3];
		if (statement === undefined || !ts.isVariableStatement(statement)) {
			throw new Error("expected the product declaration");
		}
		const [declaration] = statement.declarationList.declarations;
		const initializer = declaration?.initializer;
		if (initializer === undefined || !ts.isBinaryExpression(initializer)) {
			throw new Error("expected a binary initializer");
		}
		expect(resolveType(checker, initializer.left)?.canonicalName).not.toBe(
			"time.Duration",
		);
	});
});

describe("renderNode", () => {
	const failingPrinter: NodePrinter = {
		printNode: () => {
			throw new Error("printer exploded");
		},
	};

	it("prints the expression back to source text", () => {
		expect(Either.getOrElse(renderNode(findNode("10 * 60"), main), () => "")).toBe(
			"10 * 60",
		);
	});

	it("returns a RenderError and warns when the printer throws", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const rendered = renderNode(findNode("a * b"), main, failingPrinter);
		expect(Either.isLeft(rendered)).toBe(true);
		expect(Either.isLeft(rendered) ? rendered.left : undefined).toBeInstanceOf(RenderError);
		expect(Either.isLeft(rendered) ? rendered.left.detail : "").toBe(
			"Error: printer exploded",
		);
		expect(error).toHaveBeenCalledWith(
			"[durationcheck:warn]",
			"Error formatting expression: Error: printer exploded",
		);
	});

	it("still reports the product with empty text when rendering fails", () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		const unit = createUnit(program, main);
		const failing = {
			...unit,
			render: (node: ts.Node) => renderNode(node, main, failingPrinter),
		};
		expect(checkUnit(failing).map((d) => d.message)).toEqual([
			"Multiplication of durations: ``",
			"Multiplication of durations: ``",
			"Multiplication of durations: ``",
		]);
	});

	it("dumps the rendered text and syntax kinds in debug mode", () => {
		vi.stubEnv("DURATIONCHECK_DEBUG", "1");
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const node = findNode("a * b");
		renderNode(node, main);
		expect(error).toHaveBeenCalledWith(
			"[durationcheck:debug]",
			`>>> a * b\n${describeNode(node)}`,
		);
	});

	it("logs nothing on success without the debug flag", () => {
		vi.stubEnv("DURATIONCHECK_DEBUG", "");
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		renderNode(findNode("a * b"), main);
		expect(error).not.toHaveBeenCalled();
	});
});

describe("describeNode", () => {
	it("indents one level per depth", () => {
		const lines = describeNode(findNode("a * b")).split("\n");
		expect(lines).toHaveLength(4);
		expect(lines.slice(1).every((line) => line.startsWith("  "))).toBe(true);
	});
});

describe("createUnits", () => {
	it("skips declaration files", () => {
		expect(createUnits(program).map((u) => u.fileName).sort()).toEqual([MAIN, PLAIN]);
	});

	it("applies the include filter", () => {
		expect(createUnits(program, (f) => f === MAIN).map((u) => u.fileName)).toEqual([
			MAIN,
		]);
	});
});
