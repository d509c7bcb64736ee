// CHANGE: Canonical naming specs
// WHY: Duration identity depends on mapping checker module names to import names

import { describe, expect, it } from "vitest";

import {
	canonicalModuleName,
	canonicalQualifiedName,
} from "../../../src/shell/frontend/canonical.js";

describe("canonicalModuleName", () => {
	it("keeps ambient module names", () => {
		expect(canonicalModuleName("time")).toBe("time");
	});

	it("maps an installed package to its name", () => {
		expect(canonicalModuleName("/repo/node_modules/time/dist/index")).toBe("time");
	});

	it("keeps the scope of a scoped package", () => {
		expect(canonicalModuleName("/repo/node_modules/@acme/time/index")).toBe("@acme/time");
	});

	it("maps DefinitelyTyped packages to the package they describe", () => {
		expect(canonicalModuleName("/repo/node_modules/@types/time/index")).toBe("time");
		expect(canonicalModuleName("/repo/node_modules/@types/acme__time/index")).toBe(
			"@acme/time",
		);
	});

	it("uses the innermost node_modules", () => {
		expect(
			canonicalModuleName("/repo/node_modules/a/node_modules/time/index"),
		).toBe("time");
	});

	it("normalizes Windows separators", () => {
		expect(canonicalModuleName("C:\\repo\\node_modules\\time\\index")).toBe("time");
	});

	it("keeps project-local module paths", () => {
		expect(canonicalModuleName("/repo/src/time")).toBe("/repo/src/time");
	});
});

describe("canonicalQualifiedName", () => {
	it("rewrites an ambient module member", () => {
		expect(canonicalQualifiedName('"time".Duration')).toBe("time.Duration");
	});

	it("rewrites a package member", () => {
		expect(canonicalQualifiedName('"/repo/node_modules/time/index".Duration')).toBe(
			"time.Duration",
		);
	});

	it("keeps nested member paths", () => {
		expect(canonicalQualifiedName('"time".units.Duration')).toBe(
			"time.units.Duration",
		);
	});

	it("passes unquoted names through", () => {
		expect(canonicalQualifiedName("Date")).toBe("Date");
		expect(canonicalQualifiedName("NodeJS.Timeout")).toBe("NodeJS.Timeout");
	});

	it("passes an unterminated quote through", () => {
		expect(canonicalQualifiedName('"time')).toBe('"time');
	});
});
