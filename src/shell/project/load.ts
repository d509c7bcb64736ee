// CHANGE: Build the analysed ts.Program from tsconfig.json (solution-style + extends)
// WHY: Types must be resolved exactly as the project's own compiler settings resolve them
// REF: REQ-TS-SOLUTION-STYLE
// PURITY: SHELL
// EFFECT: Effect<LoadedProject, ConfigError | InvariantViolation>
// FORMAT THEOREME:
// Let R be the tsconfig named by --project with references P = {p_i}. For a target T we select the first p ∈ P
// whose fileNames intersect T (file or directory); an existing .ts file outside every p falls back to P₀.
// Units(T) = {f ∈ program(p) | Under(T, f)} and Units(T) ≠ ∅.

import * as path from "node:path";
import { Effect } from "effect";
import ts from "typescript";

import { ConfigError, InvariantViolation } from "../../core/errors.js";
import type { CLIOptions, CompiledUnit } from "../../core/types/index.js";
import { createUnits } from "../frontend/index.js";
import { debugLog } from "../log.js";

/** Parsed project representation. */
export interface ParsedProject {
	readonly configPath: string;
	readonly parsed: ts.ParsedCommandLine;
}

export interface LoadedProject {
	readonly configPath: string;
	readonly program: ts.Program;
	readonly units: ReadonlyArray<CompiledUnit<ts.Node>>;
}

/** Safe wrappers to avoid passing object methods as unbound callbacks (eslint this-scoping). */
const sysReadFile = (f: string): string | undefined => ts.sys.readFile(f);
const sysFileExists = (f: string): boolean => ts.sys.fileExists(f);

const TS_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"] as const;

const isTsFile = (p: string): boolean =>
	TS_EXTENSIONS.some((ext) => p.endsWith(ext));

/** Resolve target path and infer whether it denotes a directory (not a TS file). */
export function resolveTarget(targetPath: string): {
	readonly absTarget: string;
	readonly isDir: boolean;
} {
	const absTarget = path.resolve(targetPath);
	return { absTarget, isDir: !isTsFile(absTarget) };
}

/**
 * FORMAT THEOREME: Under(T, F) := isDir(T) ? F startsWith (T + sep) : resolve(F) = T
 */
export function isUnderTargetPath(
	filePath: string,
	absTarget: string,
	isDir: boolean,
): boolean {
	const resolved = path.resolve(filePath);
	if (!isDir) return resolved === absTarget;
	return (
		resolved === absTarget ||
		resolved.startsWith(absTarget + path.sep) ||
		resolved.startsWith(`${absTarget}/`)
	);
}

/** Resolve a reference path to a concrete tsconfig file (support file or directory). */
function resolveRefConfigPath(baseDir: string, refPath: string): string | null {
	const candidate = path.resolve(baseDir, refPath);
	if (sysFileExists(candidate) && candidate.endsWith(".json")) {
		return candidate;
	}
	const found =
		ts.findConfigFile(candidate, sysFileExists, "tsconfig.json") ??
		ts.findConfigFile(candidate, sysFileExists);
	return typeof found === "string" ? found : null;
}

/**
 * Load and fully resolve a tsconfig (handles extends).
 *
 * @throws Error when the file cannot be read, parsed or carries option errors; callers wrap this in Effect.try
 */
function loadParsedConfig(configPath: string): ts.ParsedCommandLine {
	const read = ts.readConfigFile(configPath, sysReadFile);
	if (read.error !== undefined) {
		throw new Error(ts.flattenDiagnosticMessageText(read.error.messageText, "\n"));
	}
	const parsed = ts.parseJsonConfigFileContent(
		read.config,
		ts.sys,
		path.dirname(configPath),
		undefined,
		configPath,
	);
	if (parsed.errors.length > 0) {
		throw new Error(
			parsed.errors
				.map((d) => ts.flattenDiagnosticMessageText(d.messageText, "\n"))
				.join("\n"),
		);
	}
	return parsed;
}

/**
 * Load root tsconfig.json and all referenced projects (if any).
 */
function loadRootAndReferences(rootConfigPath: string): ReadonlyArray<ParsedProject> {
	const rootParsed = loadParsedConfig(rootConfigPath);
	const baseDir = path.dirname(rootConfigPath);
	const projects: ParsedProject[] = [];

	for (const ref of rootParsed.projectReferences ?? []) {
		const refConfigPath = resolveRefConfigPath(baseDir, ref.path);
		if (refConfigPath !== null) {
			projects.push({
				configPath: refConfigPath,
				parsed: loadParsedConfig(refConfigPath),
			});
		}
	}

	// No references: the root is the only project
	if (projects.length === 0) {
		projects.push({ configPath: rootConfigPath, parsed: rootParsed });
	}
	return projects;
}

/**
 * Pick the first project covering targetPath.
 * An existing .ts file no project lists falls back to the first project, which then takes it as an extra root.
 *
 * @returns undefined when nothing covers the target
 */
export function pickProjectForTarget(
	targetPath: string,
	projects: ReadonlyArray<ParsedProject>,
): ParsedProject | undefined {
	const { absTarget, isDir } = resolveTarget(targetPath);
	const covering = projects.find((p) =>
		p.parsed.fileNames.some((f) => isUnderTargetPath(f, absTarget, isDir)),
	);
	if (covering !== undefined || isDir || !sysFileExists(absTarget)) return covering;
	return projects[0];
}

/** Program rootNames, including a target .ts file the config does not list yet. */
export function computeRootNames(
	fileNames: ReadonlyArray<string>,
	absTarget: string,
): ReadonlyArray<string> {
	if (!isTsFile(absTarget) || !ts.sys.fileExists(absTarget)) return fileNames;
	const alreadyIncluded = fileNames.some((f) => path.resolve(f) === absTarget);
	return alreadyIncluded ? fileNames : [...fileNames, absTarget];
}

function selectProject(
	options: CLIOptions,
): Effect.Effect<ParsedProject, ConfigError | InvariantViolation> {
	return Effect.gen(function* () {
		const configPath = path.resolve(options.project);
		const projects: ReadonlyArray<ParsedProject> = yield* Effect.try({
			try: () => loadRootAndReferences(configPath),
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		const selected = pickProjectForTarget(options.targetPath, projects);
		if (selected === undefined) {
			return yield* Effect.fail(
				new InvariantViolation({
					where: "pickProjectForTarget",
					detail: `No TypeScript project covers ${options.targetPath}`,
				}),
			);
		}
		return selected;
	});
}

/**
 * Loads the program for the configured project and wraps files under the target as units.
 *
 * @pure false - reads filesystem, creates TS program
 * @effect Effect<LoadedProject, ConfigError | InvariantViolation>
 * @complexity O(n) where n = number of files in project
 */
export function loadProject(
	options: CLIOptions,
): Effect.Effect<LoadedProject, ConfigError | InvariantViolation> {
	return Effect.gen(function* () {
		const selected = yield* selectProject(options);
		const { absTarget, isDir } = resolveTarget(options.targetPath);
		const rootNames = computeRootNames(selected.parsed.fileNames, absTarget);

		const program: ts.Program = yield* Effect.sync(() =>
			ts.createProgram({ rootNames, options: selected.parsed.options }),
		);
		const units = createUnits(program, (fileName) =>
			isUnderTargetPath(fileName, absTarget, isDir),
		);

		debugLog(
			`config=${selected.configPath} target=${absTarget} rootNames=${rootNames.length} units=${units.length}`,
		);
		if (units.length === 0) {
			return yield* Effect.fail(
				new InvariantViolation({
					where: "loadProject",
					detail: `No source files to analyse under ${options.targetPath}`,
				}),
			);
		}
		return { configPath: selected.configPath, program, units };
	});
}
