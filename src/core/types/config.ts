// CHANGE: Command-line options of the durationcheck CLI
// WHY: Options are parsed once in the shell and passed down as an immutable value
// REF: durationcheck CLI
// SOURCE: n/a

/**
 * Report format written to stdout.
 */
export type OutputFormat = "text" | "json";

/**
 * Опции командной строки.
 *
 * @property targetPath Путь к файлу или директории для проверки
 * @property project Путь к tsconfig.json, из которого строится программа
 * @property format Формат отчёта
 */
export interface CLIOptions {
	readonly targetPath: string;
	readonly project: string;
	readonly format: OutputFormat;
}
