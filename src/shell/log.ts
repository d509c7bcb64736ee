// CHANGE: Shared console logger for the shell, debug output behind env DURATIONCHECK_DEBUG
// WHY: Trace unit gating and flagged nodes without touching the CORE
// REF: durationcheck logging
// PURITY: SHELL
// INVARIANT: stdout carries only the report; every log line goes to stderr

type Env = NodeJS.ProcessEnv & { DURATIONCHECK_DEBUG?: string };

/** Read on every call so the flag follows the current environment. */
export function isDebugEnabled(env: Env = process.env): boolean {
	return env.DURATIONCHECK_DEBUG === "1";
}

export function debugLog(message: string): void {
	if (isDebugEnabled()) {
		console.error("[durationcheck:debug]", message);
	}
}

export function warnLog(message: string): void {
	console.error("[durationcheck:warn]", message);
}
