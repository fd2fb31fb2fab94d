export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = Pick<Console, LogLevel>;

export interface Logger {
	readonly level: LogLevel;
	debug(message: string, ...meta: unknown[]): void;
	info(message: string, ...meta: unknown[]): void;
	warn(message: string, ...meta: unknown[]): void;
	error(message: string, ...meta: unknown[]): void;
	child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

/**
 * Console logger with a scope prefix, e.g. `[tasks:router] Received GET /tasks`.
 * Messages below `level` are dropped.
 */
export function createLogger(scope: string, level: LogLevel = "info", sink: LogSink = console): Logger {
	const threshold = LEVEL_ORDER[level];
	const write = (target: LogLevel) => (message: string, ...meta: unknown[]) => {
		if (LEVEL_ORDER[target] < threshold) return;
		sink[target](`[${scope}] ${message}`, ...meta);
	};

	return {
		level,
		debug: write("debug"),
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
		child: (child) => createLogger(`${scope}:${child}`, level, sink),
	};
}
