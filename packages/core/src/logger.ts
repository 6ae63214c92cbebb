/**
 * Minimal structured logging contract.
 *
 * Engines accept any object with these four methods, so a host application
 * can pass its own logger. The console logger is enough for scripts and
 * local development.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const noop = () => {};

export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};

/**
 * Create a logger that writes through `console`, dropping entries below `level`.
 */
export function createConsoleLogger(
	options: { level?: LogLevel; name?: string; console?: Pick<Console, LogLevel> } = {},
): Logger {
	const { level = 'info', name = 'openslot' } = options;
	const sink = options.console ?? console;
	const threshold = LEVEL_ORDER[level];

	function write(entryLevel: LogLevel, message: string, context?: LogContext) {
		if (LEVEL_ORDER[entryLevel] < threshold) return;
		const line = `[${name}] ${message}`;
		if (context && Object.keys(context).length > 0) {
			sink[entryLevel](line, context);
		} else {
			sink[entryLevel](line);
		}
	}

	return {
		debug: (message, context) => write('debug', message, context),
		info: (message, context) => write('info', message, context),
		warn: (message, context) => write('warn', message, context),
		error: (message, context) => write('error', message, context),
	};
}
