/**
 * Logger - Leveled logging through a pluggable sink.
 *
 * Provides multiple logger implementations:
 * - createStreamLogger: Formatted entries written through a sink function
 * - createConsoleLogger: Stream logger over stderr
 * - createNullLogger: No-op for testing (and the default)
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

export type LogSink = (entry: string) => void;

export type StreamLoggerOptions = {
	/** Minimum level written. Defaults to 'info'. */
	level?: LogLevel;
	/** Clock override, mostly for tests. */
	now?: () => Date;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
	now: Date = new Date(),
): string {
	const timestamp = now.toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a logger that formats entries and hands them to `write`,
 * dropping anything below the configured level.
 *
 * @example
 * const lines: string[] = [];
 * const logger = createStreamLogger(line => lines.push(line), {level: 'debug'});
 * logger.debug('Environment', 'Registered filter', {name: 'remove_code_promt'});
 */
export function createStreamLogger(
	write: LogSink,
	options: StreamLoggerOptions = {},
): Logger {
	const threshold = LEVEL_ORDER[options.level ?? 'info'];
	const now = options.now ?? (() => new Date());

	function log(
		level: LogLevel,
		component: string,
		message: string,
		extra?: object | Error,
	) {
		if (LEVEL_ORDER[level] < threshold) return;
		write(formatEntry(level, component, message, extra, now()) + '\n');
	}

	return {
		debug(component: string, message: string, data?: object) {
			log('debug', component, message, data);
		},

		info(component: string, message: string, data?: object) {
			log('info', component, message, data);
		},

		warn(component: string, message: string, data?: object) {
			log('warn', component, message, data);
		},

		error(component: string, message: string, error?: Error) {
			log('error', component, message, error);
		},
	};
}

/**
 * Create a logger that writes to stderr, so it never mixes with
 * rendered documentation on stdout.
 */
export function createConsoleLogger(
	options: StreamLoggerOptions = {},
): Logger {
	return createStreamLogger(entry => {
		process.stderr.write(entry);
	}, options);
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}

/**
 * Narrow an unknown value to a Logger.
 */
export function isLogger(value: unknown): value is Logger {
	if (typeof value !== 'object' || value === null) return false;
	return (['debug', 'info', 'warn', 'error'] as const).every(
		method => typeof Reflect.get(value, method) === 'function',
	);
}
