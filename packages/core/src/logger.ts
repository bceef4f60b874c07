/**
 * JSON logging for the codec
 *
 * Structured one-line JSON entries on the console; disabled unless a logger or
 * a log level is configured.
 */

/**
 * Log levels supported by the logger
 * 'silent' disables all logging
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

export type LogContext = Record<string, unknown>

/**
 * Logger interface for structured logging
 */
export interface Logger {
	error(message: string, context?: LogContext): void
	warn(message: string, context?: LogContext): void
	info(message: string, context?: LogContext): void
	debug(message: string, context?: LogContext): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: LogContext): Logger
}

class JsonLogger implements Logger {
	private readonly level: LogLevel
	private readonly defaultContext: LogContext

	constructor(level: LogLevel, defaultContext: LogContext) {
		this.level = level
		this.defaultContext = defaultContext
	}

	private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
		if (LOG_LEVEL_VALUES[level] > LOG_LEVEL_VALUES[this.level]) {
			return
		}

		const entry = JSON.stringify(
			{
				level,
				message,
				timestamp: new Date().toISOString(),
				...this.defaultContext,
				...context,
			},
			// JSON.stringify throws on bigint
			(_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value)
		)

		if (level === 'error' || level === 'warn') {
			console.error(entry)
		} else {
			console.log(entry)
		}
	}

	error(message: string, context?: LogContext): void {
		this.write('error', message, context)
	}

	warn(message: string, context?: LogContext): void {
		this.write('warn', message, context)
	}

	info(message: string, context?: LogContext): void {
		this.write('info', message, context)
	}

	debug(message: string, context?: LogContext): void {
		this.write('debug', message, context)
	}

	child(defaultContext: LogContext): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON console logger
 *
 * @param level - Minimum log level to output (default: 'info')
 * @param defaultContext - Default context to include in all log entries
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', { service: 'ingest' })
 * logger.debug('skipping unknown field', { fieldNumber: 9 })
 * // {"level":"debug","message":"skipping unknown field","timestamp":"...","service":"ingest","fieldNumber":9}
 * ```
 */
export function createLogger(level: LogLevel = 'info', defaultContext: LogContext = {}): Logger {
	return new JsonLogger(level, defaultContext)
}

/**
 * No-op logger instance for when logging is disabled
 */
export const noopLogger: Logger = new NoopLogger()

/**
 * Pick the logger for a component: a child of the given logger, a fresh JSON
 * logger at `logLevel`, or the no-op logger.
 */
export function resolveLogger(options: { logger?: Logger; logLevel?: LogLevel }, context: LogContext): Logger {
	if (options.logger) {
		return options.logger.child(context)
	}
	if (options.logLevel && options.logLevel !== 'silent') {
		return createLogger(options.logLevel, context)
	}
	return noopLogger
}
