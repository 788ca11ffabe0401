export type LogMetadata = Record<string, unknown>;

/**
 * Logger shape shared with n8n's `this.logger`, so the node can hand its own logger to a session
 */
export interface SessionLogger {
	debug(message: string, meta?: LogMetadata): void;
	info(message: string, meta?: LogMetadata): void;
	warn(message: string, meta?: LogMetadata): void;
	error(message: string, meta?: LogMetadata): void;
}

const PREFIX = '[CiscoSession]';

/**
 * Utility class for logging session operations
 */
export class LoggingUtils {
	/**
	 * Console-backed logger that stays silent unless verbose logging is enabled.
	 * Warnings and errors are always printed.
	 */
	static createLogger(verboseLogging: boolean): SessionLogger {
		return {
			debug: (message, meta) => {
				if (verboseLogging) console.debug(`${PREFIX} ${message}`, ...LoggingUtils.extra(meta));
			},
			info: (message, meta) => {
				if (verboseLogging) console.log(`${PREFIX} ${message}`, ...LoggingUtils.extra(meta));
			},
			warn: (message, meta) => {
				console.warn(`${PREFIX} ${message}`, ...LoggingUtils.extra(meta));
			},
			error: (message, meta) => {
				console.error(`${PREFIX} ${message}`, ...LoggingUtils.extra(meta));
			},
		};
	}

	/**
	 * Logger that drops everything
	 */
	static silent(): SessionLogger {
		const noop = (): void => undefined;
		return { debug: noop, info: noop, warn: noop, error: noop };
	}

	/**
	 * Describe buffered channel text for debug output, with control characters made visible
	 */
	static describeBuffer(buffer: string): LogMetadata {
		const display = buffer.length > 200
			? `${buffer.substring(0, 100)}...${buffer.substring(buffer.length - 100)}`
			: buffer;
		return {
			length: buffer.length,
			content: JSON.stringify(display),
		};
	}

	private static extra(meta?: LogMetadata): LogMetadata[] {
		return meta === undefined ? [] : [meta];
	}
}
