import pino, { type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level */
	level: LevelWithSilent;
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}

	return pino(options);
}

/**
 * Logger that discards everything. Handy as a default for library components
 * constructed without one.
 */
export function createSilentLogger(): Logger {
	return pino({ level: 'silent' });
}
