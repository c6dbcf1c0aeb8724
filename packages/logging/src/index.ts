import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Fields that must never reach a log sink.
 */
export const REDACTED_PATHS = [
	'password',
	'*.password',
	'token',
	'*.token',
	'accessToken',
	'*.accessToken',
	'refreshToken',
	'*.refreshToken',
	'req.headers.authorization',
] as const;

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level */
	level: LogLevel;
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean | undefined;
	/** Additional base context */
	base?: Record<string, unknown> | undefined;
}

/**
 * Build the pino options shared by standalone loggers and the Fastify logger.
 */
export function buildLoggerOptions(config: LoggerConfig): LoggerOptions {
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
		redact: { paths: [...REDACTED_PATHS], censor: '[redacted]' },
	};

	if (config.pretty) {
		return {
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		};
	}

	return options;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	return pino(buildLoggerOptions(config));
}

/**
 * Create a child logger scoped to one component of the service
 */
export function createComponentLogger(parent: Logger, component: string, bindings: Record<string, unknown> = {}): Logger {
	return parent.child({ component, ...bindings });
}

/**
 * Logger that discards everything; handy as a default in tests.
 */
export function createSilentLogger(): Logger {
	return pino({ level: 'silent' });
}
