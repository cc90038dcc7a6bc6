/**
 * Structured Logger
 *
 * Provides JSON-formatted logging with correlation IDs and context.
 * Lines go to stderr; stdout carries search results.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
	correlationId?: string;
	metadata?: Record<string, unknown>;
}

export type LogSink = (line: string) => void;

const writeToStderr: LogSink = (line) => {
	process.stderr.write(`${line}\n`);
};

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
	constructor(
		private readonly serviceName: string,
		private readonly minLevel: LogLevel = 'info',
		private readonly sink: LogSink = writeToStderr,
		private readonly baseContext: LogContext = {},
	) {}

	/** Child logger that stamps every line with the given context. */
	withContext(context: LogContext): Logger {
		return new Logger(this.serviceName, this.minLevel, this.sink, {
			correlationId: context.correlationId ?? this.baseContext.correlationId,
			metadata: { ...this.baseContext.metadata, ...context.metadata },
		});
	}

	debug(message: string, context?: LogContext): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: LogContext): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.log('warn', message, context);
	}

	error(message: string, error?: Error, context?: LogContext): void {
		const errorContext: LogContext | undefined = error
			? { ...context, metadata: { ...context?.metadata, error: { message: error.message, stack: error.stack } } }
			: context;
		this.log('error', message, errorContext);
	}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
			return;
		}

		const logEntry: Record<string, unknown> = {
			level,
			timestamp: new Date().toISOString(),
			service: this.serviceName,
			message,
			...this.baseContext.metadata,
			...context?.metadata,
			correlationId: context?.correlationId ?? this.baseContext.correlationId,
		};

		// Remove undefined fields
		Object.keys(logEntry).forEach((key) => logEntry[key] === undefined && delete logEntry[key]);

		this.sink(JSON.stringify(logEntry));
	}
}
