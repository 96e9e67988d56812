/**
 * Logger
 * Winston-based structured logging for the detection control plane
 */

import winston from 'winston';
import path from 'path';

export type Logger = winston.Logger;

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
	level?: string;
	format?: LogFormat;
	logDir?: string;
	silent?: boolean;
	service?: string;
}

const prettyFormat = winston.format.printf(({ level, message, timestamp, service, component, ...metadata }) => {
	const prefix = component ? `[${component}] ` : '';
	const metaStr = Object.keys(metadata).length > 0
		? ' ' + JSON.stringify(metadata)
		: '';

	return `${timestamp} [${level}]: ${prefix}${message}${metaStr}`;
});

export function createLogger(options: LoggerOptions = {}): Logger {
	const format = options.format ?? (process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json');
	const service = options.service ?? 'coresidency-detector';

	const transports: winston.transport[] = [
		new winston.transports.Console({
			format: format === 'pretty'
				? winston.format.combine(winston.format.colorize(), prettyFormat)
				: winston.format.json(),
		}),
	];

	if (options.logDir) {
		transports.push(
			new winston.transports.File({
				filename: path.join(options.logDir, 'error.log'),
				level: 'error',
				maxsize: 10485760, // 10MB
				maxFiles: 5,
			}),
			new winston.transports.File({
				filename: path.join(options.logDir, 'combined.log'),
				maxsize: 10485760,
				maxFiles: 10,
				tailable: true,
			}),
		);
	}

	return winston.createLogger({
		level: options.level ?? process.env.LOG_LEVEL ?? 'info',
		silent: options.silent ?? false,
		format: winston.format.combine(
			winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
			winston.format.errors({ stack: true }),
		),
		defaultMeta: { service },
		transports,
	});
}

const logger = createLogger();

export default logger;
export { logger };
