/**
 * Server Logger
 * Wrapper around Winston for the mock control plane
 */

import winston from 'winston';
import path from 'path';

const logger = winston.createLogger({
	level: process.env.LOG_LEVEL || 'info',
	format: winston.format.combine(
		winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json(),
	),
	defaultMeta: { service: 'ddi-server' },
	// Jest sets NODE_ENV=test
	silent: process.env.NODE_ENV === 'test',
	transports: [
		new winston.transports.Console({
			format: winston.format.combine(
				winston.format.colorize(),
				winston.format.timestamp({ format: 'HH:mm:ss' }),
				winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
					const metaStr = Object.keys(meta).length > 0
						? ' ' + JSON.stringify(meta)
						: '';
					return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
				}),
			),
		}),
	],
});

if (process.env.LOG_DIR) {
	logger.add(new winston.transports.File({
		filename: path.join(process.env.LOG_DIR, 'combined.log'),
		maxsize: 10485760, // 10MB
		maxFiles: 10,
		tailable: true,
	}));
	logger.add(new winston.transports.File({
		filename: path.join(process.env.LOG_DIR, 'error.log'),
		level: 'error',
		maxsize: 10485760,
		maxFiles: 5,
	}));
}

export default logger;

export { logger };
