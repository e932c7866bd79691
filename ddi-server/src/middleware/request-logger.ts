import type { RequestHandler } from 'express';
import logger from '../logger';

/**
 * HTTP request logger: one line when a request arrives, one when its response is finished
 */
export function requestLogger(): RequestHandler {
	return (req, res, next) => {
		const startTime = Date.now();

		logger.info(`➡️  ${req.method} ${req.path}`, {
			'content-type': req.headers['content-type'],
			'content-length': req.headers['content-length'],
		});

		res.on('finish', () => {
			const duration = Date.now() - startTime;
			const line = `⬅️  ${res.statusCode} ${req.method} ${req.path} - ${duration}ms`;
			if (res.statusCode >= 400) {
				logger.warn(line);
			} else {
				logger.info(line);
			}
		});

		next();
	};
}
