/**
 * DDI MOCK SERVER - Control Plane for Local Testing
 * ==================================================
 *
 * Serves one deployment to every controller that polls, hands out the
 * artifact and collects the status reports devices send back.
 */

import express, { ErrorRequestHandler } from 'express';
import bodyParser from 'body-parser';
import logger from './logger';
import { requestLogger } from './middleware/request-logger';
import { createDdiRouter } from './routes/ddi';
import { createFilesRouter } from './routes/files';
import { DeploymentStore } from './store';

export const SERVER_NAME = 'DDI API Mock Server';
export const SERVER_VERSION = '1.0.0';

export interface AppOptions {
	firmwarePath: string;
	deploymentId: string;
	publicUrl?: string;
	store?: DeploymentStore;
}

export function createApp(options: AppOptions): express.Express {
	const store = options.store ?? new DeploymentStore();
	const app = express();

	// Middleware
	app.use(bodyParser.json());
	app.use(requestLogger());

	app.get('/', (_req, res) => {
		res.json({
			message: SERVER_NAME,
			version: SERVER_VERSION,
			status: 'running',
		});
	});

	app.use(createDdiRouter({
		store,
		deploymentId: options.deploymentId,
		firmwarePath: options.firmwarePath,
		publicUrl: options.publicUrl,
	}));
	app.use(createFilesRouter(options.firmwarePath));

	app.use((_req, res) => {
		res.status(404).json({ detail: 'Not Found' });
	});

	app.use(errorHandler);

	return app;
}

const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
	if (isJsonParseError(error)) {
		return res.status(422).json({
			detail: [{ loc: ['body'], msg: 'Invalid JSON body', type: 'json_invalid' }],
		});
	}

	logger.error(`Unhandled error on ${req.method} ${req.path}`, {
		error: error instanceof Error ? error.message : String(error),
	});
	return res.status(500).json({ detail: 'Internal Server Error' });
};

function isJsonParseError(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}
