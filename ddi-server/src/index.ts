/**
 * DDI mock server entry point
 */

import process from 'process';
import * as dotenv from 'dotenv';
import { createApp } from './app';
import { loadServerConfig } from './config';
import logger from './logger';
import { artifactSize } from './routes/ddi';

dotenv.config();

async function main(): Promise<void> {
	const config = loadServerConfig();

	const size = await artifactSize(config.firmwarePath);
	if (size === 0) {
		logger.warn(`⚠️  No artifact at ${config.firmwarePath}; downloads will return 404`);
	}

	const app = createApp({
		firmwarePath: config.firmwarePath,
		deploymentId: config.deploymentId,
		publicUrl: config.publicUrl,
	});

	const server = app.listen(config.port, config.host, () => {
		logger.info(`🚀 DDI mock server listening on http://${config.host}:${config.port}`, {
			deploymentId: config.deploymentId,
			firmwarePath: config.firmwarePath,
			artifactBytes: size,
		});
	});

	const shutdown = (signal: string) => {
		logger.info(`${signal} received, closing server`);
		server.close((error) => {
			if (error) {
				logger.error('Error while closing server', { error: error.message });
				process.exit(1);
			}
			process.exit(0);
		});
		server.closeIdleConnections();
	};

	process.on('SIGTERM', () => shutdown('SIGTERM'));
	process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
	logger.error('Failed to start DDI mock server', {
		error: error instanceof Error ? error.message : String(error),
	});
	process.exit(1);
});
