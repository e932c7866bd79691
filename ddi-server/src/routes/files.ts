/**
 * Artifact download
 *   GET /files/firmware.bin
 */

import express from 'express';
import * as fs from 'fs/promises';
import path from 'path';
import logger from '../logger';

export const FIRMWARE_ROUTE = '/files/firmware.bin';

export function createFilesRouter(firmwarePath: string): express.Router {
	const router = express.Router();
	const absolutePath = path.resolve(firmwarePath);

	router.get(FIRMWARE_ROUTE, async (req, res, next) => {
		try {
			await fs.access(absolutePath);
		} catch {
			logger.warn(`Firmware file not found: ${absolutePath}`);
			return res.status(404).json({ detail: 'Firmware file not found' });
		}

		res.set({
			'Content-Type': 'application/octet-stream',
			'Content-Disposition': 'attachment; filename=firmware.bin',
			'Cache-Control': 'no-cache',
			'X-Content-Type-Options': 'nosniff',
		});

		res.sendFile(absolutePath, (error?: Error) => {
			if (!error) {
				logger.info(`📦 Served ${FIRMWARE_ROUTE} to ${req.ip ?? 'unknown client'}`);
				return;
			}
			if (res.headersSent) {
				// Client went away mid-transfer
				logger.warn('Firmware transfer aborted', { reason: error.message });
				return;
			}
			next(error);
		});
	});

	return router;
}
