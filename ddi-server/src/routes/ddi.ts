/**
 * DDI Routes
 * ==========
 *
 * Device-facing half of the protocol:
 *   GET  /rest/v1/ddi/v1/controller/device/:controllerId
 *   POST /rest/v1/ddi/v1/controller/device/:controllerId/deploymentBase/:deploymentId
 */

import express, { Request } from 'express';
import * as fs from 'fs/promises';
import logger from '../logger';
import { statusReportSchema, toValidationErrorBody } from '../schemas';
import type { DeploymentStore } from '../store';
import { FIRMWARE_ROUTE } from './files';

export const DDI_CONTROLLER_ROUTE = '/rest/v1/ddi/v1/controller/device/:controllerId';

export interface DdiRouterOptions {
	store: DeploymentStore;
	deploymentId: string;
	firmwarePath: string;
	/** Base for artifact links; the request's own origin when unset */
	publicUrl?: string;
}

export function createDdiRouter(options: DdiRouterOptions): express.Router {
	const router = express.Router();

	// ============================================================================
	// Polling
	// ============================================================================

	router.get(DDI_CONTROLLER_ROUTE, async (req, res, next) => {
		try {
			const { controllerId } = req.params;
			const record = options.store.recordPoll(controllerId);
			const size = await artifactSize(options.firmwarePath);

			logger.info(`Device ${controllerId} polled for updates - returning deployment ${options.deploymentId}`, {
				pollCount: record.pollCount,
			});

			res.json({
				deploymentBase: {
					id: options.deploymentId,
					download: {
						links: {
							firmware: {
								href: `${baseUrl(req, options.publicUrl)}${FIRMWARE_ROUTE}`,
								size,
							},
						},
					},
				},
			});
		} catch (error) {
			next(error);
		}
	});

	// ============================================================================
	// Status feedback
	// ============================================================================

	router.post(`${DDI_CONTROLLER_ROUTE}/deploymentBase/:deploymentId`, (req, res) => {
		const { controllerId, deploymentId } = req.params;

		const parsed = statusReportSchema.safeParse(req.body);
		if (!parsed.success) {
			logger.warn(`Rejected status report from ${controllerId}`, {
				issues: parsed.error.issues.map((issue) => issue.message),
			});
			return res.status(422).json(toValidationErrorBody(parsed.error));
		}

		const report = options.store.addReport(controllerId, deploymentId, parsed.data);

		logger.info('📊 Status Report Received', {
			device: controllerId,
			deployment: deploymentId,
			status: report.status,
			time: report.time,
			...(report.details.length > 0 && { details: report.details.join(', ') }),
		});

		return res.json({
			message: 'Status report received successfully',
			controller_id: controllerId,
			deployment_id: deploymentId,
			received_status: report.status,
		});
	});

	return router;
}

// ============================================================================
// Helpers
// ============================================================================

function baseUrl(req: Request, publicUrl?: string): string {
	const base = publicUrl ?? `${req.protocol}://${req.get('host') ?? 'localhost'}`;
	return base.replace(/\/+$/, '');
}

/**
 * Byte length of the artifact, 0 when it does not exist (yet)
 */
export async function artifactSize(firmwarePath: string): Promise<number> {
	try {
		const stats = await fs.stat(firmwarePath);
		return stats.size;
	} catch (error) {
		if (isNotFound(error)) {
			return 0;
		}
		throw error;
	}
}

export function isNotFound(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
