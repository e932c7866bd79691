/**
 * Deployment response parser
 * ==========================
 *
 * Pulls a DeploymentDescriptor out of a controller poll body by scanning for
 * the fields the agent needs, without validating the document as JSON.
 * Never throws: anything it cannot make sense of means "no deployment".
 *
 * @example
 * parseDeploymentResponse(
 *   '{"deploymentBase":{"id":"12345","download":{"links":{"firmware":' +
 *   '{"href":"http://host/files/firmware.bin","size":1048576}}}}}'
 * )
 * // => { id: '12345', downloadUrl: 'http://host/files/firmware.bin', size: 1048576, hasDeployment: true }
 */

import { createDescriptor, NO_DEPLOYMENT } from './descriptor';
import type { DeploymentDescriptor } from './types';

const DEPLOYMENT_MARKER = '"deploymentBase"';

export function parseDeploymentResponse(body: unknown): DeploymentDescriptor {
	if (typeof body !== 'string') {
		return NO_DEPLOYMENT;
	}

	const markerIndex = body.indexOf(DEPLOYMENT_MARKER);
	if (markerIndex === -1) {
		return NO_DEPLOYMENT;
	}

	// All fields are looked up after the marker, in whatever order they appear
	const from = markerIndex + DEPLOYMENT_MARKER.length;

	return createDescriptor({
		id: findStringField(body, 'id', from),
		downloadUrl: findStringField(body, 'href', from),
		size: findSizeField(body, from),
	});
}

function findStringField(body: string, name: string, from: number): string | undefined {
	const pattern = new RegExp(`"${name}"\\s*:\\s*"([^"]*)"`, 'g');
	pattern.lastIndex = from;
	return pattern.exec(body)?.[1];
}

/**
 * A size that is not a plain non-negative integer is ignored (left at 0)
 */
function findSizeField(body: string, from: number): number | undefined {
	const pattern = /"size"\s*:\s*([^,}\s]*)/g;
	pattern.lastIndex = from;
	const raw = pattern.exec(body)?.[1];

	if (raw === undefined || !/^\d+$/.test(raw)) {
		return undefined;
	}
	return Number(raw);
}
