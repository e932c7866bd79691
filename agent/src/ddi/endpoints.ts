/**
 * DDI ENDPOINTS - Control Plane URL Building
 * ==========================================
 *
 * Usage:
 * ```typescript
 * import { buildPollingUrl, buildStatusUrl } from './ddi/endpoints';
 *
 * buildPollingUrl({ serverUrl: 'http://localhost:8000/', controllerId: 'device001' });
 * // => http://localhost:8000/rest/v1/ddi/v1/controller/device/device001
 * ```
 */

import type { OrchestratorIdentity } from './types';

export const DDI_BASE_PATH = '/rest/v1/ddi/v1';

/**
 * Strip trailing slashes from the server base address
 *
 * @example
 * normalizeServerUrl('http://localhost:8000//') // => 'http://localhost:8000'
 */
export function normalizeServerUrl(serverUrl: string): string {
	return serverUrl.replace(/\/+$/, '');
}

/**
 * Combine the server base address with a path under the DDI namespace
 *
 * @example
 * buildDdiEndpoint('http://localhost:8000', 'controller/device/abc')
 * // => 'http://localhost:8000/rest/v1/ddi/v1/controller/device/abc'
 */
export function buildDdiEndpoint(serverUrl: string, path: string): string {
	const normalizedPath = path.startsWith('/') ? path : `/${path}`;
	return `${normalizeServerUrl(serverUrl)}${DDI_BASE_PATH}${normalizedPath}`;
}

/**
 * Controller-scoped endpoint. The controller ID is encoded as one path segment.
 */
export function buildControllerEndpoint(serverUrl: string, controllerId: string, path: string = ''): string {
	const suffix = path === '' || path.startsWith('/') ? path : `/${path}`;
	return buildDdiEndpoint(serverUrl, `/controller/device/${encodeURIComponent(controllerId)}${suffix}`);
}

export function buildPollingUrl(identity: OrchestratorIdentity): string {
	return buildControllerEndpoint(identity.serverUrl, identity.controllerId);
}

export function buildStatusUrl(identity: OrchestratorIdentity, deploymentId: string): string {
	return buildControllerEndpoint(
		identity.serverUrl,
		identity.controllerId,
		`/deploymentBase/${encodeURIComponent(deploymentId)}`,
	);
}
