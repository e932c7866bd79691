/**
 * DDI protocol types
 */

/**
 * What one poll told us: is there a deployment, and if so, what/where.
 * Built only through createDescriptor(), which derives hasDeployment.
 */
export interface DeploymentDescriptor {
	readonly id: string;
	readonly downloadUrl: string;
	/** Declared artifact size in bytes; informational, never verified */
	readonly size: number;
	readonly hasDeployment: boolean;
}

export interface OrchestratorIdentity {
	readonly serverUrl: string;
	readonly controllerId: string;
}

export type ExecutionStatus = 'SUCCESS' | 'FAILURE';

export interface StatusReport {
	id: string;
	time: string;
	status: ExecutionStatus;
	details: string[];
}

export type OrchestratorState =
	| 'idle'
	| 'polling'
	| 'no-update'
	| 'update-found'
	| 'downloading'
	| 'reporting';
