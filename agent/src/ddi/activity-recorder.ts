/**
 * Activity Recorder
 * =================
 *
 * The orchestrator's only observability dependency: one method that receives
 * progress and error notices. LoggingActivityRecorder turns them into log lines.
 */

import type { ComponentLogger } from '../logging';
import type { DeploymentDescriptor, ExecutionStatus, OrchestratorIdentity, OrchestratorState } from './types';

export type ActivityEvent =
	| { type: 'loop-started'; identity: OrchestratorIdentity; pollIntervalMs: number }
	| { type: 'loop-stopped' }
	| { type: 'state'; from: OrchestratorState; to: OrchestratorState }
	| { type: 'poll'; url: string; statusCode: number }
	| { type: 'no-update'; statusCode: number }
	| { type: 'deployment-found'; deployment: DeploymentDescriptor }
	| { type: 'download'; deploymentId: string; url: string; localPath: string; declaredSize: number; succeeded: boolean }
	| { type: 'report'; deploymentId: string; status: ExecutionStatus; statusCode: number; accepted: boolean }
	| { type: 'cycle-error'; error: unknown }
	| { type: 'waiting'; intervalMs: number };

export interface ActivityRecorder {
	record(event: ActivityEvent): void;
}

export class LoggingActivityRecorder implements ActivityRecorder {
	constructor(private readonly logger: ComponentLogger) {}

	public record(event: ActivityEvent): void {
		switch (event.type) {
			case 'loop-started':
				this.logger.infoSync('🚀 Starting DDI polling loop', {
					controllerId: event.identity.controllerId,
					serverUrl: event.identity.serverUrl,
					pollIntervalMs: event.pollIntervalMs,
				});
				break;
			case 'loop-stopped':
				this.logger.infoSync('🛑 Polling loop stopped');
				break;
			case 'state':
				this.logger.debugSync(`State: ${event.from} → ${event.to}`);
				break;
			case 'poll':
				if (event.statusCode === 200) {
					this.logger.debugSync('📡 Poll response received', { url: event.url });
				} else {
					this.logger.warnSync(`Poll failed with status code: ${event.statusCode}`, { url: event.url });
				}
				break;
			case 'no-update':
				this.logger.infoSync('No updates available');
				break;
			case 'deployment-found':
				this.logger.infoSync(`🎯 New deployment found: ${event.deployment.id}`, {
					downloadUrl: event.deployment.downloadUrl,
					size: event.deployment.size,
				});
				break;
			case 'download':
				if (event.succeeded) {
					this.logger.infoSync(`✅ Firmware downloaded successfully to: ${event.localPath}`, {
						deploymentId: event.deploymentId,
						expectedBytes: event.declaredSize,
					});
				} else {
					this.logger.warnSync('❌ Firmware download failed', {
						deploymentId: event.deploymentId,
						url: event.url,
					});
				}
				break;
			case 'report':
				if (event.accepted) {
					this.logger.infoSync(`📤 Status ${event.status} reported for deployment ${event.deploymentId}`);
				} else {
					this.logger.warnSync(`Status report failed with code: ${event.statusCode}`, {
						deploymentId: event.deploymentId,
						status: event.status,
					});
				}
				break;
			case 'cycle-error':
				this.logger.errorSync('Error in polling loop', event.error);
				break;
			case 'waiting':
				this.logger.debugSync(`Waiting ${event.intervalMs}ms before next poll`);
				break;
		}
	}
}
