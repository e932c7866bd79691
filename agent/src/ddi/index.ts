export * from './types';
export { createDescriptor, NO_DEPLOYMENT } from './descriptor';
export type { DescriptorFields } from './descriptor';
export { parseDeploymentResponse } from './response-parser';
export {
	DDI_BASE_PATH,
	normalizeServerUrl,
	buildDdiEndpoint,
	buildControllerEndpoint,
	buildPollingUrl,
	buildStatusUrl,
} from './endpoints';
export { formatCtime, buildStatusReport, serializeStatusReport } from './status-report';
export { LoggingActivityRecorder } from './activity-recorder';
export type { ActivityEvent, ActivityRecorder } from './activity-recorder';
export { UpdateOrchestrator } from './update-orchestrator';
export type { CycleOutcome, PollResult, UpdateOrchestratorOptions } from './update-orchestrator';
