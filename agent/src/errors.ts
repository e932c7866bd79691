/**
 * Agent Errors
 * ============
 *
 * Typed failures that are allowed to leave a component. Network faults are
 * not among them: the transport reports those as status code 0.
 */

export type DdiAgentErrorCode =
	| 'TRANSPORT_CLOSED'
	| 'CONFIG_INVALID'
	| 'ORCHESTRATOR_BUSY';

export class DdiAgentError extends Error {
	constructor(
		message: string,
		public readonly code: DdiAgentErrorCode,
	) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Raised when a transport is used after close()
 */
export class TransportClosedError extends DdiAgentError {
	constructor() {
		super('Transport has been closed', 'TRANSPORT_CLOSED');
	}
}

export class ConfigValidationError extends DdiAgentError {
	constructor(public readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
	}
}

export class OrchestratorBusyError extends DdiAgentError {
	constructor() {
		super('Polling loop is already running', 'ORCHESTRATOR_BUSY');
	}
}
