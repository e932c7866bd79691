/**
 * Component Logger
 * ================
 *
 * Wrapper around AgentLogger that stamps every entry with a component name.
 *
 * Usage:
 *   const logger = new ComponentLogger(agentLogger, 'HttpTransport');
 *   logger.warnSync('GET failed', { url });
 */

import type { AgentLogger } from './agent-logger';
import type { LogContext } from './types';

export class ComponentLogger {
	constructor(
		private readonly agentLogger: AgentLogger,
		private readonly component: string,
	) {}

	private mergeContext(context?: LogContext): LogContext {
		return {
			component: this.component,
			...context,
		};
	}

	debugSync(message: string, context?: LogContext): void {
		this.agentLogger.debugSync(message, this.mergeContext(context));
	}

	infoSync(message: string, context?: LogContext): void {
		this.agentLogger.infoSync(message, this.mergeContext(context));
	}

	warnSync(message: string, context?: LogContext): void {
		this.agentLogger.warnSync(message, this.mergeContext(context));
	}

	errorSync(message: string, error: unknown, context?: LogContext): void {
		this.agentLogger.errorSync(message, error, this.mergeContext(context));
	}
}
