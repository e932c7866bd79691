/**
 * Agent Logger
 * =============
 *
 * Structured logging for agent-level events (transport, orchestrator, entrypoint).
 * Fans each entry out to the configured LogBackends and mirrors it to the console.
 *
 * Usage:
 *   const logger = new AgentLogger([new LocalLogBackend()]);
 *   await logger.info('Polling loop started', { component: 'UpdateOrchestrator' });
 *   logger.errorSync('Cycle failed', error, { component: 'UpdateOrchestrator' });
 */

import type { LogBackend, LogContext, LogLevel, LogMessage } from './types';

export type { LogContext } from './types';

// Log level hierarchy for filtering
const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface AgentLoggerOptions {
	/** Mirror entries to stdout/stderr (default: true) */
	consoleOutput?: boolean;
}

export class AgentLogger {
	private backends: LogBackend[];
	private controllerId?: string;
	private minLogLevel: LogLevel;
	private consoleOutput: boolean;

	constructor(
		backends: LogBackend | LogBackend[],
		initialLogLevel: LogLevel = 'info',
		options: AgentLoggerOptions = {},
	) {
		this.backends = Array.isArray(backends) ? backends : [backends];
		this.minLogLevel = initialLogLevel;
		this.consoleOutput = options.consoleOutput ?? true;
	}

	/**
	 * Tag every subsequent entry with the device's controller ID
	 */
	public setControllerId(controllerId: string): void {
		this.controllerId = controllerId;
	}

	public setLogLevel(level: LogLevel): void {
		const oldLevel = this.minLogLevel;
		this.minLogLevel = level;

		// Always visible, regardless of the new threshold
		this.consoleLog('info', `Log level changed: ${oldLevel} → ${level}`, { component: 'AgentLogger' });
	}

	public getLogLevel(): LogLevel {
		return this.minLogLevel;
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVELS[level] >= LOG_LEVELS[this.minLogLevel];
	}

	public async debug(message: string, context?: LogContext): Promise<void> {
		await this.log('debug', message, context);
	}

	public async info(message: string, context?: LogContext): Promise<void> {
		await this.log('info', message, context);
	}

	public async warn(message: string, context?: LogContext): Promise<void> {
		await this.log('warn', message, context);
	}

	public async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
		await this.log('error', message, { ...context, ...describeError(error) });
	}

	/**
	 * Synchronous variants: the entry is printed immediately and backend
	 * writes finish in the background.
	 */
	public debugSync(message: string, context?: LogContext): void {
		void this.log('debug', message, context);
	}

	public infoSync(message: string, context?: LogContext): void {
		void this.log('info', message, context);
	}

	public warnSync(message: string, context?: LogContext): void {
		void this.log('warn', message, context);
	}

	public errorSync(message: string, error?: unknown, context?: LogContext): void {
		void this.log('error', message, { ...context, ...describeError(error) });
	}

	/**
	 * Core logging method. Never rejects: a failing backend is reported on
	 * the console and the remaining backends still receive the entry.
	 */
	private async log(level: LogLevel, message: string, context?: LogContext): Promise<void> {
		if (!this.shouldLog(level)) {
			return;
		}

		const logMessage: LogMessage = {
			timestamp: Date.now(),
			level,
			message,
			source: {
				type: 'agent',
				name: context?.component ?? 'agent',
			},
			...(this.controllerId && { controllerId: this.controllerId }),
			...(context && { context }),
		};

		this.consoleLog(level, message, context);

		await Promise.all(
			this.backends.map((backend) =>
				backend.log(logMessage).catch((err: unknown) => {
					console.error('[AgentLogger] Failed to log to backend:', err);
				}),
			),
		);
	}

	private consoleLog(level: LogLevel, message: string, context?: LogContext): void {
		if (!this.consoleOutput) {
			return;
		}

		const timestamp = new Date().toISOString();
		const component = context?.component ?? 'agent';
		let output = `${timestamp} [${level.toUpperCase()}] [${component}] ${message}`;

		if (context) {
			const { component: _, ...otherContext } = context;
			if (Object.keys(otherContext).length > 0) {
				output += ` ${JSON.stringify(otherContext)}`;
			}
		}

		switch (level) {
			case 'debug':
			case 'info':
				console.log(output);
				break;
			case 'warn':
				console.warn(output);
				break;
			case 'error':
				console.error(output);
				break;
		}
	}
}

function describeError(error: unknown): LogContext {
	if (error === undefined) {
		return {};
	}
	if (error instanceof Error) {
		return {
			error: {
				name: error.name,
				message: error.message,
				stack: error.stack,
			},
		};
	}
	return { error: { message: String(error) } };
}
