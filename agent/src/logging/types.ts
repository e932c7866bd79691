/**
 * Logging types and interfaces
 */

/** Least to most severe */
export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export interface LogContext {
	component?: string;
	operation?: string;
	[key: string]: unknown;
}

export interface LogMessage {
	/** Unique log message ID */
	id?: string;
	/** Log message content */
	message: string;
	/** Timestamp in milliseconds since epoch */
	timestamp: number;
	/** Log level/severity */
	level: LogLevel;
	/** Component that produced the log */
	source: LogSource;
	/** Controller ID of the device, once known */
	controllerId?: string;
	context?: LogContext;
}

export interface LogSource {
	type: 'agent' | 'system';
	name: string;
}

export interface LogFilter {
	level?: LogLevel;
	/** Filter by component (source name) */
	component?: string;
	/** Start timestamp (ms) - logs after this time */
	since?: number;
	/** End timestamp (ms) - logs before this time */
	until?: number;
	/** Maximum number of logs to return (most recent) */
	limit?: number;
}

export interface LogBackend {
	/** Store a log message */
	log(message: LogMessage): Promise<void>;
	/** Retrieve logs matching filter */
	getLogs(filter?: LogFilter): Promise<LogMessage[]>;
	/** Clear old logs */
	cleanup(olderThanMs: number): Promise<number>;
	/** Get total number of stored logs */
	getLogCount(): Promise<number>;
}
