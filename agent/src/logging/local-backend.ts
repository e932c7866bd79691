/**
 * Local Log Backend
 *
 * Keeps recent agent logs in memory with optional NDJSON file persistence.
 * Implements log rotation and periodic cleanup.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { LogMessage, LogFilter, LogBackend } from './types';

export interface LocalLogBackendOptions {
	/** Maximum number of logs to keep in memory */
	maxLogs?: number;
	/** Auto-cleanup logs older than this (ms) */
	maxAge?: number;
	/** Enable file-based persistence */
	enableFilePersistence?: boolean;
	/** Directory for log files */
	logDir?: string;
	/** Rotate log file when it reaches this size (bytes) */
	maxFileSize?: number;
}

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

export class LocalLogBackend implements LogBackend {
	private logs: LogMessage[] = [];
	private logIdCounter = 0;
	private options: Required<LocalLogBackendOptions>;
	private currentLogFile: string | null = null;
	private currentLogFileSize = 0;
	private cleanupTimer?: NodeJS.Timeout;

	constructor(options: LocalLogBackendOptions = {}) {
		this.options = {
			maxLogs: options.maxLogs ?? 1000,
			maxAge: options.maxAge ?? 24 * 60 * 60 * 1000, // 24 hours
			enableFilePersistence: options.enableFilePersistence ?? false,
			logDir: options.logDir ?? './data/logs',
			maxFileSize: options.maxFileSize ?? 10 * 1024 * 1024, // 10MB
		};
	}

	/**
	 * Create the log directory (when persisting) and start periodic cleanup
	 */
	public async initialize(): Promise<void> {
		if (this.options.enableFilePersistence) {
			await fs.mkdir(this.options.logDir, { recursive: true });
			this.rotateLogFile();
		}

		this.startPeriodicCleanup();
	}

	public async log(message: LogMessage): Promise<void> {
		const logEntry: LogMessage = {
			...message,
			id: message.id ?? `log-${++this.logIdCounter}`,
		};

		this.logs.push(logEntry);

		if (this.logs.length > this.options.maxLogs) {
			this.logs.shift();
		}

		if (this.currentLogFile) {
			await this.writeToFile(logEntry);
		}
	}

	public async getLogs(filter?: LogFilter): Promise<LogMessage[]> {
		let filtered = [...this.logs];

		if (!filter) {
			return filtered;
		}

		const { level, component, since, until, limit } = filter;

		if (level !== undefined) {
			filtered = filtered.filter((log) => log.level === level);
		}

		if (component !== undefined) {
			filtered = filtered.filter((log) => log.source.name === component);
		}

		if (since !== undefined) {
			filtered = filtered.filter((log) => log.timestamp >= since);
		}

		if (until !== undefined) {
			filtered = filtered.filter((log) => log.timestamp <= until);
		}

		if (limit !== undefined && limit > 0) {
			filtered = filtered.slice(-limit);
		}

		return filtered;
	}

	/**
	 * Drop logs older than the given age; returns how many were removed
	 */
	public async cleanup(olderThanMs: number): Promise<number> {
		const cutoffTime = Date.now() - olderThanMs;
		const initialCount = this.logs.length;

		this.logs = this.logs.filter((log) => log.timestamp >= cutoffTime);

		if (this.options.enableFilePersistence) {
			await this.cleanupOldLogFiles(cutoffTime);
		}

		return initialCount - this.logs.length;
	}

	public async getLogCount(): Promise<number> {
		return this.logs.length;
	}

	/**
	 * Stop periodic cleanup
	 */
	public close(): void {
		if (this.cleanupTimer) {
			clearInterval(this.cleanupTimer);
			this.cleanupTimer = undefined;
		}
	}

	private async writeToFile(logEntry: LogMessage): Promise<void> {
		const logLine = JSON.stringify(logEntry) + '\n';
		const lineSize = Buffer.byteLength(logLine, 'utf-8');

		if (this.currentLogFileSize + lineSize > this.options.maxFileSize) {
			this.rotateLogFile();
		}

		if (!this.currentLogFile) {
			return;
		}

		try {
			await fs.appendFile(this.currentLogFile, logLine, 'utf-8');
			this.currentLogFileSize += lineSize;
		} catch (error) {
			console.error('Failed to write log to file:', error);
		}
	}

	private rotateLogFile(): void {
		this.currentLogFile = path.join(this.options.logDir, `ddi-agent-${Date.now()}.log`);
		this.currentLogFileSize = 0;
	}

	private async cleanupOldLogFiles(cutoffTime: number): Promise<void> {
		try {
			const files = await fs.readdir(this.options.logDir);

			for (const file of files) {
				if (!file.endsWith('.log')) {
					continue;
				}

				const filePath = path.join(this.options.logDir, file);
				if (filePath === this.currentLogFile) {
					continue;
				}

				const stats = await fs.stat(filePath);
				if (stats.mtimeMs < cutoffTime) {
					await fs.unlink(filePath);
				}
			}
		} catch (error) {
			console.error('Failed to cleanup old log files:', error);
		}
	}

	private startPeriodicCleanup(): void {
		if (this.cleanupTimer) {
			return;
		}

		this.cleanupTimer = setInterval(() => {
			this.cleanup(this.options.maxAge)
				.then((removed) => {
					if (removed > 0) {
						console.log(`[LogBackend] Cleaned up ${removed} old log entries`);
					}
				})
				.catch((error: unknown) => {
					console.error('[LogBackend] Cleanup failed:', error);
				});
		}, CLEANUP_INTERVAL_MS);
		this.cleanupTimer.unref();
	}
}
