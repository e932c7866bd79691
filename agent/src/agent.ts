/**
 * DDI Agent
 *
 * Wires the device-side pieces together:
 * - Logging (local backend + console)
 * - HTTP transport
 * - Update orchestrator (poll → download → report loop)
 */

import type { AgentConfig } from './config-loader';
import { LoggingActivityRecorder, UpdateOrchestrator } from './ddi';
import { AgentLogger, ComponentLogger, LocalLogBackend } from './logging';
import { HttpTransport, type Transport } from './transport';

export interface DdiAgentDependencies {
	/** Defaults to an HttpTransport built from the config */
	transport?: Transport;
	/** Mirror logs to the console (default: true) */
	consoleOutput?: boolean;
}

export default class DdiAgent {
	private readonly config: AgentConfig;
	private readonly logBackend: LocalLogBackend;
	private readonly agentLogger: AgentLogger;
	private readonly logger: ComponentLogger;
	private readonly transport: Transport;
	private readonly orchestrator: UpdateOrchestrator;

	private abortController?: AbortController;
	private loop?: Promise<void>;

	constructor(config: AgentConfig, dependencies: DdiAgentDependencies = {}) {
		this.config = config;

		this.logBackend = new LocalLogBackend({
			enableFilePersistence: config.enableFileLogging,
			logDir: config.logDir,
		});
		this.agentLogger = new AgentLogger(this.logBackend, config.logLevel, {
			consoleOutput: dependencies.consoleOutput,
		});
		this.agentLogger.setControllerId(config.controllerId);
		this.logger = new ComponentLogger(this.agentLogger, 'Agent');

		this.transport = dependencies.transport ?? new HttpTransport({
			timeoutMs: config.apiTimeout,
			logger: new ComponentLogger(this.agentLogger, 'HttpTransport'),
		});

		this.orchestrator = new UpdateOrchestrator(
			{ serverUrl: config.serverUrl, controllerId: config.controllerId },
			{
				transport: this.transport,
				recorder: new LoggingActivityRecorder(new ComponentLogger(this.agentLogger, 'UpdateOrchestrator')),
				pollIntervalMs: config.pollInterval,
				downloadPath: config.downloadPath,
			},
		);
	}

	/**
	 * Start the polling loop. Resolves once the loop is running.
	 */
	public async init(): Promise<void> {
		if (this.loop) {
			this.logger.warnSync('Agent already started');
			return;
		}

		await this.logBackend.initialize();

		this.logger.infoSync('🚀 DDI agent starting', {
			controllerId: this.config.controllerId,
			serverUrl: this.config.serverUrl,
			downloadPath: this.config.downloadPath,
		});

		this.abortController = new AbortController();
		this.loop = this.orchestrator.run(this.abortController.signal).catch((error: unknown) => {
			this.logger.errorSync('Polling loop terminated unexpectedly', error);
		});
	}

	/**
	 * Abort the loop, wait for the in-flight cycle to wind down, release the transport
	 */
	public async stop(): Promise<void> {
		this.logger.infoSync('Stopping DDI agent');

		this.abortController?.abort();
		await this.loop;
		this.loop = undefined;
		this.abortController = undefined;

		this.transport.close();
		this.logBackend.close();

		this.logger.infoSync('DDI agent stopped');
	}

	public getOrchestrator(): UpdateOrchestrator {
		return this.orchestrator;
	}

	public getLogBackend(): LocalLogBackend {
		return this.logBackend;
	}
}
