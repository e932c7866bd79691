/**
 * UPDATE ORCHESTRATOR - Device ↔ Control Plane Deployment Cycle
 * ==============================================================
 *
 * Pull-based flow, one cycle at a time:
 * 1. POLL the controller resource for a pending deployment
 * 2. DOWNLOAD the artifact when one is offered
 * 3. REPORT SUCCESS/FAILURE for that deployment
 * 4. WAIT the poll interval, then start over
 *
 * States: idle → polling → no-update → idle
 *                        → update-found → downloading → reporting → idle
 *
 * A failing cycle never ends the loop; only the AbortSignal passed to run() does.
 */

import { setTimeout as delay } from 'timers/promises';
import { OrchestratorBusyError } from '../errors';
import type { Transport } from '../transport';
import type { ActivityRecorder } from './activity-recorder';
import { NO_DEPLOYMENT } from './descriptor';
import { buildPollingUrl, buildStatusUrl, normalizeServerUrl } from './endpoints';
import { parseDeploymentResponse } from './response-parser';
import { buildStatusReport, serializeStatusReport } from './status-report';
import type { DeploymentDescriptor, OrchestratorIdentity, OrchestratorState } from './types';

export interface UpdateOrchestratorOptions {
	transport: Transport;
	recorder?: ActivityRecorder;
	pollIntervalMs?: number; // Default: 10000ms (10s)
	downloadPath?: string; // Default: downloaded_firmware.bin
	now?: () => Date;
}

export interface PollResult {
	statusCode: number;
	deployment: DeploymentDescriptor;
}

export type CycleOutcome =
	| { kind: 'no-update'; statusCode: number }
	| { kind: 'deployment'; deploymentId: string; downloaded: boolean; reported: boolean }
	| { kind: 'error'; error: unknown };

const silentRecorder: ActivityRecorder = { record: () => undefined };

export class UpdateOrchestrator {
	private readonly identity: OrchestratorIdentity;
	private readonly transport: Transport;
	private readonly recorder: ActivityRecorder;
	private readonly pollIntervalMs: number;
	private readonly downloadPath: string;
	private readonly now: () => Date;

	private state: OrchestratorState = 'idle';
	private running = false;

	constructor(identity: OrchestratorIdentity, options: UpdateOrchestratorOptions) {
		this.identity = Object.freeze({
			serverUrl: normalizeServerUrl(identity.serverUrl),
			controllerId: identity.controllerId,
		});
		this.transport = options.transport;
		this.recorder = options.recorder ?? silentRecorder;
		this.pollIntervalMs = options.pollIntervalMs ?? 10000;
		this.downloadPath = options.downloadPath ?? 'downloaded_firmware.bin';
		this.now = options.now ?? (() => new Date());
	}

	public getIdentity(): OrchestratorIdentity {
		return this.identity;
	}

	public getState(): OrchestratorState {
		return this.state;
	}

	public isRunning(): boolean {
		return this.running;
	}

	// ============================================================================
	// LOOP
	// ============================================================================

	/**
	 * Run cycles until the signal aborts. Without a signal this never resolves.
	 */
	public async run(signal: AbortSignal = new AbortController().signal): Promise<void> {
		if (this.running) {
			throw new OrchestratorBusyError();
		}

		this.running = true;
		this.recorder.record({
			type: 'loop-started',
			identity: this.identity,
			pollIntervalMs: this.pollIntervalMs,
		});

		try {
			while (!signal.aborted) {
				await this.runCycle(signal);

				if (signal.aborted) {
					break;
				}

				this.recorder.record({ type: 'waiting', intervalMs: this.pollIntervalMs });
				await this.wait(signal);
			}
		} finally {
			this.running = false;
			this.recorder.record({ type: 'loop-stopped' });
		}
	}

	/**
	 * One poll → (download → report) pass. Errors are caught here and
	 * surfaced as an 'error' outcome.
	 */
	public async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
		try {
			this.transition('polling');
			const { statusCode, deployment } = await this.pollForUpdates(signal);

			if (!deployment.hasDeployment) {
				this.transition('no-update');
				this.recorder.record({ type: 'no-update', statusCode });
				return { kind: 'no-update', statusCode };
			}

			this.transition('update-found');
			this.recorder.record({ type: 'deployment-found', deployment });

			this.transition('downloading');
			const downloaded = await this.downloadArtifact(deployment, signal);

			// Shutting down: skip the report rather than post with a dead signal
			if (signal?.aborted) {
				return { kind: 'deployment', deploymentId: deployment.id, downloaded, reported: false };
			}

			this.transition('reporting');
			const reported = await this.reportStatus(deployment.id, downloaded, signal);

			return { kind: 'deployment', deploymentId: deployment.id, downloaded, reported };
		} catch (error) {
			this.recorder.record({ type: 'cycle-error', error });
			return { kind: 'error', error };
		} finally {
			this.transition('idle');
		}
	}

	// ============================================================================
	// PROTOCOL STEPS
	// ============================================================================

	public async pollForUpdates(signal?: AbortSignal): Promise<PollResult> {
		const url = buildPollingUrl(this.identity);
		const response = await this.transport.get(url, { signal });

		this.recorder.record({ type: 'poll', url, statusCode: response.statusCode });

		// Transport failures and protocol errors both mean "nothing to do"
		if (response.statusCode !== 200) {
			return { statusCode: response.statusCode, deployment: NO_DEPLOYMENT };
		}

		return {
			statusCode: response.statusCode,
			deployment: parseDeploymentResponse(response.body),
		};
	}

	public async downloadArtifact(deployment: DeploymentDescriptor, signal?: AbortSignal): Promise<boolean> {
		const succeeded = await this.transport.downloadToFile(deployment.downloadUrl, this.downloadPath, { signal });

		this.recorder.record({
			type: 'download',
			deploymentId: deployment.id,
			url: deployment.downloadUrl,
			localPath: this.downloadPath,
			declaredSize: deployment.size,
			succeeded,
		});

		return succeeded;
	}

	/**
	 * POST the execution result. The outcome is recorded, never retried.
	 */
	public async reportStatus(deploymentId: string, downloaded: boolean, signal?: AbortSignal): Promise<boolean> {
		const report = buildStatusReport(deploymentId, downloaded, this.now());
		const response = await this.transport.post(
			buildStatusUrl(this.identity, deploymentId),
			serializeStatusReport(report),
			'application/json',
			{ signal },
		);
		const accepted = response.statusCode === 200;

		this.recorder.record({
			type: 'report',
			deploymentId,
			status: report.status,
			statusCode: response.statusCode,
			accepted,
		});

		return accepted;
	}

	// ============================================================================
	// HELPERS
	// ============================================================================

	private transition(to: OrchestratorState): void {
		if (this.state === to) {
			return;
		}
		const from = this.state;
		this.state = to;
		this.recorder.record({ type: 'state', from, to });
	}

	private async wait(signal: AbortSignal): Promise<void> {
		try {
			await delay(this.pollIntervalMs, undefined, { signal });
		} catch (error) {
			// Abort ends the wait early; anything else is unexpected
			if (!signal.aborted) {
				throw error;
			}
		}
	}
}
