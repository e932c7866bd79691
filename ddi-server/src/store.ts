/**
 * In-memory control-plane state
 *
 * Tracks which controllers have polled and the status reports they sent.
 * Everything is lost on restart.
 */

import type { StatusReportBody } from './schemas';

export interface ReceivedReport extends StatusReportBody {
	deploymentId: string;
	receivedAt: number;
}

export interface ControllerRecord {
	controllerId: string;
	pollCount: number;
	lastPollAt?: number;
	reports: ReceivedReport[];
}

export class DeploymentStore {
	private readonly controllers = new Map<string, ControllerRecord>();

	constructor(private readonly now: () => number = Date.now) {}

	public recordPoll(controllerId: string): ControllerRecord {
		const record = this.getOrCreate(controllerId);
		record.pollCount += 1;
		record.lastPollAt = this.now();
		return record;
	}

	public addReport(controllerId: string, deploymentId: string, report: StatusReportBody): ReceivedReport {
		const received: ReceivedReport = {
			...report,
			deploymentId,
			receivedAt: this.now(),
		};
		this.getOrCreate(controllerId).reports.push(received);
		return received;
	}

	public getController(controllerId: string): ControllerRecord | undefined {
		return this.controllers.get(controllerId);
	}

	public getReports(controllerId: string): ReceivedReport[] {
		return this.controllers.get(controllerId)?.reports ?? [];
	}

	public listControllers(): ControllerRecord[] {
		return Array.from(this.controllers.values());
	}

	private getOrCreate(controllerId: string): ControllerRecord {
		let record = this.controllers.get(controllerId);
		if (!record) {
			record = { controllerId, pollCount: 0, reports: [] };
			this.controllers.set(controllerId, record);
		}
		return record;
	}
}
