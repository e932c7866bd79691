import type { ExecutionStatus, StatusReport } from './types';

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Local time in the classic ctime layout, e.g. "Mon Oct  5 09:03:07 2026"
 */
export function formatCtime(date: Date): string {
	const day = String(date.getDate()).padStart(2, ' ');
	const time = [date.getHours(), date.getMinutes(), date.getSeconds()]
		.map((part) => String(part).padStart(2, '0'))
		.join(':');

	return `${WEEKDAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${day} ${time} ${date.getFullYear()}`;
}

export function buildStatusReport(deploymentId: string, downloaded: boolean, now: Date): StatusReport {
	const status: ExecutionStatus = downloaded ? 'SUCCESS' : 'FAILURE';
	return {
		id: deploymentId,
		time: formatCtime(now),
		status,
		details: [],
	};
}

/**
 * Wire form: {"id":…,"time":…,"status":…,"details":[…]} in that key order
 */
export function serializeStatusReport(report: StatusReport): string {
	return JSON.stringify({
		id: report.id,
		time: report.time,
		status: report.status,
		details: report.details,
	});
}
