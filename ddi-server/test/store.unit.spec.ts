import { DeploymentStore } from '../src/store';

describe('DeploymentStore', () => {
	let clock: number;
	let store: DeploymentStore;

	beforeEach(() => {
		clock = 1000;
		store = new DeploymentStore(() => clock);
	});

	it('should create a record on first poll', () => {
		const record = store.recordPoll('device001');

		expect(record).toEqual({ controllerId: 'device001', pollCount: 1, lastPollAt: 1000, reports: [] });
	});

	it('should update count and time on later polls', () => {
		store.recordPoll('device001');
		clock = 5000;
		store.recordPoll('device001');

		expect(store.getController('device001')).toEqual(expect.objectContaining({ pollCount: 2, lastPollAt: 5000 }));
	});

	it('should keep reports per controller in arrival order', () => {
		store.addReport('a', '1', { id: '1', time: 't1', status: 'SUCCESS', details: [] });
		store.addReport('b', '1', { id: '1', time: 't2', status: 'FAILURE', details: ['x'] });
		store.addReport('a', '2', { id: '2', time: 't3', status: 'FAILURE', details: [] });

		expect(store.getReports('a').map((report) => report.deploymentId)).toEqual(['1', '2']);
		expect(store.getReports('b')).toEqual([
			{ id: '1', time: 't2', status: 'FAILURE', details: ['x'], deploymentId: '1', receivedAt: 1000 },
		]);
	});

	it('should not count a report as a poll', () => {
		store.addReport('device001', '12345', { id: '12345', time: 't', status: 'SUCCESS', details: [] });

		expect(store.getController('device001')?.pollCount).toBe(0);
		expect(store.getController('device001')?.lastPollAt).toBeUndefined();
	});

	it('should return an empty list for unknown controllers', () => {
		expect(store.getReports('nobody')).toEqual([]);
		expect(store.getController('nobody')).toBeUndefined();
	});

	it('should list every known controller', () => {
		store.recordPoll('a');
		store.addReport('b', '1', { id: '1', time: 't', status: 'SUCCESS', details: [] });

		expect(store.listControllers().map((record) => record.controllerId)).toEqual(['a', 'b']);
	});
});
