import { parseCliArgs } from '../../src/cli';

describe('parseCliArgs', () => {
	it('should take server URL and controller ID as positionals', () => {
		expect(parseCliArgs(['http://ddi.test:8080', 'device-42'])).toEqual({
			serverUrl: 'http://ddi.test:8080',
			controllerId: 'device-42',
			pollInterval: undefined,
			apiTimeout: undefined,
			downloadPath: undefined,
			logLevel: undefined,
		});
	});

	it('should keep numeric-looking controller IDs as strings', () => {
		expect(parseCliArgs(['http://ddi.test', '001']).controllerId).toBe('001');
	});

	it('should leave everything unset without arguments', () => {
		const parsed = parseCliArgs([]);

		expect(parsed.serverUrl).toBeUndefined();
		expect(parsed.controllerId).toBeUndefined();
	});

	it('should parse long options', () => {
		const parsed = parseCliArgs([
			'--poll-interval', '500',
			'--timeout', '2000',
			'--download-path', '/tmp/fw.bin',
			'--log-level', 'debug',
		]);

		expect(parsed).toEqual({
			serverUrl: undefined,
			controllerId: undefined,
			pollInterval: 500,
			apiTimeout: 2000,
			downloadPath: '/tmp/fw.bin',
			logLevel: 'debug',
		});
	});

	it('should parse short aliases', () => {
		const parsed = parseCliArgs(['http://ddi.test', 'dev', '-i', '250', '-t', '100', '-o', 'out.bin', '-l', 'warn']);

		expect(parsed.pollInterval).toBe(250);
		expect(parsed.apiTimeout).toBe(100);
		expect(parsed.downloadPath).toBe('out.bin');
		expect(parsed.logLevel).toBe('warn');
	});
});
