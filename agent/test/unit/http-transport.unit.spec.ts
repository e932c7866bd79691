/**
 * Unit Tests for HttpTransport
 *
 * The axios adapter is swapped for an in-process fake, so no sockets are opened.
 */

import { AxiosError, AxiosPromise, InternalAxiosRequestConfig, RawAxiosResponseHeaders } from 'axios';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { TransportClosedError } from '../../src/errors';
import { HttpTransport, normalizeHeaders } from '../../src/transport';

const POLL_URL = 'http://localhost:8000/rest/v1/ddi/v1/controller/device/device001';

function respond(
	config: InternalAxiosRequestConfig,
	status: number,
	chunks: Buffer[],
	headers: RawAxiosResponseHeaders = {},
): AxiosPromise {
	return Promise.resolve({
		data: Readable.from(chunks),
		status,
		statusText: '',
		headers,
		config,
	});
}

function failingStream(first: Buffer): Readable {
	return Readable.from((async function* () {
		yield first;
		throw new Error('socket hang up');
	})());
}

function createAdapter() {
	return jest.fn<AxiosPromise, [InternalAxiosRequestConfig]>();
}

describe('HttpTransport', () => {
	let adapter: ReturnType<typeof createAdapter>;
	let transport: HttpTransport;

	beforeEach(() => {
		adapter = createAdapter();
		transport = new HttpTransport({ adapter });
	});

	afterEach(() => {
		transport.close();
	});

	describe('get', () => {
		it('should return status, body and headers', async () => {
			adapter.mockImplementation((config) =>
				respond(config, 200, [Buffer.from('{"ok":true}')], { 'Content-Type': 'application/json' }),
			);

			const response = await transport.get(POLL_URL);

			expect(response).toEqual({
				statusCode: 200,
				body: '{"ok":true}',
				headers: { 'content-type': 'application/json' },
			});
			expect(adapter).toHaveBeenCalledTimes(1);
			expect(adapter.mock.calls[0][0].url).toBe(POLL_URL);
			expect(adapter.mock.calls[0][0].method).toBe('get');
		});

		it('should decode a multibyte character split across chunks', async () => {
			const bytes = Buffer.from('{"id":"ü"}', 'utf8');
			const splitAt = bytes.indexOf(0xc3) + 1;
			adapter.mockImplementation((config) =>
				respond(config, 200, [bytes.subarray(0, splitAt), bytes.subarray(splitAt)]),
			);

			const response = await transport.get(POLL_URL);

			expect(response.body).toBe('{"id":"ü"}');
		});

		it('should follow up to 5 redirects', async () => {
			adapter.mockImplementation((config) => respond(config, 200, []));

			await transport.get(POLL_URL);

			expect(adapter.mock.calls[0][0].maxRedirects).toBe(5);
		});

		it('should pass non-2xx responses through', async () => {
			adapter.mockImplementation((config) => respond(config, 404, [Buffer.from('Not Found')]));

			const response = await transport.get(POLL_URL);

			expect(response.statusCode).toBe(404);
			expect(response.body).toBe('Not Found');
		});

		it('should return status 0 when the request fails', async () => {
			adapter.mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));

			const response = await transport.get(POLL_URL);

			expect(response).toEqual({ statusCode: 0, body: '', headers: {} });
		});

		it('should return status 0 when the body stream breaks', async () => {
			adapter.mockImplementation((config) =>
				Promise.resolve({
					data: failingStream(Buffer.from('{"deploy')),
					status: 200,
					statusText: 'OK',
					headers: {},
					config,
				}),
			);

			const response = await transport.get(POLL_URL);

			expect(response.statusCode).toBe(0);
			expect(response.body).toBe('');
		});

		it('should return status 0 without sending when the signal is already aborted', async () => {
			const controller = new AbortController();
			controller.abort();

			const response = await transport.get(POLL_URL, { signal: controller.signal });

			expect(response.statusCode).toBe(0);
			expect(adapter).not.toHaveBeenCalled();
		});
	});

	describe('post', () => {
		const body = '{"id":"12345","time":"Mon Oct  5 09:03:07 2026","status":"SUCCESS","details":[]}';

		it('should send the body verbatim as JSON by default', async () => {
			adapter.mockImplementation((config) => respond(config, 200, [Buffer.from('{}')]));

			const response = await transport.post(`${POLL_URL}/deploymentBase/12345`, body);

			expect(response.statusCode).toBe(200);
			const config = adapter.mock.calls[0][0];
			expect(config.method).toBe('post');
			expect(config.data).toBe(body);
			expect(config.headers.get('Content-Type')).toBe('application/json');
		});

		it('should use the given content type', async () => {
			adapter.mockImplementation((config) => respond(config, 200, []));

			await transport.post(POLL_URL, 'a=1', 'application/x-www-form-urlencoded');

			expect(adapter.mock.calls[0][0].headers.get('Content-Type')).toBe('application/x-www-form-urlencoded');
		});

		it('should not follow redirects', async () => {
			adapter.mockImplementation((config) =>
				respond(config, 302, [], { Location: 'http://elsewhere.test/' }),
			);

			const response = await transport.post(POLL_URL, body);

			expect(adapter.mock.calls[0][0].maxRedirects).toBe(0);
			expect(response.statusCode).toBe(302);
			expect(response.headers.location).toBe('http://elsewhere.test/');
		});

		it('should return status 0 when the request fails', async () => {
			adapter.mockRejectedValue(new Error('timeout of 30000ms exceeded'));

			const response = await transport.post(POLL_URL, body);

			expect(response.statusCode).toBe(0);
			expect(adapter).toHaveBeenCalledTimes(1);
		});
	});

	describe('downloadToFile', () => {
		const CHUNK = 64 * 1024;
		let tmpDir: string;

		beforeEach(async () => {
			tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ddi-transport-'));
		});

		afterEach(async () => {
			await fs.rm(tmpDir, { recursive: true, force: true });
		});

		it('should stream the body to disk and report progress', async () => {
			const chunks = Array.from({ length: 16 }, (_, i) => Buffer.alloc(CHUNK, i));
			adapter.mockImplementation((config) =>
				respond(config, 200, chunks, { 'Content-Length': String(16 * CHUNK) }),
			);
			const onProgress = jest.fn();
			const target = path.join(tmpDir, 'firmware.bin');

			const ok = await transport.downloadToFile(POLL_URL, target, { onProgress });

			expect(ok).toBe(true);
			const written = await fs.readFile(target);
			expect(written.length).toBe(1048576);
			expect(written[0]).toBe(0);
			expect(written[written.length - 1]).toBe(15);
			expect(onProgress).toHaveBeenCalledTimes(16);
			expect(onProgress).toHaveBeenNthCalledWith(1, 65536, 1048576);
			expect(onProgress).toHaveBeenLastCalledWith(1048576, 1048576);
		});

		it('should report an unknown size when no Content-Length is sent', async () => {
			adapter.mockImplementation((config) => respond(config, 200, [Buffer.from('abc')]));
			const onProgress = jest.fn();

			const ok = await transport.downloadToFile(POLL_URL, path.join(tmpDir, 'a.bin'), { onProgress });

			expect(ok).toBe(true);
			expect(onProgress).toHaveBeenCalledWith(3, undefined);
		});

		it('should leave an empty file when the server rejects the download', async () => {
			const target = path.join(tmpDir, 'firmware.bin');
			await fs.writeFile(target, 'previous artifact');
			adapter.mockImplementation((config) => respond(config, 404, [Buffer.from('{"detail":"Firmware file not found"}')]));

			const ok = await transport.downloadToFile(POLL_URL, target);

			expect(ok).toBe(false);
			expect((await fs.stat(target)).size).toBe(0);
		});

		it('should fail without a request when the target cannot be opened', async () => {
			const ok = await transport.downloadToFile(POLL_URL, path.join(tmpDir, 'missing', 'firmware.bin'));

			expect(ok).toBe(false);
			expect(adapter).not.toHaveBeenCalled();
		});

		it('should fail when the request fails', async () => {
			adapter.mockRejectedValue(new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND'));

			const ok = await transport.downloadToFile(POLL_URL, path.join(tmpDir, 'firmware.bin'));

			expect(ok).toBe(false);
		});

		it('should fail when the stream breaks mid-body', async () => {
			adapter.mockImplementation((config) =>
				Promise.resolve({
					data: failingStream(Buffer.alloc(CHUNK)),
					status: 200,
					statusText: 'OK',
					headers: {},
					config,
				}),
			);

			const ok = await transport.downloadToFile(POLL_URL, path.join(tmpDir, 'firmware.bin'));

			expect(ok).toBe(false);
		});
	});

	describe('close', () => {
		it('should reject further calls', async () => {
			transport.close();

			expect(transport.isClosed()).toBe(true);
			await expect(transport.get(POLL_URL)).rejects.toThrow(TransportClosedError);
			await expect(transport.post(POLL_URL, '{}')).rejects.toThrow(TransportClosedError);
			await expect(transport.downloadToFile(POLL_URL, 'x.bin')).rejects.toThrow(TransportClosedError);
			expect(adapter).not.toHaveBeenCalled();
		});

		it('should be idempotent', () => {
			transport.close();

			expect(() => transport.close()).not.toThrow();
			expect(transport.isClosed()).toBe(true);
		});
	});
});

describe('normalizeHeaders', () => {
	it('should lowercase names and keep the last value of a repeated header', () => {
		expect(normalizeHeaders({
			'Content-Type': 'text/plain',
			'Set-Cookie': ['a=1', 'b=2'],
			'X-Count': 3,
		})).toEqual({
			'content-type': 'text/plain',
			'set-cookie': 'b=2',
			'x-count': '3',
		});
	});

	it('should drop headers without a usable value', () => {
		expect(normalizeHeaders({ 'X-Empty': undefined, 'X-Null': null })).toEqual({});
	});
});
