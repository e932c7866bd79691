/**
 * HTTP TRANSPORT
 * ==============
 *
 * axios-backed implementation of the Transport contract.
 *
 * - One axios instance per transport, with its own keep-alive agents.
 *   The agents are created in the constructor and destroyed by close(),
 *   so several transports can live side by side without shared state.
 * - Every response is requested as a stream. Bodies are accumulated (or
 *   written to disk) chunk by chunk.
 * - Network-level failures never reject: they come back as status 0.
 * - One attempt per call. GET and downloads follow redirects, POST does not.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import * as fs from 'fs/promises';
import * as http from 'http';
import * as https from 'https';
import { Readable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { TransportClosedError } from '../errors';
import type { ComponentLogger } from '../logging';
import {
	failedResponse,
	type DownloadOptions,
	type RequestOptions,
	type Transport,
	type TransportResponse,
} from './types';

export interface HttpTransportOptions {
	timeoutMs?: number; // Default: 30000ms (30s)
	maxRedirects?: number; // Default: 5 (GET and downloads only)
	logger?: ComponentLogger;
	/** Replaces the network layer; used to run the transport in-process */
	adapter?: AxiosAdapter;
}

export class HttpTransport implements Transport {
	private readonly client: AxiosInstance;
	private readonly httpAgent: http.Agent;
	private readonly httpsAgent: https.Agent;
	private readonly maxRedirects: number;
	private readonly logger?: ComponentLogger;
	private closed = false;

	constructor(options: HttpTransportOptions = {}) {
		this.maxRedirects = options.maxRedirects ?? 5;
		this.logger = options.logger;

		// One pooled connection per protocol
		this.httpAgent = new http.Agent({ keepAlive: true, maxSockets: 1 });
		this.httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 1 });

		this.client = axios.create({
			timeout: options.timeoutMs ?? 30000,
			httpAgent: this.httpAgent,
			httpsAgent: this.httpsAgent,
			responseType: 'stream',
			// Status codes are data here, not errors
			validateStatus: () => true,
			...(options.adapter && { adapter: options.adapter }),
		});
	}

	public async get(url: string, options: RequestOptions = {}): Promise<TransportResponse> {
		this.ensureOpen();

		try {
			const response = await this.client.request<unknown>({
				method: 'GET',
				url,
				maxRedirects: this.maxRedirects,
				signal: options.signal,
			});
			return await this.toTransportResponse(response);
		} catch (error) {
			this.logger?.warnSync('GET failed at transport level', { url, reason: describe(error) });
			return failedResponse();
		}
	}

	public async post(
		url: string,
		body: string,
		contentType: string = 'application/json',
		options: RequestOptions = {},
	): Promise<TransportResponse> {
		this.ensureOpen();

		try {
			const response = await this.client.request<unknown>({
				method: 'POST',
				url,
				data: body,
				headers: { 'Content-Type': contentType },
				maxRedirects: 0,
				// Send the body verbatim
				transformRequest: [(data: unknown) => data],
				signal: options.signal,
			});
			return await this.toTransportResponse(response);
		} catch (error) {
			this.logger?.warnSync('POST failed at transport level', { url, reason: describe(error) });
			return failedResponse();
		}
	}

	public async downloadToFile(url: string, localPath: string, options: DownloadOptions = {}): Promise<boolean> {
		this.ensureOpen();

		// Truncate the target before the request goes out
		let file: fs.FileHandle;
		try {
			file = await fs.open(localPath, 'w');
		} catch (error) {
			this.logger?.warnSync('Cannot open download target', { localPath, reason: describe(error) });
			return false;
		}

		try {
			const response = await this.client.request<unknown>({
				method: 'GET',
				url,
				maxRedirects: this.maxRedirects,
				signal: options.signal,
			});
			const stream = asReadable(response.data);

			if (response.status !== 200) {
				stream.destroy();
				this.logger?.warnSync('Download rejected by server', { url, statusCode: response.status });
				return false;
			}

			const declaredBytes = parseContentLength(normalizeHeaders(response.headers)['content-length']);
			let receivedBytes = 0;

			for await (const chunk of stream) {
				const bytes = toBuffer(chunk);
				await file.write(bytes);
				receivedBytes += bytes.length;
				options.onProgress?.(receivedBytes, declaredBytes);
			}

			this.logger?.debugSync('Download stream finished', { url, localPath, receivedBytes });
			return true;
		} catch (error) {
			this.logger?.warnSync('Download failed', { url, localPath, reason: describe(error) });
			return false;
		} finally {
			await file.close();
		}
	}

	public close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		this.httpAgent.destroy();
		this.httpsAgent.destroy();
	}

	public isClosed(): boolean {
		return this.closed;
	}

	private ensureOpen(): void {
		if (this.closed) {
			throw new TransportClosedError();
		}
	}

	private async toTransportResponse(response: AxiosResponse<unknown>): Promise<TransportResponse> {
		const body = await collectBody(asReadable(response.data));
		return {
			statusCode: response.status,
			body,
			headers: normalizeHeaders(response.headers),
		};
	}
}

// ============================================================================
// Helpers
// ============================================================================

function asReadable(data: unknown): Readable {
	if (data instanceof Readable) {
		return data;
	}
	throw new TypeError('Expected a streamed response body');
}

/**
 * Accumulate a streamed body into a string as chunks arrive
 */
function collectBody(stream: Readable): Promise<string> {
	return new Promise((resolve, reject) => {
		const decoder = new StringDecoder('utf8');
		let body = '';

		stream.on('data', (chunk: unknown) => {
			body += decoder.write(toBuffer(chunk));
		});
		stream.once('end', () => resolve(body + decoder.end()));
		stream.once('error', reject);
	});
}

function toBuffer(chunk: unknown): Buffer {
	if (Buffer.isBuffer(chunk)) {
		return chunk;
	}
	if (chunk instanceof Uint8Array) {
		return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
	}
	return Buffer.from(String(chunk), 'utf8');
}

/**
 * Flatten axios response headers into name → value. Multi-valued headers
 * keep their last value.
 */
export function normalizeHeaders(headers: object): Record<string, string> {
	const normalized: Record<string, string> = {};
	const entries: [string, unknown][] = Object.entries(headers);

	for (const [name, value] of entries) {
		const last = Array.isArray(value) ? value[value.length - 1] : value;
		if (typeof last === 'string' || typeof last === 'number' || typeof last === 'boolean') {
			normalized[name.toLowerCase()] = String(last);
		}
	}

	return normalized;
}

function parseContentLength(value: string | undefined): number | undefined {
	if (value === undefined || !/^\d+$/.test(value)) {
		return undefined;
	}
	return Number(value);
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
