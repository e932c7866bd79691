/**
 * Transport contract
 *
 * Plain HTTP plumbing used by the update orchestrator. Knows nothing about
 * the deployment protocol.
 */

/** Status code reserved for "no response" (DNS, connect, TLS, timeout, abort) */
export const TRANSPORT_FAILURE_STATUS = 0;

export interface TransportResponse {
	statusCode: number;
	body: string;
	/** Header name → value; duplicates collapse last-write-wins */
	headers: Record<string, string>;
}

export interface RequestOptions {
	signal?: AbortSignal;
}

export interface DownloadOptions extends RequestOptions {
	/** Called after each chunk is handed to the file */
	onProgress?: (receivedBytes: number, declaredBytes?: number) => void;
}

export interface Transport {
	/** GET, following redirects */
	get(url: string, options?: RequestOptions): Promise<TransportResponse>;
	/** POST with a single Content-Type header; redirects are not followed */
	post(url: string, body: string, contentType?: string, options?: RequestOptions): Promise<TransportResponse>;
	/** Stream a 200 response body into localPath (truncating it first) */
	downloadToFile(url: string, localPath: string, options?: DownloadOptions): Promise<boolean>;
	/** Release pooled connections; the transport is unusable afterwards */
	close(): void;
}

export function failedResponse(): TransportResponse {
	return { statusCode: TRANSPORT_FAILURE_STATUS, body: '', headers: {} };
}
