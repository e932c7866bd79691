export * from './types';
export { HttpTransport, normalizeHeaders } from './http-transport';
export type { HttpTransportOptions } from './http-transport';
