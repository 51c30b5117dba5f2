export * from './errors/transport-error.js';
export { FetchTransport } from './http-transport.js';
export type { HttpTransport, FetchTransportOptions } from './http-transport.js';
