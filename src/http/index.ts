/**
 * @fileoverview Transport layer of the fluent client
 *
 * @module http
 */

export type {
	HttpResponse,
	ProxyConfig,
	RequestBody,
	Transport,
	TransportKind,
} from './client.ts';
export { parseProxyUrl } from './proxy.ts';
export { RedirectLimitError, UnsupportedTransportError } from './transport.ts';
