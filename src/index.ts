/**
 * @fileoverview Main entry point for chainreq
 *
 * A fluent wrapper around undici: default headers, cookies and authentication,
 * the seven common verbs, HTTP/2 or proxy transports, WebSocket upgrade and a
 * download helper.
 *
 * @module chainreq
 */

export type { ClientConfig, ClientConfigInput, HttpMethod } from './_types.ts';
export { HttpMethods } from './_types.ts';
export { createClient, FluentHttpClient } from './client.ts';
export {
	DownloadStatusError,
	extensionFromContentType,
	fileNameFromUrl,
	resolveDownloadPath,
} from './download.ts';
export type {
	HttpResponse,
	ProxyConfig,
	RequestBody,
	Transport,
	TransportKind,
} from './http/index.ts';
export { parseProxyUrl, RedirectLimitError, UnsupportedTransportError } from './http/index.ts';
export { randomUserAgent } from './user-agent.ts';
export type { WebSocketSession } from './websocket.ts';
export { WebSocketHandshakeError } from './websocket.ts';
