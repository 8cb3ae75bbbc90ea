/**
 * @fileoverview Transport interface definitions for the fluent client
 *
 * This module describes the pluggable transport layer the client dispatches
 * through. A transport is selected once, when the client is built or a proxy
 * is applied, and is never switched at request time.
 *
 * @module http/client
 */

import type { Dispatcher } from 'undici';
import type { HttpMethod } from '../_types.ts';

/**
 * Request body accepted by the verb methods
 */
export type RequestBody = string | Uint8Array;

/**
 * A fully assembled request handed to a transport
 */
export type TransportRequest = {
	readonly method: HttpMethod;
	readonly url: string;
	readonly headers: Record<string, string>;
	readonly body?: RequestBody;
	/** Whole-exchange timeout in milliseconds, `0` disables it */
	readonly timeout: number;
	/** Redirects followed before the last redirect response is returned */
	readonly maxRedirections: number;
};

/**
 * Response returned by every verb method
 *
 * The body is the transport's readable stream. Consume it, or call
 * `body.dump()`, so the underlying connection returns to the pool.
 */
export type HttpResponse = {
	readonly url: string;
	readonly method: HttpMethod;
	readonly statusCode: number;
	readonly headers: Dispatcher.ResponseData['headers'];
	readonly body: Dispatcher.ResponseData['body'];
};

/**
 * Transport variants, chosen once per client
 */
export type TransportKind = 'standard' | 'http3' | 'proxy';

/**
 * Transport strategy that turns a request into a response
 */
export type Transport = {
	readonly kind: TransportKind;

	/**
	 * Executes the request. Rejects with the transport's own error, unmodified.
	 */
	send: (request: TransportRequest) => Promise<HttpResponse>;

	/**
	 * Releases pooled connections held by the transport
	 */
	close: () => Promise<void>;
};

/**
 * Configuration for HTTP/HTTPS proxy connections
 */
export type ProxyConfig = {
	/**
	 * Proxy server protocol (http or https)
	 */
	readonly protocol: 'http' | 'https';

	/**
	 * Proxy server hostname or IP address
	 */
	readonly hostname: string;

	/**
	 * Proxy server port number
	 */
	readonly port: number;

	/**
	 * Optional username for proxy authentication
	 */
	readonly username?: string;

	/**
	 * Optional password for proxy authentication
	 */
	readonly password?: string;
};

/**
 * Standard proxy environment variable names, in lookup order
 */
export const PROXY_ENV_VARS = [
	'HTTP_PROXY',
	'HTTPS_PROXY',
	'http_proxy',
	'https_proxy',
] as const;

/**
 * Type for proxy environment variable names
 */
export type ProxyEnvVar = typeof PROXY_ENV_VARS[number];
