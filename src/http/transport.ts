/**
 * @fileoverview Transport variants backed by undici
 *
 * - `standard`: an undici Agent, attempting HTTP/2 through ALPN when enabled
 * - `http3`: selected by `enableHttp3`; Node.js ships no QUIC client, so every
 *   dispatch fails with {@link UnsupportedTransportError}
 * - `proxy`: an undici ProxyAgent tunnelling all traffic through one proxy
 *
 * Redirects are followed by undici up to the request's limit; a chain longer
 * than the limit fails with {@link RedirectLimitError}.
 *
 * @module http/transport
 */

import type { Dispatcher } from 'undici';
import type { ProxyConfig, Transport, TransportRequest } from './client.ts';
import { Agent, ProxyAgent, request } from 'undici';
import { UNLIMITED_REDIRECTIONS } from '../_consts.ts';
import { logger } from '../logger.ts';
import { proxyAuthorization, proxyOrigin } from './proxy.ts';

/**
 * Raised for every request dispatched through a transport the runtime cannot provide
 */
export class UnsupportedTransportError extends Error {
	override readonly name = 'UnsupportedTransportError';

	constructor(readonly protocol: string) {
		super(`${protocol} transport is not available in this runtime`);
	}
}

/**
 * Raised when a redirect chain is longer than the client's redirect limit
 */
export class RedirectLimitError extends Error {
	override readonly name = 'RedirectLimitError';

	constructor(readonly limit: number, readonly url: string) {
		super(`stopped after ${limit} redirects`);
	}
}

// Statuses undici follows when redirects are enabled
const REDIRECT_STATUS_CODES: ReadonlySet<number> = new Set([300, 301, 302, 303, 307, 308]);

/**
 * A redirect that reaches the caller while redirects are enabled is one undici
 * stopped following because the limit ran out
 */
function isExhaustedRedirect(statusCode: number, headers: Dispatcher.ResponseData['headers'], maxRedirections: number): boolean {
	return maxRedirections > 0
		&& maxRedirections < UNLIMITED_REDIRECTIONS
		&& REDIRECT_STATUS_CODES.has(statusCode)
		&& headers.location != null;
}

function closeOnce(dispatcher: Dispatcher): Transport['close'] {
	let closing: Promise<void> | undefined;
	return async () => {
		closing ??= dispatcher.close();
		return closing;
	};
}

function dispatchThrough(dispatcher: Dispatcher): Transport['send'] {
	return async (req: TransportRequest) => {
		const response = await request(req.url, {
			dispatcher,
			method: req.method,
			headers: req.headers,
			body: req.body ?? null,
			signal: req.timeout > 0 ? AbortSignal.timeout(req.timeout) : null,
			maxRedirections: req.maxRedirections,
		});

		if (isExhaustedRedirect(response.statusCode, response.headers, req.maxRedirections)) {
			await response.body.dump();
			throw new RedirectLimitError(req.maxRedirections, req.url);
		}

		return {
			url: req.url,
			method: req.method,
			statusCode: response.statusCode,
			headers: response.headers,
			body: response.body,
		};
	};
}

/**
 * Creates the default transport
 * @param enableHttp2 - Attempt HTTP/2 on TLS connections, HTTP/1.1 otherwise
 */
export function createStandardTransport(enableHttp2: boolean): Transport {
	const agent = new Agent({ allowH2: enableHttp2 });
	logger.debug(`Using standard transport (HTTP/2 ${enableHttp2 ? 'enabled' : 'disabled'})`);

	return {
		kind: 'standard',
		send: dispatchThrough(agent),
		close: closeOnce(agent),
	};
}

/**
 * Creates the HTTP/3 transport
 */
export function createHttp3Transport(): Transport {
	logger.debug('Using HTTP/3 transport');

	return {
		kind: 'http3',
		send: async () => Promise.reject(new UnsupportedTransportError('HTTP/3')),
		close: async () => Promise.resolve(),
	};
}

/**
 * Creates a transport routing every request through the given proxy
 */
export function createProxyTransport(proxy: ProxyConfig): Transport {
	const agent = new ProxyAgent({
		uri: proxyOrigin(proxy),
		token: proxyAuthorization(proxy),
	});
	logger.debug(`Using proxy transport via ${proxy.hostname}:${proxy.port}`);

	return {
		kind: 'proxy',
		send: dispatchThrough(agent),
		close: closeOnce(agent),
	};
}

if (import.meta.vitest != null) {
	describe('createHttp3Transport', () => {
		it('fails every request with UnsupportedTransportError', async () => {
			const transport = createHttp3Transport();
			await expect(transport.send({
				method: 'GET',
				url: 'https://example.com/',
				headers: {},
				timeout: 1000,
				maxRedirections: 0,
			})).rejects.toThrow('HTTP/3 transport is not available in this runtime');
		});
	});

	describe('isExhaustedRedirect', () => {
		it('flags a followable redirect returned under a finite limit', () => {
			expect(isExhaustedRedirect(302, { location: '/next' }, 10)).toBe(true);
			expect(isExhaustedRedirect(308, { location: '/next' }, 1)).toBe(true);
		});

		it('ignores responses undici would not follow', () => {
			expect(isExhaustedRedirect(304, { location: '/next' }, 10)).toBe(false);
			expect(isExhaustedRedirect(302, {}, 10)).toBe(false);
			expect(isExhaustedRedirect(200, {}, 10)).toBe(false);
		});

		it('ignores redirects when following is off or unlimited', () => {
			expect(isExhaustedRedirect(302, { location: '/next' }, 0)).toBe(false);
			expect(isExhaustedRedirect(302, { location: '/next' }, Number.MAX_SAFE_INTEGER)).toBe(false);
		});
	});

	describe('close', () => {
		it('can be called repeatedly on every transport', async () => {
			const transports = [
				createStandardTransport(true),
				createProxyTransport({ protocol: 'http', hostname: '127.0.0.1', port: 3128 }),
				createHttp3Transport(),
			];
			for (const transport of transports) {
				await transport.close();
				await expect(transport.close()).resolves.toBeUndefined();
			}
		});
	});

	describe('transport kinds', () => {
		it('labels each variant', async () => {
			const standard = createStandardTransport(true);
			const proxy = createProxyTransport({ protocol: 'http', hostname: '127.0.0.1', port: 3128 });
			expect(standard.kind).toBe('standard');
			expect(proxy.kind).toBe('proxy');
			expect(createHttp3Transport().kind).toBe('http3');
			await standard.close();
			await proxy.close();
		});
	});
}
