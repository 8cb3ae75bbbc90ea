/**
 * @fileoverview Fluent HTTP client
 *
 * `FluentHttpClient` owns one transport, a set of default headers, an optional
 * user agent, the request timeout and the redirect policy. Builder methods
 * mutate the instance and return it for chaining. Every verb method goes
 * through {@link FluentHttpClient.sendRequest}.
 *
 * The instance is not synchronised: finish configuring it before dispatching
 * requests concurrently.
 *
 * @example
 * ```ts
 * const client = createClient({ timeout: 10_000 })
 *   .withHeaders({ Accept: 'application/json' })
 *   .withBearerToken('test-token')
 *   .withUserAgent('random');
 *
 * const result = await client.get('https://api.example.com/items');
 * if (Result.isSuccess(result)) {
 *   console.log(await result.value.body.text());
 * }
 * ```
 *
 * @module client
 */

import type { ClientConfig, ClientConfigInput, HttpMethod } from './_types.ts';
import type { HttpResponse, RequestBody, Transport, TransportKind } from './http/client.ts';
import type { WebSocketSession } from './websocket.ts';
import { Buffer } from 'node:buffer';
import { Result } from '@praha/byethrow';
import { DEFAULT_MAX_REDIRECTIONS, RANDOM_USER_AGENT, UNLIMITED_REDIRECTIONS } from './_consts.ts';
import { appendCookies, serializeCookies } from './_cookies.ts';
import { parseClientConfig, parseTimeout } from './_types.ts';
import { DownloadStatusError, firstHeaderValue, resolveDownloadPath, writeBodyToFile } from './download.ts';
import { parseProxyUrl, proxyUrlFromEnv } from './http/proxy.ts';
import { createHttp3Transport, createProxyTransport, createStandardTransport } from './http/transport.ts';
import { logger } from './logger.ts';
import { randomUserAgent } from './user-agent.ts';
import { connectWebSocket } from './websocket.ts';

const COOKIE_HEADER = 'cookie';
const AUTHORIZATION_HEADER = 'authorization';
const USER_AGENT_HEADER = 'user-agent';

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

function selectTransport(config: ClientConfig): Transport {
	return config.enableHttp3 ? createHttp3Transport() : createStandardTransport(config.enableHttp2);
}

export class FluentHttpClient implements AsyncDisposable {
	/** The validated construction options */
	readonly config: ClientConfig;
	private transport: Transport;
	private readonly headers = new Map<string, string>();
	private userAgentValue = '';
	private timeoutMs: number;
	private maxRedirections = DEFAULT_MAX_REDIRECTIONS;

	/**
	 * @throws ValiError when the configuration is invalid
	 */
	constructor(config?: ClientConfigInput) {
		this.config = parseClientConfig(config);
		this.transport = selectTransport(this.config);
		this.timeoutMs = this.config.timeout;
	}

	/**
	 * Closes the transport's pooled connections. Later calls resolve immediately.
	 */
	async close(): Promise<void> {
		await this.transport.close();
	}

	async [Symbol.asyncDispose](): Promise<void> {
		await this.close();
	}

	/** Request timeout in milliseconds, `0` when disabled */
	get timeout(): number {
		return this.timeoutMs;
	}

	get userAgent(): string {
		return this.userAgentValue;
	}

	get transportKind(): TransportKind {
		return this.transport.kind;
	}

	/** Redirects followed before the last redirect response is returned */
	get redirectLimit(): number {
		return this.maxRedirections;
	}

	/** Copy of the default headers, keyed by lower-cased name */
	get defaultHeaders(): Record<string, string> {
		return Object.fromEntries(this.headers);
	}

	getHeader(name: string): string | undefined {
		return this.headers.get(name.toLowerCase());
	}

	/**
	 * @throws ValiError when the timeout is not an integer between 0 and 2^32 - 1
	 */
	withTimeout(timeout: number): this {
		this.timeoutMs = parseTimeout(timeout);
		return this;
	}

	/**
	 * Merges headers into the defaults sent with every request. Names are
	 * case-insensitive and the last write wins.
	 */
	withHeaders(headers: Record<string, string>): this {
		for (const [name, value] of Object.entries(headers)) {
			this.headers.set(name.toLowerCase(), value);
		}
		return this;
	}

	/**
	 * Alias of {@link FluentHttpClient.withHeaders}
	 */
	setHeaders(headers: Record<string, string>): this {
		return this.withHeaders(headers);
	}

	/**
	 * Replaces the Cookie header with the given pairs
	 */
	withCookies(cookies: Record<string, string>): this {
		this.headers.set(COOKIE_HEADER, serializeCookies(cookies));
		return this;
	}

	/**
	 * Appends pairs to the Cookie header without removing earlier ones.
	 * Repeated names accumulate.
	 */
	setCookies(cookies: Record<string, string>): this {
		const cookie = appendCookies(this.headers.get(COOKIE_HEADER), cookies);
		if (cookie != null) {
			this.headers.set(COOKIE_HEADER, cookie);
		}
		return this;
	}

	withBasicAuth(username: string, password: string): this {
		const credentials = Buffer.from(`${username}:${password}`).toString('base64');
		this.headers.set(AUTHORIZATION_HEADER, `Basic ${credentials}`);
		return this;
	}

	withBearerToken(token: string): this {
		this.headers.set(AUTHORIZATION_HEADER, `Bearer ${token}`);
		return this;
	}

	/**
	 * Sets the User-Agent sent with every request. `"random"` picks a generated
	 * desktop browser user agent.
	 */
	withUserAgent(userAgent: string): this {
		this.userAgentValue = userAgent === RANDOM_USER_AGENT ? randomUserAgent() : userAgent;
		return this;
	}

	/**
	 * Follows every redirect, lifting the default limit of 10 after which
	 * requests fail with RedirectLimitError
	 */
	followRedirects(): this {
		this.maxRedirections = UNLIMITED_REDIRECTIONS;
		return this;
	}

	/**
	 * Routes all traffic through the given proxy.
	 *
	 * A URL that is not a usable http(s) proxy is ignored: the current transport
	 * stays in place and no error is returned.
	 */
	withProxy(proxyUrl: string): this {
		const proxy = parseProxyUrl(proxyUrl);
		if (proxy == null) {
			logger.warn('Ignoring invalid proxy URL, keeping the current transport');
			return this;
		}

		const previous = this.transport;
		this.transport = createProxyTransport(proxy);
		previous.close().catch((error: unknown) => {
			logger.debug('Failed to close the previous transport:', error);
		});
		return this;
	}

	/**
	 * Applies the first proxy found in HTTP_PROXY, HTTPS_PROXY, http_proxy or https_proxy
	 */
	withProxyFromEnv(): this {
		const proxyUrl = proxyUrlFromEnv();
		return proxyUrl == null ? this : this.withProxy(proxyUrl);
	}

	private requestHeaders(): Record<string, string> {
		const headers = Object.fromEntries(this.headers);
		if (this.userAgentValue !== '') {
			headers[USER_AGENT_HEADER] = this.userAgentValue;
		}
		return headers;
	}

	/**
	 * Sends a request with the default headers, the user agent, the timeout and
	 * the redirect policy applied. Transport errors are returned unmodified.
	 */
	async sendRequest(method: HttpMethod, url: string, body?: RequestBody): Result.ResultAsync<HttpResponse, Error> {
		logger.debug(`${method} ${url}`);
		return Result.try({
			try: this.transport.send({
				method,
				url,
				headers: this.requestHeaders(),
				body,
				timeout: this.timeoutMs,
				maxRedirections: this.maxRedirections,
			}),
			catch: toError,
		});
	}

	async get(url: string): Result.ResultAsync<HttpResponse, Error> {
		return this.sendRequest('GET', url);
	}

	async post(url: string, body?: RequestBody): Result.ResultAsync<HttpResponse, Error> {
		return this.sendRequest('POST', url, body);
	}

	async put(url: string, body?: RequestBody): Result.ResultAsync<HttpResponse, Error> {
		return this.sendRequest('PUT', url, body);
	}

	async patch(url: string, body?: RequestBody): Result.ResultAsync<HttpResponse, Error> {
		return this.sendRequest('PATCH', url, body);
	}

	async delete(url: string): Result.ResultAsync<HttpResponse, Error> {
		return this.sendRequest('DELETE', url);
	}

	async head(url: string): Result.ResultAsync<HttpResponse, Error> {
		return this.sendRequest('HEAD', url);
	}

	async options(url: string): Result.ResultAsync<HttpResponse, Error> {
		return this.sendRequest('OPTIONS', url);
	}

	/**
	 * Opens a WebSocket, sending the default headers on the upgrade request
	 */
	async webSocketConnect(url: string): Result.ResultAsync<WebSocketSession, Error> {
		return connectWebSocket(url, this.requestHeaders());
	}

	/**
	 * Downloads a resource to disk.
	 *
	 * Without a save path the file is written into the working directory under
	 * the URL's file name plus the Content-Type extension. A status other than
	 * 200 fails with {@link DownloadStatusError} and writes nothing.
	 *
	 * @returns The response, its body already consumed
	 */
	async downloadImage(url: string, savePath?: string): Result.ResultAsync<HttpResponse, Error> {
		const responseResult = await this.get(url);
		if (Result.isFailure(responseResult)) {
			return responseResult;
		}

		const response = responseResult.value;
		if (response.statusCode !== 200) {
			await response.body.dump();
			return Result.fail(new DownloadStatusError(response.statusCode));
		}

		const target = resolveDownloadPath(url, firstHeaderValue(response.headers, 'content-type'), savePath);
		logger.debug(`Saving ${url} to ${target}`);

		return Result.pipe(
			Result.try({
				try: writeBodyToFile(response.body, target),
				catch: toError,
			}),
			Result.map(() => response),
		);
	}
}

/**
 * Creates a client. Absent options default to HTTP/2 on, HTTP/3 off and a
 * 30 second timeout.
 */
export function createClient(config?: ClientConfigInput): FluentHttpClient {
	return new FluentHttpClient(config);
}
