import type { IncomingMessage, ServerResponse } from 'node:http';
import type { HttpResponse } from './http/client.ts';
import type { TestServer } from './_test-servers.ts';
import { Buffer } from 'node:buffer';
import { once } from 'node:events';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import { createFixture } from 'fs-fixture';
import * as v from 'valibot';
import { startConnectProxy, startEchoWebSocketServer, startHttpServer, startTlsHttp2Server } from './_test-servers.ts';
import { createClient, FluentHttpClient } from './client.ts';
import { DownloadStatusError } from './download.ts';
import { RedirectLimitError, UnsupportedTransportError } from './http/transport.ts';
import { WebSocketHandshakeError } from './websocket.ts';

const echoSchema = v.object({
	method: v.string(),
	url: v.string(),
	headers: v.record(v.string(), v.union([v.string(), v.array(v.string())])),
	body: v.string(),
});

type Echo = v.InferOutput<typeof echoSchema>;

async function readEcho(response: HttpResponse): Promise<Echo> {
	return v.parse(echoSchema, await response.body.json());
}

async function unwrap<T>(pending: Result.ResultAsync<T, Error>): Promise<T> {
	const result = await pending;
	if (Result.isFailure(result)) {
		throw result.error;
	}
	return result.value;
}

async function unwrapError<T>(pending: Result.ResultAsync<T, Error>): Promise<Error> {
	const result = await pending;
	if (Result.isSuccess(result)) {
		throw new Error('Expected the operation to fail');
	}
	return result.error;
}

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A]);

function route(request: IncomingMessage, response: ServerResponse): void {
	const path = request.url ?? '/';

	if (path.startsWith('/hop/')) {
		const remaining = Number(path.slice('/hop/'.length));
		if (remaining > 0) {
			response.writeHead(302, { location: `/hop/${remaining - 1}` });
			response.end();
			return;
		}
		response.end('done');
		return;
	}

	if (path === '/slow') {
		const timer = setTimeout(() => response.end('late'), 500);
		response.on('close', () => clearTimeout(timer));
		return;
	}

	if (path === '/y.png') {
		response.writeHead(200, { 'content-type': 'image/png' });
		response.end(PNG_BYTES);
		return;
	}

	if (path === '/photo') {
		response.end('raw-bytes');
		return;
	}

	if (path === '/missing.png') {
		response.writeHead(404, { 'content-type': 'text/plain' });
		response.end('not found');
		return;
	}

	const chunks: Buffer[] = [];
	request.on('data', (chunk: Buffer) => chunks.push(chunk));
	request.on('end', () => {
		response.writeHead(200, {
			'content-type': 'application/json',
			'x-method': request.method ?? '',
		});
		response.end(JSON.stringify({
			method: request.method,
			url: path,
			headers: request.headers,
			body: Buffer.concat(chunks).toString('utf8'),
		}));
	});
}

describe('FluentHttpClient', () => {
	let server: TestServer;
	let client: FluentHttpClient;

	beforeEach(async () => {
		server = await startHttpServer(route);
		client = createClient();
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await client.close();
		await server.close();
	});

	describe('construction', () => {
		it('defaults to a 30 second timeout with HTTP/2 on and HTTP/3 off', () => {
			expect(client.config).toEqual({ enableHttp2: true, enableHttp3: false, timeout: 30_000 });
			expect(client.timeout).toBe(30_000);
			expect(client.transportKind).toBe('standard');
			expect(client.redirectLimit).toBe(10);
			expect(client.defaultHeaders).toEqual({});
			expect(client.userAgent).toBe('');
		});

		it('selects the HTTP/3 transport when enabled', async () => {
			const http3 = new FluentHttpClient({ enableHttp3: true });
			expect(http3.transportKind).toBe('http3');

			const error = await unwrapError(http3.get(`${server.url}/echo`));
			expect(error).toBeInstanceOf(UnsupportedTransportError);
			await http3.close();
		});

		it.each([
			[true, '2.0'],
			[false, '1.1'],
		] as const)('negotiates the protocol over TLS with enableHttp2 %s', async (enableHttp2, httpVersion) => {
			const tlsServer = await startTlsHttp2Server();
			vi.stubEnv('NODE_TLS_REJECT_UNAUTHORIZED', '0');
			const tlsClient = createClient({ enableHttp2, timeout: 5_000 });
			try {
				const response = await unwrap(tlsClient.get(`${tlsServer.url}/version`));
				expect(await response.body.text()).toBe(httpVersion);
			}
			finally {
				vi.unstubAllEnvs();
				await tlsClient.close();
				await tlsServer.close();
			}
		});

		it('rejects a timeout no timer can hold', () => {
			expect(() => createClient({ timeout: 5_000_000_000 })).toThrow('Timeout must not exceed 4294967295 milliseconds');
		});
	});

	describe('close', () => {
		it('can be called more than once on a standard client', async () => {
			await client.close();
			await expect(client.close()).resolves.toBeUndefined();
		});

		it('can be called more than once on a proxy client', async () => {
			client.withProxy('http://127.0.0.1:3128');
			await client.close();
			await expect(client.close()).resolves.toBeUndefined();
		});

		it('can follow an explicit close with await using', async () => {
			await using disposable = createClient();
			await disposable.close();
		});
	});

	describe('builders', () => {
		it('returns the same instance from every builder', () => {
			const chained = client
				.withTimeout(1_000)
				.withHeaders({ a: '1' })
				.setHeaders({ b: '2' })
				.withCookies({ c: '3' })
				.setCookies({ d: '4' })
				.withBasicAuth('user', 'pass')
				.withBearerToken('test-token')
				.withUserAgent('agent')
				.followRedirects()
				.withProxy('not a url');
			expect(chained).toBe(client);
		});

		it('merges headers case-insensitively with the last write winning', () => {
			client.withHeaders({ 'X-Trace': 'first', 'Accept': 'text/plain' }).setHeaders({ 'x-trace': 'second' });
			expect(client.getHeader('X-Trace')).toBe('second');
			expect(client.defaultHeaders).toEqual({ 'x-trace': 'second', 'accept': 'text/plain' });
		});

		it('replaces the cookie header with withCookies', () => {
			client.withCookies({ a: '1', b: '2' }).withCookies({ c: '3' });
			expect(client.getHeader('Cookie')).toBe('c=3');
		});

		it('appends to the cookie header with setCookies', () => {
			client.setCookies({ a: '1' }).setCookies({ b: '2' });
			expect(client.getHeader('Cookie')).toBe('a=1; b=2');
		});

		it('accumulates repeated cookie names with setCookies', () => {
			client.setCookies({ session: 'old' }).setCookies({ session: 'new' });
			expect(client.getHeader('Cookie')).toBe('session=old; session=new');
		});

		it('encodes basic credentials', () => {
			client.withBasicAuth('user', 'pass');
			expect(client.getHeader('Authorization')).toBe(`Basic ${Buffer.from('user:pass').toString('base64')}`);
			expect(client.getHeader('Authorization')).toBe('Basic dXNlcjpwYXNz');
		});

		it('sets a bearer token, replacing basic credentials', () => {
			client.withBasicAuth('user', 'pass').withBearerToken('test-token');
			expect(client.getHeader('Authorization')).toBe('Bearer test-token');
		});

		it('generates a browser user agent for the random sentinel', () => {
			client.withUserAgent('random');
			expect(client.userAgent).toMatch(/^Mozilla\/5\.0 \(/);
		});

		it('replaces the timeout', () => {
			expect(client.withTimeout(1_500).timeout).toBe(1_500);
			expect(client.withTimeout(0).timeout).toBe(0);
		});

		it('validates the timeout like the constructor', () => {
			expect(() => client.withTimeout(1500.5)).toThrow('Timeout must be an integer number of milliseconds');
			expect(() => client.withTimeout(-1)).toThrow('Timeout must not be negative');
			expect(() => client.withTimeout(5_000_000_000)).toThrow('Timeout must not exceed 4294967295 milliseconds');
			expect(() => client.withTimeout(Number.NaN)).toThrow(v.ValiError);
			expect(client.timeout).toBe(30_000);
		});

		it('lifts the redirect limit', () => {
			expect(client.followRedirects().redirectLimit).toBe(Number.MAX_SAFE_INTEGER);
		});
	});

	describe('request dispatch', () => {
		it('sends default headers, cookies and auth with each request', async () => {
			client
				.withHeaders({ 'X-Trace': 'first' })
				.setHeaders({ 'X-Trace': 'second', 'X-Client': 'tests' })
				.withCookies({ a: '1' })
				.setCookies({ b: '2' })
				.withBearerToken('test-token');

			const echo = await readEcho(await unwrap(client.get(`${server.url}/echo`)));
			expect(echo.headers['x-trace']).toBe('second');
			expect(echo.headers['x-client']).toBe('tests');
			expect(echo.headers.cookie).toBe('a=1; b=2');
			expect(echo.headers.authorization).toBe('Bearer test-token');
		});

		it('lets the configured user agent override a default header', async () => {
			client.withHeaders({ 'User-Agent': 'from-headers' }).withUserAgent('test-agent/1.0');
			const echo = await readEcho(await unwrap(client.get(`${server.url}/echo`)));
			expect(echo.headers['user-agent']).toBe('test-agent/1.0');
		});

		it.each([
			['post', 'POST'],
			['put', 'PUT'],
			['patch', 'PATCH'],
		] as const)('%s sends its body', async (verb, method) => {
			const response = await unwrap(client[verb](`${server.url}/echo`, '{"name":"widget"}'));
			const echo = await readEcho(response);
			expect(echo.method).toBe(method);
			expect(echo.body).toBe('{"name":"widget"}');
		});

		it('sends binary bodies unchanged', async () => {
			const response = await unwrap(client.post(`${server.url}/echo`, new Uint8Array([104, 105])));
			expect((await readEcho(response)).body).toBe('hi');
		});

		it.each([
			['get', 'GET'],
			['delete', 'DELETE'],
			['options', 'OPTIONS'],
		] as const)('%s sends no body', async (verb, method) => {
			const echo = await readEcho(await unwrap(client[verb](`${server.url}/echo`)));
			expect(echo.method).toBe(method);
			expect(echo.body).toBe('');
		});

		it('sends HEAD requests', async () => {
			const response = await unwrap(client.head(`${server.url}/echo`));
			expect(response.statusCode).toBe(200);
			expect(response.headers['x-method']).toBe('HEAD');
			await response.body.dump();
		});

		it('reports the method and url on the response', async () => {
			const response = await unwrap(client.delete(`${server.url}/echo`));
			expect(response.method).toBe('DELETE');
			expect(response.url).toBe(`${server.url}/echo`);
			await response.body.dump();
		});

		it('follows up to 10 redirects by default', async () => {
			const followed = await unwrap(client.get(`${server.url}/hop/10`));
			expect(followed.statusCode).toBe(200);
			expect(await followed.body.text()).toBe('done');
		});

		it('fails once a redirect chain exceeds the default limit', async () => {
			const error = await unwrapError(client.get(`${server.url}/hop/11`));
			expect(error).toBeInstanceOf(RedirectLimitError);
			expect(error.message).toBe('stopped after 10 redirects');
		});

		it('follows every redirect after followRedirects', async () => {
			const response = await unwrap(client.followRedirects().get(`${server.url}/hop/12`));
			expect(response.statusCode).toBe(200);
			expect(await response.body.text()).toBe('done');
		});

		it('fails when the timeout elapses', async () => {
			const result = await client.withTimeout(50).get(`${server.url}/slow`);
			expect(Result.isFailure(result)).toBe(true);
		});

		it('returns the transport error for a refused connection', async () => {
			const closed = await startHttpServer(route);
			await closed.close();

			const result = await client.get(closed.url);
			expect(Result.isFailure(result)).toBe(true);
		});

		it('returns an error for a malformed url', async () => {
			const result = await client.get('not a url');
			expect(Result.isFailure(result)).toBe(true);
		});
	});

	describe('proxy', () => {
		it('ignores an invalid proxy url and keeps the transport', async () => {
			expect(client.withProxy('not a url')).toBe(client);
			expect(client.transportKind).toBe('standard');

			const response = await unwrap(client.get(`${server.url}/echo`));
			expect(response.statusCode).toBe(200);
			await response.body.dump();
		});

		it('routes requests through a valid proxy', async () => {
			const proxy = await startConnectProxy();
			try {
				client.withProxy(proxy.url).withHeaders({ 'X-Via': 'proxy-test' });
				expect(client.transportKind).toBe('proxy');

				const echo = await readEcho(await unwrap(client.get(`${server.url}/echo`)));
				expect(echo.headers['x-via']).toBe('proxy-test');
				expect(proxy.targets).toEqual([new URL(server.url).host]);
			}
			finally {
				await client.close();
				await proxy.close();
			}
		});

		it('reads the proxy from the environment', async () => {
			const proxy = await startConnectProxy();
			vi.stubEnv('HTTP_PROXY', proxy.url);
			try {
				expect(client.withProxyFromEnv().transportKind).toBe('proxy');
			}
			finally {
				vi.unstubAllEnvs();
				await client.close();
				await proxy.close();
			}
		});
	});

	describe('downloadImage', () => {
		it('writes the body next to the working directory with the content type extension', async () => {
			await using fixture = await createFixture();
			vi.spyOn(process, 'cwd').mockReturnValue(fixture.getPath());

			const response = await unwrap(client.downloadImage(`${server.url}/y.png`));
			expect(response.statusCode).toBe(200);
			expect(await readdir(fixture.getPath())).toEqual(['y.png.png']);
			expect(await readFile(join(fixture.getPath(), 'y.png.png'))).toEqual(PNG_BYTES);
		});

		it('uses .jpg when the response has no content type', async () => {
			await using fixture = await createFixture();
			vi.spyOn(process, 'cwd').mockReturnValue(fixture.getPath());

			await unwrap(client.downloadImage(`${server.url}/photo`));
			expect(await readdir(fixture.getPath())).toEqual(['photo.jpg']);
		});

		it('writes exactly to the given save path, truncating it', async () => {
			await using fixture = await createFixture({ 'out.bin': 'previous content that is longer' });
			const target = join(fixture.getPath(), 'out.bin');

			await unwrap(client.downloadImage(`${server.url}/y.png`, target));
			expect(await readFile(target)).toEqual(PNG_BYTES);
		});

		it('fails on a non-200 status without writing a file', async () => {
			await using fixture = await createFixture();
			vi.spyOn(process, 'cwd').mockReturnValue(fixture.getPath());

			const error = await unwrapError(client.downloadImage(`${server.url}/missing.png`));
			expect(error).toBeInstanceOf(DownloadStatusError);
			expect(error.message).toBe('failed to download image: status code 404');
			expect(await readdir(fixture.getPath())).toEqual([]);
		});

		it('returns the filesystem error when the target cannot be created', async () => {
			await using fixture = await createFixture();
			const error = await unwrapError(client.downloadImage(`${server.url}/y.png`, join(fixture.getPath(), 'missing-dir', 'y.png')));
			expect(error.message).toContain('ENOENT');
		});
	});

	describe('webSocketConnect', () => {
		it('opens a connection with the default headers on the upgrade request', async () => {
			const wsServer = await startEchoWebSocketServer();
			try {
				client.withHeaders({ 'X-Token': 'abc' }).withCookies({ session: 'test-session' }).withUserAgent('ws-agent');
				const { connection, response } = await unwrap(client.webSocketConnect(wsServer.url));
				expect(response.statusCode).toBe(101);
				expect(wsServer.upgradeHeaders[0]?.['x-token']).toBe('abc');
				expect(wsServer.upgradeHeaders[0]?.cookie).toBe('session=test-session');
				expect(wsServer.upgradeHeaders[0]?.['user-agent']).toBe('ws-agent');

				connection.send('ping');
				const [message] = await once(connection, 'message');
				expect(String(message)).toBe('echo:ping');
				connection.close();
			}
			finally {
				await wsServer.close();
			}
		});

		it('fails with the status code when the upgrade is refused', async () => {
			const refusing = await startHttpServer((_request, response) => {
				response.writeHead(403);
				response.end();
			});
			try {
				const error = await unwrapError(client.webSocketConnect(refusing.url.replace('http://', 'ws://')));
				expect(error).toBeInstanceOf(WebSocketHandshakeError);
				expect(error).toHaveProperty('statusCode', 403);
			}
			finally {
				await refusing.close();
			}
		});

		it('returns the network error when nothing listens', async () => {
			const closed = await startHttpServer(route);
			await closed.close();

			const result = await client.webSocketConnect(closed.url.replace('http://', 'ws://'));
			expect(Result.isFailure(result)).toBe(true);
		});
	});
});
