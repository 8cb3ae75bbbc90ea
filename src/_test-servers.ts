/**
 * In-process servers used by the test suites: a plain HTTP server, a TLS server
 * speaking HTTP/2 and HTTP/1.1, an HTTP CONNECT proxy and a WebSocket server,
 * all bound to 127.0.0.1 on a free port.
 */

import type { IncomingMessage, RequestListener, Server } from 'node:http';
import type { Http2SecureServer, ServerHttp2Session } from 'node:http2';
import type { AddressInfo, Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { once } from 'node:events';
import { readFileSync } from 'node:fs';
import { createServer } from 'node:http';
import { createSecureServer } from 'node:http2';
import { connect } from 'node:net';
import { WebSocketServer } from 'ws';

export type TestServer = {
	url: string;
	close: () => Promise<void>;
};

function portOf(server: Server | Http2SecureServer | WebSocketServer): number {
	const address: AddressInfo | string | null = server.address();
	if (address == null || typeof address === 'string') {
		throw new Error('Server is not listening on a TCP port');
	}
	return address.port;
}

async function closeServer(server: Server): Promise<void> {
	server.closeAllConnections();
	return new Promise((resolve, reject) => {
		server.close(error => error != null ? reject(error) : resolve());
	});
}

export async function startHttpServer(handler: RequestListener): Promise<TestServer & { port: number }> {
	const server = createServer(handler);
	server.listen(0, '127.0.0.1');
	await once(server, 'listening');
	const port = portOf(server);

	return {
		port,
		url: `http://127.0.0.1:${port}`,
		close: async () => closeServer(server),
	};
}

/**
 * Starts a TLS server for localhost that negotiates HTTP/2 through ALPN and
 * still accepts HTTP/1.1. Every response body is the protocol version the
 * request arrived with, `2.0` or `1.1`. The certificate is self-signed, so
 * clients need certificate checks turned off.
 */
export async function startTlsHttp2Server(): Promise<TestServer> {
	const server = createSecureServer({
		key: readFileSync(new URL('./__fixtures__/tls/localhost-key.pem', import.meta.url)),
		cert: readFileSync(new URL('./__fixtures__/tls/localhost-cert.pem', import.meta.url)),
		allowHTTP1: true,
	}, (request, response) => {
		response.end(request.httpVersion);
	});
	const sockets = new Set<Socket>();
	const sessions = new Set<ServerHttp2Session>();
	server.on('connection', (socket: Socket) => {
		sockets.add(socket);
		socket.on('close', () => sockets.delete(socket));
	});
	server.on('session', (session) => {
		sessions.add(session);
		session.on('close', () => sessions.delete(session));
	});

	server.listen(0, '127.0.0.1');
	await once(server, 'listening');

	return {
		url: `https://127.0.0.1:${portOf(server)}`,
		close: async () => {
			for (const session of sessions) {
				session.destroy();
			}
			for (const socket of sockets) {
				socket.destroy();
			}
			return new Promise((resolve, reject) => {
				server.close(error => error != null ? reject(error) : resolve());
			});
		},
	};
}

/**
 * Starts an HTTP proxy that only accepts CONNECT tunnels and records their targets
 */
export async function startConnectProxy(): Promise<TestServer & { targets: string[] }> {
	const targets: string[] = [];
	const tunnels = new Set<Duplex | Socket>();
	const server = createServer((_request, response) => {
		response.statusCode = 405;
		response.end();
	});

	server.on('connect', (request: IncomingMessage, clientSocket: Duplex, head: Buffer) => {
		const target = request.url ?? '';
		targets.push(target);
		const separator = target.lastIndexOf(':');
		const upstream = connect(Number(target.slice(separator + 1)), target.slice(0, separator), () => {
			clientSocket.write('HTTP/1.1 200 Connection Established\r\n\r\n');
			upstream.write(head);
			upstream.pipe(clientSocket);
			clientSocket.pipe(upstream);
		});
		tunnels.add(clientSocket);
		tunnels.add(upstream);
		upstream.on('error', () => clientSocket.destroy());
		clientSocket.on('error', () => upstream.destroy());
	});

	server.listen(0, '127.0.0.1');
	await once(server, 'listening');

	return {
		targets,
		url: `http://127.0.0.1:${portOf(server)}`,
		close: async () => {
			for (const socket of tunnels) {
				socket.destroy();
			}
			await closeServer(server);
		},
	};
}

/**
 * Starts a WebSocket server that echoes text messages with an `echo:` prefix
 * and records the headers of every upgrade request
 */
export async function startEchoWebSocketServer(): Promise<TestServer & { upgradeHeaders: IncomingMessage['headers'][] }> {
	const upgradeHeaders: IncomingMessage['headers'][] = [];
	const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });

	server.on('connection', (socket, request) => {
		upgradeHeaders.push(request.headers);
		socket.on('message', (data) => {
			socket.send(`echo:${String(data)}`);
		});
	});
	await once(server, 'listening');

	return {
		upgradeHeaders,
		url: `ws://127.0.0.1:${portOf(server)}`,
		close: async () => {
			for (const client of server.clients) {
				client.terminate();
			}
			return new Promise((resolve, reject) => {
				server.close(error => error != null ? reject(error) : resolve());
			});
		},
	};
}
