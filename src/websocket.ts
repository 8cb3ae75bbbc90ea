/**
 * @fileoverview WebSocket upgrade with the client's default headers
 *
 * Keepalive, reconnection and message handling stay with the caller once the
 * connection is returned.
 *
 * @module websocket
 */

import type { IncomingMessage } from 'node:http';
import { Result } from '@praha/byethrow';
import WebSocket from 'ws';
import { WEBSOCKET_HANDSHAKE_TIMEOUT_MS } from './_consts.ts';
import { logger } from './logger.ts';

/**
 * Raised when the server answers the upgrade request with anything but 101
 */
export class WebSocketHandshakeError extends Error {
	override readonly name = 'WebSocketHandshakeError';

	constructor(readonly statusCode: number) {
		super(`websocket: bad handshake (status code ${statusCode})`);
	}
}

/**
 * An established connection and the handshake response that opened it
 */
export type WebSocketSession = {
	connection: WebSocket;
	response: IncomingMessage;
};

function dial(url: string, headers: Record<string, string>): Promise<WebSocketSession> {
	return new Promise((resolve, reject) => {
		const connection = new WebSocket(url, {
			headers,
			handshakeTimeout: WEBSOCKET_HANDSHAKE_TIMEOUT_MS,
		});
		let handshake: IncomingMessage | undefined;
		let settled = false;

		const onUpgrade = (response: IncomingMessage): void => {
			handshake = response;
		};

		const onOpen = (): void => {
			settled = true;
			connection.off('upgrade', onUpgrade);
			connection.off('unexpected-response', onUnexpectedResponse);
			connection.off('error', onError);
			if (handshake === undefined) {
				reject(new Error('websocket: connection opened without a handshake response'));
				return;
			}
			resolve({ connection, response: handshake });
		};

		const onUnexpectedResponse = (_request: unknown, response: IncomingMessage): void => {
			settled = true;
			response.resume();
			reject(new WebSocketHandshakeError(response.statusCode ?? 0));
			// Aborting the handshake emits one more error; onError stays attached to absorb it
			connection.terminate();
		};

		function onError(error: Error): void {
			if (settled) {
				logger.debug(`WebSocket to ${url} closed after a failed handshake: ${error.message}`);
				return;
			}
			settled = true;
			reject(error);
		}

		connection.on('upgrade', onUpgrade);
		connection.once('open', onOpen);
		connection.once('unexpected-response', onUnexpectedResponse);
		connection.on('error', onError);
	});
}

/**
 * Performs the HTTP to WebSocket handshake
 * @param url - `ws:` or `wss:` URL
 * @param headers - Headers sent with the upgrade request
 */
export async function connectWebSocket(url: string, headers: Record<string, string>): Result.ResultAsync<WebSocketSession, Error> {
	logger.debug(`Opening WebSocket to ${url}`);
	return Result.try({
		try: dial(url, headers),
		catch: error => error instanceof Error ? error : new Error(String(error)),
	});
}
