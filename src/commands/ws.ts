import process from 'node:process';
import { createInterface } from 'node:readline';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import { formatStatusLine } from '../_format.ts';
import { clientFromArgs, sharedArgs } from '../_shared-args.ts';
import { log, logger } from '../logger.ts';

export const wsCommand = define({
	name: 'ws',
	description: 'Open a WebSocket, send stdin lines as messages and print what arrives',
	args: {
		url: {
			type: 'positional',
			description: 'WebSocket URL (ws: or wss:)',
		},
		...sharedArgs,
	},
	toKebab: true,
	async run(ctx) {
		const clientResult = clientFromArgs(ctx.values);
		if (Result.isFailure(clientResult)) {
			logger.error(clientResult.error.message);
			process.exit(1);
		}
		await using client = clientResult.value;

		const result = await client.webSocketConnect(ctx.values.url);
		if (Result.isFailure(result)) {
			logger.error(`WebSocket connection to ${ctx.values.url} failed: ${result.error.message}`);
			process.exit(1);
		}

		const { connection, response } = result.value;
		log(formatStatusLine(response.statusCode ?? 101, response.statusMessage));

		connection.on('message', (data) => {
			log(String(data));
		});
		connection.on('error', (error) => {
			logger.error(`WebSocket error: ${error.message}`);
		});

		const input = createInterface({ input: process.stdin });
		input.on('line', (line) => {
			connection.send(line);
		});
		input.on('close', () => {
			connection.close();
		});

		await new Promise<void>((resolve) => {
			connection.once('close', () => resolve());
		});
		input.close();
	},
});
