import type { HttpMethod } from '../_types.ts';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import * as v from 'valibot';
import { formatHeaderLines, formatStatusLine } from '../_format.ts';
import { clientFromArgs, sharedArgs } from '../_shared-args.ts';
import { httpMethodSchema } from '../_types.ts';
import { log, logger } from '../logger.ts';

function parseMethodArg(value: string): HttpMethod {
	const result = v.safeParse(httpMethodSchema, value.toUpperCase());
	if (!result.success) {
		throw new TypeError(`Unsupported method: ${value}`);
	}
	return result.output;
}

export const requestCommand = define({
	name: 'request',
	description: 'Send an HTTP request and print the response',
	args: {
		url: {
			type: 'positional',
			description: 'Request URL',
		},
		method: {
			type: 'custom',
			short: 'X',
			description: 'HTTP method (default: GET)',
			parse: parseMethodArg,
		},
		data: {
			type: 'string',
			short: 'd',
			description: 'Request body',
		},
		include: {
			type: 'boolean',
			short: 'i',
			description: 'Print the response headers',
			default: false,
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

		const method = ctx.values.method ?? (ctx.values.data != null ? 'POST' : 'GET');
		const result = await client.sendRequest(method, ctx.values.url, ctx.values.data);
		if (Result.isFailure(result)) {
			logger.error(`${method} ${ctx.values.url} failed: ${result.error.message}`);
			process.exit(1);
		}

		const response = result.value;
		log(formatStatusLine(response.statusCode));
		if (ctx.values.include) {
			for (const line of formatHeaderLines(response.headers)) {
				log(line);
			}
			log('');
		}

		for await (const chunk of response.body) {
			process.stdout.write(chunk);
		}
	},
});

if (import.meta.vitest != null) {
	describe('parseMethodArg', () => {
		it('accepts methods in any case', () => {
			expect(parseMethodArg('patch')).toBe('PATCH');
			expect(parseMethodArg('HEAD')).toBe('HEAD');
		});

		it('rejects unknown methods', () => {
			expect(() => parseMethodArg('TRACE')).toThrow('Unsupported method: TRACE');
		});
	});
}
