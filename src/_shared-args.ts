import type { Args } from 'gunshi';
import type { ConfigData } from './_config-schema.ts';
import type { FluentHttpClient } from './client.ts';
import { Result } from '@praha/byethrow';
import * as v from 'valibot';
import { loadConfig } from './_config-loader.ts';
import { stringRecordSchema, timeoutSchema } from './_types.ts';
import { createClient } from './client.ts';

export type Credentials = {
	username: string;
	password: string;
};

function parseStringRecordArg(value: string): Record<string, string> {
	let data: unknown;
	try {
		data = JSON.parse(value);
	}
	catch {
		throw new TypeError(`Expected a JSON object, received: ${value}`);
	}

	const result = v.safeParse(stringRecordSchema, data);
	if (!result.success) {
		throw new TypeError(`Expected a JSON object of string values, received: ${value}`);
	}
	return result.output;
}

function parseCredentialsArg(value: string): Credentials {
	const separator = value.indexOf(':');
	if (separator === -1) {
		throw new TypeError('Credentials must be given as user:password');
	}
	return {
		username: value.slice(0, separator),
		password: value.slice(separator + 1),
	};
}

function parseTimeoutArg(value: string): number {
	const result = v.safeParse(timeoutSchema, Number(value));
	if (!result.success) {
		throw new TypeError(result.issues[0].message);
	}
	return result.output;
}

export const sharedArgs = {
	config: {
		type: 'string',
		description: 'Path to a configuration file',
	},
	headers: {
		type: 'custom',
		short: 'H',
		description: 'Default headers as a JSON object',
		parse: parseStringRecordArg,
	},
	cookies: {
		type: 'custom',
		short: 'b',
		description: 'Cookies as a JSON object',
		parse: parseStringRecordArg,
	},
	user: {
		type: 'custom',
		short: 'u',
		description: 'Basic auth credentials (user:password)',
		parse: parseCredentialsArg,
	},
	bearer: {
		type: 'string',
		description: 'Bearer token for the Authorization header',
	},
	userAgent: {
		type: 'string',
		short: 'A',
		description: 'User-Agent header, "random" picks a browser one',
	},
	proxy: {
		type: 'string',
		description: 'Proxy URL (http or https). Falls back to HTTP_PROXY and friends',
	},
	timeout: {
		type: 'custom',
		short: 't',
		description: 'Request timeout in milliseconds, 0 disables it',
		parse: parseTimeoutArg,
	},
	http1: {
		type: 'boolean',
		description: 'Disable HTTP/2 negotiation',
	},
	http3: {
		type: 'boolean',
		description: 'Use the HTTP/3 transport',
	},
	location: {
		type: 'boolean',
		short: 'L',
		description: 'Follow every redirect (default: at most 10)',
	},
} as const satisfies Args;

/**
 * Values of {@link sharedArgs} after parsing
 */
export type ClientFlags = {
	headers?: Record<string, string>;
	cookies?: Record<string, string>;
	user?: Credentials;
	bearer?: string;
	userAgent?: string;
	proxy?: string;
	timeout?: number;
	http1?: boolean;
	http3?: boolean;
	location?: boolean;
};

/**
 * Builds a client from the configuration file and the command line.
 * Flags take precedence over the file, the file over built-in defaults.
 */
export function createClientFromArgs(flags: ClientFlags, config?: ConfigData): FluentHttpClient {
	const client = createClient({
		enableHttp2: flags.http1 === true ? false : config?.enableHttp2,
		enableHttp3: flags.http3 ?? config?.enableHttp3,
		timeout: flags.timeout ?? config?.timeout,
	});

	const headers = { ...config?.headers, ...flags.headers };
	if (Object.keys(headers).length > 0) {
		client.withHeaders(headers);
	}

	const cookies = { ...config?.cookies, ...flags.cookies };
	if (Object.keys(cookies).length > 0) {
		client.withCookies(cookies);
	}

	if (flags.user != null) {
		client.withBasicAuth(flags.user.username, flags.user.password);
	}
	if (flags.bearer != null) {
		client.withBearerToken(flags.bearer);
	}

	const userAgent = flags.userAgent ?? config?.userAgent;
	if (userAgent != null) {
		client.withUserAgent(userAgent);
	}

	const proxy = flags.proxy ?? config?.proxy;
	if (proxy != null) {
		client.withProxy(proxy);
	}
	else {
		client.withProxyFromEnv();
	}

	if (flags.location ?? config?.followRedirects ?? false) {
		client.followRedirects();
	}

	return client;
}

/**
 * Loads the configuration file named by `--config`, or the discovered one, and builds the client
 */
export function clientFromArgs(flags: ClientFlags & { config?: string }): Result.Result<FluentHttpClient, Error> {
	return Result.pipe(
		loadConfig(flags.config),
		Result.map(config => createClientFromArgs(flags, config)),
	);
}

if (import.meta.vitest != null) {
	describe('sharedArgs parsers', () => {
		it('parses a JSON object of strings', () => {
			expect(parseStringRecordArg('{"Accept":"text/plain"}')).toEqual({ Accept: 'text/plain' });
		});

		it('rejects malformed JSON', () => {
			expect(() => parseStringRecordArg('{oops')).toThrow('Expected a JSON object, received: {oops');
		});

		it('rejects non-string values', () => {
			expect(() => parseStringRecordArg('{"X-Count":1}')).toThrow('Expected a JSON object of string values, received: {"X-Count":1}');
		});

		it('splits credentials at the first colon', () => {
			expect(parseCredentialsArg('user:pa:ss')).toEqual({ username: 'user', password: 'pa:ss' });
		});

		it('rejects credentials without a colon', () => {
			expect(() => parseCredentialsArg('user')).toThrow('Credentials must be given as user:password');
		});

		it('parses a timeout in milliseconds', () => {
			expect(parseTimeoutArg('2500')).toBe(2500);
		});

		it('rejects a negative timeout', () => {
			expect(() => parseTimeoutArg('-1')).toThrow('Timeout must not be negative');
		});

		it('rejects a timeout beyond the timer range', () => {
			expect(() => parseTimeoutArg('5000000000')).toThrow('Timeout must not exceed 4294967295 milliseconds');
		});
	});

	describe('createClientFromArgs', () => {
		afterEach(() => {
			vi.unstubAllEnvs();
		});

		it('uses built-in defaults without flags or configuration', async () => {
			vi.stubEnv('HTTP_PROXY', '');
			vi.stubEnv('HTTPS_PROXY', '');
			vi.stubEnv('http_proxy', '');
			vi.stubEnv('https_proxy', '');
			await using client = createClientFromArgs({});
			expect(client.config).toEqual({ enableHttp2: true, enableHttp3: false, timeout: 30_000 });
			expect(client.transportKind).toBe('standard');
			expect(client.redirectLimit).toBe(10);
			expect(client.defaultHeaders).toEqual({});
		});

		it('lets flags override the configuration file', async () => {
			await using client = createClientFromArgs(
				{ timeout: 100, headers: { 'X-Source': 'flag' }, userAgent: 'flag-agent', http1: true },
				{ timeout: 5000, headers: { 'X-Source': 'file', 'X-File': 'yes' }, userAgent: 'file-agent', followRedirects: true },
			);
			expect(client.config).toEqual({ enableHttp2: false, enableHttp3: false, timeout: 100 });
			expect(client.defaultHeaders).toEqual({ 'x-source': 'flag', 'x-file': 'yes' });
			expect(client.userAgent).toBe('flag-agent');
			expect(client.redirectLimit).toBe(Number.MAX_SAFE_INTEGER);
		});

		it('applies cookies and credentials', async () => {
			await using client = createClientFromArgs(
				{ cookies: { b: '2' }, user: { username: 'user', password: 'pass' } },
				{ cookies: { a: '1' } },
			);
			expect(client.getHeader('cookie')).toBe('a=1; b=2');
			expect(client.getHeader('authorization')).toBe('Basic dXNlcjpwYXNz');
		});

		it('prefers a bearer token over basic credentials', async () => {
			await using client = createClientFromArgs({ user: { username: 'user', password: 'pass' }, bearer: 'test-token' });
			expect(client.getHeader('authorization')).toBe('Bearer test-token');
		});

		it('routes through the configured proxy', async () => {
			await using client = createClientFromArgs({}, { proxy: 'http://127.0.0.1:3128' });
			expect(client.transportKind).toBe('proxy');
		});

		it('selects the HTTP/3 transport from the configuration file', async () => {
			await using client = createClientFromArgs({}, { enableHttp3: true });
			expect(client.transportKind).toBe('http3');
		});
	});

	describe('clientFromArgs', () => {
		it('fails when the explicit configuration file is missing', () => {
			const result = clientFromArgs({ config: '/nonexistent/chainreq.json' });
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.message).toBe('Configuration file does not exist: /nonexistent/chainreq.json');
			}
		});
	});
}
