import type { TupleToUnion } from 'type-fest';
import * as v from 'valibot';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './_consts.ts';

export const HttpMethods = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;
export type HttpMethod = TupleToUnion<typeof HttpMethods>;

export const httpMethodSchema = v.picklist(HttpMethods);

/**
 * Request timeout in milliseconds, `0` disables it
 */
export const timeoutSchema = v.pipe(
	v.number(),
	v.integer('Timeout must be an integer number of milliseconds'),
	v.minValue(0, 'Timeout must not be negative'),
	v.maxValue(MAX_TIMEOUT_MS, `Timeout must not exceed ${MAX_TIMEOUT_MS} milliseconds`),
);

/**
 * Validates a timeout in milliseconds
 * @throws ValiError when the value is not an integer between 0 and 2^32 - 1
 */
export function parseTimeout(timeout: number): number {
	return v.parse(timeoutSchema, timeout);
}

/**
 * Client construction options. Each absent field falls back to its default.
 */
export const clientConfigSchema = v.object({
	enableHttp2: v.optional(v.boolean(), true),
	enableHttp3: v.optional(v.boolean(), false),
	timeout: v.optional(timeoutSchema, DEFAULT_TIMEOUT_MS),
});

export type ClientConfigInput = v.InferInput<typeof clientConfigSchema>;
export type ClientConfig = Readonly<v.InferOutput<typeof clientConfigSchema>>;

export const stringRecordSchema = v.record(v.string(), v.string());

/**
 * Parses client options, applying defaults
 * @throws ValiError when an option has the wrong type or range
 */
export function parseClientConfig(input?: ClientConfigInput): ClientConfig {
	return v.parse(clientConfigSchema, input ?? {});
}

if (import.meta.vitest != null) {
	describe('parseClientConfig', () => {
		it('applies every default when no config is given', () => {
			expect(parseClientConfig()).toEqual({
				enableHttp2: true,
				enableHttp3: false,
				timeout: 30_000,
			});
		});

		it('fills only the absent fields of a partial config', () => {
			expect(parseClientConfig({ enableHttp3: true })).toEqual({
				enableHttp2: true,
				enableHttp3: true,
				timeout: 30_000,
			});
		});

		it('keeps a zero timeout', () => {
			expect(parseClientConfig({ timeout: 0 }).timeout).toBe(0);
		});

		it('rejects a negative timeout', () => {
			expect(() => parseClientConfig({ timeout: -1 })).toThrow('Timeout must not be negative');
		});

		it('rejects a timeout no timer can hold', () => {
			expect(() => parseClientConfig({ timeout: 5_000_000_000 })).toThrow('Timeout must not exceed 4294967295 milliseconds');
		});

		it('accepts the longest timer delay', () => {
			expect(parseClientConfig({ timeout: 4_294_967_295 }).timeout).toBe(4_294_967_295);
		});

		it('rejects a fractional timeout', () => {
			expect(() => parseClientConfig({ timeout: 1.5 })).toThrow('Timeout must be an integer number of milliseconds');
		});
	});
}
