import * as v from 'valibot';
import { stringRecordSchema, timeoutSchema } from './_types.ts';

/**
 * Schema of the CLI configuration file. Every field is optional; unknown keys are rejected.
 */
export const configFileSchema = v.strictObject({
	$schema: v.optional(v.string()),
	enableHttp2: v.optional(v.boolean()),
	enableHttp3: v.optional(v.boolean()),
	timeout: v.optional(timeoutSchema),
	headers: v.optional(stringRecordSchema),
	cookies: v.optional(stringRecordSchema),
	userAgent: v.optional(v.string()),
	proxy: v.optional(v.string()),
	followRedirects: v.optional(v.boolean()),
});

export type ConfigData = v.InferOutput<typeof configFileSchema>;

if (import.meta.vitest != null) {
	describe('configFileSchema', () => {
		it('accepts an empty object', () => {
			expect(v.parse(configFileSchema, {})).toEqual({});
		});

		it('accepts every field', () => {
			const data = {
				enableHttp2: false,
				enableHttp3: false,
				timeout: 5000,
				headers: { Accept: 'application/json' },
				cookies: { session: 'test-session' },
				userAgent: 'random',
				proxy: 'http://127.0.0.1:3128',
				followRedirects: true,
			};
			expect(v.parse(configFileSchema, data)).toEqual(data);
		});

		it('rejects unknown keys', () => {
			expect(v.safeParse(configFileSchema, { retries: 3 }).success).toBe(false);
		});

		it('rejects non-string header values', () => {
			expect(v.safeParse(configFileSchema, { headers: { 'X-Count': 1 } }).success).toBe(false);
		});

		it('rejects a negative timeout', () => {
			expect(v.safeParse(configFileSchema, { timeout: -5 }).success).toBe(false);
		});
	});
}
