/**
 * @fileoverview Random realistic user-agent generator
 *
 * Browser templates, versions and platform tokens live in `user-agents.json`.
 *
 * @module user-agent
 */

import * as v from 'valibot';
import rawUserAgentData from './user-agents.json';

const nonEmptyStrings = v.pipe(v.array(v.string()), v.minLength(1));

const userAgentDataSchema = v.object({
	platforms: v.record(v.string(), nonEmptyStrings),
	browsers: v.pipe(
		v.array(v.object({
			name: v.string(),
			platforms: nonEmptyStrings,
			template: v.string(),
			versions: nonEmptyStrings,
		})),
		v.minLength(1),
	),
});

type UserAgentData = v.InferOutput<typeof userAgentDataSchema>;

const userAgentData: UserAgentData = v.parse(userAgentDataSchema, rawUserAgentData);

function pick<T>(values: readonly T[], random: () => number): T {
	const value = values[Math.floor(random() * values.length)];
	if (value === undefined) {
		throw new RangeError('Cannot pick from an empty list');
	}
	return value;
}

/**
 * Generates a user-agent string of a current desktop browser
 * @param random - Source of numbers in [0, 1)
 */
export function randomUserAgent(random: () => number = Math.random): string {
	const browser = pick(userAgentData.browsers, random);
	const platformKey = pick(browser.platforms, random);
	const platforms = userAgentData.platforms[platformKey];
	if (platforms === undefined) {
		throw new Error(`Unknown platform "${platformKey}" for browser ${browser.name}`);
	}
	const platform = pick(platforms, random);
	const version = pick(browser.versions, random);

	return browser.template
		.replaceAll('{platform}', platform)
		.replaceAll('{version}', version);
}

if (import.meta.vitest != null) {
	describe('randomUserAgent', () => {
		it('builds the first template from the lowest random values', () => {
			expect(randomUserAgent(() => 0)).toBe(
				'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
			);
		});

		it('builds the last template from the highest random values', () => {
			expect(randomUserAgent(() => 0.999)).toBe(
				'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_6_1) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/18.1 Safari/605.1.15',
			);
		});

		it('leaves no placeholder behind', () => {
			for (let i = 0; i < 50; i++) {
				const userAgent = randomUserAgent();
				expect(userAgent).toMatch(/^Mozilla\/5\.0 \(/);
				expect(userAgent).not.toContain('{');
			}
		});

		it('references only known platforms', () => {
			for (const browser of userAgentData.browsers) {
				for (const platform of browser.platforms) {
					expect(userAgentData.platforms).toHaveProperty(platform);
				}
			}
		});
	});
}
