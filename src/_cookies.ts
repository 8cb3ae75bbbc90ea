/**
 * Serializes cookie pairs as a Cookie header value
 * @param cookies - Cookie names mapped to values
 * @returns `name=value` pairs joined by `"; "`
 */
export function serializeCookies(cookies: Record<string, string>): string {
	return Object.entries(cookies)
		.map(([name, value]) => `${name}=${value}`)
		.join('; ');
}

/**
 * Appends cookie pairs to an existing Cookie header value, one pair at a time.
 * Repeated names are not deduplicated.
 */
export function appendCookies(existing: string | undefined, cookies: Record<string, string>): string | undefined {
	let header = existing;
	for (const [name, value] of Object.entries(cookies)) {
		header = header != null ? `${header}; ${name}=${value}` : `${name}=${value}`;
	}
	return header;
}

if (import.meta.vitest != null) {
	describe('serializeCookies', () => {
		it('joins pairs in insertion order', () => {
			expect(serializeCookies({ a: '1', b: '2' })).toBe('a=1; b=2');
		});

		it('returns an empty string for no cookies', () => {
			expect(serializeCookies({})).toBe('');
		});
	});

	describe('appendCookies', () => {
		it('starts a header when none exists', () => {
			expect(appendCookies(undefined, { a: '1' })).toBe('a=1');
		});

		it('appends to an existing header', () => {
			expect(appendCookies('a=1', { b: '2', c: '3' })).toBe('a=1; b=2; c=3');
		});

		it('keeps repeated names', () => {
			expect(appendCookies('a=1', { a: '2' })).toBe('a=1; a=2');
		});

		it('leaves the header untouched for no cookies', () => {
			expect(appendCookies(undefined, {})).toBeUndefined();
		});
	});
}
