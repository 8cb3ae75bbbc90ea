import type { HttpResponse } from './http/client.ts';
import { STATUS_CODES } from 'node:http';
import { stripVTControlCharacters } from 'node:util';
import pc from 'picocolors';

function colorForStatus(statusCode: number): (text: string) => string {
	if (statusCode >= 200 && statusCode < 300) {
		return pc.green;
	}
	if (statusCode >= 300 && statusCode < 400) {
		return pc.yellow;
	}
	return pc.red;
}

/**
 * Formats a status line such as `HTTP 200 OK`, colored by status class
 */
export function formatStatusLine(statusCode: number, reason: string = STATUS_CODES[statusCode] ?? ''): string {
	const line = reason === '' ? `HTTP ${statusCode}` : `HTTP ${statusCode} ${reason}`;
	return colorForStatus(statusCode)(pc.bold(line));
}

/**
 * One `name: value` line per header value, repeated headers on separate lines
 */
export function formatHeaderLines(headers: HttpResponse['headers']): string[] {
	const lines: string[] = [];
	for (const [name, value] of Object.entries(headers)) {
		if (value == null) {
			continue;
		}
		for (const item of Array.isArray(value) ? value : [value]) {
			lines.push(`${pc.cyan(name)}: ${item}`);
		}
	}
	return lines;
}

if (import.meta.vitest != null) {
	describe('formatStatusLine', () => {
		it('uses the standard reason phrase', () => {
			expect(stripVTControlCharacters(formatStatusLine(200))).toBe('HTTP 200 OK');
			expect(stripVTControlCharacters(formatStatusLine(404))).toBe('HTTP 404 Not Found');
		});

		it('prefers an explicit reason', () => {
			expect(stripVTControlCharacters(formatStatusLine(101, 'Switching Protocols'))).toBe('HTTP 101 Switching Protocols');
		});

		it('omits an unknown reason', () => {
			expect(stripVTControlCharacters(formatStatusLine(599))).toBe('HTTP 599');
		});
	});

	describe('formatHeaderLines', () => {
		it('prints repeated headers on separate lines and skips missing ones', () => {
			const lines = formatHeaderLines({
				'content-type': 'text/plain',
				'set-cookie': ['a=1', 'b=2'],
				'etag': undefined,
			});
			expect(lines.map(line => stripVTControlCharacters(line))).toEqual([
				'content-type: text/plain',
				'set-cookie: a=1',
				'set-cookie: b=2',
			]);
		});
	});
}
