/**
 * @fileoverview Helpers for persisting a response body to disk
 *
 * @module download
 */

import type { Readable } from 'node:stream';
import type { HttpResponse } from './http/client.ts';
import { createWriteStream } from 'node:fs';
import { join } from 'node:path';
import process from 'node:process';
import { pipeline } from 'node:stream/promises';
import { DEFAULT_DOWNLOAD_EXTENSION, DEFAULT_DOWNLOAD_NAME } from './_consts.ts';

/**
 * Raised when a download answers with anything other than 200 OK
 */
export class DownloadStatusError extends Error {
	override readonly name = 'DownloadStatusError';

	constructor(readonly statusCode: number) {
		super(`failed to download image: status code ${statusCode}`);
	}
}

/**
 * Returns the first value of a response header
 */
export function firstHeaderValue(headers: HttpResponse['headers'], name: string): string | undefined {
	const value = headers[name.toLowerCase()];
	return Array.isArray(value) ? value[0] : value;
}

/**
 * Maps a Content-Type value to a file extension using its subtype.
 * `image/png` gives `.png`, `image/svg+xml; charset=utf-8` gives `.svg+xml`.
 */
export function extensionFromContentType(contentType: string | undefined): string {
	if (contentType == null) {
		return DEFAULT_DOWNLOAD_EXTENSION;
	}

	const mediaType = contentType.split(';')[0] ?? '';
	const slash = mediaType.indexOf('/');
	const subtype = slash === -1 ? '' : mediaType.slice(slash + 1).trim();
	return subtype.length > 0 ? `.${subtype}` : DEFAULT_DOWNLOAD_EXTENSION;
}

/**
 * Returns the last segment of the URL path, `download` when it is empty
 */
export function fileNameFromUrl(url: string): string {
	const { pathname } = new URL(url);
	const name = pathname.slice(pathname.lastIndexOf('/') + 1);
	return name.length > 0 ? name : DEFAULT_DOWNLOAD_NAME;
}

/**
 * Resolves where a download is written.
 *
 * An explicit save path is used as is. Otherwise the URL's file name gets the
 * Content-Type extension appended, even when it already has one, and the file
 * goes into the working directory: `/y.png` served as `image/png` becomes `y.png.png`.
 */
export function resolveDownloadPath(
	url: string,
	contentType: string | undefined,
	savePath?: string,
	cwd: string = process.cwd(),
): string {
	if (savePath != null) {
		return savePath;
	}
	return join(cwd, `${fileNameFromUrl(url)}${extensionFromContentType(contentType)}`);
}

/**
 * Streams a body into a file, creating or truncating it.
 * The pipeline closes both ends whether the copy succeeds or fails.
 */
export async function writeBodyToFile(body: Readable, path: string): Promise<void> {
	await pipeline(body, createWriteStream(path));
}

if (import.meta.vitest != null) {
	describe('extensionFromContentType', () => {
		it('uses the subtype', () => {
			expect(extensionFromContentType('image/png')).toBe('.png');
		});

		it('keeps structured suffixes and drops parameters', () => {
			expect(extensionFromContentType('image/svg+xml; charset=utf-8')).toBe('.svg+xml');
		});

		it('falls back to .jpg when the header is missing', () => {
			expect(extensionFromContentType(undefined)).toBe('.jpg');
		});

		it('falls back to .jpg when there is no subtype', () => {
			expect(extensionFromContentType('image')).toBe('.jpg');
			expect(extensionFromContentType('image/')).toBe('.jpg');
		});
	});

	describe('fileNameFromUrl', () => {
		it('takes the last path segment', () => {
			expect(fileNameFromUrl('http://x/images/y.png')).toBe('y.png');
		});

		it('ignores the query string', () => {
			expect(fileNameFromUrl('http://x/y.png?size=large')).toBe('y.png');
		});

		it('uses a fixed name for directory URLs', () => {
			expect(fileNameFromUrl('http://x/images/')).toBe('download');
		});
	});

	describe('resolveDownloadPath', () => {
		it('appends the content type extension to the URL file name', () => {
			expect(resolveDownloadPath('http://x/y.png', 'image/png', undefined, '/tmp/work')).toBe('/tmp/work/y.png.png');
		});

		it('uses .jpg without a content type', () => {
			expect(resolveDownloadPath('http://x/photo', undefined, undefined, '/tmp/work')).toBe('/tmp/work/photo.jpg');
		});

		it('prefers the explicit save path', () => {
			expect(resolveDownloadPath('http://x/y.png', 'image/png', '/data/out.bin', '/tmp/work')).toBe('/data/out.bin');
		});
	});

	describe('firstHeaderValue', () => {
		it('reads single and repeated headers case-insensitively', () => {
			const headers = { 'content-type': 'image/png', 'set-cookie': ['a=1', 'b=2'] };
			expect(firstHeaderValue(headers, 'Content-Type')).toBe('image/png');
			expect(firstHeaderValue(headers, 'set-cookie')).toBe('a=1');
			expect(firstHeaderValue(headers, 'etag')).toBeUndefined();
		});
	});
}
