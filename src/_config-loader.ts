import type { ConfigData } from './_config-schema.ts';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import * as v from 'valibot';
import { name } from '../package.json';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './_consts.ts';
import { configFileSchema } from './_config-schema.ts';
import { logger } from './logger.ts';

/**
 * Configuration file search paths in priority order (highest to lowest)
 * 1. Local .chainreq/config.json
 * 2. User config ~/.config/chainreq/config.json
 */
export function getConfigSearchPaths(): string[] {
	return [
		join(process.cwd(), CONFIG_DIR_NAME, CONFIG_FILE_NAME),
		join(homedir(), '.config', name, CONFIG_FILE_NAME),
	];
}

function readConfigFile(filePath: string): Result.Result<ConfigData, Error> {
	const parseConfigFile = Result.try({
		try: () => {
			const data: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
			return v.parse(configFileSchema, data);
		},
		catch: error => error instanceof Error ? error : new Error(String(error)),
	});

	return parseConfigFile();
}

/**
 * Validates a configuration file
 * @param configPath - Path to configuration file
 */
export function validateConfigFile(configPath: string): Result.Result<ConfigData, Error> {
	if (!existsSync(configPath)) {
		return Result.fail(new Error(`Configuration file does not exist: ${configPath}`));
	}
	return readConfigFile(configPath);
}

/**
 * Loads configuration from the given path, or from the first valid file in the search paths.
 *
 * An explicit path that is missing or invalid is a failure. During discovery
 * invalid files are skipped with a warning, and finding nothing succeeds with `undefined`.
 */
export function loadConfig(configPath?: string): Result.Result<ConfigData | undefined, Error> {
	if (configPath != null) {
		return Result.pipe(
			validateConfigFile(configPath),
			Result.inspect(() => logger.debug(`Loaded configuration from: ${configPath}`)),
		);
	}

	for (const searchPath of getConfigSearchPaths()) {
		if (!existsSync(searchPath)) {
			continue;
		}

		const result = readConfigFile(searchPath);
		if (Result.isSuccess(result)) {
			logger.debug(`Loaded configuration from: ${searchPath}`);
			return result;
		}
		logger.warn(`Invalid configuration file at ${searchPath}: ${result.error.message}`);
	}

	logger.debug('No configuration file found in search paths');
	return Result.succeed(undefined);
}

if (import.meta.vitest != null) {
	const { createFixture } = await import('fs-fixture');

	describe('loadConfig', () => {
		afterEach(() => {
			vi.restoreAllMocks();
			vi.unstubAllEnvs();
		});

		it('loads the local configuration first', async () => {
			await using fixture = await createFixture({
				'project/.chainreq/config.json': JSON.stringify({ timeout: 1000 }),
				'home/.config/chainreq/config.json': JSON.stringify({ timeout: 2000 }),
			});
			vi.spyOn(process, 'cwd').mockReturnValue(fixture.getPath('project'));
			vi.stubEnv('HOME', fixture.getPath('home'));

			const result = loadConfig();
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toEqual({ timeout: 1000 });
			}
		});

		it('skips an invalid local configuration and falls back to the user configuration', async () => {
			await using fixture = await createFixture({
				'project/.chainreq/config.json': '{ invalid json',
				'home/.config/chainreq/config.json': JSON.stringify({ userAgent: 'random' }),
			});
			vi.spyOn(process, 'cwd').mockReturnValue(fixture.getPath('project'));
			vi.stubEnv('HOME', fixture.getPath('home'));
			const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});

			const result = loadConfig();
			expect(Result.isSuccess(result) ? result.value : undefined).toEqual({ userAgent: 'random' });
			expect(warn).toHaveBeenCalledOnce();
		});

		it('succeeds with undefined when nothing is found', async () => {
			await using fixture = await createFixture({ 'project/readme.txt': 'empty' });
			vi.spyOn(process, 'cwd').mockReturnValue(fixture.getPath('project'));
			vi.stubEnv('HOME', fixture.getPath('home'));

			const result = loadConfig();
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toBeUndefined();
			}
		});

		it('uses only the explicit path when one is given', async () => {
			await using fixture = await createFixture({
				'custom.json': JSON.stringify({ proxy: 'http://127.0.0.1:3128' }),
				'.chainreq/config.json': JSON.stringify({ timeout: 1000 }),
			});
			vi.spyOn(process, 'cwd').mockReturnValue(fixture.getPath());

			const result = loadConfig(fixture.getPath('custom.json'));
			expect(Result.isSuccess(result) ? result.value : undefined).toEqual({ proxy: 'http://127.0.0.1:3128' });
		});

		it('fails when the explicit path does not exist', async () => {
			await using fixture = await createFixture();
			const missing = fixture.getPath('missing.json');

			const result = loadConfig(missing);
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.message).toBe(`Configuration file does not exist: ${missing}`);
			}
		});

		it('fails when the explicit path is invalid', async () => {
			await using fixture = await createFixture({ 'bad.json': JSON.stringify({ timeout: 'soon' }) });

			const result = loadConfig(fixture.getPath('bad.json'));
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error).toBeInstanceOf(v.ValiError);
			}
		});
	});

	describe('validateConfigFile', () => {
		it('reports malformed JSON', async () => {
			await using fixture = await createFixture({ 'broken.json': '{ invalid json' });

			const result = validateConfigFile(fixture.getPath('broken.json'));
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error).toBeInstanceOf(SyntaxError);
			}
		});
	});
}
