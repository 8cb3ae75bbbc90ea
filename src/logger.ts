/**
 * @fileoverview Logging utilities for chainreq
 *
 * Configured consola instance tagged with the package name. The `LOG_LEVEL`
 * environment variable overrides the level with a numeric consola level.
 *
 * @module logger
 */

import type { ConsolaInstance } from 'consola';
import process from 'node:process';
import { consola } from 'consola';
import { name } from '../package.json';

function createLogger(tag: string): ConsolaInstance {
	const logger: ConsolaInstance = consola.withTag(tag);

	if (process.env.LOG_LEVEL != null) {
		const level = Number.parseInt(process.env.LOG_LEVEL, 10);
		if (!Number.isNaN(level)) {
			logger.level = level;
		}
	}

	return logger;
}

/**
 * Application logger instance with package name tag
 */
export const logger: ConsolaInstance = createLogger(name);

/**
 * Direct console.log function for cases where logger formatting is not desired
 */
// eslint-disable-next-line no-console
export const log = console.log;
