/**
 * @fileoverview CLI runner for `chainreq`.
 */

import process from 'node:process';
import { cli } from 'gunshi';
import { description, name, version } from '../package.json';
import { downloadCommand, requestCommand, wsCommand } from './commands/index.ts';

const subCommands = new Map([
	['request', requestCommand],
	['download', downloadCommand],
	['ws', wsCommand],
]);

const mainCommand = requestCommand;

export async function run(): Promise<void> {
	await cli(process.argv.slice(2), mainCommand, {
		name,
		version,
		description,
		subCommands,
		renderHeader: null,
	});
}
