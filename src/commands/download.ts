import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import pc from 'picocolors';
import { clientFromArgs, sharedArgs } from '../_shared-args.ts';
import { firstHeaderValue, resolveDownloadPath } from '../download.ts';
import { log, logger } from '../logger.ts';

export const downloadCommand = define({
	name: 'download',
	description: 'Download a resource to disk',
	args: {
		url: {
			type: 'positional',
			description: 'Resource URL',
		},
		output: {
			type: 'string',
			short: 'o',
			description: 'File to write (default: URL file name plus the Content-Type extension in the working directory)',
		},
		...sharedArgs,
	},
	toKebab: true,
	async run(ctx) {
		const clientResult = clientFromArgs(ctx.values);
		if (Result.isFailure(clientResult)) {
			logger.error(clientResult.error.message);
			process.exit(1);
		}
		await using client = clientResult.value;

		const { url, output } = ctx.values;
		const result = await client.downloadImage(url, output);
		if (Result.isFailure(result)) {
			logger.error(`Download of ${url} failed: ${result.error.message}`);
			process.exit(1);
		}

		const savedPath = output ?? resolveDownloadPath(url, firstHeaderValue(result.value.headers, 'content-type'));
		log(`${pc.green('Saved')} ${savedPath}`);
	},
});
