import { getLogger } from '@obs/logger';
import { buildProgram } from './program';

const argv = process.argv.slice(2).filter((a) => a !== '--');

buildProgram()
	.parseAsync(argv, { from: 'user' })
	.catch((e: unknown) => {
		getLogger().error({ msg: 'cli.crashed', error: e });
		process.exitCode = 1;
	});
