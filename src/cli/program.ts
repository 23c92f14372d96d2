/** biome-ignore-all lint/suspicious/noConsole: command output goes to stdout */
import { isLogLevel, setLogLevel } from '@obs/logger';
import { formatBuildInfo, VERSION } from '@util/build-info';
import { Command, InvalidArgumentError } from 'commander';
import { registerConfigCommand } from './commands/config';
import { registerExecCommand } from './commands/exec';
import { registerReplCommand } from './commands/repl';

function parseLevel(value: string): string {
	const v = value.toLowerCase();
	if (!isLogLevel(v)) {
		throw new InvalidArgumentError('expected debug, info, warn or error');
	}
	return v;
}

export function buildProgram(): Command {
	const program = new Command();
	program
		.name('docsift')
		.description('Local document indexing and retrieval')
		.version(VERSION);

	program.option(
		'-l, --log-level <level>',
		'log level (debug|info|warn|error)',
		parseLevel
	);

	program.hook('preAction', (thisCmd) => {
		const { logLevel } = thisCmd.opts<{ logLevel?: string }>();
		if (isLogLevel(logLevel)) {
			setLogLevel(logLevel);
		}
	});

	program
		.command('version')
		.description('Show detailed version and build information')
		.action(() => {
			console.log(formatBuildInfo());
		});

	registerExecCommand(program);
	registerReplCommand(program);
	registerConfigCommand(program);
	return program;
}
