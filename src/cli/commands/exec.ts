/** biome-ignore-all lint/suspicious/noConsole: command output goes to stdout */
import { createCommandRegistry } from '@core/commands';
import type { CommandResult } from '@core/command/types';
import type { Command } from 'commander';
import { openSession, type SessionOptions } from '../session';
import { renderResult } from './format';

/** Rejoin shell words, quoting the ones the shell unquoted. */
export function joinCommandWords(words: string[]): string {
	return words
		.map((w) =>
			w === '' || /\s/.test(w) ? `"${w.replace(/["\\]/g, '\\$&')}"` : w
		)
		.join(' ');
}

export async function runExec(
	line: string,
	opts: SessionOptions = {}
): Promise<CommandResult> {
	const engine = await openSession(opts);
	return await createCommandRegistry().dispatch(line, engine);
}

export function registerExecCommand(program: Command) {
	program
		.command('exec')
		.description('Run one command line, e.g. exec search "quick fox"')
		.argument('<line...>', 'command and its arguments')
		.allowUnknownOption()
		.action(async (words: string[], _opts: unknown, cmd: Command) => {
			const { logLevel } = cmd.optsWithGlobals<{ logLevel?: string }>();
			const result = await runExec(joinCommandWords(words), { logLevel });
			console.log(renderResult(result));
			if (!result.ok) {
				process.exitCode = 1;
			}
		});
}
