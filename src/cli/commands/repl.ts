import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { CommandRegistry } from '@core/command/registry';
import { createCommandRegistry } from '@core/commands';
import type { Engine } from '@core/engine';
import type { Command } from 'commander';
import { openSession } from '../session';
import { renderResult } from './format';

const EXIT_WORDS = new Set(['exit', 'quit']);

/**
 * One command per input line, one result block per command, each followed
 * by a blank line. Lines are handled strictly in order.
 */
export async function runRepl(
	input: Readable,
	output: Writable,
	engine: Engine,
	registry: CommandRegistry<Engine> = createCommandRegistry()
): Promise<number> {
	const rl = readline.createInterface({ input, terminal: false });
	let handled = 0;
	try {
		for await (const raw of rl) {
			const line = raw.trim();
			if (!line) {
				continue;
			}
			if (EXIT_WORDS.has(line.toLowerCase())) {
				break;
			}
			const result = await registry.dispatch(line, engine);
			output.write(`${renderResult(result)}\n\n`);
			handled++;
		}
	} finally {
		rl.close();
	}
	return handled;
}

export function registerReplCommand(program: Command) {
	program
		.command('repl')
		.description('Read command lines from stdin until EOF, exit or quit')
		.action(async (_opts: unknown, cmd: Command) => {
			const { logLevel } = cmd.optsWithGlobals<{ logLevel?: string }>();
			const engine = await openSession({ logLevel });
			await runRepl(process.stdin, process.stdout, engine);
		});
}
