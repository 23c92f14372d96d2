/** biome-ignore-all lint/suspicious/noConsole: command output goes to stdout */
import { getUserDocsiftDir } from '@util/paths';
import type { Command } from 'commander';
import { loadSettings } from '../session';

export function registerConfigCommand(program: Command) {
	program
		.command('config')
		.description('Work with configuration under .docsift')
		.command('show')
		.option('--json', 'Print effective config as JSON')
		.action((opts: { json?: boolean }) => {
			const { settings, warnings, userPath, projectPath } = loadSettings(
				process.cwd(),
				getUserDocsiftDir()
			);
			if (opts.json) {
				console.log(
					JSON.stringify(
						{ effective: settings, userPath, projectPath, warnings },
						null,
						2
					)
				);
				return;
			}
			console.log('User config:', userPath ?? '(none)');
			console.log('Project config:', projectPath ?? '(none)');
			for (const w of warnings) {
				console.log('Warning:', w);
			}
			console.log('Effective (JSON):');
			console.log(JSON.stringify(settings, null, 2));
		});
}
