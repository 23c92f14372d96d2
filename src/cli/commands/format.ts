import type { CommandResult } from '@core/command/types';

/** Block printed for one command line. */
export function renderResult(result: CommandResult): string {
	if (result.ok || !result.error) {
		return result.text;
	}
	return `Error (${result.error.code}): ${result.error.message}`;
}
