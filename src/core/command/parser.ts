import { EngineError, InvalidArgumentsError } from '@core/errors';
import type { ParsedCommand } from './types';

export const TEXT_DELIMITER = '::';

// Quoted args ("..." or '...') and escapes \" \' \\
export function tokenize(input: string): string[] {
	const out: string[] = [];
	let cur = '';
	let quote: '"' | "'" | null = null;
	let esc = false;
	let pending = false; // a quoted empty string still counts as an argument
	for (const ch of input) {
		if (esc) {
			cur += ch;
			esc = false;
			continue;
		}
		if (ch === '\\') {
			esc = true;
			continue;
		}
		if (quote) {
			if (ch === quote) {
				quote = null;
			} else {
				cur += ch;
			}
			continue;
		}
		if (ch === '"' || ch === "'") {
			quote = ch;
			pending = true;
			continue;
		}
		if (/\s/.test(ch)) {
			if (cur || pending) {
				out.push(cur);
				cur = '';
				pending = false;
			}
			continue;
		}
		cur += ch;
	}
	if (quote) {
		throw new EngineError('InvalidArguments', 'Unterminated quoted argument');
	}
	if (esc) {
		throw new EngineError('InvalidArguments', 'Dangling escape at end of input');
	}
	if (cur || pending) {
		out.push(cur);
	}
	return out;
}

/**
 * Split a line into a lower-cased verb and the untouched argument tail.
 * A leading `/` and a leading `rag ` word are both optional.
 */
export function parseCommand(line: string): ParsedCommand {
	let body = line.trim();
	if (body.startsWith('/')) {
		body = body.slice(1).trimStart();
	}
	const prefixed = /^rag\s+(\S[\s\S]*)$/i.exec(body);
	if (prefixed) {
		body = prefixed[1];
	}
	if (!body) {
		throw new EngineError('InvalidArguments', 'Empty command line');
	}
	const m = /^(\S+)\s*([\s\S]*)$/.exec(body);
	const verb = (m?.[1] ?? body).toLowerCase();
	return { verb, rest: (m?.[2] ?? '').trim() };
}

/** Exactly one argument, quoted when it contains spaces. */
export function singleArgument(verb: string, rest: string, usage: string): string {
	const args = tokenize(rest);
	if (args.length !== 1 || !args[0]) {
		throw new InvalidArgumentsError(verb, usage);
	}
	return args[0];
}

/**
 * `<name> :: <content>`; the content may itself contain `::`. The name is
 * one argument, quoted when it contains spaces. One pair of matching quotes
 * around the content is dropped.
 */
export function splitNamedText(
	verb: string,
	rest: string,
	usage: string
): { name: string; content: string } {
	const at = rest.indexOf(TEXT_DELIMITER);
	if (at < 0) {
		throw new InvalidArgumentsError(verb, usage);
	}
	const names = tokenize(rest.slice(0, at));
	if (names.length !== 1 || !names[0]) {
		throw new InvalidArgumentsError(verb, usage);
	}
	return {
		name: names[0],
		content: unquote(rest.slice(at + TEXT_DELIMITER.length).trim()),
	};
}

function unquote(s: string): string {
	const q = s[0];
	if (s.length >= 2 && (q === '"' || q === "'") && s.endsWith(q)) {
		return s.slice(1, -1);
	}
	return s;
}
