import { EngineError, UnknownCommandError } from '@core/errors';
import { childLogger } from '@obs/logger';
import { closestVerbs, type VerbKey } from './errors';
import { parseCommand } from './parser';
import type { CommandResult, CommandSpec } from './types';

/**
 * Verb table plus dispatch. Holds no engine state: the context is handed in
 * on every call.
 */
export class CommandRegistry<Ctx = unknown> {
	private readonly byId = new Map<string, CommandSpec<Ctx>>();
	private readonly alias = new Map<string, string>();
	private readonly log = childLogger({ component: 'router' });

	register(spec: CommandSpec<Ctx>): void {
		const id = spec.id.trim().toLowerCase();
		if (!id) {
			throw new Error('Command id must be non-empty');
		}
		if (this.byId.has(id) || this.alias.has(id)) {
			throw new Error(`Command '${id}' already registered`);
		}
		this.byId.set(id, spec);
		for (const a of spec.aliases ?? []) {
			const key = a.trim().toLowerCase();
			if (this.alias.has(key) || this.byId.has(key)) {
				throw new Error(
					`Alias '${key}' for '${id}' conflicts with existing id/alias`
				);
			}
			this.alias.set(key, id);
		}
	}

	get(idOrAlias: string): CommandSpec<Ctx> | undefined {
		const key = idOrAlias.toLowerCase();
		return this.byId.get(this.alias.get(key) ?? key);
	}

	list(): CommandSpec<Ctx>[] {
		return Array.from(this.byId.values());
	}

	verbs(): string[] {
		return Array.from(this.byId.keys());
	}

	/** Parse and run one command line. Never throws. */
	async dispatch(line: string, ctx: Ctx): Promise<CommandResult> {
		let verb = '';
		try {
			const parsed = parseCommand(line);
			verb = parsed.verb;
			const spec = this.get(verb);
			if (!spec) {
				throw new UnknownCommandError(
					verb,
					this.verbs(),
					closestVerbs(this.keys(), verb)
				);
			}
			verb = spec.id;
			this.log.debug({ msg: 'command.start', verb, rest: parsed.rest });
			const text = await spec.handler(parsed.rest, ctx);
			return { ok: true, verb, text };
		} catch (e) {
			return this.failure(verb, e);
		}
	}

	private keys(): VerbKey[] {
		const out: VerbKey[] = [];
		for (const spec of this.byId.values()) {
			out.push({ key: spec.id, id: spec.id });
			for (const a of spec.aliases ?? []) {
				out.push({ key: a, id: spec.id });
			}
		}
		return out;
	}

	private failure(verb: string, e: unknown): CommandResult {
		if (e instanceof EngineError) {
			const error = { code: e.code, message: e.message };
			if (e.code === 'EmptyQuery') {
				return { ok: true, verb, text: 'No results.', error };
			}
			this.log.warn({ msg: 'command.failed', verb, code: e.code, error: e.message });
			return { ok: false, verb, text: e.message, error };
		}
		this.log.error({ msg: 'command.crashed', verb, error: e });
		const message = e instanceof Error ? e.message : String(e);
		return {
			ok: false,
			verb,
			text: `Internal error: ${message}`,
			error: { code: 'EINTERNAL', message },
		};
	}
}
