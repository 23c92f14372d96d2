export interface ErrorInfo {
	code: string;
	message: string;
}

/** One block of text per command line; failures are data, never thrown. */
export interface CommandResult {
	ok: boolean;
	verb: string;
	text: string;
	error?: ErrorInfo;
}

export interface CommandSpec<Ctx = unknown> {
	id: string;
	aliases?: string[];
	synopsis: string;
	summary: string;
	/** `rest` is the raw argument tail after the verb, already trimmed. */
	handler: (rest: string, ctx: Ctx) => Promise<string> | string;
}

export interface ParsedCommand {
	verb: string;
	rest: string;
}
