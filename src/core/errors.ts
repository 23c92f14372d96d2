export type EngineErrorCode =
	| 'UnreadableSource'
	| 'UnsupportedFormat'
	| 'IndexCorrupted'
	| 'UnknownCommand'
	| 'EmptyQuery'
	| 'InvalidArguments'
	| 'PersistenceFailed';

export class EngineError extends Error {
	constructor(
		public readonly code: EngineErrorCode,
		message: string
	) {
		super(message);
		this.name = 'EngineError';
	}
}

export class UnreadableSourceError extends EngineError {
	constructor(
		public readonly sourcePath: string,
		cause: unknown
	) {
		super(
			'UnreadableSource',
			`Cannot read ${sourcePath}: ${cause instanceof Error ? cause.message : String(cause)}`
		);
		this.name = 'UnreadableSourceError';
		this.cause = cause;
	}
}

export class UnsupportedFormatError extends EngineError {
	constructor(public readonly sourcePath: string) {
		super('UnsupportedFormat', `No indexable text in ${sourcePath}`);
		this.name = 'UnsupportedFormatError';
	}
}

export class IndexCorruptedError extends EngineError {
	constructor(
		public readonly artifactPath: string,
		public readonly reason: string
	) {
		super('IndexCorrupted', `Index at ${artifactPath} is corrupted: ${reason}`);
		this.name = 'IndexCorruptedError';
	}
}

export class UnknownCommandError extends EngineError {
	constructor(
		public readonly verb: string,
		public readonly validVerbs: string[],
		public readonly suggestions: string[] = []
	) {
		const hint = suggestions.length
			? ` Did you mean: ${suggestions.join(', ')}?`
			: '';
		super(
			'UnknownCommand',
			`Unknown command '${verb}'.${hint} Valid commands: ${validVerbs.join(', ')}`
		);
		this.name = 'UnknownCommandError';
	}
}

export class EmptyQueryError extends EngineError {
	constructor() {
		super('EmptyQuery', 'Query has no searchable terms');
		this.name = 'EmptyQueryError';
	}
}

export class InvalidArgumentsError extends EngineError {
	constructor(
		public readonly verb: string,
		public readonly usage: string
	) {
		super('InvalidArguments', `Invalid arguments for ${verb}. Usage: ${usage}`);
		this.name = 'InvalidArgumentsError';
	}
}

export class PersistenceFailedError extends EngineError {
	constructor(
		public readonly artifactPath: string,
		cause: unknown
	) {
		super(
			'PersistenceFailed',
			`Failed to write ${artifactPath}: ${cause instanceof Error ? cause.message : String(cause)}`
		);
		this.name = 'PersistenceFailedError';
		this.cause = cause;
	}
}
