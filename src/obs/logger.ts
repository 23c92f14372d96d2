import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const MAX_LOGGED_STRING = 160;

export function isLogLevel(value: unknown): value is LogLevel {
	return (
		typeof value === 'string' &&
		(LOG_LEVELS as readonly string[]).includes(value)
	);
}

// Chunk text and query strings can be large; keep log lines short.
function truncateDeep(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.length > MAX_LOGGED_STRING
			? `${value.slice(0, MAX_LOGGED_STRING)}…(${value.length} chars)`
			: value;
	}
	if (value && typeof value === 'object') {
		if (value instanceof Error) {
			return { name: value.name, message: value.message, stack: value.stack };
		}
		if (Array.isArray(value)) {
			return value.map(truncateDeep);
		}
		const out: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			out[k] = truncateDeep(v);
		}
		return out;
	}
	return value;
}

const truncateFormat = winston.format((info) => {
	const clone = { ...info };
	for (const k of Object.keys(clone)) {
		if (k !== 'level' && k !== 'timestamp') {
			clone[k] = truncateDeep(clone[k]);
		}
	}
	return clone;
});

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL)
	? process.env.LOG_LEVEL
	: 'info';
let baseLogger: winston.Logger | null = null;

function buildLogger(level: LogLevel): winston.Logger {
	return winston.createLogger({
		level,
		levels: winston.config.npm.levels,
		format: winston.format.combine(
			truncateFormat(),
			winston.format.timestamp(),
			winston.format.json()
		),
		transports: [
			// stdout carries command results; every log level goes to stderr
			new winston.transports.Console({
				stderrLevels: [...LOG_LEVELS],
			}),
		],
	});
}

export function setLogLevel(level: LogLevel) {
	currentLevel = level;
	// children are prototype-linked to the base logger, so mutate it in place
	if (baseLogger) {
		baseLogger.level = level;
	} else {
		baseLogger = buildLogger(level);
	}
}

export function getLogger(): winston.Logger {
	if (!baseLogger) {
		baseLogger = buildLogger(currentLevel);
	}
	return baseLogger;
}

export function childLogger(
	bindings: Record<string, unknown> = {}
): winston.Logger {
	return getLogger().child(bindings);
}
