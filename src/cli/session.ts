import { Engine } from '@core/engine';
import { childLogger, isLogLevel, type LogLevel, setLogLevel } from '@obs/logger';
import { type LoadResult, loadConfig, resolveSettings } from '@store/config';
import type { EngineSettings } from '@store/schema';
import { getUserDocsiftDir } from '@util/paths';

export interface SessionOptions {
	cwd?: string;
	userDir?: string;
	/** From `--log-level`; wins over LOG_LEVEL and the config file. */
	logLevel?: string;
	/** `null` keeps the index in memory only. */
	indexPath?: string | null;
}

export function resolveLogLevel(
	flag: string | undefined,
	env: string | undefined,
	configured: LogLevel | undefined
): LogLevel {
	for (const candidate of [flag, env, configured]) {
		if (isLogLevel(candidate)) {
			return candidate;
		}
	}
	return 'info';
}

export interface LoadedSettings {
	settings: EngineSettings;
	warnings: string[];
	userPath?: string;
	projectPath?: string;
}

/** Merged, validated settings; a broken config file degrades to defaults. */
export function loadSettings(cwd: string, userDir: string): LoadedSettings {
	let loaded: LoadResult = { merged: {} };
	const warnings: string[] = [];
	try {
		loaded = loadConfig(cwd, userDir);
	} catch (e) {
		warnings.push(
			`config: unreadable (${e instanceof Error ? e.message : String(e)})`
		);
	}
	const resolved = resolveSettings(loaded.merged);
	return {
		settings: resolved.settings,
		warnings: [...warnings, ...resolved.warnings],
		userPath: loaded.userPath,
		projectPath: loaded.projectPath,
	};
}

/** Settings, log level and a loaded engine for one CLI invocation. */
export async function openSession(opts: SessionOptions = {}): Promise<Engine> {
	const cwd = opts.cwd ?? process.cwd();
	const { settings, warnings } = loadSettings(
		cwd,
		opts.userDir ?? getUserDocsiftDir()
	);
	setLogLevel(
		resolveLogLevel(opts.logLevel, process.env.LOG_LEVEL, settings.logging.level)
	);
	const log = childLogger({ component: 'cli' });
	for (const w of warnings) {
		log.warn({ msg: 'config.invalid', detail: w });
	}
	return await Engine.open({
		settings,
		cwd,
		...(opts.indexPath === undefined ? {} : { indexPath: opts.indexPath }),
	});
}
