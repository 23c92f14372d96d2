import fs from 'node:fs';
import path from 'node:path';
import { getProjectDocsiftDir, getUserDocsiftDir } from '@util/paths';
import YAML from 'yaml';
import {
	ConfigV1Z,
	type EngineSettings,
	explainZodError,
} from './schema';

export type ConfigUnknown = Record<string, unknown>;

const CONFIG_FILENAMES = ['config.yaml', 'config.yml', 'config.json'];

export interface LoadResult {
	userPath?: string;
	projectPath?: string;
	merged: ConfigUnknown;
	user?: ConfigUnknown;
	project?: ConfigUnknown;
}

export interface ResolvedSettings {
	settings: EngineSettings;
	warnings: string[];
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
	return !!x && typeof x === 'object' && !Array.isArray(x);
}

function readMaybe(filePath: string): ConfigUnknown | undefined {
	if (!fs.existsSync(filePath)) {
		return;
	}
	const raw = fs.readFileSync(filePath, 'utf8');
	let parsed: unknown;
	if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) {
		parsed = YAML.parse(raw) ?? {};
	} else if (filePath.endsWith('.json')) {
		parsed = JSON.parse(raw);
	}
	return isPlainObject(parsed) ? parsed : undefined;
}

function findFirstExisting(baseDir: string): {
	path?: string;
	data?: ConfigUnknown;
} {
	for (const name of CONFIG_FILENAMES) {
		const p = path.join(baseDir, name);
		const data = readMaybe(p);
		if (data) {
			return { path: p, data };
		}
	}
	return {};
}

// rhs overrides lhs; arrays replaced by rhs; plain objects merged recursively.
export function deepMerge(
	lhs: Record<string, unknown>,
	rhs: Record<string, unknown>
): Record<string, unknown> {
	const out: Record<string, unknown> = { ...lhs };
	for (const [k, v] of Object.entries(rhs)) {
		const lv = out[k];
		if (isPlainObject(lv) && isPlainObject(v)) {
			out[k] = deepMerge(lv, v);
		} else {
			out[k] = v;
		}
	}
	return out;
}

export function loadConfig(
	cwd = process.cwd(),
	userDir = getUserDocsiftDir()
): LoadResult {
	const projectDir = getProjectDocsiftDir(cwd);

	const { path: userPath, data: user } = findFirstExisting(userDir);
	const { path: projectPath, data: project } = findFirstExisting(projectDir);

	let merged: ConfigUnknown = {};
	if (user) {
		merged = deepMerge(merged, user);
	}
	if (project) {
		merged = deepMerge(merged, project);
	}

	return { userPath, projectPath, merged, user, project };
}

/**
 * Validate a merged config. Anything that fails validation is replaced by
 * schema defaults and reported as a warning.
 */
export function resolveSettings(cfgUnknown: unknown): ResolvedSettings {
	const parsed = ConfigV1Z.safeParse(cfgUnknown ?? {});
	if (parsed.success) {
		return { settings: parsed.data.defaults, warnings: [] };
	}
	const warnings = explainZodError(parsed.error).map(
		(i) => `config ${i.path || '(root)'}: ${i.message}`
	);
	return { settings: ConfigV1Z.parse({}).defaults, warnings };
}
