import fs, { type Dirent } from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import { UnreadableSourceError } from '@core/errors';
import { buildIgnoreFilter, type PathFilter } from '@ingest/ignore';
import { canonicalSourcePath } from '@util/paths';

export type SkipReason = 'missing' | 'oversize' | 'maxFiles' | 'io-error';

export interface SourceFile {
	absPath: string;
	canonicalPath: string;
	bytes: number;
}

export interface SkippedSource {
	absPath: string;
	reason: SkipReason;
	message: string;
}

export interface DiscoveryOptions {
	useGitIgnore?: boolean;
	patterns?: string[];
	maxFileSize: number; // bytes; 0 disables the check
	maxFiles?: number;
}

export interface DiscoveryResult {
	files: SourceFile[];
	skipped: SkippedSource[];
}

function listAllFiles(
	start: string,
	ignoreFilter: PathFilter,
	skipped: SkippedSource[]
): string[] {
	const results: string[] = [];

	function walk(dir: string) {
		let entries: Dirent[];
		try {
			entries = fs.readdirSync(dir, { withFileTypes: true });
		} catch (e) {
			// one unreadable directory does not stop the rest of the walk
			skipped.push({
				absPath: dir,
				reason: 'io-error',
				message: new UnreadableSourceError(dir, e).message,
			});
			return;
		}
		entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
		for (const e of entries) {
			const abs = path.join(dir, e.name);
			if (e.isSymbolicLink()) {
				// not followed, avoids cycles and escapes from the root
				continue;
			}
			if (e.isDirectory()) {
				if (ignoreFilter(abs, true)) {
					walk(abs);
				}
			} else if (e.isFile() && ignoreFilter(abs, false)) {
				results.push(abs);
			}
		}
	}

	walk(start);
	return results;
}

/**
 * Resolve an `add` target into the ordered list of files to ingest. A file
 * target is taken as-is; a directory is walked in name order honoring
 * .gitignore and the configured patterns.
 */
export function discoverSources(
	target: string,
	opts: DiscoveryOptions,
	cwd = process.cwd()
): DiscoveryResult {
	const abs = path.resolve(cwd, target);
	const skipped: SkippedSource[] = [];

	let discovered: string[];
	try {
		const st = fs.statSync(abs);
		if (st.isDirectory()) {
			const filter = buildIgnoreFilter({
				rootDir: abs,
				useGitIgnore: opts.useGitIgnore,
				patterns: opts.patterns,
			});
			discovered = listAllFiles(abs, filter, skipped);
		} else {
			discovered = [abs];
		}
	} catch (e) {
		skipped.push({
			absPath: abs,
			reason: 'missing',
			message: new UnreadableSourceError(abs, e).message,
		});
		return { files: [], skipped };
	}

	const cap =
		typeof opts.maxFiles === 'number' && opts.maxFiles > 0
			? opts.maxFiles
			: discovered.length;

	const files: SourceFile[] = [];
	discovered.forEach((p, i) => {
		if (i >= cap) {
			skipped.push({
				absPath: p,
				reason: 'maxFiles',
				message: `Skipped ${p}: over the maxFiles limit (${cap})`,
			});
			return;
		}
		let bytes: number;
		try {
			bytes = fs.statSync(p).size;
		} catch (e) {
			skipped.push({
				absPath: p,
				reason: 'io-error',
				message: new UnreadableSourceError(p, e).message,
			});
			return;
		}
		if (opts.maxFileSize > 0 && bytes > opts.maxFileSize) {
			skipped.push({
				absPath: p,
				reason: 'oversize',
				message: `Skipped ${p}: ${bytes} bytes exceeds maxFileSize (${opts.maxFileSize})`,
			});
			return;
		}
		files.push({ absPath: p, canonicalPath: canonicalSourcePath(p), bytes });
	});

	return { files, skipped };
}

/** Read raw bytes of one source; failures become UnreadableSourceError. */
export async function readSource(absPath: string): Promise<Buffer> {
	try {
		return await fsp.readFile(absPath);
	} catch (e) {
		throw new UnreadableSourceError(absPath, e);
	}
}
