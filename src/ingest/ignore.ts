import fs from 'node:fs';
import path from 'node:path';
import ignore, { type Ignore } from 'ignore';

// Never index VCS metadata, dependency trees or the engine's own artifacts.
export const BUILTIN_IGNORES = ['.git/', 'node_modules/', '.docsift/'];

export interface IgnoreFilterOptions {
	rootDir: string;
	useGitIgnore?: boolean;
	patterns?: string[];
	gitignorePath?: string; // override for tests
}

export type PathFilter = (absOrRelPath: string, isDir?: boolean) => boolean;

/** Returns a predicate that is true for paths that should be ingested. */
export function buildIgnoreFilter(opts: IgnoreFilterOptions): PathFilter {
	const rootDir = path.resolve(opts.rootDir);
	const ig: Ignore = ignore().add(BUILTIN_IGNORES);

	if (opts.useGitIgnore !== false) {
		const gitignore =
			opts.gitignorePath ?? path.join(rootDir, '.gitignore');
		if (fs.existsSync(gitignore)) {
			ig.add(fs.readFileSync(gitignore, 'utf8'));
		}
	}

	if (opts.patterns?.length) {
		ig.add(opts.patterns);
	}

	const toRelPosix = (p: string, isDir?: boolean): string => {
		const abs = path.isAbsolute(p) ? p : path.join(rootDir, p);
		const rel = path.relative(rootDir, abs);
		// ignore() wants POSIX relative paths, directories with a trailing slash
		const posix = rel.split(path.sep).join('/');
		return isDir && posix && !posix.endsWith('/') ? `${posix}/` : posix;
	};

	return (absOrRelPath: string, isDir?: boolean): boolean => {
		const rel = toRelPosix(absOrRelPath, isDir);
		// the root itself, or anything outside it, is not subject to the rules
		if (!rel || rel.startsWith('../')) {
			return true;
		}
		return !ig.ignores(rel);
	};
}
