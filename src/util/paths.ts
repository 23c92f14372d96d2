import os from 'node:os';
import path from 'node:path';

export const INDEX_FILE_NAME = 'index.v1.json';

export function getProjectDocsiftDir(cwd = process.cwd()) {
	return path.join(cwd, '.docsift');
}

export function getUserDocsiftDir() {
	return path.join(os.homedir(), '.docsift');
}

export function defaultIndexPath(cwd = process.cwd()): string {
	return path.join(getProjectDocsiftDir(cwd), INDEX_FILE_NAME);
}

/** Canonical form of a source path: absolute, normalized, POSIX separators. */
export function canonicalSourcePath(p: string, cwd = process.cwd()): string {
	return path.resolve(cwd, p).split(path.sep).join('/');
}
