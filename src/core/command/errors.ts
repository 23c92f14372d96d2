function levenshtein(a: string, b: string): number {
	const m = a.length;
	const n = b.length;
	const dp: number[][] = Array.from({ length: m + 1 }, () =>
		new Array<number>(n + 1).fill(0)
	);
	for (let i = 0; i <= m; i++) {
		dp[i][0] = i;
	}
	for (let j = 0; j <= n; j++) {
		dp[0][j] = j;
	}
	for (let i = 1; i <= m; i++) {
		for (let j = 1; j <= n; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			dp[i][j] = Math.min(
				dp[i - 1][j] + 1, // deletion
				dp[i][j - 1] + 1, // insertion
				dp[i - 1][j - 1] + cost // substitution
			);
		}
	}
	return dp[m][n];
}

export interface VerbKey {
	key: string; // id or alias
	id: string;
}

/**
 * Closest verb ids by edit distance, nearest first. Keys further away than
 * half the target's length (at least 2) are not suggested.
 */
export function closestVerbs(
	keys: VerbKey[],
	target: string,
	limit = 3
): string[] {
	const t = target.toLowerCase();
	const maxDistance = Math.max(2, Math.ceil(t.length / 2));
	const scored = keys
		.map((k) => ({ id: k.id, d: levenshtein(k.key.toLowerCase(), t) }))
		.filter((s) => s.d <= maxDistance)
		.sort((x, y) => x.d - y.d);
	const out: string[] = [];
	for (const s of scored) {
		if (!out.includes(s.id)) {
			out.push(s.id);
		}
		if (out.length >= limit) {
			break;
		}
	}
	return out;
}
