/**
 * Normalize a string for matching (lowercase, remove punctuation, normalize spaces)
 */
export function normalizeForMatching(str: string): string {
	return str
		.toLowerCase()
		.replace(/[^\p{L}\p{N}\s]/gu, "")
		.replace(/\s+/g, " ")
		.trim();
}

function bigrams(str: string): Set<string> {
	const result = new Set<string>();
	for (let i = 0; i < str.length - 1; i++) {
		result.add(str.substring(i, i + 2));
	}
	return result;
}

/**
 * Dice coefficient over the character bigrams of two normalized strings,
 * from 0 (nothing shared) to 1 (identical)
 */
export function similarity(a: string, b: string): number {
	const s1 = normalizeForMatching(a);
	const s2 = normalizeForMatching(b);
	if (s1 === "" || s2 === "") return 0;
	if (s1 === s2) return 1;
	if (s1.length < 2 || s2.length < 2) return 0;

	const bigrams1 = bigrams(s1);
	const bigrams2 = bigrams(s2);
	let intersection = 0;
	for (const bigram of bigrams1) {
		if (bigrams2.has(bigram)) intersection++;
	}
	return (2 * intersection) / (bigrams1.size + bigrams2.size);
}

/**
 * The string a song is identified by when looking for duplicates
 */
export function identityOf(artist: string | undefined, title: string | undefined): string {
	return normalizeForMatching([artist, title].filter((part) => part !== undefined && part !== "").join(" "));
}
