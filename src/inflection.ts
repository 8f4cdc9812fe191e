/**
 * Naive English singularization for table names (`customers` → `customer`).
 * Keeps the input's casing, so `CATEGORIES` becomes `CATEGORY`.
 */
export function singularize(word: string): string {
	const lower = word.toLowerCase();

	if (lower.length > 3 && lower.endsWith("ies")) {
		return word.slice(0, -3) + matchCase("y", word.slice(-3));
	}
	if (/(ss|sh|ch|x|z)es$/.test(lower)) {
		return word.slice(0, -2);
	}
	if (lower.endsWith("s") && !/(ss|us|is)$/.test(lower) && lower.length > 1) {
		return word.slice(0, -1);
	}
	return word;
}

function matchCase(replacement: string, sample: string): string {
	return sample === sample.toUpperCase() ? replacement.toUpperCase() : replacement;
}
