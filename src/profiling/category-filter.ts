/**
 * Category filtering with exact and prefix patterns.
 *
 * A pattern ending in `*` matches every category starting with the part
 * before the asterisk; any other pattern must equal the category.
 *
 * @module profiling/category-filter
 */

/** Anything with a dotted category */
export interface Categorized {
	readonly category: string
}

/**
 * Whether a category matches a pattern.
 *
 * @example
 * ```typescript
 * matchesCategory("db.query", "db.*") // true
 * matchesCategory("db.query", "db") // false
 * matchesCategory("db.query", "db.query") // true
 * ```
 */
export function matchesCategory(category: string, pattern: string): boolean {
	if (pattern.endsWith('*')) {
		return category.startsWith(pattern.replace(/\*+$/, ''))
	}
	return category === pattern
}

/**
 * Whether a category passes an include list and an exclude list.
 *
 * An empty include list matches every category.
 */
export function isCategoryIncluded(
	category: string,
	include: readonly string[] = [],
	exclude: readonly string[] = [],
): boolean {
	const included =
		include.length === 0 ||
		include.some((pattern) => matchesCategory(category, pattern))
	return included && !exclude.some((pattern) => matchesCategory(category, pattern))
}

/**
 * Keep the items whose category passes the include and exclude lists,
 * preserving input order.
 */
export function filterByCategory<T extends Categorized>(
	items: readonly T[],
	include: readonly string[] = [],
	exclude: readonly string[] = [],
): T[] {
	if (include.length === 0 && exclude.length === 0) return [...items]
	return items.filter((item) => isCategoryIncluded(item.category, include, exclude))
}
