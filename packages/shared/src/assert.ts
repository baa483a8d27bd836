/**
 * Assertion utilities for invariant guards.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @example
 * ```ts
 * const relation = relations.get(id)
 * assertValue(relation, `Relation ${id} is not part of the upload`)
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}
