/**
 * General OSM entity utilities.
 *
 * @module
 */

/**
 * Placeholder ids are negative. The server replaces them with permanent ids
 * when the entity is created.
 */
export function isPlaceholderId(id: number) {
	return id < 0
}

/** Message of a caught value, which is not always an `Error`. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
