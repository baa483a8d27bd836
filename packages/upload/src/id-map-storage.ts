/**
 * Durable storage for the id map and the upload journal.
 *
 * @module
 */

import { readFile, rename, rm, writeFile } from "node:fs/promises"

export interface IdMapStorage {
	/** Read the stored text, or `null` when nothing was stored yet. */
	read(): Promise<string | null>
	/** Replace the stored text. A crash while writing leaves the old text. */
	writeAtomic(data: string): Promise<void>
	remove(): Promise<void>
}

function isNotFound(error: unknown) {
	return error instanceof Error && "code" in error && error.code === "ENOENT"
}

/**
 * Stores text in a file. Writes go to `<path>.tmp` first, which is then
 * renamed over `<path>`.
 */
export class FileStorage implements IdMapStorage {
	constructor(readonly path: string) {}

	async read() {
		try {
			return await readFile(this.path, "utf8")
		} catch (error) {
			if (isNotFound(error)) return null
			throw error
		}
	}

	async writeAtomic(data: string) {
		const tmpPath = `${this.path}.tmp`
		await writeFile(tmpPath, data, "utf8")
		await rename(tmpPath, this.path)
	}

	async remove() {
		await rm(this.path, { force: true })
	}
}

/**
 * Keeps text in memory. Counts writes so tests can check when data was
 * persisted.
 */
export class MemoryStorage implements IdMapStorage {
	writes = 0

	constructor(public data: string | null = null) {}

	async read() {
		return this.data
	}

	async writeAtomic(data: string) {
		this.writes++
		this.data = data
	}

	async remove() {
		this.data = null
	}
}
