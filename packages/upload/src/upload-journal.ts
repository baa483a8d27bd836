/**
 * Marker for a diffset that was sent but whose results are not persisted yet.
 *
 * The marker is written before each diff upload and removed once the id map
 * holds the results. A marker left behind by a previous run means the server
 * may have accepted edits whose ids were never recorded, so running again
 * could create them a second time.
 *
 * @module
 */

import { z } from "zod"
import type { IdMapStorage } from "./id-map-storage"

const PendingUploadSchema = z.object({
	changesetId: z.number().int(),
	create: z.number().int(),
	modify: z.number().int(),
	delete: z.number().int(),
	startedAt: z.string(),
})

export type PendingUpload = z.infer<typeof PendingUploadSchema>

export class UploadJournal {
	constructor(readonly storage: IdMapStorage) {}

	async begin(pending: PendingUpload) {
		await this.storage.writeAtomic(JSON.stringify(pending))
	}

	async clear() {
		await this.storage.remove()
	}

	/**
	 * Read the marker of an unfinished upload. An unreadable marker is still
	 * reported, with unknown counts.
	 */
	async read(): Promise<PendingUpload | null> {
		const data = await this.storage.read()
		if (data === null) return null
		try {
			const result = PendingUploadSchema.safeParse(JSON.parse(data))
			if (result.success) return result.data
		} catch (error) {
			if (!(error instanceof SyntaxError)) throw error
		}
		return { changesetId: -1, create: 0, modify: 0, delete: 0, startedAt: "" }
	}
}
