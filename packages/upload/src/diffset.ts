import { progressEvent } from "@osmbulk/shared/progress"
import type { OsmDiff, OsmEdit } from "@osmbulk/shared/types"
import type { AddResult, UploadContext } from "./types"

/**
 * One diff upload to an open changeset. Collects creates, modifies and deletes
 * until it holds `diffsetSize` edits, then uploads itself. Once uploaded it is
 * closed and takes no more edits.
 */
export class OsmDiffset {
	readonly diff: OsmDiff = { create: [], modify: [], delete: [] }
	count = 0
	closed = false

	constructor(
		readonly changesetId: number,
		private readonly context: UploadContext,
	) {}

	async add(edit: OsmEdit): Promise<AddResult> {
		if (this.closed) return "closed"
		this.diff[edit.action].push(edit)
		this.count++
		if (this.count >= this.context.limits.diffsetSize) await this.upload()
		return "added"
	}

	/**
	 * Upload the collected edits and record the ids the server assigned. The id
	 * map is persisted once all results are recorded. Does nothing when the
	 * diffset is empty or already uploaded.
	 */
	async upload() {
		if (this.count === 0 || this.closed) return
		const { transport, idMap, journal, stats, onProgress } = this.context

		onProgress(
			progressEvent(
				`Uploading ${this.count} edits to changeset ${this.changesetId}`,
			),
		)
		await journal?.begin({
			changesetId: this.changesetId,
			create: this.diff.create.length,
			modify: this.diff.modify.length,
			delete: this.diff.delete.length,
			startedAt: new Date().toISOString(),
		})

		const results = await transport.uploadDiff(this.changesetId, this.diff)
		for (const result of results) {
			if (result.newId === undefined) {
				idMap.recordDeleted(result.type, result.oldId)
			} else {
				idMap.record(result.type, result.oldId, result.newId)
			}
		}
		await idMap.persist()
		await journal?.clear()

		this.closed = true
		stats.diffsetsUploaded++
		stats.editsUploaded += this.count
	}
}
