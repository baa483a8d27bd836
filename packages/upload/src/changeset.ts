import { assertValue } from "@osmbulk/shared/assert"
import { progressEvent } from "@osmbulk/shared/progress"
import type { OsmEdit, OsmTags } from "@osmbulk/shared/types"
import { OsmDiffset } from "./diffset"
import { TransportError } from "./errors"
import type { AddResult, UploadContext } from "./types"

export type ChangesetState = "unopened" | "open" | "closed"

/**
 * A changeset on the server, filled through a sequence of diffsets.
 *
 * The changeset is opened by its first edit, so an upload without edits never
 * creates one. When it holds `changesetSize` edits it uploads its diffset and
 * closes itself; further edits are answered with `"closed"`.
 */
export class OsmUploadChangeset {
	id: number | null = null
	state: ChangesetState = "unopened"
	count = 0

	private diffset: OsmDiffset | null = null

	constructor(
		readonly tags: OsmTags,
		private readonly context: UploadContext,
	) {}

	async open() {
		const id = await this.context.transport.createChangeset(this.tags)
		this.id = id
		this.state = "open"
		this.diffset = new OsmDiffset(id, this.context)
		this.context.stats.changesetsUsed++
		this.context.onProgress(progressEvent(`Created changeset ${id}`))
	}

	/**
	 * Add an edit to the current diffset, stamping it with this changeset's id.
	 */
	async add(edit: OsmEdit): Promise<AddResult> {
		if (this.state === "closed") return "closed"
		if (this.state === "unopened") await this.open()
		const { id, diffset } = this
		assertValue(id, "Changeset is open without an id")
		assertValue(diffset, "Changeset is open without a diffset")

		edit.entity.info = { ...edit.entity.info, changeset: id }

		let current = diffset
		if ((await current.add(edit)) === "closed") {
			current = new OsmDiffset(id, this.context)
			this.diffset = current
			if ((await current.add(edit)) === "closed") {
				throw Error(`New diffset of changeset ${id} refused an edit`)
			}
		}

		this.count++
		if (this.count >= this.context.limits.changesetSize) {
			await current.upload()
			await this.close()
		}
		return "added"
	}

	/**
	 * Upload the remaining edits and close the changeset on the server. A
	 * failed close request is reported and not retried; the changeset counts
	 * as closed either way. Does nothing if the changeset was never opened.
	 */
	async close() {
		if (this.state !== "open") return
		const { id } = this
		assertValue(id, "Changeset is open without an id")
		try {
			await this.diffset?.upload()
			await this.closeOnServer(id)
		} finally {
			this.state = "closed"
		}
	}

	private async closeOnServer(id: number) {
		const { transport, onProgress } = this.context
		try {
			await transport.closeChangeset(id)
			onProgress(progressEvent(`Closed changeset ${id}`))
		} catch (error) {
			if (!(error instanceof TransportError)) throw error
			onProgress(
				progressEvent(`Error closing changeset ${id}: ${error.message}`, "error"),
			)
		}
	}
}
