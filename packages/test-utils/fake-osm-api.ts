import type {
	OsmChangeType,
	OsmDiff,
	OsmDiffResult,
	OsmEdit,
	OsmEntityType,
	OsmTags,
} from "@osmbulk/shared/types"
import { isPlaceholderId } from "@osmbulk/shared/utils"
import { type OsmUploadTransport, TransportError } from "@osmbulk/upload"

type FakeChangeset = {
	id: number
	tags: OsmTags
	closed: boolean
}

function placeholderRefs(edit: OsmEdit): [OsmEntityType, number][] {
	switch (edit.type) {
		case "node":
			return []
		case "way":
			return edit.entity.refs
				.filter(isPlaceholderId)
				.map((ref): [OsmEntityType, number] => ["node", ref])
		case "relation":
			return edit.entity.members
				.filter((member) => isPlaceholderId(member.ref))
				.map((member): [OsmEntityType, number] => [member.type, member.ref])
	}
}

/**
 * In-process stand-in for the OSM API. Assigns ids in sequence and, like the
 * real server, rejects placeholder references that were not created earlier in
 * the same diff.
 */
export class FakeOsmApi implements OsmUploadTransport {
	changesets: FakeChangeset[] = []
	uploads: { changesetId: number; diff: OsmDiff }[] = []
	calls: string[] = []

	failUploadAt: number | null = null
	failClose = false

	private nextChangesetId = 100
	private nextIds: Record<OsmEntityType, number> = {
		node: 1000,
		way: 2000,
		relation: 3000,
	}

	async createChangeset(tags: OsmTags) {
		const id = this.nextChangesetId++
		this.changesets.push({ id, tags, closed: false })
		this.calls.push(`create ${id}`)
		return id
	}

	async uploadDiff(changesetId: number, diff: OsmDiff) {
		this.calls.push(`upload ${changesetId}`)
		const changeset = this.changesets.find((c) => c.id === changesetId)
		if (!changeset || changeset.closed) {
			throw new TransportError(`Changeset ${changesetId} is not open`, 409)
		}
		if (this.uploads.length === this.failUploadAt) {
			throw new TransportError("Upload failed", 500, "Internal Server Error")
		}
		this.uploads.push({ changesetId, diff: structuredClone(diff) })

		const created: Record<OsmEntityType, Set<number>> = {
			node: new Set(),
			way: new Set(),
			relation: new Set(),
		}
		const results: OsmDiffResult[] = []
		const actions: OsmChangeType[] = ["create", "modify", "delete"]
		for (const action of actions) {
			for (const edit of diff[action]) {
				for (const [type, ref] of placeholderRefs(edit)) {
					if (!created[type].has(ref)) {
						throw new TransportError(
							`Placeholder ${type} ${ref} not found`,
							412,
						)
					}
				}
				const oldId = edit.entity.id
				if (action === "create") {
					created[edit.type].add(oldId)
					results.push({
						type: edit.type,
						oldId,
						newId: this.nextIds[edit.type]++,
						newVersion: 1,
					})
				} else if (action === "modify") {
					results.push({ type: edit.type, oldId, newId: oldId, newVersion: 2 })
				} else {
					results.push({ type: edit.type, oldId })
				}
			}
		}
		return results
	}

	async closeChangeset(changesetId: number) {
		this.calls.push(`close ${changesetId}`)
		if (this.failClose) throw new TransportError("Conflict", 409)
		const changeset = this.changesets.find((c) => c.id === changesetId)
		if (changeset) changeset.closed = true
	}

	/** Number of edits of each upload. */
	uploadSizes() {
		return this.uploads.map(
			({ diff }) => diff.create.length + diff.modify.length + diff.delete.length,
		)
	}
}

export function createNodes(count: number, firstId = -1): OsmEdit[] {
	return Array.from({ length: count }, (_, i) => ({
		type: "node" as const,
		action: "create" as const,
		entity: { id: firstId - i, lat: 0, lon: 0 },
	}))
}
