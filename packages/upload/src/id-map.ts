/**
 * Mapping from source ids to the permanent ids assigned by the server.
 *
 * An id is recorded once, when the server accepts the diffset that contained
 * it, and is never overwritten. Entities whose source id is mapped are skipped
 * by later runs, which makes uploads resumable.
 *
 * The map is stored as JSON:
 *
 * ```json
 * { "node": { "-1": 4001 }, "way": { "-10": 900 }, "relation": {} }
 * ```
 *
 * @module
 */

import {
	logProgress,
	type OnProgress,
	progressEvent,
} from "@osmbulk/shared/progress"
import { OSM_ENTITY_TYPES, type OsmEntityType } from "@osmbulk/shared/types"
import { errorMessage } from "@osmbulk/shared/utils"
import { z } from "zod"
import { IdConflictError } from "./errors"
import type { IdMapStorage } from "./id-map-storage"

const IdTableSchema = z.record(
	z.string().regex(/^-?\d+$/),
	z.number().int(),
)

const IdMapSchema = z.object({
	node: IdTableSchema.default({}),
	way: IdTableSchema.default({}),
	relation: IdTableSchema.default({}),
})

export type IdMapJson = z.infer<typeof IdMapSchema>

export class OsmIdMap {
	private ids: Record<OsmEntityType, Map<number, number>> = {
		node: new Map(),
		way: new Map(),
		relation: new Map(),
	}

	constructor(
		readonly storage: IdMapStorage,
		private readonly onProgress: OnProgress = logProgress,
	) {}

	/**
	 * Create an id map and restore it from storage.
	 */
	static async load(storage: IdMapStorage, onProgress?: OnProgress) {
		const idMap = new OsmIdMap(storage, onProgress)
		await idMap.load()
		return idMap
	}

	get(type: OsmEntityType, sourceId: number): number | undefined {
		return this.ids[type].get(sourceId)
	}

	has(type: OsmEntityType, sourceId: number) {
		return this.ids[type].has(sourceId)
	}

	size(type?: OsmEntityType) {
		if (type) return this.ids[type].size
		return OSM_ENTITY_TYPES.reduce((total, t) => total + this.ids[t].size, 0)
	}

	/**
	 * Record the permanent id of a source id. Recording the same pair again is
	 * a no-op.
	 *
	 * @throws IdConflictError when the source id is mapped to another id.
	 */
	record(type: OsmEntityType, sourceId: number, permanentId: number) {
		const existing = this.ids[type].get(sourceId)
		if (existing === undefined) {
			this.ids[type].set(sourceId, permanentId)
		} else if (existing !== permanentId) {
			throw new IdConflictError(type, sourceId, existing, permanentId)
		}
	}

	/**
	 * Record a confirmed deletion. The id is mapped to itself so it counts as
	 * processed.
	 */
	recordDeleted(type: OsmEntityType, sourceId: number) {
		this.record(type, sourceId, sourceId)
	}

	toJSON(): IdMapJson {
		return {
			node: Object.fromEntries(this.ids.node),
			way: Object.fromEntries(this.ids.way),
			relation: Object.fromEntries(this.ids.relation),
		}
	}

	async persist() {
		await this.storage.writeAtomic(JSON.stringify(this.toJSON()))
	}

	/**
	 * Replace the map with the stored one. A missing, unreadable or invalid
	 * store leaves the map empty.
	 */
	async load() {
		for (const type of OSM_ENTITY_TYPES) this.ids[type] = new Map()

		let data: string | null
		try {
			data = await this.storage.read()
		} catch (error) {
			this.warn(`Could not read the id map, starting empty: ${errorMessage(error)}`)
			return
		}
		if (data === null) return

		let json: unknown
		try {
			json = JSON.parse(data)
		} catch (error) {
			this.warn(`Id map is not valid JSON, starting empty: ${errorMessage(error)}`)
			return
		}
		const result = IdMapSchema.safeParse(json)
		if (!result.success) {
			this.warn("Id map has an unexpected format, starting empty")
			return
		}

		for (const type of OSM_ENTITY_TYPES) {
			for (const [sourceId, permanentId] of Object.entries(result.data[type])) {
				this.ids[type].set(Number(sourceId), permanentId)
			}
		}
		this.onProgress(
			progressEvent(
				`Loaded ${this.size("node")} node, ${this.size("way")} way and ${this.size("relation")} relation id mappings`,
			),
		)
	}

	private warn(msg: string) {
		this.onProgress(progressEvent(msg, "warn"))
	}
}
