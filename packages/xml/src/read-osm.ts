/**
 * Read JOSM-style `.osm` XML documents into upload edits.
 *
 * Entities are returned grouped by type in document order: all nodes, then all
 * ways, then all relations. An entity's `action` attribute selects the edit
 * action and defaults to `create`.
 *
 * osmChange documents, and `.osm` documents that carry osmChange sections, are
 * flagged with `isChange` instead of being read.
 *
 * @module
 */

import { InputError } from "@osmbulk/shared/errors"
import type {
	OsmEdit,
	OsmInfoParsed,
	OsmNode,
	OsmRelation,
	OsmTags,
	OsmUploadDocument,
	OsmWay,
} from "@osmbulk/shared/types"
import { z } from "zod"
import {
	describeIssues,
	parseXml,
	type RawTag,
	RawNodeSchema,
	RawRelationSchema,
	RawWaySchema,
} from "./schemas"

/** Sections that only appear in osmChange documents. */
export const OSM_CHANGE_SECTIONS = ["create", "modify", "delete", "add"] as const

const OsmRootSchema = z.object({
	node: z.array(RawNodeSchema).optional(),
	way: z.array(RawWaySchema).optional(),
	relation: z.array(RawRelationSchema).optional(),
})

function rawTagsToOsmTags(tags?: RawTag[]): OsmTags | undefined {
	if (!tags || tags.length === 0) return undefined
	const osmTags: OsmTags = {}
	for (const { k, v } of tags) osmTags[k] = v
	return osmTags
}

function rawInfo(version?: number): OsmInfoParsed | undefined {
	return version === undefined ? undefined : { version }
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Read an `.osm` XML string.
 *
 * @throws InputError when the root element is neither `<osm>` nor
 * `<osmChange>`, or when an entity is malformed.
 *
 * @example
 * ```ts
 * const document = readOsmXml(await readFile("import.osm", "utf8"))
 * if (document.isChange) throw Error("osmChange files cannot be uploaded")
 * ```
 */
export function readOsmXml(xml: string): OsmUploadDocument {
	const parsed = parseXml(xml)
	if (!isRecord(parsed)) throw new InputError("Empty XML document")
	if ("osmChange" in parsed) return { isChange: true, edits: [] }
	if (!("osm" in parsed)) {
		throw new InputError("Input file must be a .osm XML file (JOSM-style)")
	}

	// An empty `<osm/>` element is parsed as an empty string
	const root = isRecord(parsed["osm"]) ? parsed["osm"] : {}
	if (OSM_CHANGE_SECTIONS.some((section) => section in root)) {
		return { isChange: true, edits: [] }
	}

	const result = OsmRootSchema.safeParse(root)
	if (!result.success) {
		throw new InputError(`Invalid .osm document: ${describeIssues(result.error)}`)
	}

	const edits: OsmEdit[] = []
	for (const raw of result.data.node ?? []) {
		const node: OsmNode = {
			id: raw.id,
			lat: raw.lat,
			lon: raw.lon,
		}
		const tags = rawTagsToOsmTags(raw.tag)
		if (tags) node.tags = tags
		const info = rawInfo(raw.version)
		if (info) node.info = info
		edits.push({ type: "node", action: raw.action ?? "create", entity: node })
	}
	for (const raw of result.data.way ?? []) {
		const way: OsmWay = {
			id: raw.id,
			refs: (raw.nd ?? []).map((nd) => nd.ref),
		}
		const tags = rawTagsToOsmTags(raw.tag)
		if (tags) way.tags = tags
		const info = rawInfo(raw.version)
		if (info) way.info = info
		edits.push({ type: "way", action: raw.action ?? "create", entity: way })
	}
	for (const raw of result.data.relation ?? []) {
		const relation: OsmRelation = {
			id: raw.id,
			members: (raw.member ?? []).map((member) =>
				member.role
					? { type: member.type, ref: member.ref, role: member.role }
					: { type: member.type, ref: member.ref },
			),
		}
		const tags = rawTagsToOsmTags(raw.tag)
		if (tags) relation.tags = tags
		const info = rawInfo(raw.version)
		if (info) relation.info = info
		edits.push({
			type: "relation",
			action: raw.action ?? "create",
			entity: relation,
		})
	}

	return { isChange: false, edits }
}
