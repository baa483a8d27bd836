/**
 * OSC (OSM Change) XML generation.
 *
 * Serializes a diff into the `<osmChange>` document accepted by
 * `POST /api/0.6/changeset/#id/upload`, and changeset tags into the
 * `<osm><changeset>` document accepted by `PUT /api/0.6/changeset/create`.
 *
 * Every element is stamped with the changeset it is uploaded to.
 *
 * @module
 */

import type {
	OsmDiff,
	OsmEdit,
	OsmEntity,
	OsmNode,
	OsmRelation,
	OsmTags,
	OsmWay,
} from "@osmbulk/shared/types"
import { escapeXmlAttribute, osmTagsToXmlTags } from "./utils"

export const OSC_GENERATOR = "osm-bulk-upload"

function entityAttributes(entity: OsmEntity, changesetId: number): string {
	const version =
		entity.info?.version === undefined ? "" : ` version="${entity.info.version}"`
	return `id="${entity.id}" changeset="${changesetId}"${version}`
}

/**
 * Generate a node XML element.
 */
function nodeToXml(node: OsmNode, changesetId: number): string {
	const tags = node.tags ? osmTagsToXmlTags(node.tags) : ""
	return `<node ${entityAttributes(node, changesetId)} lat="${node.lat}" lon="${node.lon}">${tags}</node>`
}

/**
 * Generate a way XML element.
 */
function wayToXml(way: OsmWay, changesetId: number): string {
	const tags = way.tags ? osmTagsToXmlTags(way.tags) : ""
	const nodes = way.refs.map((ref) => `<nd ref="${ref}"/>`).join("")
	return `<way ${entityAttributes(way, changesetId)}>${nodes}${tags}</way>`
}

/**
 * Generate a relation XML element.
 */
function relationToXml(relation: OsmRelation, changesetId: number): string {
	const tags = relation.tags ? osmTagsToXmlTags(relation.tags) : ""
	const members = relation.members
		.map(
			(member) =>
				`<member type="${member.type}" ref="${member.ref}" role="${escapeXmlAttribute(member.role ?? "")}"/>`,
		)
		.join("")
	return `<relation ${entityAttributes(relation, changesetId)}>${members}${tags}</relation>`
}

/**
 * Generate the XML element of a single edit.
 */
export function editToXml(edit: OsmEdit, changesetId: number): string {
	switch (edit.type) {
		case "node":
			return nodeToXml(edit.entity, changesetId)
		case "way":
			return wayToXml(edit.entity, changesetId)
		case "relation":
			return relationToXml(edit.entity, changesetId)
	}
}

/**
 * Generate an `<osmChange>` document for one diff upload. Edits keep their
 * order inside each of the create, modify and delete sections.
 *
 * @example
 * ```ts
 * const osc = generateOsmChange(
 *   { create: [{ type: "node", action: "create", entity }], modify: [], delete: [] },
 *   1234,
 * )
 * ```
 */
export function generateOsmChange(diff: OsmDiff, changesetId: number): string {
	const section = (edits: OsmEdit[]) =>
		edits.map((edit) => editToXml(edit, changesetId)).join("")
	return `<osmChange version="0.6" generator="${OSC_GENERATOR}"><create>${section(diff.create)}</create><modify>${section(diff.modify)}</modify><delete>${section(diff.delete)}</delete></osmChange>`
}

/**
 * Generate the document that opens a changeset with the given tags.
 */
export function generateChangesetXml(tags: OsmTags): string {
	return `<osm><changeset>${osmTagsToXmlTags(tags)}</changeset></osm>`
}
