/**
 * Reference rewriting for edits.
 *
 * @module
 */

import type { OsmEdit } from "@osmbulk/shared/types"
import type { OsmIdMap } from "./id-map"

/**
 * Copy an edit, replacing every reference to a mapped source id with its
 * permanent id. References that are not mapped yet point at entities of the
 * same upload and are kept as they are.
 */
export function remapEditReferences(edit: OsmEdit, idMap: OsmIdMap): OsmEdit {
	switch (edit.type) {
		case "node":
			return { ...edit, entity: { ...edit.entity } }
		case "way":
			return {
				...edit,
				entity: {
					...edit.entity,
					refs: edit.entity.refs.map((ref) => idMap.get("node", ref) ?? ref),
				},
			}
		case "relation":
			return {
				...edit,
				entity: {
					...edit.entity,
					members: edit.entity.members.map((member) => ({
						...member,
						ref: idMap.get(member.type, member.ref) ?? member.ref,
					})),
				},
			}
	}
}
