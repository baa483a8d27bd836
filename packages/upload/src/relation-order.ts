/**
 * Upload order for relations that have other relations as members.
 *
 * A relation can only reference a new relation once the server has assigned
 * it a permanent id, or when the referenced relation comes earlier in the same
 * diff. Relations are therefore uploaded in dependency order: every relation
 * after the relations it references.
 *
 * The relations form a graph with an edge from each relation to each of its
 * relation members. Every relation that no other relation references is
 * attached to a synthetic root, and a depth first post-order traversal from the
 * root emits members before the relations that contain them.
 *
 * @module
 */

import type { OsmEdit } from "@osmbulk/shared/types"
import { InputError, RelationCycleError } from "./errors"

type RelationEdit = OsmEdit<"relation">

type Frame = {
	// `undefined` for the synthetic root
	id?: number
	children: number[]
	index: number
}

/**
 * Check whether any relation has another relation of the same set as a member.
 */
export function relationsReferenceEachOther(relations: RelationEdit[]) {
	const ids = new Set(relations.map((edit) => edit.entity.id))
	return relations.some((edit) =>
		edit.entity.members.some(
			(member) => member.type === "relation" && ids.has(member.ref),
		),
	)
}

/**
 * Order relations so that every relation comes after the relations of the set
 * it references. Members that are not part of the set (already uploaded, or
 * existing on the server) do not constrain the order.
 *
 * Relations without dependencies keep their input order relative to each
 * other, and members are visited in member order.
 *
 * @throws InputError when two relations have the same id.
 * @throws RelationCycleError when relations reference each other in a cycle.
 */
export function orderRelations(relations: RelationEdit[]): RelationEdit[] {
	const byId = new Map<number, RelationEdit>()
	for (const edit of relations) {
		if (byId.has(edit.entity.id)) {
			throw new InputError(`Duplicate relation id ${edit.entity.id} in the input`)
		}
		byId.set(edit.entity.id, edit)
	}

	const children = new Map<number, number[]>()
	const referenced = new Set<number>()
	for (const [id, edit] of byId) {
		const refs: number[] = []
		for (const member of edit.entity.members) {
			if (member.type !== "relation" || !byId.has(member.ref)) continue
			if (refs.includes(member.ref)) continue
			refs.push(member.ref)
			referenced.add(member.ref)
		}
		children.set(id, refs)
	}

	const ordered: RelationEdit[] = []
	const state = new Map<number, "visiting" | "done">()

	const traverse = (start: number[]) => {
		const stack: Frame[] = [{ children: start, index: 0 }]
		while (stack.length > 0) {
			const frame = stack[stack.length - 1]
			if (!frame) break
			const child = frame.children[frame.index]
			if (child === undefined) {
				stack.pop()
				if (frame.id !== undefined) {
					state.set(frame.id, "done")
					const edit = byId.get(frame.id)
					if (edit) ordered.push(edit)
				}
				continue
			}
			frame.index++

			const childState = state.get(child)
			if (childState === "done") continue
			if (childState === "visiting") {
				const cycleStart = stack.findIndex((f) => f.id === child)
				const cycle = stack
					.slice(cycleStart)
					.flatMap((f) => (f.id === undefined ? [] : [f.id]))
				throw new RelationCycleError([...cycle, child])
			}
			state.set(child, "visiting")
			stack.push({ id: child, children: children.get(child) ?? [], index: 0 })
		}
	}

	// Synthetic root: every relation that no other relation references
	traverse([...byId.keys()].filter((id) => !referenced.has(id)))

	// Relations that are only reachable through a cycle are never reached from
	// the root. Traversing from them finds the cycle.
	for (const id of byId.keys()) {
		if (!state.has(id)) traverse([id])
	}

	return ordered
}
