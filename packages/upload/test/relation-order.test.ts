import type { OsmEdit, OsmRelationMember } from "@osmbulk/shared/types"
import { describe, expect, it } from "vitest"
import { InputError, RelationCycleError } from "../src/errors"
import { orderRelations, relationsReferenceEachOther } from "../src/relation-order"

function relation(id: number, ...relationRefs: number[]): OsmEdit<"relation"> {
	const members: OsmRelationMember[] = relationRefs.map((ref) => ({
		type: "relation",
		ref,
	}))
	return { type: "relation", action: "create", entity: { id, members } }
}

const ids = (edits: OsmEdit[]) => edits.map((edit) => edit.entity.id)

describe("orderRelations", () => {
	it("orders a chain of relations from the innermost", () => {
		// -1 contains -2, which contains -3
		const order = orderRelations([relation(-1, -2), relation(-2, -3), relation(-3)])
		expect(ids(order)).toEqual([-3, -2, -1])
	})

	it("keeps independent relations in input order", () => {
		const order = orderRelations([relation(-1), relation(-2), relation(-3)])
		expect(ids(order)).toEqual([-1, -2, -3])
	})

	it("emits shared members once, before every relation containing them", () => {
		const order = orderRelations([
			relation(-1, -3),
			relation(-2, -3, -4),
			relation(-3),
			relation(-4),
		])
		expect(ids(order)).toEqual([-3, -1, -4, -2])
	})

	it("ignores members outside the set", () => {
		const order = orderRelations([relation(-1, 55, -2), relation(-2, 56)])
		expect(ids(order)).toEqual([-2, -1])
	})

	it("visits members in member order", () => {
		const order = orderRelations([relation(-1, -3, -2), relation(-2), relation(-3)])
		expect(ids(order)).toEqual([-3, -2, -1])
	})

	it("orders deep chains without recursion", () => {
		const depth = 20_000
		const chain = Array.from({ length: depth }, (_, i) =>
			i === depth - 1 ? relation(-(i + 1)) : relation(-(i + 1), -(i + 2)),
		)
		const order = orderRelations(chain)
		expect(order).toHaveLength(depth)
		expect(order[0]?.entity.id).toBe(-depth)
		expect(order[depth - 1]?.entity.id).toBe(-1)
	})

	it("reports a cycle reachable from an independent relation", () => {
		expect(() =>
			orderRelations([relation(-1, -2), relation(-2, -3), relation(-3, -2)]),
		).toThrow("Relations reference each other in a cycle: -2 -> -3 -> -2")
	})

	it("reports a cycle that no other relation reaches", () => {
		let error: unknown
		try {
			orderRelations([relation(-1), relation(-2, -3), relation(-3, -2)])
		} catch (e) {
			error = e
		}
		expect(error).toBeInstanceOf(RelationCycleError)
		expect(error).toMatchObject({ relationIds: [-2, -3, -2] })
	})

	it("reports relations containing themselves", () => {
		expect(() => orderRelations([relation(-1, -1)])).toThrow(
			"Relations reference each other in a cycle: -1 -> -1",
		)
	})

	it("rejects relations with the same id", () => {
		const order = () => orderRelations([relation(-1, -2), relation(-2), relation(-1)])
		expect(order).toThrow(InputError)
		expect(order).toThrow("Duplicate relation id -1 in the input")
	})
})

describe("relationsReferenceEachOther", () => {
	it("detects relation members inside the set", () => {
		expect(relationsReferenceEachOther([relation(-1, -2), relation(-2)])).toBe(true)
	})

	it("ignores relation members outside the set", () => {
		expect(relationsReferenceEachOther([relation(-1, 12), relation(-2)])).toBe(false)
	})
})
