import { describe, expect, it } from "vitest"
import { readDiffResult } from "../src/diff-result"

describe("readDiffResult", () => {
	it("reads new ids, versions and deletions", () => {
		const results = readDiffResult(`<?xml version="1.0" encoding="UTF-8"?>
<diffResult version="0.6" generator="OpenStreetMap server">
  <node old_id="-1" new_id="4001" new_version="1"/>
  <node old_id="-2" new_id="4002" new_version="1"/>
  <way old_id="-10" new_id="900" new_version="1"/>
  <relation old_id="31"/>
</diffResult>`)

		expect(results).toEqual([
			{ type: "node", oldId: -1, newId: 4001, newVersion: 1 },
			{ type: "node", oldId: -2, newId: 4002, newVersion: 1 },
			{ type: "way", oldId: -10, newId: 900, newVersion: 1 },
			{ type: "relation", oldId: 31 },
		])
	})

	it("reads empty results", () => {
		expect(readDiffResult('<diffResult version="0.6"/>')).toEqual([])
		expect(readDiffResult("<diffResult></diffResult>")).toEqual([])
		expect(readDiffResult("<diffResult>\n</diffResult>")).toEqual([])
	})

	it("rejects other documents", () => {
		expect(() => readDiffResult("<osm></osm>")).toThrow("Invalid diffResult")
	})
})
