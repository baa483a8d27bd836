/**
 * Read the `<diffResult>` document returned by a diff upload.
 *
 * ```xml
 * <diffResult version="0.6">
 *   <node old_id="-1" new_id="4321" new_version="1"/>
 *   <way old_id="17" new_id="17" new_version="3"/>
 *   <relation old_id="-5"/>
 * </diffResult>
 * ```
 *
 * Entries without `new_id` confirm a deletion.
 *
 * @module
 */

import type { OsmDiffResult, OsmEntityType } from "@osmbulk/shared/types"
import { z } from "zod"
import { describeIssues, IntString, parseXml } from "./schemas"

const RawDiffEntrySchema = z.object({
	old_id: IntString,
	new_id: IntString.optional(),
	new_version: IntString.optional(),
})

const DiffResultSchema = z.object({
	diffResult: z.union([
		z.object({
			node: z.array(RawDiffEntrySchema).optional(),
			way: z.array(RawDiffEntrySchema).optional(),
			relation: z.array(RawDiffEntrySchema).optional(),
		}),
		// `<diffResult/>` without entries, possibly with whitespace
		z.string().regex(/^\s*$/),
	]),
})

/**
 * Parse a `<diffResult>` document into results grouped by type: nodes, then
 * ways, then relations, each in document order.
 *
 * @throws Error when the document is not a valid diff result.
 */
export function readDiffResult(xml: string): OsmDiffResult[] {
	const result = DiffResultSchema.safeParse(parseXml(xml))
	if (!result.success) {
		throw Error(`Invalid diffResult: ${describeIssues(result.error)}`)
	}
	const { diffResult } = result.data
	if (typeof diffResult === "string") return []

	const results: OsmDiffResult[] = []
	const types: OsmEntityType[] = ["node", "way", "relation"]
	for (const type of types) {
		for (const entry of diffResult[type] ?? []) {
			const diff: OsmDiffResult = { type, oldId: entry.old_id }
			if (entry.new_id !== undefined) diff.newId = entry.new_id
			if (entry.new_version !== undefined) diff.newVersion = entry.new_version
			results.push(diff)
		}
	}
	return results
}
