/**
 * Zod schemas for the raw objects fast-xml-parser produces from OSM XML.
 *
 * Attribute values are kept as strings by the parser and converted here, so
 * every id and coordinate is validated once at the edge.
 *
 * @module
 */

import { InputError } from "@osmbulk/shared/errors"
import { XMLParser } from "fast-xml-parser"
import { z } from "zod"

const ARRAY_ELEMENTS = new Set(["node", "way", "relation", "nd", "member", "tag"])

/**
 * Parser shared by the document reader and the diff result reader. Attributes
 * are unprefixed and always strings; repeatable elements are always arrays.
 * Attribute values keep their whitespace, and character references such as
 * `&#xA;` are decoded.
 */
export const xmlParser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: "",
	parseAttributeValue: false,
	parseTagValue: false,
	trimValues: false,
	htmlEntities: true,
	isArray: (name, _jpath, _isLeafNode, isAttribute) =>
		!isAttribute && ARRAY_ELEMENTS.has(name),
})

export const IntString = z
	.string()
	.regex(/^-?\d+$/, "Expected an integer")
	.transform(Number)

export const FloatString = z
	.string()
	.refine(
		(value) => value.trim() !== "" && Number.isFinite(Number(value)),
		"Expected a number",
	)
	.transform(Number)

export const RawTagSchema = z.object({ k: z.string(), v: z.string() })

export const RawEntityTypeSchema = z.enum(["node", "way", "relation"])

const rawEntity = {
	id: IntString,
	action: z.enum(["create", "modify", "delete"]).optional(),
	version: IntString.optional(),
	tag: z.array(RawTagSchema).optional(),
}

export const RawNodeSchema = z.object({
	...rawEntity,
	lat: FloatString,
	lon: FloatString,
})

export const RawWaySchema = z.object({
	...rawEntity,
	nd: z.array(z.object({ ref: IntString })).optional(),
})

export const RawRelationSchema = z.object({
	...rawEntity,
	member: z
		.array(
			z.object({
				type: RawEntityTypeSchema,
				ref: IntString,
				role: z.string().optional(),
			}),
		)
		.optional(),
})

export type RawTag = z.infer<typeof RawTagSchema>

/**
 * Format the first issue of a failed parse as a readable path and message.
 */
export function describeIssues(error: z.ZodError): string {
	const [issue] = error.issues
	if (!issue) return "Invalid XML document"
	const path = issue.path.join(".")
	return `${path ? `${path}: ` : ""}${issue.message} (${error.issues.length} issue(s))`
}

/**
 * Parse an XML string into a plain object, converting parser failures into
 * `InputError`s.
 */
export function parseXml(xml: string): unknown {
	try {
		const parsed: unknown = xmlParser.parse(xml, true)
		return parsed
	} catch (error) {
		throw new InputError(
			`Failed to parse XML document: ${error instanceof Error ? error.message : String(error)}`,
		)
	}
}
