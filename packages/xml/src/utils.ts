/**
 * XML string helpers.
 *
 * @module
 */

import type { OsmTags } from "@osmbulk/shared/types"

const XML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&apos;",
	// Literal whitespace in attributes is normalized to spaces by XML readers
	"\n": "&#xA;",
	"\r": "&#xD;",
	"\t": "&#x9;",
}

/**
 * Escape a value for use inside a double quoted XML attribute.
 */
export function escapeXmlAttribute(value: string | number): string {
	return String(value).replace(/[&<>"'\n\r\t]/g, (char) => XML_ESCAPES[char] ?? char)
}

/**
 * Convert OSM tags object to XML tag elements.
 * @returns XML string of `<tag k="..." v="..."/>` elements.
 */
export function osmTagsToXmlTags(tags: OsmTags): string {
	return Object.entries(tags)
		.map(
			([key, value]) =>
				`<tag k="${escapeXmlAttribute(key)}" v="${escapeXmlAttribute(value)}"/>`,
		)
		.join("")
}
