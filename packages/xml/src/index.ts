/**
 * @osmbulk/xml - OSM XML reading and writing for bulk uploads.
 *
 * - **Reading**: `readOsmXml` turns a JOSM-style `.osm` document into edits
 *   and flags osmChange documents.
 * - **Writing**: `generateOsmChange` and `generateChangesetXml` build the
 *   request bodies of the OSM API 0.6.
 * - **Results**: `readDiffResult` parses the response of a diff upload.
 *
 * @module @osmbulk/xml
 */

export * from "./diff-result"
export * from "./osc"
export * from "./read-osm"
export * from "./utils"
