/**
 * @osmbulk/upload - Resumable bulk uploads to the OSM API 0.6.
 *
 * Splits an edit set into changesets and diff uploads, records the ids the
 * server assigns to new entities, and rewrites references to them in later
 * uploads.
 *
 * Key capabilities:
 * - **Id map**: source id to permanent id mappings, persisted after every diff.
 * - **Chunking**: changesets of `changesetSize` edits, diffs of `diffsetSize`.
 * - **Ordering**: relations uploaded after the relations they contain.
 * - **Resuming**: entities mapped by an earlier run are skipped.
 *
 * @example
 * ```ts
 * import { readOsmXml } from "@osmbulk/xml"
 * import { BulkUploader, FileStorage, OsmApiClient, OsmIdMap } from "@osmbulk/upload"
 *
 * const idMap = await OsmIdMap.load(new FileStorage("import.osm.db"))
 * const uploader = new BulkUploader({
 *   transport: new OsmApiClient({ auth: { token } }),
 *   idMap,
 *   tags: { comment: "Import park benches" },
 * })
 * const summary = await uploader.upload(readOsmXml(xml))
 * ```
 *
 * @module @osmbulk/upload
 */

export * from "./bulk-upload"
export * from "./changeset"
export * from "./diffset"
export * from "./errors"
export * from "./id-map"
export * from "./id-map-storage"
export * from "./osm-api"
export * from "./relation-order"
export * from "./types"
export * from "./upload-journal"
export * from "./utils"
