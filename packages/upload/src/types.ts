/**
 * Type definitions for bulk uploads.
 * @module
 */

import type { OnProgress } from "@osmbulk/shared/progress"
import type {
	OsmDiff,
	OsmDiffResult,
	OsmTags,
} from "@osmbulk/shared/types"
import type { OsmIdMap } from "./id-map"
import type { PendingUpload, UploadJournal } from "./upload-journal"

/**
 * Requests the uploader sends to the server. Implemented over HTTP by
 * `OsmApiClient`.
 */
export interface OsmUploadTransport {
	/** Open a changeset and return its id. */
	createChangeset(tags: OsmTags): Promise<number>
	/** Upload one diff to an open changeset and return the per entity results. */
	uploadDiff(changesetId: number, diff: OsmDiff): Promise<OsmDiffResult[]>
	closeChangeset(changesetId: number): Promise<void>
}

/**
 * Size limits of an upload.
 */
export interface UploadLimits {
	/** Edits per diff upload. */
	diffsetSize: number
	/** Edits per changeset. The OSM API rejects more than 10,000 by default. */
	changesetSize: number
	/** Node refs per way. Longer ways are rejected before uploading. */
	maxWayNodes: number
}

export const DEFAULT_UPLOAD_LIMITS: UploadLimits = {
	diffsetSize: 1_000,
	changesetSize: 50_000,
	maxWayNodes: 2_000,
}

/**
 * Counters shared by the changesets and diffsets of one upload.
 */
export type UploadStats = {
	diffsetsUploaded: number
	changesetsUsed: number
	editsUploaded: number
	editsSkipped: number
}

/**
 * Everything a changeset or diffset needs from the upload that owns it.
 */
export interface UploadContext {
	transport: OsmUploadTransport
	idMap: OsmIdMap
	journal?: UploadJournal
	limits: UploadLimits
	stats: UploadStats
	onProgress: OnProgress
}

/**
 * Result of adding an edit to a changeset or diffset. A closed container
 * takes no more edits and must be replaced by a new one.
 */
export type AddResult = "added" | "closed"

export type UploadSummary = UploadStats & {
	// Marker left by a previous run that stopped during a diff upload
	pendingFromPreviousRun: PendingUpload | null
}
