/**
 * Bulk upload of an `.osm` edit set.
 *
 * Edits are uploaded through a chain of changesets, each made of diff uploads.
 * The server assigns permanent ids to created entities as each diff is
 * accepted; the ids are recorded in the id map, and references to them in
 * later edits are rewritten before those edits are uploaded.
 *
 * Upload order:
 * 1. Nodes, then ways, in document order.
 * 2. Relations, in document order, or in dependency order when relations have
 *    other relations of the upload as members.
 *
 * Entities whose source id is already in the id map were uploaded by an
 * earlier run and are skipped.
 *
 * @module
 */

import {
	logProgress,
	type OnProgress,
	progressEvent,
} from "@osmbulk/shared/progress"
import type {
	OsmEdit,
	OsmEntityType,
	OsmTags,
	OsmUploadDocument,
} from "@osmbulk/shared/types"
import { OsmUploadChangeset } from "./changeset"
import { InputError } from "./errors"
import type { OsmIdMap } from "./id-map"
import { orderRelations, relationsReferenceEachOther } from "./relation-order"
import {
	DEFAULT_UPLOAD_LIMITS,
	type OsmUploadTransport,
	type UploadContext,
	type UploadLimits,
	type UploadSummary,
} from "./types"
import type { UploadJournal } from "./upload-journal"
import { remapEditReferences } from "./utils"

export interface BulkUploadOptions extends Partial<UploadLimits> {
	transport: OsmUploadTransport
	idMap: OsmIdMap
	/** Tags of every changeset opened by the upload. */
	tags: OsmTags
	journal?: UploadJournal
	onProgress?: OnProgress
}

export class BulkUploader {
	private readonly context: UploadContext
	private readonly tags: OsmTags
	private changeset: OsmUploadChangeset

	constructor({
		transport,
		idMap,
		tags,
		journal,
		onProgress = logProgress,
		...limits
	}: BulkUploadOptions) {
		this.tags = { ...tags }
		this.context = {
			transport,
			idMap,
			journal,
			onProgress,
			limits: { ...DEFAULT_UPLOAD_LIMITS, ...limits },
			stats: {
				diffsetsUploaded: 0,
				changesetsUsed: 0,
				editsUploaded: 0,
				editsSkipped: 0,
			},
		}
		this.changeset = this.createChangeset()
	}

	get limits(): Readonly<UploadLimits> {
		return this.context.limits
	}

	/**
	 * Upload every edit of the document that is not in the id map yet, then
	 * close the last changeset.
	 *
	 * @throws InputError before any request when the document cannot be
	 * uploaded.
	 * @throws TransportError when opening a changeset or uploading a diff fails.
	 */
	async upload(document: OsmUploadDocument): Promise<UploadSummary> {
		const { idMap, journal, onProgress, stats } = this.context
		const edits = this.planUpload(document)

		const pendingFromPreviousRun = (await journal?.read()) ?? null
		if (pendingFromPreviousRun) {
			onProgress(
				progressEvent(
					`A previous run stopped while uploading to changeset ${pendingFromPreviousRun.changesetId}. Entities of that upload may already exist on the server.`,
					"warn",
				),
			)
		}

		for (const edit of edits) {
			if (idMap.has(edit.type, edit.entity.id)) {
				stats.editsSkipped++
				continue
			}
			await this.addToChangeset(remapEditReferences(edit, idMap))
		}
		await this.changeset.close()

		onProgress(
			progressEvent(
				`Uploaded ${stats.editsUploaded} edits in ${stats.diffsetsUploaded} diffs and ${stats.changesetsUsed} changesets, skipped ${stats.editsSkipped}`,
			),
		)
		return { ...stats, pendingFromPreviousRun }
	}

	/**
	 * Validate the document and return its edits in upload order. Ids must be
	 * unique per entity type.
	 */
	planUpload(document: OsmUploadDocument): OsmEdit[] {
		if (document.isChange) {
			throw new InputError(
				"The input is an osmChange document. Only .osm documents can be bulk uploaded; uploading an osmChange this way corrupts data on the server.",
			)
		}

		const { idMap, limits, onProgress } = this.context
		const nodes: OsmEdit<"node">[] = []
		const ways: OsmEdit<"way">[] = []
		const relations: OsmEdit<"relation">[] = []
		const seen: Record<OsmEntityType, Set<number>> = {
			node: new Set(),
			way: new Set(),
			relation: new Set(),
		}
		for (const edit of document.edits) {
			const ids = seen[edit.type]
			if (ids.has(edit.entity.id)) {
				throw new InputError(
					`Duplicate ${edit.type} id ${edit.entity.id} in the input`,
				)
			}
			ids.add(edit.entity.id)
			switch (edit.type) {
				case "node":
					nodes.push(edit)
					break
				case "way":
					if (edit.entity.refs.length > limits.maxWayNodes) {
						throw new InputError(
							`Way ${edit.entity.id} has ${edit.entity.refs.length} nodes, more than the limit of ${limits.maxWayNodes}`,
						)
					}
					ways.push(edit)
					break
				case "relation":
					relations.push(edit)
					break
			}
		}

		const mappedRelations: OsmEdit<"relation">[] = []
		const pendingRelations: OsmEdit<"relation">[] = []
		for (const edit of relations) {
			if (idMap.has("relation", edit.entity.id)) mappedRelations.push(edit)
			else pendingRelations.push(edit)
		}
		if (!relationsReferenceEachOther(pendingRelations)) {
			return [...nodes, ...ways, ...relations]
		}
		onProgress(progressEvent("Sorting relations by their relation members"))
		// Mapped relations stay in the plan so they are counted as skipped
		return [
			...nodes,
			...ways,
			...mappedRelations,
			...orderRelations(pendingRelations),
		]
	}

	private createChangeset() {
		return new OsmUploadChangeset(this.tags, this.context)
	}

	private async addToChangeset(edit: OsmEdit) {
		if ((await this.changeset.add(edit)) === "added") return
		this.changeset = this.createChangeset()
		if ((await this.changeset.add(edit)) === "closed") {
			throw Error("New changeset refused an edit")
		}
	}
}
