/**
 * Shared OSM Types
 */

export type OsmEntityType = "node" | "way" | "relation"

export const OSM_ENTITY_TYPES: readonly OsmEntityType[] = [
	"node",
	"way",
	"relation",
] as const

export interface OsmEntityTypeMap extends Record<OsmEntityType, IOsmEntity> {
	node: OsmNode
	way: OsmWay
	relation: OsmRelation
}

export interface OsmInfoParsed {
	version?: number
	timestamp?: string
	changeset?: number
	uid?: number
	visible?: boolean
	user?: string
}

export interface OsmTags {
	[key: string]: string | number
}

export interface IOsmEntity {
	// Negative ids are placeholders for entities that do not exist on the server yet
	id: number
	info?: OsmInfoParsed
	tags?: OsmTags
}

export interface ILonLat {
	lon: number
	lat: number
}

export interface OsmNode extends IOsmEntity, ILonLat {}

export interface OsmWay extends IOsmEntity {
	// OSM IDs of the nodes that make up this way
	refs: number[]
}

export interface OsmRelationMember {
	type: OsmEntityType
	ref: number
	role?: string
}

export interface OsmRelation extends IOsmEntity {
	members: OsmRelationMember[]
}

export type OsmEntity = OsmNode | OsmWay | OsmRelation

/**
 * Upload Types
 */

/** The action an edit performs on the server. */
export type OsmChangeType = "create" | "modify" | "delete"

/**
 * A single typed edit read from an upload document.
 * `entity.id` is the id as it appears in the input file.
 */
export type OsmEdit<T extends OsmEntityType = OsmEntityType> = {
	[K in T]: {
		type: K
		action: OsmChangeType
		entity: OsmEntityTypeMap[K]
	}
}[T]

/** The edits of one diff upload, grouped by action in upload order. */
export type OsmDiff = Record<OsmChangeType, OsmEdit[]>

/**
 * One entry of the server's `<diffResult>`. A missing `newId` confirms a
 * deletion.
 */
export type OsmDiffResult = {
	type: OsmEntityType
	oldId: number
	newId?: number
	newVersion?: number
}

/** A parsed upload document. */
export type OsmUploadDocument = {
	// True when the document is an osmChange (or carries osmChange sections)
	isChange: boolean
	edits: OsmEdit[]
}
