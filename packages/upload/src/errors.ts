/**
 * Error taxonomy of the uploader.
 *
 * - `InputError`: the input cannot be uploaded. Thrown before any request.
 * - `RelationCycleError`: relations reference each other in a cycle, so no
 *   upload order exists. An `InputError`.
 * - `TransportError`: the server answered with a non-success status, or could
 *   not be reached.
 * - `IdConflictError`: two different permanent ids were reported for the same
 *   source id.
 *
 * @module
 */

import { InputError } from "@osmbulk/shared/errors"
import type { OsmEntityType } from "@osmbulk/shared/types"

export { InputError }

export class RelationCycleError extends InputError {
	override name = "RelationCycleError"

	constructor(readonly relationIds: number[]) {
		super(
			`Relations reference each other in a cycle: ${relationIds.join(" -> ")}`,
		)
	}
}

export class TransportError extends Error {
	override name = "TransportError"

	constructor(
		message: string,
		readonly status: number,
		readonly body = "",
	) {
		super(message)
	}
}

export class IdConflictError extends Error {
	override name = "IdConflictError"

	constructor(
		readonly type: OsmEntityType,
		readonly sourceId: number,
		readonly existingId: number,
		readonly conflictingId: number,
	) {
		super(
			`${type} ${sourceId} is already mapped to ${existingId}, refusing to map it to ${conflictingId}`,
		)
	}
}
