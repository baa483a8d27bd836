/**
 * HTTP transport for the OSM API 0.6.
 *
 * - `PUT /api/0.6/changeset/create` opens a changeset and answers its id.
 * - `POST /api/0.6/changeset/#id/upload` applies an osmChange document and
 *   answers a `<diffResult>`.
 * - `PUT /api/0.6/changeset/#id/close` closes the changeset.
 *
 * @module
 */

import type { OsmDiff, OsmDiffResult, OsmTags } from "@osmbulk/shared/types"
import { errorMessage } from "@osmbulk/shared/utils"
import {
	generateChangesetXml,
	generateOsmChange,
	readDiffResult,
} from "@osmbulk/xml"
import { TransportError } from "./errors"
import type { OsmUploadTransport } from "./types"

export const DEFAULT_API_URL = "https://api.openstreetmap.org"

export type OsmApiAuth =
	| { username: string; password: string }
	| { token: string }

export interface OsmApiClientOptions {
	apiUrl: string
	auth?: OsmApiAuth
	userAgent: string
}

const DEFAULT_CLIENT_OPTIONS: OsmApiClientOptions = {
	apiUrl: DEFAULT_API_URL,
	userAgent: "osm-bulk-upload",
}

function authorizationHeader(auth: OsmApiAuth) {
	if ("token" in auth) return `Bearer ${auth.token}`
	const credentials = Buffer.from(`${auth.username}:${auth.password}`).toString(
		"base64",
	)
	return `Basic ${credentials}`
}

export class OsmApiClient implements OsmUploadTransport {
	readonly options: OsmApiClientOptions

	constructor(options: Partial<OsmApiClientOptions> = {}) {
		this.options = { ...DEFAULT_CLIENT_OPTIONS, ...options }
	}

	async createChangeset(tags: OsmTags) {
		const body = await this.request(
			"PUT",
			"/api/0.6/changeset/create",
			generateChangesetXml(tags),
		)
		const id = Number(body.trim())
		if (!Number.isSafeInteger(id) || id <= 0) {
			throw new TransportError(
				`Unexpected changeset id in response: ${body}`,
				200,
				body,
			)
		}
		return id
	}

	async uploadDiff(changesetId: number, diff: OsmDiff): Promise<OsmDiffResult[]> {
		const body = await this.request(
			"POST",
			`/api/0.6/changeset/${changesetId}/upload`,
			generateOsmChange(diff, changesetId),
		)
		try {
			return readDiffResult(body)
		} catch (error) {
			throw new TransportError(
				`Unexpected diff upload response: ${errorMessage(error)}`,
				200,
				body,
			)
		}
	}

	async closeChangeset(changesetId: number) {
		await this.request("PUT", `/api/0.6/changeset/${changesetId}/close`)
	}

	private async request(method: string, path: string, body?: string) {
		const headers: Record<string, string> = {
			"User-Agent": this.options.userAgent,
		}
		if (body !== undefined) headers["Content-Type"] = "text/xml; charset=utf-8"
		if (this.options.auth) {
			headers["Authorization"] = authorizationHeader(this.options.auth)
		}

		const url = `${this.options.apiUrl.replace(/\/+$/, "")}${path}`
		let response: Response
		try {
			response = await fetch(url, { method, headers, body })
		} catch (error) {
			throw new TransportError(
				`${method} ${path} failed: ${errorMessage(error)}`,
				0,
			)
		}

		const text = await response.text()
		if (!response.ok) {
			throw new TransportError(
				`${method} ${path} failed with status ${response.status}: ${text}`,
				response.status,
				text,
			)
		}
		return text
	}
}
