import { readFile } from "node:fs/promises"
import { logProgress, type OnProgress } from "@osmbulk/shared/progress"
import {
	BulkUploader,
	FileStorage,
	OsmApiClient,
	type OsmUploadTransport,
	OsmIdMap,
	type UploadSummary,
	UploadJournal,
} from "@osmbulk/upload"
import { readOsmXml } from "@osmbulk/xml"
import { type UploadConfig, USER_AGENT } from "./config"

export interface RunUploadDependencies {
	transport?: OsmUploadTransport
	onProgress?: OnProgress
}

function createTransport(config: UploadConfig) {
	const { token, username, password } = config
	return new OsmApiClient({
		apiUrl: config.apiUrl,
		userAgent: USER_AGENT,
		auth: token
			? { token }
			: username && password
				? { username, password }
				: undefined,
	})
}

/**
 * Upload the input file of the configuration. The id map is loaded from
 * `config.idMapPath` and its upload journal from `<idMapPath>.pending`.
 */
export async function runUpload(
	config: UploadConfig,
	{ transport, onProgress = logProgress }: RunUploadDependencies = {},
): Promise<UploadSummary> {
	const document = readOsmXml(await readFile(config.input, "utf8"))
	const idMap = await OsmIdMap.load(new FileStorage(config.idMapPath), onProgress)
	const uploader = new BulkUploader({
		transport: transport ?? createTransport(config),
		idMap,
		journal: new UploadJournal(new FileStorage(`${config.idMapPath}.pending`)),
		tags: {
			created_by: USER_AGENT,
			comment: config.comment,
			...config.tags,
		},
		diffsetSize: config.diffsetSize,
		changesetSize: config.changesetSize,
		maxWayNodes: config.maxWayNodes,
		onProgress,
	})
	return uploader.upload(document)
}
