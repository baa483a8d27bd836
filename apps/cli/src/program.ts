import { InputError } from "@osmbulk/shared/errors"
import { Command } from "commander"
import { type CliOptions, ConfigError, resolveConfig, VERSION } from "./config"
import { type RunUploadDependencies, runUpload } from "./run"

function collect(value: string, previous: string[] = []) {
	return [...previous, value]
}

/**
 * Exit code for an error that stopped the upload. Input and configuration
 * problems are found before anything is sent.
 */
export function exitCodeFor(error: unknown) {
	if (error instanceof ConfigError || error instanceof InputError) return 2
	return 1
}

export function createProgram(dependencies: RunUploadDependencies = {}) {
	return new Command("osm-bulk-upload")
		.description(
			"Upload a JOSM-style .osm file to the OSM API 0.6.\n\n" +
				"Ids assigned by the server are saved to <input>.db after every diff\n" +
				"upload. Running the command again skips everything already uploaded.\n" +
				"Delete <input>.db when the contents of the input file change.",
		)
		.version(VERSION)
		.requiredOption("-i, --input <file>", "read data from an .osm file")
		.requiredOption("-c, --comment <comment>", "changeset comment")
		.option("-u, --user <username>", "username (env: OSM_USERNAME)")
		.option("-p, --password <password>", "password (env: OSM_PASSWORD)")
		.option("--token <token>", "OAuth 2 access token (env: OSM_TOKEN)")
		.option("--api-url <url>", "API server (env: OSM_API_URL)")
		.option("--id-map <file>", "id map file (default: <input>.db)")
		.option("--diffset-size <n>", "edits per diff upload")
		.option("--changeset-size <n>", "edits per changeset")
		.option("--max-way-nodes <n>", "reject ways with more nodes")
		.option("-t, --tag <key=value>", "extra changeset tag, repeatable", collect)
		.action(async (options: CliOptions) => {
			const summary = await runUpload(resolveConfig(options), dependencies)
			if (summary.pendingFromPreviousRun) {
				console.warn(
					"Check the changesets of the interrupted run for duplicates before continuing the import.",
				)
			}
		})
}
