/**
 * Configuration of an upload run, merged from command line flags and the
 * environment and validated with zod.
 *
 * Environment fallbacks: `OSM_API_URL`, `OSM_USERNAME`, `OSM_PASSWORD` and
 * `OSM_TOKEN`. Flags take precedence.
 *
 * @module
 */

import { DEFAULT_API_URL, DEFAULT_UPLOAD_LIMITS } from "@osmbulk/upload"
import { z } from "zod"

export const VERSION = "0.1.0"

export const USER_AGENT = `osm-bulk-upload/${VERSION} Node.js/${process.versions.node}`

/** Flags as commander hands them over. */
export interface CliOptions {
	input: string
	comment: string
	user?: string
	password?: string
	token?: string
	apiUrl?: string
	idMap?: string
	diffsetSize?: string
	changesetSize?: string
	maxWayNodes?: string
	tag?: string[]
}

const PositiveInt = z.coerce.number().int().positive()

const TagSchema = z
	.string()
	.regex(/^[^=]+=.*$/, "Tags must be written as key=value")
	.transform((tag): [string, string] => {
		const index = tag.indexOf("=")
		return [tag.slice(0, index), tag.slice(index + 1)]
	})

export const UploadConfigSchema = z
	.object({
		input: z.string().min(1),
		comment: z.string().min(1, "A changeset comment is required"),
		apiUrl: z.string().url().default(DEFAULT_API_URL),
		username: z.string().min(1).optional(),
		password: z.string().min(1).optional(),
		token: z.string().min(1).optional(),
		idMapPath: z.string().min(1).optional(),
		diffsetSize: PositiveInt.default(DEFAULT_UPLOAD_LIMITS.diffsetSize),
		changesetSize: PositiveInt.default(DEFAULT_UPLOAD_LIMITS.changesetSize),
		maxWayNodes: PositiveInt.default(DEFAULT_UPLOAD_LIMITS.maxWayNodes),
		tags: z.array(TagSchema).default([]),
	})
	.refine((config) => config.token || (config.username && config.password), {
		message: "Either a token or a username and password are required",
		path: ["token"],
	})
	.transform(({ idMapPath, tags, ...config }) => ({
		...config,
		// The id map sits next to the input, like `import.osm.db`
		idMapPath: idMapPath ?? `${config.input}.db`,
		tags: Object.fromEntries(tags),
	}))

export type UploadConfig = z.output<typeof UploadConfigSchema>

export class ConfigError extends Error {
	override name = "ConfigError"
}

/**
 * Merge flags with environment fallbacks and validate the result.
 *
 * @throws ConfigError listing the invalid settings.
 */
export function resolveConfig(
	options: CliOptions,
	env: NodeJS.ProcessEnv = process.env,
): UploadConfig {
	const result = UploadConfigSchema.safeParse({
		input: options.input,
		comment: options.comment,
		apiUrl: options.apiUrl ?? env["OSM_API_URL"],
		username: options.user ?? env["OSM_USERNAME"],
		password: options.password ?? env["OSM_PASSWORD"],
		token: options.token ?? env["OSM_TOKEN"],
		idMapPath: options.idMap,
		diffsetSize: options.diffsetSize,
		changesetSize: options.changesetSize,
		maxWayNodes: options.maxWayNodes,
		tags: options.tag,
	})
	if (!result.success) {
		const problems = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
		)
		throw new ConfigError(`Invalid configuration:\n${problems.join("\n")}`)
	}
	return result.data
}
