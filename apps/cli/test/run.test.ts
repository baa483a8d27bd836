import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { ignoreProgress } from "@osmbulk/shared/progress"
import { FakeOsmApi } from "@osmbulk/test-utils/fake-osm-api"
import { getFixtureText } from "@osmbulk/test-utils/fixtures"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { resolveConfig, USER_AGENT } from "../src/config"
import { createProgram, exitCodeFor } from "../src/program"
import { runUpload } from "../src/run"

describe("runUpload", () => {
	let dir: string
	let input: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "osmbulk-cli-"))
		input = join(dir, "import.osm")
		await writeFile(input, await getFixtureText("bulk-import.osm"), "utf8")
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("uploads the input and saves the id map next to it", async () => {
		const transport = new FakeOsmApi()
		const config = resolveConfig(
			{ input, comment: "Benches", token: "test-token", tag: ["source=survey"] },
			{},
		)
		const summary = await runUpload(config, { transport, onProgress: ignoreProgress })

		expect(summary.editsUploaded).toBe(8)
		expect(transport.changesets[0]?.tags).toEqual({
			created_by: USER_AGENT,
			comment: "Benches",
			source: "survey",
		})
		const saved: unknown = JSON.parse(await readFile(`${input}.db`, "utf8"))
		expect(saved).toMatchObject({ relation: { "-21": 3000, "-20": 3001 } })
		await expect(readFile(`${input}.db.pending`, "utf8")).rejects.toThrow()
	})

	it("skips everything on a second run", async () => {
		const config = resolveConfig({ input, comment: "Benches", token: "test-token" }, {})
		await runUpload(config, { transport: new FakeOsmApi(), onProgress: ignoreProgress })

		const transport = new FakeOsmApi()
		const summary = await runUpload(config, { transport, onProgress: ignoreProgress })
		expect(summary.editsSkipped).toBe(8)
		expect(transport.calls).toEqual([])
	})

	it("runs from the command line", async () => {
		const transport = new FakeOsmApi()
		const program = createProgram({ transport, onProgress: ignoreProgress }).exitOverride()
		await program.parseAsync(
			["-i", input, "-c", "Benches", "--token", "test-token", "--diffset-size", "3"],
			{ from: "user" },
		)
		expect(transport.uploadSizes()).toEqual([3, 3, 2])
	})

	it("stops before uploading osmChange files", async () => {
		await writeFile(input, '<osmChange version="0.6"><create/></osmChange>', "utf8")
		const transport = new FakeOsmApi()
		const config = resolveConfig({ input, comment: "Benches", token: "test-token" }, {})

		const error = await runUpload(config, { transport, onProgress: ignoreProgress }).catch(
			(e: unknown) => e,
		)
		expect(exitCodeFor(error)).toBe(2)
		expect(transport.calls).toEqual([])
	})
})
