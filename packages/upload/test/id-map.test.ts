import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { ignoreProgress, type ProgressEvent } from "@osmbulk/shared/progress"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { IdConflictError } from "../src/errors"
import { OsmIdMap } from "../src/id-map"
import { FileStorage, MemoryStorage } from "../src/id-map-storage"

describe("OsmIdMap", () => {
	it("looks up recorded ids by type", () => {
		const idMap = new OsmIdMap(new MemoryStorage(), ignoreProgress)
		idMap.record("node", -1, 4001)

		expect(idMap.get("node", -1)).toBe(4001)
		expect(idMap.get("way", -1)).toBeUndefined()
		expect(idMap.has("node", -1)).toBe(true)
		expect(idMap.size()).toBe(1)
	})

	it("records the same mapping twice without error", () => {
		const idMap = new OsmIdMap(new MemoryStorage(), ignoreProgress)
		idMap.record("way", -5, 900)
		idMap.record("way", -5, 900)
		expect(idMap.size("way")).toBe(1)
	})

	it("refuses to overwrite a mapping", () => {
		const idMap = new OsmIdMap(new MemoryStorage(), ignoreProgress)
		idMap.record("relation", -7, 3000)

		expect(() => idMap.record("relation", -7, 3001)).toThrow(IdConflictError)
		expect(idMap.get("relation", -7)).toBe(3000)
	})

	it("maps deleted ids to themselves", () => {
		const idMap = new OsmIdMap(new MemoryStorage(), ignoreProgress)
		idMap.recordDeleted("node", 812)
		expect(idMap.get("node", 812)).toBe(812)
	})

	it("persists and loads the map", async () => {
		const storage = new MemoryStorage()
		const idMap = new OsmIdMap(storage, ignoreProgress)
		idMap.record("node", -1, 4001)
		idMap.record("relation", -20, 3000)
		await idMap.persist()

		expect(storage.data).toBe(
			'{"node":{"-1":4001},"way":{},"relation":{"-20":3000}}',
		)

		const loaded = await OsmIdMap.load(storage, ignoreProgress)
		expect(loaded.toJSON()).toEqual(idMap.toJSON())
	})

	it("starts empty without stored data", async () => {
		const idMap = await OsmIdMap.load(new MemoryStorage(), ignoreProgress)
		expect(idMap.size()).toBe(0)
	})

	it("starts empty and warns when the stored data is invalid", async () => {
		const events: ProgressEvent[] = []
		const invalidJson = await OsmIdMap.load(new MemoryStorage("{"), (e) =>
			events.push(e),
		)
		const invalidFormat = await OsmIdMap.load(
			new MemoryStorage('{"node":{"abc":1}}'),
			(e) => events.push(e),
		)

		expect(invalidJson.size()).toBe(0)
		expect(invalidFormat.size()).toBe(0)
		expect(events.map((e) => e.detail.level)).toEqual(["warn", "warn"])
		expect(events[1]?.detail.msg).toBe(
			"Id map has an unexpected format, starting empty",
		)
	})

	it("fills in missing types", async () => {
		const idMap = await OsmIdMap.load(
			new MemoryStorage('{"node":{"-3":77}}'),
			ignoreProgress,
		)
		expect(idMap.get("node", -3)).toBe(77)
		expect(idMap.size("way")).toBe(0)
	})
})

describe("FileStorage", () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "osmbulk-"))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("reads null when the file does not exist", async () => {
		expect(await new FileStorage(join(dir, "missing.db")).read()).toBeNull()
	})

	it("writes through a temporary file", async () => {
		const path = join(dir, "import.osm.db")
		const storage = new FileStorage(path)
		await storage.writeAtomic("first")
		await storage.writeAtomic("second")

		expect(await readFile(path, "utf8")).toBe("second")
		await expect(readFile(`${path}.tmp`, "utf8")).rejects.toThrow()
	})

	it("keeps the last persisted map when a write stops before the rename", async () => {
		const path = join(dir, "import.osm.db")
		const idMap = new OsmIdMap(new FileStorage(path), ignoreProgress)
		idMap.record("node", -1, 4001)
		await idMap.persist()

		// A crash while writing leaves a partial temporary file behind
		await writeFile(`${path}.tmp`, '{"node":{"-1":40', "utf8")

		const loaded = await OsmIdMap.load(new FileStorage(path), ignoreProgress)
		expect(loaded.toJSON()).toEqual({ node: { "-1": 4001 }, way: {}, relation: {} })
	})

	it("removes the file", async () => {
		const storage = new FileStorage(join(dir, "marker"))
		await storage.writeAtomic("x")
		await storage.remove()
		await storage.remove()
		expect(await storage.read()).toBeNull()
	})
})
