import { describe, expect, it } from "vitest"
import { ConfigError, resolveConfig } from "../src/config"

describe("resolveConfig", () => {
	const base = { input: "import.osm", comment: "Benches" }

	it("applies defaults", () => {
		expect(resolveConfig({ ...base, token: "test-token" }, {})).toEqual({
			input: "import.osm",
			comment: "Benches",
			apiUrl: "https://api.openstreetmap.org",
			token: "test-token",
			idMapPath: "import.osm.db",
			diffsetSize: 1000,
			changesetSize: 50_000,
			maxWayNodes: 2000,
			tags: {},
		})
	})

	it("falls back to the environment", () => {
		const config = resolveConfig(base, {
			OSM_API_URL: "https://master.apis.dev.openstreetmap.org",
			OSM_USERNAME: "mapper",
			OSM_PASSWORD: "test-secret",
		})
		expect(config).toMatchObject({
			apiUrl: "https://master.apis.dev.openstreetmap.org",
			username: "mapper",
			password: "test-secret",
		})
	})

	it("prefers flags over the environment", () => {
		const config = resolveConfig(
			{ ...base, token: "flag-token" },
			{ OSM_TOKEN: "env-token" },
		)
		expect(config.token).toBe("flag-token")
	})

	it("parses limits, tags and the id map path", () => {
		const config = resolveConfig(
			{
				...base,
				token: "test-token",
				idMap: "ids.json",
				diffsetSize: "250",
				changesetSize: "9000",
				tag: ["source=survey", "note=a=b"],
			},
			{},
		)
		expect(config).toMatchObject({
			idMapPath: "ids.json",
			diffsetSize: 250,
			changesetSize: 9000,
			tags: { source: "survey", note: "a=b" },
		})
	})

	it("requires credentials", () => {
		expect(() => resolveConfig({ ...base, user: "mapper" }, {})).toThrow(
			"token: Either a token or a username and password are required",
		)
	})

	it("rejects invalid values", () => {
		expect(() =>
			resolveConfig({ ...base, token: "t", diffsetSize: "0", tag: ["novalue"] }, {}),
		).toThrow(ConfigError)
	})
})
