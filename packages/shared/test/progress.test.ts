import { afterEach, describe, expect, it, vi } from "vitest"
import {
	logProgress,
	progressEvent,
	progressEventMessage,
} from "../src/progress"

describe("progress", () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it("creates progress events with a level", () => {
		const event = progressEvent("Uploading", "warn")
		expect(event.type).toBe("progress")
		expect(event.detail.level).toBe("warn")
		expect(progressEventMessage(event)).toBe("Uploading")
	})

	it("defaults to the info level", () => {
		expect(progressEvent("Done").detail.level).toBe("info")
	})

	it("logs to the console by level", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {})
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
		const error = vi.spyOn(console, "error").mockImplementation(() => {})

		logProgress(progressEvent("one"))
		logProgress(progressEvent("two", "warn"))
		logProgress(progressEvent("three", "error"))

		expect(log).toHaveBeenCalledWith("one")
		expect(warn).toHaveBeenCalledWith("two")
		expect(error).toHaveBeenCalledWith("three")
	})
})
