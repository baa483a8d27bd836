import { readFile } from "node:fs/promises"
import { dirname, join, resolve } from "node:path"
import { fileURLToPath } from "node:url"

const __dirname = dirname(fileURLToPath(import.meta.url))
const ROOT_DIR = resolve(__dirname, "../../")
const FIXTURES_DIR = resolve(ROOT_DIR, "fixtures")

export function getFixturePath(name: string) {
	return join(FIXTURES_DIR, name)
}

/**
 * Read a fixture file from the repository's `fixtures` folder as text.
 */
export function getFixtureText(name: string): Promise<string> {
	return readFile(getFixturePath(name), "utf8")
}
