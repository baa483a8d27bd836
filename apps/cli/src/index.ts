import { errorMessage } from "@osmbulk/shared/utils"
import { createProgram, exitCodeFor } from "./program"

try {
	await createProgram().parseAsync(process.argv)
} catch (error) {
	console.error(errorMessage(error))
	process.exitCode = exitCodeFor(error)
}
