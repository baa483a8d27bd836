/**
 * Errors shared by the readers and the uploader.
 *
 * @module
 */

/**
 * The input cannot be uploaded as it is. Always thrown before any request is
 * sent to the server.
 */
export class InputError extends Error {
	override name = "InputError"
}
