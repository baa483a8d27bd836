/**
 * Progress event helpers for long-running operations.
 *
 * Uploads report what they are doing through an `onProgress` callback that
 * receives a `ProgressEvent`. The default callback, `logProgress`, writes the
 * message to the console at the event's level.
 *
 * @module
 */

export type ProgressLevel = "info" | "warn" | "error"

/**
 * Progress payload containing a message, its level and a timestamp.
 */
export type Progress = {
	msg: string
	level: ProgressLevel
	timestamp: number
}

/** CustomEvent carrying progress details. */
export interface ProgressEvent extends CustomEvent<Progress> {}

/** Callback receiving progress events. */
export type OnProgress = (progress: ProgressEvent) => void

/**
 * Create a Progress payload with current timestamp.
 */
export function progress(msg: string, level: ProgressLevel = "info"): Progress {
	return {
		msg,
		level,
		timestamp: Date.now(),
	}
}

/**
 * Create a ProgressEvent with the given message.
 */
export function progressEvent(
	msg: string,
	level: ProgressLevel = "info",
): ProgressEvent {
	return new CustomEvent("progress", { detail: progress(msg, level) })
}

/**
 * Extract the message string from a progress event.
 */
export function progressEventMessage(event: ProgressEvent): string {
	return event.detail.msg
}

/**
 * Log a progress event's message to the console.
 */
export function logProgress(progress: ProgressEvent) {
	const msg = progressEventMessage(progress)
	switch (progress.detail.level) {
		case "warn":
			console.warn(msg)
			break
		case "error":
			console.error(msg)
			break
		default:
			console.log(msg)
	}
}

/** Drop progress events. Useful in tests and for quiet runs. */
export function ignoreProgress(_progress: ProgressEvent) {}
