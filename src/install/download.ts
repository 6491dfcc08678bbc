/**
 * Verified download into the content library
 *
 * Streams the response to a unique .part file while hashing it, then checks
 * the digest and the byte count before renaming into place. On a mismatch
 * the partial file and anything already at the final path are deleted.
 */

import { createHash } from "node:crypto"
import { createWriteStream } from "node:fs"
import { rename } from "node:fs/promises"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { Agent, fetch, type Dispatcher } from "undici"
import { ContentInstallError } from "../errors.js"
import type { ContentLibrary } from "./content-library.js"

export const HTTP_AGENT = new Agent({
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	pipelining: 1,
})

export interface DownloadRequest {
	url: string
	/** Lowercase hex sha1 */
	sha1: string
	size: number
	/** Final path inside the library */
	dest: string
}

export interface DownloadOptions {
	library: ContentLibrary
	userAgent: string
	dispatcher?: Dispatcher | undefined
	/** Called with the byte count of every received chunk */
	onBytes?: ((bytes: number) => void) | undefined
}

export async function downloadIntoLibrary(
	request: DownloadRequest,
	options: DownloadOptions,
): Promise<void> {
	const { url, sha1, size, dest } = request
	const { library } = options

	let response: Awaited<ReturnType<typeof fetch>>
	try {
		response = await fetch(url, {
			headers: { "User-Agent": options.userAgent },
			dispatcher: options.dispatcher ?? HTTP_AGENT,
			redirect: "follow",
		})
	} catch (err) {
		throw ContentInstallError.request(err, url)
	}

	if (response.status !== 200) {
		await response.body?.cancel()
		throw ContentInstallError.notOk(response.status, url)
	}
	if (!response.body) {
		throw ContentInstallError.request(new Error("No response body"), url)
	}

	await library.ensureDir(dest)
	const part = library.partPath(dest)

	const hash = createHash("sha1")
	let received = 0
	const onBytes = options.onBytes

	try {
		await pipeline(
			Readable.fromWeb(response.body),
			async function* (source: AsyncIterable<Buffer>) {
				for await (const chunk of source) {
					hash.update(chunk)
					received += chunk.length
					onBytes?.(chunk.length)
					yield chunk
				}
			},
			createWriteStream(part, { highWaterMark: 1024 * 1024 }),
		)
	} catch (err) {
		await library.discard(part)
		throw ContentInstallError.request(err, url)
	}

	const actual = hash.digest("hex")
	if (actual !== sha1 || received !== size) {
		await library.discard(part)
		await library.discard(dest)
		if (actual !== sha1) throw ContentInstallError.wrongHash(sha1, actual)
		throw ContentInstallError.wrongFilesize(size, received)
	}

	try {
		await rename(part, dest)
	} catch (err) {
		await library.discard(part)
		throw ContentInstallError.io(err, `move download into ${dest}`)
	}
}
