/**
 * File hashing utilities
 * SHA-1 is the content address of every file in the content library
 */

import { createReadStream } from "node:fs"
import { createHash } from "node:crypto"
import { isNotFound } from "./errors.js"

export interface FileHash {
	sha1: string
	size: number
}

const SHA1_HEX = /^[0-9a-fA-F]{40}$/

/**
 * Normalize a sha1 given as hex (either case) to lowercase.
 * Returns null when the input is not 40 hex characters.
 */
export function parseSha1(hash: string): string | null {
	const trimmed = hash.trim()
	if (!SHA1_HEX.test(trimmed)) return null
	return trimmed.toLowerCase()
}

/**
 * Calculate SHA-1 and size for a file
 * Uses streaming to handle large files efficiently
 */
export async function hashFile(filePath: string): Promise<FileHash> {
	const sha1Hash = createHash("sha1")
	let size = 0

	const stream = createReadStream(filePath)

	for await (const chunk of stream) {
		const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
		sha1Hash.update(buffer)
		size += buffer.length
	}

	return {
		sha1: sha1Hash.digest("hex"),
		size,
	}
}

/**
 * Check whether the file at filePath has the given sha1.
 * A missing file is reported as not matching.
 */
export async function checkSha1(
	filePath: string,
	expectedSha1: string,
): Promise<boolean> {
	try {
		const actual = await hashFile(filePath)
		return actual.sha1 === expectedSha1.toLowerCase()
	} catch (err) {
		if (isNotFound(err)) return false
		throw err
	}
}
