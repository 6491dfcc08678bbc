/**
 * Streaming ZIP entry reading using yauzl
 *
 * Mod jars and modpacks are zip archives; only a handful of small metadata
 * entries are ever needed, so entries are walked lazily and just the wanted
 * ones are buffered.
 */

import type { Readable } from "node:stream"
import yauzl from "yauzl"

/** Largest entry buffered into memory */
const MAX_ENTRY_BYTES = 8 * 1024 * 1024

/**
 * Promisified yauzl.open
 */
function openZip(path: string): Promise<yauzl.ZipFile> {
	return new Promise((resolve, reject) => {
		yauzl.open(
			path,
			{ lazyEntries: true, autoClose: false },
			(err, zipFile) => {
				if (err) reject(err)
				else if (!zipFile) reject(new Error("Failed to open zip file"))
				else resolve(zipFile)
			},
		)
	})
}

/**
 * Get readable stream for a zip entry
 */
function openReadStream(
	zipFile: yauzl.ZipFile,
	entry: yauzl.Entry,
): Promise<Readable> {
	return new Promise((resolve, reject) => {
		zipFile.openReadStream(entry, (err, stream) => {
			if (err) reject(err)
			else if (!stream) reject(new Error("Failed to open read stream"))
			else resolve(stream)
		})
	})
}

async function readStream(stream: Readable): Promise<Buffer> {
	const chunks: Buffer[] = []
	for await (const chunk of stream) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
	}
	return Buffer.concat(chunks)
}

/**
 * Read the named entries of an archive. Names absent from the archive are
 * absent from the result; entries over 8 MiB are skipped.
 */
export async function readZipEntries(
	archivePath: string,
	names: ReadonlySet<string>,
): Promise<Map<string, Buffer>> {
	const found = new Map<string, Buffer>()
	const zipFile = await openZip(archivePath)

	try {
		await new Promise<void>((resolve, reject) => {
			zipFile.on("error", reject)
			zipFile.on("end", resolve)

			zipFile.on("entry", (entry: yauzl.Entry) => {
				if (
					!names.has(entry.fileName) ||
					entry.uncompressedSize > MAX_ENTRY_BYTES
				) {
					zipFile.readEntry()
					return
				}

				openReadStream(zipFile, entry)
					.then(readStream)
					.then(data => {
						found.set(entry.fileName, data)
						if (found.size === names.size) resolve()
						else zipFile.readEntry()
					})
					.catch(reject)
			})

			zipFile.readEntry()
		})
	} finally {
		zipFile.close()
	}

	return found
}

/**
 * Check if a file name looks like a zip archive by extension
 */
export function isZipArchive(filename: string): boolean {
	const lower = filename.toLowerCase()
	return (
		lower.endsWith(".zip") ||
		lower.endsWith(".jar") ||
		lower.endsWith(".jar.disabled") ||
		lower.endsWith(".mrpack")
	)
}
