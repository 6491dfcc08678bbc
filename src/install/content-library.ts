/**
 * Content-addressed file store
 *
 * Every installed file lives once under `<root>/<hex[0:2]>/<hex>[.ext]`,
 * where hex is its lowercase sha1 and ext comes from the path it was
 * installed as. Instances hard-link to these files.
 */

import { randomBytes } from "node:crypto"
import { copyFile, mkdir, rename, rm } from "node:fs/promises"
import { dirname, join } from "node:path"
import { ContentInstallError } from "../errors.js"
import { checkSha1, hashFile, parseSha1 } from "../hash.js"
import { log } from "../logger.js"

export interface StoredFile {
	sha1: string
	path: string
}

export class ContentLibrary {
	constructor(readonly root: string) {}

	/**
	 * Physical path for a hash. Throws InvalidHash when sha1 is not 40 hex
	 * characters.
	 */
	pathFor(sha1: string, extension: string | null): string {
		const hex = parseSha1(sha1)
		if (hex === null) throw ContentInstallError.invalidHash(sha1)
		const fileName = extension ? `${hex}.${extension}` : hex
		return join(this.root, hex.slice(0, 2), fileName)
	}

	/** Unique temporary sibling for writing path */
	partPath(path: string): string {
		return `${path}.${process.pid}-${randomBytes(4).toString("hex")}.part`
	}

	/** True when a file with the right digest is already stored at path */
	async hasValid(path: string, sha1: string): Promise<boolean> {
		return checkSha1(path, sha1)
	}

	async ensureDir(path: string): Promise<void> {
		try {
			await mkdir(dirname(path), { recursive: true })
		} catch (err) {
			throw ContentInstallError.io(err, `create ${dirname(path)}`)
		}
	}

	/** Delete a file, ignoring a missing one */
	async discard(path: string): Promise<void> {
		try {
			await rm(path, { force: true })
		} catch (err) {
			log.install.warn({ err, path }, "failed to delete file")
		}
	}

	/**
	 * Copy a local file into the store, unless a valid copy is already there.
	 */
	async ingestFile(
		sourcePath: string,
		extension: string | null,
	): Promise<StoredFile & { copied: boolean }> {
		let sha1: string
		try {
			sha1 = (await hashFile(sourcePath)).sha1
		} catch (err) {
			throw ContentInstallError.io(err, `read ${sourcePath}`)
		}

		const path = this.pathFor(sha1, extension)
		if (await this.hasValid(path, sha1)) {
			return { sha1, path, copied: false }
		}

		await this.ensureDir(path)
		const part = this.partPath(path)
		try {
			await copyFile(sourcePath, part)
			await rename(part, path)
		} catch (err) {
			await this.discard(part)
			throw ContentInstallError.io(err, `copy ${sourcePath} into the library`)
		}
		return { sha1, path, copied: true }
	}
}
