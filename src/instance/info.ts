/**
 * Instance info file
 */

import { mkdir, readFile, stat, writeFile } from "node:fs/promises"
import { basename, join } from "node:path"
import { z } from "zod"
import { INSTANCE_INFO_FILE } from "../directories.js"
import { InstanceLoadError, errorMessage, isNotFound } from "../errors.js"
import { LOADERS } from "../types.js"

export const InstanceInfoSchema = z.object({
	/** Written for reference; the folder name is the display name */
	name: z.string().optional(),
	version: z.string().min(1),
	loader: z.enum(LOADERS),
})

export type InstanceInfo = z.infer<typeof InstanceInfoSchema>

/** Attributes read from disk for an instance folder */
export interface InstanceAttributes {
	rootPath: string
	name: string
	version: string
	loader: InstanceInfo["loader"]
}

/**
 * Read the instance at path. The display name is the folder name.
 */
export async function loadInstanceFromFolder(
	path: string,
): Promise<InstanceAttributes> {
	let isDir: boolean
	try {
		isDir = (await stat(path)).isDirectory()
	} catch (err) {
		if (isNotFound(err)) isDir = false
		else throw new InstanceLoadError("io", path, errorMessage(err), err)
	}
	if (!isDir) {
		throw new InstanceLoadError("not-a-directory", path, `${path} is not a directory`)
	}

	const infoPath = join(path, INSTANCE_INFO_FILE)
	let raw: string
	try {
		raw = await readFile(infoPath, "utf-8")
	} catch (err) {
		throw new InstanceLoadError(
			"io",
			path,
			`Unable to read ${INSTANCE_INFO_FILE}: ${errorMessage(err)}`,
			err,
		)
	}

	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch (err) {
		throw new InstanceLoadError(
			"invalid-info",
			path,
			`${INSTANCE_INFO_FILE} is not valid JSON`,
			err,
		)
	}

	const parsed = InstanceInfoSchema.safeParse(json)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new InstanceLoadError(
			"invalid-info",
			path,
			`${INSTANCE_INFO_FILE} is invalid: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown error"}`,
			parsed.error,
		)
	}

	return {
		rootPath: path,
		name: basename(path),
		version: parsed.data.version,
		loader: parsed.data.loader,
	}
}

/**
 * Create the folder layout and info file of a new instance
 */
export async function writeInstanceInfo(
	rootPath: string,
	info: InstanceInfo,
): Promise<void> {
	await mkdir(join(rootPath, ".minecraft"), { recursive: true })
	await writeFile(
		join(rootPath, INSTANCE_INFO_FILE),
		`${JSON.stringify(info, null, "\t")}\n`,
	)
}
