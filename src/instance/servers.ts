/**
 * servers.dat reader
 */

import { readFile } from "node:fs/promises"
import * as nbt from "prismarine-nbt"
import { z } from "zod"
import { isNotFound } from "../errors.js"
import { log } from "../logger.js"
import type { ServerSummary } from "../types.js"

const ServerEntry = z.object({
	name: z.string().optional(),
	ip: z.string().optional(),
	icon: z.string().optional(),
	hidden: z.number().optional(),
})

const ServersDat = z.object({
	servers: z.array(z.unknown()).default([]),
})

function decodeIcon(icon: string | undefined): Buffer | null {
	if (icon === undefined || icon === "") return null
	const bytes = Buffer.from(icon, "base64")
	return bytes.length > 0 ? bytes : null
}

/**
 * Parse an uncompressed servers.dat. Hidden entries and entries without an
 * address are skipped.
 */
export function parseServersDat(raw: Buffer): ServerSummary[] {
	const root = ServersDat.parse(nbt.simplify(nbt.parseUncompressed(raw, "big")))

	const servers: ServerSummary[] = []
	for (const item of root.servers) {
		const entry = ServerEntry.safeParse(item)
		if (!entry.success) {
			log.loader.debug({ issues: entry.error.issues }, "skipping server entry")
			continue
		}
		const { name, ip, icon, hidden } = entry.data
		if (hidden !== undefined && hidden !== 0) continue
		if (ip === undefined) continue

		servers.push({
			name: name ?? "<unnamed>",
			address: ip,
			pngIcon: decodeIcon(icon),
		})
	}
	return servers
}

/** A missing servers.dat is an empty list */
export async function loadServers(serversPath: string): Promise<ServerSummary[]> {
	let raw: Buffer
	try {
		raw = await readFile(serversPath)
	} catch (err) {
		if (isNotFound(err)) return []
		throw err
	}
	return parseServersDat(raw)
}
