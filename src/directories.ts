import { join } from "node:path"

/**
 * Layout of the launcher directory
 */
export interface LauncherDirectories {
	root: string
	instancesDir: string
	contentLibraryDir: string
	contentMetaDir: string
	provenanceDbPath: string
	logDir: string
}

export function launcherDirectories(root: string): LauncherDirectories {
	const contentMetaDir = join(root, "contentmeta")
	return {
		root,
		instancesDir: join(root, "instances"),
		contentLibraryDir: join(root, "contentlibrary"),
		contentMetaDir,
		provenanceDbPath: join(contentMetaDir, "provenance.db"),
		logDir: join(root, "logs"),
	}
}

/** File inside an instance folder whose presence makes the folder an instance */
export const INSTANCE_INFO_FILE = "info.json"
