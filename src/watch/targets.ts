/**
 * Watch targets: what a watched path means to the backend
 */

import type { InstanceId } from "../arena.js"

export type WatchTarget =
	| { kind: "instances-root" }
	| { kind: "instance-dir"; id: InstanceId }
	| { kind: "invalid-instance-dir" }
	/** A world folder inside an instance's saves directory */
	| { kind: "instance-level-dir"; id: InstanceId }
	| { kind: "instance-saves-dir"; id: InstanceId }
	| { kind: "instance-mods-dir"; id: InstanceId }
	| { kind: "servers-file"; id: InstanceId }

/** Targets that belong to one instance */
export type InstanceWatchTarget = Extract<WatchTarget, { id: InstanceId }>

export const WatchTargets = {
	instancesRoot: (): WatchTarget => ({ kind: "instances-root" }),
	instanceDir: (id: InstanceId): WatchTarget => ({ kind: "instance-dir", id }),
	invalidInstanceDir: (): WatchTarget => ({ kind: "invalid-instance-dir" }),
	levelDir: (id: InstanceId): WatchTarget => ({
		kind: "instance-level-dir",
		id,
	}),
	savesDir: (id: InstanceId): WatchTarget => ({
		kind: "instance-saves-dir",
		id,
	}),
	modsDir: (id: InstanceId): WatchTarget => ({ kind: "instance-mods-dir", id }),
	serversFile: (id: InstanceId): WatchTarget => ({ kind: "servers-file", id }),
} as const

export function isInstanceTarget(
	target: WatchTarget,
): target is InstanceWatchTarget {
	return "id" in target
}
