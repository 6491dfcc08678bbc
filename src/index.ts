// This module is a library entry point
// For CLI usage, run: npx cairn watch

export * from "./types.js"
export * from "./config.js"
export * from "./arena.js"
export * from "./errors.js"
export * from "./hash.js"
export * from "./directories.js"
export * from "./backpressure.js"
export * from "./progress.js"
export * from "./mod-metadata.js"
export { Backend, type BackendOptions } from "./backend.js"
export { Instance, instancePaths, type InstancePaths } from "./instance/instance.js"
export { InstanceStore } from "./instance/store.js"
export {
	InstanceInfoSchema,
	loadInstanceFromFolder,
	writeInstanceInfo,
	type InstanceInfo,
	type InstanceAttributes,
} from "./instance/info.js"
export { LoadPipeline } from "./instance/pipeline.js"
export { parseServersDat, loadServers } from "./instance/servers.js"
export { loadWorldSummary, MAX_WORLDS } from "./instance/worlds.js"
export {
	classifyEvent,
	coalesceEvents,
	type FilesystemEvent,
	type RawFsEvent,
	type RawEventKind,
} from "./watch/classifier.js"
export { WatchRegistry, type WatchSubscriber } from "./watch/registry.js"
export { FilesystemEventRouter, type RouterContext } from "./watch/router.js"
export { WatchTargets, type WatchTarget } from "./watch/targets.js"
export { ChokidarWatcher } from "./watch/watcher.js"
export { ContentLibrary } from "./install/content-library.js"
export {
	ContentInstaller,
	type InstallHost,
	type InstallResult,
	type InstalledFile,
} from "./install/installer.js"
export { SafePath } from "./install/safe-path.js"
export { ProvenanceStore } from "./db/index.js"
