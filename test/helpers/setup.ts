/**
 * Vitest setup file - runs before all tests
 */

// The logger reads its levels at import time
process.env["LOG_LEVEL"] = "silent"
process.env["LOG_LEVEL_FILE"] = "silent"

// A developer's own launcher dir must never leak into tests
delete process.env["CAIRN_DIR"]

if (process.env["CI"]) {
	process.env["NO_COLOR"] = "1"
}
