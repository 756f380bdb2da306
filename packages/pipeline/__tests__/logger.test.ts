import { describe, it, expect, afterEach, vi } from "vitest"
import { Logger, createLogger } from "../src"

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("should prefix level and context", () => {
    const logger = createLogger("setup", { level: "debug" })

    expect(logger.format("info", "Loaded")).toBe("[info] (setup) Loaded")
    expect(logger.format("warn", "Loaded", { nodes: 2 })).toBe('[warn] (setup) Loaded\n{\n  "nodes": 2\n}')
  })

  it("should omit an empty context", () => {
    expect(new Logger({ level: "info" }).format("error", "Failed")).toBe("[error] Failed")
  })

  it("should drop messages below the level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const logger = new Logger({ level: "warn" })

    logger.info("hidden")
    logger.warn("shown")

    expect(log).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith("[warn] shown")
  })

  it("should print nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})

    new Logger({ silent: true }).error("hidden")

    expect(error).not.toHaveBeenCalled()
  })

  it("should nest child contexts", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})

    createLogger("pipeline", { level: "debug" }).child("hierarchy").debug("ready")

    expect(log).toHaveBeenCalledWith("[debug] (pipeline:hierarchy) ready")
  })
})
