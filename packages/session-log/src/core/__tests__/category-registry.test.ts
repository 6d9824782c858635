import { createMemoryLoggerFactory, type Logger, type LoggerFactory } from "@ormlog/logger"
import { mock } from "vitest-mock-extended"
import { loggerCategories, namespaceFor } from "../categories"
import { CategoryRegistry } from "../category-registry"

describe("CategoryRegistry", () => {
  it("creates one logger per category plus default, once", () => {
    const factory = mock<LoggerFactory>()
    factory.getLogger.mockImplementation(() => mock<Logger>())

    const registry = new CategoryRegistry(factory)

    registry.resolve("sql")
    registry.resolve("sql")
    registry.resolve("unknown")

    expect(factory.getLogger).toHaveBeenCalledTimes(loggerCategories.length + 1)
    expect(factory.getLogger).toHaveBeenCalledWith("persistence.logging.sql")
    expect(factory.getLogger).toHaveBeenCalledWith("persistence.logging.default")
  })

  it("resolves every well-known category to its own namespace", () => {
    const registry = new CategoryRegistry(createMemoryLoggerFactory())

    for (const category of loggerCategories) {
      expect(registry.resolve(category).name).toBe(namespaceFor(category))
    }
  })

  it.each([
    ["undefined", undefined],
    ["null", null],
    ["empty", ""],
    ["whitespace", "   "],
    ["unregistered", "bogus"],
    ["padded", " sql "],
    ["differently cased", "SQL"],
  ])("falls back to default for %s names", (_, category) => {
    const registry = new CategoryRegistry(createMemoryLoggerFactory())

    expect(registry.resolve(category).name).toBe("persistence.logging.default")
  })

  it("resolves the same handle on every call", () => {
    const registry = new CategoryRegistry(createMemoryLoggerFactory())

    expect(registry.resolve("cache")).toBe(registry.resolve("cache"))
    expect(registry.resolve("bogus")).toBe(registry.resolve("default"))
  })

  it("lists registered categories with default last", () => {
    const registry = new CategoryRegistry(createMemoryLoggerFactory())

    expect(registry.categories()).toEqual([...loggerCategories, "default"])
  })
})
