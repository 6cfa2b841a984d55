import { Config } from "../config"

describe("Config", () => {
  const data = { LOG_LEVEL: "debug", LOG_PRETTY: false, REMOTE_STORAGE: "redis://cache" }
  const provenance = {
    LOG_LEVEL: "env",
    REMOTE_STORAGE: "object:overrides",
    STALE_KEY: "env",
  }
  const providedKeys = new Set(["LOG_LEVEL", "REMOTE_STORAGE", "STALE_KEY"])

  const config = new Config(data, provenance, providedKeys)

  describe("value", () => {
    it("exposes the validated object", () => {
      expect(config.value).toEqual(data)
    })

    it("is frozen", () => {
      expect(Object.isFrozen(config.value)).toBe(true)
    })
  })

  describe("keys", () => {
    it("returns all config keys but no extra keys", () => {
      expect(config.keys().sort()).toEqual(["LOG_LEVEL", "LOG_PRETTY", "REMOTE_STORAGE"])
    })
  })

  describe("explain", () => {
    it("returns source name for key from source", () => {
      expect(config.explain("LOG_LEVEL")).toBe("env")
      expect(config.explain("REMOTE_STORAGE")).toBe("object:overrides")
    })

    it("returns 'default' for a key no source provided", () => {
      expect(config.explain("LOG_PRETTY")).toBe("default")
    })
  })

  describe("sourcesUsed", () => {
    it("returns unique source names in insertion order", () => {
      expect(config.sourcesUsed()).toEqual(["env", "object:overrides"])
    })
  })

  describe("unknownKeys", () => {
    it("returns keys in sources but not in schema", () => {
      expect(config.unknownKeys()).toEqual(["STALE_KEY"])
    })

    it("returns empty array when every key is known", () => {
      const clean = new Config(data, provenance, new Set(["LOG_LEVEL", "REMOTE_STORAGE"]))

      expect(clean.unknownKeys()).toEqual([])
    })
  })
})
