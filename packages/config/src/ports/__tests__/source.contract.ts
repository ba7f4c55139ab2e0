import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  /** Writes any files the source needs into `cwd`, then builds it. */
  make: (cwd: string) => Promise<ConfigSource>
  expected: Record<string, unknown>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-source-"))
      source = await h.make(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty name", () => {
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to a plain object", async () => {
      const result = await source.load()

      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("load() returns the expected values", async () => {
      expect(await source.load()).toEqual(h.expected)
    })

    it("load() is idempotent and returns a fresh object", async () => {
      const first = await source.load()
      first.INJECTED = "x"

      const second = await source.load()

      expect(second).toEqual(h.expected)
    })
  })
}
