import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

describe("loadConfig", () => {
  let cwd: string

  const schema = z.object({
    START_MASK: z.coerce.number().int().default(50_000),
    SERVICE_NAME: z.string().default("oscillo"),
  })

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-load-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("fills defaults when no source provides a key", async () => {
    const config = await loadConfig({ schema, sources: [new EnvSource({ env: {} })] })

    expect(config.value).toEqual({ START_MASK: 50_000, SERVICE_NAME: "oscillo" })
    expect(config.explain("START_MASK")).toBe("default")
  })

  it("coerces and merges sources, later sources win", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "START_MASK=20000\nSERVICE_NAME=from-file")

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { START_MASK: "30000" } }),
      ],
    })

    expect(config.value).toEqual({ START_MASK: 30_000, SERVICE_NAME: "from-file" })
    expect(config.explain("START_MASK")).toBe("env")
    expect(config.explain("SERVICE_NAME")).toBe("dotenv:.env")
  })

  it("ignores undefined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ START_MASK: "40000" }),
        new EnvSource({ env: { START_MASK: undefined } }),
      ],
    })

    expect(config.value.START_MASK).toBe(40_000)
    expect(config.explain("START_MASK")).toBe("object:overrides")
  })

  it("skips a missing optional file", async () => {
    const config = await loadConfig({
      schema,
      sources: [new DotenvSource({ file: ".env.missing", required: false, cwd })],
    })

    expect(config.sourcesUsed()).toEqual(["default"])
  })

  it("reports unknown keys", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ START_MSAK: "1" })],
    })

    expect(config.unknownKeys()).toEqual(["START_MSAK"])
  })

  it("throws ConfigError when validation fails", async () => {
    const load = loadConfig({
      schema,
      sources: [new ObjectSource({ START_MASK: "not-a-number" }, "object:test")],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigError)
    await expect(load).rejects.toMatchObject({
      code: "config_invalid",
      context: { sources: ["object:test"] },
    })
    await expect(load).rejects.toThrow(/START_MASK/)
  })
})
