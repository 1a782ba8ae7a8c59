import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses key=value pairs, quotes and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `# codec defaults\nSTART_MASK=50000\nSERVICE_NAME="oscillo dev"\nLOG_LEVEL='debug'`,
    )

    const result = await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(result).toEqual({
      START_MASK: "50000",
      SERVICE_NAME: "oscillo dev",
      LOG_LEVEL: "debug",
    })
  })

  it("filters and strips the prefix", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "OSCILLO_START_MASK=20000\nOTHER=1")

    const source = new DotenvSource({ file: ".env", required: true, cwd, prefix: "OSCILLO_" })

    expect(await source.load()).toEqual({ START_MASK: "20000" })
  })

  it("returns an empty object when an optional file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects when a required file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toThrow(/ENOENT/)
  })

  it("resolves the path relative to cwd", async () => {
    const subdir = path.join(cwd, "config")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, ".env.test"), "START_MASK=10000")

    const source = new DotenvSource({ file: "config/.env.test", required: true, cwd })

    expect(source.name).toBe("dotenv:config/.env.test")
    expect(await source.load()).toEqual({ START_MASK: "10000" })
  })
})
