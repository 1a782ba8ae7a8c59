import { Writable } from "node:stream"
import { createCodecFromConfig } from "../create-codec"
import type { CodecConfig } from "../config/schema"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

const config: CodecConfig = {
  codec: { startMask: 20_000 },
  logging: { level: "debug", prettify: false, serviceName: "oscillo-test" },
}

describe("createCodecFromConfig", () => {
  it("encodes from the configured start position", () => {
    const { destination } = makeLineDestination()
    const codec = createCodecFromConfig(config, { destination })

    expect(codec.startMask).toBe(20_000)
    expect(codec.encode(Uint8Array.of(0x41))).toEqual({
      startMask: 20_000,
      endMask: 20_032,
      prevMask: 20_016,
      endD: 16,
      lengthBytes: 1,
    })
  })

  it("writes JSON log lines tagged with the service", () => {
    const { lines, destination } = makeLineDestination()
    const codec = createCodecFromConfig(config, { destination })

    codec.encode(Uint8Array.of(0x41))

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: 20,
      msg: "encode complete",
      service: "oscillo-test",
      module: "codec",
      operation: "encode",
      steps: 2,
      bounces: { high: 0, low: 0 },
    })
  })

  it("respects the configured level", () => {
    const { lines, destination } = makeLineDestination()
    const codec = createCodecFromConfig(
      { ...config, logging: { ...config.logging, level: "info" } },
      { destination },
    )

    codec.encode(Uint8Array.of(0x41))

    expect(lines).toEqual([])
  })

  it("logs a rejected decode with its error code", () => {
    const { lines, destination } = makeLineDestination()
    const codec = createCodecFromConfig(config, { destination })

    expect(() => codec.decode(codec.encode(Uint8Array.of(0x12, 0x34)))).toThrow()

    const warn = JSON.parse(lines.at(-1) ?? "{}")

    expect(warn).toMatchObject({
      level: 40,
      msg: "decode rejected",
      code: "ambiguous_reconstruction",
      err: { message: "Cannot reconstruct step 2: 40 consistent predecessors" },
    })
  })
})
