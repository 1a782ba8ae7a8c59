import { z } from "zod/mini"
import type { Coordinate, CoordinateRecord } from "../ports/coordinate"
import { CodecError, type CoordinateIssue } from "./codec-error"

export const coordinateRecordSchema = z.strictObject({
  start_mask: z.int(),
  end_mask: z.int(),
  prev_mask: z.int(),
  end_d: z.int(),
  length_bytes: z.int().check(z.gte(0)),
})

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export function toCoordinateRecord(coordinate: Coordinate): CoordinateRecord {
  return {
    start_mask: coordinate.startMask,
    end_mask: coordinate.endMask,
    prev_mask: coordinate.prevMask,
    end_d: coordinate.endD,
    length_bytes: coordinate.lengthBytes,
  }
}

/**
 * Reads a wire record. Only the shape is checked here; positions and the final
 * choice are range-checked by `decode`.
 */
export function parseCoordinateRecord(input: unknown): Coordinate {
  const result = coordinateRecordSchema.safeParse(input)

  if (!result.success) {
    const issues: CoordinateIssue[] = result.error.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }))

    throw CodecError.invalidCoordinate(issues, result.error)
  }

  const record = result.data

  return {
    startMask: record.start_mask,
    endMask: record.end_mask,
    prevMask: record.prev_mask,
    endD: record.end_d,
    lengthBytes: record.length_bytes,
  }
}

export function stringifyCoordinate(coordinate: Coordinate): string {
  return JSON.stringify(toCoordinateRecord(coordinate))
}

export function parseCoordinateJson(text: string): Coordinate {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : "Malformed JSON"
    throw CodecError.invalidCoordinate([{ path: "", message }], err)
  }

  return parseCoordinateRecord(parsed)
}
