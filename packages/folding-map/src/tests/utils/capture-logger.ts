import { Writable } from "node:stream"
import { PinoLogger } from "@keyfold/logger"

export type CapturedEntry = Record<string, unknown>

/**
 * A trace-level PinoLogger writing JSON lines into memory.
 */
export function captureLogger() {
  const entries: CapturedEntry[] = []

  const destination = new Writable({
    write(chunk, _, cb) {
      const entry: CapturedEntry = JSON.parse(chunk.toString())

      entries.push(entry)

      cb()
    },
  })

  return {
    logger: new PinoLogger({ destination }, { level: "trace", prettify: false }),
    entries: () => [...entries],
  }
}
