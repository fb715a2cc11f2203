import { readFileSync } from "node:fs"
import { join } from "node:path"

import { isIntactCheckpoint, listSegmentNumbers, scanSegment, segmentFileName } from "./reader.js"
import type { HistoryRecord, RecoveryState } from "./types.js"

/**
 * Locate the newest intact checkpoint and every record written after it.
 *
 * Segments are walked newest first. A checkpoint whose digest does not
 * match is ignored, so a torn rotation falls back to the previous segment.
 */
export function recoverHistory(basePath: string, agentId: string): RecoveryState {
  const agentDir = join(basePath, agentId)
  const segments = listSegmentNumbers(agentDir)

  if (segments.length === 0) {
    return { lastCheckpoint: null, recordsSinceCheckpoint: [], segmentFile: "", segmentNumber: 0 }
  }

  const latestNumber = segments[segments.length - 1]!
  const latestFile = join(agentDir, segmentFileName(latestNumber))
  const perSegment = segments.map((n) =>
    scanSegment(readFileSync(join(agentDir, segmentFileName(n)), "utf-8")).records,
  )

  for (let s = perSegment.length - 1; s >= 0; s--) {
    const records = perSegment[s]!
    for (let i = records.length - 1; i >= 0; i--) {
      if (!isIntactCheckpoint(records[i]!)) continue

      const tail: HistoryRecord[] = records.slice(i + 1)
      for (const later of perSegment.slice(s + 1)) {
        tail.push(...later.filter((r) => r.type !== "CHECKPOINT"))
      }
      return {
        lastCheckpoint: records[i]!,
        recordsSinceCheckpoint: tail,
        segmentFile: latestFile,
        segmentNumber: latestNumber,
      }
    }
  }

  return {
    lastCheckpoint: null,
    recordsSinceCheckpoint: perSegment.flat().filter((r) => r.type !== "CHECKPOINT"),
    segmentFile: latestFile,
    segmentNumber: latestNumber,
  }
}
