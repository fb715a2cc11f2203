import { existsSync, readdirSync } from "node:fs"

import { digestOf } from "./digest.js"
import { type HistoryRecord, HistoryRecordSchema, type SegmentScanResult } from "./types.js"

const SEGMENT_PATTERN = /^segment-(\d+)\.jsonl$/

export function segmentFileName(segmentNumber: number): string {
  return `segment-${String(segmentNumber).padStart(3, "0")}.jsonl`
}

/** Segment numbers present in an agent directory, ascending. */
export function listSegmentNumbers(agentDir: string): number[] {
  if (!existsSync(agentDir)) return []

  const numbers: number[] = []
  for (const name of readdirSync(agentDir)) {
    const match = SEGMENT_PATTERN.exec(name)
    if (match?.[1]) numbers.push(Number.parseInt(match[1], 10))
  }
  return numbers.sort((a, b) => a - b)
}

export function isIntactCheckpoint(record: HistoryRecord): boolean {
  return record.type === "CHECKPOINT" && record.digest === digestOf(record.data)
}

/**
 * Parse a segment's JSONL content. A malformed final line is reported as
 * truncated (a crash mid-append) rather than corrupt.
 */
export function scanSegment(content: string): SegmentScanResult {
  const lines = content.split("\n")
  const records: HistoryRecord[] = []
  let corruptedLines = 0
  let lastLineTruncated = false

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.trim()
    if (line === "") continue

    let parsed: unknown
    try {
      parsed = JSON.parse(line)
    } catch {
      const isLastNonEmpty = lines.slice(i + 1).every((l) => l.trim() === "")
      if (isLastNonEmpty) {
        lastLineTruncated = true
      } else {
        corruptedLines++
      }
      continue
    }

    const result = HistoryRecordSchema.safeParse(parsed)
    if (result.success) {
      records.push(result.data)
    } else {
      corruptedLines++
    }
  }

  return { records, corruptedLines, lastLineTruncated }
}
