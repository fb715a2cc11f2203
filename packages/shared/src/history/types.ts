import { z } from "zod"

export const HistoryRecordTypeSchema = z.enum(["EVENT", "CHECKPOINT", "MISSION_ARCHIVED"])

export type HistoryRecordType = z.infer<typeof HistoryRecordTypeSchema>

export const HistoryRecordSchema = z.object({
  version: z.literal("1.0"),
  timestamp: z.string(),
  agentId: z.string().min(1),
  /** Segment the record was written to. */
  segment: z.number().int().positive(),
  /** Position within the segment, starting at 0. */
  sequence: z.number().int().nonnegative(),
  type: HistoryRecordTypeSchema,
  data: z.record(z.string(), z.unknown()),
  /** SHA-256 prefix over `data`, present on checkpoints. */
  digest: z.string().optional(),
})

export type HistoryRecord = z.infer<typeof HistoryRecordSchema>

export interface RecoveryState {
  lastCheckpoint: HistoryRecord | null
  recordsSinceCheckpoint: HistoryRecord[]
  /** Newest segment file, or "" when the agent has no history yet. */
  segmentFile: string
  segmentNumber: number
}

export interface SegmentScanResult {
  records: HistoryRecord[]
  corruptedLines: number
  lastLineTruncated: boolean
}

export interface RotationResult {
  segmentNumber: number
  segmentFile: string
  /** Older segment files, now fully subsumed by the new checkpoint. */
  superseded: string[]
}
