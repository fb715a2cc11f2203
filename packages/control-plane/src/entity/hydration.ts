/**
 * Entity hydration from the JSONL history.
 *
 * Recovery starts at the newest intact checkpoint and replays only the
 * EVENT records written after it. MISSION_ARCHIVED records are informational
 * and skipped; an EVENT whose message no longer parses is skipped with a
 * warning rather than failing the whole agent.
 */

import { recoverHistory } from "@aether/shared/history"
import type { TracingLogger } from "@aether/shared/tracing"

import { CheckpointSchema } from "./checkpoint.js"
import { type ActorMessage, ActorMessageSchema } from "./messages.js"
import type { RecoveredHistory } from "./state-machine.js"

export class CorruptCheckpointError extends Error {
  readonly agentId: string

  constructor(agentId: string, detail: string) {
    super(`Checkpoint for ${agentId} does not match the checkpoint schema: ${detail}`)
    this.name = "CorruptCheckpointError"
    this.agentId = agentId
  }
}

export interface HydrationResult extends RecoveredHistory {
  /** Segment the writer will continue appending to. */
  segmentNumber: number
  skippedRecords: number
}

export function loadEntityHistory(historyDir: string, agentId: string, logger: TracingLogger): HydrationResult {
  const recovery = recoverHistory(historyDir, agentId)

  let checkpoint: RecoveredHistory["checkpoint"] = null
  if (recovery.lastCheckpoint) {
    const parsed = CheckpointSchema.safeParse(recovery.lastCheckpoint.data)
    if (!parsed.success) {
      throw new CorruptCheckpointError(agentId, parsed.error.issues[0]?.message ?? "unknown")
    }
    checkpoint = parsed.data
  }

  const messages: ActorMessage[] = []
  let skippedRecords = 0
  for (const record of recovery.recordsSinceCheckpoint) {
    if (record.type !== "EVENT") continue
    const parsed = ActorMessageSchema.safeParse(record.data.message)
    if (parsed.success) {
      messages.push(parsed.data)
    } else {
      skippedRecords++
      logger.warn("unparseable history event skipped", {
        agentId,
        segment: record.segment,
        sequence: record.sequence,
      })
    }
  }

  return { checkpoint, messages, segmentNumber: recovery.segmentNumber, skippedRecords }
}
