/**
 * History compaction for one agent.
 *
 * A compaction writes the actor's checkpoint as the first record of a new
 * segment and retires the segments it supersedes: each one is shipped to
 * the archive and then deleted. A failed rotation leaves the old segment
 * in place and is retried on the next trigger; repeated failures raise a
 * HistoryOverflow alert.
 */

import { readFile, rm } from "node:fs/promises"
import { basename } from "node:path"

import type { HistoryWriter } from "@aether/shared/history"
import type { TracingLogger } from "@aether/shared/tracing"

import type { MissionArchive } from "../fleet/collaborators.js"

export interface CompactionOptions {
  eventThreshold: number
  intervalMs: number
  alertAfterFailures: number
}

export interface CompactionAlert {
  kind: "HistoryOverflow"
  agentId: string
  consecutiveFailures: number
  pendingEvents: number
  error: string
}

export type CompactionOutcome =
  | { status: "compacted"; segmentNumber: number; superseded: number }
  | { status: "failed"; consecutiveFailures: number; error: string }

export interface HistoryCompactorDeps {
  agentId: string
  history: Pick<HistoryWriter, "rotate">
  archive: MissionArchive
  options: CompactionOptions
  logger: TracingLogger
  now?: () => number
  onAlert?: (alert: CompactionAlert) => void
}

export class HistoryCompactor {
  private readonly deps: HistoryCompactorDeps
  private readonly now: () => number
  private eventsSinceCheckpoint = 0
  private failures = 0
  private lastCompactedAt: number
  private readonly archivals = new Set<Promise<void>>()

  constructor(deps: HistoryCompactorDeps) {
    this.deps = deps
    this.now = deps.now ?? Date.now
    this.lastCompactedAt = this.now()
  }

  /** Count one logged event towards the threshold. */
  recordEvent(): void {
    this.eventsSinceCheckpoint++
  }

  get pendingEvents(): number {
    return this.eventsSinceCheckpoint
  }

  get consecutiveFailures(): number {
    return this.failures
  }

  isDue(): boolean {
    if (this.eventsSinceCheckpoint >= this.deps.options.eventThreshold) return true
    return this.eventsSinceCheckpoint > 0 && this.now() - this.lastCompactedAt >= this.deps.options.intervalMs
  }

  /**
   * Rotate onto a new segment headed by `checkpoint`. Never throws; the
   * archival of superseded segments continues in the background.
   */
  compact(checkpoint: Record<string, unknown>): CompactionOutcome {
    try {
      const rotation = this.deps.history.rotate(checkpoint)
      this.eventsSinceCheckpoint = 0
      this.failures = 0
      this.lastCompactedAt = this.now()

      if (rotation.superseded.length > 0) {
        const job: Promise<void> = this.retire(rotation.superseded).finally(() => this.archivals.delete(job))
        this.archivals.add(job)
      }

      this.deps.logger.debug("history compacted", {
        segment: rotation.segmentNumber,
        superseded: rotation.superseded.length,
      })
      return {
        status: "compacted",
        segmentNumber: rotation.segmentNumber,
        superseded: rotation.superseded.length,
      }
    } catch (err) {
      this.failures++
      const error = err instanceof Error ? err.message : String(err)
      this.deps.logger.warn("history compaction failed", {
        consecutiveFailures: this.failures,
        error,
      })

      if (this.failures >= this.deps.options.alertAfterFailures) {
        const alert: CompactionAlert = {
          kind: "HistoryOverflow",
          agentId: this.deps.agentId,
          consecutiveFailures: this.failures,
          pendingEvents: this.eventsSinceCheckpoint,
          error,
        }
        this.deps.logger.error("HistoryOverflow", { ...alert })
        this.deps.onAlert?.(alert)
      }
      return { status: "failed", consecutiveFailures: this.failures, error }
    }
  }

  /** Wait for background archival of superseded segments. */
  async flush(): Promise<void> {
    await Promise.all([...this.archivals])
  }

  private async retire(paths: string[]): Promise<void> {
    for (const path of paths) {
      try {
        const content = await readFile(path, "utf-8")
        await this.deps.archive.storeSegment({
          agentId: this.deps.agentId,
          segmentName: basename(path),
          content,
        })
      } catch (err) {
        // The checkpoint already covers this segment; keep disk usage bounded.
        this.deps.logger.warn("segment archival failed", {
          segment: basename(path),
          error: err,
        })
      }

      try {
        await rm(path, { force: true })
      } catch (err) {
        this.deps.logger.warn("segment removal failed", {
          segment: basename(path),
          error: err,
        })
      }
    }
  }
}
