import {
  appendFileSync,
  closeSync,
  existsSync,
  fdatasyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  rmSync,
} from "node:fs"
import { join } from "node:path"

import { digestOf } from "./digest.js"
import { listSegmentNumbers, scanSegment, segmentFileName } from "./reader.js"
import type { HistoryRecord, RotationResult } from "./types.js"

const FSYNC_INTERVAL_MS = 30_000

export type AppendableRecord = Omit<HistoryRecord, "sequence" | "segment" | "digest">

/**
 * Append-only JSONL log for one agent, split into numbered segments.
 *
 * Events go to the current segment. `rotate()` opens the next segment with
 * a checkpoint as its first record; every older segment is then superseded
 * and may be archived and deleted by the caller.
 */
export class HistoryWriter {
  private readonly basePath: string
  private readonly agentId: string
  private segmentNumber: number
  private sequence: number
  private filePath: string
  private fd: number | null
  private lastFsyncAt: number
  private readonly fsyncIntervalMs: number

  constructor(basePath: string, agentId: string, options: { fsyncIntervalMs?: number } = {}) {
    this.basePath = basePath
    this.agentId = agentId
    this.sequence = 0
    this.fd = null
    this.lastFsyncAt = Date.now()
    this.fsyncIntervalMs = options.fsyncIntervalMs ?? FSYNC_INTERVAL_MS

    const agentDir = join(this.basePath, this.agentId)
    if (!existsSync(agentDir)) {
      mkdirSync(agentDir, { recursive: true })
    }

    // Continue the newest segment after a restart rather than starting over.
    const existing = listSegmentNumbers(agentDir)
    this.segmentNumber = existing.length > 0 ? existing[existing.length - 1]! : 1
    this.filePath = join(agentDir, segmentFileName(this.segmentNumber))
    this.fd = openSync(this.filePath, "a")

    if (existing.length > 0) {
      const content = readFileSync(this.filePath, "utf-8")
      const { records } = scanSegment(content)
      const last = records[records.length - 1]
      this.sequence = last ? last.sequence + 1 : 0
      // A torn final line must not swallow the next record.
      if (content.length > 0 && !content.endsWith("\n")) {
        appendFileSync(this.fd, "\n", "utf-8")
      }
    }
  }

  append(record: AppendableRecord): HistoryRecord {
    const full: HistoryRecord = {
      ...record,
      segment: this.segmentNumber,
      sequence: this.sequence++,
    }

    appendFileSync(this.filePath, JSON.stringify(full) + "\n", "utf-8")

    if (Date.now() - this.lastFsyncAt >= this.fsyncIntervalMs) {
      this.fsync()
    }
    return full
  }

  /**
   * Start a new segment whose first record is the given checkpoint.
   *
   * The checkpoint is fsynced before the writer switches over. If anything
   * fails the partial segment is removed and the writer keeps appending to
   * the old one, so the caller can simply retry later.
   */
  rotate(checkpoint: Record<string, unknown>, timestamp: string = new Date().toISOString()): RotationResult {
    const agentDir = join(this.basePath, this.agentId)
    const nextNumber = this.segmentNumber + 1
    const nextPath = join(agentDir, segmentFileName(nextNumber))

    const record: HistoryRecord = {
      version: "1.0",
      timestamp,
      agentId: this.agentId,
      segment: nextNumber,
      sequence: 0,
      type: "CHECKPOINT",
      data: checkpoint,
      digest: digestOf(checkpoint),
    }

    let nextFd: number | null = null
    try {
      nextFd = openSync(nextPath, "w")
      appendFileSync(nextFd, JSON.stringify(record) + "\n", "utf-8")
      fdatasyncSync(nextFd)
    } catch (err) {
      if (nextFd !== null) closeSync(nextFd)
      rmSync(nextPath, { force: true })
      throw err
    }

    const superseded = listSegmentNumbers(agentDir)
      .filter((n) => n < nextNumber)
      .map((n) => join(agentDir, segmentFileName(n)))

    this.close()
    this.fd = nextFd
    this.segmentNumber = nextNumber
    this.filePath = nextPath
    this.sequence = 1
    this.lastFsyncAt = Date.now()

    return { segmentNumber: nextNumber, segmentFile: nextPath, superseded }
  }

  fsync(): void {
    if (this.fd !== null) {
      fdatasyncSync(this.fd)
      this.lastFsyncAt = Date.now()
    }
  }

  close(): void {
    if (this.fd !== null) {
      fdatasyncSync(this.fd)
      closeSync(this.fd)
      this.fd = null
    }
  }

  get currentFilePath(): string {
    return this.filePath
  }

  get currentSegmentNumber(): number {
    return this.segmentNumber
  }

  get currentSequence(): number {
    return this.sequence
  }
}
