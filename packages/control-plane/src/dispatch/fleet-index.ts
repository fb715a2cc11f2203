/**
 * Copy-on-write index of agent status records.
 *
 * Each actor publishes its own record after every commit; dispatch reads
 * snapshots. Records are frozen and the map is replaced wholesale on every
 * write, so a snapshot never changes under a reader.
 */

import type { GeoPoint, LifecycleState } from "@aether/shared/fleet"

export interface IndexRecord {
  readonly agentId: string
  readonly lifecycleState: LifecycleState
  readonly connected: boolean
  readonly sensors: readonly string[]
  readonly maxRangeMeters: number
  readonly payloadCapacityKg: number
  readonly serviceArea: string
  readonly position: Readonly<GeoPoint> | null
  readonly battery: number | null
  /** Logical timestamp of the last event the actor applied. */
  readonly updatedAt: number | null
}

export interface FleetIndexSnapshot {
  readonly version: number
  readonly records: ReadonlyMap<string, IndexRecord>
}

export class FleetIndex {
  private current: ReadonlyMap<string, IndexRecord> = new Map()
  private version = 0

  publish(record: IndexRecord): void {
    const next = new Map(this.current)
    next.set(
      record.agentId,
      Object.freeze({
        ...record,
        sensors: Object.freeze([...record.sensors]),
        position: record.position ? Object.freeze({ ...record.position }) : null,
      }),
    )
    this.replace(next)
  }

  remove(agentId: string): boolean {
    if (!this.current.has(agentId)) return false
    const next = new Map(this.current)
    next.delete(agentId)
    this.replace(next)
    return true
  }

  get(agentId: string): IndexRecord | undefined {
    return this.current.get(agentId)
  }

  snapshot(): FleetIndexSnapshot {
    return Object.freeze({ version: this.version, records: this.current })
  }

  get size(): number {
    return this.current.size
  }

  private replace(next: Map<string, IndexRecord>): void {
    this.current = next
    this.version++
  }
}
