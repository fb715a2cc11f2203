/**
 * Capability and proximity matching over a FleetIndex snapshot.
 *
 * Read-only: dispatch never touches an actor. The chosen agent may still
 * answer Busy when the assignment arrives, since the snapshot can be stale.
 */

import type { DispatchQuery, DispatchResult } from "@aether/shared/fleet"
import { haversineDistance } from "@aether/shared/geo"

import type { FleetIndex, FleetIndexSnapshot, IndexRecord } from "./fleet-index.js"

interface Candidate {
  agentId: string
  distanceMeters: number | null
}

export function matchesQuery(record: IndexRecord, query: DispatchQuery): boolean {
  if (!record.connected) return false
  if (record.lifecycleState !== query.requiredState) return false
  if (!query.requiredSensors.every((s) => record.sensors.includes(s))) return false
  if (query.minRangeMeters !== undefined && record.maxRangeMeters < query.minRangeMeters) return false
  if (query.minPayloadKg !== undefined && record.payloadCapacityKg < query.minPayloadKg) return false
  if (query.serviceArea !== undefined && record.serviceArea !== query.serviceArea) return false
  return true
}

/** Nearest first; unknown positions last; agent id breaks ties. */
function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.distanceMeters !== null && b.distanceMeters !== null && a.distanceMeters !== b.distanceMeters) {
    return a.distanceMeters - b.distanceMeters
  }
  if (a.distanceMeters === null && b.distanceMeters !== null) return 1
  if (a.distanceMeters !== null && b.distanceMeters === null) return -1
  return a.agentId < b.agentId ? -1 : a.agentId > b.agentId ? 1 : 0
}

export function rankCandidates(snapshot: FleetIndexSnapshot, query: DispatchQuery): Candidate[] {
  const candidates: Candidate[] = []
  for (const record of snapshot.records.values()) {
    if (!matchesQuery(record, query)) continue
    candidates.push({
      agentId: record.agentId,
      distanceMeters: query.near && record.position ? haversineDistance(query.near, record.position) : null,
    })
  }
  return candidates.sort(compareCandidates)
}

export class FleetDispatcher {
  private readonly index: FleetIndex

  constructor(index: FleetIndex) {
    this.index = index
  }

  find(query: DispatchQuery): DispatchResult {
    const best = rankCandidates(this.index.snapshot(), query)[0]
    if (!best) return { status: "NoCandidate" }
    return { status: "Found", agentId: best.agentId, distanceMeters: best.distanceMeters }
  }
}
