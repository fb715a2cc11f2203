import type { MissionExecution } from "@aether/shared/fleet"
import type { Kysely } from "kysely"
import { describe, expect, it, vi } from "vitest"

import type { Database } from "../db/types.js"
import { KyselyMissionRequestStore } from "../dispatch/requests.js"
import { AgentAlreadyEnrolledError } from "../errors.js"
import { KyselyDroneRegistry, KyselyMissionArchive, KyselyPlanFeedbackSink } from "../fleet/registry.js"
import { attributes } from "./fleet-fakes.js"

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ENROLLED_AT = new Date("2026-01-01T00:00:00.000Z")

function insertChain(row?: Record<string, unknown>) {
  const execute = vi.fn().mockResolvedValue([])
  const executeTakeFirst = vi.fn().mockResolvedValue(row)
  const executeTakeFirstOrThrow = vi.fn().mockResolvedValue(row)
  const returningAll = vi.fn().mockReturnValue({ executeTakeFirst, executeTakeFirstOrThrow })
  const conflict = { doNothing: vi.fn(), doUpdateSet: vi.fn() }
  const builder = { column: vi.fn().mockReturnValue(conflict), columns: vi.fn().mockReturnValue(conflict) }
  const onConflict = vi.fn().mockImplementation((cb: (oc: typeof builder) => unknown) => {
    cb(builder)
    return { returningAll, execute }
  })
  const values = vi.fn().mockReturnValue({ onConflict, returningAll, execute })
  return { values, builder, conflict, execute }
}

function selectChain(rows: Record<string, unknown>[]) {
  const execute = vi.fn().mockResolvedValue(rows)
  const executeTakeFirst = vi.fn().mockResolvedValue(rows[0])
  const terminal = { execute, executeTakeFirst }
  const orderBy = vi.fn().mockReturnValue(terminal)
  const where = vi.fn().mockReturnValue({ orderBy, ...terminal })
  const selectAll = vi.fn().mockReturnValue({ where, orderBy, ...terminal })
  const select = vi.fn().mockReturnValue({ where, ...terminal })
  return { selectAll, select, where, orderBy }
}

function updateChain() {
  const execute = vi.fn().mockResolvedValue([])
  const where: ReturnType<typeof vi.fn> = vi.fn()
  where.mockReturnValue({ where, execute })
  const set = vi.fn().mockReturnValue({ where })
  return { set, where, execute }
}

function droneRow(overrides: Record<string, unknown> = {}) {
  return {
    agent_id: "drone-1",
    sensors: ["camera"],
    max_range_m: 5_000,
    payload_capacity_kg: 2,
    service_area: "north",
    enrolled_at: ENROLLED_AT,
    ...overrides,
  }
}

function execution(overrides: Partial<MissionExecution> = {}): MissionExecution {
  return {
    missionId: "drone-1-a-3",
    agentId: "drone-1",
    origin: "planned",
    planId: "plan-1",
    phase: "COMPLETED",
    currentStepIndex: 2,
    startTime: 1_000,
    endTime: 5_000,
    abortReason: null,
    abortDetail: null,
    metrics: { distanceMeters: 111.2, maxAltitudeMeters: 30, batteryConsumed: 5, durationSec: 4 },
    startBattery: 90,
    lastPosition: { lat: 47, lon: 8, alt: 0 },
    suspendedAt: null,
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// KyselyDroneRegistry
// ---------------------------------------------------------------------------

describe("KyselyDroneRegistry", () => {
  it("inserts the drone and maps the returned row", async () => {
    const insert = insertChain(droneRow())
    const db = { insertInto: vi.fn().mockReturnValue({ values: insert.values }) } as unknown as Kysely<Database>

    const drone = await new KyselyDroneRegistry(db).enroll("drone-1", attributes())

    expect(insert.values).toHaveBeenCalledWith({
      agent_id: "drone-1",
      sensors: '["camera"]',
      max_range_m: 5_000,
      payload_capacity_kg: 2,
      service_area: "north",
    })
    expect(insert.builder.column).toHaveBeenCalledWith("agent_id")
    expect(insert.conflict.doNothing).toHaveBeenCalled()
    expect(drone).toEqual({ agentId: "drone-1", attributes: attributes(), enrolledAt: ENROLLED_AT })
  })

  it("reports a conflicting id as already enrolled", async () => {
    const insert = insertChain(undefined)
    const db = { insertInto: vi.fn().mockReturnValue({ values: insert.values }) } as unknown as Kysely<Database>

    await expect(new KyselyDroneRegistry(db).enroll("drone-1", attributes())).rejects.toThrow(
      AgentAlreadyEnrolledError,
    )
  })

  it("lists drones by id", async () => {
    const select = selectChain([droneRow(), droneRow({ agent_id: "drone-2", sensors: [] })])
    const db = { selectFrom: vi.fn().mockReturnValue(select) } as unknown as Kysely<Database>

    const drones = await new KyselyDroneRegistry(db).list()

    expect(select.orderBy).toHaveBeenCalledWith("agent_id")
    expect(drones.map((d) => [d.agentId, d.attributes.sensors])).toEqual([
      ["drone-1", ["camera"]],
      ["drone-2", []],
    ])
  })

  it("reports whether a row was removed", async () => {
    const executeTakeFirst = vi
      .fn()
      .mockResolvedValueOnce({ numDeletedRows: 1n })
      .mockResolvedValueOnce({ numDeletedRows: 0n })
    const where = vi.fn().mockReturnValue({ executeTakeFirst })
    const db = { deleteFrom: vi.fn().mockReturnValue({ where }) } as unknown as Kysely<Database>
    const registry = new KyselyDroneRegistry(db)

    expect(await registry.remove("drone-1")).toBe(true)
    expect(await registry.remove("drone-1")).toBe(false)
    expect(where).toHaveBeenCalledWith("agent_id", "=", "drone-1")
  })
})

// ---------------------------------------------------------------------------
// KyselyMissionArchive
// ---------------------------------------------------------------------------

describe("KyselyMissionArchive", () => {
  it("upserts the execution as a JSON document", async () => {
    const insert = insertChain()
    const db = { insertInto: vi.fn().mockReturnValue({ values: insert.values }) } as unknown as Kysely<Database>
    const record = execution()

    await new KyselyMissionArchive(db).archiveMission(record)

    expect(insert.values).toHaveBeenCalledWith({
      mission_id: "drone-1-a-3",
      agent_id: "drone-1",
      origin: "planned",
      plan_id: "plan-1",
      phase: "COMPLETED",
      abort_reason: null,
      abort_detail: null,
      start_time_ms: 1_000,
      end_time_ms: 5_000,
      execution: JSON.stringify(record),
    })
    expect(insert.builder.column).toHaveBeenCalledWith("mission_id")
    expect(insert.execute).toHaveBeenCalled()
  })

  it("returns a stored execution", async () => {
    const select = selectChain([{ execution: execution() }])
    const db = { selectFrom: vi.fn().mockReturnValue(select) } as unknown as Kysely<Database>

    expect(await new KyselyMissionArchive(db).getMission("drone-1-a-3")).toEqual(execution())
    expect(select.where).toHaveBeenCalledWith("mission_id", "=", "drone-1-a-3")
  })

  it("returns null for a missing or unreadable record", async () => {
    const missing = { selectFrom: vi.fn().mockReturnValue(selectChain([])) } as unknown as Kysely<Database>
    const corrupt = {
      selectFrom: vi.fn().mockReturnValue(selectChain([{ execution: { missionId: "drone-1-a-3" } }])),
    } as unknown as Kysely<Database>

    expect(await new KyselyMissionArchive(missing).getMission("drone-1-a-3")).toBeNull()
    expect(await new KyselyMissionArchive(corrupt).getMission("drone-1-a-3")).toBeNull()
  })

  it("upserts history segments by agent and name", async () => {
    const insert = insertChain()
    const db = { insertInto: vi.fn().mockReturnValue({ values: insert.values }) } as unknown as Kysely<Database>

    await new KyselyMissionArchive(db).storeSegment({
      agentId: "drone-1",
      segmentName: "segment-000001.jsonl",
      content: "{}\n",
    })

    expect(insert.values).toHaveBeenCalledWith({
      agent_id: "drone-1",
      segment_name: "segment-000001.jsonl",
      content: "{}\n",
    })
    expect(insert.builder.columns).toHaveBeenCalledWith(["agent_id", "segment_name"])
  })
})

// ---------------------------------------------------------------------------
// KyselyPlanFeedbackSink
// ---------------------------------------------------------------------------

describe("KyselyPlanFeedbackSink", () => {
  it("stores rejection feedback", async () => {
    const insert = insertChain()
    const db = { insertInto: vi.fn().mockReturnValue({ values: insert.values }) } as unknown as Kysely<Database>

    await new KyselyPlanFeedbackSink(db).submit({
      draftId: "drone-1-a-3",
      agentId: "drone-1",
      planId: "plan-1",
      feedback: "avoid the school yard",
    })

    expect(insert.values).toHaveBeenCalledWith({
      draft_id: "drone-1-a-3",
      agent_id: "drone-1",
      plan_id: "plan-1",
      feedback: "avoid the school yard",
    })
  })
})

// ---------------------------------------------------------------------------
// KyselyMissionRequestStore
// ---------------------------------------------------------------------------

describe("KyselyMissionRequestStore", () => {
  const created = new Date("2026-01-02T00:00:00.000Z")
  const requestRow = {
    id: "req-1",
    status: "PENDING",
    plan: { planId: "plan-1" },
    query: { requiredSensors: ["camera"] },
    attempts: 0,
    agent_id: null,
    mission_id: null,
    last_error: null,
    created_at: created,
    updated_at: created,
  }

  it("creates a request and fills query defaults on read", async () => {
    const insert = insertChain(requestRow)
    const db = { insertInto: vi.fn().mockReturnValue({ values: insert.values }) } as unknown as Kysely<Database>

    const request = await new KyselyMissionRequestStore(db).create(
      { planId: "plan-1" },
      { requiredSensors: ["camera"], requiredState: "ONLINE_IDLE" },
    )

    expect(insert.values).toHaveBeenCalledWith({
      plan: '{"planId":"plan-1"}',
      query: '{"requiredSensors":["camera"],"requiredState":"ONLINE_IDLE"}',
    })
    expect(request).toEqual({
      id: "req-1",
      status: "PENDING",
      plan: { planId: "plan-1" },
      query: { requiredSensors: ["camera"], requiredState: "ONLINE_IDLE" },
      attempts: 0,
      agentId: null,
      missionId: null,
      lastError: null,
      createdAt: created,
      updatedAt: created,
    })
  })

  it("returns null for an unknown request", async () => {
    const db = { selectFrom: vi.fn().mockReturnValue(selectChain([])) } as unknown as Kysely<Database>

    expect(await new KyselyMissionRequestStore(db).get("nope")).toBeNull()
  })

  it("increments the attempt counter in the database", async () => {
    const update = updateChain()
    const db = { updateTable: vi.fn().mockReturnValue({ set: update.set }) } as unknown as Kysely<Database>

    await new KyselyMissionRequestStore(db).recordAttempt("req-1", "NoCandidate")

    const setter: unknown = update.set.mock.calls[0]?.[0]
    expect(typeof setter).toBe("function")
    if (typeof setter !== "function") return
    const eb = vi.fn((column: string, op: string, value: number) => ({ column, op, value }))
    expect(setter(eb)).toMatchObject({ attempts: { column: "attempts", op: "+", value: 1 }, last_error: "NoCandidate" })
    expect(update.where).toHaveBeenCalledWith("id", "=", "req-1")
  })

  it("only settles pending requests", async () => {
    const update = updateChain()
    const db = { updateTable: vi.fn().mockReturnValue({ set: update.set }) } as unknown as Kysely<Database>
    const store = new KyselyMissionRequestStore(db)

    await store.markAssigned("req-1", "drone-1", "drone-1-a-3")
    await store.markFailed("req-2", "NoCandidate")

    expect(update.set).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ status: "ASSIGNED", agent_id: "drone-1", mission_id: "drone-1-a-3" }),
    )
    expect(update.set).toHaveBeenNthCalledWith(2, expect.objectContaining({ status: "FAILED", last_error: "NoCandidate" }))
    expect(update.where).toHaveBeenCalledWith("status", "=", "PENDING")
    expect(update.execute).toHaveBeenCalledTimes(2)
  })
})
