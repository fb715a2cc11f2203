import { existsSync } from "node:fs"
import { join } from "node:path"

import type { FastifyInstance } from "fastify"
import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { createServer } from "../app.js"
import {
  attributes,
  createFleet,
  type FleetHarness,
  HOME,
  InMemoryMissionRequestStore,
  rawPlan,
  tempHistoryDir,
} from "./fleet-fakes.js"

const INCARNATION = Date.UTC(2026, 0, 1).toString(36)
const MISSION_ID = `drone-1-${INCARNATION}-3`

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let history: { dir: string; cleanup: () => void }
let harness: FleetHarness
let requests: InMemoryMissionRequestStore
let enqueued: string[]
let app: FastifyInstance

beforeEach(async () => {
  history = tempHistoryDir()
  harness = createFleet(history.dir)
  requests = new InMemoryMissionRequestStore()
  enqueued = []
  app = await createServer({
    fleet: harness.fleet,
    requests,
    enqueueDispatch: (id) => {
      enqueued.push(id)
      return Promise.resolve()
    },
    probeDb: () => Promise.resolve(),
    workerRunning: () => true,
    logLevel: "silent",
  })
})

afterEach(async () => {
  await app.close()
  await harness.fleet.shutdown()
  history.cleanup()
})

function post(url: string, payload?: object) {
  return payload === undefined ? app.inject({ method: "POST", url }) : app.inject({ method: "POST", url, payload })
}

async function enroll(agentId = "drone-1") {
  return post("/agents", { agentId, attributes: attributes() })
}

async function enrollOnline(): Promise<void> {
  await enroll()
  await post("/agents/drone-1/events", { kind: "ConnectivityChange", timestamp: 1_000, connected: true })
  await post("/agents/drone-1/events", {
    kind: "TelemetryUpdate",
    timestamp: 2_000,
    telemetry: { position: HOME, battery: 90, gpsFix: 3, armed: false },
  })
}

// ---------------------------------------------------------------------------
// Tests: enrollment
// ---------------------------------------------------------------------------

describe("POST /agents", () => {
  it("enrolls an agent", async () => {
    const res = await enroll()

    expect(res.statusCode).toBe(201)
    expect(res.json()).toMatchObject({ agentId: "drone-1", lifecycleState: "OFFLINE", connected: false })
  })

  it("returns 409 for a duplicate id", async () => {
    await enroll()
    const res = await enroll()

    expect(res.statusCode).toBe(409)
    expect(res.json()).toEqual({ error: "conflict", message: "Agent already enrolled: drone-1" })
  })

  it("returns 400 for an invalid agent id", async () => {
    const res = await post("/agents", { agentId: "bad id", attributes: attributes() })

    expect(res.statusCode).toBe(400)
    expect(res.json()).toMatchObject({ error: "bad_request", message: "Invalid request body" })
  })

  it.each([".", ".."])("rejects %j without touching existing history", async (agentId) => {
    await enrollOnline()

    const res = await enroll(agentId)

    expect(res.statusCode).toBe(400)
    expect(res.json()).toMatchObject({ error: "bad_request", message: "Invalid request body" })
    expect(existsSync(join(history.dir, "drone-1"))).toBe(true)
    expect(harness.fleet.size).toBe(1)
  })
})

describe("GET /agents", () => {
  it("lists agents with a count", async () => {
    await enroll("drone-2")
    await enroll("drone-1")
    const res = await app.inject({ method: "GET", url: "/agents" })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toMatchObject({ count: 2, agents: [{ agentId: "drone-1" }, { agentId: "drone-2" }] })
  })

  it("returns 404 for an unknown agent", async () => {
    const res = await app.inject({ method: "GET", url: "/agents/ghost" })

    expect(res.statusCode).toBe(404)
    expect(res.json()).toEqual({ error: "not_found", message: "Unknown agent: ghost" })
  })
})

describe("DELETE /agents/:id", () => {
  it("decommissions the agent", async () => {
    await enroll()
    const res = await app.inject({ method: "DELETE", url: "/agents/drone-1" })

    expect(res.statusCode).toBe(204)
    expect((await app.inject({ method: "GET", url: "/agents/drone-1" })).statusCode).toBe(404)
  })
})

// ---------------------------------------------------------------------------
// Tests: events
// ---------------------------------------------------------------------------

describe("POST /agents/:id/events", () => {
  it("forwards an event and reports the transition", async () => {
    await enroll()
    const res = await post("/agents/drone-1/events", { kind: "ConnectivityChange", timestamp: 1_000, connected: true })

    expect(res.statusCode).toBe(202)
    expect(res.json()).toEqual({
      status: "forwarded",
      applied: true,
      from: "OFFLINE",
      to: "ONLINE_IDLE",
      decision: null,
    })
  })

  it("reports suppressed idle telemetry", async () => {
    await enrollOnline()
    const res = await post("/agents/drone-1/events", {
      kind: "TelemetryUpdate",
      timestamp: 3_000,
      telemetry: { battery: 89 },
    })

    expect(res.statusCode).toBe(202)
    expect(res.json()).toEqual({ status: "suppressed" })
  })

  it("returns 400 for an invalid event", async () => {
    await enroll()
    const res = await post("/agents/drone-1/events", { kind: "Teleport", timestamp: 1 })

    expect(res.statusCode).toBe(400)
    expect(res.json()).toMatchObject({ error: "bad_request" })
  })

  it("returns 404 for an unknown agent", async () => {
    const res = await post("/agents/ghost/events", { kind: "ConnectivityChange", timestamp: 1, connected: true })

    expect(res.statusCode).toBe(404)
  })
})

// ---------------------------------------------------------------------------
// Tests: missions and signals
// ---------------------------------------------------------------------------

describe("POST /agents/:id/missions", () => {
  it("accepts a plan, then answers Busy", async () => {
    await enrollOnline()

    const first = await post("/agents/drone-1/missions", { plan: rawPlan() })
    expect(first.statusCode).toBe(202)
    expect(first.json()).toEqual({ status: "Accepted", missionId: MISSION_ID, phase: "VALIDATING" })

    const second = await post("/agents/drone-1/missions", { plan: rawPlan() })
    expect(second.statusCode).toBe(409)
    expect(second.json()).toEqual({ status: "Busy", activeMissionId: MISSION_ID })
  })

  it("returns 503 for an offline agent", async () => {
    await enroll()
    const res = await post("/agents/drone-1/missions", { plan: rawPlan() })

    expect(res.statusCode).toBe(503)
    expect(res.json()).toEqual({ status: "Unreachable" })
  })

  it("returns 422 for a plan that breaks a constraint", async () => {
    await enrollOnline()
    const plan = rawPlan({ constraints: { minBatteryStart: 95, minBatteryReserve: 15, minGpsFix: 3 } })
    const res = await post("/agents/drone-1/missions", { plan })

    expect(res.statusCode).toBe(422)
    expect(res.json()).toEqual({
      status: "ConstraintViolation",
      reason: "BatteryTooLow: battery 90% below required 95%",
    })
  })

  it("shows the active mission on the agent and under /missions", async () => {
    await enrollOnline()
    await post("/agents/drone-1/missions", { plan: rawPlan() })

    const agent = await app.inject({ method: "GET", url: "/agents/drone-1" })
    expect(agent.json()).toMatchObject({ lifecycleState: "IN_MISSION", activeMission: { missionId: MISSION_ID } })

    const mission = await app.inject({ method: "GET", url: `/missions/${MISSION_ID}` })
    expect(mission.statusCode).toBe(200)
    expect(mission.json()).toMatchObject({ source: "live", status: { missionId: MISSION_ID, agentId: "drone-1" } })
  })
})

describe("draft decisions", () => {
  it("returns 404 for an unknown draft", async () => {
    await enrollOnline()
    const res = await post("/agents/drone-1/drafts/nope/approve")

    expect(res.statusCode).toBe(404)
    expect(res.json()).toEqual({
      error: "not_found",
      message: "No draft mission with that id",
      result: { status: "NoSuchDraft", draftId: "nope" },
    })
  })

  it("rejects a draft with feedback", async () => {
    await enrollOnline()
    await post("/agents/drone-1/missions", { plan: rawPlan({ requiresApproval: true }) })

    const res = await post(`/agents/drone-1/drafts/${MISSION_ID}/reject`, { feedback: "route crosses the river" })
    await harness.fleet.require("drone-1").settle()

    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ status: "Applied", missionId: MISSION_ID, phase: "ABORTED" })
    expect(harness.feedback.received.map((f) => f.feedback)).toEqual(["route crosses the river"])
  })

  it("requires feedback on rejection", async () => {
    await enrollOnline()
    const res = await post(`/agents/drone-1/drafts/${MISSION_ID}/reject`, {})

    expect(res.statusCode).toBe(400)
  })
})

describe("POST /agents/:id/emergency-stop", () => {
  it("reports that nothing was stopped for a disarmed idle agent", async () => {
    await enrollOnline()
    const res = await post("/agents/drone-1/emergency-stop")

    expect(res.statusCode).toBe(202)
    expect(res.json()).toEqual({ applied: false, from: "ONLINE_IDLE", to: "ONLINE_IDLE" })
  })
})

describe("POST /agents/:id/clear-fault", () => {
  it("returns 409 when there is no fault", async () => {
    await enrollOnline()
    const res = await post("/agents/drone-1/clear-fault")

    expect(res.statusCode).toBe(409)
    expect(res.json()).toEqual({ error: "conflict", message: "Agent has no fault to clear" })
  })

  it("clears a reported fault", async () => {
    await enrollOnline()
    await post("/agents/drone-1/events", { kind: "TelemetryUpdate", timestamp: 3_000, telemetry: { fault: "imu" } })
    const res = await post("/agents/drone-1/clear-fault")

    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ applied: true, from: "ERROR", to: "ONLINE_IDLE" })
  })
})

// ---------------------------------------------------------------------------
// Tests: dispatch and mission requests
// ---------------------------------------------------------------------------

describe("POST /dispatch/find", () => {
  it("finds a matching agent or answers 404", async () => {
    await enrollOnline()

    const found = await post("/dispatch/find", { requiredSensors: ["camera"] })
    expect(found.statusCode).toBe(200)
    expect(found.json()).toEqual({ status: "Found", agentId: "drone-1", distanceMeters: null })

    const none = await post("/dispatch/find", { requiredSensors: ["lidar"] })
    expect(none.statusCode).toBe(404)
    expect(none.json()).toEqual({ status: "NoCandidate" })
  })
})

describe("mission requests", () => {
  it("queues a request for dispatch", async () => {
    const res = await post("/mission-requests", { plan: rawPlan(), query: { requiredSensors: ["camera"] } })

    expect(res.statusCode).toBe(202)
    expect(res.json()).toMatchObject({
      id: "req-1",
      status: "PENDING",
      query: { requiredSensors: ["camera"], requiredState: "ONLINE_IDLE" },
      attempts: 0,
    })
    expect(enqueued).toEqual(["req-1"])

    const fetched = await app.inject({ method: "GET", url: "/mission-requests/req-1" })
    expect(fetched.statusCode).toBe(200)
    expect(fetched.json()).toMatchObject({ id: "req-1", status: "PENDING" })
  })

  it("returns 400 when the plan is not an object", async () => {
    const res = await post("/mission-requests", { plan: "fly north", query: {} })

    expect(res.statusCode).toBe(400)
    expect(enqueued).toEqual([])
  })

  it("returns 404 for unknown requests and missions", async () => {
    const request = await app.inject({ method: "GET", url: "/mission-requests/nope" })
    expect(request.statusCode).toBe(404)
    expect(request.json()).toEqual({ error: "not_found", message: "Mission request not found" })

    const mission = await app.inject({ method: "GET", url: "/missions/nope" })
    expect(mission.statusCode).toBe(404)
    expect(mission.json()).toEqual({ error: "not_found", message: "Mission not found" })
  })
})

describe("error handler", () => {
  it("returns 500 for unexpected failures", async () => {
    const failing = await createServer({
      fleet: harness.fleet,
      requests,
      enqueueDispatch: () => Promise.reject(new Error("queue down")),
      probeDb: () => Promise.resolve(),
      workerRunning: () => true,
      logLevel: "silent",
    })
    const res = await failing.inject({
      method: "POST",
      url: "/mission-requests",
      payload: { plan: rawPlan(), query: {} },
    })
    await failing.close()

    expect(res.statusCode).toBe(500)
    expect(res.json()).toEqual({ error: "internal_error", message: "Internal server error" })
  })
})
