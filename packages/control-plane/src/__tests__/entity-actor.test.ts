import type { TelemetryPayload } from "@aether/shared/fleet"
import { offsetPoint } from "@aether/shared/geo"
import { TracingLogger } from "@aether/shared/tracing"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

import { loadEntityHistory } from "../entity/hydration.js"
import type { EntityStateMachine } from "../entity/state-machine.js"
import { EntityStoppedError } from "../errors.js"
import {
  type ActorHarness,
  bringOnline,
  createActor,
  DETECTION,
  HOME,
  quietLogger,
  rawPlan,
  tempHistoryDir,
  WAYPOINT,
} from "./fleet-fakes.js"

const CLIMBED = { ...HOME, alt: 29.5 }
const MISSION_ID = "drone-1-a-3"

function telemetry(actor: EntityStateMachine, timestamp: number, payload: TelemetryPayload) {
  return actor.handle({ kind: "TelemetryUpdate", agentId: actor.agentId, timestamp, telemetry: payload })
}

function connectivity(actor: EntityStateMachine, timestamp: number, connected: boolean) {
  return actor.handle({ kind: "ConnectivityChange", agentId: actor.agentId, timestamp, connected })
}

describe("EntityStateMachine", () => {
  let history: { dir: string; cleanup: () => void }
  let harness: ActorHarness

  beforeEach(async () => {
    history = tempHistoryDir()
    harness = createActor(history.dir)
    await bringOnline(harness.actor)
  })

  afterEach(async () => {
    vi.useRealTimers()
    await harness.actor.stop({ checkpoint: false })
    history.cleanup()
  })

  async function startMission(): Promise<void> {
    const result = await harness.actor.assignMission(rawPlan())
    expect(result).toEqual({ status: "Accepted", missionId: MISSION_ID, phase: "VALIDATING" })
    await harness.actor.settle()
  }

  it("starts offline and comes online idle", () => {
    const snapshot = harness.actor.query()
    expect(snapshot.lifecycleState).toBe("ONLINE_IDLE")
    expect(snapshot.connected).toBe(true)
    expect(snapshot.battery).toBe(90)
    expect(snapshot.sequence).toBe(2)
    expect(harness.index.get("drone-1")?.lifecycleState).toBe("ONLINE_IDLE")
  })

  it("returns a frozen snapshot that later events do not change", async () => {
    const before = harness.actor.query()
    await telemetry(harness.actor, 3_000, { battery: 70 })

    expect(Object.isFrozen(before)).toBe(true)
    expect(before.battery).toBe(90)
    expect(harness.actor.query().battery).toBe(70)
  })

  it("drops telemetry older than the last applied event", async () => {
    const outcome = await telemetry(harness.actor, 500, { battery: 10 })

    expect(outcome.applied).toBe(false)
    expect(harness.actor.query().battery).toBe(90)
  })

  describe("planned missions", () => {
    it("accepts a plan, validates it and sends the takeoff", async () => {
      await startMission()

      expect(harness.actor.query().lifecycleState).toBe("IN_MISSION")
      expect(harness.actor.query().activeMissionId).toBe(MISSION_ID)
      expect(harness.actor.activeMission?.phase).toBe("EXECUTING")
      expect(harness.transport.sent).toEqual([
        {
          commandId: `${MISSION_ID}:0`,
          agentId: "drone-1",
          missionId: MISSION_ID,
          kind: "TAKEOFF",
          params: { altitude: 30 },
        },
      ])
    })

    it("flies the route to completion and archives the record", async () => {
      await startMission()
      await telemetry(harness.actor, 3_000, { position: CLIMBED, armed: true })
      await telemetry(harness.actor, 4_000, { position: WAYPOINT })
      const landed = await telemetry(harness.actor, 5_000, { position: HOME, armed: false })
      await harness.actor.settle()

      expect(landed.from).toBe("IN_MISSION")
      expect(landed.to).toBe("ONLINE_IDLE")
      expect(harness.transport.kinds()).toEqual(["TAKEOFF", "GOTO", "LAND"])
      expect(harness.actor.activeMission).toBeNull()
      const archived = harness.archive.missions.get(MISSION_ID)
      expect(archived?.phase).toBe("COMPLETED")
      expect(archived?.endTime).toBe(5_000)
    })

    it("answers Busy to a second assignment queued behind the first", async () => {
      const [first, second] = await Promise.all([
        harness.actor.assignMission(rawPlan()),
        harness.actor.assignMission(rawPlan()),
      ])

      expect(first).toEqual({ status: "Accepted", missionId: MISSION_ID, phase: "VALIDATING" })
      expect(second).toEqual({ status: "Busy", activeMissionId: MISSION_ID })
    })

    it("reports a plan that fails the schema as a constraint violation", async () => {
      const result = await harness.actor.assignMission({ planId: "broken" })

      expect(result.status).toBe("ConstraintViolation")
      expect(harness.actor.query().lifecycleState).toBe("ONLINE_IDLE")
    })

    it("refuses a plan the agent cannot fly", async () => {
      await telemetry(harness.actor, 3_000, { battery: 20 })

      expect(await harness.actor.assignMission(rawPlan())).toEqual({
        status: "ConstraintViolation",
        reason: "BatteryTooLow: battery 20% below required 30%",
      })
    })

    it("refuses a plan whose GPS fix the agent lacks, even without a detection lock requirement", async () => {
      await harness.actor.stop({ checkpoint: false })
      harness = createActor(history.dir, { agentId: "drone-2", detection: { ...DETECTION, requireGpsLock: false } })
      await bringOnline(harness.actor)
      await telemetry(harness.actor, 3_000, { gpsFix: 0 })

      expect(await harness.actor.assignMission(rawPlan())).toEqual({
        status: "ConstraintViolation",
        reason: "GpsFixInsufficient: gps fix 0 below required 3",
      })
    })

    it("aborts on a geofence breach and holds the agent until disarmed", async () => {
      await startMission()
      await telemetry(harness.actor, 3_000, { position: { ...HOME, alt: 150 }, armed: true })
      await harness.actor.settle()

      expect(harness.actor.activeMission?.phase).toBe("ABORTED")
      expect(harness.actor.query().lifecycleState).toBe("IN_MISSION")
      expect(harness.transport.sent[1]).toEqual({
        commandId: `${MISSION_ID}:breach`,
        agentId: "drone-1",
        missionId: MISSION_ID,
        kind: "RTL",
        params: { rallyPoint: { lat: 47, lon: 8 } },
      })
      expect(harness.archive.missions.get(MISSION_ID)?.abortReason).toBe("ConstraintBreach")

      const disarmed = await telemetry(harness.actor, 4_000, { armed: false })
      expect(disarmed.to).toBe("ONLINE_IDLE")
      expect(harness.actor.activeMission).toBeNull()
    })

    it("reports a refused breach directive for a mission that already aborted", async () => {
      const lines: string[] = []
      await harness.actor.stop({ checkpoint: false })
      harness = createActor(history.dir, {
        agentId: "drone-2",
        incarnation: "b",
        logger: new TracingLogger({ level: "warn", serviceName: "test", sink: (_level, line) => lines.push(line) }),
      })
      harness.transport.respond = (d) =>
        Promise.resolve({ commandId: d.commandId, accepted: d.kind !== "RTL", detail: "link busy" })
      await bringOnline(harness.actor)
      await harness.actor.assignMission(rawPlan())
      await harness.actor.settle()

      await telemetry(harness.actor, 3_000, { position: { ...HOME, alt: 150 }, armed: true })
      await harness.actor.settle()

      const warnings = lines.map((l) => JSON.parse(l) as Record<string, unknown>)
      expect(warnings.find((w) => w.msg === "directive failed after mission ended")).toMatchObject({
        level: "warn",
        agentId: "drone-2",
        missionId: "drone-2-b-3",
        phase: "ABORTED",
        abortReason: "ConstraintBreach",
        commandId: "drone-2-b-3:breach",
        detail: "Command drone-2-b-3:breach not acknowledged after 1 attempt(s): rejected: link busy",
      })
    })

    it("aborts with CommandTimeout when a directive is refused", async () => {
      harness.transport.respond = (d) =>
        Promise.resolve({ commandId: d.commandId, accepted: d.kind !== "TAKEOFF", detail: "preflight" })
      await startMission()
      await harness.actor.settle()

      const archived = harness.archive.missions.get(MISSION_ID)
      expect(archived?.abortReason).toBe("CommandTimeout")
      expect(archived?.abortDetail).toBe(
        `Command ${MISSION_ID}:0 not acknowledged after 1 attempt(s): rejected: preflight`,
      )
    })
  })

  describe("approval", () => {
    it("holds a draft until approved", async () => {
      const result = await harness.actor.assignMission(rawPlan({ requiresApproval: true }))
      expect(result).toEqual({ status: "Accepted", missionId: MISSION_ID, phase: "DRAFT" })
      await harness.actor.settle()
      expect(harness.transport.sent).toEqual([])

      const wrong = await harness.actor.signal({ type: "Approve", draftId: "nope" })
      expect(wrong.approval).toEqual({ status: "NoSuchDraft", draftId: "nope" })

      const approved = await harness.actor.signal({ type: "Approve", draftId: MISSION_ID })
      expect(approved.approval).toEqual({ status: "Applied", missionId: MISSION_ID, phase: "VALIDATING" })
      await harness.actor.settle()
      expect(harness.transport.kinds()).toEqual(["TAKEOFF"])
    })

    it("forwards rejection feedback and frees the agent", async () => {
      await harness.actor.assignMission(rawPlan({ requiresApproval: true }))
      const rejected = await harness.actor.signal({
        type: "Reject",
        draftId: MISSION_ID,
        feedback: "avoid the school yard",
      })
      await harness.actor.settle()

      expect(rejected.approval).toEqual({ status: "Applied", missionId: MISSION_ID, phase: "ABORTED" })
      expect(rejected.to).toBe("ONLINE_IDLE")
      expect(harness.feedback.received).toEqual([
        { draftId: MISSION_ID, agentId: "drone-1", planId: "plan-1", feedback: "avoid the school yard" },
      ])
      expect(harness.archive.missions.get(MISSION_ID)?.abortReason).toBe("Rejected")
    })
  })

  describe("emergency stop", () => {
    it("stops the active mission", async () => {
      await startMission()
      const outcome = await harness.actor.signal({ type: "EmergencyStop" })
      await harness.actor.settle()

      expect(outcome.applied).toBe(true)
      expect(outcome.to).toBe("ONLINE_IDLE")
      expect(harness.transport.kinds()).toEqual(["TAKEOFF", "EMERGENCY_STOP"])
      expect(harness.archive.missions.get(MISSION_ID)?.abortReason).toBe("EmergencyStop")
    })

    it("sends a standalone stop to an armed agent without a mission", async () => {
      await telemetry(harness.actor, 3_000, { armed: true })
      const outcome = await harness.actor.signal({ type: "EmergencyStop" })
      await harness.actor.settle()

      expect(outcome.applied).toBe(true)
      expect(harness.transport.sent.map((d) => d.commandId)).toEqual(["drone-1:estop:4"])
    })

    it("does nothing for a disarmed idle agent", async () => {
      const outcome = await harness.actor.signal({ type: "EmergencyStop" })
      expect(outcome.applied).toBe(false)
      expect(harness.transport.sent).toEqual([])
    })
  })

  describe("faults", () => {
    it("moves to ERROR and refuses work until the fault is cleared", async () => {
      const faulted = await telemetry(harness.actor, 3_000, { fault: "motor 2" })
      expect(faulted.to).toBe("ERROR")
      expect(harness.actor.query().faultReason).toBe("motor 2")

      expect(await harness.actor.assignMission(rawPlan())).toEqual({
        status: "ConstraintViolation",
        reason: "AgentFault",
      })

      const cleared = await harness.actor.signal({ type: "ClearFault" })
      expect(cleared).toMatchObject({ applied: true, from: "ERROR", to: "ONLINE_IDLE" })
      expect((await harness.actor.signal({ type: "ClearFault" })).applied).toBe(false)
    })

    it("aborts an executing mission with the breach action", async () => {
      await startMission()
      await telemetry(harness.actor, 3_000, { fault: "gps lost", armed: true })
      await harness.actor.settle()

      expect(harness.actor.query().lifecycleState).toBe("ERROR")
      expect(harness.transport.kinds()).toEqual(["TAKEOFF", "RTL"])
      expect(harness.archive.missions.get(MISSION_ID)?.abortDetail).toBe("fault: gps lost")
    })
  })

  describe("connectivity", () => {
    it("suspends the mission and resumes it within the grace window", async () => {
      await startMission()
      const lost = await connectivity(harness.actor, 3_000, false)
      expect(lost.to).toBe("OFFLINE")
      expect(harness.actor.query().suspendedMissionId).toBe(MISSION_ID)
      expect(harness.actor.missionStatus(MISSION_ID)?.suspended).toBe(true)

      const restored = await connectivity(harness.actor, 4_000, true)
      await harness.actor.settle()

      expect(restored.to).toBe("IN_MISSION")
      expect(harness.actor.activeMission?.suspended).toBe(false)
      expect(harness.transport.kinds()).toEqual(["TAKEOFF", "TAKEOFF"])
    })

    it("aborts with ConnectivityTimeout once the grace window expires", async () => {
      vi.useFakeTimers()
      await startMission()
      await connectivity(harness.actor, 3_000, false)

      await vi.advanceTimersByTimeAsync(60_000)
      await harness.actor.settle()

      const archived = harness.archive.missions.get(MISSION_ID)
      expect(archived?.abortReason).toBe("ConnectivityTimeout")
      expect(archived?.endTime).toBe(63_000)
      expect(harness.actor.query().suspendedMissionId).toBeNull()
      expect(harness.actor.query().lifecycleState).toBe("OFFLINE")
    })

    it("aborts a suspended mission on a breach reported before the grace window ends", async () => {
      vi.useFakeTimers()
      await startMission()
      await connectivity(harness.actor, 3_000, false)
      const breach = await telemetry(harness.actor, 4_000, { position: { ...HOME, alt: 130 }, armed: true })
      expect(breach.applied).toBe(true)

      await vi.advanceTimersByTimeAsync(60_000)
      await harness.actor.settle()

      const archived = harness.archive.missions.get(MISSION_ID)
      expect(archived?.abortReason).toBe("ConstraintBreach")
      expect(archived?.abortDetail).toBe("altitude: altitude 130 m exceeds geofence ceiling 120 m")
      expect(archived?.endTime).toBe(4_000)
      expect(harness.actor.query().suspendedMissionId).toBeNull()
      expect(harness.actor.query().lifecycleState).toBe("OFFLINE")
      expect(harness.transport.kinds()).toEqual(["TAKEOFF"])
    })

    it("refuses assignment while offline", async () => {
      await connectivity(harness.actor, 3_000, false)
      expect(await harness.actor.assignMission(rawPlan())).toEqual({ status: "Unreachable" })
    })
  })

  describe("detected sessions", () => {
    it("confirms a manual flight and closes it on disarm", async () => {
      const armed = await telemetry(harness.actor, 3_000, { armed: true })
      expect(armed.to).toBe("ONLINE_ARMED")

      const moved = offsetPoint(HOME, 15, 0)
      const confirmed = await telemetry(harness.actor, 34_000, { position: moved })
      expect(confirmed.decision).toBe("ConfirmSessionStart")
      expect(confirmed.to).toBe("IN_MISSION")
      expect(harness.actor.query().activeMissionId).toBe("drone-1-a-4")

      const ended = await telemetry(harness.actor, 40_000, { armed: false })
      await harness.actor.settle()

      expect(ended.decision).toBe("ConfirmSessionEnd")
      expect(ended.to).toBe("ONLINE_IDLE")
      const archived = harness.archive.missions.get("drone-1-a-4")
      expect(archived?.origin).toBe("detected")
      expect(archived?.startTime).toBe(3_000)
      expect(archived?.metrics.durationSec).toBe(37)
    })

    it("reverts a false start", async () => {
      await telemetry(harness.actor, 3_000, { armed: true })
      const reverted = await telemetry(harness.actor, 5_000, { armed: false })

      expect(reverted.decision).toBe("RevertFalseStart")
      expect(reverted.to).toBe("ONLINE_IDLE")
    })
  })

  describe("lifecycle listeners", () => {
    it("notifies subscribers after each commit", async () => {
      const seen: string[] = []
      const unsubscribe = harness.actor.onTransition((e) => seen.push(`${e.from}->${e.to}`))

      await telemetry(harness.actor, 3_000, { armed: true })
      unsubscribe()
      await telemetry(harness.actor, 4_000, { armed: false })

      expect(seen).toEqual(["ONLINE_IDLE->ONLINE_ARMED"])
    })
  })

  describe("decommission", () => {
    it("aborts the mission, leaves the index and rejects further work", async () => {
      await startMission()
      await harness.actor.decommission()

      expect(harness.archive.missions.get(MISSION_ID)?.abortReason).toBe("Decommissioned")
      expect(harness.index.get("drone-1")).toBeUndefined()
      await expect(harness.actor.signal({ type: "EmergencyStop" })).rejects.toThrow(EntityStoppedError)
    })
  })

  describe("recovery", () => {
    async function flyPartWay(): Promise<void> {
      await startMission()
      await telemetry(harness.actor, 3_000, { position: CLIMBED, armed: true })
      await harness.actor.settle()
    }

    it("rebuilds the same state by replaying the log", async () => {
      await flyPartWay()
      const before = harness.actor.query()
      const mission = harness.actor.activeMission
      await harness.actor.stop({ checkpoint: false })

      const loaded = loadEntityHistory(history.dir, "drone-1", quietLogger())
      expect(loaded.checkpoint).toBeNull()
      expect(loaded.messages.map((m) => m.kind)).toEqual([
        "ConnectivityChange",
        "TelemetryUpdate",
        "OperatorSignal",
        "ValidateMission",
        "TelemetryUpdate",
      ])

      harness = createActor(history.dir)
      harness.actor.recover(loaded)
      await harness.actor.settle()

      expect(harness.actor.query()).toEqual(before)
      expect(harness.actor.activeMission).toEqual(mission)
      // The current directive is re-sent, nothing before it.
      expect(harness.transport.kinds()).toEqual(["GOTO"])
    })

    it("rebuilds the same state from a checkpoint", async () => {
      await flyPartWay()
      const before = harness.actor.query()
      await harness.actor.stop()
      expect(harness.archive.segments).toHaveLength(1)

      const loaded = loadEntityHistory(history.dir, "drone-1", quietLogger())
      expect(loaded.checkpoint?.appliedSequence).toBe(before.sequence)
      expect(loaded.messages).toEqual([])

      harness = createActor(history.dir)
      harness.actor.recover(loaded)

      expect(harness.actor.query()).toEqual(before)
      expect(harness.actor.activeMission?.currentStepIndex).toBe(1)
    })
  })

  describe("compaction", () => {
    it("rotates the log and archives the superseded segment", async () => {
      const outcome = await harness.actor.compact()
      expect(outcome).toEqual({ status: "compacted", segmentNumber: 2, superseded: 1 })
      expect(harness.actor.pendingHistoryEvents).toBe(0)

      await harness.actor.stop({ checkpoint: false })
      expect(harness.archive.segments.map((s) => s.agentId)).toEqual(["drone-1"])
    })
  })
})
