/**
 * Mission dispatch task: "mission_dispatch"
 *
 * Resolves a pending mission request to an agent:
 *   find a candidate → assign the plan → mark the request ASSIGNED
 *
 * NoCandidate, Busy and Unreachable are transient: the attempt is recorded
 * and a new job is queued with exponential backoff, up to `maxAttempts`.
 * A ConstraintViolation fails the request at once. The task is idempotent:
 * a request that is no longer PENDING is left alone.
 */

import type { AssignResult, DispatchResult } from "@aether/shared/fleet"
import {
  AetherAttributes,
  injectTraceContext,
  type TraceCarrier,
  type TracingLogger,
  withExtractedContext,
  withSpan,
} from "@aether/shared/tracing"
import type { JobHelpers, Task } from "graphile-worker"
import { z } from "zod"

import type { MissionRequestStore } from "../../dispatch/requests.js"
import { UnknownAgentError } from "../../errors.js"
import type { FleetManager } from "../../fleet/manager.js"
import { calculateRunAt, DISPATCH_RETRY_CONFIG, type RetryConfig } from "../retry.js"

export const MISSION_DISPATCH_TASK = "mission_dispatch"

export const MissionDispatchPayloadSchema = z.object({
  requestId: z.string().min(1),
  /** W3C trace context of the request that queued the job. */
  traceparent: z.string().optional(),
  tracestate: z.string().optional(),
})

export type MissionDispatchPayload = z.infer<typeof MissionDispatchPayloadSchema>

export interface MissionDispatchDeps {
  fleet: Pick<FleetManager, "findAgent" | "assignMission">
  requests: MissionRequestStore
  logger: TracingLogger
  maxAttempts?: number
  retry?: RetryConfig
}

const DEFAULT_MAX_ATTEMPTS = 20

export type DispatchAttemptOutcome =
  | { status: "assigned"; agentId: string; missionId: string }
  | { status: "retrying"; reason: string; attempt: number }
  | { status: "failed"; reason: string }
  | { status: "skipped" }

/** Payload for a new `mission_dispatch` job, carrying the active trace. */
export function missionDispatchPayload(requestId: string): MissionDispatchPayload {
  return { requestId, ...injectTraceContext() }
}

export function createMissionDispatchTask(deps: MissionDispatchDeps): Task {
  const { fleet, requests, logger } = deps
  const maxAttempts = deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  const retry = deps.retry ?? DISPATCH_RETRY_CONFIG

  async function attempt(requestId: string, helpers: JobHelpers): Promise<DispatchAttemptOutcome> {
    const request = await requests.get(requestId)
    if (!request || request.status !== "PENDING") {
      return { status: "skipped" }
    }

    const found: DispatchResult = fleet.findAgent(request.query)
    let reason: string
    if (found.status === "Found") {
      let result: AssignResult
      try {
        result = await fleet.assignMission(found.agentId, request.plan)
      } catch (err) {
        if (!(err instanceof UnknownAgentError)) throw err
        result = { status: "Unreachable" }
      }

      if (result.status === "Accepted") {
        await requests.markAssigned(requestId, found.agentId, result.missionId)
        return { status: "assigned", agentId: found.agentId, missionId: result.missionId }
      }
      if (result.status === "ConstraintViolation") {
        await requests.markFailed(requestId, result.reason)
        return { status: "failed", reason: result.reason }
      }
      reason = `${result.status} (${found.agentId})`
    } else {
      reason = found.status
    }

    const attemptNumber = request.attempts + 1
    await requests.recordAttempt(requestId, reason)
    if (attemptNumber >= maxAttempts) {
      const detail = `gave up after ${String(attemptNumber)} attempt(s): ${reason}`
      await requests.markFailed(requestId, detail)
      return { status: "failed", reason: detail }
    }

    await helpers.addJob(MISSION_DISPATCH_TASK, missionDispatchPayload(requestId), {
      runAt: calculateRunAt(attemptNumber - 1, retry),
      maxAttempts: 1,
    })
    return { status: "retrying", reason, attempt: attemptNumber }
  }

  return async (rawPayload: unknown, helpers: JobHelpers): Promise<void> => {
    const parsed = MissionDispatchPayloadSchema.safeParse(rawPayload)
    if (!parsed.success) {
      logger.error("mission_dispatch: invalid payload", { issues: parsed.error.issues.length })
      return
    }
    const { requestId, traceparent, tracestate } = parsed.data

    const carrier: TraceCarrier = {}
    if (traceparent) carrier["traceparent"] = traceparent
    if (tracestate) carrier["tracestate"] = tracestate

    await withExtractedContext(carrier, () =>
      withSpan(
        "aether.worker.mission_dispatch",
        { "aether.request.id": requestId, [AetherAttributes.JOB_ATTEMPT]: helpers.job.attempts },
        async (span) => {
          const outcome = await attempt(requestId, helpers)
          span.setAttribute(AetherAttributes.DISPATCH_STATUS, outcome.status)
          logger.info("mission_dispatch: attempt finished", { requestId, ...outcome })
        },
      ),
    )
  }
}
