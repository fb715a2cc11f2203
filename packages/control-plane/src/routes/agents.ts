/**
 * Agent routes
 *
 * POST   /agents                               Enroll a drone and start its actor
 * GET    /agents                               List agent snapshots
 * GET    /agents/:id                           Agent snapshot with its active mission
 * DELETE /agents/:id                           Decommission (aborts any mission)
 * POST   /agents/:id/events                    Ingest one fleet event
 * POST   /agents/:id/missions                  Assign a mission plan
 * POST   /agents/:id/drafts/:draftId/approve   Approve a draft mission
 * POST   /agents/:id/drafts/:draftId/reject    Reject a draft mission with feedback
 * POST   /agents/:id/emergency-stop            Emergency stop (jumps the queue)
 * POST   /agents/:id/clear-fault               Clear a reported hardware fault
 */

import { type AssignResult, AgentAttributesSchema, type DecisionResult } from "@aether/shared/fleet"
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify"
import { z } from "zod"

import type { FleetManager } from "../fleet/manager.js"

// ---------------------------------------------------------------------------
// Route types
// ---------------------------------------------------------------------------

interface AgentParams {
  id: string
}

interface DraftParams {
  id: string
  draftId: string
}

const EnrollBodySchema = z.object({
  agentId: z
    .string()
    .min(1)
    .max(128)
    .regex(
      /^[A-Za-z0-9][A-Za-z0-9._-]*$/,
      "agentId must start with a letter or digit and contain only letters, digits, '.', '_' and '-'",
    ),
  attributes: AgentAttributesSchema,
})

const AssignBodySchema = z.object({ plan: z.unknown() })

const RejectBodySchema = z.object({ feedback: z.string().max(4000) })

const ASSIGN_STATUS_CODE: Record<AssignResult["status"], number> = {
  Accepted: 202,
  Busy: 409,
  Unreachable: 503,
  ConstraintViolation: 422,
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export interface AgentRouteDeps {
  fleet: FleetManager
}

export function agentRoutes(deps: AgentRouteDeps) {
  const { fleet } = deps

  function sendDecision(reply: FastifyReply, result: DecisionResult | null) {
    if (!result || result.status === "NoSuchDraft") {
      return reply.status(404).send({
        error: "not_found",
        message: "No draft mission with that id",
        result,
      })
    }
    return reply.status(200).send(result)
  }

  return function register(app: FastifyInstance): void {
    // -----------------------------------------------------------------
    // POST /agents: Enroll
    // -----------------------------------------------------------------
    app.post("/agents", async (request: FastifyRequest, reply: FastifyReply) => {
      const body = EnrollBodySchema.parse(request.body)
      const snapshot = await fleet.enroll(body.agentId, body.attributes)
      return reply.status(201).send(snapshot)
    })

    // -----------------------------------------------------------------
    // GET /agents: List
    // -----------------------------------------------------------------
    app.get("/agents", async (_request: FastifyRequest, reply: FastifyReply) => {
      const agents = fleet.listAgents()
      return reply.status(200).send({ agents, count: agents.length })
    })

    // -----------------------------------------------------------------
    // GET /agents/:id
    // -----------------------------------------------------------------
    app.get<{ Params: AgentParams }>("/agents/:id", async (request, reply) => {
      const actor = fleet.require(request.params.id)
      return reply.status(200).send({ ...actor.query(), activeMission: actor.activeMission })
    })

    // -----------------------------------------------------------------
    // DELETE /agents/:id: Decommission
    // -----------------------------------------------------------------
    app.delete<{ Params: AgentParams }>("/agents/:id", async (request, reply) => {
      await fleet.decommission(request.params.id)
      return reply.status(204).send()
    })

    // -----------------------------------------------------------------
    // POST /agents/:id/events: Ingest; the path names the agent
    // -----------------------------------------------------------------
    app.post<{ Params: AgentParams }>("/agents/:id/events", async (request, reply) => {
      const body = typeof request.body === "object" && request.body !== null ? request.body : {}
      const result = await fleet.publish({ ...body, agentId: request.params.id })
      if (result.status === "suppressed") {
        return reply.status(202).send({ status: "suppressed" })
      }
      const { outcome } = result
      return reply.status(202).send({
        status: "forwarded",
        applied: outcome.applied,
        from: outcome.from,
        to: outcome.to,
        decision: outcome.decision,
      })
    })

    // -----------------------------------------------------------------
    // POST /agents/:id/missions: Assign
    // -----------------------------------------------------------------
    app.post<{ Params: AgentParams }>("/agents/:id/missions", async (request, reply) => {
      const { plan } = AssignBodySchema.parse(request.body)
      const result = await fleet.assignMission(request.params.id, plan)
      return reply.status(ASSIGN_STATUS_CODE[result.status]).send(result)
    })

    // -----------------------------------------------------------------
    // Draft decisions
    // -----------------------------------------------------------------
    app.post<{ Params: DraftParams }>("/agents/:id/drafts/:draftId/approve", async (request, reply) => {
      const outcome = await fleet.signal(request.params.id, {
        type: "Approve",
        draftId: request.params.draftId,
      })
      return sendDecision(reply, outcome.approval)
    })

    app.post<{ Params: DraftParams }>("/agents/:id/drafts/:draftId/reject", async (request, reply) => {
      const { feedback } = RejectBodySchema.parse(request.body)
      const outcome = await fleet.signal(request.params.id, {
        type: "Reject",
        draftId: request.params.draftId,
        feedback,
      })
      return sendDecision(reply, outcome.approval)
    })

    // -----------------------------------------------------------------
    // Emergency stop / clear fault
    // -----------------------------------------------------------------
    app.post<{ Params: AgentParams }>("/agents/:id/emergency-stop", async (request, reply) => {
      const outcome = await fleet.signal(request.params.id, { type: "EmergencyStop" })
      return reply.status(202).send({ applied: outcome.applied, from: outcome.from, to: outcome.to })
    })

    app.post<{ Params: AgentParams }>("/agents/:id/clear-fault", async (request, reply) => {
      const outcome = await fleet.signal(request.params.id, { type: "ClearFault" })
      if (!outcome.applied) {
        return reply.status(409).send({ error: "conflict", message: "Agent has no fault to clear" })
      }
      return reply.status(200).send({ applied: true, from: outcome.from, to: outcome.to })
    })
  }
}
