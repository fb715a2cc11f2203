/**
 * Mission and dispatch routes
 *
 * GET  /missions/:id            Live status, or the archived record
 * POST /dispatch/find           Pick the best agent for a query (no side effects)
 * POST /mission-requests        Queue a plan for asynchronous dispatch
 * GET  /mission-requests/:id    Dispatch progress of a queued plan
 */

import { DispatchQuerySchema } from "@aether/shared/fleet"
import type { FastifyInstance } from "fastify"
import { z } from "zod"

import type { MissionRequestStore } from "../dispatch/requests.js"
import type { FleetManager } from "../fleet/manager.js"

interface IdParams {
  id: string
}

const MissionRequestBodySchema = z.object({
  plan: z.record(z.string(), z.unknown()),
  query: DispatchQuerySchema,
})

export interface MissionRouteDeps {
  fleet: Pick<FleetManager, "getMissionStatus" | "findAgent">
  requests: MissionRequestStore
  enqueueDispatch: (requestId: string) => Promise<void>
}

export function missionRoutes(deps: MissionRouteDeps) {
  const { fleet, requests, enqueueDispatch } = deps

  return function register(app: FastifyInstance): void {
    app.get<{ Params: IdParams }>("/missions/:id", async (request, reply) => {
      const lookup = await fleet.getMissionStatus(request.params.id)
      if (!lookup) {
        return reply.status(404).send({ error: "not_found", message: "Mission not found" })
      }
      return reply.status(200).send(lookup)
    })

    app.post("/dispatch/find", async (request, reply) => {
      const query = DispatchQuerySchema.parse(request.body ?? {})
      const result = fleet.findAgent(query)
      return reply.status(result.status === "Found" ? 200 : 404).send(result)
    })

    app.post("/mission-requests", async (request, reply) => {
      const body = MissionRequestBodySchema.parse(request.body)
      const created = await requests.create(body.plan, body.query)
      await enqueueDispatch(created.id)
      return reply.status(202).send(created)
    })

    app.get<{ Params: IdParams }>("/mission-requests/:id", async (request, reply) => {
      const found = await requests.get(request.params.id)
      if (!found) {
        return reply.status(404).send({ error: "not_found", message: "Mission request not found" })
      }
      return reply.status(200).send(found)
    })
  }
}
