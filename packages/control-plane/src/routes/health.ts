import type { FastifyInstance } from "fastify"

import type { FleetManager } from "../fleet/manager.js"

export interface HealthRouteDeps {
  fleet: Pick<FleetManager, "size">
  /** Resolves when PostgreSQL answers; rejects otherwise. */
  probeDb: () => Promise<void>
  workerRunning: () => boolean
}

export function healthRoutes(deps: HealthRouteDeps) {
  return function register(app: FastifyInstance): void {
    /** Liveness: always 200 if process is up. */
    app.get("/healthz", async (_request, reply) => {
      return reply.send({ status: "ok", agents: deps.fleet.size })
    })

    /**
     * Readiness: checks that critical subsystems are operational:
     * - Graphile Worker runner is present
     * - PostgreSQL is reachable
     */
    app.get("/readyz", async (request, reply) => {
      const checks: Record<string, boolean> = {
        worker: deps.workerRunning(),
        db: false,
      }

      try {
        await deps.probeDb()
        checks.db = true
      } catch (err) {
        request.log.warn({ err }, "Readiness database probe failed")
      }

      const ready = Object.values(checks).every(Boolean)
      const status = ready ? "ok" : "not_ready"
      const code = ready ? 200 : 503

      return reply.status(code).send({ status, checks })
    })
  }
}
