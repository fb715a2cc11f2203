import type { TracingLogger } from "@aether/shared/tracing"
import fastifyCors from "@fastify/cors"
import Fastify, { type FastifyInstance } from "fastify"
import { makeWorkerUtils, type WorkerUtils } from "graphile-worker"
import { type Kysely, sql } from "kysely"
import type pg from "pg"

import type { Config } from "./config.js"
import type { Database } from "./db/types.js"
import type { MissionRequestStore } from "./dispatch/requests.js"
import type { FleetManager } from "./fleet/manager.js"
import { agentRoutes } from "./routes/agents.js"
import { registerErrorHandler } from "./routes/errors.js"
import { healthRoutes } from "./routes/health.js"
import { missionRoutes } from "./routes/missions.js"
import { createWorker, type Runner } from "./worker/index.js"
import { registerShutdownHandlers } from "./worker/shutdown.js"
import { MISSION_DISPATCH_TASK, missionDispatchPayload } from "./worker/tasks/mission-dispatch.js"

// ---------------------------------------------------------------------------
// HTTP server
// ---------------------------------------------------------------------------

export interface ServerOptions {
  fleet: FleetManager
  requests: MissionRequestStore
  enqueueDispatch: (requestId: string) => Promise<void>
  probeDb: () => Promise<void>
  workerRunning: () => boolean
  logLevel?: string
  corsOrigin?: string
}

/** Fastify instance with every route registered; does not listen. */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? "info",
    },
  })

  await app.register(fastifyCors, {
    origin: options.corsOrigin ?? true,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
  })

  registerErrorHandler(app)

  await app.register(
    healthRoutes({ fleet: options.fleet, probeDb: options.probeDb, workerRunning: options.workerRunning }),
  )
  await app.register(agentRoutes({ fleet: options.fleet }))
  await app.register(
    missionRoutes({
      fleet: options.fleet,
      requests: options.requests,
      enqueueDispatch: options.enqueueDispatch,
    }),
  )

  return app
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

export interface AppContext {
  app: FastifyInstance
  runner: Runner
  enqueueDispatch: (requestId: string) => Promise<void>
}

export interface AppOptions {
  db: Kysely<Database>
  pool: pg.Pool
  config: Config
  fleet: FleetManager
  requests: MissionRequestStore
  logger: TracingLogger
}

export async function buildApp(options: AppOptions): Promise<AppContext> {
  const { db, pool, config, fleet, requests, logger } = options

  // Start Graphile Worker alongside Fastify: shared pg.Pool
  const runner = await createWorker({
    pgPool: pool,
    fleet,
    requests,
    logger: logger.child({ component: "worker" }),
    concurrency: config.workerConcurrency,
    dispatchMaxAttempts: config.dispatchMaxAttempts,
  })

  // Worker utils for job enqueueing from routes
  const workerUtils: WorkerUtils = await makeWorkerUtils({ pgPool: pool })

  const enqueueDispatch = async (requestId: string): Promise<void> => {
    await workerUtils.addJob(MISSION_DISPATCH_TASK, missionDispatchPayload(requestId), {
      jobKey: `dispatch:${requestId}`,
      maxAttempts: 1,
    })
  }

  let workerRunning = true
  void runner.promise
    .catch((err: unknown) => {
      logger.error("worker stopped with error", { error: err })
    })
    .finally(() => {
      workerRunning = false
    })

  const app = await createServer({
    fleet,
    requests,
    enqueueDispatch,
    probeDb: async () => {
      await sql`select 1`.execute(db)
    },
    workerRunning: () => workerRunning,
    logLevel: config.logLevel,
    corsOrigin: config.corsOrigin,
  })

  // Register graceful shutdown handlers (SIGTERM, SIGINT)
  registerShutdownHandlers({ fastify: app, runner, pool, fleet })

  app.addHook("onClose", async () => {
    await workerUtils.release()
  })

  return { app, runner, enqueueDispatch }
}
