/**
 * Graphile Worker initialization.
 *
 * Configures the worker with:
 * - PostgreSQL connection (shared pool)
 * - Task handlers (mission_dispatch, history_compact)
 * - Concurrency (env GRAPHILE_WORKER_CONCURRENCY, default 5)
 *
 * The runner is started alongside Fastify and shares the same pg.Pool.
 */

import type { TracingLogger } from "@aether/shared/tracing"
import { run, type Runner, type TaskList } from "graphile-worker"
import type { Pool } from "pg"

import type { MissionRequestStore } from "../dispatch/requests.js"
import type { FleetManager } from "../fleet/manager.js"
import { createHistoryCompactTask, HISTORY_COMPACT_TASK } from "./tasks/history-compact.js"
import { createMissionDispatchTask, MISSION_DISPATCH_TASK } from "./tasks/mission-dispatch.js"

export interface WorkerOptions {
  pgPool: Pool
  fleet: FleetManager
  requests: MissionRequestStore
  logger: TracingLogger
  concurrency?: number
  dispatchMaxAttempts?: number
}

export function createTaskList(options: Omit<WorkerOptions, "pgPool" | "concurrency">): TaskList {
  return {
    [MISSION_DISPATCH_TASK]: createMissionDispatchTask({
      fleet: options.fleet,
      requests: options.requests,
      logger: options.logger,
      maxAttempts: options.dispatchMaxAttempts,
    }),
    [HISTORY_COMPACT_TASK]: createHistoryCompactTask(options.fleet, options.logger),
  }
}

/**
 * Create and start the Graphile Worker runner.
 * Returns the Runner instance (used for shutdown and job enqueueing).
 */
export async function createWorker(options: WorkerOptions): Promise<Runner> {
  const runner = await run({
    pgPool: options.pgPool,
    taskList: createTaskList(options),
    concurrency: options.concurrency ?? 5,
    noHandleSignals: true, // SIGTERM is handled in shutdown.ts
    crontab: [
      // Interval-triggered compaction sweep every minute
      `* * * * * ${HISTORY_COMPACT_TASK} ?max=1`,
    ].join("\n"),
  })

  return runner
}

export type { Runner } from "graphile-worker"
