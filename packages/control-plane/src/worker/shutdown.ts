/**
 * Graceful shutdown handler for Fastify, Graphile Worker and the fleet.
 *
 * Shutdown sequence:
 * T+0s   SIGTERM received
 * T+0s   Stop accepting new HTTP requests (fastify.close())
 * T+0s   Stop accepting new jobs (runner.stop())
 * T+45s  Deadline: if runner hasn't stopped, force-proceed
 *        Stop every entity actor, writing a final checkpoint each
 *        Close database pool
 */

import type { FastifyInstance } from "fastify"
import type { Runner } from "graphile-worker"
import type { Pool } from "pg"

import type { FleetManager } from "../fleet/manager.js"

export interface ShutdownDeps {
  fastify: FastifyInstance
  runner: Pick<Runner, "stop">
  pool: Pick<Pool, "end">
  fleet: Pick<FleetManager, "shutdown">
  onDrainStart?: () => Promise<void>
  /** Maximum time to wait for active jobs to drain. */
  workerStopDeadlineMs?: number
  exit?: (code: number) => void
}

const WORKER_STOP_DEADLINE_MS = 45_000

/** Run the shutdown sequence once; later calls resolve immediately. */
export function createShutdown(deps: ShutdownDeps): (signal: string) => Promise<void> {
  let shuttingDown = false
  const exit = deps.exit ?? ((code: number) => process.exit(code))
  const log = deps.fastify.log

  return async (signal: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true

    log.info({ signal }, "Shutdown signal received, draining…")

    // 1. Stop accepting new HTTP requests
    await deps.fastify.close().catch((err: unknown) => {
      log.error({ err }, "Error closing Fastify")
    })

    if (deps.onDrainStart) {
      await deps.onDrainStart().catch((err: unknown) => {
        log.error({ err }, "Error during pre-drain hooks")
      })
    }

    // 2. Stop Graphile Worker with a deadline
    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, deps.workerStopDeadlineMs ?? WORKER_STOP_DEADLINE_MS)
    })
    await Promise.race([deps.runner.stop(), deadline])
      .catch((err: unknown) => {
        log.error({ err }, "Error stopping Graphile Worker")
      })
      .finally(() => clearTimeout(timer))

    // 3. Final checkpoint for every actor
    await deps.fleet.shutdown().catch((err: unknown) => {
      log.error({ err }, "Error stopping entity actors")
    })

    // 4. Close the database pool
    await deps.pool.end().catch((err: unknown) => {
      log.error({ err }, "Error closing database pool")
    })

    log.info("Shutdown complete")
    exit(0)
  }
}

/**
 * Register SIGTERM and SIGINT handlers that perform graceful shutdown.
 * Returns a cleanup function to remove the signal listeners.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): () => void {
  const shutdown = createShutdown(deps)

  const onSigterm = (): void => void shutdown("SIGTERM")
  const onSigint = (): void => void shutdown("SIGINT")

  process.on("SIGTERM", onSigterm)
  process.on("SIGINT", onSigint)

  // Catch unhandled errors so the process doesn't die silently
  const onUnhandledRejection = (err: unknown): void => {
    deps.fastify.log.fatal({ err }, "Unhandled promise rejection, shutting down")
    void shutdown("unhandledRejection")
  }
  const onUncaughtException = (err: unknown): void => {
    deps.fastify.log.fatal({ err }, "Uncaught exception, shutting down")
    void shutdown("uncaughtException")
  }

  process.on("unhandledRejection", onUnhandledRejection)
  process.on("uncaughtException", onUncaughtException)

  return () => {
    process.removeListener("SIGTERM", onSigterm)
    process.removeListener("SIGINT", onSigint)
    process.removeListener("unhandledRejection", onUnhandledRejection)
    process.removeListener("uncaughtException", onUncaughtException)
  }
}
