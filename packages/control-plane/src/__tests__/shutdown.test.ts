import type { FastifyInstance } from "fastify"
import { describe, expect, it, vi } from "vitest"

import { createShutdown, type ShutdownDeps } from "../worker/shutdown.js"

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function mockDeps(order: string[], overrides: Partial<ShutdownDeps> = {}) {
  const log = { info: vi.fn(), error: vi.fn() }
  const fastify = {
    log,
    close: vi.fn(() => {
      order.push("fastify")
      return Promise.resolve()
    }),
  } as unknown as FastifyInstance
  const exit = vi.fn()
  const deps: ShutdownDeps = {
    fastify,
    runner: {
      stop: () => {
        order.push("runner")
        return Promise.resolve()
      },
    },
    fleet: {
      shutdown: () => {
        order.push("fleet")
        return Promise.resolve()
      },
    },
    pool: {
      end: () => {
        order.push("pool")
        return Promise.resolve()
      },
    },
    exit,
    ...overrides,
  }
  return { deps, log, exit }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("createShutdown", () => {
  it("closes HTTP, drains the worker, checkpoints actors, then closes the pool", async () => {
    const order: string[] = []
    const { deps, exit } = mockDeps(order)

    await createShutdown(deps)("SIGTERM")

    expect(order).toEqual(["fastify", "runner", "fleet", "pool"])
    expect(exit).toHaveBeenCalledWith(0)
  })

  it("runs only once", async () => {
    const order: string[] = []
    const { deps, exit } = mockDeps(order)
    const shutdown = createShutdown(deps)

    await shutdown("SIGTERM")
    await shutdown("SIGINT")

    expect(order).toEqual(["fastify", "runner", "fleet", "pool"])
    expect(exit).toHaveBeenCalledTimes(1)
  })

  it("proceeds after the worker deadline", async () => {
    const order: string[] = []
    const { deps } = mockDeps(order, {
      runner: { stop: () => new Promise<void>(() => undefined) },
      workerStopDeadlineMs: 5,
    })

    await createShutdown(deps)("SIGTERM")

    expect(order).toEqual(["fastify", "fleet", "pool"])
  })

  it("logs a failing step and keeps going", async () => {
    const order: string[] = []
    const { deps, log } = mockDeps(order, {
      fleet: { shutdown: () => Promise.reject(new Error("disk full")) },
    })

    await createShutdown(deps)("SIGTERM")

    expect(order).toEqual(["fastify", "runner", "pool"])
    expect(log.error).toHaveBeenCalledWith({ err: expect.any(Error) }, "Error stopping entity actors")
  })

  it("runs pre-drain hooks after HTTP closes", async () => {
    const order: string[] = []
    const { deps } = mockDeps(order, {
      onDrainStart: () => {
        order.push("drain")
        return Promise.resolve()
      },
    })

    await createShutdown(deps)("SIGTERM")

    expect(order).toEqual(["fastify", "drain", "runner", "fleet", "pool"])
  })
})
